import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

const root = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  plugins: [
    dts({ include: ['src'], rollupTypes: true })
  ],
  build: {
    lib: {
      entry: resolve(root, 'src/index.ts'),
      formats: ['es'],
      fileName: 'index'
    }
  }
})
