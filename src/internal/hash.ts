/**
 * Internal Hashing
 *
 * 32-bit hash over a list of integers. Used by the value types' memoized
 * hash() methods; equal inputs always give equal hashes.
 */

const SEED = 0x811c9dc5
const TWO_32 = 2 ** 32

function mix(h: number, word: number): number {
  let k = Math.imul(word, 0xcc9e2d51)
  k = (k << 15) | (k >>> 17)
  k = Math.imul(k, 0x1b873593)
  h ^= k
  h = (h << 13) | (h >>> 19)
  return (Math.imul(h, 5) + 0xe6546b64) | 0
}

export function hashInts(values: readonly number[]): number {
  let h = SEED
  for (const v of values) {
    // Split into low and high words so values past 32 bits still contribute
    const high = Math.floor(v / TWO_32)
    h = mix(h, v - high * TWO_32)
    h = mix(h, high)
  }
  h ^= values.length
  h ^= h >>> 16
  h = Math.imul(h, 0x85ebca6b)
  h ^= h >>> 13
  h = Math.imul(h, 0xc2b2ae35)
  h ^= h >>> 16
  return h | 0
}
