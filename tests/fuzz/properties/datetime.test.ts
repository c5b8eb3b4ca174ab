/**
 * Property tests for date-time arithmetic and offset-aware comparison.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { MarsDateTime } from '../../../src/datetime'
import { decodeDateTime, encodeDateTime } from '../../../src/state-codec'
import { durationGen, fixedOffsetGen, marsDateTimeGen } from '../generators'

const MARGIN = 10002

// ============================================================================
// Arithmetic
// ============================================================================

describe('DateTime - Arithmetic', () => {
  it('(dt + d) - d = dt', () => {
    fc.assert(
      fc.property(marsDateTimeGen({ margin: MARGIN }), durationGen(), (dt, d) => {
        expect(dt.plus(d).minus(d).equals(dt)).toBe(true)
      })
    )
  })

  it('(dt + d) - dt = d', () => {
    fc.assert(
      fc.property(marsDateTimeGen({ margin: MARGIN }), durationGen(), (dt, d) => {
        expect(dt.plus(d).minus(dt).equals(d)).toBe(true)
      })
    )
  })

  it('adding a positive duration moves forward', () => {
    fc.assert(
      fc.property(
        marsDateTimeGen({ margin: MARGIN, tz: fixedOffsetGen() }),
        durationGen().filter((d) => d.sols >= 0 && !d.isZero()),
        (dt, d) => {
          expect(dt.plus(d).isAfter(dt)).toBe(true)
        }
      )
    )
  })
})

// ============================================================================
// Providers
// ============================================================================

describe('DateTime - Providers', () => {
  it('astimezone keeps the instant', () => {
    fc.assert(
      fc.property(marsDateTimeGen({ tz: fixedOffsetGen() }), fixedOffsetGen(), (dt, target) => {
        const moved = dt.astimezone(target)
        expect(moved.equals(dt)).toBe(true)
        expect(moved.hash()).toBe(dt.hash())
        expect(moved.timestamp()).toBe(dt.timestamp())
      })
    )
  })

  it('astimezone there and back restores the fields', () => {
    fc.assert(
      fc.property(marsDateTimeGen({ tz: fixedOffsetGen() }), fixedOffsetGen(), (dt, target) => {
        const tz = dt.tz
        if (tz === null) return
        expect(dt.astimezone(target).astimezone(tz).toString()).toBe(dt.toString())
      })
    )
  })

  it('comparison is antisymmetric across providers', () => {
    fc.assert(
      fc.property(
        marsDateTimeGen({ tz: fixedOffsetGen() }),
        marsDateTimeGen({ tz: fixedOffsetGen() }),
        (a, b) => {
          expect(a.compare(b) + b.compare(a)).toBe(0)
          expect(a.compare(b) === 0).toBe(a.equals(b))
        }
      )
    )
  })

  it('state bytes restore the same value under the same provider', () => {
    fc.assert(
      fc.property(marsDateTimeGen({ tz: fixedOffsetGen() }), (dt) => {
        const restored: MarsDateTime = decodeDateTime(encodeDateTime(dt), dt.tz)
        expect(restored.equals(dt)).toBe(true)
        expect(restored.toString()).toBe(dt.toString())
      })
    )
  })
})
