/**
 * Segment 01: Calendar Math Tests
 *
 * Leap rule, year/month offsets and the ordinal bijection.
 */

import { describe, it, expect } from 'vitest'
import {
  MAX_ORDINAL,
  isLeap,
  solsInYear,
  solsBeforeYear,
  solsBeforeMonth,
  solsInMonth,
  ymdToOrdinal,
  ordinalToYmd,
} from '../src/calendar-math'
import { CalendarRangeError, FieldRangeError, OverflowError } from '../src/errors'

// ============================================================================
// 1. LEAP YEARS
// ============================================================================

describe('isLeap', () => {
  it.each([
    [0, true],
    [1, true],
    [2, false],
    [10, true],
    [100, false],
    [1000, true],
    [2000, true],
    [2001, true],
    [2010, true],
    [2100, false],
    [4800, false],
    [4950, true],
    [6000, false],
    [7200, false],
    [8400, false],
    [9000, false],
    [9999, true],
  ])('year %i leap = %s', (year, expected) => {
    expect(isLeap(year)).toBe(expected)
  })

  it('solsInYear follows the leap rule', () => {
    expect(solsInYear(2000)).toBe(669)
    expect(solsInYear(2100)).toBe(668)
  })
})

// ============================================================================
// 2. YEAR AND MONTH OFFSETS
// ============================================================================

describe('solsBeforeYear', () => {
  it.each([
    [0, 0],
    [1, 669],
    [2, 1338],
    [1000, 668591],
    [2000, 1337182],
    [2001, 1337851],
    [4800, 3209244],
    [6000, 4011558],
    [8400, 5616188],
    [9999, 6685276],
  ])('year %i starts after %i sols', (year, sols) => {
    expect(solsBeforeYear(year)).toBe(sols)
  })

  it('consecutive years differ by the length of the earlier one', () => {
    for (const year of [0, 999, 2000, 4800, 6800, 8400, 9998]) {
      expect(solsBeforeYear(year + 1) - solsBeforeYear(year)).toBe(solsInYear(year))
    }
  })
})

describe('solsBeforeMonth', () => {
  it('skips one sol after every sixth month', () => {
    expect(solsBeforeMonth(1)).toBe(0)
    expect(solsBeforeMonth(6)).toBe(140)
    expect(solsBeforeMonth(7)).toBe(167)
    expect(solsBeforeMonth(13)).toBe(334)
    expect(solsBeforeMonth(24)).toBe(641)
  })

  it('rejects months outside 1..24', () => {
    expect(() => solsBeforeMonth(0)).toThrow(FieldRangeError)
    expect(() => solsBeforeMonth(25)).toThrow(FieldRangeError)
  })
})

describe('solsInMonth', () => {
  it('gives 27 sols to months 6, 12 and 18', () => {
    expect(solsInMonth(2000, 6)).toBe(27)
    expect(solsInMonth(2000, 12)).toBe(27)
    expect(solsInMonth(2000, 18)).toBe(27)
    expect(solsInMonth(2000, 5)).toBe(28)
  })

  it('gives month 24 its leap sol only in leap years', () => {
    expect(solsInMonth(2000, 24)).toBe(28)
    expect(solsInMonth(2100, 24)).toBe(27)
  })
})

// ============================================================================
// 3. ORDINALS
// ============================================================================

describe('ymdToOrdinal', () => {
  it('numbers sols from year 0', () => {
    expect(ymdToOrdinal(0, 1, 1)).toBe(1)
    expect(ymdToOrdinal(0, 24, 28)).toBe(669)
    expect(ymdToOrdinal(1, 1, 1)).toBe(670)
    expect(ymdToOrdinal(219, 13, 27)).toBe(146782)
    expect(ymdToOrdinal(2000, 1, 1)).toBe(1337183)
  })

  it('maps the last representable sol to MAX_ORDINAL', () => {
    expect(ymdToOrdinal(9999, 24, 28)).toBe(MAX_ORDINAL)
    expect(MAX_ORDINAL).toBe(6685945)
  })

  it('rejects a sol beyond the month length', () => {
    expect(() => ymdToOrdinal(2100, 24, 28)).toThrow(CalendarRangeError)
    expect(() => ymdToOrdinal(2000, 6, 28)).toThrow(CalendarRangeError)
    expect(() => ymdToOrdinal(2000, 1, 0)).toThrow(CalendarRangeError)
  })
})

describe('ordinalToYmd', () => {
  it('inverts known ordinals', () => {
    expect(ordinalToYmd(1)).toEqual({ year: 0, month: 1, sol: 1 })
    expect(ordinalToYmd(668)).toEqual({ year: 0, month: 24, sol: 27 })
    expect(ordinalToYmd(669)).toEqual({ year: 0, month: 24, sol: 28 })
    expect(ordinalToYmd(670)).toEqual({ year: 1, month: 1, sol: 1 })
    expect(ordinalToYmd(146782)).toEqual({ year: 219, month: 13, sol: 27 })
    expect(ordinalToYmd(1337183)).toEqual({ year: 2000, month: 1, sol: 1 })
    expect(ordinalToYmd(MAX_ORDINAL)).toEqual({ year: 9999, month: 24, sol: 28 })
  })

  it('round-trips every sol of a year on each band boundary', () => {
    for (const year of [2000, 2001, 4800, 4801, 6800, 6801, 8400, 8401]) {
      const start = solsBeforeYear(year)
      for (let n = start + 1; n <= start + solsInYear(year); n++) {
        const { year: y, month, sol } = ordinalToYmd(n)
        expect(y).toBe(year)
        expect(ymdToOrdinal(y, month, sol)).toBe(n)
      }
    }
  })

  it('rejects ordinals outside 1..MAX_ORDINAL', () => {
    expect(() => ordinalToYmd(0)).toThrow(OverflowError)
    expect(() => ordinalToYmd(MAX_ORDINAL + 1)).toThrow(OverflowError)
    expect(() => ordinalToYmd(1.5)).toThrow(OverflowError)
  })
})
