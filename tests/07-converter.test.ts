/**
 * Segment 07: Cross-Calendar Converter Tests
 */

import { describe, it, expect } from 'vitest'
import {
  EARTH_TO_MARS,
  EPOCH_ORDINAL,
  MARS_TO_EARTH,
  SOL_SECONDS,
  TAI_MINUS_UTC,
  earthDurationToMars,
  earthToMars,
  marsDurationToEarth,
  marsToEarth,
  marsToTimestamp,
  mtcFieldsAt,
} from '../src/converter'
import { MarsDate } from '../src/date'
import { MarsDateTime } from '../src/datetime'
import { Duration } from '../src/duration'
import { InvalidArgumentError } from '../src/errors'
import { FixedOffset } from '../src/offset'

const LANDING = new Date(Date.UTC(2021, 3, 29, 5, 25, 35, 132))

// ============================================================================
// 1. CONSTANTS
// ============================================================================

describe('Constants', () => {
  it('fixes the sol length and epoch', () => {
    expect(SOL_SECONDS).toBe(88775.244147)
    expect(TAI_MINUS_UTC).toBe(37)
    expect(EPOCH_ORDINAL).toBe(128257.2954262)
    expect(MARS_TO_EARTH * EARTH_TO_MARS).toBeCloseTo(1, 12)
  })
})

// ============================================================================
// 2. INSTANTS
// ============================================================================

describe('mtcFieldsAt', () => {
  it('places the POSIX epoch on the Darian calendar', () => {
    expect(mtcFieldsAt(0)).toEqual({
      year: 191,
      month: 20,
      sol: 26,
      hour: 7,
      minute: 6,
      second: 0,
      microsecond: 833719,
    })
  })

  it('puts EPOCH_ORDINAL at POSIX time -TAI_MINUS_UTC', () => {
    expect(mtcFieldsAt(-TAI_MINUS_UTC)).toEqual({
      year: 191,
      month: 20,
      sol: 26,
      hour: 7,
      minute: 5,
      second: 24,
      microsecond: 823680,
    })
  })

  it('rounds to the nearest microsecond', () => {
    expect(mtcFieldsAt(1619673935.132504).microsecond).toBe(725890)
  })

  it('rejects non-finite timestamps', () => {
    expect(() => mtcFieldsAt(Number.NaN)).toThrow(InvalidArgumentError)
  })
})

describe('earthToMars', () => {
  it('converts a Date to MTC by default', () => {
    expect(earthToMars(LANDING).toString()).toBe('0219-03-24 22:52:59.725397+00:00')
  })

  it('localizes to a given provider', () => {
    const zone = FixedOffset.of(Duration.of({ hours: 1 }))
    expect(earthToMars(LANDING, zone).toString()).toBe('0219-03-24 23:52:59.725397+01:00')
  })

  it('rejects an invalid Date', () => {
    expect(() => earthToMars(new Date(Number.NaN))).toThrow(InvalidArgumentError)
  })
})

describe('fromTimestamp', () => {
  it('gives naive MTC fields without a provider', () => {
    const dt = MarsDateTime.fromTimestamp(0, null)
    expect(dt.tz).toBeNull()
    expect(dt.toString()).toBe('0191-20-26 07:06:00.833719')
  })

  it('gives the MTC date', () => {
    expect(MarsDate.fromTimestamp(0).toString()).toBe('0191-20-26')
  })
})

describe('Martian to terrestrial', () => {
  it('inverts earthToMars to within a microsecond', () => {
    const dt = earthToMars(LANDING)
    expect(marsToTimestamp(dt)).toBeCloseTo(LANDING.getTime() / 1000, 5)
    expect(marsToEarth(dt).getTime()).toBe(LANDING.getTime())
  })

  it('reads the offset of a local value', () => {
    const zone = FixedOffset.of(Duration.of({ hours: -5 }))
    const dt = earthToMars(LANDING).astimezone(zone)
    expect(marsToEarth(dt).getTime()).toBe(LANDING.getTime())
  })

  it('maps the epoch fields back to -TAI_MINUS_UTC', () => {
    const dt = new MarsDateTime(191, 20, 26, 7, 5, 24, 823680, FixedOffset.MTC)
    expect(dt.timestamp()).toBeCloseTo(-37, 5)
  })

  it('requires an aware value', () => {
    expect(() => marsToTimestamp(new MarsDateTime(219, 1, 1))).toThrow(InvalidArgumentError)
    expect(() => marsToEarth(new MarsDateTime(219, 1, 1))).toThrow(InvalidArgumentError)
  })
})

// ============================================================================
// 3. DURATIONS
// ============================================================================

describe('Durations', () => {
  it('scales a terrestrial day into sols', () => {
    const d = earthDurationToMars(86_400_000)
    expect([d.sols, d.seconds, d.microseconds]).toEqual([0, 84088, 307182])
  })

  it('scales sols into terrestrial milliseconds', () => {
    expect(marsDurationToEarth(Duration.of({ sols: 1 }))).toBe(88775244.147)
    expect(marsDurationToEarth(Duration.of({ hours: 1 }))).toBe(3698968.506)
  })
})
