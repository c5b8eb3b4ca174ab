/**
 * Cross-Calendar Converter
 *
 * Translates between terrestrial time (JavaScript Date, POSIX seconds,
 * millisecond durations) and Martian values. Terrestrial calendar work stays
 * with Date; this module only crosses the boundary.
 */

import { MarsDateTime } from './datetime'
import { Duration } from './duration'
import { InvalidArgumentError } from './errors'
import {
  EARTH_TO_MARS,
  MARS_TO_EARTH,
  mtcFieldsFromTimestamp,
  type MtcFields,
} from './internal/sol-clock'
import type { OffsetProvider } from './offset'

export {
  SOL_SECONDS,
  MARS_TO_EARTH,
  EARTH_TO_MARS,
  TAI_MINUS_UTC,
  EPOCH_ORDINAL,
} from './internal/sol-clock'
export type { MtcFields } from './internal/sol-clock'

// ============================================================================
// Instants
// ============================================================================

/** MTC calendar fields at POSIX time `t` (seconds). */
export function mtcFieldsAt(t: number): MtcFields {
  if (!Number.isFinite(t)) {
    throw new InvalidArgumentError(`timestamp must be a finite number, got ${t}`)
  }
  return mtcFieldsFromTimestamp(t)
}

/**
 * The Martian date-time at a terrestrial instant, in MTC unless `tz` is
 * given.
 */
export function earthToMars(date: Date, tz?: OffsetProvider): MarsDateTime {
  const ms = date.getTime()
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError('Cannot convert an invalid Date')
  }
  return MarsDateTime.fromTimestamp(ms / 1000, tz)
}

/** POSIX seconds of an offset-aware Martian date-time. */
export function marsToTimestamp(dt: MarsDateTime): number {
  if (dt.tz === null) {
    throw new InvalidArgumentError('Time zone must be specified to convert to terrestrial time')
  }
  return dt.timestamp()
}

export function marsToEarth(dt: MarsDateTime): Date {
  return new Date(Math.round(marsToTimestamp(dt) * 1000))
}

// ============================================================================
// Durations
// ============================================================================

/** A terrestrial span in milliseconds, as the same span in sols. */
export function earthDurationToMars(ms: number): Duration {
  return Duration.of({ milliseconds: ms }).times(EARTH_TO_MARS)
}

/** A Martian span in terrestrial milliseconds, microsecond precision kept. */
export function marsDurationToEarth(duration: Duration): number {
  return Number(duration.times(MARS_TO_EARTH).toMicroseconds()) / 1000
}
