/**
 * darian-datetime
 *
 * Public API exports
 */

// Error system
export {
  DarianError, DarianErrorCode,
  FieldRangeError, CalendarRangeError, InvalidArgumentError, OverflowError,
  TypeMismatchError, InconsistentOffsetError, FormatError, InvalidStateError,
} from './errors'
export type { DarianErrorCode as DarianErrorCodeType } from './errors'

// Calendar arithmetic
export type { YearMonthSol } from './calendar-math'
export {
  MIN_YEAR, MAX_YEAR, MAX_ORDINAL,
  isLeap, solsInYear, solsBeforeYear, solsBeforeMonth, solsInMonth,
  ymdToOrdinal, ordinalToYmd,
} from './calendar-math'

// Value types
export type { DurationInit } from './duration'
export { Duration } from './duration'
export type { MarsDateFields } from './date'
export { MarsDate, weekdayOf } from './date'
export type { MarsTimeFields } from './time'
export { MarsTime } from './time'
export type { MarsDateTimeFields } from './datetime'
export { MarsDateTime } from './datetime'
export type { Fold } from './internal/checks'

// Offsets
export type { OffsetProvider, OffsetContext } from './offset'
export { FixedOffset, fromMtc, nameFromOffset } from './offset'

// Terrestrial conversion
export type { MtcFields } from './converter'
export {
  SOL_SECONDS, MARS_TO_EARTH, EARTH_TO_MARS, TAI_MINUS_UTC, EPOCH_ORDINAL,
  mtcFieldsAt, earthToMars, marsToEarth, marsToTimestamp,
  earthDurationToMars, marsDurationToEarth,
} from './converter'

// Formatting
export type { TimeTuple, ZoneInfo, TimeSpec } from './format'
export { strftime, monthName, solName, formatOffset } from './format'

// State codec
export {
  STATE_VERSION, StateKind,
  encodeDate, decodeDate, encodeTime, decodeTime,
  encodeDateTime, decodeDateTime, encodeDuration, decodeDuration,
} from './state-codec'
