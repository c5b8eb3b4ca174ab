/**
 * Formatting
 *
 * strftime-style rendering over a plain field tuple, plus the ISO-like
 * helpers the value types use for toString(). Nothing here does calendar
 * arithmetic beyond the day-of-year offset.
 */

import names from './calendar-names.json'
import { solsBeforeMonth } from './calendar-math'
import { Duration } from './duration'
import { FormatError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type TimeTuple = {
  year: number
  month: number
  sol: number
  hour: number
  minute: number
  /** Seconds including the sub-second fraction. */
  second: number
  /** 0 = Lunae … 6 = Solis */
  weekday: number
  dayOfYear: number | null
  /** 1 in daylight time, 0 not, -1 unknown */
  dst: -1 | 0 | 1
}

export type ZoneInfo = {
  name: string | null
  offset: Duration | null
}

export type TimeSpec = 'auto' | 'hours' | 'minutes' | 'seconds' | 'milliseconds' | 'microseconds'

// ============================================================================
// Names
// ============================================================================

function nameAt(list: readonly string[], index: number, what: string): string {
  const name = list[index]
  if (name === undefined) throw new FormatError(`No ${what} name for index ${index}`)
  return name
}

export function monthName(month: number, abbreviated = false): string {
  return nameAt(abbreviated ? names.monthAbbreviations : names.months, month - 1, 'month')
}

export function solName(weekday: number, abbreviated = false): string {
  return nameAt(abbreviated ? names.solAbbreviations : names.sols, weekday, 'sol')
}

// ============================================================================
// Padding
// ============================================================================

export function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

function pad3(n: number): string {
  return String(n).padStart(3, '0')
}

export function pad4(n: number): string {
  return String(n).padStart(4, '0')
}

function pad6(n: number): string {
  return String(n).padStart(6, '0')
}

function space2(n: number): string {
  return String(n).padStart(2, ' ')
}

// ============================================================================
// Offsets & Times
// ============================================================================

const HOUR = Duration.of({ hours: 1 })
const MINUTE = Duration.of({ minutes: 1 })

/**
 * `+HH<sep>MM`, with seconds and microseconds appended only when present.
 */
export function formatOffset(offset: Duration, sep: string): string {
  let sign = '+'
  let off = offset
  if (off.sols < 0) {
    sign = '-'
    off = off.negate()
  }
  const [hh, afterHours] = off.divmod(HOUR)
  const [mm, rest] = afterHours.divmod(MINUTE)
  let s = `${sign}${pad2(Number(hh))}${sep}${pad2(Number(mm))}`
  if (!rest.isZero()) {
    s += `${sep}${pad2(rest.seconds)}`
    if (rest.microseconds !== 0) s += `.${pad6(rest.microseconds)}`
  }
  return s
}

export function formatTime(
  hour: number,
  minute: number,
  second: number,
  microsecond: number,
  timespec: TimeSpec = 'auto'
): string {
  const spec = timespec === 'auto' ? (microsecond !== 0 ? 'microseconds' : 'seconds') : timespec
  switch (spec) {
    case 'hours':
      return pad2(hour)
    case 'minutes':
      return `${pad2(hour)}:${pad2(minute)}`
    case 'seconds':
      return `${pad2(hour)}:${pad2(minute)}:${pad2(second)}`
    case 'milliseconds':
      return `${pad2(hour)}:${pad2(minute)}:${pad2(second)}.${pad3(Math.floor(microsecond / 1000))}`
    case 'microseconds':
      return `${pad2(hour)}:${pad2(minute)}:${pad2(second)}.${pad6(microsecond)}`
  }
}

// ============================================================================
// strftime
// ============================================================================

function hour12(hour: number): number {
  return hour % 12 === 0 ? 12 : hour % 12
}

function expand(ch: string, t: TimeTuple, zone: ZoneInfo | undefined): string {
  const whole = Math.floor(t.second)
  switch (ch) {
    case 'A':
      return solName(t.weekday)
    case 'a':
      return solName(t.weekday, true)
    case 'B':
      return monthName(t.month)
    case 'b':
    case 'h':
      return monthName(t.month, true)
    case 'c':
      return `${solName(t.weekday, true)} ${monthName(t.month, true)} ${space2(t.sol)} ` +
        `${pad2(t.hour)}:${pad2(t.minute)}:${pad2(whole)} ${String(t.year).padStart(4, ' ')}`
    case 'D':
    case 'x':
      return `${pad2(t.month)}/${pad2(t.sol)}/${pad2(t.year % 100)}`
    case 'd':
      return pad2(t.sol)
    case 'e':
      return space2(t.sol)
    case 'F':
      return `${pad4(t.year)}-${pad2(t.month)}-${pad2(t.sol)}`
    case 'f':
      return pad6(Math.round((t.second - whole) * 1e6))
    case 'G':
    case 'Y':
      return pad4(t.year)
    case 'g':
    case 'y':
      return pad2(t.year % 100)
    case 'H':
      return pad2(t.hour)
    case 'I':
      return pad2(hour12(t.hour))
    case 'j':
      return pad3(t.dayOfYear ?? solsBeforeMonth(t.month) + t.sol)
    case 'M':
      return pad2(t.minute)
    case 'm':
      return pad2(t.month)
    case 'n':
      return '\n'
    case 'p':
      return t.hour <= 11 ? 'AM' : 'PM'
    case 'R':
      return `${pad2(t.hour)}:${pad2(t.minute)}`
    case 'r':
      return `${pad2(hour12(t.hour))}:${pad2(t.minute)}:${pad2(whole)} ${t.hour <= 11 ? 'AM' : 'PM'}`
    case 'S':
      return pad2(whole)
    case 'T':
    case 'X':
      return `${pad2(t.hour)}:${pad2(t.minute)}:${pad2(whole)}`
    case 'U':
      // Every month holds four seven-sol weeks
      return pad2((t.month - 1) * 4 + Math.floor((t.sol - 1) / 7) + 1)
    case 'W':
      if (t.month === 1 && t.sol === 1) return '96'
      return pad2((t.month - 1) * 4 + Math.floor((t.sol + 5) / 7))
    case 'w':
      return String((t.weekday + 1) % 7)
    case 'Z':
      return zone?.name ?? ''
    case 'z':
      return zone?.offset ? formatOffset(zone.offset, '') : ''
    case '%':
      return '%'
    default:
      throw new FormatError(`Invalid format string "%${ch}"`)
  }
}

/**
 * Expand a strftime template against `tuple`. `%Z` and `%z` read `zone` and
 * render empty for naive values.
 */
export function strftime(template: string, tuple: TimeTuple, zone?: ZoneInfo): string {
  let out = ''
  let escape = false
  for (const ch of template) {
    if (escape) {
      out += expand(ch, tuple, zone)
      escape = false
    } else if (ch === '%') {
      escape = true
    } else {
      out += ch
    }
  }
  if (escape) throw new FormatError('Format string ends with a lone "%"')
  return out
}
