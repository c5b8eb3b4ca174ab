/**
 * Calendar Date Value
 *
 * An immutable Darian date (year 0..9999, month 1..24, sol). All arithmetic
 * goes through the ordinal, so month lengths never need special cases here.
 */

import {
  MAX_ORDINAL,
  ordinalToYmd,
  solsBeforeMonth,
  ymdToOrdinal,
} from './calendar-math'
import { Duration } from './duration'
import { OverflowError } from './errors'
import { checkDateFields, compareTuples } from './internal/checks'
import { hashInts } from './internal/hash'
import { mtcFieldsFromTimestamp } from './internal/sol-clock'
import { pad2, pad4, strftime, type TimeTuple } from './format'

export type MarsDateFields = {
  year?: number
  month?: number
  sol?: number
}

/** 0 = Lunae … 6 = Solis. */
export function weekdayOf(sol: number): number {
  return (sol + 5) % 7
}

export class MarsDate {
  readonly year: number
  readonly month: number
  readonly sol: number
  private hashCode: number | undefined

  constructor(year: number, month: number, sol: number) {
    checkDateFields(year, month, sol)
    this.year = year
    this.month = month
    this.sol = sol
  }

  static readonly MIN = new MarsDate(0, 1, 1)
  static readonly MAX = new MarsDate(9999, 24, 28)
  static readonly RESOLUTION = Duration.of({ sols: 1 })

  static fromOrdinal(ordinal: number): MarsDate {
    const { year, month, sol } = ordinalToYmd(ordinal)
    return new MarsDate(year, month, sol)
  }

  /** The MTC date at a POSIX timestamp (seconds). */
  static fromTimestamp(t: number): MarsDate {
    const { year, month, sol } = mtcFieldsFromTimestamp(t)
    return new MarsDate(year, month, sol)
  }

  toOrdinal(): number {
    return ymdToOrdinal(this.year, this.month, this.sol)
  }

  weekday(): number {
    return weekdayOf(this.sol)
  }

  /** 1-based sol of the year. */
  dayOfYear(): number {
    return solsBeforeMonth(this.month) + this.sol
  }

  with(fields: MarsDateFields): MarsDate {
    return new MarsDate(fields.year ?? this.year, fields.month ?? this.month, fields.sol ?? this.sol)
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  /** Only whole sols count; the sub-sol part of `delta` is ignored. */
  plus(delta: Duration): MarsDate {
    const ordinal = this.toOrdinal() + delta.sols
    if (ordinal < 1 || ordinal > MAX_ORDINAL) {
      throw new OverflowError(`date out of range: ordinal ${ordinal}`)
    }
    return MarsDate.fromOrdinal(ordinal)
  }

  minus(other: MarsDate): Duration
  minus(delta: Duration): MarsDate
  minus(other: MarsDate | Duration): Duration | MarsDate {
    if (other instanceof MarsDate) {
      return Duration.of({ sols: this.toOrdinal() - other.toOrdinal() })
    }
    return this.plus(Duration.of({ sols: -other.sols }))
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  compare(other: MarsDate): number {
    return compareTuples([this.year, this.month, this.sol], [other.year, other.month, other.sol])
  }

  equals(other: MarsDate): boolean {
    return this.compare(other) === 0
  }

  isBefore(other: MarsDate): boolean {
    return this.compare(other) < 0
  }

  isAfter(other: MarsDate): boolean {
    return this.compare(other) > 0
  }

  hash(): number {
    if (this.hashCode === undefined) {
      this.hashCode = hashInts([this.year, this.month, this.sol])
    }
    return this.hashCode
  }

  // ==========================================================================
  // Formatting
  // ==========================================================================

  timeTuple(): TimeTuple {
    return {
      year: this.year,
      month: this.month,
      sol: this.sol,
      hour: 0,
      minute: 0,
      second: 0,
      weekday: this.weekday(),
      dayOfYear: this.dayOfYear(),
      dst: -1,
    }
  }

  strftime(template: string): string {
    return strftime(template, this.timeTuple())
  }

  /** `YYYY-MM-DD` */
  toString(): string {
    return `${pad4(this.year)}-${pad2(this.month)}-${pad2(this.sol)}`
  }
}
