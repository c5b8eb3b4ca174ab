/**
 * Calendar Date-Time Value
 *
 * A MarsDate plus wall-clock fields and an optional offset provider.
 *
 * Values sharing one provider instance compare and subtract on their raw
 * fields; otherwise both sides are moved to MTC first. Mixing a naive value
 * with an aware one is a TypeMismatchError for ordering and subtraction, and
 * plain inequality for equals().
 */

import { MAX_ORDINAL } from './calendar-math'
import { MarsDate } from './date'
import { Duration } from './duration'
import { OverflowError, TypeMismatchError } from './errors'
import { formatOffset, formatTime, strftime, type TimeSpec, type TimeTuple } from './format'
import { checkTimeFields, compareTuples, type Fold } from './internal/checks'
import { hashInts } from './internal/hash'
import { mtcFieldsFromTimestamp, timestampFromMtcFields } from './internal/sol-clock'
import { checkOffset, FixedOffset, localFromMtc, sameOffset, type OffsetProvider } from './offset'
import { MarsTime } from './time'

// ============================================================================
// Types
// ============================================================================

export type MarsDateTimeFields = {
  year?: number
  month?: number
  sol?: number
  hour?: number
  minute?: number
  second?: number
  microsecond?: number
  tz?: OffsetProvider | null
  fold?: Fold
}

// ============================================================================
// MarsDateTime
// ============================================================================

export class MarsDateTime {
  private readonly date: MarsDate
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
  readonly tz: OffsetProvider | null
  readonly fold: Fold
  private hashCode: number | undefined

  constructor(
    year: number,
    month: number,
    sol: number,
    hour = 0,
    minute = 0,
    second = 0,
    microsecond = 0,
    tz: OffsetProvider | null = null,
    fold: Fold = 0
  ) {
    this.date = new MarsDate(year, month, sol)
    checkTimeFields(hour, minute, second, microsecond, fold)
    this.hour = hour
    this.minute = minute
    this.second = second
    this.microsecond = microsecond
    this.tz = tz
    this.fold = fold
  }

  static readonly MIN = new MarsDateTime(0, 1, 1)
  static readonly MAX = new MarsDateTime(9999, 24, 28, 23, 59, 59, 999999)
  static readonly RESOLUTION = Duration.of({ microseconds: 1 })

  // ==========================================================================
  // Construction
  // ==========================================================================

  /** `tz` defaults to the time's own provider; pass null for a naive result. */
  static combine(date: MarsDate, time: MarsTime, tz?: OffsetProvider | null): MarsDateTime {
    return new MarsDateTime(
      date.year,
      date.month,
      date.sol,
      time.hour,
      time.minute,
      time.second,
      time.microsecond,
      tz !== undefined ? tz : time.tz,
      time.fold
    )
  }

  /**
   * The date-time at POSIX time `t` (seconds), localized to `tz`.
   * With `tz` null the result is naive and holds MTC fields.
   */
  static fromTimestamp(t: number, tz: OffsetProvider | null = FixedOffset.MTC): MarsDateTime {
    const f = mtcFieldsFromTimestamp(t)
    const result = new MarsDateTime(f.year, f.month, f.sol, f.hour, f.minute, f.second, f.microsecond, tz)
    return tz === null ? result : localFromMtc(tz, result)
  }

  // ==========================================================================
  // Fields
  // ==========================================================================

  get year(): number {
    return this.date.year
  }

  get month(): number {
    return this.date.month
  }

  get sol(): number {
    return this.date.sol
  }

  toDate(): MarsDate {
    return this.date
  }

  /** The time part without a provider. */
  toTime(): MarsTime {
    return new MarsTime(this.hour, this.minute, this.second, this.microsecond, null, this.fold)
  }

  toTimeTz(): MarsTime {
    return new MarsTime(this.hour, this.minute, this.second, this.microsecond, this.tz, this.fold)
  }

  toOrdinal(): number {
    return this.date.toOrdinal()
  }

  weekday(): number {
    return this.date.weekday()
  }

  with(fields: MarsDateTimeFields): MarsDateTime {
    return new MarsDateTime(
      fields.year ?? this.year,
      fields.month ?? this.month,
      fields.sol ?? this.sol,
      fields.hour ?? this.hour,
      fields.minute ?? this.minute,
      fields.second ?? this.second,
      fields.microsecond ?? this.microsecond,
      fields.tz !== undefined ? fields.tz : this.tz,
      fields.fold ?? this.fold
    )
  }

  // ==========================================================================
  // Offsets
  // ==========================================================================

  mtcOffset(): Duration | null {
    if (this.tz === null) return null
    return checkOffset('mtcOffset', this.tz.mtcOffset(this))
  }

  dst(): Duration | null {
    if (this.tz === null) return null
    return checkOffset('dst', this.tz.dst(this))
  }

  tzName(): string | null {
    if (this.tz === null) return null
    return this.tz.tzName(this)
  }

  /**
   * The same instant expressed in `tz`. A naive value, or one whose provider
   * reports no offset, is read as MTC. Returns `this` when it already
   * resolves to `tz`.
   */
  astimezone(tz: OffsetProvider = FixedOffset.MTC): MarsDateTime {
    let myTz: OffsetProvider = FixedOffset.MTC
    let myOffset: Duration = Duration.ZERO
    if (this.tz !== null) {
      const offset = this.tz.mtcOffset(this)
      if (offset !== null) {
        myTz = this.tz
        myOffset = offset
      }
    }

    if (tz === myTz) return this

    const mtc = this.minus(myOffset).with({ tz })
    return localFromMtc(tz, mtc)
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  /** The provider is kept; fold resets to 0. */
  plus(delta: Duration): MarsDateTime {
    const total = Duration.of({
      sols: this.toOrdinal(),
      hours: this.hour,
      minutes: this.minute,
      seconds: this.second,
      microseconds: this.microsecond,
    }).plus(delta)

    if (total.sols < 1 || total.sols > MAX_ORDINAL) {
      throw new OverflowError('date-time result out of range')
    }
    const hour = Math.floor(total.seconds / 3600)
    const rem = total.seconds % 3600
    const date = MarsDate.fromOrdinal(total.sols)
    return new MarsDateTime(
      date.year,
      date.month,
      date.sol,
      hour,
      Math.floor(rem / 60),
      rem % 60,
      total.microseconds,
      this.tz
    )
  }

  /** A Duration for another date-time, a shifted date-time for a Duration. */
  minus(other: MarsDateTime): Duration
  minus(delta: Duration): MarsDateTime
  minus(other: MarsDateTime | Duration): Duration | MarsDateTime {
    if (other instanceof Duration) {
      return this.plus(other.negate())
    }

    const secondsA = this.second + this.minute * 60 + this.hour * 3600
    const secondsB = other.second + other.minute * 60 + other.hour * 3600
    const base = Duration.of({
      sols: this.toOrdinal() - other.toOrdinal(),
      seconds: secondsA - secondsB,
      microseconds: this.microsecond - other.microsecond,
    })
    if (this.tz === other.tz) return base

    const myOffset = this.mtcOffset()
    const otherOffset = other.mtcOffset()
    if (sameOffset(myOffset, otherOffset)) return base
    if (myOffset === null || otherOffset === null) {
      throw new TypeMismatchError('cannot mix naive and offset-aware date-times')
    }
    return base.plus(otherOffset).minus(myOffset)
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  private fields(): number[] {
    return [this.year, this.month, this.sol, this.hour, this.minute, this.second, this.microsecond]
  }

  private offsetDependsOnFold(): boolean {
    const flipped = this.with({ fold: this.fold === 1 ? 0 : 1 })
    return !sameOffset(this.mtcOffset(), flipped.mtcOffset())
  }

  /** Non-zero (2) from equality checks means "not equal, not ordered". */
  private compareWith(other: MarsDateTime, allowMixed: boolean): number {
    let myOffset: Duration | null = null
    let otherOffset: Duration | null = null
    let baseCompare: boolean

    if (this.tz === other.tz) {
      baseCompare = true
    } else {
      myOffset = this.mtcOffset()
      otherOffset = other.mtcOffset()
      // An ambiguous local time never equals a value in another frame
      if (allowMixed && (this.offsetDependsOnFold() || other.offsetDependsOnFold())) {
        return 2
      }
      baseCompare = sameOffset(myOffset, otherOffset)
    }

    if (baseCompare) {
      return compareTuples(this.fields(), other.fields())
    }
    if (myOffset === null || otherOffset === null) {
      if (allowMixed) return 2
      throw new TypeMismatchError('cannot compare naive and offset-aware date-times')
    }
    const diff = this.minus(other)
    if (diff.sols < 0) return -1
    return diff.isZero() ? 0 : 1
  }

  /** Throws TypeMismatchError when one side is naive and the other aware. */
  compare(other: MarsDateTime): number {
    return this.compareWith(other, false)
  }

  equals(other: MarsDateTime): boolean {
    return this.compareWith(other, true) === 0
  }

  isBefore(other: MarsDateTime): boolean {
    return this.compare(other) < 0
  }

  isAfter(other: MarsDateTime): boolean {
    return this.compare(other) > 0
  }

  /**
   * Fold 1 hashes as fold 0, so both readings of an ambiguous local time
   * agree. Aware values hash their MTC instant.
   */
  hash(): number {
    if (this.hashCode === undefined) {
      const t = this.fold === 1 ? this.with({ fold: 0 }) : this
      const offset = t.mtcOffset()
      if (offset === null) {
        this.hashCode = hashInts(t.fields())
      } else {
        const seconds = this.hour * 3600 + this.minute * 60 + this.second
        this.hashCode = Duration.of({
          sols: this.toOrdinal(),
          seconds,
          microseconds: this.microsecond,
        })
          .minus(offset)
          .hash()
      }
    }
    return this.hashCode
  }

  // ==========================================================================
  // Terrestrial Time
  // ==========================================================================

  private toMtcFrame(): MarsDateTime {
    const offset = this.mtcOffset()
    return offset === null || offset.isZero() ? this : this.minus(offset)
  }

  /** The MTC wall-clock reading of this value. Naive values are taken as MTC. */
  mtcTimeTuple(): TimeTuple {
    return { ...this.toMtcFrame().timeTuple(), dst: 0 }
  }

  /** POSIX timestamp in terrestrial seconds. Naive values are taken as MTC. */
  timestamp(): number {
    const mtc = this.toMtcFrame()
    return timestampFromMtcFields({
      year: mtc.year,
      month: mtc.month,
      sol: mtc.sol,
      hour: mtc.hour,
      minute: mtc.minute,
      second: mtc.second,
      microsecond: mtc.microsecond,
    })
  }

  // ==========================================================================
  // Formatting
  // ==========================================================================

  timeTuple(): TimeTuple {
    const dst = this.dst()
    return {
      year: this.year,
      month: this.month,
      sol: this.sol,
      hour: this.hour,
      minute: this.minute,
      second: this.second + this.microsecond / 1e6,
      weekday: this.weekday(),
      dayOfYear: this.date.dayOfYear(),
      dst: dst === null ? -1 : dst.isZero() ? 0 : 1,
    }
  }

  strftime(template: string): string {
    return strftime(template, this.timeTuple(), { name: this.tzName(), offset: this.mtcOffset() })
  }

  /** `YYYY-MM-DD HH:MM:SS[.ffffff][+HH:MM]` */
  toString(sep = ' ', timespec: TimeSpec = 'auto'): string {
    const s = `${this.date.toString()}${sep}` +
      formatTime(this.hour, this.minute, this.second, this.microsecond, timespec)
    const offset = this.mtcOffset()
    return offset === null ? s : s + formatOffset(offset, ':')
  }
}
