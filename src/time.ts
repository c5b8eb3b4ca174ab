/**
 * Time-of-day Value
 *
 * Wall-clock fields with an optional offset provider. A time on its own has
 * no date, so providers are asked with a `null` context.
 */

import { Duration } from './duration'
import { TypeMismatchError } from './errors'
import { checkTimeFields, compareTuples, type Fold } from './internal/checks'
import { hashInts } from './internal/hash'
import { checkOffset, sameOffset, type OffsetProvider } from './offset'
import { formatOffset, formatTime, strftime, type TimeSpec } from './format'

export type MarsTimeFields = {
  hour?: number
  minute?: number
  second?: number
  microsecond?: number
  tz?: OffsetProvider | null
  fold?: Fold
}

export class MarsTime {
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
  readonly tz: OffsetProvider | null
  readonly fold: Fold
  private hashCode: number | undefined

  constructor(
    hour = 0,
    minute = 0,
    second = 0,
    microsecond = 0,
    tz: OffsetProvider | null = null,
    fold: Fold = 0
  ) {
    checkTimeFields(hour, minute, second, microsecond, fold)
    this.hour = hour
    this.minute = minute
    this.second = second
    this.microsecond = microsecond
    this.tz = tz
    this.fold = fold
  }

  static readonly MIN = new MarsTime(0, 0, 0)
  static readonly MAX = new MarsTime(23, 59, 59, 999999)
  static readonly RESOLUTION = Duration.of({ microseconds: 1 })

  with(fields: MarsTimeFields): MarsTime {
    return new MarsTime(
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
    return checkOffset('mtcOffset', this.tz.mtcOffset(null))
  }

  dst(): Duration | null {
    if (this.tz === null) return null
    return checkOffset('dst', this.tz.dst(null))
  }

  tzName(): string | null {
    if (this.tz === null) return null
    return this.tz.tzName(null)
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  private microsecondOfSol(): number {
    return ((this.hour * 60 + this.minute) * 60 + this.second) * 1_000_000 + this.microsecond
  }

  private compareWith(other: MarsTime, allowMixed: boolean): number {
    let myOffset: Duration | null = null
    let otherOffset: Duration | null = null
    let baseCompare: boolean

    if (this.tz === other.tz) {
      baseCompare = true
    } else {
      myOffset = this.mtcOffset()
      otherOffset = other.mtcOffset()
      baseCompare = sameOffset(myOffset, otherOffset)
    }

    if (baseCompare) {
      return compareTuples(
        [this.hour, this.minute, this.second, this.microsecond],
        [other.hour, other.minute, other.second, other.microsecond]
      )
    }
    if (myOffset === null || otherOffset === null) {
      if (allowMixed) return 2
      throw new TypeMismatchError('cannot compare naive and aware times')
    }
    const mine = this.microsecondOfSol() - Number(myOffset.toMicroseconds())
    const theirs = other.microsecondOfSol() - Number(otherOffset.toMicroseconds())
    return mine < theirs ? -1 : mine > theirs ? 1 : 0
  }

  /** Throws TypeMismatchError when one side is naive and the other aware. */
  compare(other: MarsTime): number {
    return this.compareWith(other, false)
  }

  equals(other: MarsTime): boolean {
    return this.compareWith(other, true) === 0
  }

  isBefore(other: MarsTime): boolean {
    return this.compare(other) < 0
  }

  isAfter(other: MarsTime): boolean {
    return this.compare(other) > 0
  }

  /** Both folds of the same time hash alike; aware times hash their MTC time. */
  hash(): number {
    if (this.hashCode === undefined) {
      const t = this.fold === 1 ? this.with({ fold: 0 }) : this
      const offset = t.mtcOffset()
      const shift = offset === null ? 0 : Number(offset.toMicroseconds())
      this.hashCode = hashInts([t.microsecondOfSol() - shift])
    }
    return this.hashCode
  }

  // ==========================================================================
  // Formatting
  // ==========================================================================

  strftime(template: string): string {
    return strftime(
      template,
      {
        year: 0,
        month: 1,
        sol: 1,
        hour: this.hour,
        minute: this.minute,
        second: this.second + this.microsecond / 1e6,
        weekday: 0,
        dayOfYear: null,
        dst: -1,
      },
      { name: this.tzName(), offset: this.mtcOffset() }
    )
  }

  /** `HH:MM:SS[.ffffff][+HH:MM]` */
  toString(timespec: TimeSpec = 'auto'): string {
    const offset = this.mtcOffset()
    const s = formatTime(this.hour, this.minute, this.second, this.microsecond, timespec)
    return offset === null ? s : s + formatOffset(offset, ':')
  }
}
