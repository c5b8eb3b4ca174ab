/**
 * Duration Value
 *
 * An immutable span of Martian time, normalized to (sols, seconds,
 * microseconds). `seconds` and `microseconds` are never negative; the sign
 * lives entirely in `sols`, so -1µs is (-1 sol, 86399 s, 999999 µs).
 *
 * A Martian "second" is 1/86400 of a sol, so every unit above the sol scales
 * the same way it does on Earth: 24 hours, 60 minutes, 60 seconds.
 */

import { InvalidArgumentError, OverflowError } from './errors'
import { hashInts } from './internal/hash'

// ============================================================================
// Types
// ============================================================================

/** Any field may be fractional or negative. */
export type DurationInit = {
  sols?: number
  seconds?: number
  microseconds?: number
  milliseconds?: number
  minutes?: number
  hours?: number
  weeks?: number
}

// ============================================================================
// Constants
// ============================================================================

const SECONDS_PER_SOL = 86400
const US_PER_SECOND = 1_000_000
const MAX_SOLS = 999_999_999

const US_PER_SECOND_N = 1_000_000n
const US_PER_SOL_N = 86_400_000_000n

// ============================================================================
// Number Helpers
// ============================================================================

/** [fractional part, integral part], both carrying the sign of x. */
function modf(x: number): [number, number] {
  const whole = Math.trunc(x)
  return [x - whole, whole]
}

/** Floor division of an integer by a positive integer. */
function divmod(a: number, b: number): [number, number] {
  let q = Math.floor(a / b)
  let r = a - q * b
  if (r < 0) {
    q -= 1
    r += b
  } else if (r >= b) {
    q += 1
    r -= b
  }
  return [q, r]
}

function roundHalfEven(x: number): number {
  const floor = Math.floor(x)
  const diff = x - floor
  if (diff > 0.5) return floor + 1
  if (diff < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

function floorDivModBig(a: bigint, b: bigint): [bigint, bigint] {
  let q = a / b
  let r = a % b
  if (r !== 0n && (r < 0n) !== (b < 0n)) {
    q -= 1n
    r += b
  }
  return [q, r]
}

/** a / b rounded to the nearest integer, ties to even. */
export function divideAndRound(a: bigint, b: bigint): bigint {
  const [q, r] = floorDivModBig(a, b)
  const twice = r * 2n
  const greaterThanHalf = b > 0n ? twice > b : twice < b
  if (greaterThanHalf || (twice === b && q % 2n !== 0n)) return q + 1n
  return q
}

/** Exact numerator/denominator of a finite double. */
export function toRatio(x: number): [bigint, bigint] {
  let num = x
  let den = 1n
  while (!Number.isInteger(num)) {
    num *= 2
    den *= 2n
  }
  return [BigInt(num), den]
}

function checkFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${name} must be a finite number, got ${value}`)
  }
}

// ============================================================================
// Duration
// ============================================================================

export class Duration {
  readonly sols: number
  readonly seconds: number
  readonly microseconds: number
  private hashCode: number | undefined

  private constructor(sols: number, seconds: number, microseconds: number) {
    if (Math.abs(sols) > MAX_SOLS) {
      throw new OverflowError(`Duration sols must be within ±${MAX_SOLS}, got ${sols}`)
    }
    this.sols = sols
    this.seconds = seconds
    this.microseconds = microseconds
  }

  static readonly ZERO = new Duration(0, 0, 0)
  static readonly MIN = new Duration(-MAX_SOLS, 0, 0)
  static readonly MAX = new Duration(MAX_SOLS, SECONDS_PER_SOL - 1, US_PER_SECOND - 1)
  static readonly RESOLUTION = new Duration(0, 0, 1)

  /**
   * Normalize a mix of units into (sols, seconds, microseconds).
   *
   * Fractions carry downward sol → second → microsecond; the microsecond
   * count is rounded half-to-even once, at the end.
   */
  static of(init: DurationInit = {}): Duration {
    for (const [name, value] of Object.entries(init)) {
      if (value !== undefined) checkFinite(name, value)
    }

    const sols = (init.sols ?? 0) + (init.weeks ?? 0) * 7
    const seconds = (init.seconds ?? 0) + (init.minutes ?? 0) * 60 + (init.hours ?? 0) * 3600
    const microseconds = (init.microseconds ?? 0) + (init.milliseconds ?? 0) * 1000

    const [solFrac, solWhole] = modf(sols)
    const [solSecondsFrac, solSecondsWhole] = modf(solFrac * SECONDS_PER_SOL)
    let d = solWhole
    let s = solSecondsWhole

    const [ownSecondsFrac, secondsWhole] = modf(seconds)
    const secondsFrac = ownSecondsFrac + solSecondsFrac
    let [carry, rest] = divmod(secondsWhole, SECONDS_PER_SOL)
    d += carry
    s += rest

    const usDouble = secondsFrac * 1e6
    let us: number
    if (Number.isInteger(microseconds)) {
      ;[carry, rest] = divmod(microseconds, US_PER_SECOND)
      const [solCarry, secondRest] = divmod(carry, SECONDS_PER_SOL)
      d += solCarry
      s += secondRest
      us = roundHalfEven(rest + usDouble)
    } else {
      ;[carry, us] = divmod(roundHalfEven(microseconds + usDouble), US_PER_SECOND)
      const [solCarry, secondRest] = divmod(carry, SECONDS_PER_SOL)
      d += solCarry
      s += secondRest
    }

    ;[carry, us] = divmod(us, US_PER_SECOND)
    s += carry
    ;[carry, s] = divmod(s, SECONDS_PER_SOL)
    d += carry

    return new Duration(d, s, us)
  }

  static fromMicroseconds(total: bigint): Duration {
    const [sols, rem] = floorDivModBig(total, US_PER_SOL_N)
    if (sols > BigInt(MAX_SOLS) || sols < BigInt(-MAX_SOLS)) {
      throw new OverflowError(`Duration sols must be within ±${MAX_SOLS}, got ${sols}`)
    }
    return new Duration(Number(sols), Number(rem / US_PER_SECOND_N), Number(rem % US_PER_SECOND_N))
  }

  // ==========================================================================
  // Conversions
  // ==========================================================================

  toMicroseconds(): bigint {
    return (BigInt(this.sols) * 86400n + BigInt(this.seconds)) * US_PER_SECOND_N + BigInt(this.microseconds)
  }

  totalSeconds(): number {
    return Number(this.toMicroseconds()) / 1e6
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  plus(other: Duration): Duration {
    return Duration.of({
      sols: this.sols + other.sols,
      seconds: this.seconds + other.seconds,
      microseconds: this.microseconds + other.microseconds,
    })
  }

  minus(other: Duration): Duration {
    return Duration.of({
      sols: this.sols - other.sols,
      seconds: this.seconds - other.seconds,
      microseconds: this.microseconds - other.microseconds,
    })
  }

  negate(): Duration {
    return Duration.of({ sols: -this.sols, seconds: -this.seconds, microseconds: -this.microseconds })
  }

  abs(): Duration {
    return this.sols < 0 ? this.negate() : this
  }

  /** Integer factors are exact; fractional ones round half-to-even at the microsecond. */
  times(factor: number): Duration {
    checkFinite('factor', factor)
    if (Number.isInteger(factor)) {
      return Duration.fromMicroseconds(this.toMicroseconds() * BigInt(factor))
    }
    const [num, den] = toRatio(factor)
    return Duration.fromMicroseconds(divideAndRound(this.toMicroseconds() * num, den))
  }

  dividedBy(divisor: number): Duration {
    checkFinite('divisor', divisor)
    if (divisor === 0) throw new InvalidArgumentError('Duration division by zero')
    const [num, den] = toRatio(divisor)
    return Duration.fromMicroseconds(divideAndRound(this.toMicroseconds() * den, num))
  }

  /** Real-valued quotient of two durations. */
  ratio(other: Duration): number {
    const divisor = other.nonZeroMicroseconds()
    return Number(this.toMicroseconds()) / Number(divisor)
  }

  floorDiv(other: Duration): bigint
  floorDiv(divisor: number): Duration
  floorDiv(other: Duration | number): bigint | Duration {
    if (other instanceof Duration) {
      return floorDivModBig(this.toMicroseconds(), other.nonZeroMicroseconds())[0]
    }
    checkIntegerDivisor(other)
    return Duration.fromMicroseconds(floorDivModBig(this.toMicroseconds(), BigInt(other))[0])
  }

  /** Remainder takes the sign of the divisor. */
  mod(other: Duration): Duration {
    return this.divmod(other)[1]
  }

  divmod(other: Duration): [bigint, Duration] {
    const [q, r] = floorDivModBig(this.toMicroseconds(), other.nonZeroMicroseconds())
    return [q, Duration.fromMicroseconds(r)]
  }

  private nonZeroMicroseconds(): bigint {
    const us = this.toMicroseconds()
    if (us === 0n) throw new InvalidArgumentError('Duration division by zero')
    return us
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  compare(other: Duration): number {
    if (this.sols !== other.sols) return this.sols < other.sols ? -1 : 1
    if (this.seconds !== other.seconds) return this.seconds < other.seconds ? -1 : 1
    if (this.microseconds !== other.microseconds) return this.microseconds < other.microseconds ? -1 : 1
    return 0
  }

  equals(other: Duration): boolean {
    return this.compare(other) === 0
  }

  isZero(): boolean {
    return this.sols === 0 && this.seconds === 0 && this.microseconds === 0
  }

  hash(): number {
    if (this.hashCode === undefined) {
      this.hashCode = hashInts([this.sols, this.seconds, this.microseconds])
    }
    return this.hashCode
  }

  // ==========================================================================
  // Formatting
  // ==========================================================================

  /** `-1 sol, 23:59:59.999999` style. */
  toString(): string {
    const [minutes, ss] = divmod(this.seconds, 60)
    const [hh, mm] = divmod(minutes, 60)
    let s = `${hh}:${pad2(mm)}:${pad2(ss)}`
    if (this.sols !== 0) {
      s = `${this.sols} sol${Math.abs(this.sols) !== 1 ? 's' : ''}, ${s}`
    }
    if (this.microseconds !== 0) {
      s += '.' + String(this.microseconds).padStart(6, '0')
    }
    return s
  }
}

function checkIntegerDivisor(divisor: number): void {
  if (!Number.isInteger(divisor)) {
    throw new InvalidArgumentError(`floorDiv divisor must be an integer, got ${divisor}`)
  }
  if (divisor === 0) throw new InvalidArgumentError('Duration division by zero')
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}
