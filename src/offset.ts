/**
 * Offset Providers
 *
 * An OffsetProvider plays the role of a Martian time zone: for a given local
 * date-time it reports the offset from MTC (Coordinated Mars Time), the
 * daylight-style portion of that offset, and a display name. One provider is
 * usually shared by many date-time values.
 */

import type { MarsDateTime } from './datetime'
import { Duration } from './duration'
import { FieldRangeError, InconsistentOffsetError, InvalidArgumentError } from './errors'
import { formatOffset } from './format'

// ============================================================================
// Types
// ============================================================================

/** The value a provider is asked about; `null` when a bare MarsTime asks. */
export type OffsetContext = MarsDateTime | null

export interface OffsetProvider {
  /** Offset from MTC, positive east. Includes the dst() portion. */
  mtcOffset(dt: OffsetContext): Duration | null

  /** Daylight-style portion of the offset; zero when not in effect. */
  dst(dt: OffsetContext): Duration | null

  tzName(dt: OffsetContext): string | null

  /**
   * Project a value whose fields are MTC (and whose tz is this provider)
   * onto local time. Providers without it get {@link fromMtc}.
   */
  fromMtc?(dt: MarsDateTime): MarsDateTime
}

// ============================================================================
// Offset Checks
// ============================================================================

const ONE_SOL = Duration.of({ sols: 1 })
const MINUS_ONE_SOL = Duration.of({ sols: -1 })

/** Offsets must lie strictly between -24h and +24h. */
export function checkOffset(method: 'mtcOffset' | 'dst', offset: Duration | null): Duration | null {
  if (offset === null) return null
  if (offset.compare(MINUS_ONE_SOL) <= 0 || offset.compare(ONE_SOL) >= 0) {
    throw new FieldRangeError(
      'offset',
      `${method}()=${offset.toString()}, must be strictly between -24h and 24h`
    )
  }
  return offset
}

export function sameOffset(a: Duration | null, b: Duration | null): boolean {
  if (a === null || b === null) return a === b
  return a.equals(b)
}

// ============================================================================
// MTC → Local
// ============================================================================

/**
 * Default MTC → local projection.
 *
 * Shift by the standard part of the offset (offset − dst), re-read dst at the
 * shifted instant once, then add it. A provider whose dst() flips between
 * the two readings still lands on the local time that maps back to `dt`.
 */
export function fromMtc(provider: OffsetProvider, dt: MarsDateTime): MarsDateTime {
  if (dt.tz !== provider) {
    throw new InvalidArgumentError('fromMtc: dt.tz is not this provider')
  }

  const dtOffset = dt.mtcOffset()
  if (dtOffset === null) {
    throw new InconsistentOffsetError('fromMtc requires a non-null mtcOffset() result')
  }
  let dtDst = dt.dst()
  if (dtDst === null) {
    throw new InconsistentOffsetError('fromMtc requires a non-null dst() result')
  }

  const delta = dtOffset.minus(dtDst)
  let local = dt
  if (!delta.isZero()) {
    local = dt.plus(delta)
    dtDst = local.dst()
    if (dtDst === null) {
      throw new InconsistentOffsetError('fromMtc: dst() gave inconsistent results; cannot convert')
    }
  }
  return local.plus(dtDst)
}

/** Dispatches to the provider's own fromMtc when it has one. */
export function localFromMtc(provider: OffsetProvider, dt: MarsDateTime): MarsDateTime {
  return provider.fromMtc !== undefined ? provider.fromMtc(dt) : fromMtc(provider, dt)
}

// ============================================================================
// Fixed Offset
// ============================================================================

const MAX_FIXED = Duration.of({ hours: 24, microseconds: -1 })
const MIN_FIXED = MAX_FIXED.negate()

export class FixedOffset implements OffsetProvider {
  readonly offset: Duration
  readonly name: string | null

  private constructor(offset: Duration, name: string | null) {
    this.offset = offset
    this.name = name
  }

  /** The reference frame, Coordinated Mars Time. */
  static readonly MTC = new FixedOffset(Duration.ZERO, null)
  static readonly MIN = new FixedOffset(Duration.of({ hours: -23, minutes: -59 }), null)
  static readonly MAX = new FixedOffset(Duration.of({ hours: 23, minutes: 59 }), null)

  /** A zero offset without a name is {@link FixedOffset.MTC} itself. */
  static of(offset: Duration, name?: string): FixedOffset {
    if (name === undefined && offset.isZero()) return FixedOffset.MTC
    if (offset.compare(MIN_FIXED) < 0 || offset.compare(MAX_FIXED) > 0) {
      throw new FieldRangeError('offset', 'offset must be strictly between -24h and 24h')
    }
    return new FixedOffset(offset, name ?? null)
  }

  mtcOffset(): Duration {
    return this.offset
  }

  dst(): null {
    return null
  }

  tzName(): string {
    return this.name ?? nameFromOffset(this.offset)
  }

  fromMtc(dt: MarsDateTime): MarsDateTime {
    if (dt.tz !== this) {
      throw new InvalidArgumentError('fromMtc: dt.tz is not this provider')
    }
    return dt.plus(this.offset)
  }

  equals(other: FixedOffset): boolean {
    return this.offset.equals(other.offset)
  }

  hash(): number {
    return this.offset.hash()
  }

  toString(): string {
    return this.tzName()
  }
}

/** `MTC`, `MTC+05:30`, `MTC-03:00:15.500000` */
export function nameFromOffset(offset: Duration): string {
  if (offset.isZero()) return 'MTC'
  return 'MTC' + formatOffset(offset, ':')
}
