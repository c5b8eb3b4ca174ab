/**
 * State Codec
 *
 * Versioned binary encoding of the raw fields of each value type.
 *
 * Layout: [version, kind, ...fields], big-endian.
 *   date      year:2 month:1 sol:1
 *   time      hour|fold<<7:1 minute:1 second:1 microsecond:3
 *   datetime  year:2 month|fold<<7:1 sol:1 hour:1 minute:1 second:1 microsecond:3
 *   duration  sols:int32 seconds:uint32 microseconds:3
 *
 * Offset providers are not encoded; the caller supplies one on decode.
 */

import { MarsDate } from './date'
import { MarsDateTime } from './datetime'
import { Duration } from './duration'
import { DarianError, InvalidStateError } from './errors'
import type { Fold } from './internal/checks'
import type { OffsetProvider } from './offset'
import { MarsTime } from './time'

export const STATE_VERSION = 1

export const StateKind = {
  DATE: 1,
  TIME: 2,
  DATETIME: 3,
  DURATION: 4,
} as const

export type StateKind = (typeof StateKind)[keyof typeof StateKind]

const PAYLOAD_LENGTH: Record<StateKind, number> = {
  [StateKind.DATE]: 4,
  [StateKind.TIME]: 6,
  [StateKind.DATETIME]: 10,
  [StateKind.DURATION]: 11,
}

// ============================================================================
// Helpers
// ============================================================================

function header(kind: StateKind): Uint8Array {
  const bytes = new Uint8Array(2 + PAYLOAD_LENGTH[kind])
  bytes[0] = STATE_VERSION
  bytes[1] = kind
  return bytes
}

function writeMicroseconds(view: DataView, offset: number, us: number): void {
  view.setUint8(offset, us >>> 16)
  view.setUint16(offset + 1, us & 0xffff)
}

function readMicroseconds(view: DataView, offset: number): number {
  return (view.getUint8(offset) << 16) | view.getUint16(offset + 1)
}

function openState(bytes: Uint8Array, kind: StateKind): DataView {
  if (bytes.length !== 2 + PAYLOAD_LENGTH[kind]) {
    throw new InvalidStateError(`Expected ${2 + PAYLOAD_LENGTH[kind]} bytes, got ${bytes.length}`)
  }
  if (bytes[0] !== STATE_VERSION) {
    throw new InvalidStateError(`Unsupported state version ${bytes[0]}`)
  }
  if (bytes[1] !== kind) {
    throw new InvalidStateError(`Expected state kind ${kind}, got ${bytes[1]}`)
  }
  return new DataView(bytes.buffer, bytes.byteOffset + 2, PAYLOAD_LENGTH[kind])
}

/** Field violations surface as InvalidStateError with the original as cause. */
function rebuild<T>(build: () => T): T {
  try {
    return build()
  } catch (e) {
    if (e instanceof DarianError) {
      throw new InvalidStateError(`Decoded fields are invalid: ${e.message}`, { cause: e })
    }
    throw e
  }
}

function splitFold(byte: number): [number, Fold] {
  return byte > 127 ? [byte - 128, 1] : [byte, 0]
}

// ============================================================================
// Encode
// ============================================================================

export function encodeDate(date: MarsDate): Uint8Array {
  const bytes = header(StateKind.DATE)
  const view = new DataView(bytes.buffer, 2)
  view.setUint16(0, date.year)
  view.setUint8(2, date.month)
  view.setUint8(3, date.sol)
  return bytes
}

export function encodeTime(time: MarsTime): Uint8Array {
  const bytes = header(StateKind.TIME)
  const view = new DataView(bytes.buffer, 2)
  view.setUint8(0, time.hour + (time.fold === 1 ? 128 : 0))
  view.setUint8(1, time.minute)
  view.setUint8(2, time.second)
  writeMicroseconds(view, 3, time.microsecond)
  return bytes
}

export function encodeDateTime(dt: MarsDateTime): Uint8Array {
  const bytes = header(StateKind.DATETIME)
  const view = new DataView(bytes.buffer, 2)
  view.setUint16(0, dt.year)
  view.setUint8(2, dt.month + (dt.fold === 1 ? 128 : 0))
  view.setUint8(3, dt.sol)
  view.setUint8(4, dt.hour)
  view.setUint8(5, dt.minute)
  view.setUint8(6, dt.second)
  writeMicroseconds(view, 7, dt.microsecond)
  return bytes
}

export function encodeDuration(duration: Duration): Uint8Array {
  const bytes = header(StateKind.DURATION)
  const view = new DataView(bytes.buffer, 2)
  view.setInt32(0, duration.sols)
  view.setUint32(4, duration.seconds)
  writeMicroseconds(view, 8, duration.microseconds)
  return bytes
}

// ============================================================================
// Decode
// ============================================================================

export function decodeDate(bytes: Uint8Array): MarsDate {
  const view = openState(bytes, StateKind.DATE)
  return rebuild(() => new MarsDate(view.getUint16(0), view.getUint8(2), view.getUint8(3)))
}

export function decodeTime(bytes: Uint8Array, tz: OffsetProvider | null = null): MarsTime {
  const view = openState(bytes, StateKind.TIME)
  const [hour, fold] = splitFold(view.getUint8(0))
  return rebuild(
    () => new MarsTime(hour, view.getUint8(1), view.getUint8(2), readMicroseconds(view, 3), tz, fold)
  )
}

export function decodeDateTime(bytes: Uint8Array, tz: OffsetProvider | null = null): MarsDateTime {
  const view = openState(bytes, StateKind.DATETIME)
  const [month, fold] = splitFold(view.getUint8(2))
  return rebuild(
    () =>
      new MarsDateTime(
        view.getUint16(0),
        month,
        view.getUint8(3),
        view.getUint8(4),
        view.getUint8(5),
        view.getUint8(6),
        readMicroseconds(view, 7),
        tz,
        fold
      )
  )
}

export function decodeDuration(bytes: Uint8Array): Duration {
  const view = openState(bytes, StateKind.DURATION)
  const sols = view.getInt32(0)
  const seconds = view.getUint32(4)
  const microseconds = readMicroseconds(view, 8)
  if (seconds >= 86400) {
    throw new InvalidStateError(`seconds must be in 0..86399, got ${seconds}`)
  }
  if (microseconds >= 1_000_000) {
    throw new InvalidStateError(`microseconds must be in 0..999999, got ${microseconds}`)
  }
  return rebuild(() => Duration.of({ sols, seconds, microseconds }))
}
