/**
 * Sol Clock
 *
 * Maps POSIX time (terrestrial seconds since 1970-01-01 UTC) onto the Darian
 * ordinal timeline in the MTC frame, and back.
 *
 * NOTE: TAI_MINUS_UTC is updated by hand when a leap second is announced.
 * Results drift by the missing leap seconds the further they are from now.
 */

import { ordinalToYmd, ymdToOrdinal } from '../calendar-math'

/** One sol in terrestrial seconds. */
export const SOL_SECONDS = 88775.244147

export const MARS_TO_EARTH = SOL_SECONDS / 86400
export const EARTH_TO_MARS = 86400 / SOL_SECONDS

/** TAI − UTC in seconds, current since 2017-01-01. */
export const TAI_MINUS_UTC = 37

/** Fractional ordinal at POSIX time −TAI_MINUS_UTC. */
export const EPOCH_ORDINAL = 128257.2954262

const US_PER_SOL = 86_400_000_000

export type MtcFields = {
  year: number
  month: number
  sol: number
  hour: number
  minute: number
  second: number
  microsecond: number
}

export function fractionalOrdinalFromTimestamp(t: number): number {
  return (t + TAI_MINUS_UTC) / SOL_SECONDS + EPOCH_ORDINAL
}

export function timestampFromFractionalOrdinal(ordinal: number): number {
  return (ordinal - EPOCH_ORDINAL) * SOL_SECONDS - TAI_MINUS_UTC
}

/**
 * MTC calendar fields at POSIX time `t`, to the nearest microsecond.
 * Rounding up to the next sol carries into the ordinal.
 */
export function mtcFieldsFromTimestamp(t: number): MtcFields {
  const fractional = fractionalOrdinalFromTimestamp(t)
  let ordinal = Math.floor(fractional)
  let us = Math.round((fractional - ordinal) * US_PER_SOL)
  if (us >= US_PER_SOL) {
    ordinal += 1
    us -= US_PER_SOL
  }

  const { year, month, sol } = ordinalToYmd(ordinal)
  const microsecond = us % 1_000_000
  const totalSeconds = (us - microsecond) / 1_000_000
  const second = totalSeconds % 60
  const minute = Math.floor(totalSeconds / 60) % 60
  const hour = Math.floor(totalSeconds / 3600)
  return { year, month, sol, hour, minute, second, microsecond }
}

export function timestampFromMtcFields(fields: MtcFields): number {
  const ordinal = ymdToOrdinal(fields.year, fields.month, fields.sol)
  const seconds = fields.second + fields.microsecond / 1e6
  return timestampFromFractionalOrdinal(ordinal + fields.hour / 24 + fields.minute / 1440 + seconds / 86400)
}
