/**
 * Calendar Math
 *
 * Pure functions for the Darian calendar: 24 months of 28 sols, except months
 * 6, 12 and 18 (27 sols) and month 24, which has 27 sols in a common year and
 * 28 in a leap year. Ordinal 1 is Sagittarius 1 of year 0.
 */

import { CalendarRangeError, FieldRangeError, OverflowError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const MIN_YEAR = 0
export const MAX_YEAR = 9999

/** Ordinal of 9999-24-28. */
export const MAX_ORDINAL = 6685945

const MEAN_YEAR = 668.59

// ============================================================================
// Helpers
// ============================================================================

function div(a: number, b: number): number {
  return Math.floor(a / b)
}

// ============================================================================
// Leap Years
// ============================================================================

/**
 * Leap rule, banded by year. Within a band: the band's non-leap modulus wins,
 * then multiples of 10 are leap, then odd years are leap.
 * Years up to 2000 also make multiples of 1000 leap before the 100 check.
 */
export function isLeap(year: number): boolean {
  if (year <= 2000) {
    if (year % 1000 === 0) return true
    if (year % 100 === 0) return false
  } else {
    const exception = year <= 4800 ? 150 : year <= 6800 ? 200 : year <= 8400 ? 300 : 600
    if (year % exception === 0) return false
  }
  if (year % 10 === 0) return true
  return year % 2 === 1
}

export function solsInYear(year: number): number {
  return isLeap(year) ? 669 : 668
}

/** Number of sols before sol 1 of month 1 of `year`. */
export function solsBeforeYear(year: number): number {
  const x = year - 1
  const base = year * 669 - div(x, 2) + div(x, 10)
  if (year <= 2000) return base - div(x, 100) + div(x, 1000)
  if (year <= 4800) return base - div(x, 150) - 5
  if (year <= 6800) return base - div(x, 200) - 13
  if (year <= 8400) return base - div(x, 300) - 25
  return base - div(x, 600) - 39
}

// ============================================================================
// Months
// ============================================================================

function checkMonth(month: number): void {
  if (month < 1 || month > 24) {
    throw new FieldRangeError('month', `month must be in 1..24, got ${month}`)
  }
}

/**
 * Sols in the year before sol 1 of `month`. The leap sol is the last sol of
 * month 24, so no year is needed.
 */
export function solsBeforeMonth(month: number): number {
  checkMonth(month)
  return (month - 1) * 28 - div(month - 1, 6)
}

export function solsInMonth(year: number, month: number): number {
  checkMonth(month)
  if (month === 6 || month === 12 || month === 18) return 27
  if (month === 24 && !isLeap(year)) return 27
  return 28
}

// ============================================================================
// Ordinals
// ============================================================================

export function ymdToOrdinal(year: number, month: number, sol: number): number {
  const dim = solsInMonth(year, month)
  if (sol < 1 || sol > dim) {
    throw new CalendarRangeError('sol', `sol must be in 1..${dim}, got ${sol}`)
  }
  return solsBeforeYear(year) + solsBeforeMonth(month) + sol
}

export type YearMonthSol = { year: number; month: number; sol: number }

export function ordinalToYmd(ordinal: number): YearMonthSol {
  if (!Number.isInteger(ordinal) || ordinal < 1 || ordinal > MAX_ORDINAL) {
    throw new OverflowError(`ordinal must be in 1..${MAX_ORDINAL}, got ${ordinal}`)
  }

  // Both estimates are within one unit of the answer
  let year = div(ordinal, MEAN_YEAR)
  if (ordinal <= solsBeforeYear(year)) {
    year -= 1
  } else if (ordinal > solsBeforeYear(year + 1)) {
    year += 1
  }
  let n = ordinal - solsBeforeYear(year)

  let month = Math.min(div(n, 28) + 1, 24)
  if (n <= solsBeforeMonth(month)) {
    month -= 1
  } else if (month < 24 && n > solsBeforeMonth(month + 1)) {
    month += 1
  }
  n -= solsBeforeMonth(month)

  return { year, month, sol: n }
}
