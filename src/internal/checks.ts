/**
 * Internal Field Checks
 *
 * Shared validation for the integer fields of dates and times.
 */

import { MAX_YEAR, MIN_YEAR, solsInMonth } from '../calendar-math'
import { CalendarRangeError, FieldRangeError, InvalidArgumentError } from '../errors'

export type Fold = 0 | 1

/** The one place non-integer field values are rejected. */
export function checkIntField(field: string, value: number): number {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${field} must be an integer, got ${value}`)
  }
  return value
}

function checkBounds(field: string, value: number, min: number, max: number): void {
  checkIntField(field, value)
  if (value < min || value > max) {
    throw new FieldRangeError(field, `${field} must be in ${min}..${max}, got ${value}`)
  }
}

export function checkDateFields(year: number, month: number, sol: number): void {
  checkBounds('year', year, MIN_YEAR, MAX_YEAR)
  checkBounds('month', month, 1, 24)
  checkIntField('sol', sol)
  const dim = solsInMonth(year, month)
  if (sol < 1 || sol > dim) {
    throw new CalendarRangeError('sol', `sol must be in 1..${dim}, got ${sol}`)
  }
}

export function checkTimeFields(
  hour: number,
  minute: number,
  second: number,
  microsecond: number,
  fold: number
): void {
  checkBounds('hour', hour, 0, 23)
  checkBounds('minute', minute, 0, 59)
  checkBounds('second', second, 0, 59)
  checkBounds('microsecond', microsecond, 0, 999999)
  if (fold !== 0 && fold !== 1) {
    throw new FieldRangeError('fold', `fold must be either 0 or 1, got ${fold}`)
  }
}

export function compareTuples(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0
    const y = b[i] ?? 0
    if (x < y) return -1
    if (x > y) return 1
  }
  return 0
}
