/**
 * Consolidated error system for darian-datetime.
 *
 * All error classes extend DarianError, which carries a typed error code.
 * Every error is thrown synchronously at the operation that detected it.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const DarianErrorCode = {
  // Field validation
  FIELD_RANGE: 'FIELD_RANGE',
  CALENDAR_RANGE: 'CALENDAR_RANGE',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Arithmetic
  OVERFLOW: 'OVERFLOW',

  // Offset-aware values
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  INCONSISTENT_OFFSET: 'INCONSISTENT_OFFSET',

  // Derived layers
  FORMAT: 'FORMAT',
  INVALID_STATE: 'INVALID_STATE',
} as const

export type DarianErrorCode = (typeof DarianErrorCode)[keyof typeof DarianErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class DarianError extends Error {
  readonly code: DarianErrorCode

  constructor(code: DarianErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DarianError'
    this.code = code
  }
}

// ============================================================================
// Field Validation Errors
// ============================================================================

/** A field lies outside the domain its type can represent (month 25, hour 24, a 24h offset). */
export class FieldRangeError extends DarianError {
  readonly field: string

  constructor(field: string, message: string) {
    super(DarianErrorCode.FIELD_RANGE, message)
    this.name = 'FieldRangeError'
    this.field = field
  }
}

/** A field is representable but not valid for this particular year and month. */
export class CalendarRangeError extends DarianError {
  readonly field: string

  constructor(field: string, message: string) {
    super(DarianErrorCode.CALENDAR_RANGE, message)
    this.name = 'CalendarRangeError'
    this.field = field
  }
}

export class InvalidArgumentError extends DarianError {
  constructor(message: string) {
    super(DarianErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

// ============================================================================
// Arithmetic Errors
// ============================================================================

export class OverflowError extends DarianError {
  constructor(message: string) {
    super(DarianErrorCode.OVERFLOW, message)
    this.name = 'OverflowError'
  }
}

// ============================================================================
// Offset Errors
// ============================================================================

export class TypeMismatchError extends DarianError {
  constructor(message: string) {
    super(DarianErrorCode.TYPE_MISMATCH, message)
    this.name = 'TypeMismatchError'
  }
}

export class InconsistentOffsetError extends DarianError {
  constructor(message: string) {
    super(DarianErrorCode.INCONSISTENT_OFFSET, message)
    this.name = 'InconsistentOffsetError'
  }
}

// ============================================================================
// Formatting & Codec Errors
// ============================================================================

export class FormatError extends DarianError {
  constructor(message: string) {
    super(DarianErrorCode.FORMAT, message)
    this.name = 'FormatError'
  }
}

export class InvalidStateError extends DarianError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(DarianErrorCode.INVALID_STATE, message, options)
    this.name = 'InvalidStateError'
  }
}
