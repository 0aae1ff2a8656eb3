/**
 * Consolidated error system for the recurrence engine.
 *
 * All error classes extend RecurrenceError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they use.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const RecurrenceErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Engine / service
  VALIDATION: 'VALIDATION',
  NOT_RECURRING: 'NOT_RECURRING',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Recurrence rules
  INVALID_PATTERN: 'INVALID_PATTERN',
  WEEKDAY_DECODE: 'WEEKDAY_DECODE',
} as const

export type RecurrenceErrorCode = (typeof RecurrenceErrorCode)[keyof typeof RecurrenceErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class RecurrenceError extends Error {
  readonly code: RecurrenceErrorCode

  constructor(code: RecurrenceErrorCode, message: string) {
    super(message)
    this.name = 'RecurrenceError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForeignKeyError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Engine Errors
// ============================================================================

export class ValidationError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class NotRecurringError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.NOT_RECURRING, message)
    this.name = 'NotRecurringError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Recurrence Rule Errors
// ============================================================================

export class InvalidPatternError extends RecurrenceError {
  constructor(message: string) {
    super(RecurrenceErrorCode.INVALID_PATTERN, message)
    this.name = 'InvalidPatternError'
  }
}

/** Stored weekday payload could not be decoded. Keeps the raw payload for diagnosis. */
export class WeekdayDecodeError extends RecurrenceError {
  readonly raw: string

  constructor(message: string, raw: string) {
    super(RecurrenceErrorCode.WEEKDAY_DECODE, message)
    this.name = 'WeekdayDecodeError'
    this.raw = raw
  }
}
