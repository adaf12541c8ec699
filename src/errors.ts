/**
 * Consolidated error system for the calendar engine.
 *
 * All error classes extend CalendarError, which carries a typed error code.
 * Callers branch on `code` to tell an unsupported query (NOT_DEFINED) from
 * invalid input (INVALID_DATE).
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Calendar capability
  NOT_DEFINED: 'NOT_DEFINED',

  // Input validation
  INVALID_DATE: 'INVALID_DATE',
  INVALID_RANGE: 'INVALID_RANGE',

  // String utilities
  PARSE_ERROR: 'PARSE_ERROR',

  // Registry
  UNKNOWN_CALENDAR: 'UNKNOWN_CALENDAR',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Calendar Errors
// ============================================================================

/** The calendar has no such concept (weeks, quarters). */
export class NotDefinedError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.NOT_DEFINED, message)
    this.name = 'NotDefinedError'
  }
}

export class InvalidDateError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}

export class InvalidRangeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

// ============================================================================
// Parsing Errors
// ============================================================================

export class ParseError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Registry Errors
// ============================================================================

export class UnknownCalendarError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.UNKNOWN_CALENDAR, message)
    this.name = 'UnknownCalendarError'
  }
}
