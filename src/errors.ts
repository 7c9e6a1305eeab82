/**
 * Consolidated error system for calshift.
 *
 * All error classes extend ShiftError, which carries a typed error code.
 * Modules re-export the classes they throw so existing import paths continue to work.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ShiftErrorCode = {
  // Pattern parsing
  SYNTAX: 'SYNTAX',
  SEQUENCE: 'SEQUENCE',
  OPTION: 'OPTION',
  VALUE: 'VALUE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Configuration
  VALIDATION: 'VALIDATION',
} as const

export type ShiftErrorCode = (typeof ShiftErrorCode)[keyof typeof ShiftErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ShiftError extends Error {
  readonly code: ShiftErrorCode

  constructor(code: ShiftErrorCode, message: string) {
    super(message)
    this.name = 'ShiftError'
    this.code = code
  }
}

// ============================================================================
// Pattern Errors
// ============================================================================

/** Base for every error raised while turning a pattern into a ShiftSpec. */
export class PatternError extends ShiftError {
  /** Trimmed pattern text */
  readonly pattern: string
  /** Offending clause as written, when the failure is tied to one */
  readonly clause: string | null

  constructor(code: ShiftErrorCode, message: string, pattern: string, clause: string | null) {
    super(code, message)
    this.name = 'PatternError'
    this.pattern = pattern
    this.clause = clause
  }
}

export class PatternSyntaxError extends PatternError {
  constructor(pattern: string) {
    super(ShiftErrorCode.SYNTAX, `Illegal pattern '${pattern}'`, pattern, null)
    this.name = 'PatternSyntaxError'
  }
}

export class SequenceError extends PatternError {
  /** Unit letters in the only order they may appear */
  readonly expected: string

  constructor(pattern: string, clause: string, expected: string) {
    super(
      ShiftErrorCode.SEQUENCE,
      `Wrong sequence of units in '${pattern}' at '${clause}', expected order '${expected}'`,
      pattern,
      clause
    )
    this.name = 'SequenceError'
    this.expected = expected
  }
}

export class OptionError extends PatternError {
  constructor(message: string, pattern: string, clause: string) {
    super(ShiftErrorCode.OPTION, message, pattern, clause)
    this.name = 'OptionError'
  }
}

export class ValueError extends PatternError {
  constructor(message: string, pattern: string, clause: string) {
    super(ShiftErrorCode.VALUE, message, pattern, clause)
    this.name = 'ValueError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends ShiftError {
  constructor(message: string) {
    super(ShiftErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ValidationError extends ShiftError {
  constructor(message: string) {
    super(ShiftErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}
