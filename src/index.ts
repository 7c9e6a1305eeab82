/**
 * calshift
 *
 * Public API exports
 */

// Error system
export {
  ShiftError, ShiftErrorCode, PatternError,
  PatternSyntaxError, SequenceError, OptionError, ValueError,
  ParseError, ValidationError,
} from './errors'
export type { ShiftErrorCode as ShiftErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { OffsetDateTime, WallFields } from './time-date'
export {
  isLeapYear, daysInMonth, daysInYear, isValidTimezone,
  normalizeWall, wallOf, withWall, addDate, addDays,
  weekdayOf, dayOfYear,
  parseOffsetDateTime, formatOffsetDateTime,
  toEpochMs, toDate, fromDate,
} from './time-date'

// Pattern grammar & spec
export type { Token, Anchor, Sign } from './grammar'
export { tokenize } from './grammar'
export type { Unit, UnitField, PartDef, ShiftSpec } from './shift-spec'
export { UNIT_ORDER, UNIT_FIELDS, EMPTY_SHIFT_SPEC } from './shift-spec'
export { buildShiftSpec } from './spec-builder'

// Evaluation
export { applyShift, adjustField } from './evaluator'

// Parsing & caching
export type { ParseOptions } from './parse'
export { parseShift, tryParseShift, shift } from './parse'
export type { ShiftCache } from './shift-cache'
export { createShiftCache } from './shift-cache'

// Logging
export type { Logger } from './logger'
export { makeLogger, makeNoopLogger } from './logger'

// High-level API
export type { Timeshift, TimeshiftConfig } from './timeshift'
export { createTimeshift } from './timeshift'
