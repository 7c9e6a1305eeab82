/**
 * Pattern Parsing
 *
 * Entry points that turn pattern text into a ShiftSpec, optionally through a
 * caller-owned ShiftCache.
 */

import { type Result, Ok, Err } from './result'
import type { PatternError } from './errors'
import type { OffsetDateTime } from './time-date'
import type { ShiftCache } from './shift-cache'
import { type ShiftSpec, EMPTY_SHIFT_SPEC } from './shift-spec'
import { tokenize } from './grammar'
import { buildShiftSpec } from './spec-builder'
import { applyShift } from './evaluator'

export type ParseOptions = {
  /** Look up and store built specs here; omitted means always rebuild */
  cache?: ShiftCache
}

/**
 * Parse a pattern. Blank patterns give the identity spec and never touch the
 * cache; failures are never cached.
 */
export function tryParseShift(pattern: string, options: ParseOptions = {}): Result<ShiftSpec, PatternError> {
  const trimmed = pattern.trim()
  if (trimmed === '') return Ok(EMPTY_SHIFT_SPEC)

  const { cache } = options
  const cached = cache?.get(trimmed)
  if (cached !== undefined) return Ok(cached)

  const tokens = tokenize(trimmed)
  if (!tokens.ok) return Err(tokens.error)

  const built = buildShiftSpec(trimmed, tokens.value)
  if (built.ok) cache?.set(trimmed, built.value)
  return built
}

/** Like tryParseShift, but throws the PatternError. */
export function parseShift(pattern: string, options: ParseOptions = {}): ShiftSpec {
  const result = tryParseShift(pattern, options)
  if (!result.ok) throw result.error
  return result.value
}

/** Parse and apply in one call. */
export function shift(pattern: string, t: OffsetDateTime, options: ParseOptions = {}): OffsetDateTime {
  return applyShift(parseShift(pattern, options), t)
}
