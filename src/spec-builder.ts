/**
 * Spec Builder
 *
 * Validates a token list in one left-to-right pass and assembles a ShiftSpec.
 * The first failing clause aborts the build; no partial spec escapes.
 *
 * Per clause, checks run in this order:
 *   1. sequence: units follow UNIT_ORDER, each at most once
 *   2. anchor applicability: `^` on W only, `$` on D and W only
 *   3. anchor combinations: no anchor with a sign, at most one anchor
 *   4. per-unit value domain
 */

import { type Result, Ok, Err } from './result'
import { type PatternError, SequenceError, OptionError, ValueError } from './errors'
import { type Token } from './grammar'
import { type PartDef, type ShiftSpec, type Unit, type UnitField, UNIT_ORDER, UNIT_FIELDS, makeShiftSpec } from './shift-spec'

const MAX_MAGNITUDE = 2_147_483_647

const ANCHORABLE: Record<'^' | '$', readonly Unit[]> = {
  '^': ['W'],
  '$': ['D', 'W'],
}

// ============================================================================
// Clause Checks
// ============================================================================

function toPart(pattern: string, token: Token): Result<PartDef, PatternError> {
  const { source, unit, anchors, sign, magnitude } = token

  for (const anchor of anchors) {
    if (!ANCHORABLE[anchor].includes(unit)) {
      return Err(new OptionError(`Illegal option '${anchor}' in '${source}'`, pattern, source))
    }
  }

  if (anchors.length > 0 && sign !== null) {
    return Err(new OptionError(
      `'^' and '$' can not be used with relative ('+' or '-') values in '${source}'`,
      pattern,
      source
    ))
  }

  if (anchors.length > 1) {
    const message = new Set(anchors).size > 1
      ? `'^' and '$' can not be used simultaneously in '${source}'`
      : `Repeated option '${anchors[0] ?? ''}' in '${source}'`
    return Err(new OptionError(message, pattern, source))
  }

  if (magnitude > MAX_MAGNITUDE) {
    return Err(new ValueError(`Value out of range (max ${MAX_MAGNITUDE}) in '${source}'`, pattern, source))
  }

  const part: PartDef = {
    active: true,
    // 0 - magnitude keeps W-0 as +0
    value: sign === '-' ? 0 - magnitude : magnitude,
    absolute: sign === null,
    fromBegin: anchors[0] === '^',
    fromEnd: anchors[0] === '$',
  }

  const invalid = checkValue(unit, part)
  if (invalid !== null) return Err(new ValueError(`Illegal ${invalid} in '${source}'`, pattern, source))

  return Ok(part)
}

/** Name of the violated domain, or null when the value is acceptable */
function checkValue(unit: Unit, part: PartDef): string | null {
  switch (unit) {
    case 'M':
      return part.absolute && part.value === 0 ? 'month' : null
    case 'D':
      return part.absolute && part.value === 0 ? 'day' : null
    case 'W':
      if (part.fromBegin || part.fromEnd) return part.value === 0 ? 'anchored week' : null
      return part.absolute && part.value === 0 ? 'absolute week' : null
    case 'w':
      // 0 = Sunday
      return part.value < 0 || part.value > 6 ? 'weekday' : null
    default:
      return null
  }
}

// ============================================================================
// Builder
// ============================================================================

/** Assemble a ShiftSpec from the tokens of a (trimmed, non-blank) pattern. */
export function buildShiftSpec(pattern: string, tokens: readonly Token[]): Result<ShiftSpec, PatternError> {
  const parts: Partial<Record<UnitField, PartDef>> = {}
  let cursor = 0

  for (const token of tokens) {
    // Advancing past the unit's slot makes a repeat or an earlier unit unreachable
    const slot = UNIT_ORDER.indexOf(token.unit, cursor)
    if (slot === -1) return Err(new SequenceError(pattern, token.source, UNIT_ORDER))
    cursor = slot + 1

    const part = toPart(pattern, token)
    if (!part.ok) return part

    parts[UNIT_FIELDS[token.unit]] = part.value
  }

  return Ok(makeShiftSpec(parts))
}
