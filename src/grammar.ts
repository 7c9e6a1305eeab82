/**
 * Grammar Matcher
 *
 * Scans a shift pattern into unit clauses. A clause is
 *
 *   <ws?> <unit letter> <anchor markers?> <sign?> <digits> <ws?>
 *
 * and the trimmed pattern must be covered by clauses back-to-back, with
 * nothing else before, between or after them.
 */

import { type Result, Ok, Err } from './result'
import { PatternSyntaxError } from './errors'
import { type Unit, isUnit } from './shift-spec'

// ============================================================================
// Types
// ============================================================================

export type Anchor = '^' | '$'

export type Sign = '+' | '-'

export type Token = {
  /** Clause text as written, without surrounding whitespace */
  source: string
  unit: Unit
  /** Every anchor marker in the clause, in order; more than one is rejected by the builder */
  anchors: Anchor[]
  sign: Sign | null
  /** Unsigned magnitude of the digit run */
  magnitude: number
}

// ============================================================================
// Character Classes
// ============================================================================

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch)
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9'
}

function isAnchor(ch: string): ch is Anchor {
  return ch === '^' || ch === '$'
}

function isSign(ch: string): ch is Sign {
  return ch === '+' || ch === '-'
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Split a non-blank, trimmed pattern into tokens.
 * Fails with PatternSyntaxError unless every character belongs to a clause.
 */
export function tokenize(pattern: string): Result<Token[], PatternSyntaxError> {
  const tokens: Token[] = []
  const fail = () => Err(new PatternSyntaxError(pattern))
  let pos = 0

  const skipWhitespace = () => {
    while (pos < pattern.length && isWhitespace(pattern.charAt(pos))) pos++
  }

  skipWhitespace()
  if (pos >= pattern.length) return fail()

  while (pos < pattern.length) {
    const start = pos

    const letter = pattern.charAt(pos)
    if (!isUnit(letter)) return fail()
    pos++

    const anchors: Anchor[] = []
    for (let ch = pattern.charAt(pos); isAnchor(ch); ch = pattern.charAt(pos)) {
      anchors.push(ch)
      pos++
    }

    let sign: Sign | null = null
    const signCh = pattern.charAt(pos)
    if (isSign(signCh)) {
      sign = signCh
      pos++
    }

    const digitsStart = pos
    while (pos < pattern.length && isDigit(pattern.charAt(pos))) pos++
    if (pos === digitsStart) return fail()

    tokens.push({
      source: pattern.substring(start, pos),
      unit: letter,
      anchors,
      sign,
      magnitude: parseInt(pattern.substring(digitsStart, pos), 10),
    })

    skipWhitespace()
  }

  return Ok(tokens)
}
