/**
 * Shift pattern generators for fuzz testing.
 *
 * Every generated pattern is valid: units in order, anchors only where
 * allowed, and values inside each unit's domain.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'

type Sign = '' | '+' | '-'

function clause(unit: string, prefix: string, n: number): string {
  return `${unit}${prefix}${n}`
}

/** Absolute value from [min, max] or a signed delta from [0, maxDelta] */
function plainClauseGen(unit: string, min: number, max: number, maxDelta: number): Arbitrary<string> {
  return fc.oneof(
    fc.integer({ min, max }).map((n) => clause(unit, '', n)),
    fc
      .tuple(fc.constantFrom<Sign>('+', '-'), fc.integer({ min: 0, max: maxDelta }))
      .map(([sign, n]) => clause(unit, sign, n))
  )
}

function dayClauseGen(): Arbitrary<string> {
  return fc.oneof(
    plainClauseGen('D', 1, 40, 400),
    fc.integer({ min: 1, max: 31 }).map((n) => clause('D', '$', n))
  )
}

function weekClauseGen(): Arbitrary<string> {
  return fc.oneof(
    plainClauseGen('W', 1, 60, 60),
    fc.integer({ min: 1, max: 6 }).map((n) => clause('W', '^', n)),
    fc.integer({ min: 1, max: 6 }).map((n) => clause('W', '$', n))
  )
}

/**
 * Generate a valid shift pattern with at least one clause.
 *
 * @param options.separator - Text placed between clauses (default: random '' or ' ')
 */
export function shiftPatternGen(options?: { separator?: Arbitrary<string> }): Arbitrary<string> {
  const separator = options?.separator ?? fc.constantFrom('', ' ', '  ')

  const clauses = fc.tuple(
    fc.option(plainClauseGen('Y', 1900, 2100, 200), { nil: undefined }),
    fc.option(plainClauseGen('M', 1, 24, 48), { nil: undefined }),
    fc.option(dayClauseGen(), { nil: undefined }),
    fc.option(weekClauseGen(), { nil: undefined }),
    fc.option(fc.integer({ min: 0, max: 6 }).map((n) => clause('w', '', n)), { nil: undefined }),
    fc.option(plainClauseGen('h', 0, 48, 200), { nil: undefined }),
    fc.option(plainClauseGen('m', 0, 120, 2000), { nil: undefined }),
    fc.option(plainClauseGen('s', 0, 120, 5000), { nil: undefined }),
    fc.option(plainClauseGen('l', 0, 1500, 5000), { nil: undefined }),
    fc.option(plainClauseGen('u', 0, 1500, 5000), { nil: undefined }),
    fc.option(plainClauseGen('n', 0, 1500, 5000), { nil: undefined })
  )

  return fc
    .tuple(clauses, separator)
    .map(([parts, sep]) => parts.filter((p): p is string => p !== undefined).join(sep))
    .filter((pattern) => pattern.length > 0)
}
