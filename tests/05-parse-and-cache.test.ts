/**
 * Segment 05: Parse Entry Points & Shift Cache Tests
 *
 * Blank patterns, trimming, throwing vs Result variants, and the
 * caller-owned cache: successes stored once under the trimmed pattern,
 * failures and blanks never stored.
 */

import { describe, it, expect } from 'vitest'
import { parseShift, tryParseShift, shift } from '../src/parse'
import { createShiftCache } from '../src/shift-cache'
import { EMPTY_SHIFT_SPEC } from '../src/shift-spec'
import { OptionError, PatternSyntaxError, ValueError } from '../src/errors'
import { at, iso } from './helpers/timestamps'

// ============================================================================
// 1. PARSE ENTRY POINTS
// ============================================================================

describe('parseShift', () => {
  it.each(['', '   ', '\t\n '])('blank pattern %j gives the identity spec', (pattern) => {
    expect(parseShift(pattern)).toBe(EMPTY_SHIFT_SPEC)
    expect(parseShift(pattern).empty).toBe(true)
  })

  it('trims before validating', () => {
    expect(parseShift('  D$1  ').day.fromEnd).toBe(true)
  })

  it('is structurally deterministic', () => {
    expect(parseShift('Y+1 M+2 D$3 W-2 h-6 m+20 s-30')).toEqual(parseShift('Y+1 M+2 D$3 W-2 h-6 m+20 s-30'))
  })

  it('throws the pattern error', () => {
    expect(() => parseShift('D0')).toThrow(ValueError)
    expect(() => parseShift('W$^2')).toThrow(OptionError)
    expect(() => parseShift('Y1,M2')).toThrow(PatternSyntaxError)
  })

  it('reports the trimmed pattern', () => {
    const result = tryParseShift('  Y$-2  ')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.pattern).toBe('Y$-2')
  })
})

describe('shift', () => {
  it('parses and applies in one call', () => {
    expect(iso(shift('W^1 w0', at('2021-01-20T00:00:00Z')))).toBe('2021-01-03T00:00:00Z')
  })

  it('throws for an invalid pattern', () => {
    expect(() => shift('M0', at('2021-01-20T00:00:00Z'))).toThrow("Illegal month in 'M0'")
  })
})

// ============================================================================
// 2. CACHE OBJECT
// ============================================================================

describe('createShiftCache', () => {
  it('starts empty', () => {
    const cache = createShiftCache()
    expect(cache.size).toBe(0)
    expect(cache.get('h1')).toBeUndefined()
    expect(cache.has('h1')).toBe(false)
  })

  it('keeps the first spec stored for a pattern', () => {
    const cache = createShiftCache()
    const first = parseShift('h1')
    cache.set('h1', first)
    cache.set('h1', parseShift('h1'))
    expect(cache.get('h1')).toBe(first)
    expect(cache.size).toBe(1)
  })

  it('clears', () => {
    const cache = createShiftCache()
    cache.set('h1', parseShift('h1'))
    cache.clear()
    expect(cache.size).toBe(0)
  })

  it('caches are independent', () => {
    const a = createShiftCache()
    const b = createShiftCache()
    parseShift('h1', { cache: a })
    expect(a.size).toBe(1)
    expect(b.size).toBe(0)
  })
})

// ============================================================================
// 3. CACHED PARSING
// ============================================================================

describe('cached parsing', () => {
  it('stores under the trimmed pattern and reuses the spec', () => {
    const cache = createShiftCache()
    const first = parseShift('  D$1 ', { cache })
    expect(cache.has('D$1')).toBe(true)
    expect(parseShift('D$1', { cache })).toBe(first)
  })

  it('returns whatever the cache holds', () => {
    const cache = createShiftCache()
    const stored = parseShift('h2')
    cache.set('h1', stored)
    expect(parseShift('h1', { cache })).toBe(stored)
  })

  it('never stores failures', () => {
    const cache = createShiftCache()
    expect(tryParseShift('D0', { cache }).ok).toBe(false)
    expect(tryParseShift('garbage', { cache }).ok).toBe(false)
    expect(cache.size).toBe(0)
  })

  it('never stores blank patterns', () => {
    const cache = createShiftCache()
    parseShift('   ', { cache })
    expect(cache.size).toBe(0)
  })

  it('rebuilds without a cache', () => {
    const a = parseShift('W^1 w0')
    const b = parseShift('W^1 w0')
    expect(a).not.toBe(b)
    expect(a).toEqual(b)
  })

  it('gives the same results as uncached parsing', () => {
    const cache = createShiftCache()
    const t = at('2020-06-13T14:55:22Z')
    const pattern = 'Y+1 M+2 D$3 W-2 h-6 m+20 s-30'
    parseShift(pattern, { cache })
    expect(iso(shift(pattern, t, { cache }))).toBe(iso(shift(pattern, t)))
    expect(iso(shift(pattern, t, { cache }))).toBe('2021-08-15T09:14:52Z')
  })
})
