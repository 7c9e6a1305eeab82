/**
 * Segment 02: Grammar Matcher Tests
 *
 * The scanner must cover the whole pattern with clauses; anything else is a
 * syntax error naming the pattern.
 */

import { describe, it, expect } from 'vitest'
import { tokenize } from '../src/grammar'
import { PatternSyntaxError, ShiftErrorCode } from '../src/errors'

describe('tokenize', () => {
  describe('accepted patterns', () => {
    it('splits adjacent clauses', () => {
      const result = tokenize('Y+1M+22')
      expect(result).toEqual({
        ok: true,
        value: [
          { source: 'Y+1', unit: 'Y', anchors: [], sign: '+', magnitude: 1 },
          { source: 'M+22', unit: 'M', anchors: [], sign: '+', magnitude: 22 },
        ],
      })
    })

    it('skips whitespace around clauses', () => {
      const result = tokenize('  D$3    h-6 ')
      expect(result.ok && result.value.map((t) => t.source)).toEqual(['D$3', 'h-6'])
    })

    it('records absent sign as null', () => {
      const result = tokenize('w3')
      expect(result.ok && result.value[0]).toEqual({
        source: 'w3', unit: 'w', anchors: [], sign: null, magnitude: 3,
      })
    })

    it('collects every anchor marker', () => {
      const result = tokenize('W$^2')
      expect(result.ok && result.value[0]?.anchors).toEqual(['$', '^'])
    })

    it('reads leading zeros as decimal', () => {
      const result = tokenize('D007')
      expect(result.ok && result.value[0]?.magnitude).toBe(7)
    })

    it('accepts every unit letter', () => {
      const result = tokenize('Y1 M1 D1 W1 w1 h1 m1 s1 l1 u1 n1')
      expect(result.ok && result.value.map((t) => t.unit).join('')).toBe('YMDWwhmslun')
    })
  })

  describe('rejected patterns', () => {
    it.each([
      ['unknown letters', 'ZZZYYY'],
      ['unknown leading unit', 'Z1M2D$-3W3w1h-4m+5s6'],
      ['missing digits', 'YM2D$-3h-4m+5s6'],
      ['missing digits after sign', 'Y1M2D$-h-4m+5s6'],
      ['stray operator', 'Y1M2D$*3h-4m+5s6'],
      ['wrong letter case', 'Y1 M2 D$-3 H-4 m+5 s6'],
      ['punctuation between clauses', 'Y1,M2'],
      ['trailing garbage', 'Y1 x'],
      ['sign before anchor', 'W+^1'],
      ['no clauses at all', '   '],
    ])('%s: %s', (_label, pattern) => {
      const result = tokenize(pattern)
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(PatternSyntaxError)
        expect(result.error.code).toBe(ShiftErrorCode.SYNTAX)
        expect(result.error.pattern).toBe(pattern)
        expect(result.error.message).toBe(`Illegal pattern '${pattern}'`)
      }
    })
  })
})
