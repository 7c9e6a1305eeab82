/**
 * Timeshift facade
 *
 * Bundles parsing, evaluation, an owned cache and logging behind one object:
 *
 *   const ts = createTimeshift({ cache: true })
 *   ts.shift('W^1 w1 h9 m0 s0', now) // first Monday of the month, 09:00
 */

import type { Result } from './result'
import { type PatternError, ValidationError } from './errors'
import type { OffsetDateTime } from './time-date'
import type { ShiftSpec } from './shift-spec'
import { type ShiftCache, createShiftCache } from './shift-cache'
import { tryParseShift } from './parse'
import { applyShift } from './evaluator'
import { type Logger, makeLogger } from './logger'

export type TimeshiftConfig = {
  /** true (default): private cache; false: always reparse; or a shared cache */
  cache?: boolean | ShiftCache
  logger?: Logger
}

export type Timeshift = {
  readonly cache: ShiftCache | null
  parse(pattern: string): ShiftSpec
  tryParse(pattern: string): Result<ShiftSpec, PatternError>
  apply(spec: ShiftSpec, t: OffsetDateTime): OffsetDateTime
  shift(pattern: string, t: OffsetDateTime): OffsetDateTime
}

function isShiftCache(value: unknown): value is ShiftCache {
  if (typeof value !== 'object' || value === null) return false
  return ['get', 'has', 'set', 'clear'].every(
    (method) => typeof Reflect.get(value, method) === 'function'
  )
}

function resolveCache(option: TimeshiftConfig['cache']): ShiftCache | null {
  if (option === undefined || option === true) return createShiftCache()
  if (option === false) return null
  if (!isShiftCache(option)) throw new ValidationError('cache must be a boolean or a ShiftCache')
  return option
}

export function createTimeshift(config: TimeshiftConfig = {}): Timeshift {
  if (typeof config !== 'object' || config === null) {
    throw new ValidationError('Config must be an object')
  }

  const cache = resolveCache(config.cache)
  const log = (config.logger ?? makeLogger()).child({ component: 'timeshift' })

  function tryParse(pattern: string): Result<ShiftSpec, PatternError> {
    const trimmed = pattern.trim()
    const hit = cache !== null && cache.has(trimmed)
    const result = tryParseShift(pattern, cache === null ? {} : { cache })

    if (result.ok) {
      log.debug({ pattern: trimmed, cached: hit }, hit ? 'shift pattern cache hit' : 'shift pattern parsed')
    } else {
      log.warn(
        { pattern: trimmed, code: result.error.code, clause: result.error.clause },
        result.error.message
      )
    }
    return result
  }

  function parse(pattern: string): ShiftSpec {
    const result = tryParse(pattern)
    if (!result.ok) throw result.error
    return result.value
  }

  return {
    cache,
    parse,
    tryParse,
    apply: applyShift,
    shift(pattern, t) {
      return applyShift(parse(pattern), t)
    },
  }
}
