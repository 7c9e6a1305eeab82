/**
 * Logger
 *
 * pino factory for the facade. Reads CALSHIFT_LOG_LEVEL directly; silent
 * under Vitest or NODE_ENV=test.
 */

import type { Logger } from 'pino'
import pino from 'pino'

export type { Logger } from 'pino'

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === 'true'
  const nodeEnv = process.env.NODE_ENV ?? 'development'
  const level = process.env.CALSHIFT_LOG_LEVEL ?? 'info'

  return pino({
    level,
    enabled: !isVitest && nodeEnv !== 'test',
    base: { ...bindings, lib: 'calshift' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

/** For tests - pino with enabled:false (preserves type, silences output) */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false })
}
