/**
 * Shift Cache
 *
 * Pattern text → built ShiftSpec. Callers create and own a cache and pass it
 * to parse explicitly; there is no process-wide instance.
 */

import type { ShiftSpec } from './shift-spec'

export interface ShiftCache {
  get(pattern: string): ShiftSpec | undefined
  has(pattern: string): boolean
  /** First write wins: a pattern already cached keeps its spec */
  set(pattern: string, spec: ShiftSpec): void
  clear(): void
  readonly size: number
}

export function createShiftCache(): ShiftCache {
  const specs = new Map<string, ShiftSpec>()

  return {
    get(pattern) {
      return specs.get(pattern)
    },
    has(pattern) {
      return specs.has(pattern)
    },
    set(pattern, spec) {
      if (!specs.has(pattern)) specs.set(pattern, spec)
    },
    clear() {
      specs.clear()
    },
    get size() {
      return specs.size
    },
  }
}
