/**
 * Shared timestamp helpers for tests: parse fixtures strictly and compare
 * results by their formatted text, which includes the offset and zone.
 */
import {
  type OffsetDateTime,
  parseOffsetDateTime,
  formatOffsetDateTime,
} from '../../src/time-date'

/** Parse an RFC 3339 fixture, failing the test on malformed input */
export function at(str: string): OffsetDateTime {
  const result = parseOffsetDateTime(str)
  if (!result.ok) throw result.error
  return result.value
}

export function iso(t: OffsetDateTime): string {
  return formatOffsetDateTime(t)
}
