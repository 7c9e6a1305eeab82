/**
 * Shift Evaluator
 *
 * Applies a ShiftSpec to a timestamp in three phases:
 *   1. field substitution and calendar-normalizing reconstruction
 *   2. day counted from the end of the month (`D$n`)
 *   3. week anchors and weekday snap (`W^n`, `W$n`, `Wn`, `W±n`, `wn`)
 *
 * Total and deterministic; all arithmetic is on wall-clock fields in the
 * input's own offset or zone.
 */

import {
  type OffsetDateTime,
  addDate,
  addDays,
  dayOfYear,
  weekdayOf,
  withWall,
} from './time-date'
import { type PartDef, type ShiftSpec } from './shift-spec'

const NS_PER_MILLISECOND = 1_000_000
const NS_PER_MICROSECOND = 1_000

/** Fields that phase 1 substitutes, in evaluation order */
const SUBSTITUTED = [
  'year',
  'month',
  'day',
  'hour',
  'minute',
  'second',
  'millisecond',
  'microsecond',
  'nanosecond',
] as const

type SubstitutedField = (typeof SUBSTITUTED)[number]

type CalendarFields = Record<SubstitutedField, number>

// ============================================================================
// Phase 1: Field Substitution
// ============================================================================

/**
 * Apply one PartDef to one field value.
 * `fromEnd` leaves the field alone; phase 2 resolves it.
 */
export function adjustField(part: PartDef, current: number): number {
  if (!part.active || part.fromEnd) return current
  return part.absolute ? part.value : current + part.value
}

function decompose(t: OffsetDateTime): CalendarFields {
  return {
    year: t.year,
    month: t.month,
    day: t.day,
    hour: t.hour,
    minute: t.minute,
    second: t.second,
    millisecond: Math.floor(t.nanosecond / NS_PER_MILLISECOND),
    microsecond: Math.floor(t.nanosecond / NS_PER_MICROSECOND) % 1000,
    nanosecond: t.nanosecond % 1000,
  }
}

function substitute(spec: ShiftSpec, t: OffsetDateTime): OffsetDateTime {
  const fields = decompose(t)
  for (const field of SUBSTITUTED) {
    fields[field] = adjustField(spec[field], fields[field])
  }

  return withWall(t, {
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour,
    minute: fields.minute,
    second: fields.second,
    nanosecond:
      fields.millisecond * NS_PER_MILLISECOND +
      fields.microsecond * NS_PER_MICROSECOND +
      fields.nanosecond,
  })
}

// ============================================================================
// Phase 2: Day From End
// ============================================================================

/**
 * `D$n` is the n-th last day of the candidate's month. `originalDay` is the
 * day the input carried, which the candidate still holds unless an earlier
 * field overflowed it.
 */
function dayFromEnd(spec: ShiftSpec, candidate: OffsetDateTime, originalDay: number): OffsetDateTime {
  if (!spec.day.active || !spec.day.fromEnd) return candidate
  return addDate(candidate, 0, 1, 1 - originalDay - spec.day.value)
}

// ============================================================================
// Phase 3: Week Anchors & Weekday Snap
// ============================================================================

function nthFromStart(start: OffsetDateTime, weekday: number, n: number): OffsetDateTime {
  let shift = weekday - weekdayOf(start)
  if (shift < 0) shift += 7
  return addDays(start, shift + (n - 1) * 7)
}

function nthFromEnd(end: OffsetDateTime, weekday: number, n: number): OffsetDateTime {
  let shift = weekday - weekdayOf(end)
  if (shift > 0) shift -= 7
  return addDays(end, shift - (n - 1) * 7)
}

function snapWeekday(spec: ShiftSpec, candidate: OffsetDateTime): OffsetDateTime {
  if (!spec.weekday.active) return candidate
  return addDays(candidate, spec.weekday.value - weekdayOf(candidate))
}

function resolveWeek(spec: ShiftSpec, candidate: OffsetDateTime): OffsetDateTime {
  const week = spec.week
  if (!week.active) return snapWeekday(spec, candidate)

  const wd = spec.weekday.active ? spec.weekday.value : weekdayOf(candidate)

  if (week.fromBegin) {
    const firstOfMonth = addDays(candidate, 1 - candidate.day)
    return nthFromStart(firstOfMonth, wd, week.value)
  }

  if (week.fromEnd) {
    const lastOfMonth = addDate(candidate, 0, 1, -candidate.day)
    return nthFromEnd(lastOfMonth, wd, week.value)
  }

  if (week.absolute) {
    const janFirst = addDays(candidate, 1 - dayOfYear(candidate))
    return nthFromStart(janFirst, wd, week.value)
  }

  // Relative weeks shift first, then snap within the landed week
  return snapWeekday(spec, addDays(candidate, week.value * 7))
}

// ============================================================================
// Apply
// ============================================================================

export function applyShift(spec: ShiftSpec, t: OffsetDateTime): OffsetDateTime {
  if (spec.empty) return t

  const candidate = dayFromEnd(spec, substitute(spec, t), t.day)
  return resolveWeek(spec, candidate)
}
