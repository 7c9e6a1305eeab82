/**
 * Shift Spec
 *
 * The validated, immutable result of parsing one pattern: one PartDef per
 * calendar unit, plus an `empty` flag for the identity transform.
 */

// ============================================================================
// Units
// ============================================================================

/** Unit letters in the only order a pattern may list them */
export const UNIT_ORDER = 'YMDWwhmslun'

export type Unit = 'Y' | 'M' | 'D' | 'W' | 'w' | 'h' | 'm' | 's' | 'l' | 'u' | 'n'

export type UnitField =
  | 'year'
  | 'month'
  | 'day'
  | 'week'
  | 'weekday'
  | 'hour'
  | 'minute'
  | 'second'
  | 'millisecond'
  | 'microsecond'
  | 'nanosecond'

export const UNIT_FIELDS: Readonly<Record<Unit, UnitField>> = {
  Y: 'year',
  M: 'month',
  D: 'day',
  W: 'week',
  w: 'weekday',
  h: 'hour',
  m: 'minute',
  s: 'second',
  l: 'millisecond',
  u: 'microsecond',
  n: 'nanosecond',
}

export function isUnit(ch: string): ch is Unit {
  return ch.length === 1 && UNIT_ORDER.includes(ch)
}

// ============================================================================
// Types
// ============================================================================

/** One adjustment directive for a single calendar unit. */
export type PartDef = {
  readonly active: boolean
  /** Signed operand: the new value when absolute, the delta when relative */
  readonly value: number
  /** Set the field to `value` rather than adding `value` to it */
  readonly absolute: boolean
  /** `^`: counted from the start of the month (week only) */
  readonly fromBegin: boolean
  /** `$`: counted from the end of the month (day and week only) */
  readonly fromEnd: boolean
}

export type ShiftSpec = {
  /** Blank pattern: apply returns its input unchanged */
  readonly empty: boolean
} & { readonly [F in UnitField]: PartDef }

// ============================================================================
// Construction
// ============================================================================

export const INACTIVE_PART: PartDef = Object.freeze({
  active: false,
  value: 0,
  absolute: false,
  fromBegin: false,
  fromEnd: false,
})

function inactiveParts(): Record<UnitField, PartDef> {
  return {
    year: INACTIVE_PART,
    month: INACTIVE_PART,
    day: INACTIVE_PART,
    week: INACTIVE_PART,
    weekday: INACTIVE_PART,
    hour: INACTIVE_PART,
    minute: INACTIVE_PART,
    second: INACTIVE_PART,
    millisecond: INACTIVE_PART,
    microsecond: INACTIVE_PART,
    nanosecond: INACTIVE_PART,
  }
}

/** Freeze a spec from the parts a pattern set; the rest stay inactive. */
export function makeShiftSpec(parts: Partial<Record<UnitField, PartDef>>): ShiftSpec {
  const all = inactiveParts()
  for (const field of Object.values(UNIT_FIELDS)) {
    const part = parts[field]
    if (part !== undefined) all[field] = Object.freeze({ ...part })
  }
  return Object.freeze({ empty: false, ...all })
}

/** Identity transform, shared by every blank pattern */
export const EMPTY_SHIFT_SPEC: ShiftSpec = Object.freeze({ empty: true, ...inactiveParts() })
