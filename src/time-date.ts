/**
 * Time & Date Utilities
 *
 * The timestamp value shifted by calshift, plus the calendar arithmetic the
 * evaluator needs. Uses Julian Day Number for all date arithmetic so that
 * out-of-range fields (month 22, day 35, minute 200) normalize by carrying
 * into the next larger unit. Zero external dependencies; uses
 * Intl.DateTimeFormat for IANA timezone offsets.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Types
// ============================================================================

/** Wall-clock fields. May be out of range before normalizeWall. */
export type WallFields = {
  year: number
  month: number // 1-12
  day: number // 1-31
  hour: number // 0-23
  minute: number // 0-59
  second: number // 0-59
  nanosecond: number // 0-999_999_999
}

/**
 * A timestamp carrying its own UTC offset.
 *
 * Fields are always in range. When `zone` is set, reconstruction re-resolves
 * `offset` for the new wall time in that zone; otherwise the offset is fixed.
 */
export type OffsetDateTime = Readonly<WallFields> & {
  /** Minutes east of UTC */
  readonly offset: number
  /** IANA zone name, e.g. 'Europe/Berlin' */
  readonly zone?: string
}

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

const NS_PER_SECOND = 1_000_000_000
const NS_PER_MILLISECOND = 1_000_000
const SECONDS_PER_DAY = 86_400
const MS_PER_MINUTE = 60_000
const MS_PER_DAY = 86_400_000

/** JDN of 1970-01-01 */
const UNIX_EPOCH_JDN = 2_440_588

const DAYS_IN_MONTH = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Normalization & Construction
// ============================================================================

/**
 * Carry out-of-range fields into larger units: nanoseconds into seconds,
 * seconds/minutes/hours into days, months into years, then days past the
 * first of the resulting month.
 */
export function normalizeWall(fields: WallFields): WallFields {
  const secondCarry = Math.floor(fields.nanosecond / NS_PER_SECOND)
  const nanosecond = fields.nanosecond - secondCarry * NS_PER_SECOND

  let seconds = fields.hour * 3600 + fields.minute * 60 + fields.second + secondCarry
  const dayCarry = Math.floor(seconds / SECONDS_PER_DAY)
  seconds -= dayCarry * SECONDS_PER_DAY

  const monthIndex = fields.month - 1
  const yearCarry = Math.floor(monthIndex / 12)
  const month = monthIndex - yearCarry * 12 + 1

  const jdn = dateToJDN(fields.year + yearCarry, month, 1) + fields.day - 1 + dayCarry
  const { year, month: m, day } = jdnToDate(jdn)

  return {
    year,
    month: m,
    day,
    hour: Math.floor(seconds / 3600),
    minute: Math.floor((seconds % 3600) / 60),
    second: seconds % 60,
    nanosecond,
  }
}

export function wallOf(t: OffsetDateTime): WallFields {
  return {
    year: t.year,
    month: t.month,
    day: t.day,
    hour: t.hour,
    minute: t.minute,
    second: t.second,
    nanosecond: t.nanosecond,
  }
}

// Years whose whole span fits the Date range (±8.64e15 ms); outside it Intl cannot resolve a zone
const MIN_ZONED_YEAR = -271820
const MAX_ZONED_YEAR = 275759

/**
 * Build a timestamp from (possibly out-of-range) fields in t's offset or zone.
 * Outside the zone-resolvable years a zoned timestamp keeps t's offset.
 */
export function withWall(t: OffsetDateTime, fields: WallFields): OffsetDateTime {
  const wall = normalizeWall(fields)
  if (t.zone === undefined) return { ...wall, offset: t.offset }
  if (wall.year < MIN_ZONED_YEAR || wall.year > MAX_ZONED_YEAR) {
    return { ...wall, offset: t.offset, zone: t.zone }
  }

  const utcMs = localToUtcMs(wallToEpochMs(wall), wall.year, t.zone)
  const offset = utcOffsetAtMs(utcMs, t.zone)
  const resolved = epochMsToWall(utcMs + offset * MS_PER_MINUTE)
  return { ...resolved, nanosecond: wall.nanosecond, offset, zone: t.zone }
}

/** Add to the wall fields, then normalize (Jan 31 + 1 month is Mar 3 or 2). */
export function addDate(t: OffsetDateTime, years: number, months: number, days: number): OffsetDateTime {
  return withWall(t, {
    ...wallOf(t),
    year: t.year + years,
    month: t.month + months,
    day: t.day + days,
  })
}

export function addDays(t: OffsetDateTime, n: number): OffsetDateTime {
  return addDate(t, 0, 0, n)
}

// ============================================================================
// Calendar Queries
// ============================================================================

/** 0 = Sunday … 6 = Saturday */
export function weekdayOf(t: Pick<WallFields, 'year' | 'month' | 'day'>): number {
  // JDN 0 is a Monday
  const jdn = dateToJDN(t.year, t.month, t.day)
  return (((jdn + 1) % 7) + 7) % 7
}

/** 1-based day of the year */
export function dayOfYear(t: Pick<WallFields, 'year' | 'month' | 'day'>): number {
  return dateToJDN(t.year, t.month, t.day) - dateToJDN(t.year, 1, 1) + 1
}

// ============================================================================
// Parsing
// ============================================================================

const OFFSET_DATE_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})(?:\[([^\]]+)\])?$/

function int(s: string | undefined): number {
  return s === undefined ? 0 : parseInt(s, 10)
}

function parseOffset(str: string): number | null {
  if (str === 'Z') return 0
  const sign = str.startsWith('-') ? -1 : 1
  const hours = int(str.substring(1, 3))
  const minutes = int(str.substring(4, 6))
  if (hours > 23 || minutes > 59) return null
  return sign * (hours * 60 + minutes)
}

/**
 * Parse an RFC 3339 timestamp, optionally followed by a bracketed IANA zone:
 * `2021-03-28T01:30:00+01:00[Europe/Berlin]`.
 */
export function parseOffsetDateTime(str: string): Result<OffsetDateTime, ParseError> {
  const match = OFFSET_DATE_TIME_RE.exec(str)
  if (!match) return Err(new ParseError(`Invalid timestamp format: '${str}'`))

  const year = int(match[1])
  const month = int(match[2])
  const day = int(match[3])
  const hour = int(match[4])
  const minute = int(match[5])
  const second = int(match[6])
  const nanosecond = int((match[7] ?? '').padEnd(9, '0'))

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in timestamp: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in timestamp: '${str}'`))
  if (hour > 23)
    return Err(new ParseError(`Invalid hour in timestamp: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in timestamp: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in timestamp: '${str}'`))

  const offset = parseOffset(match[8] ?? 'Z')
  if (offset === null)
    return Err(new ParseError(`Invalid offset in timestamp: '${str}'`))

  const wall = { year, month, day, hour, minute, second, nanosecond }
  const zone = match[9]
  if (zone === undefined) return Ok({ ...wall, offset })

  if (!isValidTimezone(zone))
    return Err(new ParseError(`Invalid timezone in timestamp: '${str}'`))
  const utcMs = wallToEpochMs(wall) - offset * MS_PER_MINUTE
  if (utcOffsetAtMs(utcMs, zone) !== offset)
    return Err(new ParseError(`Offset does not match timezone in timestamp: '${str}'`))

  return Ok({ ...wall, offset, zone })
}

// ============================================================================
// Formatting
// ============================================================================

function formatFraction(nanosecond: number): string {
  if (nanosecond === 0) return ''
  return '.' + String(nanosecond).padStart(9, '0').replace(/0+$/, '')
}

function formatOffset(offset: number): string {
  if (offset === 0) return 'Z'
  const abs = Math.abs(offset)
  return `${offset < 0 ? '-' : '+'}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`
}

/** RFC 3339 with trailing fractional zeros trimmed; `[zone]` appended when set. */
export function formatOffsetDateTime(t: OffsetDateTime): string {
  const date = `${pad4(t.year)}-${pad2(t.month)}-${pad2(t.day)}`
  const time = `${pad2(t.hour)}:${pad2(t.minute)}:${pad2(t.second)}${formatFraction(t.nanosecond)}`
  const zone = t.zone === undefined ? '' : `[${t.zone}]`
  return `${date}T${time}${formatOffset(t.offset)}${zone}`
}

// ============================================================================
// Date Interop
// ============================================================================

export function toEpochMs(t: OffsetDateTime): number {
  return wallToEpochMs(t) - t.offset * MS_PER_MINUTE + Math.floor(t.nanosecond / NS_PER_MILLISECOND)
}

export function toDate(t: OffsetDateTime): Date {
  return new Date(toEpochMs(t))
}

/** Wall time of `date` in `zone`, or in UTC when no zone is given. */
export function fromDate(date: Date, zone?: string): OffsetDateTime {
  const ms = date.getTime()
  const subsecondMs = ((ms % 1000) + 1000) % 1000
  const wholeMs = ms - subsecondMs
  const offset = zone === undefined ? 0 : utcOffsetAtMs(wholeMs, zone)
  const wall = { ...epochMsToWall(wholeMs + offset * MS_PER_MINUTE), nanosecond: subsecondMs * NS_PER_MILLISECOND }
  return zone === undefined ? { ...wall, offset } : { ...wall, offset, zone }
}

// ============================================================================
// Timezone Conversion
// ============================================================================

function wallToEpochMs(w: Omit<WallFields, 'nanosecond'>): number {
  const days = dateToJDN(w.year, w.month, w.day) - UNIX_EPOCH_JDN
  return days * MS_PER_DAY + ((w.hour * 60 + w.minute) * 60 + w.second) * 1000
}

function epochMsToWall(ms: number): Omit<WallFields, 'nanosecond'> {
  const days = Math.floor(ms / MS_PER_DAY)
  const seconds = Math.floor((ms - days * MS_PER_DAY) / 1000)
  const { year, month, day } = jdnToDate(days + UNIX_EPOCH_JDN)
  return {
    year,
    month,
    day,
    hour: Math.floor(seconds / 3600),
    minute: Math.floor((seconds % 3600) / 60),
    second: seconds % 60,
  }
}

const formatters = new Map<string, Intl.DateTimeFormat>()

function formatterFor(tz: string): Intl.DateTimeFormat {
  let formatter = formatters.get(tz)
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: tz,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    })
    formatters.set(tz, formatter)
  }
  return formatter
}

/** Given a whole-second UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const parts = formatterFor(tz).formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = wallToEpochMs({
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: h,
    minute: get('minute'),
    second: get('second'),
  })
  return (localMs - utcMs) / MS_PER_MINUTE
}

/**
 * Map a local wall time (as ms, treated as UTC) to the UTC instant in tz.
 * Wall times in a DST gap are read in standard time, which moves them forward
 * by the gap (02:30 becomes 03:30); ambiguous wall times resolve to standard time.
 *
 * Standard and daylight offsets come from 15 January and 15 July of the year,
 * so a zone whose base offset changes mid-year is only resolved correctly on
 * the side of the change those dates fall on.
 */
function localToUtcMs(localMs: number, year: number, tz: string): number {
  if (tz === 'UTC') return localMs

  // Determine standard and daylight offsets from Jan/Jul
  const janOffset = utcOffsetAtMs(wallToEpochMs({ year, month: 1, day: 15, hour: 12, minute: 0, second: 0 }), tz)
  const julOffset = utcOffsetAtMs(wallToEpochMs({ year, month: 7, day: 15, hour: 12, minute: 0, second: 0 }), tz)

  if (janOffset === julOffset) {
    // No DST transitions, plain conversion
    return localMs - janOffset * MS_PER_MINUTE
  }

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)

  // Try both possible offsets to map local → UTC, then check round-trip
  const utcViaStd = localMs - stdOffset * MS_PER_MINUTE
  const utcViaDst = localMs - dstOffset * MS_PER_MINUTE

  const stdMapsBack = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * MS_PER_MINUTE === localMs
  const dstMapsBack = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * MS_PER_MINUTE === localMs

  // Standard time wins for ambiguous and gap wall times alike
  if (dstMapsBack && !stdMapsBack) return utcViaDst
  return utcViaStd
}
