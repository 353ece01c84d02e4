/**
 * Time & Date Utilities
 *
 * Pure functions for date/time parsing, arithmetic, and timezone conversion.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Zero external dependencies — uses Intl.DateTimeFormat for timezone support.
 */

import { type Result, Ok, Err } from './result'
import { InvalidTimezoneError, ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol
declare const __instant: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string without offset: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** Absolute point in time, epoch milliseconds UTC */
export type Instant = number & { readonly [__instant]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export const MS_PER_SECOND = 1000
export const MS_PER_MINUTE = 60 * MS_PER_SECOND
export const MS_PER_HOUR = 60 * MS_PER_MINUTE
export const MS_PER_DAY = 24 * MS_PER_HOUR

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
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
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

/** Accepts HH:MM or HH:MM:SS and normalizes to HH:MM:SS */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

export function toInstant(epochMs: number): Instant {
  return epochMs as Instant
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

// ============================================================================
// Day-of-Week
// ============================================================================

export function dayOfWeek(date: LocalDate): Weekday {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  // JDN mod 7: 0 = Monday (1970-01-01 → JDN 2440588 → 3 → thu)
  const idx = ((jdn % 7) + 7) % 7
  return WEEKDAYS[idx] ?? 'mon'
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function maxDate(a: LocalDate, b: LocalDate): LocalDate {
  return compareDates(a, b) >= 0 ? a : b
}

// ============================================================================
// Timezone Conversion
// ============================================================================

const formatterCache = new Map<string, Intl.DateTimeFormat>()

function formatterFor(tz: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(tz)
  if (cached) return cached

  let formatter: Intl.DateTimeFormat
  try {
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
  } catch (e) {
    if (e instanceof RangeError) throw new InvalidTimezoneError(tz)
    throw e
  }
  formatterCache.set(tz, formatter)
  return formatter
}

export function isValidTimezone(tz: string): boolean {
  if (tz.trim() === '') return false
  try {
    formatterFor(tz)
    return true
  } catch {
    return false
  }
}

/** Throws InvalidTimezoneError for names the runtime's tz database does not know */
export function assertTimezone(tz: string): void {
  if (tz.trim() === '') throw new InvalidTimezoneError(tz)
  formatterFor(tz)
}

type WallClock = { year: number; month: number; day: number; hour: number; minute: number; second: number }

function wallClockAt(utcMs: number, tz: string): WallClock {
  const parts = formatterFor(tz).formatToParts(new Date(utcMs))
  const get = (type: Intl.DateTimeFormatPartTypes) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let hour = get('hour')
  if (hour === 24) hour = 0
  return { year: get('year'), month: get('month'), day: get('day'), hour, minute: get('minute'), second: get('second') }
}

/** UTC offset in milliseconds that tz observes at the given UTC instant */
export function utcOffsetAt(utcMs: number, tz: string): number {
  const secondAligned = Math.floor(utcMs / MS_PER_SECOND) * MS_PER_SECOND
  const w = wallClockAt(secondAligned, tz)
  const localMs = Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second)
  return localMs - secondAligned
}

/** Treat a LocalDateTime as if it were UTC and return its epoch ms */
function wallMs(dt: LocalDateTime): number {
  const d = dateOf(dt), t = timeOf(dt)
  return Date.UTC(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

export function instantToLocal(instant: Instant, tz: string): LocalDateTime {
  const w = wallClockAt(Math.floor(instant / MS_PER_SECOND) * MS_PER_SECOND, tz)
  return makeDateTime(makeDate(w.year, w.month, w.day), makeTime(w.hour, w.minute, w.second))
}

export type WallClockStatus = 'normal' | 'gap' | 'overlap'

/**
 * Every instant whose wall clock in tz reads exactly dt, earliest first.
 * Empty inside a spring-forward gap, two entries inside a fall-back overlap.
 */
function instantsForWallClock(dt: LocalDateTime, tz: string): number[] {
  const localMs = wallMs(dt)
  const offsets = new Set([
    utcOffsetAt(localMs - MS_PER_DAY, tz),
    utcOffsetAt(localMs, tz),
    utcOffsetAt(localMs + MS_PER_DAY, tz),
  ])

  const matches: number[] = []
  for (const offset of offsets) {
    const candidate = localMs - offset
    if (candidate + utcOffsetAt(candidate, tz) === localMs && !matches.includes(candidate)) {
      matches.push(candidate)
    }
  }
  return matches.sort((a, b) => a - b)
}

export function wallClockStatus(dt: LocalDateTime, tz: string): WallClockStatus {
  const matches = instantsForWallClock(dt, tz)
  if (matches.length === 0) return 'gap'
  if (matches.length > 1) return 'overlap'
  return 'normal'
}

/**
 * Resolve a wall-clock reading in tz to an absolute instant.
 *
 * Overlap (fall-back): the earlier of the two instants.
 * Gap (spring-forward): the transition instant, i.e. the first valid instant after the gap.
 */
export function localToInstant(dt: LocalDateTime, tz: string): Instant {
  if (tz === 'UTC') return toInstant(wallMs(dt))

  const matches = instantsForWallClock(dt, tz)
  const earliest = matches[0]
  if (earliest !== undefined) return toInstant(earliest)

  // Gap: the offset changes somewhere between the two naive candidates.
  const localMs = wallMs(dt)
  const before = utcOffsetAt(localMs - MS_PER_DAY, tz)
  const after = utcOffsetAt(localMs + MS_PER_DAY, tz)
  let lo = localMs - Math.max(before, after)
  let hi = localMs - Math.min(before, after)
  const offsetAtHi = utcOffsetAt(hi, tz)
  if (utcOffsetAt(lo, tz) === offsetAtHi) return toInstant(hi)

  // Transitions are second-aligned; binary search for the first second on the new offset.
  while (hi - lo > MS_PER_SECOND) {
    const mid = lo + Math.floor((hi - lo) / (2 * MS_PER_SECOND)) * MS_PER_SECOND
    if (utcOffsetAt(mid, tz) === offsetAtHi) hi = mid
    else lo = mid
  }
  return toInstant(hi)
}

export function formatInstant(instant: Instant): string {
  return new Date(instant).toISOString()
}
