/**
 * Time Resolver
 *
 * Converts a timezone-qualified wall-clock time plus a recurrence rule into the
 * next absolute fire instant. Pure and stateless: the same inputs always give
 * the same instant.
 */

import {
  type Instant, type LocalDate, type LocalTime, type Weekday,
  addDays, assertTimezone, dateOf, daysBetween, dayOfWeek, instantToLocal,
  localToInstant, makeDateTime, maxDate, toInstant, MS_PER_HOUR, MS_PER_MINUTE,
} from './time-date'
import { InvalidRecurrenceError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type IntervalUnit = 'minute' | 'hour' | 'day' | 'week'

export const INTERVAL_UNITS: readonly IntervalUnit[] = ['minute', 'hour', 'day', 'week']

/** Closed set of recurrence rules. Adding a kind means adding a case to resolve(). */
export type Recurrence =
  | { type: 'none' }
  | { type: 'daily' }
  | { type: 'weekly'; days: Weekday[] }
  | { type: 'custom'; interval: number; unit: IntervalUnit }

/** Wall-clock time of day, optionally pinned to a calendar date (the first occurrence). */
export type LocalTimeSpec = {
  time: LocalTime
  date?: LocalDate
}

// Weekly needs at most 7 days; the extra slack covers a start one day early.
const MAX_DAY_SCAN = 14

// ============================================================================
// Validation
// ============================================================================

export function validateRecurrence(recurrence: Recurrence): void {
  switch (recurrence.type) {
    case 'none':
    case 'daily':
      return
    case 'weekly':
      if (recurrence.days.length === 0) {
        throw new InvalidRecurrenceError('Weekly recurrence needs at least one day')
      }
      return
    case 'custom':
      if (!Number.isInteger(recurrence.interval) || recurrence.interval <= 0) {
        throw new InvalidRecurrenceError(
          `Custom interval must be a positive integer, got ${recurrence.interval}`,
        )
      }
      if (!INTERVAL_UNITS.includes(recurrence.unit)) {
        throw new InvalidRecurrenceError(`Unknown interval unit: '${String(recurrence.unit)}'`)
      }
      return
    default:
      return assertNever(recurrence)
  }
}

function assertNever(value: never): never {
  throw new InvalidRecurrenceError(`Unknown recurrence: ${JSON.stringify(value)}`)
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Next fire instant strictly after `after`.
 *
 * Returns null only for a single-shot rule whose one occurrence is not after `after`.
 * Throws InvalidTimezoneError / InvalidRecurrenceError for unusable input.
 */
export function resolve(
  localTime: LocalTimeSpec,
  timezone: string,
  recurrence: Recurrence,
  after: Instant,
): Instant | null {
  assertTimezone(timezone)
  validateRecurrence(recurrence)

  switch (recurrence.type) {
    case 'none':
      return resolveSingle(localTime, timezone, after)
    case 'daily':
      return firstMatchingDay(localTime, timezone, after, () => true)
    case 'weekly': {
      const days = new Set(recurrence.days)
      return firstMatchingDay(localTime, timezone, after, (d) => days.has(dayOfWeek(d)))
    }
    case 'custom':
      return resolveInterval(localTime, timezone, recurrence, after)
    default:
      return assertNever(recurrence)
  }
}

function resolveSingle(localTime: LocalTimeSpec, timezone: string, after: Instant): Instant | null {
  if (localTime.date === undefined) {
    return firstMatchingDay(localTime, timezone, after, () => true)
  }
  const instant = localToInstant(makeDateTime(localTime.date, localTime.time), timezone)
  return instant > after ? instant : null
}

function firstMatchingDay(
  localTime: LocalTimeSpec,
  timezone: string,
  after: Instant,
  matches: (date: LocalDate) => boolean,
): Instant {
  const afterDate = dateOf(instantToLocal(after, timezone))
  const earliest = addDays(afterDate, -1)
  const start = localTime.date !== undefined ? maxDate(localTime.date, earliest) : earliest

  for (let i = 0; i <= MAX_DAY_SCAN; i++) {
    const date = addDays(start, i)
    if (!matches(date)) continue
    const instant = localToInstant(makeDateTime(date, localTime.time), timezone)
    if (instant > after) return instant
  }
  throw new InvalidRecurrenceError(`No occurrence within ${MAX_DAY_SCAN} days of ${afterDate}`)
}

function resolveInterval(
  localTime: LocalTimeSpec,
  timezone: string,
  recurrence: { interval: number; unit: IntervalUnit },
  after: Instant,
): Instant {
  const anchorDate = localTime.date ?? dateOf(instantToLocal(after, timezone))

  if (recurrence.unit === 'minute' || recurrence.unit === 'hour') {
    const stepMs = recurrence.interval * (recurrence.unit === 'hour' ? MS_PER_HOUR : MS_PER_MINUTE)
    const anchor = localToInstant(makeDateTime(anchorDate, localTime.time), timezone)
    if (anchor > after) return anchor
    const steps = Math.floor((after - anchor) / stepMs) + 1
    return toInstant(anchor + steps * stepMs)
  }

  // Calendar units step in local days so the wall-clock time survives DST.
  const stepDays = recurrence.interval * (recurrence.unit === 'week' ? 7 : 1)
  const from = addDays(dateOf(instantToLocal(after, timezone)), -1)
  const elapsed = daysBetween(anchorDate, from)
  let k = elapsed <= 0 ? 0 : Math.ceil(elapsed / stepDays)

  for (let i = 0; i <= MAX_DAY_SCAN; i++, k++) {
    const date = addDays(anchorDate, k * stepDays)
    const instant = localToInstant(makeDateTime(date, localTime.time), timezone)
    if (instant > after) return instant
  }
  throw new InvalidRecurrenceError(`No occurrence found for every ${recurrence.interval} ${recurrence.unit}(s)`)
}

// ============================================================================
// Display
// ============================================================================

/** Local wall-clock reading of an instant, for log lines: 2026-03-08T03:00:00 America/New_York */
export function describeOccurrence(instant: Instant, timezone: string): string {
  return `${instantToLocal(instant, timezone)} ${timezone}`
}

export function describeRecurrence(recurrence: Recurrence): string {
  switch (recurrence.type) {
    case 'none': return 'once'
    case 'daily': return 'daily'
    case 'weekly': return `weekly on ${recurrence.days.join(',')}`
    case 'custom': return `every ${recurrence.interval} ${recurrence.unit}${recurrence.interval === 1 ? '' : 's'}`
    default: return assertNever(recurrence)
  }
}
