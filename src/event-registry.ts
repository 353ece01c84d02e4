/**
 * Event Registry
 *
 * Authoritative in-memory map of event records, written ahead through the
 * store adapter. Every mutation follows the same order:
 *
 *   compute next record -> adapter.put (compare-and-set) -> cache -> fire queue -> notify
 *
 * so the scheduler never acts on a change that is not yet durable. A lost
 * compare-and-set means another writer got there first: the record is re-read
 * from the store and the mutation is applied again.
 */

import type { Adapter } from './adapter'
import type { FireQueue } from './fire-queue'
import type { Logger } from './logger'
import type {
  Clock, EventId, EventMutation, EventRecord, EventSpec, Instant, LocalTimeInput, LocalTimeSpec,
  Recurrence,
} from './types'
import { assertTimezone, dateOf, instantToLocal, parseDate, parseTime, toInstant } from './time-date'
import { describeOccurrence, resolve, validateRecurrence } from './time-resolver'
import { CorruptRecordError, NotFoundError, ValidationError, VersionConflictError } from './errors'
import { type Result, Ok, Err } from './result'

// ============================================================================
// Types
// ============================================================================

export type EventRegistryDeps = {
  adapter: Adapter
  queue: FireQueue
  clock: Clock
  logger: Logger
  /** Re-read and re-apply attempts after a lost compare-and-set */
  maxConflictRetries: number
  /** Queue each fire this long before the event's own time. Default 0. */
  alertLeadMs?: number
}

export type ModifyError = NotFoundError | ValidationError | VersionConflictError
export type CancelError = NotFoundError | VersionConflictError

export type ListOptions = {
  /** Include cancelled and completed records still held by the store */
  includeInactive?: boolean
}

export type EventRegistry = {
  create(spec: EventSpec): Promise<Result<EventId, ValidationError>>
  modify(id: string, mutation: EventMutation): Promise<Result<EventRecord, ModifyError>>
  cancel(id: string): Promise<Result<void, CancelError>>
  get(id: string): Promise<EventRecord | null>
  list(ownerContext: string, options?: ListOptions): Promise<EventRecord[]>
  /** Active records, earliest fire first */
  snapshot(): EventRecord[]

  /** Hydrate a record read from the store; does not write. */
  load(record: EventRecord): void
  /** Re-queue an active record from its cached state. */
  requeue(id: string): boolean
  /**
   * Advance (or complete) a record after `fired` went out for `scheduledFor`.
   * A newer version with the same schedule (say, an edited payload) is advanced
   * the same way; one whose schedule changed is left alone and the call
   * returns a VersionConflictError.
   */
  recordFire(fired: EventRecord, scheduledFor: Instant): Promise<Result<EventRecord, CancelError>>
  /** Delete cancelled/completed records last updated before olderThan. Returns the count. */
  collectGarbage(olderThan: Instant): Promise<number>

  /** Called after every accepted mutation. Returns an unsubscribe function. */
  onChanged(listener: () => void): () => void
}

type Apply<E> = (current: EventRecord, now: Instant) => Result<EventRecord, E>

// ============================================================================
// Pure Helpers
// ============================================================================

function parseLocalTime(input: LocalTimeInput): Result<LocalTimeSpec, ValidationError> {
  const time = parseTime(input.time)
  if (!time.ok) return Err(time.error)
  if (input.date === undefined) return Ok({ time: time.value })
  const date = parseDate(input.date)
  if (!date.ok) return Err(date.error)
  return Ok({ time: time.value, date: date.value })
}

/**
 * Interval rules count occurrences from their first date. Without one the
 * phase would shift on every recomputation, so it is pinned to today.
 */
function pinAnchor(localTime: LocalTimeSpec, timezone: string, recurrence: Recurrence, now: Instant): LocalTimeSpec {
  if (recurrence.type !== 'custom' || localTime.date !== undefined) return localTime
  return { ...localTime, date: dateOf(instantToLocal(now, timezone)) }
}

type ScheduleFields = Pick<EventRecord, 'localTime' | 'timezone' | 'recurrence'>

/** True when both describe the same occurrences. */
export function sameSchedule(a: ScheduleFields, b: ScheduleFields): boolean {
  return a.timezone === b.timezone
    && a.localTime.time === b.localTime.time
    && a.localTime.date === b.localTime.date
    && JSON.stringify(a.recurrence) === JSON.stringify(b.recurrence)
}

type Schedule = {
  localTime: LocalTimeSpec
  timezone: string
  recurrence: Recurrence
  nextFireUtc: Instant
}

function schedule(
  localTime: LocalTimeSpec,
  timezone: string,
  recurrence: Recurrence,
  now: Instant,
): Result<Schedule, ValidationError> {
  try {
    assertTimezone(timezone)
    validateRecurrence(recurrence)
    const pinned = pinAnchor(localTime, timezone, recurrence, now)
    const next = resolve(pinned, timezone, recurrence, now)
    if (next === null) {
      const at = pinned.date !== undefined ? `${pinned.date}T${pinned.time}` : pinned.time
      return Err(new ValidationError(`Event time ${at} ${timezone} is not in the future`))
    }
    return Ok({ localTime: pinned, timezone, recurrence, nextFireUtc: next })
  } catch (e) {
    if (e instanceof ValidationError) return Err(e)
    throw e
  }
}

/**
 * Next state of a record whose occurrence has been dealt with (fired or
 * skipped). Single-shot records complete; recurring ones move to the first
 * occurrence after `after`. Throws ValidationError if the rule no longer resolves.
 */
export function advanceRecord(
  record: EventRecord,
  after: Instant,
  now: Instant,
  firedAt: Instant | null,
): EventRecord {
  const base: EventRecord = {
    ...record,
    version: record.version + 1,
    updatedAt: now,
    lastFiredUtc: firedAt ?? record.lastFiredUtc,
  }
  const next = record.recurrence.type === 'none'
    ? null
    : resolve(record.localTime, record.timezone, record.recurrence, after)
  if (next === null) return { ...base, state: 'completed', nextFireUtc: null }
  return { ...base, nextFireUtc: next }
}

// ============================================================================
// Factory
// ============================================================================

export function createEventRegistry(deps: EventRegistryDeps): EventRegistry {
  const { adapter, queue, clock, logger, maxConflictRetries } = deps
  const alertLeadMs = deps.alertLeadMs ?? 0

  const records = new Map<string, EventRecord>()
  const listeners = new Set<() => void>()

  // ========== Cache ==========

  /** Returns false when the cache already holds a newer version. */
  function install(record: EventRecord): boolean {
    const cached = records.get(record.id)
    if (cached && cached.version >= record.version) return false
    records.set(record.id, record)
    if (record.state === 'active' && record.nextFireUtc !== null) {
      queue.push(fireEntry(record, record.nextFireUtc))
    } else {
      queue.remove(record.id)
    }
    return true
  }

  function fireEntry(record: EventRecord, nextFireUtc: Instant) {
    return { id: record.id, fireAt: toInstant(nextFireUtc - alertLeadMs), version: record.version }
  }

  function notify() {
    for (const listener of listeners) {
      try {
        listener()
      } catch (e) {
        logger.error({ err: e }, 'Change listener threw')
      }
    }
  }

  async function readStore(id: string): Promise<EventRecord | null> {
    try {
      return await adapter.get(id)
    } catch (e) {
      if (e instanceof CorruptRecordError) {
        logger.warn({ id, err: e }, 'Ignoring corrupt record')
        return null
      }
      throw e
    }
  }

  // ========== Write Path ==========

  async function mutate<E>(id: string, apply: Apply<E>): Promise<Result<EventRecord, E | CancelError>> {
    let current = records.get(id) ?? await readStore(id)
    let conflict: VersionConflictError | null = null

    for (let attempt = 0; attempt <= maxConflictRetries; attempt++) {
      if (!current || current.state !== 'active') {
        return Err(new NotFoundError(`Event '${id}' not found`))
      }
      const next = apply(current, clock.now())
      if (!next.ok) return next

      const written = await adapter.put(next.value, current.version)
      if (written.ok) {
        install(next.value)
        notify()
        return Ok(next.value)
      }

      conflict = written.error
      logger.debug({ id, attempt, expected: conflict.expectedVersion, actual: conflict.actualVersion }, 'Version conflict, retrying')
      current = await readStore(id)
      if (current) install(current)
    }

    return Err(conflict ?? new VersionConflictError(id, -1, -1))
  }

  // ========== Operations ==========

  async function create(spec: EventSpec): Promise<Result<EventId, ValidationError>> {
    if (spec.ownerContext.trim() === '') {
      return Err(new ValidationError('Owner context must not be empty'))
    }
    const localTime = parseLocalTime(spec.localTime)
    if (!localTime.ok) return localTime

    const now = clock.now()
    const planned = schedule(localTime.value, spec.timezone, spec.recurrence, now)
    if (!planned.ok) return planned

    // UUIDs are branded here, where they are minted.
    const id = crypto.randomUUID() as EventId
    const record: EventRecord = {
      id,
      ownerContext: spec.ownerContext,
      ...planned.value,
      payload: spec.payload,
      version: 1,
      state: 'active',
      createdAt: now,
      updatedAt: now,
      lastFiredUtc: null,
    }

    const written = await adapter.put(record, 0)
    if (!written.ok) throw written.error
    install(record)
    notify()
    logger.info(
      { id, ownerContext: record.ownerContext, fireAt: describeOccurrence(planned.value.nextFireUtc, spec.timezone) },
      'Event created',
    )
    return Ok(id)
  }

  async function modify(id: string, mutation: EventMutation): Promise<Result<EventRecord, ModifyError>> {
    let parsedTime: LocalTimeSpec | null = null
    if (mutation.localTime !== undefined) {
      const parsed = parseLocalTime(mutation.localTime)
      if (!parsed.ok) return parsed
      parsedTime = parsed.value
    }

    const result = await mutate<ValidationError>(id, (current, now) => {
      const requested = {
        localTime: parsedTime ?? current.localTime,
        timezone: mutation.timezone ?? current.timezone,
        recurrence: mutation.recurrence ?? current.recurrence,
      }
      const edited = {
        payload: mutation.payload ?? current.payload,
        version: current.version + 1,
        updatedAt: now,
      }
      // Same occurrences: keep the pending fire, even one being delivered right now.
      if (sameSchedule(requested, current)) return Ok({ ...current, ...edited })

      const planned = schedule(requested.localTime, requested.timezone, requested.recurrence, now)
      if (!planned.ok) return planned
      const modified: EventRecord = { ...current, ...planned.value, ...edited }
      return Ok(modified)
    })
    if (result.ok) {
      logger.info({ id, version: result.value.version }, 'Event modified')
    }
    return result
  }

  async function cancel(id: string): Promise<Result<void, CancelError>> {
    const result = await mutate<never>(id, (current, now) => {
      const cancelled: EventRecord = {
        ...current,
        state: 'cancelled',
        nextFireUtc: null,
        version: current.version + 1,
        updatedAt: now,
      }
      return Ok(cancelled)
    })
    if (!result.ok) return result
    logger.info({ id }, 'Event cancelled')
    return Ok(undefined)
  }

  async function recordFire(fired: EventRecord, scheduledFor: Instant): Promise<Result<EventRecord, CancelError>> {
    const id = fired.id
    return mutate<VersionConflictError>(id, (current, now) => {
      if (current.version !== fired.version && !sameSchedule(current, fired)) {
        return Err(new VersionConflictError(id, fired.version, current.version))
      }
      const after = toInstant(Math.max(scheduledFor, now))
      try {
        return Ok(advanceRecord(current, after, now, scheduledFor))
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e
        logger.error({ id, err: e }, 'Recurrence no longer resolves, completing event')
        const completed: EventRecord = {
          ...current,
          state: 'completed',
          nextFireUtc: null,
          version: current.version + 1,
          updatedAt: now,
          lastFiredUtc: scheduledFor,
        }
        return Ok(completed)
      }
    })
  }

  async function get(id: string): Promise<EventRecord | null> {
    return records.get(id) ?? await readStore(id)
  }

  async function list(ownerContext: string, options: ListOptions = {}): Promise<EventRecord[]> {
    if (options.includeInactive) {
      const stored = await adapter.listByOwner(ownerContext)
      return stored.map((r) => {
        const cached = records.get(r.id)
        return cached && cached.version > r.version ? cached : r
      })
    }
    return snapshot().filter((r) => r.ownerContext === ownerContext)
  }

  function snapshot(): EventRecord[] {
    return [...records.values()]
      .filter((r) => r.state === 'active')
      .sort((a, b) => (a.nextFireUtc ?? 0) - (b.nextFireUtc ?? 0))
  }

  function load(record: EventRecord) {
    if (install(record)) notify()
  }

  function requeue(id: string): boolean {
    const record = records.get(id)
    if (!record || record.state !== 'active' || record.nextFireUtc === null) return false
    queue.push(fireEntry(record, record.nextFireUtc))
    notify()
    return true
  }

  async function collectGarbage(olderThan: Instant): Promise<number> {
    const ids = await adapter.listExpired(olderThan)
    if (ids.length === 0) return 0
    // One synchronous batch: no concurrent create or modify can interleave with it.
    const removed = await adapter.deleteMany(ids)
    for (const id of ids) {
      const cached = records.get(id)
      if (cached && cached.state !== 'active') records.delete(id)
    }
    logger.info({ count: removed }, 'Expired events removed')
    return removed
  }

  function onChanged(listener: () => void) {
    listeners.add(listener)
    return () => { listeners.delete(listener) }
  }

  return {
    create,
    modify,
    cancel,
    get,
    list,
    snapshot,
    load,
    requeue,
    recordFire,
    collectGarbage,
    onChanged,
  }
}
