/**
 * Scheduler Loop
 *
 * Single async loop that sleeps until the earliest queued fire, wakes early
 * whenever the registry reports a change, and fires everything that is due.
 *
 *   idle ──(queue non-empty)──▶ waiting ──(deadline | wake)──▶ firing
 *     ▲                            │                             │
 *     └────────────(queue empty)───┴──────────────◀──────────────┘
 *   stop(): any state ──▶ draining ──(in-flight delivery persisted)──▶ stopped
 *
 * A fire decision is re-checked against the registry right before delivery:
 * a record that was cancelled since it was queued is skipped, and one that was
 * modified is re-queued from its current version instead of firing.
 *
 * A store failure while firing never drops the event: the advance (or the
 * queue entry) is retried with capped backoff. A delivery cut short by stop()
 * is not advanced, so the next startup's recovery decides what to do with it.
 */

import type { EventRegistry } from './event-registry'
import type { FireEntry, FireQueue } from './fire-queue'
import type { Logger } from './logger'
import type { Notification, NotificationSink } from './notification-sink'
import type { Clock, EventId, EventRecord, Instant } from './types'
import { describeOccurrence } from './time-resolver'
import { DeliveryError, DeliveryTimeoutError, StoreUnavailableError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type SchedulerState = 'idle' | 'waiting' | 'firing' | 'draining' | 'stopped'

export type FireOutcome = {
  id: EventId
  ownerContext: string
  scheduledFor: Instant
  status: 'delivered' | 'failed'
  attempts: number
  error?: Error
}

export type SchedulerDeps = {
  registry: EventRegistry
  queue: FireQueue
  sink: NotificationSink
  clock: Clock
  logger: Logger
  deliveryTimeoutMs: number
  maxDeliveryAttempts: number
  /** First retry delay; doubles on each further attempt */
  retryBackoffMs: number
  onFire?: (outcome: FireOutcome) => void
}

export type Scheduler = {
  start(): void
  /** Let the in-flight delivery finish, fire nothing further, then stop. */
  stop(): Promise<void>
  /** Interrupt the current wait and re-read the queue. */
  wake(): void
  getState(): SchedulerState
}

/** setTimeout stores its delay in a signed 32-bit int; longer waits are re-armed. */
export const MAX_SET_TIMEOUT = 2_147_483_647

/** Ceiling for the backoff between retries after a store failure. */
export const MAX_STORE_RETRY_MS = 60_000

// ============================================================================
// Helpers
// ============================================================================

function toError(e: unknown): Error {
  if (e instanceof Error) return e
  return new DeliveryError(`Delivery failed: ${String(e)}`)
}

/** Resolves after ms, or as soon as signal aborts. */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(done, ms)
    function done() {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    signal.addEventListener('abort', done)
  })
}

async function withTimeout<T>(work: Promise<T>, ms: number, controller: AbortController): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // reject before aborting so the timeout wins the race
      reject(new DeliveryTimeoutError(ms))
      controller.abort()
    }, ms)
  })
  try {
    return await Promise.race([work, timeout])
  } finally {
    clearTimeout(timer)
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScheduler(deps: SchedulerDeps): Scheduler {
  const {
    registry, queue, sink, clock, logger,
    deliveryTimeoutMs, maxDeliveryAttempts, retryBackoffMs, onFire,
  } = deps

  let state: SchedulerState = 'idle'
  let running: Promise<void> | null = null
  let stopping = false
  let drainError: Error | null = null
  let unsubscribe: (() => void) | null = null

  let wakeUp: (() => void) | null = null
  let pendingWake = false

  let stopSignal = new AbortController()
  const retryTimers = new Set<ReturnType<typeof setTimeout>>()
  const retrying = new Set<Promise<void>>()

  // ========== Wait ==========

  function sleep(ms: number | null): Promise<void> {
    if (pendingWake) {
      pendingWake = false
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      const timer = ms === null ? null : setTimeout(done, Math.min(Math.max(ms, 0), MAX_SET_TIMEOUT))
      function done() {
        if (timer !== null) clearTimeout(timer)
        wakeUp = null
        resolve()
      }
      wakeUp = done
    })
  }

  function wake() {
    if (wakeUp) wakeUp()
    else pendingWake = true
  }

  // ========== Delivery ==========

  /** null when stop() cut the attempts short. */
  async function deliver(record: EventRecord, scheduledFor: Instant): Promise<FireOutcome | null> {
    const notification: Notification = {
      eventId: record.id,
      ownerContext: record.ownerContext,
      payload: record.payload,
      scheduledFor,
    }
    let lastError: Error | undefined

    for (let attempt = 1; attempt <= maxDeliveryAttempts; attempt++) {
      const controller = new AbortController()
      try {
        await withTimeout(sink.deliver(notification, controller.signal), deliveryTimeoutMs, controller)
        return { id: record.id, ownerContext: record.ownerContext, scheduledFor, status: 'delivered', attempts: attempt }
      } catch (e) {
        lastError = toError(e)
        logger.warn({ id: record.id, attempt, err: lastError }, 'Delivery attempt failed')
        if (attempt === maxDeliveryAttempts) break
        if (stopping) return null
        await delay(retryBackoffMs * 2 ** (attempt - 1), stopSignal.signal)
        if (stopping) return null
      }
    }

    return {
      id: record.id, ownerContext: record.ownerContext, scheduledFor,
      status: 'failed', attempts: maxDeliveryAttempts, error: lastError,
    }
  }

  // ========== Firing ==========

  function retryLater(attempt: number, task: () => Promise<void>) {
    const ms = Math.min(Math.max(retryBackoffMs, 1) * 2 ** attempt, MAX_STORE_RETRY_MS)
    const timer = setTimeout(() => {
      retryTimers.delete(timer)
      const run = task().catch((e: unknown) => {
        logger.error({ err: e }, 'Store retry failed')
      })
      retrying.add(run)
      void run.finally(() => retrying.delete(run))
    }, ms)
    retryTimers.add(timer)
  }

  /** Persist the fire; on a store failure keep retrying until it lands or stop() runs. */
  async function advance(record: EventRecord, scheduledFor: Instant, attempt: number): Promise<void> {
    try {
      const advanced = await registry.recordFire(record, scheduledFor)
      if (!advanced.ok) {
        logger.info({ id: record.id, reason: advanced.error.code }, 'Event changed during delivery; keeping newer state')
      }
    } catch (e) {
      const err = toError(e)
      if (stopping) {
        logger.error({ id: record.id, err }, 'Could not record fire while draining')
        if (err instanceof StoreUnavailableError) drainError = err
        return
      }
      logger.error({ id: record.id, attempt, err }, 'Could not record fire, retrying')
      retryLater(attempt, () => advance(record, scheduledFor, attempt + 1))
    }
  }

  async function fireOne(entry: FireEntry) {
    const record = await registry.get(entry.id)
    if (!record || record.state !== 'active' || record.nextFireUtc === null) {
      logger.debug({ id: entry.id }, 'Skipping fire for inactive event')
      return
    }
    if (record.version !== entry.version) {
      logger.debug({ id: entry.id, queued: entry.version, current: record.version }, 'Stale fire decision, re-queueing')
      registry.requeue(entry.id)
      return
    }

    const scheduledFor = record.nextFireUtc
    const outcome = await deliver(record, scheduledFor)
    if (outcome === null) {
      logger.warn({ id: record.id }, 'Delivery interrupted by shutdown; left for recovery')
      return
    }
    if (outcome.status === 'failed') {
      logger.error(
        { id: record.id, attempts: outcome.attempts, err: outcome.error },
        'Delivery failed after all attempts, advancing event',
      )
    } else {
      logger.info({ id: record.id, at: describeOccurrence(scheduledFor, record.timezone) }, 'Event fired')
    }

    await advance(record, scheduledFor, 0)
    onFire?.(outcome)
  }

  async function fireDue(now: Instant) {
    const due = queue.popDue(now)
    for (let i = 0; i < due.length; i++) {
      const entry = due[i]
      if (!entry) continue
      if (stopping) {
        // Not fired; they stay active in the store and are picked up on the next start.
        for (const rest of due.slice(i)) queue.push(rest)
        return
      }
      try {
        await fireOne(entry)
      } catch (e) {
        const err = toError(e)
        logger.error({ id: entry.id, err }, 'Fire failed')
        if (stopping) {
          if (err instanceof StoreUnavailableError) drainError = err
        } else {
          retryLater(0, async () => {
            if (!registry.requeue(entry.id)) {
              queue.push(entry)
              wake()
            }
          })
        }
      }
    }
  }

  // ========== Loop ==========

  async function run() {
    while (!stopping) {
      const next = queue.peek()
      const now = clock.now()
      if (next && next.fireAt <= now) {
        state = 'firing'
        await fireDue(now)
        continue
      }
      state = next ? 'waiting' : 'idle'
      await sleep(next ? next.fireAt - now : null)
    }
  }

  function start() {
    if (running) return
    stopping = false
    drainError = null
    pendingWake = false
    stopSignal = new AbortController()
    unsubscribe = registry.onChanged(wake)
    logger.info({ queued: queue.size() }, 'Scheduler started')
    running = run().catch((e: unknown) => {
      logger.fatal({ err: e }, 'Scheduler loop crashed')
      drainError = toError(e)
    })
  }

  async function stop() {
    if (!running) {
      state = 'stopped'
      return
    }
    stopping = true
    state = 'draining'
    stopSignal.abort()
    for (const timer of retryTimers) clearTimeout(timer)
    retryTimers.clear()
    wake()
    await running
    await Promise.all([...retrying])
    running = null
    unsubscribe?.()
    unsubscribe = null
    state = 'stopped'
    logger.info('Scheduler stopped')
    if (drainError) throw drainError
  }

  return {
    start,
    stop,
    wake,
    getState: () => state,
  }
}
