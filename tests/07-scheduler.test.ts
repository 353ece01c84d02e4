/**
 * Segment 07: Scheduler Loop Tests
 *
 * Driven by Vitest fake timers: waiting and waking, firing exactly once,
 * cancel-wins and stale-version handling, bounded retried delivery, long
 * waits beyond the timer limit, advance alerts, store failures while firing,
 * and draining on stop.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createMockAdapter, type Adapter, type MockAdapter } from '../src/adapter'
import { createFireQueue, type FireQueue } from '../src/fire-queue'
import { createEventRegistry, type EventRegistry } from '../src/event-registry'
import { createScheduler, type FireOutcome, type Scheduler } from '../src/scheduler'
import type { NotificationSink } from '../src/notification-sink'
import { systemClock } from '../src/clock'
import { DeliveryTimeoutError, StoreUnavailableError } from '../src/errors'
import { MS_PER_DAY, MS_PER_MINUTE } from '../src/time-date'
import type { EventId, EventSpec } from '../src/types'
import { at, recordingSink, silentLogger, spec, type RecordingSink } from './helpers/fixtures'

let adapter: MockAdapter
let queue: FireQueue
let registry: EventRegistry
let sink: RecordingSink
let outcomes: FireOutcome[]
let scheduler: Scheduler

function buildScheduler(target: NotificationSink = sink): Scheduler {
  return createScheduler({
    registry,
    queue,
    sink: target,
    clock: systemClock,
    logger: silentLogger,
    deliveryTimeoutMs: 1_000,
    maxDeliveryAttempts: 3,
    retryBackoffMs: 100,
    onFire: (outcome) => { outcomes.push(outcome) },
  })
}

async function created(overrides: Partial<EventSpec> = {}): Promise<EventId> {
  const result = await registry.create(spec(overrides))
  if (!result.ok) throw result.error
  return result.value
}

/** Let pending promise chains run without moving the clock. */
async function settle() {
  for (let i = 0; i < 10; i++) await vi.advanceTimersByTimeAsync(0)
}

beforeEach(async () => {
  vi.useFakeTimers({ now: new Date('2026-10-18T12:00:00Z') })
  adapter = createMockAdapter()
  await adapter.acquireLock()
  queue = createFireQueue()
  registry = createEventRegistry({ adapter, queue, clock: systemClock, logger: silentLogger, maxConflictRetries: 5 })
  sink = recordingSink()
  outcomes = []
  scheduler = buildScheduler()
})

afterEach(async () => {
  await scheduler.stop()
  vi.useRealTimers()
})

// ============================================================================
// 1. WAITING & FIRING
// ============================================================================

describe('Waiting and firing', () => {
  it('is idle with an empty queue', async () => {
    scheduler.start()
    await settle()
    expect(scheduler.getState()).toBe('idle')
  })

  it('fires a due event exactly once and advances it', async () => {
    const id = await created({ localTime: { time: '12:30' } })
    scheduler.start()
    await settle()
    expect(scheduler.getState()).toBe('waiting')

    await vi.advanceTimersByTimeAsync(29 * MS_PER_MINUTE)
    expect(sink.delivered).toHaveLength(0)

    await vi.advanceTimersByTimeAsync(MS_PER_MINUTE)
    await settle()

    expect(sink.delivered).toEqual([{
      eventId: id,
      ownerContext: 'guild:1/channel:2',
      payload: 'stand-up',
      scheduledFor: at('2026-10-18T12:30:00Z'),
    }])
    expect(outcomes).toEqual([{
      id,
      ownerContext: 'guild:1/channel:2',
      scheduledFor: at('2026-10-18T12:30:00Z'),
      status: 'delivered',
      attempts: 1,
    }])
    const stored = await adapter.get(id)
    expect(stored?.version).toBe(2)
    expect(stored?.lastFiredUtc).toBe(at('2026-10-18T12:30:00Z'))
    expect(stored?.nextFireUtc).toBe(at('2026-10-19T12:30:00Z'))
    expect(scheduler.getState()).toBe('waiting')
  })

  it('wakes early when an earlier event is created', async () => {
    await created({ localTime: { time: '18:00' } })
    scheduler.start()
    await settle()

    await created({ localTime: { time: '12:05' }, payload: 'soon' })
    await vi.advanceTimersByTimeAsync(5 * MS_PER_MINUTE)
    await settle()

    expect(sink.delivered.map((n) => n.payload)).toEqual(['soon'])
  })

  it('delivers ahead of the event by the alert lead', async () => {
    registry = createEventRegistry({
      adapter, queue, clock: systemClock, logger: silentLogger, maxConflictRetries: 5, alertLeadMs: 10 * MS_PER_MINUTE,
    })
    scheduler = buildScheduler()
    const id = await created({ localTime: { time: '12:30' } })
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(20 * MS_PER_MINUTE)
    await settle()

    expect(sink.delivered).toEqual([{
      eventId: id,
      ownerContext: 'guild:1/channel:2',
      payload: 'stand-up',
      scheduledFor: at('2026-10-18T12:30:00Z'),
    }])
    expect((await adapter.get(id))?.nextFireUtc).toBe(at('2026-10-19T12:30:00Z'))
    expect(queue.get(id)?.fireAt).toBe(at('2026-10-19T12:20:00Z'))
  })

  it('re-arms waits longer than the timer limit', async () => {
    await created({ localTime: { time: '12:00', date: '2026-11-20' }, recurrence: { type: 'none' } })
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(25 * MS_PER_DAY)
    await settle()
    expect(sink.delivered).toHaveLength(0)

    await vi.advanceTimersByTimeAsync(8 * MS_PER_DAY)
    await settle()
    expect(sink.delivered).toHaveLength(1)
    expect(sink.delivered[0]?.scheduledFor).toBe(at('2026-11-20T12:00:00Z'))
  })
})

// ============================================================================
// 2. CANCEL & MODIFY RACES
// ============================================================================

describe('Races with mutations', () => {
  it('a cancelled event never fires', async () => {
    const id = await created({ localTime: { time: '12:30' } })
    scheduler.start()
    await settle()
    await registry.cancel(id)
    await vi.advanceTimersByTimeAsync(60 * MS_PER_MINUTE)
    await settle()
    expect(sink.delivered).toHaveLength(0)
  })

  it('cancel wins over an already-popped fire decision', async () => {
    await created({ localTime: { time: '12:30' }, payload: 'A' })
    const b = await created({ localTime: { time: '12:30' }, payload: 'B' })
    sink.latencyMs = 500
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    // A is being delivered; B has been popped and waits its turn.
    await registry.cancel(b)
    await vi.advanceTimersByTimeAsync(1_000)
    await settle()

    expect(sink.delivered.map((n) => n.payload)).toEqual(['A'])
    expect((await adapter.get(b))?.state).toBe('cancelled')
  })

  it('a payload edit during delivery does not fire a single-shot event twice', async () => {
    const id = await created({ localTime: { time: '12:30' }, recurrence: { type: 'none' } })
    sink.latencyMs = 500
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    const edited = await registry.modify(id, { payload: 'edited' })
    expect(edited.ok).toBe(true)

    await vi.advanceTimersByTimeAsync(MS_PER_DAY)
    await settle()

    expect(sink.delivered.map((n) => n.scheduledFor)).toEqual([at('2026-10-18T12:30:00Z')])
    expect(await adapter.get(id)).toMatchObject({
      state: 'completed', version: 3, payload: 'edited', lastFiredUtc: at('2026-10-18T12:30:00Z'),
    })
  })

  it('a fire decided on an old version is re-queued at the new time', async () => {
    await created({ localTime: { time: '12:30' }, payload: 'A' })
    const b = await created({ localTime: { time: '12:30' }, payload: 'B' })
    sink.latencyMs = 500
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    await registry.modify(b, { localTime: { time: '13:00' } })
    await vi.advanceTimersByTimeAsync(1_000)
    await settle()
    expect(sink.delivered.map((n) => n.payload)).toEqual(['A'])

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    await settle()
    expect(sink.delivered.map((n) => n.payload)).toEqual(['A', 'B'])
    expect(sink.delivered[1]?.scheduledFor).toBe(at('2026-10-18T13:00:00Z'))
  })
})

// ============================================================================
// 3. DELIVERY
// ============================================================================

describe('Delivery', () => {
  it('retries with exponential backoff until it succeeds', async () => {
    await created({ localTime: { time: '12:30' } })
    sink.failNext = 2
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    await settle()
    expect(sink.attempts).toBe(1)

    await vi.advanceTimersByTimeAsync(100)
    await settle()
    expect(sink.attempts).toBe(2)

    await vi.advanceTimersByTimeAsync(200)
    await settle()
    expect(sink.attempts).toBe(3)
    expect(sink.delivered).toHaveLength(1)
    expect(outcomes[0]).toMatchObject({ status: 'delivered', attempts: 3 })
  })

  it('advances the event after exhausting attempts', async () => {
    const id = await created({ localTime: { time: '12:30' } })
    sink.failNext = Infinity
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE + 300)
    await settle()

    expect(sink.attempts).toBe(3)
    expect(outcomes[0]).toMatchObject({ status: 'failed', attempts: 3 })
    expect(outcomes[0]?.error?.message).toBe('platform unavailable')
    expect((await adapter.get(id))?.nextFireUtc).toBe(at('2026-10-19T12:30:00Z'))
  })

  it('bounds each attempt by the delivery timeout and aborts it', async () => {
    let aborts = 0
    const hanging: NotificationSink = {
      deliver: (_notification, signal) => new Promise<void>((_resolve, reject) => {
        signal.addEventListener('abort', () => {
          aborts++
          reject(new Error('aborted'))
        })
      }),
    }
    scheduler = buildScheduler(hanging)
    await created({ localTime: { time: '12:30' } })
    scheduler.start()
    await settle()

    // three 1s timeouts plus 100ms and 200ms backoff
    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE + 3_300)
    await settle()

    expect(aborts).toBe(3)
    expect(outcomes).toHaveLength(1)
    expect(outcomes[0]?.status).toBe('failed')
    expect(outcomes[0]?.error).toBeInstanceOf(DeliveryTimeoutError)
  })
})

// ============================================================================
// 4. STORE FAILURES
// ============================================================================

describe('Store failures while firing', () => {
  it('retries the advance after a failed write and keeps the event firing', async () => {
    let failingPuts = 0
    const flaky: Adapter = {
      ...adapter,
      put: async (record, expectedVersion) => {
        if (failingPuts > 0) {
          failingPuts--
          throw new StoreUnavailableError('disk I/O error')
        }
        return adapter.put(record, expectedVersion)
      },
    }
    registry = createEventRegistry({ adapter: flaky, queue, clock: systemClock, logger: silentLogger, maxConflictRetries: 5 })
    scheduler = buildScheduler()
    const id = await created({ localTime: { time: '12:30' } })
    scheduler.start()
    await settle()

    failingPuts = 1
    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    await settle()
    expect(sink.delivered).toHaveLength(1)
    expect((await adapter.get(id))?.version).toBe(1)

    // first retry after retryBackoffMs
    await vi.advanceTimersByTimeAsync(100)
    await settle()
    expect((await adapter.get(id))?.nextFireUtc).toBe(at('2026-10-19T12:30:00Z'))

    await vi.advanceTimersByTimeAsync(3 * MS_PER_DAY)
    await settle()
    expect(sink.delivered.map((n) => n.scheduledFor)).toEqual([
      at('2026-10-18T12:30:00Z'),
      at('2026-10-19T12:30:00Z'),
      at('2026-10-20T12:30:00Z'),
      at('2026-10-21T12:30:00Z'),
    ])
  })
})

// ============================================================================
// 5. SHUTDOWN
// ============================================================================

describe('Draining', () => {
  it('finishes the in-flight delivery, persists it, and fires nothing more', async () => {
    const a = await created({ localTime: { time: '12:30' }, payload: 'A' })
    const b = await created({ localTime: { time: '12:30' }, payload: 'B' })
    sink.latencyMs = 500
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    const stopped = scheduler.stop()
    expect(scheduler.getState()).toBe('draining')

    await vi.advanceTimersByTimeAsync(500)
    await stopped

    expect(scheduler.getState()).toBe('stopped')
    expect(sink.delivered.map((n) => n.payload)).toEqual(['A'])
    expect((await adapter.get(a))?.version).toBe(2)
    expect((await adapter.get(b))?.version).toBe(1)
    expect(queue.has(b)).toBe(true)
  })

  it('a stop during retry backoff leaves the occurrence for recovery', async () => {
    const id = await created({ localTime: { time: '12:30' } })
    sink.failNext = 1
    scheduler.start()
    await settle()

    await vi.advanceTimersByTimeAsync(30 * MS_PER_MINUTE)
    await settle()
    expect(sink.attempts).toBe(1)

    await scheduler.stop()

    expect(scheduler.getState()).toBe('stopped')
    expect(sink.attempts).toBe(1)
    expect(sink.delivered).toEqual([])
    expect(outcomes).toEqual([])
    expect(await adapter.get(id)).toMatchObject({ version: 1, nextFireUtc: at('2026-10-18T12:30:00Z') })
  })

  it('stopping an idle scheduler ends in stopped', async () => {
    scheduler.start()
    await settle()
    await scheduler.stop()
    expect(scheduler.getState()).toBe('stopped')
  })

  it('stop before start is a no-op', async () => {
    await scheduler.stop()
    expect(scheduler.getState()).toBe('stopped')
  })
})
