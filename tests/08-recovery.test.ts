/**
 * Segment 08: Recovery Tests
 *
 * Startup reconciliation of persisted records against the current time:
 * future fires, catch-up within the grace window, skipping stale occurrences,
 * corrupt rows and the single-instance lock.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { createMockAdapter, type MockAdapter } from '../src/adapter'
import { createFireQueue, type FireQueue } from '../src/fire-queue'
import { createEventRegistry, type EventRegistry } from '../src/event-registry'
import { recover } from '../src/recovery'
import { AlreadyRunningError } from '../src/errors'
import { MS_PER_MINUTE } from '../src/time-date'
import type { LocalDate } from '../src/types'
import { at, manualClock, record, silentLogger, type ManualClock } from './helpers/fixtures'

let adapter: MockAdapter
let queue: FireQueue
let clock: ManualClock
let registry: EventRegistry

function run() {
  return recover({ adapter, registry, clock, logger: silentLogger, graceWindowMs: 5 * MS_PER_MINUTE })
}

const singleShot = (id: string) => record(id, {
  recurrence: { type: 'none' },
  localTime: { ...record(id).localTime, date: '2026-10-19' as LocalDate },
})

beforeEach(async () => {
  adapter = createMockAdapter()
  await adapter.acquireLock()
  queue = createFireQueue()
  clock = manualClock('2026-10-18T12:00:00Z')
  registry = createEventRegistry({ adapter, queue, clock, logger: silentLogger, maxConflictRetries: 5 })
})

describe('recover', () => {
  it('queues future fires unchanged', async () => {
    await adapter.put(record('a'), 0)
    const report = await run()
    expect(report).toEqual({ scheduled: 1, catchUp: 0, skipped: 0, completed: 0, corrupt: 0 })
    expect(queue.get('a')).toEqual({ id: 'a', fireAt: at('2026-10-19T09:00:00Z'), version: 1 })
    expect(await adapter.get('a')).toEqual(record('a'))
  })

  it('keeps a fire missed by one minute at its original instant', async () => {
    await adapter.put(record('a'), 0)
    clock.set('2026-10-19T09:01:00Z')
    const report = await run()
    expect(report.catchUp).toBe(1)
    expect(queue.popDue(clock.now()).map((e) => e.id)).toEqual(['a'])
  })

  it('treats exactly the grace window as still catchable', async () => {
    await adapter.put(record('a'), 0)
    clock.set('2026-10-19T09:05:00Z')
    expect((await run()).catchUp).toBe(1)
  })

  it('skips occurrences missed ten days ago to the next future one', async () => {
    await adapter.put(record('a'), 0)
    clock.set('2026-10-29T12:00:00Z')
    const report = await run()
    expect(report).toEqual({ scheduled: 0, catchUp: 0, skipped: 1, completed: 0, corrupt: 0 })

    const stored = await adapter.get('a')
    expect(stored?.nextFireUtc).toBe(at('2026-10-30T09:00:00Z'))
    expect(stored?.version).toBe(2)
    expect(stored?.lastFiredUtc).toBeNull()
    expect(queue.get('a')?.fireAt).toBe(at('2026-10-30T09:00:00Z'))
    expect(queue.popDue(clock.now())).toEqual([])
  })

  it('completes a stale single-shot event without firing it', async () => {
    await adapter.put(singleShot('s'), 0)
    clock.set('2026-10-29T12:00:00Z')
    const report = await run()
    expect(report.completed).toBe(1)
    expect(queue.has('s')).toBe(false)
    expect(await adapter.get('s')).toMatchObject({ state: 'completed', nextFireUtc: null, version: 2 })
  })

  it('counts corrupt rows and recovers the rest', async () => {
    await adapter.put(record('good'), 0)
    adapter.injectRaw('bad', '{not json')
    const report = await run()
    expect(report.corrupt).toBe(1)
    expect(report.scheduled).toBe(1)
    expect(queue.has('bad')).toBe(false)
  })

  it('ignores cancelled and completed records', async () => {
    await adapter.put(record('c', { state: 'cancelled', nextFireUtc: null }), 0)
    await adapter.put(record('d', { state: 'completed', nextFireUtc: null }), 0)
    expect(await run()).toEqual({ scheduled: 0, catchUp: 0, skipped: 0, completed: 0, corrupt: 0 })
    expect(queue.size()).toBe(0)
  })

  it('refuses to run while another instance holds the store', async () => {
    const other = createMockAdapter(adapter.backing)
    await expect(
      recover({ adapter: other, registry, clock, logger: silentLogger, graceWindowMs: 0 }),
    ).rejects.toThrow(AlreadyRunningError)
  })
})
