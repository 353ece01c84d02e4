/**
 * Shared test fixtures: instants from ISO strings, a hand-driven clock,
 * a silent logger and a sink that records what it was asked to deliver.
 */
import type { Clock, EventId, EventRecord, EventSpec, Instant } from '../../src/types'
import type { Notification, NotificationSink } from '../../src/notification-sink'
import { toInstant, type LocalTime } from '../../src/time-date'
import { createSilentLogger } from '../../src/logger'

export function at(iso: string): Instant {
  const ms = Date.parse(iso)
  if (Number.isNaN(ms)) throw new Error(`bad ISO instant in test: ${iso}`)
  return toInstant(ms)
}

export type ManualClock = Clock & {
  set(iso: string): void
  advance(ms: number): void
}

export function manualClock(startIso: string): ManualClock {
  let current = at(startIso)
  return {
    now: () => current,
    set(iso) { current = at(iso) },
    advance(ms) { current = toInstant(current + ms) },
  }
}

export const silentLogger = createSilentLogger()

export type RecordingSink = NotificationSink & {
  delivered: Notification[]
  attempts: number
  /** Failures to produce before succeeding; Infinity always fails */
  failNext: number
  /** Resolve deliveries only after this many ms (fake timers) */
  latencyMs: number
}

export function recordingSink(): RecordingSink {
  const sink: RecordingSink = {
    delivered: [],
    attempts: 0,
    failNext: 0,
    latencyMs: 0,
    async deliver(notification) {
      sink.attempts++
      if (sink.latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, sink.latencyMs))
      }
      if (sink.failNext > 0) {
        sink.failNext--
        throw new Error('platform unavailable')
      }
      sink.delivered.push(notification)
    },
  }
  return sink
}

export function spec(overrides: Partial<EventSpec> = {}): EventSpec {
  return {
    ownerContext: 'guild:1/channel:2',
    localTime: { time: '09:00' },
    timezone: 'UTC',
    recurrence: { type: 'daily' },
    payload: 'stand-up',
    ...overrides,
  }
}

/** A stored-shape record; daily 09:00 UTC, next fire 2026-10-19 09:00Z. */
export function record(id: string, overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    id: id as EventId,
    ownerContext: 'guild:1/channel:2',
    localTime: { time: '09:00:00' as LocalTime },
    timezone: 'UTC',
    recurrence: { type: 'daily' },
    nextFireUtc: at('2026-10-19T09:00:00Z'),
    payload: 'stand-up',
    version: 1,
    state: 'active',
    createdAt: at('2026-10-18T00:00:00Z'),
    updatedAt: at('2026-10-18T00:00:00Z'),
    lastFiredUtc: null,
    ...overrides,
  }
}
