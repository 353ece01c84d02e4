/**
 * Public API Module
 *
 * Consumer-facing engine that ties the components together: the command
 * gateway calls create/modify/cancel/list, the host process calls
 * start/shutdown, and observers subscribe to fire outcomes.
 */

import type { Adapter } from './adapter'
import type { NotificationSink } from './notification-sink'
import type { Clock, EventId, EventMutation, EventRecord, EventSpec } from './types'
import { createFireQueue } from './fire-queue'
import { type CancelError, type ListOptions, type ModifyError, createEventRegistry } from './event-registry'
import { type FireOutcome, type SchedulerState, createScheduler } from './scheduler'
import { type RecoveryReport, recover } from './recovery'
import { type Logger, createLogger } from './logger'
import { systemClock } from './clock'
import { toInstant, MS_PER_DAY, MS_PER_HOUR } from './time-date'
import { StoreUnavailableError, type ValidationError } from './errors'
import { type Result, Ok } from './result'

// ============================================================================
// Types
// ============================================================================

export type NotificationEngineConfig = {
  adapter: Adapter
  sink: NotificationSink
  clock?: Clock
  logger?: Logger
  graceWindowMs?: number
  deliveryTimeoutMs?: number
  maxDeliveryAttempts?: number
  retryBackoffMs?: number
  maxConflictRetries?: number
  /** How long cancelled/completed records are kept before garbage collection */
  retentionMs?: number
  gcIntervalMs?: number
  /** Deliver each notification this long before the event's time (an advance alert). 0 fires on time. */
  alertLeadMs?: number
  /** Run recovery and accept commands, but never fire */
  disableScheduler?: boolean
}

export const ENGINE_DEFAULTS = {
  graceWindowMs: 5 * 60_000,
  deliveryTimeoutMs: 10_000,
  maxDeliveryAttempts: 3,
  retryBackoffMs: 1_000,
  maxConflictRetries: 5,
  retentionMs: 7 * MS_PER_DAY,
  gcIntervalMs: MS_PER_HOUR,
  alertLeadMs: 0,
} as const

export type EngineEvents = {
  fired: [outcome: FireOutcome]
  deliveryFailed: [outcome: FireOutcome]
  recovered: [report: RecoveryReport]
}

export type NotificationEngine = {
  /** Lock the store, recover pending events and start firing. */
  start(): Promise<RecoveryReport>
  /** Drain the scheduler and release the store lock. */
  shutdown(): Promise<void>

  create(spec: EventSpec): Promise<Result<EventId, ValidationError>>
  modify(id: string, mutation: EventMutation): Promise<Result<EventRecord, ModifyError>>
  cancel(id: string): Promise<Result<void, CancelError>>
  get(id: string): Promise<EventRecord | null>
  list(ownerContext: string, options?: ListOptions): Promise<EventRecord[]>
  pending(): EventRecord[]

  collectGarbage(): Promise<number>
  getSchedulerState(): SchedulerState
  on<K extends keyof EngineEvents>(event: K, handler: (...args: EngineEvents[K]) => void): () => void
}

/** Copy handed to callers, so editing it cannot touch the registry's cache. */
function detach(record: EventRecord): EventRecord {
  return {
    ...record,
    localTime: { ...record.localTime },
    recurrence: record.recurrence.type === 'weekly'
      ? { type: 'weekly', days: [...record.recurrence.days] }
      : { ...record.recurrence },
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createNotificationEngine(config: NotificationEngineConfig): NotificationEngine {
  const { adapter, sink } = config
  const clock = config.clock ?? systemClock
  const logger = config.logger ?? createLogger('notification-engine')
  const settings = {
    graceWindowMs: config.graceWindowMs ?? ENGINE_DEFAULTS.graceWindowMs,
    deliveryTimeoutMs: config.deliveryTimeoutMs ?? ENGINE_DEFAULTS.deliveryTimeoutMs,
    maxDeliveryAttempts: config.maxDeliveryAttempts ?? ENGINE_DEFAULTS.maxDeliveryAttempts,
    retryBackoffMs: config.retryBackoffMs ?? ENGINE_DEFAULTS.retryBackoffMs,
    maxConflictRetries: config.maxConflictRetries ?? ENGINE_DEFAULTS.maxConflictRetries,
    retentionMs: config.retentionMs ?? ENGINE_DEFAULTS.retentionMs,
    gcIntervalMs: config.gcIntervalMs ?? ENGINE_DEFAULTS.gcIntervalMs,
    alertLeadMs: config.alertLeadMs ?? ENGINE_DEFAULTS.alertLeadMs,
  }

  const queue = createFireQueue()
  const registry = createEventRegistry({
    adapter,
    queue,
    clock,
    logger: logger.child({ component: 'registry' }),
    maxConflictRetries: settings.maxConflictRetries,
    alertLeadMs: settings.alertLeadMs,
  })
  const scheduler = createScheduler({
    registry,
    queue,
    sink,
    clock,
    logger: logger.child({ component: 'scheduler' }),
    deliveryTimeoutMs: settings.deliveryTimeoutMs,
    maxDeliveryAttempts: settings.maxDeliveryAttempts,
    retryBackoffMs: settings.retryBackoffMs,
    onFire: (outcome) => {
      emit(outcome.status === 'delivered' ? 'fired' : 'deliveryFailed', outcome)
    },
  })

  let started = false
  let gcTimer: ReturnType<typeof setInterval> | null = null

  // ========== Events ==========

  const handlers: { [K in keyof EngineEvents]: Set<(...args: EngineEvents[K]) => void> } = {
    fired: new Set(),
    deliveryFailed: new Set(),
    recovered: new Set(),
  }

  function emit<K extends keyof EngineEvents>(event: K, ...args: EngineEvents[K]) {
    const set: Set<(...args: EngineEvents[K]) => void> = handlers[event]
    for (const handler of set) {
      try { handler(...args) } catch (e) { logger.error({ err: e, event }, 'Event handler threw') }
    }
  }

  function on<K extends keyof EngineEvents>(event: K, handler: (...args: EngineEvents[K]) => void) {
    const set: Set<(...args: EngineEvents[K]) => void> = handlers[event]
    set.add(handler)
    return () => { set.delete(handler) }
  }

  // ========== Lifecycle ==========

  function ensureStarted() {
    if (!started) throw new StoreUnavailableError('Engine not started; call start() first')
  }

  async function collectGarbage(): Promise<number> {
    ensureStarted()
    return registry.collectGarbage(toInstant(clock.now() - settings.retentionMs))
  }

  async function runGc() {
    try {
      await collectGarbage()
    } catch (e) {
      logger.error({ err: e }, 'Garbage collection failed')
    }
  }

  async function start(): Promise<RecoveryReport> {
    if (started) throw new StoreUnavailableError('Engine already started')
    const report = await recover({
      adapter,
      registry,
      clock,
      logger: logger.child({ component: 'recovery' }),
      graceWindowMs: settings.graceWindowMs,
    })
    started = true
    emit('recovered', report)

    if (config.disableScheduler) {
      logger.warn('Scheduler disabled; events will not fire')
    } else {
      scheduler.start()
    }
    // Also keeps the process alive while the engine runs.
    gcTimer = setInterval(() => { void runGc() }, settings.gcIntervalMs)
    return report
  }

  async function shutdown() {
    if (gcTimer) clearInterval(gcTimer)
    gcTimer = null
    try {
      await scheduler.stop()
    } finally {
      started = false
      await adapter.close()
    }
  }

  return {
    start,
    shutdown,

    async create(spec) {
      ensureStarted()
      return registry.create(spec)
    },
    async modify(id, mutation) {
      ensureStarted()
      const result = await registry.modify(id, mutation)
      return result.ok ? Ok(detach(result.value)) : result
    },
    async cancel(id) {
      ensureStarted()
      return registry.cancel(id)
    },
    async get(id) {
      ensureStarted()
      const record = await registry.get(id)
      return record ? detach(record) : null
    },
    async list(ownerContext, options) {
      ensureStarted()
      return (await registry.list(ownerContext, options)).map(detach)
    },
    pending() {
      return registry.snapshot().map(detach)
    },

    collectGarbage,
    getSchedulerState: () => scheduler.getState(),
    on,
  }
}
