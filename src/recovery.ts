/**
 * Recovery
 *
 * Startup reconciliation: takes the store lock, reads every active record and
 * decides what to do with fires that were due while the process was down.
 *
 * - fire still in the future:          queued as stored
 * - overdue by at most the grace window: queued at its original instant, so it fires once right away
 * - overdue by more:                    missed occurrences are skipped; recurring records move to
 *                                       their next future occurrence, single-shot ones complete
 */

import type { Adapter } from './adapter'
import type { EventRegistry } from './event-registry'
import type { Logger } from './logger'
import type { Clock, EventRecord } from './types'
import { advanceRecord } from './event-registry'
import { formatInstant } from './time-date'
import { ValidationError } from './errors'

export type RecoveryDeps = {
  adapter: Adapter
  registry: EventRegistry
  clock: Clock
  logger: Logger
  graceWindowMs: number
}

export type RecoveryReport = {
  /** Future fires queued unchanged */
  scheduled: number
  /** Overdue within the grace window, queued to fire immediately */
  catchUp: number
  /** Recurring records moved past missed occurrences */
  skipped: number
  /** Single-shot records completed without firing */
  completed: number
  /** Rows that failed to decode */
  corrupt: number
}

export async function recover(deps: RecoveryDeps): Promise<RecoveryReport> {
  const { adapter, registry, clock, logger, graceWindowMs } = deps
  const report: RecoveryReport = { scheduled: 0, catchUp: 0, skipped: 0, completed: 0, corrupt: 0 }

  await adapter.acquireLock()
  const loaded = await adapter.listActive()
  const now = clock.now()

  for (const entry of loaded) {
    if (!entry.ok) {
      report.corrupt++
      logger.error({ id: entry.error.id, err: entry.error }, 'Skipping corrupt record')
      continue
    }
    const record = entry.value
    if (record.nextFireUtc === null) continue

    const overdueMs = now - record.nextFireUtc
    if (overdueMs <= 0) {
      registry.load(record)
      report.scheduled++
      continue
    }
    if (overdueMs <= graceWindowMs) {
      registry.load(record)
      report.catchUp++
      logger.info({ id: record.id, overdueMs }, 'Catching up missed fire')
      continue
    }

    let next: EventRecord
    try {
      next = advanceRecord(record, now, now, null)
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e
      logger.error({ id: record.id, err: e }, 'Recurrence no longer resolves, completing event')
      next = { ...record, state: 'completed', nextFireUtc: null, version: record.version + 1, updatedAt: now }
    }

    const written = await adapter.put(next, record.version)
    if (!written.ok) throw written.error
    registry.load(next)

    if (next.state === 'completed') {
      report.completed++
      logger.info({ id: record.id, missed: formatInstant(record.nextFireUtc) }, 'Missed single-shot event completed')
    } else {
      report.skipped++
      logger.info(
        { id: record.id, missed: formatInstant(record.nextFireUtc), next: next.nextFireUtc === null ? null : formatInstant(next.nextFireUtc) },
        'Skipped missed occurrences',
      )
    }
  }

  logger.info(report, 'Recovery complete')
  return report
}
