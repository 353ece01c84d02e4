/**
 * Adapter
 *
 * Persistence interface for event records + in-memory mock implementation.
 * All methods are async so synchronous (better-sqlite3) and asynchronous
 * adapters share one contract.
 *
 * Contract:
 * - acquireLock() must succeed before any other call; it is the single-writer guard.
 * - put() is a compare-and-set on the stored version and replaces the whole record atomically.
 * - listActive() never throws on a bad row; bad rows come back as Err entries.
 */

import type { EventId, EventRecord, Instant } from './types'
import { type EventRow, decodeRow, encodeRecord } from './record-codec'
import {
  AlreadyRunningError, CorruptRecordError, StoreUnavailableError, VersionConflictError,
} from './errors'
import { type Result, Ok, Err } from './result'

export { AlreadyRunningError, CorruptRecordError, StoreUnavailableError, VersionConflictError }

// ============================================================================
// Adapter Interface
// ============================================================================

export type LoadedRecord = Result<EventRecord, CorruptRecordError>

export interface Adapter {
  /** Take the exclusive store lock. AlreadyRunningError if another instance holds it. */
  acquireLock(): Promise<void>

  /**
   * Run fn atomically. The transaction stays open across fn's awaits, so any
   * other write issued meanwhile joins it and shares its commit or rollback.
   * Callers must not let unrelated writers run while fn is pending.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  /** Stored version must equal expectedVersion (0 for a record that does not exist yet). */
  put(record: EventRecord, expectedVersion: number): Promise<Result<void, VersionConflictError>>
  get(id: string): Promise<EventRecord | null>
  listActive(): Promise<LoadedRecord[]>
  listByOwner(ownerContext: string): Promise<EventRecord[]>
  /** Ids of cancelled or completed records last touched before olderThan */
  listExpired(olderThan: Instant): Promise<EventId[]>
  delete(id: string): Promise<void>
  /** Delete every listed id in one atomic step. Returns how many existed. */
  deleteMany(ids: readonly string[]): Promise<number>

  /** Releases the lock. */
  close(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

/**
 * Backing storage for mock adapters. Two adapters built on the same backing
 * behave like two processes opening the same database file.
 */
export type MockBacking = {
  rows: Map<string, string>
  holder: symbol | null
}

export type MockAdapter = Adapter & {
  readonly backing: MockBacking
  /** Store a raw serialized row, bypassing the codec. */
  injectRaw(id: string, raw: string): void
}

export function createMockBacking(): MockBacking {
  return { rows: new Map(), holder: null }
}

export function createMockAdapter(backing: MockBacking = createMockBacking()): MockAdapter {
  const token = Symbol('mock-adapter')
  let closed = false

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: Map<string, string> | null = null

  // ---- Helpers ----
  function ensureLocked() {
    if (closed) throw new StoreUnavailableError('Store is closed')
    if (backing.holder !== token) {
      throw new StoreUnavailableError('Store lock not held; call acquireLock() first')
    }
  }

  function readRow(id: string): LoadedRecord | null {
    const raw = backing.rows.get(id)
    if (raw === undefined) return null
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      return Err(new CorruptRecordError(id, 'row is not valid JSON'))
    }
    return decodeRow(parsed)
  }

  function allRows(): LoadedRecord[] {
    const out: LoadedRecord[] = []
    for (const id of backing.rows.keys()) {
      const loaded = readRow(id)
      if (loaded) out.push(loaded)
    }
    return out
  }

  function storedVersion(id: string): number {
    const raw = backing.rows.get(id)
    if (raw === undefined) return 0
    const loaded = readRow(id)
    // A corrupt row still occupies its id; only a fresh create may replace it.
    return loaded?.ok ? loaded.value.version : -1
  }

  const adapter: MockAdapter = {
    backing,

    injectRaw(id: string, raw: string) {
      backing.rows.set(id, raw)
    },

    async acquireLock() {
      if (closed) throw new StoreUnavailableError('Store is closed')
      if (backing.holder === token) return
      if (backing.holder !== null) {
        throw new AlreadyRunningError('Another scheduler instance holds the store lock')
      }
      backing.holder = token
    },

    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      ensureLocked()
      if (txDepth === 0) snapshot = new Map(backing.rows)
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          backing.rows = snapshot
          snapshot = null
        }
        throw e
      }
    },

    async put(record: EventRecord, expectedVersion: number) {
      ensureLocked()
      const current = storedVersion(record.id)
      if (current !== expectedVersion) {
        return Err(new VersionConflictError(record.id, expectedVersion, current))
      }
      const row: EventRow = encodeRecord(record)
      backing.rows.set(record.id, JSON.stringify(row))
      return Ok(undefined)
    },

    async get(id: string) {
      ensureLocked()
      const loaded = readRow(id)
      if (!loaded) return null
      if (!loaded.ok) throw loaded.error
      return loaded.value
    },

    async listActive() {
      ensureLocked()
      return allRows().filter((r) => !r.ok || r.value.state === 'active')
    },

    async listByOwner(ownerContext: string) {
      ensureLocked()
      const out: EventRecord[] = []
      for (const r of allRows()) {
        if (r.ok && r.value.ownerContext === ownerContext) out.push(r.value)
      }
      return out.sort((a, b) => a.createdAt - b.createdAt)
    },

    async listExpired(olderThan: Instant) {
      ensureLocked()
      const out: EventId[] = []
      for (const r of allRows()) {
        if (r.ok && r.value.state !== 'active' && r.value.updatedAt < olderThan) out.push(r.value.id)
      }
      return out
    },

    async delete(id: string) {
      ensureLocked()
      backing.rows.delete(id)
    },

    async deleteMany(ids: readonly string[]) {
      ensureLocked()
      let removed = 0
      for (const id of ids) {
        if (backing.rows.delete(id)) removed++
      }
      return removed
    },

    async close() {
      if (backing.holder === token) backing.holder = null
      closed = true
    },
  }

  return adapter
}
