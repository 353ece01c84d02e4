/**
 * SQLite Adapter
 *
 * Durable implementation of the event store adapter using better-sqlite3.
 *
 * The connection runs in exclusive locking mode: acquireLock() opens an
 * EXCLUSIVE transaction and the file lock is kept after COMMIT until close().
 * A second process (or connection) fails with SQLITE_BUSY before it can read
 * or write anything. Writes go through the rollback journal with
 * synchronous=FULL, so a crash leaves either the old row or the new one.
 */
import Database from 'better-sqlite3'
import type { Adapter, LoadedRecord } from './adapter'
import type { EventId, EventRecord, Instant } from './types'
import { decodeRow, encodeRecord } from './record-codec'
import {
  AlreadyRunningError, CorruptRecordError, StoreUnavailableError, VersionConflictError,
} from './errors'
import { type Result, Ok, Err } from './result'

export { AlreadyRunningError, CorruptRecordError, StoreUnavailableError, VersionConflictError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  pragma(name: string): Promise<unknown>
  execute(sql: string): Promise<void>
  inTransaction(): Promise<boolean>
  getSchemaVersion(): Promise<number>
}

export type SqliteAdapter = Adapter & SqliteExtras

export type SqliteAdapterOptions = {
  /** How long to wait on a held lock before giving up. 0 fails immediately. */
  busyTimeoutMs?: number
}

export const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS event (
    id TEXT PRIMARY KEY,
    owner_context TEXT NOT NULL,
    local_time TEXT NOT NULL,
    local_date TEXT,
    timezone TEXT NOT NULL,
    recurrence TEXT NOT NULL,
    next_fire_ms INTEGER,
    payload TEXT NOT NULL,
    version INTEGER NOT NULL,
    state TEXT NOT NULL,
    created_ms INTEGER NOT NULL,
    updated_ms INTEGER NOT NULL,
    last_fired_ms INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_event_state_fire ON event(state, next_fire_ms);
  CREATE INDEX IF NOT EXISTS idx_event_owner ON event(owner_context);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

const UPSERT_SQL = `
  INSERT INTO event (
    id, owner_context, local_time, local_date, timezone, recurrence, next_fire_ms,
    payload, version, state, created_ms, updated_ms, last_fired_ms
  ) VALUES (
    @id, @owner_context, @local_time, @local_date, @timezone, @recurrence, @next_fire_ms,
    @payload, @version, @state, @created_ms, @updated_ms, @last_fired_ms
  )
  ON CONFLICT(id) DO UPDATE SET
    owner_context = excluded.owner_context,
    local_time = excluded.local_time,
    local_date = excluded.local_date,
    timezone = excluded.timezone,
    recurrence = excluded.recurrence,
    next_fire_ms = excluded.next_fire_ms,
    payload = excluded.payload,
    version = excluded.version,
    state = excluded.state,
    created_ms = excluded.created_ms,
    updated_ms = excluded.updated_ms,
    last_fired_ms = excluded.last_fired_ms
`

// ============================================================================
// Error Mapping
// ============================================================================

const LOCK_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED'])

function mapLockError(e: unknown, path: string): Error {
  if (e instanceof Database.SqliteError && LOCK_CODES.has(e.code)) {
    return new AlreadyRunningError(`Store '${path}' is locked by another scheduler instance`, { cause: e })
  }
  const msg = e instanceof Error ? e.message : String(e)
  return new StoreUnavailableError(`Store '${path}' cannot be opened: ${msg}`, { cause: e })
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) {
    if (e instanceof Database.SqliteError) {
      throw new StoreUnavailableError(`Store operation failed: ${e.message}`, { cause: e })
    }
    throw e
  }
}

function asStrings(values: unknown[]): string[] {
  return values.filter((v): v is string => typeof v === 'string')
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(
  path: string,
  options: SqliteAdapterOptions = {},
): Promise<SqliteAdapter> {
  let db: Database.Database
  try {
    db = new Database(path, { timeout: options.busyTimeoutMs ?? 0 })
  } catch (e) {
    throw mapLockError(e, path)
  }

  let locked = false
  let closed = false
  let _inTx = false

  function ensureLocked() {
    if (closed) throw new StoreUnavailableError('Store is closed')
    if (!locked) throw new StoreUnavailableError('Store lock not held; call acquireLock() first')
  }

  function decodeAll(rows: unknown[]): LoadedRecord[] {
    return rows.map((row) => decodeRow(row))
  }

  function storedVersion(id: string): number {
    const v: unknown = db.prepare('SELECT version FROM event WHERE id = ?').pluck().get(id)
    if (v === undefined) return 0
    return typeof v === 'number' ? v : -1
  }

  // Compare-and-set; joins an outer transaction as a savepoint.
  const putTx = db.transaction((record: EventRecord, expectedVersion: number): Result<void, VersionConflictError> => {
    const current = storedVersion(record.id)
    if (current !== expectedVersion) {
      return Err(new VersionConflictError(record.id, expectedVersion, current))
    }
    db.prepare(UPSERT_SQL).run(encodeRecord(record))
    return Ok(undefined)
  })

  const deleteAllTx = db.transaction((ids: readonly string[]): number => {
    const stmt = db.prepare('DELETE FROM event WHERE id = ?')
    let removed = 0
    for (const id of ids) removed += stmt.run(id).changes
    return removed
  })

  const adapter: SqliteAdapter = {
    // ================================================================
    // Lock
    // ================================================================
    async acquireLock() {
      if (closed) throw new StoreUnavailableError('Store is closed')
      if (locked) return
      try {
        db.pragma('locking_mode = EXCLUSIVE')
        db.pragma('journal_mode = DELETE')
        db.pragma('synchronous = FULL')
        db.exec('BEGIN EXCLUSIVE')
      } catch (e) {
        throw mapLockError(e, path)
      }
      try {
        db.exec(SCHEMA_SQL)
        const ver: unknown = db.prepare('SELECT MAX(version) FROM schema_version').pluck().get()
        if (ver === null || ver === undefined) {
          db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
            SCHEMA_VERSION, new Date().toISOString(),
          )
        }
        db.exec('COMMIT')
      } catch (e) {
        db.exec('ROLLBACK')
        throw mapLockError(e, path)
      }
      locked = true
    },

    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      ensureLocked()
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Records
    // ================================================================
    async put(record: EventRecord, expectedVersion: number) {
      ensureLocked()
      return safe(() => putTx(record, expectedVersion))
    },

    async get(id: string) {
      ensureLocked()
      const row: unknown = safe(() => db.prepare('SELECT * FROM event WHERE id = ?').get(id))
      if (row === undefined) return null
      const loaded = decodeRow(row)
      if (!loaded.ok) throw loaded.error
      return loaded.value
    },

    async listActive() {
      ensureLocked()
      const rows = safe(() =>
        db.prepare("SELECT * FROM event WHERE state = 'active' ORDER BY next_fire_ms, id").all(),
      )
      return decodeAll(rows)
    },

    async listByOwner(ownerContext: string) {
      ensureLocked()
      const rows = safe(() =>
        db.prepare('SELECT * FROM event WHERE owner_context = ? ORDER BY created_ms, id').all(ownerContext),
      )
      const out: EventRecord[] = []
      for (const r of decodeAll(rows)) {
        if (r.ok) out.push(r.value)
      }
      return out
    },

    async listExpired(olderThan: Instant) {
      ensureLocked()
      const ids = safe(() =>
        db.prepare("SELECT id FROM event WHERE state != 'active' AND updated_ms < ? ORDER BY id")
          .pluck().all(olderThan),
      )
      // Ids come from a validated TEXT PRIMARY KEY column.
      return asStrings(ids).map((id) => id as EventId)
    },

    async delete(id: string) {
      ensureLocked()
      safe(() => db.prepare('DELETE FROM event WHERE id = ?').run(id))
    },

    async deleteMany(ids: readonly string[]) {
      ensureLocked()
      return safe(() => deleteAllTx(ids))
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      if (closed) return
      closed = true
      locked = false
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).pluck().all()
      return asStrings(rows)
    },

    async getTableColumns(table: string) {
      const rows = db.prepare(`SELECT name FROM pragma_table_info(?)`).pluck().all(table)
      return asStrings(rows)
    },

    async pragma(name: string) {
      return db.pragma(name, { simple: true })
    },

    async execute(sql: string) {
      ensureLocked()
      safe(() => db.exec(sql))
    },

    async inTransaction() {
      return _inTx
    },

    async getSchemaVersion() {
      ensureLocked()
      const v: unknown = db.prepare('SELECT MAX(version) FROM schema_version').pluck().get()
      return typeof v === 'number' ? v : 0
    },
  }

  return adapter
}
