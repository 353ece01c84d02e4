/**
 * tidewatch
 *
 * Public API exports
 */

// Error system
export {
  SchedulerError, SchedulerErrorCode,
  ValidationError, InvalidTimezoneError, InvalidRecurrenceError, ParseError,
  NotFoundError, VersionConflictError,
  DeliveryError, DeliveryTimeoutError,
  StoreUnavailableError, AlreadyRunningError, CorruptRecordError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Instant, Weekday } from './time-date'
export {
  WEEKDAYS,
  parseDate, parseTime, makeDate, makeTime, makeDateTime, toInstant,
  addDays, daysBetween, dayOfWeek,
  isValidTimezone, utcOffsetAt, instantToLocal, localToInstant, wallClockStatus, formatInstant,
} from './time-date'

// Time resolution
export type { Recurrence, IntervalUnit, LocalTimeSpec } from './time-resolver'
export { resolve, validateRecurrence, describeOccurrence, describeRecurrence } from './time-resolver'

// Records
export type {
  EventId, EventState, EventRecord, EventSpec, EventMutation, LocalTimeInput, Clock,
} from './types'
export { systemClock } from './clock'

// Storage
export type { Adapter, LoadedRecord, MockAdapter, MockBacking } from './adapter'
export { createMockAdapter, createMockBacking } from './adapter'
export type { SqliteAdapter, SqliteAdapterOptions } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Components
export type { FireEntry, FireQueue } from './fire-queue'
export { createFireQueue } from './fire-queue'
export type { EventRegistry, ModifyError, CancelError, ListOptions } from './event-registry'
export { createEventRegistry } from './event-registry'
export type { Scheduler, SchedulerState, FireOutcome } from './scheduler'
export { createScheduler } from './scheduler'
export type { RecoveryReport } from './recovery'
export { recover } from './recovery'
export type { Notification, NotificationSink } from './notification-sink'
export { createLogSink } from './notification-sink'

// Engine
export type { NotificationEngine, NotificationEngineConfig, EngineEvents } from './public-api'
export { createNotificationEngine, ENGINE_DEFAULTS } from './public-api'

// Ambient
export type { Config } from './config'
export { loadConfig } from './config'
export type { Logger } from './logger'
export { createLogger } from './logger'
