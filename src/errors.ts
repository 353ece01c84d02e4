/**
 * Consolidated error system for the notification engine.
 *
 * All error classes extend SchedulerError, which carries a typed error code.
 * Expected conditions (not found, version conflicts) travel as Result values;
 * the classes below are what those Results carry and what structural failures throw.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const SchedulerErrorCode = {
  // User input
  VALIDATION: 'VALIDATION',
  INVALID_TIMEZONE: 'INVALID_TIMEZONE',
  INVALID_RECURRENCE: 'INVALID_RECURRENCE',
  PARSE_ERROR: 'PARSE_ERROR',

  // Registry
  NOT_FOUND: 'NOT_FOUND',
  VERSION_CONFLICT: 'VERSION_CONFLICT',

  // Delivery
  DELIVERY: 'DELIVERY',
  DELIVERY_TIMEOUT: 'DELIVERY_TIMEOUT',

  // Store
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  ALREADY_RUNNING: 'ALREADY_RUNNING',
  CORRUPT_RECORD: 'CORRUPT_RECORD',
} as const

export type SchedulerErrorCode = (typeof SchedulerErrorCode)[keyof typeof SchedulerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode

  constructor(code: SchedulerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SchedulerError'
    this.code = code
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class ValidationError extends SchedulerError {
  constructor(message: string, code: SchedulerErrorCode = SchedulerErrorCode.VALIDATION) {
    super(code, message)
    this.name = 'ValidationError'
  }
}

export class InvalidTimezoneError extends ValidationError {
  readonly timezone: string

  constructor(timezone: string) {
    super(`Unknown timezone: '${timezone}'`, SchedulerErrorCode.INVALID_TIMEZONE)
    this.name = 'InvalidTimezoneError'
    this.timezone = timezone
  }
}

export class InvalidRecurrenceError extends ValidationError {
  constructor(message: string) {
    super(message, SchedulerErrorCode.INVALID_RECURRENCE)
    this.name = 'InvalidRecurrenceError'
  }
}

export class ParseError extends ValidationError {
  constructor(message: string) {
    super(message, SchedulerErrorCode.PARSE_ERROR)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Registry Errors
// ============================================================================

export class NotFoundError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class VersionConflictError extends SchedulerError {
  readonly id: string
  readonly expectedVersion: number
  readonly actualVersion: number

  constructor(id: string, expectedVersion: number, actualVersion: number) {
    super(
      SchedulerErrorCode.VERSION_CONFLICT,
      `Version conflict on event '${id}': expected ${expectedVersion}, found ${actualVersion}`,
    )
    this.name = 'VersionConflictError'
    this.id = id
    this.expectedVersion = expectedVersion
    this.actualVersion = actualVersion
  }
}

// ============================================================================
// Delivery Errors
// ============================================================================

export class DeliveryError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SchedulerErrorCode.DELIVERY, message, options)
    this.name = 'DeliveryError'
  }
}

export class DeliveryTimeoutError extends SchedulerError {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(SchedulerErrorCode.DELIVERY_TIMEOUT, `Delivery did not complete within ${timeoutMs}ms`)
    this.name = 'DeliveryTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class StoreUnavailableError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SchedulerErrorCode.STORE_UNAVAILABLE, message, options)
    this.name = 'StoreUnavailableError'
  }
}

export class AlreadyRunningError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SchedulerErrorCode.ALREADY_RUNNING, message, options)
    this.name = 'AlreadyRunningError'
  }
}

export class CorruptRecordError extends SchedulerError {
  readonly id: string

  constructor(id: string, message: string) {
    super(SchedulerErrorCode.CORRUPT_RECORD, `Corrupt record '${id}': ${message}`)
    this.name = 'CorruptRecordError'
    this.id = id
  }
}
