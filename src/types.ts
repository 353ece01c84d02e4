/**
 * Shared Types
 *
 * Re-exports branded types from time-date and defines the event record shape
 * shared by the registry, store adapters, scheduler and recovery.
 */

import type { Instant } from './time-date'
import type { LocalTimeSpec, Recurrence } from './time-resolver'

export type { LocalDate, LocalTime, LocalDateTime, Instant, Weekday } from './time-date'
export type { Recurrence, IntervalUnit, LocalTimeSpec } from './time-resolver'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __eventId: unique symbol

export type EventId = string & { readonly [__eventId]: true }

// ============================================================================
// Event Record
// ============================================================================

export type EventState = 'active' | 'cancelled' | 'completed'

/** The durable unit of scheduling. One per id, ids are never reused. */
export type EventRecord = {
  id: EventId
  ownerContext: string
  localTime: LocalTimeSpec
  timezone: string
  recurrence: Recurrence
  /** null once the record is cancelled or completed */
  nextFireUtc: Instant | null
  payload: string
  version: number
  state: EventState
  createdAt: Instant
  updatedAt: Instant
  lastFiredUtc: Instant | null
}

// ============================================================================
// Gateway Input
// ============================================================================

/** Raw local time as a command gateway hands it over: HH:MM[:SS] and optional YYYY-MM-DD */
export type LocalTimeInput = {
  time: string
  date?: string
}

export type EventSpec = {
  ownerContext: string
  localTime: LocalTimeInput
  timezone: string
  recurrence: Recurrence
  payload: string
}

/** Partial update; owner context is fixed at creation. */
export type EventMutation = Partial<Omit<EventSpec, 'ownerContext'>>

// ============================================================================
// Clock
// ============================================================================

export interface Clock {
  now(): Instant
}
