/**
 * Record Codec
 *
 * Maps EventRecord to the flat row shape both adapters persist, and validates
 * rows on the way back in. A row that fails validation becomes a
 * CorruptRecordError instead of an exception so one bad row never hides the rest.
 */

import { z } from 'zod'
import type { EventId, EventRecord } from './types'
import type { Recurrence } from './time-resolver'
import { type LocalDate, isValidTimezone, parseDate, parseTime, toInstant } from './time-date'
import { CorruptRecordError } from './errors'
import { type Result, Ok, Err } from './result'

// ============================================================================
// Schemas
// ============================================================================

export const weekdaySchema = z.enum(['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'])

export const recurrenceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({ type: z.literal('daily') }),
  z.object({ type: z.literal('weekly'), days: z.array(weekdaySchema) }),
  z.object({
    type: z.literal('custom'),
    interval: z.number(),
    unit: z.enum(['minute', 'hour', 'day', 'week']),
  }),
])

export const eventStateSchema = z.enum(['active', 'cancelled', 'completed'])

const epochMs = z.number().int().nonnegative()

export const eventRowSchema = z.object({
  id: z.string().min(1),
  owner_context: z.string().min(1),
  local_time: z.string().refine((s) => parseTime(s).ok, 'invalid local time'),
  local_date: z.string().refine((s) => parseDate(s).ok, 'invalid local date').nullable(),
  timezone: z.string().refine(isValidTimezone, 'unknown timezone'),
  recurrence: z.string(),
  next_fire_ms: epochMs.nullable(),
  payload: z.string(),
  version: z.number().int().positive(),
  state: eventStateSchema,
  created_ms: epochMs,
  updated_ms: epochMs,
  last_fired_ms: epochMs.nullable(),
})

export type EventRow = z.infer<typeof eventRowSchema>

// ============================================================================
// Encode
// ============================================================================

export function encodeRecord(record: EventRecord): EventRow {
  return {
    id: record.id,
    owner_context: record.ownerContext,
    local_time: record.localTime.time,
    local_date: record.localTime.date ?? null,
    timezone: record.timezone,
    recurrence: JSON.stringify(record.recurrence),
    next_fire_ms: record.nextFireUtc,
    payload: record.payload,
    version: record.version,
    state: record.state,
    created_ms: record.createdAt,
    updated_ms: record.updatedAt,
    last_fired_ms: record.lastFiredUtc,
  }
}

// ============================================================================
// Decode
// ============================================================================

function rowId(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id
  }
  return '<unknown>'
}

function parseRecurrence(json: string): Result<Recurrence, string> {
  let value: unknown
  try {
    value = JSON.parse(json)
  } catch (e) {
    return Err(`recurrence is not JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  const parsed = recurrenceSchema.safeParse(value)
  if (!parsed.success) return Err(`recurrence: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  return Ok(parsed.data)
}

export function decodeRow(raw: unknown): Result<EventRecord, CorruptRecordError> {
  const parsed = eventRowSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue?.path.join('.') || 'row'
    return Err(new CorruptRecordError(rowId(raw), `${where}: ${issue?.message ?? 'invalid'}`))
  }
  const row = parsed.data

  const recurrence = parseRecurrence(row.recurrence)
  if (!recurrence.ok) return Err(new CorruptRecordError(row.id, recurrence.error))

  if (row.state === 'active' && row.next_fire_ms === null) {
    return Err(new CorruptRecordError(row.id, 'active record without a next fire instant'))
  }

  const time = parseTime(row.local_time)
  if (!time.ok) return Err(new CorruptRecordError(row.id, time.error.message))

  return Ok({
    id: row.id as EventId,
    ownerContext: row.owner_context,
    localTime: {
      time: time.value,
      ...(row.local_date !== null ? { date: row.local_date as LocalDate } : {}),
    },
    timezone: row.timezone,
    recurrence: recurrence.value,
    nextFireUtc: row.next_fire_ms === null ? null : toInstant(row.next_fire_ms),
    payload: row.payload,
    version: row.version,
    state: row.state,
    createdAt: toInstant(row.created_ms),
    updatedAt: toInstant(row.updated_ms),
    lastFiredUtc: row.last_fired_ms === null ? null : toInstant(row.last_fired_ms),
  })
}
