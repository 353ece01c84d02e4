/**
 * Config
 *
 * Engine settings read from environment variables (main.ts loads .env first).
 * Every key has a default, so an empty environment is a valid configuration.
 */
import { z } from 'zod'
import { MS_PER_DAY, MS_PER_HOUR } from './time-date'
import { ValidationError } from './errors'

// ============================================================================
// Schema
// ============================================================================

const positiveMs = z.coerce.number().int().positive()

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .transform((v) => v === '1' || v === 'true')

export const configSchema = z.object({
  STORE_PATH: z.string().min(1).default('./data/events.db'),
  GRACE_WINDOW_MS: z.coerce.number().int().nonnegative().default(5 * 60_000),
  DELIVERY_TIMEOUT_MS: positiveMs.default(10_000),
  MAX_DELIVERY_ATTEMPTS: positiveMs.default(3),
  RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1_000),
  MAX_CONFLICT_RETRIES: positiveMs.default(5),
  RETENTION_MS: positiveMs.default(7 * MS_PER_DAY),
  GC_INTERVAL_MS: positiveMs.default(MS_PER_HOUR),
  ALERT_LEAD_MS: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DISABLE_SCHEDULER: flag.default('0'),
})

export type Config = {
  storePath: string
  graceWindowMs: number
  deliveryTimeoutMs: number
  maxDeliveryAttempts: number
  retryBackoffMs: number
  maxConflictRetries: number
  retentionMs: number
  gcIntervalMs: number
  alertLeadMs: number
  logLevel: string
  disableScheduler: boolean
}

// ============================================================================
// Loading
// ============================================================================

/** Blank values count as unset so `KEY=` in a .env file falls back to the default. */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim()
  }
  return out
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = configSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ValidationError(`Invalid configuration: ${details}`)
  }
  const c = parsed.data
  return {
    storePath: c.STORE_PATH,
    graceWindowMs: c.GRACE_WINDOW_MS,
    deliveryTimeoutMs: c.DELIVERY_TIMEOUT_MS,
    maxDeliveryAttempts: c.MAX_DELIVERY_ATTEMPTS,
    retryBackoffMs: c.RETRY_BACKOFF_MS,
    maxConflictRetries: c.MAX_CONFLICT_RETRIES,
    retentionMs: c.RETENTION_MS,
    gcIntervalMs: c.GC_INTERVAL_MS,
    alertLeadMs: c.ALERT_LEAD_MS,
    logLevel: c.LOG_LEVEL,
    disableScheduler: c.DISABLE_SCHEDULER,
  }
}
