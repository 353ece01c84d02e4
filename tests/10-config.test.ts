/**
 * Segment 10: Configuration
 */

import { describe, it, expect } from 'vitest'
import { loadConfig } from '../src/config'
import { ValidationError } from '../src/errors'

describe('loadConfig', () => {
  it('an empty environment yields the defaults', () => {
    expect(loadConfig({})).toEqual({
      storePath: './data/events.db',
      graceWindowMs: 300_000,
      deliveryTimeoutMs: 10_000,
      maxDeliveryAttempts: 3,
      retryBackoffMs: 1_000,
      maxConflictRetries: 5,
      retentionMs: 604_800_000,
      gcIntervalMs: 3_600_000,
      alertLeadMs: 0,
      logLevel: 'info',
      disableScheduler: false,
    })
  })

  it('coerces numeric strings and flags', () => {
    const config = loadConfig({
      STORE_PATH: '/var/lib/bot/events.db',
      GRACE_WINDOW_MS: '0',
      DELIVERY_TIMEOUT_MS: '2500',
      LOG_LEVEL: 'debug',
      DISABLE_SCHEDULER: 'true',
      ALERT_LEAD_MS: '600000',
    })
    expect(config.storePath).toBe('/var/lib/bot/events.db')
    expect(config.graceWindowMs).toBe(0)
    expect(config.deliveryTimeoutMs).toBe(2500)
    expect(config.logLevel).toBe('debug')
    expect(config.disableScheduler).toBe(true)
    expect(config.alertLeadMs).toBe(600_000)
  })

  it('treats blank values as unset', () => {
    const config = loadConfig({ STORE_PATH: '  ', MAX_DELIVERY_ATTEMPTS: '' })
    expect(config.storePath).toBe('./data/events.db')
    expect(config.maxDeliveryAttempts).toBe(3)
  })

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/root', PATH: '/usr/bin' }).logLevel).toBe('info')
  })

  it.each([
    ['DELIVERY_TIMEOUT_MS', '0'],
    ['MAX_DELIVERY_ATTEMPTS', 'three'],
    ['GRACE_WINDOW_MS', '-1'],
    ['RETENTION_MS', '1.5'],
    ['LOG_LEVEL', 'verbose'],
    ['DISABLE_SCHEDULER', 'yes'],
    ['ALERT_LEAD_MS', '-1'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ValidationError)
  })

  it('names the offending key in the message', () => {
    expect(() => loadConfig({ DELIVERY_TIMEOUT_MS: '0' })).toThrow(/^Invalid configuration: DELIVERY_TIMEOUT_MS: /)
  })
})
