#!/usr/bin/env node
/**
 * Process entry: config -> store -> lock + recovery -> scheduler.
 * SIGINT/SIGTERM drain the scheduler and release the lock.
 *
 * Exit codes: 0 clean shutdown, 1 startup failure or store error while draining.
 */
import { config as loadEnv } from 'dotenv'
import { loadConfig } from './config'
import { createLogger } from './logger'
import { createSqliteAdapter } from './sqlite-adapter'
import { createLogSink } from './notification-sink'
import { type NotificationEngine, createNotificationEngine } from './public-api'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

loadEnv()

async function main(): Promise<number> {
  const config = loadConfig()
  const logger = createLogger('tidewatch', { level: config.logLevel })

  if (config.storePath !== ':memory:') mkdirSync(dirname(config.storePath), { recursive: true })

  let engine: NotificationEngine
  try {
    const adapter = await createSqliteAdapter(config.storePath)
    engine = createNotificationEngine({
      adapter,
      sink: createLogSink(logger.child({ component: 'sink' })),
      logger,
      graceWindowMs: config.graceWindowMs,
      deliveryTimeoutMs: config.deliveryTimeoutMs,
      maxDeliveryAttempts: config.maxDeliveryAttempts,
      retryBackoffMs: config.retryBackoffMs,
      maxConflictRetries: config.maxConflictRetries,
      retentionMs: config.retentionMs,
      gcIntervalMs: config.gcIntervalMs,
      alertLeadMs: config.alertLeadMs,
      disableScheduler: config.disableScheduler,
    })
    await engine.start()
  } catch (e) {
    logger.fatal({ err: e }, 'Startup failed')
    return 1
  }

  const signal = await new Promise<NodeJS.Signals>((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'))
    process.once('SIGTERM', () => resolve('SIGTERM'))
  })
  logger.info({ signal }, 'Shutting down')

  try {
    await engine.shutdown()
  } catch (e) {
    logger.fatal({ err: e }, 'Shutdown failed')
    return 1
  }
  return 0
}

main().then(
  (code) => { process.exitCode = code },
  (e: unknown) => {
    console.error(e)
    process.exitCode = 1
  },
)
