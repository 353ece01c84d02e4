/**
 * Notification Sink
 *
 * The outbound side of the engine. The scheduler hands each due event to a
 * sink; the sink talks to the chat platform. A rejected promise means the
 * delivery failed and may be retried. The signal aborts when the attempt's
 * timeout elapses.
 */
import type { EventId, Instant } from './types'
import type { Logger } from './logger'
import { formatInstant } from './time-date'

export type Notification = {
  eventId: EventId
  ownerContext: string
  payload: string
  scheduledFor: Instant
}

export interface NotificationSink {
  deliver(notification: Notification, signal: AbortSignal): Promise<void>
}

/** Sink that only writes a log line per notification. */
export function createLogSink(logger: Logger): NotificationSink {
  return {
    async deliver(notification) {
      logger.info(
        {
          eventId: notification.eventId,
          ownerContext: notification.ownerContext,
          scheduledFor: formatInstant(notification.scheduledFor),
        },
        notification.payload,
      )
    },
  }
}
