import type { Clock } from './types'
import { toInstant } from './time-date'

/** Wall clock backed by Date.now(); Vitest fake timers drive it in tests. */
export const systemClock: Clock = {
  now: () => toInstant(Date.now()),
}
