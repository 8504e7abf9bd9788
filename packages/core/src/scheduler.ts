/**
 * Default tick driver for `SortSession.play()`.
 */

import type { TickScheduler } from './types'

export function createIntervalScheduler(): TickScheduler {
  let intervalId: ReturnType<typeof setInterval> | null = null

  return {
    start(tick: () => void, intervalMs: number): void {
      if (intervalId) return
      intervalId = setInterval(tick, intervalMs)
    },

    stop(): void {
      if (intervalId) {
        clearInterval(intervalId)
        intervalId = null
      }
    }
  }
}

/** Seconds from the high-resolution timer */
export function defaultClock(): number {
  return performance.now() / 1000
}
