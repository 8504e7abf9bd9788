/**
 * Shared test doubles for the core package.
 */

import type { ToneSink } from '@sortphony/audio'
import type { BarColor, DisplaySink, SessionLogger, SortStep, TickScheduler } from '../types'
import { BarArray } from '../BarArray'

export class RecordingDisplay implements DisplaySink {
  colors: BarColor[] = []
  heights: number[] = []
  colorCalls: Array<[number, BarColor]> = []

  setColor(index: number, color: BarColor): void {
    this.colors[index] = color
    this.colorCalls.push([index, color])
  }

  setHeight(index: number, height: number): void {
    this.heights[index] = height
  }
}

export class RecordingTones implements ToneSink {
  requests: number[] = []

  request(normalizedValue: number): void {
    this.requests.push(normalizedValue)
  }
}

export function createBars(values: number[], panelHeight: number = 1) {
  const display = new RecordingDisplay()
  const tones = new RecordingTones()
  const bars = new BarArray(values, { display, tones, panelHeight })
  return { bars, display, tones }
}

export function drain(steps: Iterator<SortStep, unknown, undefined>): SortStep[] {
  const taken: SortStep[] = []
  for (let result = steps.next(); !result.done; result = steps.next()) {
    taken.push(result.value)
  }
  return taken
}

export function createLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  } satisfies SessionLogger
}

/**
 * Scheduler that only ticks when the test says so.
 */
export class ManualScheduler implements TickScheduler {
  tick: (() => void) | null = null
  intervalMs = 0

  start(tick: () => void, intervalMs: number): void {
    this.tick = tick
    this.intervalMs = intervalMs
  }

  stop(): void {
    this.tick = null
  }

  fire(times: number = 1): void {
    for (let i = 0; i < times; i++) {
      this.tick?.()
    }
  }
}
