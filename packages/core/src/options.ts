import type { ToneSink } from '@sortphony/audio'
import type { DisplaySink, SessionLogger, SortSessionOptions, TickScheduler } from './types'
import {
  DEFAULT_ARRAY_SIZE,
  DEFAULT_FRAME_RATE,
  DEFAULT_PANEL_HEIGHT,
  VERIFY_HOLD_SECONDS
} from './constants'
import { InvalidOptionsError } from './errors'
import { createIntervalScheduler, defaultClock } from './scheduler'

export interface ResolvedSessionOptions {
  arraySize: number
  panelHeight: number
  frameRate: number
  verifyHoldSeconds: number
  seed: number
  display: DisplaySink
  tones: ToneSink
  scheduler: TickScheduler
  clock: () => number
  logger: SessionLogger
}

const NULL_DISPLAY: DisplaySink = {
  setColor(): void {},
  setHeight(): void {}
}

const SILENT_TONES: ToneSink = {
  request(): void {}
}

function requirePositive(option: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new InvalidOptionsError(option, value, 'must be a positive number')
  }
}

/**
 * Fill in defaults and validate. Throws `InvalidOptionsError`.
 */
export function resolveSessionOptions(options: SortSessionOptions = {}): ResolvedSessionOptions {
  const resolved: ResolvedSessionOptions = {
    arraySize: options.arraySize ?? DEFAULT_ARRAY_SIZE,
    panelHeight: options.panelHeight ?? DEFAULT_PANEL_HEIGHT,
    frameRate: options.frameRate ?? DEFAULT_FRAME_RATE,
    verifyHoldSeconds: options.verifyHoldSeconds ?? VERIFY_HOLD_SECONDS,
    seed: options.seed ?? Date.now(),
    display: options.display ?? NULL_DISPLAY,
    tones: options.tones ?? SILENT_TONES,
    scheduler: options.scheduler ?? createIntervalScheduler(),
    clock: options.clock ?? defaultClock,
    logger: options.logger ?? console
  }

  if (!Number.isInteger(resolved.arraySize) || resolved.arraySize < 1) {
    throw new InvalidOptionsError('arraySize', resolved.arraySize, 'must be a positive integer')
  }
  requirePositive('panelHeight', resolved.panelHeight)
  requirePositive('frameRate', resolved.frameRate)
  if (!(resolved.verifyHoldSeconds >= 0) || !Number.isFinite(resolved.verifyHoldSeconds)) {
    throw new InvalidOptionsError('verifyHoldSeconds', resolved.verifyHoldSeconds, 'must not be negative')
  }
  if (!Number.isFinite(resolved.seed)) {
    throw new InvalidOptionsError('seed', resolved.seed, 'must be a finite number')
  }

  return resolved
}
