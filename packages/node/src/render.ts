/**
 * Offline session rendering.
 *
 * Runs a whole sort session without a host frame loop: the session is
 * advanced once per simulated tick and the oscillator pool is mixed for
 * exactly one tick's worth of frames after each step.
 */

import { OscillatorPool, SAMPLE_RATE, TONE_DURATION } from '@sortphony/audio'
import {
  DEFAULT_ARRAY_SIZE,
  DEFAULT_FRAME_RATE,
  SortSession
} from '@sortphony/core'
import type {
  DisplaySink,
  InitialCondition,
  SessionLogger,
  SessionOutcome,
  SessionResult,
  SortAlgorithm,
  SortStats
} from '@sortphony/core'

/** Upper bound on simulated ticks before a render is abandoned */
const DEFAULT_MAX_TICKS = 10_000_000

export interface RenderOptions {
  algorithm: SortAlgorithm | string
  /** Initial condition loaded before sorting. Default: 'uniform' */
  generator?: InitialCondition | string
  /** Default: 100 */
  arraySize?: number
  seed?: number
  /** Simulated ticks per second. Default: 30 */
  frameRate?: number
  /** Default: 44100 */
  sampleRate?: number
  /** Interleaved output channels. Default: 1 */
  channelCount?: number
  /** Silence-or-release appended after the last tick, seconds. Default: one tone */
  tailSeconds?: number
  maxTicks?: number
  display?: DisplaySink
  logger?: SessionLogger
}

export interface RenderResult {
  /** Interleaved PCM in [-1, 1] */
  samples: Float32Array
  channelCount: number
  sampleRate: number
  frameCount: number
  ticks: number
  outcome: SessionOutcome
  stats: SortStats
  /** Array contents when the session ended */
  values: number[]
  seed: number
}

export function renderSession(options: RenderOptions): RenderResult {
  const {
    generator = 'uniform',
    frameRate = DEFAULT_FRAME_RATE,
    sampleRate = SAMPLE_RATE,
    channelCount = 1,
    tailSeconds = TONE_DURATION,
    maxTicks = DEFAULT_MAX_TICKS
  } = options

  const pool = new OscillatorPool()
  let now = 0

  const session = new SortSession({
    arraySize: options.arraySize ?? DEFAULT_ARRAY_SIZE,
    seed: options.seed,
    frameRate,
    tones: pool,
    display: options.display,
    clock: () => now,
    logger: options.logger
  })

  const results: SessionResult[] = []
  const errors: Error[] = []
  session.on('complete', result => {
    results.push(result)
  })
  session.on('error', error => {
    errors.push(error)
  })

  session.randomize(generator)
  session.start(options.algorithm)

  const framesPerTick = Math.round(sampleRate / frameRate)
  const chunks: Float32Array[] = []
  let ticks = 0

  for (;;) {
    const active = session.advance(now)
    chunks.push(pool.mix(framesPerTick, channelCount, sampleRate))
    ticks++
    now = ticks / frameRate

    if (!active) break
    if (ticks >= maxTicks) {
      session.terminate()
      break
    }
  }

  chunks.push(pool.mix(Math.round(tailSeconds * sampleRate), channelCount, sampleRate))

  const values = session.values
  const seed = session.seed
  session.dispose()

  if (errors.length > 0) {
    throw errors[0]
  }
  const result = results[0]
  if (!result) {
    throw new Error('Session ended without a result')
  }

  const samples = concatSamples(chunks)
  return {
    samples,
    channelCount,
    sampleRate,
    frameCount: samples.length / channelCount,
    ticks,
    outcome: result.outcome,
    stats: result.stats,
    values,
    seed
  }
}

function concatSamples(chunks: Float32Array[]): Float32Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0)
  const samples = new Float32Array(total)
  let offset = 0
  for (const chunk of chunks) {
    samples.set(chunk, offset)
    offset += chunk.length
  }
  return samples
}
