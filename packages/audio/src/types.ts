/**
 * Oscillator pool type definitions.
 */

import type { ADSR } from './synth'

/**
 * A scheduled tone. Immutable once created.
 */
export interface Oscillator {
  readonly frequency: number
  /** Pool time (seconds) at which the tone starts */
  readonly startTime: number
  /** Lifetime in seconds */
  readonly duration: number
}

/**
 * Capability handed to the stepping lane: it may only ask for tones.
 */
export interface ToneSink {
  /** Request a tone for a value normalized to [0, 1] */
  request(normalizedValue: number): void
}

/**
 * Capability handed to the render lane: it may only pull samples.
 */
export interface MixSource {
  /**
   * Render `frameCount` interleaved frames into a new buffer.
   */
  mix(frameCount: number, channelCount: number, sampleRate: number): Float32Array

  /**
   * Render into a caller-owned interleaved buffer.
   * The frame count is `buffer.length / channelCount`.
   */
  mixInto(buffer: Float32Array, channelCount: number, sampleRate: number): void
}

/**
 * Options for creating an oscillator pool.
 */
export interface OscillatorPoolOptions {
  /** Maximum live oscillators (default: 512) */
  capacity?: number

  /** Tone lifetime in seconds (default: 0.1) */
  toneDuration?: number

  /** Gain applied to the averaged mix (default: 0.5) */
  headroom?: number

  /** Envelope shape (default: DEFAULT_ADSR) */
  envelope?: ADSR

  /** Whether tones are produced at all (default: true) */
  enabled?: boolean
}
