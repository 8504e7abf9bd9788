/**
 * Audio constants shared by the oscillator pool and its output adapters.
 */

/** Default output sample rate (Hz) */
export const SAMPLE_RATE = 44100

/** Maximum number of live oscillators before the oldest is evicted */
export const MAX_OSCILLATORS = 512

/** Lifetime of a single tone request (seconds) */
export const TONE_DURATION = 0.1

/** Fixed gain applied after averaging the active oscillators */
export const HEADROOM = 0.5

/** Frequency of a normalized value of 0 (Hz) */
export const BASE_FREQUENCY = 120

/** Frequency added at a normalized value of 1 (Hz) */
export const FREQUENCY_SPAN = 1200
