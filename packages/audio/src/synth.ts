/**
 * Sample-level synthesis primitives: envelope, waveform and pitch mapping.
 */

import { BASE_FREQUENCY, FREQUENCY_SPAN } from './constants'

/**
 * ADSR shape over a normalized lifetime (0 = start, 1 = end).
 * Attack, decay and release are fractions of the tone's duration.
 */
export interface ADSR {
  attack: number
  decay: number
  sustain: number  // 0-1 level
  release: number
}

export const DEFAULT_ADSR: ADSR = {
  attack: 0.025,
  decay: 0.1,
  sustain: 0.9,
  release: 0.3
}

/**
 * Piecewise-linear envelope gain at normalized position `x`.
 *
 * Rises to 1 over the attack, falls to the sustain level over the decay,
 * holds until `1 - release`, then falls linearly to 0 at `x = 1`.
 */
export function envelopeADSR(x: number, adsr: ADSR = DEFAULT_ADSR): number {
  const {attack, decay, sustain, release} = adsr
  if (x < attack) return x / attack
  if (x < attack + decay) return 1 - (x - attack) / decay * (1 - sustain)
  if (x < 1 - release) return sustain
  return sustain / release * (1 - x)
}

/**
 * Triangle wave with period 1 and range [-1, 1], starting at 0 and rising.
 */
export function triangleWave(x: number): number {
  const phase = x % 1
  if (phase <= 0.25) return 4 * phase
  if (phase <= 0.75) return 2 - 4 * phase
  return 4 * phase - 4
}

/**
 * Map a normalized array value onto a tone frequency.
 *
 * The square compresses small values toward the low end so neighbouring
 * values stay audibly distinct across the whole range.
 */
export function valueToFrequency(normalizedValue: number): number {
  return BASE_FREQUENCY + FREQUENCY_SPAN * (normalizedValue * normalizedValue)
}
