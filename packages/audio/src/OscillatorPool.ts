/**
 * Bounded pool of short tones, mixed into PCM on demand.
 *
 * Two lanes share the pool. The stepping lane calls `request` while a sort
 * advances; the render lane calls `mix`/`mixInto` on its own cadence. The
 * oscillator list is only touched inside the guard, and the per-sample loop
 * runs against a snapshot taken under it.
 */

import type { Oscillator, OscillatorPoolOptions, ToneSink, MixSource } from './types'
import type { ADSR } from './synth'
import { DEFAULT_ADSR, envelopeADSR, triangleWave, valueToFrequency } from './synth'
import { HEADROOM, MAX_OSCILLATORS, TONE_DURATION } from './constants'
import { AudioFormatError, InvalidPoolOptionsError } from './errors'
import { PoolGuard } from './guard'

// =============================================================================
// Options
// =============================================================================

interface ResolvedPoolOptions {
  capacity: number
  toneDuration: number
  headroom: number
  envelope: ADSR
}

function resolvePoolOptions(options: OscillatorPoolOptions): ResolvedPoolOptions {
  const resolved: ResolvedPoolOptions = {
    capacity: options.capacity ?? MAX_OSCILLATORS,
    toneDuration: options.toneDuration ?? TONE_DURATION,
    headroom: options.headroom ?? HEADROOM,
    envelope: options.envelope ?? DEFAULT_ADSR
  }

  if (!Number.isInteger(resolved.capacity) || resolved.capacity < 1) {
    throw new InvalidPoolOptionsError('capacity', resolved.capacity)
  }
  if (!(resolved.toneDuration > 0) || !Number.isFinite(resolved.toneDuration)) {
    throw new InvalidPoolOptionsError('toneDuration', resolved.toneDuration)
  }
  if (!(resolved.headroom >= 0) || !Number.isFinite(resolved.headroom)) {
    throw new InvalidPoolOptionsError('headroom', resolved.headroom)
  }
  validateEnvelope(resolved.envelope)
  return resolved
}

/**
 * Attack, decay and release must be positive fractions that fit in one
 * lifetime; sustain is a level in [0, 1].
 */
function validateEnvelope(envelope: ADSR): void {
  const { attack, decay, sustain, release } = envelope
  for (const [name, value] of [['attack', attack], ['decay', decay], ['release', release]] as const) {
    if (!(value > 0) || !Number.isFinite(value)) {
      throw new InvalidPoolOptionsError(`envelope.${name}`, value)
    }
  }
  if (!(sustain >= 0 && sustain <= 1)) {
    throw new InvalidPoolOptionsError('envelope.sustain', sustain)
  }
  if (attack + decay + release > 1) {
    throw new InvalidPoolOptionsError('envelope', `${attack} + ${decay} + ${release} exceeds 1`)
  }
}

function clampUnit(value: number): number {
  if (Number.isNaN(value) || value < 0) return 0
  return value > 1 ? 1 : value
}

// =============================================================================
// OscillatorPool
// =============================================================================

export class OscillatorPool implements ToneSink, MixSource {
  private readonly options: ResolvedPoolOptions
  private readonly guard = new PoolGuard()

  // Guarded state
  private oscillators: Oscillator[] = []
  private time = 0

  private soundEnabled: boolean

  constructor(options: OscillatorPoolOptions = {}) {
    this.options = resolvePoolOptions(options)
    this.soundEnabled = options.enabled ?? true
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  get capacity(): number {
    return this.options.capacity
  }

  /** Pool clock in seconds, advanced only by mixing */
  get currentTime(): number {
    return this.guard.run(() => this.time)
  }

  /** Number of oscillators held, including expired ones not yet pruned */
  get size(): number {
    return this.guard.run(() => this.oscillators.length)
  }

  get enabled(): boolean {
    return this.soundEnabled
  }

  /**
   * Copy of the held oscillators, oldest first.
   */
  snapshot(): readonly Oscillator[] {
    return this.guard.run(() => this.oscillators.slice())
  }

  /**
   * Count oscillators sounding at `atTime` (defaults to the pool clock).
   */
  activeCount(atTime?: number): number {
    return this.guard.run(() => {
      const now = atTime ?? this.time
      let count = 0
      for (const osc of this.oscillators) {
        const relativeTime = now - osc.startTime
        if (relativeTime >= 0 && relativeTime < osc.duration) count++
      }
      return count
    })
  }

  // ===========================================================================
  // Stepping lane
  // ===========================================================================

  /**
   * Schedule a tone for a value normalized to [0, 1].
   * At capacity the oldest oscillator is evicted first.
   */
  request(normalizedValue: number): void {
    if (!this.soundEnabled) return

    const frequency = valueToFrequency(clampUnit(normalizedValue))
    const duration = this.options.toneDuration

    this.guard.run(() => {
      if (this.oscillators.length >= this.options.capacity) {
        this.oscillators.shift()
      }
      this.oscillators.push(Object.freeze({ frequency, startTime: this.time, duration }))
    })
  }

  /**
   * Turn tone production on or off. Disabling drops every held oscillator.
   */
  setEnabled(enabled: boolean): void {
    this.soundEnabled = enabled
    if (!enabled) this.clear()
  }

  clear(): void {
    this.guard.run(() => {
      this.oscillators = []
    })
  }

  // ===========================================================================
  // Render lane
  // ===========================================================================

  mix(frameCount: number, channelCount: number, sampleRate: number): Float32Array {
    if (!Number.isInteger(frameCount) || frameCount < 0) {
      throw new AudioFormatError(`Frame count must be a non-negative integer, got ${frameCount}`)
    }
    const buffer = new Float32Array(frameCount * channelCount)
    this.mixInto(buffer, channelCount, sampleRate)
    return buffer
  }

  mixInto(buffer: Float32Array, channelCount: number, sampleRate: number): void {
    if (!Number.isInteger(channelCount) || channelCount < 1) {
      throw new AudioFormatError(`Channel count must be a positive integer, got ${channelCount}`)
    }
    if (!(sampleRate > 0) || !Number.isFinite(sampleRate)) {
      throw new AudioFormatError(`Sample rate must be positive, got ${sampleRate}`)
    }

    if (!this.soundEnabled) {
      buffer.fill(0)
      return
    }

    const { envelope, headroom } = this.options
    const deltaTime = 1 / sampleRate
    const frameCount = Math.floor(buffer.length / channelCount)

    const { active, startTime } = this.guard.run(() => {
      const now = this.time
      const current = this.oscillators.slice()
      this.oscillators = this.oscillators.filter(osc => now < osc.startTime + osc.duration)
      return { active: current, startTime: now }
    })

    let time = startTime
    for (let frame = 0; frame < frameCount; frame++) {
      let sample = 0
      let activeCount = 0

      for (const osc of active) {
        const relativeTime = time - osc.startTime
        if (relativeTime >= 0 && relativeTime < osc.duration) {
          sample += envelopeADSR(relativeTime / osc.duration, envelope) * triangleWave(relativeTime * osc.frequency)
          activeCount++
        }
      }

      const value = activeCount > 0 ? (sample / activeCount) * headroom : 0
      const offset = frame * channelCount
      for (let channel = 0; channel < channelCount; channel++) {
        buffer[offset + channel] = value
      }

      time += deltaTime
    }

    // Trailing samples that do not fill a whole frame stay silent
    buffer.fill(0, frameCount * channelCount)

    this.guard.run(() => {
      this.time = time
    })
  }
}
