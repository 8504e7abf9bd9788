/**
 * @sortphony/audio
 *
 * Oscillator pool and PCM mixer used to sonify sort steps.
 */

export * from './constants'
export * from './errors'
export * from './synth'
export type { Oscillator, ToneSink, MixSource, OscillatorPoolOptions } from './types'

export { OscillatorPool } from './OscillatorPool'
export { PoolGuard } from './guard'
