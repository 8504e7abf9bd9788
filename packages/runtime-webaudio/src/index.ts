/**
 * @sortphony/runtime-webaudio
 *
 * Plays the oscillator pool through the Web Audio API.
 */

export * from './types'
export * from './errors'
export * from './context'
export * from './WebAudioOutput'
