/**
 * Runtime type definitions.
 *
 * The output only touches the small slice of the Web Audio API declared
 * here, so a real `AudioContext` and an in-process fake both fit.
 */

// =============================================================================
// Audio graph
// =============================================================================

export interface OutputNode {
  connect(destination: OutputNode): unknown
  disconnect(): void
}

export interface OutputGainNode extends OutputNode {
  readonly gain: { value: number }
}

/** Planar sample storage, one Float32Array per channel */
export interface OutputBuffer {
  getChannelData(channel: number): Float32Array
}

export interface OutputSourceNode extends OutputNode {
  buffer: OutputBuffer | null
  start(when?: number): void
  stop(when?: number): void
}

export interface OutputContext {
  readonly currentTime: number
  readonly sampleRate: number
  readonly state: string
  readonly destination: OutputNode
  resume(): Promise<void>
  createBuffer(numberOfChannels: number, length: number, sampleRate: number): OutputBuffer
  createBufferSource(): OutputSourceNode
  createGain(): OutputGainNode
}

// =============================================================================
// WebAudioOutput
// =============================================================================

/**
 * Options for creating a Web Audio output.
 */
export interface WebAudioOutputOptions {
  /** Context to play through (default: the shared singleton) */
  audioContext?: OutputContext

  /** Length of each scheduled buffer in seconds (default: 0.05) */
  chunkSeconds?: number

  /** How far ahead of `currentTime` audio is queued, seconds (default: 0.1) */
  lookahead?: number

  /** How often the scheduler runs, ms (default: 25) */
  scheduleInterval?: number

  /** Interleaved channels requested from the mixer (default: 2) */
  channelCount?: number

  /** Master gain level (0-1, default: 1) */
  masterGain?: number
}

/**
 * A buffer source queued on the context, kept so it can be cut short.
 */
export interface ScheduledChunk {
  node: OutputSourceNode
  startTime: number
  endTime: number
}
