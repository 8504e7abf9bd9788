/**
 * Streams a mixer into Web Audio.
 *
 * Web Audio's currentTime is accurate, but the main thread can lag. A timer
 * runs every `scheduleInterval` ms and keeps consecutive buffer sources
 * queued `lookahead` seconds past `currentTime`, each one filled from the
 * mixer.
 *
 * The scheduler timer runs on the main thread, the same thread that steps
 * the sort, so the pool guard only ever sees one caller at a time.
 *
 * Usage:
 * ```typescript
 * const pool = new OscillatorPool()
 * const output = new WebAudioOutput(pool)
 * button.onclick = async () => {
 *   await output.init()
 *   output.start()
 * }
 * ```
 */

import type { MixSource } from '@sortphony/audio'
import type {
  OutputContext,
  OutputGainNode,
  ScheduledChunk,
  WebAudioOutputOptions
} from './types'
import { ensureAudioContextRunning, getAudioContext } from './context'
import { InvalidOutputOptionsError } from './errors'

/** Default length of one scheduled buffer (seconds) */
export const CHUNK_SECONDS = 0.05

/** How far ahead to schedule (seconds) */
export const LOOKAHEAD = 0.1

/** How often to run the scheduler (ms) */
export const SCHEDULE_INTERVAL = 25

const DEFAULT_CHANNEL_COUNT = 2

const DEFAULT_MASTER_GAIN = 1

export class WebAudioOutput {
  private readonly context: OutputContext
  private readonly masterGain: OutputGainNode

  private readonly chunkFrames: number
  private readonly lookahead: number
  private readonly scheduleInterval: number
  private readonly channelCount: number
  private readonly interleaved: Float32Array

  private intervalId: ReturnType<typeof setInterval> | null = null
  private nextChunkTime = 0
  private scheduled: ScheduledChunk[] = []
  private disposed = false

  constructor(
    private readonly source: MixSource,
    options: WebAudioOutputOptions = {}
  ) {
    const chunkSeconds = options.chunkSeconds ?? CHUNK_SECONDS
    this.lookahead = options.lookahead ?? LOOKAHEAD
    this.scheduleInterval = options.scheduleInterval ?? SCHEDULE_INTERVAL
    this.channelCount = options.channelCount ?? DEFAULT_CHANNEL_COUNT
    const masterGain = options.masterGain ?? DEFAULT_MASTER_GAIN

    if (!(chunkSeconds > 0)) throw new InvalidOutputOptionsError('chunkSeconds', chunkSeconds)
    if (!(this.lookahead > 0)) throw new InvalidOutputOptionsError('lookahead', this.lookahead)
    if (!(this.scheduleInterval > 0)) {
      throw new InvalidOutputOptionsError('scheduleInterval', this.scheduleInterval)
    }
    if (!Number.isInteger(this.channelCount) || this.channelCount < 1) {
      throw new InvalidOutputOptionsError('channelCount', this.channelCount)
    }
    if (!(masterGain >= 0 && masterGain <= 1)) {
      throw new InvalidOutputOptionsError('masterGain', masterGain)
    }

    this.context = options.audioContext ?? getAudioContext()
    this.chunkFrames = Math.max(1, Math.round(chunkSeconds * this.context.sampleRate))
    this.interleaved = new Float32Array(this.chunkFrames * this.channelCount)

    this.masterGain = this.context.createGain()
    this.masterGain.gain.value = masterGain
    this.masterGain.connect(this.context.destination)
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Resume the context (user gesture required).
   * Resolves to false when the context cannot be resumed.
   */
  async init(): Promise<boolean> {
    if (this.disposed) return false
    try {
      await ensureAudioContextRunning(this.context)
      return this.context.state === 'running'
    } catch {
      return false
    }
  }

  get isRunning(): boolean {
    return this.intervalId !== null
  }

  /** Chunks queued on the context that have not finished playing */
  get pendingChunks(): number {
    this.pruneFinished()
    return this.scheduled.length
  }

  start(): void {
    if (this.disposed || this.intervalId) return

    this.nextChunkTime = this.context.currentTime
    this.intervalId = setInterval(() => this.scheduleChunks(), this.scheduleInterval)
    this.scheduleChunks() // Run immediately
  }

  /**
   * Stop scheduling and cut every queued chunk short.
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId)
      this.intervalId = null
    }

    for (const chunk of this.scheduled) {
      chunk.node.stop()
      chunk.node.disconnect()
    }
    this.scheduled = []
  }

  dispose(): void {
    if (this.disposed) return
    this.stop()
    this.masterGain.disconnect()
    this.disposed = true
  }

  // ===========================================================================
  // Scheduling
  // ===========================================================================

  private scheduleChunks(): void {
    const currentTime = this.context.currentTime
    this.pruneFinished()

    // Fell behind: restart the queue at the playhead
    if (this.nextChunkTime < currentTime) {
      this.nextChunkTime = currentTime
    }

    while (this.nextChunkTime < currentTime + this.lookahead) {
      this.scheduleChunk(this.nextChunkTime)
      this.nextChunkTime += this.chunkFrames / this.context.sampleRate
    }
  }

  private scheduleChunk(startTime: number): void {
    const { channelCount, chunkFrames, interleaved } = this
    const sampleRate = this.context.sampleRate

    this.source.mixInto(interleaved, channelCount, sampleRate)

    const buffer = this.context.createBuffer(channelCount, chunkFrames, sampleRate)
    for (let channel = 0; channel < channelCount; channel++) {
      const data = buffer.getChannelData(channel)
      for (let frame = 0; frame < chunkFrames; frame++) {
        data[frame] = interleaved[frame * channelCount + channel]
      }
    }

    const node = this.context.createBufferSource()
    node.buffer = buffer
    node.connect(this.masterGain)
    node.start(startTime)

    this.scheduled.push({
      node,
      startTime,
      endTime: startTime + chunkFrames / sampleRate
    })
  }

  private pruneFinished(): void {
    const currentTime = this.context.currentTime
    this.scheduled = this.scheduled.filter(chunk => chunk.endTime > currentTime)
  }
}
