/**
 * WebAudioOutput Tests
 */

import { OscillatorPool } from '@sortphony/audio'
import type { MixSource } from '@sortphony/audio'
import { WebAudioOutput } from '../WebAudioOutput'
import { ensureAudioContextRunning } from '../context'
import { InvalidOutputOptionsError } from '../errors'
import type { OutputContext, WebAudioOutputOptions } from '../types'

// =============================================================================
// Mock AudioContext
// =============================================================================

class MockNode {
  connect = jest.fn()
  disconnect = jest.fn()
}

class MockGainNode extends MockNode {
  gain = { value: 1 }
}

class MockBuffer {
  readonly channels: Float32Array[]

  constructor(numberOfChannels: number, readonly length: number, readonly sampleRate: number) {
    this.channels = Array.from({ length: numberOfChannels }, () => new Float32Array(length))
  }

  getChannelData(channel: number): Float32Array {
    return this.channels[channel]
  }
}

class MockBufferSource extends MockNode {
  buffer: MockBuffer | null = null
  start = jest.fn()
  stop = jest.fn()
}

class MockAudioContext implements OutputContext {
  state = 'running'
  currentTime = 0
  sampleRate = 1000
  destination = new MockNode()

  buffers: MockBuffer[] = []
  sources: MockBufferSource[] = []
  gains: MockGainNode[] = []

  resume = jest.fn(async () => {
    this.state = 'running'
  })

  createBuffer(numberOfChannels: number, length: number, sampleRate: number): MockBuffer {
    const buffer = new MockBuffer(numberOfChannels, length, sampleRate)
    this.buffers.push(buffer)
    return buffer
  }

  createBufferSource(): MockBufferSource {
    const source = new MockBufferSource()
    this.sources.push(source)
    return source
  }

  createGain(): MockGainNode {
    const gain = new MockGainNode()
    this.gains.push(gain)
    return gain
  }
}

/** Writes each interleaved sample's own index */
class RampSource implements MixSource {
  calls: Array<[number, number, number]> = []

  mix(frameCount: number, channelCount: number, sampleRate: number): Float32Array {
    const buffer = new Float32Array(frameCount * channelCount)
    this.mixInto(buffer, channelCount, sampleRate)
    return buffer
  }

  mixInto(buffer: Float32Array, channelCount: number, sampleRate: number): void {
    this.calls.push([buffer.length, channelCount, sampleRate])
    for (let i = 0; i < buffer.length; i++) buffer[i] = i
  }
}

function startTimes(ctx: MockAudioContext): number[] {
  return ctx.sources.map(source => source.start.mock.calls[0][0])
}

function createOutput(options: WebAudioOutputOptions = {}, source: MixSource = new RampSource()) {
  const ctx = new MockAudioContext()
  const output = new WebAudioOutput(source, { audioContext: ctx, chunkSeconds: 0.05, ...options })
  return { ctx, output }
}

// =============================================================================
// Tests
// =============================================================================

describe('WebAudioOutput', () => {
  beforeEach(() => {
    jest.useFakeTimers()
  })

  afterEach(() => {
    jest.useRealTimers()
  })

  it('routes through a master gain to the destination', () => {
    const { ctx } = createOutput({ masterGain: 0.25 })

    expect(ctx.gains).toHaveLength(1)
    expect(ctx.gains[0].gain.value).toBe(0.25)
    expect(ctx.gains[0].connect).toHaveBeenCalledWith(ctx.destination)
  })

  it('queues chunks up to the lookahead on start', () => {
    const { ctx, output } = createOutput()
    output.start()

    expect(output.isRunning).toBe(true)
    expect(ctx.sources).toHaveLength(2)
    expect(startTimes(ctx)[0]).toBe(0)
    expect(startTimes(ctx)[1]).toBeCloseTo(0.05)
    expect(ctx.sources[0].connect).toHaveBeenCalledWith(ctx.gains[0])
    expect(ctx.sources[0].buffer).toBe(ctx.buffers[0])
  })

  it('keeps the queue filled as the context plays', () => {
    const { ctx, output } = createOutput()
    output.start()

    ctx.currentTime = 0.06
    jest.advanceTimersByTime(25)

    expect(ctx.sources).toHaveLength(4)
    expect(startTimes(ctx)[2]).toBeCloseTo(0.1)
    expect(startTimes(ctx)[3]).toBeCloseTo(0.15)
    expect(output.pendingChunks).toBe(3)
  })

  it('restarts at the playhead after falling behind', () => {
    const { ctx, output } = createOutput()
    output.start()

    ctx.currentTime = 0.5
    jest.advanceTimersByTime(25)

    expect(ctx.sources).toHaveLength(4)
    expect(startTimes(ctx)[2]).toBe(0.5)
    expect(startTimes(ctx)[3]).toBeCloseTo(0.55)
  })

  it('splits interleaved frames into channel data', () => {
    const source = new RampSource()
    const { ctx, output } = createOutput({}, source)
    output.start()

    expect(source.calls[0]).toEqual([100, 2, 1000])
    const buffer = ctx.buffers[0]
    expect(buffer.length).toBe(50)
    expect(buffer.sampleRate).toBe(1000)
    expect(Array.from(buffer.channels[0].slice(0, 3))).toEqual([0, 2, 4])
    expect(Array.from(buffer.channels[1].slice(0, 3))).toEqual([1, 3, 5])
  })

  it('plays what the oscillator pool mixes', () => {
    const pool = new OscillatorPool()
    const reference = new OscillatorPool()
    pool.request(1)
    reference.request(1)
    const expected = reference.mix(50, 1, 1000)

    const { ctx, output } = createOutput({ channelCount: 1 }, pool)
    output.start()

    expect(Array.from(ctx.buffers[0].channels[0])).toEqual(Array.from(expected))
    expect(expected.some(sample => sample !== 0)).toBe(true)
  })

  it('ignores a second start', () => {
    const { ctx, output } = createOutput()
    output.start()
    output.start()
    expect(ctx.sources).toHaveLength(2)
  })

  it('stop() cuts queued chunks and stops scheduling', () => {
    const { ctx, output } = createOutput()
    output.start()
    output.stop()

    expect(output.isRunning).toBe(false)
    for (const source of ctx.sources) {
      expect(source.stop).toHaveBeenCalledTimes(1)
      expect(source.disconnect).toHaveBeenCalledTimes(1)
    }

    ctx.currentTime = 1
    jest.advanceTimersByTime(100)
    expect(ctx.sources).toHaveLength(2)
  })

  it('resumes a suspended context on init', async () => {
    const { ctx, output } = createOutput()
    ctx.state = 'suspended'

    await expect(output.init()).resolves.toBe(true)
    expect(ctx.resume).toHaveBeenCalledTimes(1)
  })

  it('resolves false when the context refuses to resume', async () => {
    const { ctx, output } = createOutput()
    ctx.state = 'suspended'
    ctx.resume.mockRejectedValueOnce(new Error('NotAllowedError'))

    await expect(output.init()).resolves.toBe(false)
    expect(ctx.state).toBe('suspended')
  })

  it('does nothing once disposed', async () => {
    const { ctx, output } = createOutput()
    output.dispose()
    output.start()

    expect(ctx.gains[0].disconnect).toHaveBeenCalledTimes(1)
    expect(ctx.sources).toHaveLength(0)
    await expect(output.init()).resolves.toBe(false)
  })

  it.each<[string, WebAudioOutputOptions]>([
    ['chunkSeconds', { chunkSeconds: 0 }],
    ['lookahead', { lookahead: -1 }],
    ['scheduleInterval', { scheduleInterval: 0 }],
    ['channelCount', { channelCount: 0 }],
    ['masterGain', { masterGain: 2 }]
  ])('rejects an invalid %s', (_, options) => {
    expect(() => createOutput(options)).toThrow(InvalidOutputOptionsError)
  })
})

describe('ensureAudioContextRunning', () => {
  it('resumes a suspended context', async () => {
    const ctx = new MockAudioContext()
    ctx.state = 'suspended'

    await expect(ensureAudioContextRunning(ctx)).resolves.toBe(ctx)
    expect(ctx.resume).toHaveBeenCalledTimes(1)
    expect(ctx.state).toBe('running')
  })

  it('leaves a running context alone', async () => {
    const ctx = new MockAudioContext()

    await ensureAudioContextRunning(ctx)
    expect(ctx.resume).not.toHaveBeenCalled()
  })
})
