/**
 * WAV export.
 *
 * Writes interleaved float samples as a 16-bit PCM RIFF/WAVE file.
 */

import { AudioFormatError } from '@sortphony/audio'

const HEADER_SIZE = 44
const BITS_PER_SAMPLE = 16
const PCM_FORMAT = 1

// =============================================================================
// Binary Writing Utilities
// =============================================================================

/**
 * Write a 16-bit little-endian unsigned integer.
 */
export function writeUint16LE(value: number): Uint8Array {
  return new Uint8Array([
    value & 0xFF,
    (value >> 8) & 0xFF
  ])
}

/**
 * Write a 32-bit little-endian unsigned integer.
 */
export function writeUint32LE(value: number): Uint8Array {
  return new Uint8Array([
    value & 0xFF,
    (value >> 8) & 0xFF,
    (value >> 16) & 0xFF,
    (value >>> 24) & 0xFF
  ])
}

/**
 * Write ASCII string as bytes.
 */
export function writeAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length)
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0x7F
  }
  return bytes
}

function concatArrays(...arrays: Uint8Array[]): Uint8Array {
  const total = arrays.reduce((sum, array) => sum + array.length, 0)
  const result = new Uint8Array(total)
  let offset = 0
  for (const array of arrays) {
    result.set(array, offset)
    offset += array.length
  }
  return result
}

/**
 * Convert a float sample in [-1, 1] to a signed 16-bit integer.
 * Out-of-range samples are clipped.
 */
export function floatToInt16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, sample))
  return clamped < 0 ? Math.round(clamped * 0x8000) : Math.round(clamped * 0x7FFF)
}

// =============================================================================
// Encoder
// =============================================================================

export function encodeWav(samples: Float32Array, channelCount: number, sampleRate: number): Uint8Array {
  if (!Number.isInteger(channelCount) || channelCount < 1) {
    throw new AudioFormatError(`Channel count must be a positive integer, got ${channelCount}`)
  }
  if (!Number.isInteger(sampleRate) || sampleRate < 1) {
    throw new AudioFormatError(`Sample rate must be a positive integer, got ${sampleRate}`)
  }
  if (samples.length % channelCount !== 0) {
    throw new AudioFormatError(
      `Sample count ${samples.length} is not a multiple of ${channelCount} channels`
    )
  }

  const bytesPerFrame = channelCount * (BITS_PER_SAMPLE / 8)
  const dataSize = samples.length * (BITS_PER_SAMPLE / 8)

  const header = concatArrays(
    writeAscii('RIFF'),
    writeUint32LE(HEADER_SIZE - 8 + dataSize),
    writeAscii('WAVE'),
    writeAscii('fmt '),
    writeUint32LE(16),                        // fmt chunk length
    writeUint16LE(PCM_FORMAT),
    writeUint16LE(channelCount),
    writeUint32LE(sampleRate),
    writeUint32LE(sampleRate * bytesPerFrame), // Byte rate
    writeUint16LE(bytesPerFrame),              // Block align
    writeUint16LE(BITS_PER_SAMPLE),
    writeAscii('data'),
    writeUint32LE(dataSize)
  )

  const file = new Uint8Array(HEADER_SIZE + dataSize)
  file.set(header, 0)

  const view = new DataView(file.buffer, file.byteOffset, file.byteLength)
  for (let i = 0; i < samples.length; i++) {
    view.setInt16(HEADER_SIZE + i * 2, floatToInt16(samples[i]), true)
  }

  return file
}
