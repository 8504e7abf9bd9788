/**
 * Singleton AudioContext with user gesture handling.
 *
 * Browsers keep a new AudioContext suspended until the page sees a user
 * interaction (click, tap). Resume it from inside that handler.
 */

import type { OutputContext } from './types'

let audioContext: AudioContext | null = null

/**
 * Get or create the AudioContext singleton.
 * Call this from a user gesture handler (click, keypress).
 */
export function getAudioContext(): AudioContext {
  if (!audioContext) {
    audioContext = new AudioContext()
  }
  return audioContext
}

/**
 * Resume `ctx` (the singleton by default) if suspended.
 * Must be called from user gesture.
 */
export async function ensureAudioContextRunning(
  ctx: OutputContext = getAudioContext()
): Promise<OutputContext> {
  if (ctx.state === 'suspended') {
    await ctx.resume()
  }
  return ctx
}
