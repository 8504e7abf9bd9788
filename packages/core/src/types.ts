/**
 * Core type definitions.
 */

import type { ToneSink } from '@sortphony/audio'

// =============================================================================
// Display
// =============================================================================

/** Bar highlight colors. `white` is the neutral, unmarked color. */
export type BarColor = 'white' | 'red' | 'green' | 'cyan'

/**
 * Rendering collaborator. Receives per-bar color and height updates.
 */
export interface DisplaySink {
  setColor(index: number, color: BarColor): void
  setHeight(index: number, height: number): void
}

// =============================================================================
// Steps
// =============================================================================

export type StepKind =
  | 'compare'  // values inspected, tones requested
  | 'swap'     // two values exchanged
  | 'write'    // a value written back from a buffer
  | 'mark'     // highlight change only
  | 'pivot'    // partition pivot chosen or placed
  | 'verify'   // verification advanced one element
  | 'hold'     // pause for `seconds` before the next step

/**
 * Descriptor yielded at every suspension point of a step sequence.
 */
export interface SortStep {
  kind: StepKind
  /** Indices the step touched, in the order they were touched */
  indices: readonly number[]
  /** Pause length, only for `hold` steps */
  seconds?: number
}

/** Lazy step sequence of a sort engine */
export type SortSteps = Generator<SortStep, void, undefined>

/**
 * Counters collected while a sort runs.
 */
export interface SortStats {
  comparisons: number
  swaps: number
  writes: number
  steps: number
}

// =============================================================================
// Algorithms & generators
// =============================================================================

export type SortAlgorithm = 'bubble' | 'insertion' | 'selection' | 'merge' | 'quick'

export type InitialCondition = 'uniform' | 'equal-values' | 'cubic' | 'quintic' | 'descending'

// =============================================================================
// Session
// =============================================================================

export type SessionState = 'idle' | 'running' | 'verifying'

export type VerificationOutcome = 'sorted' | 'not-sorted'

export type SessionOutcome = VerificationOutcome | 'terminated'

/**
 * Summary emitted when a session ends, whichever way it ends.
 */
export interface SessionResult {
  algorithm: SortAlgorithm
  outcome: SessionOutcome
  stats: SortStats
}

export interface SessionEventMap {
  state: SessionState
  step: SortStep
  complete: SessionResult
  error: Error
}

export type Unsubscribe = () => void

/**
 * Drives `tick` periodically. The host's frame primitive sits behind this.
 */
export interface TickScheduler {
  start(tick: () => void, intervalMs: number): void
  stop(): void
}

/** Logging surface the session writes to */
export type SessionLogger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

/**
 * Options for creating a sort session.
 */
export interface SortSessionOptions {
  /** Number of bars (default: 100) */
  arraySize?: number

  /** Height of the drawing panel in display units (default: 1) */
  panelHeight?: number

  /** Ticks per second while playing (default: 30) */
  frameRate?: number

  /** Green hold after a successful verification, seconds (default: 0.5) */
  verifyHoldSeconds?: number

  /** Seed for the initial-condition generators (default: time-based) */
  seed?: number

  /** Rendering collaborator (default: discards updates) */
  display?: DisplaySink

  /** Tone capability (default: silent) */
  tones?: ToneSink

  /** Periodic driver for `play()` (default: setInterval) */
  scheduler?: TickScheduler

  /** Monotonic clock in seconds (default: performance.now() / 1000) */
  clock?: () => number

  /** Logger (default: console) */
  logger?: SessionLogger
}
