/**
 * Sort session controller.
 *
 * Owns the bar array and runs at most one sort at a time: each `advance()`
 * pulls exactly one step from the active engine, then from the verification
 * pass, so progress is tied to ticks and never to wall-clock speed.
 *
 * Usage:
 * ```typescript
 * const pool = new OscillatorPool()
 * const session = new SortSession({ arraySize: 64, tones: pool, display })
 * session.on('complete', result => console.log(result.outcome))
 * session.start('quick')
 * session.play()
 * ```
 */

import type {
  BarColor,
  InitialCondition,
  SessionEventMap,
  SessionOutcome,
  SessionState,
  SortAlgorithm,
  SortSessionOptions,
  SortStats,
  SortStep,
  SortSteps,
  Unsubscribe,
  VerificationOutcome
} from './types'
import type { ResolvedSessionOptions } from './options'
import type { SeededRandom } from './random'
import type { VerificationSteps } from './verify'
import { resolveSessionOptions } from './options'
import { createRandom } from './random'
import { BarArray } from './BarArray'
import { getSortAlgorithm } from './algorithms'
import { generateInitialCondition, isInitialCondition, uniform } from './generators'
import { verifySort } from './verify'
import { SessionDisposedError, UnknownGeneratorError } from './errors'

// =============================================================================
// Event Emitter Helper
// =============================================================================

type EventHandlers = {
  [E in keyof SessionEventMap]: Set<(payload: SessionEventMap[E]) => void>
}

// =============================================================================
// SortSession
// =============================================================================

export class SortSession {
  readonly bars: BarArray

  private readonly options: ResolvedSessionOptions
  private readonly random: SeededRandom

  // Session state
  private currentState: SessionState = 'idle'
  private activeAlgorithm: SortAlgorithm | null = null
  private sortSteps: SortSteps | null = null
  private verifySteps: VerificationSteps | null = null
  private holdUntil: number | null = null

  // Driver state
  private playing = false
  private disposed = false

  private handlers: EventHandlers = {
    state: new Set(),
    step: new Set(),
    complete: new Set(),
    error: new Set()
  }

  constructor(options: SortSessionOptions = {}) {
    this.options = resolveSessionOptions(options)
    this.random = createRandom(this.options.seed)
    this.bars = new BarArray(uniform(this.options.arraySize, this.random), {
      display: this.options.display,
      tones: this.options.tones,
      panelHeight: this.options.panelHeight
    })
    this.bars.resetDisplay()
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get state(): SessionState {
    return this.currentState
  }

  /** Whether a sort or its verification is in progress */
  get isActive(): boolean {
    return this.currentState !== 'idle'
  }

  get isPlaying(): boolean {
    return this.playing
  }

  /** Algorithm of the active session, or null when idle */
  get algorithm(): SortAlgorithm | null {
    return this.activeAlgorithm
  }

  /** Steps taken by the active (or last) session */
  get currentStep(): number {
    return this.bars.stats.steps
  }

  get stats(): SortStats {
    return { ...this.bars.stats }
  }

  get values(): number[] {
    return this.bars.toArray()
  }

  get colors(): BarColor[] {
    return this.bars.colorsSnapshot()
  }

  get seed(): number {
    return this.random.seed
  }

  /** Height of the bar at `index` for the current array, 0 outside it */
  barHeight(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.bars.size) return 0
    return this.bars.heightOf(this.bars.value(index))
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Begin sorting with `algorithm`. Ignored (returns false) while a
   * session is active.
   */
  start(algorithm: SortAlgorithm | string): boolean {
    this.ensureNotDisposed()
    const info = getSortAlgorithm(algorithm)

    if (this.isActive) {
      this.options.logger.debug(`Ignoring start of ${info.label}: session is ${this.currentState}`)
      return false
    }

    this.bars.resetStats()
    this.bars.marks.unmarkAll()
    this.activeAlgorithm = info.name
    this.sortSteps = info.run(this.bars)
    this.setState('running')
    return true
  }

  /**
   * Abandon the active session without verifying it. The array keeps its
   * current order and every bar is redrawn unmarked.
   */
  terminate(): boolean {
    if (!this.isActive) return false

    this.abandonSteps()
    this.bars.resetDisplay()
    this.complete('terminated')
    return true
  }

  /**
   * Load a generated initial condition. Ignored while a session is active.
   */
  randomize(kind: InitialCondition | string): boolean {
    this.ensureNotDisposed()
    if (!isInitialCondition(kind)) {
      throw new UnknownGeneratorError(kind)
    }

    if (this.isActive) {
      this.options.logger.debug(`Ignoring randomize '${kind}': session is ${this.currentState}`)
      return false
    }

    this.bars.load(generateInitialCondition(kind, this.bars.size, this.random))
    return true
  }

  /**
   * Load explicit values. Ignored while a session is active.
   */
  load(values: readonly number[]): boolean {
    this.ensureNotDisposed()
    if (this.isActive) {
      this.options.logger.debug(`Ignoring load: session is ${this.currentState}`)
      return false
    }

    this.bars.load(values)
    return true
  }

  /**
   * Take exactly one step. Returns whether the session is still active.
   *
   * @param now - Clock reading in seconds, used to time the verification hold
   */
  advance(now: number = this.options.clock()): boolean {
    if (this.disposed || !this.isActive) return false

    if (this.holdUntil !== null) {
      if (now < this.holdUntil) return true
      this.holdUntil = null
    }

    try {
      const step = this.currentState === 'running'
        ? this.nextSortStep()
        : this.nextVerificationStep()

      if (step) {
        this.bars.stats.steps++
        if (step.kind === 'hold') {
          this.holdUntil = now + (step.seconds ?? 0)
        }
        this.emit('step', step)
      }
    } catch (e) {
      this.fail(e instanceof Error ? e : new Error(String(e)))
      return false
    }

    return this.isActive
  }

  // ===========================================================================
  // Playback
  // ===========================================================================

  /**
   * Advance automatically at the configured frame rate.
   */
  play(): void {
    this.ensureNotDisposed()
    if (this.playing) return

    this.playing = true
    this.options.scheduler.start(() => {
      this.advance()
    }, 1000 / this.options.frameRate)
  }

  pause(): void {
    if (!this.playing) return
    this.options.scheduler.stop()
    this.playing = false
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  on<E extends keyof SessionEventMap>(
    event: E,
    handler: (payload: SessionEventMap[E]) => void
  ): Unsubscribe {
    const handlers = this.handlers[event]
    handlers.add(handler)
    return () => {
      handlers.delete(handler)
    }
  }

  dispose(): void {
    if (this.disposed) return

    this.pause()
    this.terminate()

    this.handlers.state.clear()
    this.handlers.step.clear()
    this.handlers.complete.clear()
    this.handlers.error.clear()

    this.disposed = true
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private nextSortStep(): SortStep | null {
    const sortSteps = this.sortSteps
    if (!sortSteps) return null

    const result = sortSteps.next()
    if (this.sortSteps !== sortSteps) {
      // Terminated from inside the step
      this.bars.resetDisplay()
      return null
    }
    if (!result.done) return result.value

    this.sortSteps = null
    this.bars.marks.unmarkAll()
    this.verifySteps = verifySort(this.bars, this.options.verifyHoldSeconds)
    this.setState('verifying')
    return this.nextVerificationStep()
  }

  private nextVerificationStep(): SortStep | null {
    const verifySteps = this.verifySteps
    if (!verifySteps) return null

    const result = verifySteps.next()
    if (this.verifySteps !== verifySteps) {
      this.bars.resetDisplay()
      return null
    }
    if (!result.done) return result.value

    this.finish(result.value)
    return null
  }

  private finish(outcome: VerificationOutcome): void {
    this.verifySteps = null
    if (outcome === 'sorted') {
      this.options.logger.info('Array is sorted')
    } else {
      this.options.logger.warn('Array is not sorted')
    }
    this.complete(outcome)
  }

  private complete(outcome: SessionOutcome): void {
    const algorithm = this.activeAlgorithm
    this.activeAlgorithm = null
    this.holdUntil = null
    this.setState('idle')

    if (algorithm) {
      this.emit('complete', { algorithm, outcome, stats: this.stats })
    }
  }

  /**
   * Step generators hold no resources, so dropping them abandons the
   * remaining steps.
   */
  private abandonSteps(): void {
    this.sortSteps = null
    this.verifySteps = null
    this.holdUntil = null
  }

  private fail(error: Error): void {
    if (this.isActive) {
      this.abandonSteps()
      this.bars.resetDisplay()
      this.complete('terminated')
    }
    this.emitError(error)
  }

  private setState(state: SessionState): void {
    if (this.currentState === state) return
    this.currentState = state
    this.emit('state', state)
  }

  private emit<E extends keyof SessionEventMap>(event: E, payload: SessionEventMap[E]): void {
    for (const handler of this.handlers[event]) {
      try {
        handler(payload)
      } catch (e) {
        this.options.logger.error(`SortSession ${event} handler error:`, e)
      }
    }
  }

  private emitError(error: Error): void {
    this.emit('error', error)

    if (this.handlers.error.size === 0) {
      this.options.logger.error('SortSession error:', error)
    }
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new SessionDisposedError()
    }
  }
}
