/**
 * @sortphony/core
 *
 * Step-driven sort engines, per-index mark stacks and the session
 * controller that runs them one tick at a time.
 */

export type {
  BarColor,
  DisplaySink,
  StepKind,
  SortStep,
  SortSteps,
  SortStats,
  SortAlgorithm,
  InitialCondition,
  SessionState,
  VerificationOutcome,
  SessionOutcome,
  SessionResult,
  SessionEventMap,
  Unsubscribe,
  TickScheduler,
  SessionLogger,
  SortSessionOptions
} from './types'

export * from './constants'
export * from './errors'
export * from './generators'
export * from './algorithms'

export { SortSession } from './SortSession'
export { BarArray, barHeight, createStats } from './BarArray'
export type { BarArrayOptions } from './BarArray'
export { MarkStackStore } from './MarkStackStore'
export type { PaintCallback } from './MarkStackStore'
export { verifySort } from './verify'
export type { VerificationSteps } from './verify'
export { createRandom } from './random'
export type { SeededRandom } from './random'
export { createIntervalScheduler, defaultClock } from './scheduler'
export { resolveSessionOptions } from './options'
export type { ResolvedSessionOptions } from './options'
