import type { SortStep, StepKind } from '../types'
import type { BarArray } from '../BarArray'

export function step(kind: StepKind, ...indices: number[]): SortStep {
  return { kind, indices }
}

/**
 * Leave every bar unmarked and neutral once an engine is done.
 */
export function settle(bars: BarArray): void {
  bars.marks.unmarkAll()
  bars.clearPaint()
}
