/**
 * Per-index color stacks.
 *
 * Nested highlights (a partition range and its pivot, a key and the pair it
 * is being compared with) push onto the same bar without clobbering each
 * other; the bar shows the top of its stack, or the neutral color when it
 * has none. Stacks travel with values on swaps.
 */

import type { BarColor } from './types'
import { NEUTRAL } from './constants'

export type PaintCallback = (index: number, color: BarColor) => void

export class MarkStackStore {
  // Every stack held here is non-empty; top = last element
  private stacks: Map<number, BarColor[]> = new Map()

  constructor(
    private readonly paint: PaintCallback,
    private readonly size: () => number
  ) {}

  // ===========================================================================
  // Queries
  // ===========================================================================

  has(index: number): boolean {
    return this.stacks.has(index)
  }

  /** Displayed color: the top of the stack, or neutral */
  colorAt(index: number): BarColor {
    const stack = this.stacks.get(index)
    return stack ? stack[stack.length - 1] : NEUTRAL
  }

  /** Copy of the stack at `index`, bottom first */
  stackAt(index: number): BarColor[] {
    return [...(this.stacks.get(index) ?? [])]
  }

  markedIndices(): number[] {
    return [...this.stacks.keys()].sort((a, b) => a - b)
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  mark(index: number, color: BarColor): void {
    if (!this.inRange(index)) return

    const stack = this.stacks.get(index)
    if (stack) {
      stack.push(color)
    } else {
      this.stacks.set(index, [color])
    }
    this.paint(index, color)
  }

  /**
   * Pop the top color. Indices without a stack are left alone.
   */
  unmark(index: number): void {
    const stack = this.stacks.get(index)
    if (!stack) return

    stack.pop()
    if (stack.length === 0) {
      this.stacks.delete(index)
    }
    this.repaint(index)
  }

  /**
   * Remove every occurrence of `color` from every stack, keeping the
   * order of the remaining colors.
   */
  unmarkByColor(color: BarColor): void {
    const rebuilt: Map<number, BarColor[]> = new Map()
    const touched: number[] = []

    for (const [index, stack] of this.stacks) {
      const kept = stack.filter(c => c !== color)
      if (kept.length > 0) {
        rebuilt.set(index, kept)
      }
      touched.push(index)
    }

    this.stacks = rebuilt
    for (const index of touched) {
      this.repaint(index)
    }
  }

  unmarkAll(): void {
    const indices = [...this.stacks.keys()]
    this.stacks.clear()
    for (const index of indices) {
      this.paint(index, NEUTRAL)
    }
  }

  /**
   * Exchange the stacks at `a` and `b` and repaint both.
   * Called on every value swap so marks follow their values.
   */
  transferOnSwap(a: number, b: number): void {
    if (!this.inRange(a) || !this.inRange(b)) return

    const stackA = this.stacks.get(a)
    const stackB = this.stacks.get(b)
    this.stacks.delete(a)
    this.stacks.delete(b)
    if (stackA) this.stacks.set(b, stackA)
    if (stackB) this.stacks.set(a, stackB)

    this.repaint(a)
    this.repaint(b)
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private repaint(index: number): void {
    this.paint(index, this.colorAt(index))
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.size()
  }
}
