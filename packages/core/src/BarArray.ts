/**
 * The array being sorted, together with everything a step may touch:
 * bar colors, mark stacks, tone requests and operation counters.
 *
 * Owned by the stepping lane. The render lane never sees it; it only
 * receives tones through the `ToneSink` capability.
 */

import type { ToneSink } from '@sortphony/audio'
import type { BarColor, DisplaySink, SortStats } from './types'
import { NEUTRAL } from './constants'
import { InvalidOptionsError } from './errors'
import { MarkStackStore } from './MarkStackStore'

export interface BarArrayOptions {
  display: DisplaySink
  tones: ToneSink
  panelHeight: number
}

/**
 * Bar height for `value` in an array of `arraySize` bars.
 */
export function barHeight(value: number, arraySize: number, panelHeight: number): number {
  return value / arraySize * panelHeight
}

export function createStats(): SortStats {
  return { comparisons: 0, swaps: 0, writes: 0, steps: 0 }
}

export class BarArray {
  readonly marks: MarkStackStore
  readonly stats: SortStats = createStats()

  private values: number[]
  private colors: BarColor[]
  private readonly display: DisplaySink
  private readonly tones: ToneSink
  private readonly panelHeight: number

  constructor(values: readonly number[], options: BarArrayOptions) {
    this.display = options.display
    this.tones = options.tones
    this.panelHeight = options.panelHeight
    this.values = validateValues(values)
    this.colors = this.values.map(() => NEUTRAL)
    this.marks = new MarkStackStore((index, color) => this.paint(index, color), () => this.values.length)
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  get size(): number {
    return this.values.length
  }

  value(index: number): number {
    return this.values[index]
  }

  toArray(): number[] {
    return [...this.values]
  }

  /** Color currently shown for the bar at `index` */
  colorAt(index: number): BarColor {
    return this.colors[index] ?? NEUTRAL
  }

  colorsSnapshot(): BarColor[] {
    return [...this.colors]
  }

  heightOf(value: number): number {
    return barHeight(value, this.values.length, this.panelHeight)
  }

  /**
   * Whether every bar in [start, end] is shown neutral.
   * An empty or out-of-range span counts as not neutral.
   */
  isNeutral(start: number, end: number): boolean {
    if (start < 0 || end >= this.values.length || start > end) return false
    for (let i = start; i <= end; i++) {
      if (this.colors[i] !== NEUTRAL) return false
    }
    return true
  }

  isSorted(): boolean {
    for (let i = 0; i < this.values.length - 1; i++) {
      if (this.values[i] > this.values[i + 1]) return false
    }
    return true
  }

  // ===========================================================================
  // Counted comparisons
  // ===========================================================================

  /** `value[a] - value[b]`, counted as one comparison */
  compareAt(a: number, b: number): number {
    this.stats.comparisons++
    return this.values[a] - this.values[b]
  }

  /** `value[index] - value`, counted as one comparison */
  compareTo(index: number, value: number): number {
    this.stats.comparisons++
    return this.values[index] - value
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Exchange two values. Their mark stacks move with them.
   */
  swap(a: number, b: number): void {
    const values = this.values
    ;[values[a], values[b]] = [values[b], values[a]]
    this.stats.swaps++
    this.display.setHeight(a, this.heightOf(values[a]))
    this.display.setHeight(b, this.heightOf(values[b]))
    this.marks.transferOnSwap(a, b)
  }

  write(index: number, value: number): void {
    this.values[index] = value
    this.stats.writes++
    this.display.setHeight(index, this.heightOf(value))
  }

  /**
   * Show `color` at `index` without touching its mark stack.
   */
  paint(index: number, color: BarColor): void {
    if (index < 0 || index >= this.values.length) return
    this.colors[index] = color
    this.display.setColor(index, color)
  }

  /**
   * Replace the contents, drop every mark and redraw all bars neutral.
   */
  load(values: readonly number[]): void {
    this.values = validateValues(values)
    this.colors = this.values.map(() => NEUTRAL)
    this.resetDisplay()
  }

  /**
   * Drop every mark and redraw each bar neutral at its current height.
   */
  resetDisplay(): void {
    this.marks.unmarkAll()
    for (let i = 0; i < this.values.length; i++) {
      this.display.setHeight(i, this.heightOf(this.values[i]))
      this.paint(i, NEUTRAL)
    }
  }

  /**
   * Repaint bars neutral where they show a color but hold no marks.
   */
  clearPaint(): void {
    for (let i = 0; i < this.colors.length; i++) {
      if (this.colors[i] !== NEUTRAL && !this.marks.has(i)) {
        this.paint(i, NEUTRAL)
      }
    }
  }

  resetStats(): void {
    Object.assign(this.stats, createStats())
  }

  // ===========================================================================
  // Tones
  // ===========================================================================

  /** Request a tone for the value at `index` */
  playValue(index: number): void {
    this.tones.request(this.values[index] / this.values.length)
  }

  /**
   * Request tones for two compared bars. `keyValue` stands in for the
   * second bar when the compared value is held outside the array.
   */
  playComparison(a: number, b: number, keyValue?: number): void {
    const n = this.values.length
    this.tones.request(this.values[a] / n)
    this.tones.request((keyValue ?? this.values[b]) / n)
  }
}

function validateValues(values: readonly number[]): number[] {
  if (values.length === 0) {
    throw new InvalidOptionsError('values', '[]', 'at least one bar is required')
  }
  for (const value of values) {
    if (!Number.isInteger(value)) {
      throw new InvalidOptionsError('values', value, 'bar values must be integers')
    }
  }
  return [...values]
}
