/**
 * Seeded pseudo-random numbers (mulberry32).
 */

export interface SeededRandom {
  readonly seed: number
  /** Float in [0, 1) */
  next(): number
  /**
   * Integer in [min, max). Returns `min` when the range is empty.
   */
  range(min: number, max: number): number
}

export function createRandom(seed: number = Date.now()): SeededRandom {
  let state = seed >>> 0

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  return {
    seed,
    next,
    range(min: number, max: number): number {
      if (max <= min) return min
      return min + Math.floor(next() * (max - min))
    }
  }
}
