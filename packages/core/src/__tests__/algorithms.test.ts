/**
 * Sort engine tests.
 *
 * Engines are driven directly, one step at a time, against a BarArray
 * wired to recording doubles.
 */

import { getSortAlgorithm, isSortAlgorithm, SORT_ALGORITHMS } from '../algorithms'
import { bubbleSort } from '../algorithms/bubbleSort'
import { insertionSort } from '../algorithms/insertionSort'
import { selectionSort } from '../algorithms/selectionSort'
import { mergeSort } from '../algorithms/mergeSort'
import { quickSort } from '../algorithms/quickSort'
import { generateInitialCondition } from '../generators'
import { createRandom } from '../random'
import { UnknownAlgorithmError } from '../errors'
import type { InitialCondition, SortAlgorithm } from '../types'
import { createBars, drain } from './fixtures'

const ALGORITHMS: SortAlgorithm[] = ['bubble', 'insertion', 'selection', 'merge', 'quick']
const CONDITIONS: InitialCondition[] = ['uniform', 'equal-values', 'cubic', 'quintic', 'descending']

function ascending(values: number[]): number[] {
  return [...values].sort((a, b) => a - b)
}

// =============================================================================
// Registry
// =============================================================================

describe('SORT_ALGORITHMS', () => {
  it('registers all five engines', () => {
    expect(Object.keys(SORT_ALGORITHMS)).toEqual(ALGORITHMS)
    expect(getSortAlgorithm('merge').label).toBe('Merge Sort')
  })

  it('rejects unknown names', () => {
    expect(isSortAlgorithm('bogo')).toBe(false)
    expect(isSortAlgorithm('toString')).toBe(false)
    expect(() => getSortAlgorithm('bogo')).toThrow(UnknownAlgorithmError)
  })
})

// =============================================================================
// Shared properties
// =============================================================================

describe.each(ALGORITHMS)('%s sort', algorithm => {
  const engine = getSortAlgorithm(algorithm).run

  it.each(CONDITIONS)('sorts the %s condition and conserves its values', condition => {
    const values = generateInitialCondition(condition, 24, createRandom(7))
    const { bars, display } = createBars(values)

    const steps = drain(engine(bars))

    expect(steps.length).toBeGreaterThan(0)
    expect(bars.toArray()).toEqual(ascending(values))
    expect(bars.isSorted()).toBe(true)
    expect(bars.marks.markedIndices()).toEqual([])
    expect(bars.colorsSnapshot().every(color => color === 'white')).toBe(true)
    expect(display.colors.every(color => color === 'white')).toBe(true)
  })

  it('handles a single bar', () => {
    const { bars } = createBars([1])
    drain(engine(bars))
    expect(bars.toArray()).toEqual([1])
  })

  it('handles two reversed bars', () => {
    const { bars } = createBars([2, 1])
    drain(engine(bars))
    expect(bars.toArray()).toEqual([1, 2])
  })

  it('requests tones within [0, 1]', () => {
    const { bars, tones } = createBars([5, 3, 4, 1, 2])
    drain(engine(bars))

    expect(tones.requests.length).toBeGreaterThan(0)
    expect(tones.requests.every(v => v > 0 && v <= 1)).toBe(true)
  })
})

// =============================================================================
// Per-engine behavior
// =============================================================================

describe('bubbleSort', () => {
  it('flashes each pair, sounds it, and swaps inversions', () => {
    const { bars, tones } = createBars([3, 1, 2])
    const steps = drain(bubbleSort(bars))

    expect(steps.map(s => s.kind)).toEqual([
      'mark', 'mark', 'compare', 'swap',
      'mark', 'mark', 'compare', 'swap',
      'mark', 'mark', 'compare'
    ])
    expect(tones.requests).toHaveLength(6)
    expect(bars.stats).toEqual({ comparisons: 3, swaps: 2, writes: 0, steps: 0 })
  })

  it('shows the compared pair red before swapping', () => {
    const { bars } = createBars([3, 1, 2])
    const steps = bubbleSort(bars)
    steps.next()
    steps.next()
    const third = steps.next()

    expect(third.value).toEqual({ kind: 'compare', indices: [0, 1] })
    expect(bars.colorsSnapshot()).toEqual(['red', 'red', 'white'])
    expect(bars.toArray()).toEqual([3, 1, 2])
  })
})

describe('insertionSort', () => {
  it('carries the green key mark along with the shifted value', () => {
    const { bars, tones } = createBars([2, 1])
    const steps = insertionSort(bars)

    let result = steps.next()
    while (!result.done && result.value.kind !== 'swap') {
      result = steps.next()
    }

    expect(bars.toArray()).toEqual([1, 2])
    expect(bars.marks.stackAt(0)).toEqual(['green', 'red'])
    expect(bars.marks.stackAt(1)).toEqual(['red'])
    expect(tones.requests).toEqual([1, 0.5])
  })

  it('shifts only while the left neighbour is larger', () => {
    const { bars } = createBars([1, 3, 2])
    const steps = drain(insertionSort(bars))

    expect(steps.filter(s => s.kind === 'swap').map(s => s.indices)).toEqual([[1, 2]])
  })
})

describe('selectionSort', () => {
  it('sounds every comparison and every swap', () => {
    const { bars, tones } = createBars([3, 1, 2])
    drain(selectionSort(bars))

    expect(bars.stats.comparisons).toBe(3)
    expect(bars.stats.swaps).toBe(2)
    expect(tones.requests).toHaveLength(10)
  })

  it('shows the running minimum in cyan', () => {
    const { bars } = createBars([3, 1, 2])
    const steps = selectionSort(bars)
    steps.next()
    steps.next()

    expect(bars.colorsSnapshot()).toEqual(['cyan', 'red', 'white'])
  })
})

describe('mergeSort', () => {
  it('merges through a buffer and writes every element back', () => {
    const { bars } = createBars([2, 1])
    const steps = drain(mergeSort(bars))

    expect(steps.map(s => s.kind)).toEqual(['compare', 'mark', 'mark', 'mark', 'mark'])
    expect(bars.stats.comparisons).toBe(1)
    expect(bars.stats.writes).toBe(2)
    expect(bars.stats.swaps).toBe(0)
  })

  it('marks both heads while comparing', () => {
    const { bars } = createBars([4, 2, 3, 1])
    const steps = mergeSort(bars)
    const first = steps.next()

    expect(first.value).toEqual({ kind: 'compare', indices: [0, 1] })
    expect(bars.colorsSnapshot()).toEqual(['red', 'green', 'white', 'white'])
  })
})

describe('quickSort', () => {
  it('places the last-element pivot at its final position', () => {
    const { bars } = createBars([3, 1, 2])
    const steps = quickSort(bars)

    let placed: number[] | null = null
    let pivotIndex = -1
    for (let result = steps.next(); !result.done; result = steps.next()) {
      if (result.value.kind === 'pivot' && placed === null) {
        placed = bars.toArray()
        pivotIndex = result.value.indices[0]
      }
    }

    expect(placed).toEqual([1, 2, 3])
    expect(pivotIndex).toBe(1)
    expect(bars.toArray()).toEqual([1, 2, 3])
  })

  it('takes the partition steps in order', () => {
    const { bars } = createBars([3, 1, 2])
    const steps = drain(quickSort(bars))

    expect(steps.map(s => s.kind)).toEqual([
      'compare', 'mark',
      'compare', 'mark', 'swap', 'mark',
      'mark', 'pivot'
    ])
  })

  it('marks the pivot cyan', () => {
    const { bars } = createBars([3, 1, 2])
    const steps = quickSort(bars)
    steps.next()

    expect(bars.marks.stackAt(2)).toEqual(['cyan'])
    expect(bars.colorAt(0)).toBe('red')
  })
})
