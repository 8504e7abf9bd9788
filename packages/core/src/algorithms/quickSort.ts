import type { SortSteps } from '../types'
import type { BarArray } from '../BarArray'
import { settle, step } from './steps'

/**
 * Quick sort with a Lomuto partition around the last element.
 */
export function* quickSort(bars: BarArray): SortSteps {
  yield* sortRange(bars, 0, bars.size - 1)
  settle(bars)
}

function* sortRange(bars: BarArray, low: number, high: number): SortSteps {
  if (low >= high) return

  const pivot = bars.value(high)
  let i = low - 1

  bars.marks.mark(high, 'cyan')
  if (!bars.isNeutral(0, bars.size - 2)) {
    yield step('pivot', high)
  }

  for (let j = low; j < high; j++) {
    bars.marks.mark(j, 'red')
    yield step('compare', j, high)

    if (bars.compareTo(j, pivot) < 0) {
      i++
      if (i !== j) {
        bars.marks.mark(i, 'red')
        yield step('mark', i)
        bars.playComparison(i, j)
        bars.swap(i, j)
        yield step('swap', i, j)
      }
    }

    bars.marks.unmark(j)
    if (i >= 0) bars.marks.unmark(i)
    yield step('mark', j)
  }

  const boundary = i + 1
  bars.marks.mark(boundary, 'red')
  yield step('mark', boundary)

  bars.playComparison(boundary, high)
  bars.swap(boundary, high)
  yield step('pivot', boundary, high)

  bars.marks.unmarkAll()
  yield* sortRange(bars, low, boundary - 1)
  yield* sortRange(bars, boundary + 1, high)
}
