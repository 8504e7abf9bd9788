import type { SortSteps } from '../types'
import type { BarArray } from '../BarArray'
import { settle, step } from './steps'

/**
 * Top-down merge sort over the whole array.
 */
export function* mergeSort(bars: BarArray): SortSteps {
  yield* sortRange(bars, 0, bars.size - 1)
  settle(bars)
}

function* sortRange(bars: BarArray, left: number, right: number): SortSteps {
  if (left >= right) return

  const mid = Math.floor((left + right) / 2)
  yield* sortRange(bars, left, mid)
  yield* sortRange(bars, mid + 1, right)
  yield* merge(bars, left, mid, right)
}

/**
 * Merge [left, mid] and [mid + 1, right] through a temporary buffer.
 * Equal heads take from the left run, which keeps the merge stable.
 */
function* merge(bars: BarArray, left: number, mid: number, right: number): SortSteps {
  const merged: number[] = []
  let i = left
  let j = mid + 1

  while (i <= mid && j <= right) {
    bars.marks.mark(i, 'red')
    bars.marks.mark(j, 'green')
    bars.playComparison(i, j)
    yield step('compare', i, j)

    if (bars.compareAt(i, j) <= 0) {
      merged.push(bars.value(i))
      bars.marks.mark(i, 'cyan')
      yield step('mark', i)
      bars.marks.unmarkAll()
      i++
    } else {
      merged.push(bars.value(j))
      bars.marks.mark(j, 'cyan')
      yield step('mark', j)
      bars.marks.unmarkAll()
      j++
    }
  }

  while (i <= mid) {
    bars.playComparison(i, i)
    bars.marks.mark(i, 'red')
    yield step('mark', i)
    merged.push(bars.value(i))
    bars.marks.mark(i, 'white')
    if (!bars.isNeutral(0, bars.size - 1)) {
      yield step('mark', i)
    }
    i++
  }

  while (j <= right) {
    bars.playComparison(j, j)
    bars.marks.mark(j, 'green')
    yield step('mark', j)
    merged.push(bars.value(j))
    bars.marks.mark(j, 'white')
    if (!bars.isNeutral(0, bars.size - 1)) {
      yield step('mark', j)
    }
    j++
  }

  for (let k = 0; k < merged.length; k++) {
    const index = left + k
    bars.playComparison(index, index)
    bars.marks.mark(index, 'red')
    yield step('mark', index)
    bars.write(index, merged[k])
    bars.marks.mark(index, 'white')
    if (!bars.isNeutral(0, bars.size - 1)) {
      yield step('write', index)
    }
  }
}
