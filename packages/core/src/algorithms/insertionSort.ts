import type { SortSteps } from '../types'
import type { BarArray } from '../BarArray'
import { NEUTRAL } from '../constants'
import { settle, step } from './steps'

/**
 * Insertion sort by adjacent swaps.
 *
 * The key is marked green, so the mark rides along as the key shifts left;
 * each shifting pair is marked red and sounded. The insertion point stays
 * red until the next pass starts.
 */
export function* insertionSort(bars: BarArray): SortSteps {
  const n = bars.size

  for (let i = 1; i < n; i++) {
    const key = bars.value(i)
    bars.marks.unmarkAll()
    bars.marks.mark(i, 'red')
    yield step('mark', i)

    bars.marks.unmark(i)
    bars.marks.mark(i, 'green')
    bars.paint(i - 1, 'red')
    let j = i - 1
    yield step('mark', i - 1, i)

    while (j >= 0 && bars.compareTo(j, key) > 0) {
      bars.marks.mark(j, 'red')
      bars.marks.mark(j + 1, 'red')
      yield step('compare', j, j + 1)

      bars.playComparison(j, j + 1)
      bars.swap(j, j + 1)
      yield step('swap', j, j + 1)

      bars.marks.unmarkByColor('red')
      j--
    }

    bars.paint(i - 1, NEUTRAL)
    bars.marks.unmarkByColor('red')
    if (i !== n - 1) {
      bars.marks.mark(j + 1, 'red')
    } else {
      bars.marks.unmarkAll()
    }
    yield step('mark', j + 1)
  }

  settle(bars)
}
