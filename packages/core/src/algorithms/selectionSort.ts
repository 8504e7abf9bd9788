import type { SortSteps } from '../types'
import type { BarArray } from '../BarArray'
import { NEUTRAL } from '../constants'
import { settle, step } from './steps'

/**
 * Selection sort.
 *
 * The running minimum is shown cyan and the scan pointer red; every
 * comparison is sounded. Each placed position keeps a green mark until the
 * next one is placed.
 */
export function* selectionSort(bars: BarArray): SortSteps {
  const n = bars.size

  for (let i = 0; i < n; i++) {
    let minIndex = i
    bars.paint(i, 'red')
    yield step('mark', i)

    for (let j = i + 1; j < n; j++) {
      bars.paint(minIndex, 'cyan')
      bars.paint(j, 'red')
      yield step('mark', minIndex, j)

      if (bars.compareAt(j, minIndex) < 0) {
        bars.paint(minIndex, NEUTRAL)
        minIndex = j
        bars.paint(minIndex, 'cyan')
        if (j + 1 < n) {
          bars.paint(j + 1, 'red')
        }
        bars.playComparison(j, minIndex)
      } else {
        bars.paint(j, NEUTRAL)
        bars.paint(minIndex, 'red')
        bars.playComparison(j, minIndex)
        yield step('compare', j, minIndex)
      }
    }

    bars.paint(n - 1, NEUTRAL)
    bars.marks.mark(i, 'red')
    bars.marks.mark(minIndex, 'red')
    yield step('mark', i, minIndex)

    if (minIndex !== i) {
      bars.playComparison(i, minIndex)
      bars.swap(i, minIndex)
      yield step('swap', i, minIndex)
    }

    bars.marks.unmarkByColor('red')
    bars.marks.unmarkByColor('green')
    if (i !== n - 1) {
      bars.marks.mark(i, 'green')
    }
  }

  settle(bars)
}
