import type { SortSteps } from '../types'
import type { BarArray } from '../BarArray'
import { NEUTRAL } from '../constants'
import { settle, step } from './steps'

/**
 * Adjacent-pair bubble sort: n - 1 passes, each one bound shorter.
 *
 * Each pair is flashed right then left, sounded, and swapped when out of
 * order; the swapped pair stays red for one extra step.
 */
export function* bubbleSort(bars: BarArray): SortSteps {
  const n = bars.size

  for (let i = 0; i < n - 1; i++) {
    for (let j = 0; j < n - i - 1; j++) {
      bars.paint(j + 1, 'red')
      yield step('mark', j + 1)
      bars.paint(j + 1, NEUTRAL)
      bars.paint(j, 'red')
      yield step('mark', j)
      bars.paint(j, NEUTRAL)

      bars.playComparison(j, j + 1)
      if (bars.compareAt(j, j + 1) > 0) {
        bars.paint(j, 'red')
        bars.paint(j + 1, 'red')
        yield step('compare', j, j + 1)
        bars.swap(j, j + 1)
        yield step('swap', j, j + 1)
      } else {
        yield step('compare', j, j + 1)
      }

      bars.paint(j, NEUTRAL)
      bars.paint(j + 1, NEUTRAL)
    }
  }

  settle(bars)
}
