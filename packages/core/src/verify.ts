/**
 * Verification pass run after every completed sort.
 */

import type { SortStep, VerificationOutcome } from './types'
import type { BarArray } from './BarArray'
import { NEUTRAL, VERIFY_HOLD_SECONDS } from './constants'

export type VerificationSteps = Generator<SortStep, VerificationOutcome, undefined>

/**
 * Sweep left to right, sounding and greening each element.
 *
 * Stops at the first inversion, leaving the green prefix in place. On
 * success the whole array stays green for `holdSeconds`, then is cleared.
 */
export function* verifySort(
  bars: BarArray,
  holdSeconds: number = VERIFY_HOLD_SECONDS
): VerificationSteps {
  const last = bars.size - 1

  for (let i = 0; i < last; i++) {
    bars.paint(i, 'green')
    bars.playValue(i)
    if (bars.value(i) > bars.value(i + 1)) {
      return 'not-sorted'
    }
    yield { kind: 'verify', indices: [i] }
  }

  bars.paint(last, 'green')
  bars.playValue(last)
  yield { kind: 'hold', indices: [last], seconds: holdSeconds }

  for (let i = 0; i <= last; i++) {
    bars.paint(i, NEUTRAL)
  }
  return 'sorted'
}
