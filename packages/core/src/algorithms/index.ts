/**
 * Sort engine registry.
 */

import type { SortAlgorithm, SortSteps } from '../types'
import type { BarArray } from '../BarArray'
import { UnknownAlgorithmError } from '../errors'
import { bubbleSort } from './bubbleSort'
import { insertionSort } from './insertionSort'
import { selectionSort } from './selectionSort'
import { mergeSort } from './mergeSort'
import { quickSort } from './quickSort'

export type SortEngine = (bars: BarArray) => SortSteps

export interface SortAlgorithmInfo {
  name: SortAlgorithm
  label: string
  run: SortEngine
}

export const SORT_ALGORITHMS: Readonly<Record<SortAlgorithm, SortAlgorithmInfo>> = {
  bubble: { name: 'bubble', label: 'Bubble Sort', run: bubbleSort },
  insertion: { name: 'insertion', label: 'Insertion Sort', run: insertionSort },
  selection: { name: 'selection', label: 'Selection Sort', run: selectionSort },
  merge: { name: 'merge', label: 'Merge Sort', run: mergeSort },
  quick: { name: 'quick', label: 'Quick Sort', run: quickSort }
}

export function isSortAlgorithm(name: string): name is SortAlgorithm {
  return Object.prototype.hasOwnProperty.call(SORT_ALGORITHMS, name)
}

export function getSortAlgorithm(name: string): SortAlgorithmInfo {
  if (!isSortAlgorithm(name)) {
    throw new UnknownAlgorithmError(name)
  }
  return SORT_ALGORITHMS[name]
}

export { bubbleSort, insertionSort, selectionSort, mergeSort, quickSort }
