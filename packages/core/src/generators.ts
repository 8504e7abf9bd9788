/**
 * Initial-condition generators.
 *
 * Each returns `size` integers in [1, size]. Uniform and descending produce
 * permutations of 1..size; the others produce multisets.
 */

import type { InitialCondition } from './types'
import type { SeededRandom } from './random'
import { UnknownGeneratorError } from './errors'

export type InitialConditionGenerator = (size: number, random: SeededRandom) => number[]

/**
 * Round to the nearest integer, ties to even.
 */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value)
  const diff = value - floor
  if (diff > 0.5) return floor + 1
  if (diff < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

/**
 * Fisher-Yates shuffle in place.
 */
export function shuffle(values: number[], random: SeededRandom): number[] {
  for (let i = values.length - 1; i > 0; i--) {
    const k = random.range(0, i + 1)
    ;[values[k], values[i]] = [values[i], values[k]]
  }
  return values
}

export function uniform(size: number, random: SeededRandom): number[] {
  return shuffle(Array.from({ length: size }, (_, i) => i + 1), random)
}

/**
 * One repeated value with exactly one smaller and one larger outlier at
 * two distinct positions.
 */
export function equalValues(size: number, random: SeededRandom): number[] {
  const value = random.range(1, size)
  const values = new Array<number>(size).fill(value)
  if (size < 2) return values

  const low = random.range(0, size)
  let high = random.range(0, size)
  while (high === low) {
    high = random.range(0, size)
  }

  values[low] = random.range(1, value)
  values[high] = random.range(value + 1, size + 1)
  return values
}

function powerBiased(exponent: number): InitialConditionGenerator {
  return (size, random) => {
    const values = Array.from({ length: size }, (_, i) => {
      const position = i / size
      let biased = 1
      for (let k = 0; k < exponent; k++) biased *= position
      return roundHalfToEven(biased * size) + 1
    })
    return shuffle(values, random)
  }
}

export const cubic: InitialConditionGenerator = powerBiased(3)

export const quintic: InitialConditionGenerator = powerBiased(5)

export function descending(size: number): number[] {
  return Array.from({ length: size }, (_, i) => size - i)
}

export const INITIAL_CONDITIONS: Readonly<Record<InitialCondition, InitialConditionGenerator>> = {
  'uniform': uniform,
  'equal-values': equalValues,
  'cubic': cubic,
  'quintic': quintic,
  'descending': descending
}

export function isInitialCondition(name: string): name is InitialCondition {
  return Object.prototype.hasOwnProperty.call(INITIAL_CONDITIONS, name)
}

export function generateInitialCondition(
  name: string,
  size: number,
  random: SeededRandom
): number[] {
  if (!isInitialCondition(name)) {
    throw new UnknownGeneratorError(name)
  }
  return INITIAL_CONDITIONS[name](size, random)
}
