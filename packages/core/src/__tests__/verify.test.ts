import { verifySort } from '../verify'
import { createBars } from './fixtures'

describe('verifySort', () => {
  it('greens each element, then holds the whole array green', () => {
    const { bars, tones } = createBars([1, 2, 3])
    const steps = verifySort(bars, 0.75)

    expect(steps.next().value).toEqual({ kind: 'verify', indices: [0] })
    expect(steps.next().value).toEqual({ kind: 'verify', indices: [1] })
    expect(steps.next().value).toEqual({ kind: 'hold', indices: [2], seconds: 0.75 })
    expect(bars.colorsSnapshot()).toEqual(['green', 'green', 'green'])

    expect(steps.next()).toEqual({ done: true, value: 'sorted' })
    expect(bars.colorsSnapshot()).toEqual(['white', 'white', 'white'])
    expect(tones.requests).toEqual([1 / 3, 2 / 3, 1])
  })

  it('stops at the first inversion and keeps the green prefix', () => {
    const { bars } = createBars([1, 3, 2])
    const steps = verifySort(bars)

    expect(steps.next().value).toEqual({ kind: 'verify', indices: [0] })
    expect(steps.next()).toEqual({ done: true, value: 'not-sorted' })
    expect(bars.colorsSnapshot()).toEqual(['green', 'green', 'white'])
  })

  it('treats equal neighbours as sorted', () => {
    const { bars } = createBars([2, 2, 2])
    const steps = verifySort(bars)

    let result = steps.next()
    while (!result.done) result = steps.next()

    expect(result.value).toBe('sorted')
  })

  it('holds a single bar for the default half second', () => {
    const { bars } = createBars([1])
    const steps = verifySort(bars)

    expect(steps.next().value).toEqual({ kind: 'hold', indices: [0], seconds: 0.5 })
    expect(steps.next().value).toBe('sorted')
  })
})
