import { describe, it, expect } from 'vitest'
import { mapSettledOrdered } from '../../pipeline/concurrency'

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

describe('mapSettledOrdered', () => {
  it('returns results in input order whatever order calls finish in', async () => {
    const results = await mapSettledOrdered([30, 5, 15, 0], 4, async ms => {
      await delay(ms)
      return ms
    })

    expect(results).toEqual([
      { ok: true, value: 30 },
      { ok: true, value: 5 },
      { ok: true, value: 15 },
      { ok: true, value: 0 },
    ])
  })

  it('never runs more than the limit at once', async () => {
    let active = 0
    let peak = 0

    await mapSettledOrdered([1, 2, 3, 4, 5, 6], 2, async () => {
      active++
      peak = Math.max(peak, active)
      await delay(2)
      active--
    })

    expect(peak).toBe(2)
  })

  it('settles every item, failures included', async () => {
    const failure = new Error('odd')

    const results = await mapSettledOrdered([1, 2, 3], 2, value => {
      if (value % 2 === 1) throw failure
      return value * 10
    })

    expect(results).toEqual([
      { ok: false, error: failure },
      { ok: true, value: 20 },
      { ok: false, error: failure },
    ])
  })

  it('handles an empty input', async () => {
    expect(await mapSettledOrdered([], 3, async () => 1)).toEqual([])
  })
})
