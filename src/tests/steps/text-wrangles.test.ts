import { describe, it, expect } from 'vitest'
import { Dataset } from '../../dataset/dataset'
import { mapColumns } from '../../steps/text-wrangles'
import { createBuiltinRegistry } from '../../steps/builtins'
import { runWrangles } from '../utils/test-helpers'

const registry = createBuiltinRegistry()

describe('text wrangles', () => {
  it('transforms string values in place and leaves other values alone', async () => {
    const summary = await runWrangles(registry, [{ name: ' Ada ', qty: 3 }, { name: null, qty: 1 }], [
      { trim: { column: 'name' } },
      { uppercase: { column: ['name', 'qty'] } },
    ])

    expect(summary.dataset?.rows).toEqual([
      { name: 'ADA', qty: 3 },
      { name: null, qty: 1 },
    ])
  })

  it('writes to output columns for wildcard inputs', async () => {
    const summary = await runWrangles(registry, [{ title_en: 'Cable', title_de: 'Kabel' }], [
      { lowercase: { column: 'title_*', output: ['en', 'de'] } },
    ])

    expect(summary.dataset?.columns).toEqual(['title_en', 'title_de', 'en', 'de'])
    expect(summary.dataset?.rows[0]).toEqual({ title_en: 'Cable', title_de: 'Kabel', en: 'cable', de: 'kabel' })
  })

  it('adds prefixes and suffixes', async () => {
    const summary = await runWrangles(registry, [{ sku: '42' }], [
      { prefix: { column: 'sku', value: 'SKU-' } },
      { suffix: { column: 'sku', value: '/A', output: 'code' } },
    ])

    expect(summary.dataset?.rows[0]).toEqual({ sku: 'SKU-42', code: 'SKU-42/A' })
  })

  it('fails when inputs and outputs do not pair up', async () => {
    const summary = await runWrangles(registry, [{ a: 'x', b: 'y' }], [{ uppercase: { column: ['a', 'b'], output: 'c' } }])

    expect(summary.status).toBe('failed')
    expect(summary.error?.message).toBe('uppercase at wrangles[0] failed: Got 2 input column(s) but 1 output column(s)')
  })
})

describe('mapColumns', () => {
  it('maps each input to its output', () => {
    const dataset = Dataset.fromRecords([{ a: 1, b: 2 }])

    expect(mapColumns(dataset, ['a', 'b'], ['x', 'y'], value => Number(value) * 10).rows[0]).toEqual({ a: 1, b: 2, x: 10, y: 20 })
  })
})
