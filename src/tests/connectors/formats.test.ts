import { describe, it, expect } from 'vitest'
import { decode, detectFormat, encode, formatCsv, parseCsv } from '../../connectors/formats'
import { Dataset } from '../../dataset/dataset'
import { DatasetError } from '../../errors'

describe('parseCsv', () => {
  it('handles quoted delimiters, escaped quotes and CRLF', () => {
    expect(parseCsv('a,b\r\n"x, y","say ""hi"""\n')).toEqual([
      ['a', 'b'],
      ['x, y', 'say "hi"'],
    ])
  })

  it('keeps a last record without a trailing newline', () => {
    expect(parseCsv('a;b\n1;2', ';')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ])
  })

  it('skips blank lines but keeps quoted empty fields', () => {
    expect(parseCsv('name\nbob\n\n\r\n""\nann\n\n')).toEqual([['name'], ['bob'], [''], ['ann']])
  })

  it('strips a byte order mark', () => {
    expect(parseCsv('\uFEFFid\n1\n')).toEqual([['id'], ['1']])
  })

  it('rejects an unterminated quote', () => {
    expect(() => parseCsv('a\n"open\n')).toThrow(DatasetError)
  })
})

describe('formatCsv', () => {
  it('quotes cells that need it and serialises objects as JSON', () => {
    const dataset = Dataset.fromRecords([{ a: 'x,y', b: null, c: { k: 1 } }])

    expect(formatCsv(dataset)).toBe('a,b,c\n"x,y",,"{""k"":1}"\n')
  })
})

describe('detectFormat', () => {
  it('uses the extension unless a format is given', () => {
    expect(detectFormat('data/rows.NDJSON')).toBe('jsonl')
    expect(detectFormat('notes.txt', 'json')).toBe('json')
    expect(detectFormat('config.yml')).toBe('yaml')
  })

  it('rejects unknown formats', () => {
    expect(() => detectFormat('table.parquet')).toThrow('Cannot determine data format for table.parquet')
  })
})

describe('decode and encode', () => {
  const dataset = Dataset.fromRecords([
    { id: 1, name: 'ada' },
    { id: 2, name: 'bob' },
  ])

  it('adds no rows for blank lines or a doubled trailing newline', () => {
    expect(decode('name\nbob\n\nann\n\n', 'csv').rows).toEqual([{ name: 'bob' }, { name: 'ann' }])
  })

  it('decodes CSV as text cells under the header', () => {
    const decoded = decode('id,name\n1,ada\n', 'csv')

    expect(decoded.columns).toEqual(['id', 'name'])
    expect(decoded.rows).toEqual([{ id: '1', name: 'ada' }])
  })

  it('decodes an empty body as an empty dataset', () => {
    expect(decode('', 'csv').columns).toEqual([])
    expect(decode('  ', 'json').rowCount).toBe(0)
  })

  it('writes one JSON object per line for jsonl', () => {
    expect(encode(dataset, 'jsonl')).toBe('{"id":1,"name":"ada"}\n{"id":2,"name":"bob"}\n')
    expect(decode(encode(dataset, 'jsonl'), 'jsonl').rows).toEqual(dataset.rows)
  })

  it('reads YAML lists of mappings', () => {
    expect(decode('- id: 1\n  name: ada\n', 'yaml').rows).toEqual([{ id: 1, name: 'ada' }])
  })

  it('rejects JSON entries that are not objects', () => {
    expect(() => decode('[1, 2]', 'json')).toThrow('json: entry 0 is not an object')
  })
})
