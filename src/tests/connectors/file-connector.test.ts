import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readFileSync, writeFileSync } from 'fs'
import { readFrom, writeTo } from '../../connectors/connector'
import { FileConnector } from '../../connectors/file-connector'
import { Dataset } from '../../dataset/dataset'
import { ConnectionError, ConnectorIOError } from '../../errors'
import { createTempDir, type TempDir } from '../utils/test-helpers'

describe('FileConnector', () => {
  let dir: TempDir

  beforeEach(() => {
    dir = createTempDir()
  })

  afterEach(() => {
    dir.cleanup()
  })

  it('reads a CSV file relative to its base directory', async () => {
    writeFileSync(dir.file('in.csv'), 'id,name\n1,ada\n2,bob\n')

    const dataset = await readFrom(new FileConnector('read', dir.path), { name: 'in.csv' }, undefined)

    expect(dataset.column('name')).toEqual(['ada', 'bob'])
  })

  it('writes into directories it creates', async () => {
    const dataset = Dataset.fromRecords([{ id: 1, name: 'ada' }])

    const ack = await writeTo(new FileConnector('write', dir.path), { name: 'out/result.json' }, dataset, undefined)

    expect(ack).toEqual({
      connector: 'file',
      location: dir.file('out/result.json'),
      rowsWritten: 1,
      details: { format: 'json' },
    })
    expect(JSON.parse(readFileSync(dir.file('out/result.json'), 'utf-8'))).toEqual([{ id: 1, name: 'ada' }])
  })

  it('honours an explicit format and delimiter', async () => {
    writeFileSync(dir.file('in.dat'), 'a|b\n1|2\n')

    const dataset = await readFrom(new FileConnector('read', dir.path), { name: 'in.dat', format: 'csv', delimiter: '|' }, undefined)

    expect(dataset.rows).toEqual([{ a: '1', b: '2' }])
  })

  it('fails to open a missing file', async () => {
    await expect(readFrom(new FileConnector('read', dir.path), { name: 'missing.csv' }, undefined)).rejects.toBeInstanceOf(
      ConnectionError
    )
  })

  it('reports undecodable content as an I/O error', async () => {
    writeFileSync(dir.file('broken.json'), '{not json')

    await expect(readFrom(new FileConnector('read', dir.path), { name: 'broken.json' }, undefined)).rejects.toBeInstanceOf(
      ConnectorIOError
    )
  })
})
