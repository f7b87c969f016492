import { describe, it, expect } from 'vitest'
import { BlobConnector } from '../../connectors/blob-connector'
import { readFrom, writeTo } from '../../connectors/connector'
import { Dataset } from '../../dataset/dataset'
import { ConnectionError, ConnectorIOError } from '../../errors'
import { FakeBlobContainer } from '../utils/fakes'

const CREDENTIALS = { connectionString: 'UseDevelopmentStorage=true' }

describe('BlobConnector', () => {
  it('reads a blob in the format of its extension', async () => {
    const container = new FakeBlobContainer()
    container.blobs.set('in/items.csv', Buffer.from('sku,qty\nA1,3\n'))
    const containers: string[] = []
    const connector = new BlobConnector(name => {
      containers.push(name)
      return container
    })

    const dataset = await readFrom(connector, { container: 'raw', path: 'in/items.csv' }, CREDENTIALS)

    expect(containers).toEqual(['raw'])
    expect(dataset.rows).toEqual([{ sku: 'A1', qty: '3' }])
  })

  it('uploads with the content type of the format', async () => {
    const container = new FakeBlobContainer()

    const ack = await writeTo(
      new BlobConnector(() => container),
      { container: 'curated', path: 'out/items.jsonl' },
      Dataset.fromRecords([{ sku: 'A1' }]),
      CREDENTIALS
    )

    expect(container.uploads).toEqual([{ path: 'out/items.jsonl', contentType: 'application/x-ndjson' }])
    expect(container.blobs.get('out/items.jsonl')?.toString('utf-8')).toBe('{"sku":"A1"}\n')
    expect(ack).toEqual({
      connector: 'blob',
      location: 'blob://curated/out/items.jsonl',
      rowsWritten: 1,
      details: { url: 'https://blob.test/out/items.jsonl' },
    })
  })

  it('fails to open a missing container', async () => {
    await expect(
      readFrom(new BlobConnector(() => new FakeBlobContainer(false)), { container: 'gone', path: 'a.csv' }, CREDENTIALS)
    ).rejects.toThrow('Could not open blob connection to blob://gone/a.csv after 1 attempt(s): Container not found: gone')
  })

  it('reports a missing blob as an I/O error', async () => {
    await expect(
      readFrom(new BlobConnector(() => new FakeBlobContainer()), { container: 'raw', path: 'none.csv' }, CREDENTIALS)
    ).rejects.toBeInstanceOf(ConnectorIOError)
  })

  it('requires container and path', async () => {
    await expect(readFrom(new BlobConnector(() => new FakeBlobContainer()), { container: 'raw' }, CREDENTIALS)).rejects.toBeInstanceOf(
      ConnectionError
    )
  })
})
