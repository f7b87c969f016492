import { BlobServiceClient } from '@azure/storage-blob'
import type { CredentialBundle } from '../config/schema'
import type { Dataset } from '../dataset/dataset'
import { ConnectorIOError } from '../errors'
import type { Acknowledgement, Connector, ConnectorLocation } from './connector'
import { decode, detectFormat, encode, type DataFormat } from './formats'
import type { RetryPolicy } from '../config/schema'

/**
 * The slice of an Azure container client the connector uses
 */
export interface BlobContainerLike {
  exists(): Promise<boolean>
  download(path: string): Promise<Buffer>
  upload(path: string, data: Buffer, contentType: string): Promise<string>
}

export type BlobContainerFactory = (container: string, credentials: CredentialBundle) => BlobContainerLike

export const createAzureContainer: BlobContainerFactory = (container, credentials) => {
  const connectionString = credentials.connectionString
  if (typeof connectionString !== 'string') {
    throw new Error('blob credentials require a connectionString')
  }
  const containerClient = BlobServiceClient.fromConnectionString(connectionString).getContainerClient(container)
  return {
    exists: () => containerClient.exists(),
    download: path => containerClient.getBlockBlobClient(path).downloadToBuffer(),
    async upload(path, data, contentType) {
      const blockBlobClient = containerClient.getBlockBlobClient(path)
      await blockBlobClient.upload(data, data.length, {
        blobHTTPHeaders: { blobContentType: contentType },
      })
      return blockBlobClient.url
    },
  }
}

const CONTENT_TYPES: Record<DataFormat, string> = {
  csv: 'text/csv',
  json: 'application/json',
  jsonl: 'application/x-ndjson',
  yaml: 'application/yaml',
}

export interface BlobHandle {
  container: BlobContainerLike
  containerName: string
  path: string
  format: DataFormat
  delimiter?: string
}

/**
 * BlobConnector - tabular files in Azure Blob Storage
 *
 * Location keys: `container`, `path`, optional `format`, `delimiter`.
 * Credentials: `connectionString`.
 */
export class BlobConnector implements Connector<BlobHandle> {
  readonly name = 'blob'

  constructor(
    private createContainer: BlobContainerFactory = createAzureContainer,
    readonly retryPolicy?: RetryPolicy
  ) {}

  describe(location: ConnectorLocation): string {
    const container = typeof location.container === 'string' ? location.container : '<container>'
    const path = typeof location.path === 'string' ? location.path : '<path>'
    return `blob://${container}/${path}`
  }

  async open(location: ConnectorLocation, credentials: CredentialBundle = {}): Promise<BlobHandle> {
    if (typeof location.container !== 'string' || typeof location.path !== 'string') {
      throw new Error('blob connector requires container and path')
    }
    const container = this.createContainer(location.container, credentials)
    if (!(await container.exists())) {
      throw new Error(`Container not found: ${location.container}`)
    }
    return {
      container,
      containerName: location.container,
      path: location.path,
      format: detectFormat(location.path, typeof location.format === 'string' ? location.format : undefined),
      delimiter: typeof location.delimiter === 'string' ? location.delimiter : undefined,
    }
  }

  async read(handle: BlobHandle): Promise<Dataset> {
    const data = await handle.container.download(handle.path)
    try {
      return decode(data.toString('utf-8'), handle.format, { delimiter: handle.delimiter })
    } catch (error) {
      throw new ConnectorIOError(
        `Could not decode blob ${handle.path} as ${handle.format}: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        `blob://${handle.containerName}/${handle.path}`,
        undefined,
        { cause: error }
      )
    }
  }

  async write(handle: BlobHandle, dataset: Dataset): Promise<Acknowledgement> {
    const body = Buffer.from(encode(dataset, handle.format, { delimiter: handle.delimiter }), 'utf-8')
    const url = await handle.container.upload(handle.path, body, CONTENT_TYPES[handle.format])
    return {
      connector: this.name,
      location: `blob://${handle.containerName}/${handle.path}`,
      rowsWritten: dataset.rowCount,
      details: { url },
    }
  }

  async close(): Promise<void> {
    // Clients are stateless HTTP wrappers
  }
}
