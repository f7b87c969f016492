import { access, mkdir, readFile, writeFile } from 'fs/promises'
import { constants } from 'fs'
import { dirname, resolve } from 'path'
import type { Dataset } from '../dataset/dataset'
import { ConnectorIOError } from '../errors'
import type { Acknowledgement, Connector, ConnectorLocation } from './connector'
import { decode, detectFormat, encode, type DataFormat } from './formats'
import type { RetryPolicy } from '../config/schema'

export interface FileHandle {
  path: string
  format: DataFormat
  delimiter?: string
}

export type FileAccess = 'read' | 'write'

function locationPath(location: ConnectorLocation): string {
  const name = location.name
  if (typeof name !== 'string' || name === '') {
    throw new ConnectorIOError('file connector requires a name', 'file', '<unnamed>')
  }
  return name
}

/**
 * FileConnector - local files in csv, json, jsonl or yaml
 *
 * Location keys: `name` (path), optional `format`, `delimiter`.
 */
export class FileConnector implements Connector<FileHandle> {
  readonly name = 'file'

  constructor(
    private access: FileAccess,
    private baseDir: string = process.cwd(),
    readonly retryPolicy?: RetryPolicy
  ) {}

  describe(location: ConnectorLocation): string {
    return typeof location.name === 'string' ? location.name : '<unnamed>'
  }

  async open(location: ConnectorLocation): Promise<FileHandle> {
    const path = resolve(this.baseDir, locationPath(location))
    const format = detectFormat(path, typeof location.format === 'string' ? location.format : undefined)
    const delimiter = typeof location.delimiter === 'string' ? location.delimiter : undefined

    if (this.access === 'read') {
      await access(path, constants.R_OK)
    } else {
      await mkdir(dirname(path), { recursive: true })
    }

    return { path, format, delimiter }
  }

  async read(handle: FileHandle): Promise<Dataset> {
    const text = await readFile(handle.path, 'utf-8')
    try {
      return decode(text, handle.format, { delimiter: handle.delimiter })
    } catch (error) {
      throw new ConnectorIOError(
        `Could not decode ${handle.path} as ${handle.format}: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        handle.path,
        undefined,
        { cause: error }
      )
    }
  }

  async write(handle: FileHandle, dataset: Dataset): Promise<Acknowledgement> {
    await writeFile(handle.path, encode(dataset, handle.format, { delimiter: handle.delimiter }), 'utf-8')
    return {
      connector: this.name,
      location: handle.path,
      rowsWritten: dataset.rowCount,
      details: { format: handle.format },
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}
