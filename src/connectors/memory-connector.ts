import { Dataset, type Row } from '../dataset/dataset'
import type { Acknowledgement, Connector, ConnectorLocation } from './connector'

/**
 * MemoryStore - named tables held in process
 *
 * Backs the `memory` read/write kinds. Useful for embedding the engine in
 * another program and as the stand-in destination in tests.
 */
export class MemoryStore {
  private tables = new Map<string, Dataset>()

  get(table: string): Dataset | undefined {
    return this.tables.get(table)
  }

  set(table: string, dataset: Dataset): void {
    this.tables.set(table, dataset)
  }

  setRecords(table: string, records: Row[]): void {
    this.tables.set(table, Dataset.fromRecords(records))
  }

  has(table: string): boolean {
    return this.tables.has(table)
  }

  delete(table: string): boolean {
    return this.tables.delete(table)
  }

  names(): string[] {
    return Array.from(this.tables.keys())
  }

  // Helper for testing
  clear(): void {
    this.tables.clear()
  }
}

export interface MemoryHandle {
  table: string
  append: boolean
}

/**
 * MemoryConnector - reads and writes MemoryStore tables
 *
 * Location keys: `table`, optional `append` (write: add rows instead of
 * replacing the table).
 */
export class MemoryConnector implements Connector<MemoryHandle> {
  readonly name = 'memory'

  constructor(private store: MemoryStore) {}

  describe(location: ConnectorLocation): string {
    return `memory://${typeof location.table === 'string' ? location.table : '<unnamed>'}`
  }

  async open(location: ConnectorLocation): Promise<MemoryHandle> {
    if (typeof location.table !== 'string' || location.table === '') {
      throw new Error('memory connector requires a table name')
    }
    return { table: location.table, append: location.append === true }
  }

  async read(handle: MemoryHandle): Promise<Dataset> {
    const dataset = this.store.get(handle.table)
    if (!dataset) {
      throw new Error(`Table not found: ${handle.table}`)
    }
    return dataset
  }

  async write(handle: MemoryHandle, dataset: Dataset): Promise<Acknowledgement> {
    const existing = this.store.get(handle.table)
    const next = handle.append && existing
      ? Dataset.fromRecords([...existing.rows, ...dataset.rows], existing.columns)
      : dataset
    this.store.set(handle.table, next)
    return { connector: this.name, location: `memory://${handle.table}`, rowsWritten: dataset.rowCount }
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

/**
 * Produce `rows` identical rows of `values`
 */
export function generateRows(rows: number, values: Readonly<Record<string, unknown>>): Dataset {
  const columns = Object.keys(values)
  return Dataset.fromRecords(
    Array.from({ length: rows }, () => ({ ...values })),
    columns
  )
}
