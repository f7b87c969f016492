/**
 * Dataset - the table threaded between recipe steps
 *
 * Columns are named, ordered and unique. Every row holds a value (possibly
 * null) for every column. Instances are immutable: every operation returns a
 * new Dataset, so a step can never alias the executor's copy.
 */

import { DatasetError } from '../errors'

export type Row = Record<string, unknown>

function freezeRow(columns: readonly string[], source: Row): Row {
  const row: Row = {}
  for (const column of columns) {
    row[column] = source[column] === undefined ? null : source[column]
  }
  return Object.freeze(row)
}

function assertUniqueColumns(columns: readonly string[]): void {
  const seen = new Set<string>()
  for (const column of columns) {
    if (seen.has(column)) {
      throw new DatasetError(`Duplicate column name: ${column}`, { column })
    }
    seen.add(column)
  }
}

export class Dataset {
  readonly columns: readonly string[]
  readonly rows: readonly Row[]

  private constructor(columns: readonly string[], rows: readonly Row[]) {
    this.columns = columns
    this.rows = rows
  }

  static empty(columns: string[] = []): Dataset {
    assertUniqueColumns(columns)
    return new Dataset(Object.freeze([...columns]), Object.freeze([]))
  }

  /**
   * Build from plain records. Column order follows `columns` when given,
   * otherwise first appearance across the records.
   */
  static fromRecords(records: readonly Row[], columns?: readonly string[]): Dataset {
    let order: string[]
    if (columns) {
      order = [...columns]
      assertUniqueColumns(order)
    } else {
      const seen = new Set<string>()
      order = []
      for (const record of records) {
        for (const key of Object.keys(record)) {
          if (!seen.has(key)) {
            seen.add(key)
            order.push(key)
          }
        }
      }
    }
    const frozenColumns = Object.freeze(order)
    return new Dataset(frozenColumns, Object.freeze(records.map(r => freezeRow(frozenColumns, r))))
  }

  /**
   * Build from positional values, e.g. rows decoded from a CSV body
   */
  static fromArrays(columns: readonly string[], values: readonly (readonly unknown[])[]): Dataset {
    const records = values.map(cells => {
      const record: Row = {}
      columns.forEach((column, i) => {
        record[column] = i < cells.length ? cells[i] : null
      })
      return record
    })
    return Dataset.fromRecords(records, columns)
  }

  get rowCount(): number {
    return this.rows.length
  }

  hasColumn(name: string): boolean {
    return this.columns.includes(name)
  }

  column(name: string): unknown[] {
    if (!this.hasColumn(name)) {
      throw new DatasetError(`Column ${name} does not exist`, { column: name })
    }
    return this.rows.map(row => row[name])
  }

  /**
   * Add or replace a column. New columns are appended at the end.
   */
  withColumn(name: string, values: readonly unknown[]): Dataset {
    if (values.length !== this.rowCount) {
      throw new DatasetError(
        `Column ${name} has ${values.length} values but the dataset has ${this.rowCount} rows`,
        { column: name, values: values.length, rows: this.rowCount }
      )
    }
    const columns = this.hasColumn(name) ? [...this.columns] : [...this.columns, name]
    return Dataset.fromRecords(this.rows.map((row, i) => ({ ...row, [name]: values[i] })), columns)
  }

  select(names: readonly string[]): Dataset {
    for (const name of names) {
      if (!this.hasColumn(name)) {
        throw new DatasetError(`Column ${name} does not exist`, { column: name })
      }
    }
    return Dataset.fromRecords(this.rows, names)
  }

  drop(names: readonly string[]): Dataset {
    const dropped = new Set(names)
    return Dataset.fromRecords(this.rows, this.columns.filter(c => !dropped.has(c)))
  }

  rename(mapping: Readonly<Record<string, string>>): Dataset {
    const columns = this.columns.map(c => mapping[c] ?? c)
    assertUniqueColumns(columns)
    const records = this.rows.map(row => {
      const record: Row = {}
      this.columns.forEach((column, i) => {
        record[columns[i]] = row[column]
      })
      return record
    })
    return Dataset.fromRecords(records, columns)
  }

  filterRows(predicate: (row: Row, index: number) => boolean): Dataset {
    return new Dataset(this.columns, Object.freeze(this.rows.filter(predicate)))
  }

  /**
   * Replace rows, keeping existing columns first and appending any new keys
   * in order of first appearance.
   */
  withRows(records: readonly Row[]): Dataset {
    const columns = [...this.columns]
    const seen = new Set(columns)
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key)
          columns.push(key)
        }
      }
    }
    return Dataset.fromRecords(records, columns)
  }

  sortBy(column: string, descending = false): Dataset {
    if (!this.hasColumn(column)) {
      throw new DatasetError(`Column ${column} does not exist`, { column })
    }
    const direction = descending ? -1 : 1
    const indexed = this.rows.map((row, index) => ({ row, index }))
    indexed.sort((a, b) => {
      const cmp = compareValues(a.row[column], b.row[column])
      return cmp !== 0 ? cmp * direction : a.index - b.index
    })
    return new Dataset(this.columns, Object.freeze(indexed.map(entry => entry.row)))
  }

  /**
   * Mutable copies of the rows, safe to hand to external code
   */
  toRecords(): Row[] {
    return this.rows.map(row => ({ ...row }))
  }
}

/**
 * Nulls sort first; numbers numerically; everything else as strings
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0
  if (a === null || a === undefined) return -1
  if (b === null || b === undefined) return 1
  if (typeof a === 'number' && typeof b === 'number') return a - b
  return String(a).localeCompare(String(b))
}
