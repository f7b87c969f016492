/**
 * Combining datasets produced by several read steps
 */

import { DatasetError } from '../errors'
import { Dataset, type Row } from './dataset'

export type JoinHow = 'inner' | 'left' | 'right' | 'outer'

export interface JoinOptions {
  how: JoinHow
  leftOn: string[]
  rightOn: string[]
}

function sameColumnSet(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false
  const set = new Set(a)
  return b.every(column => set.has(column))
}

/**
 * Row-append datasets whose column sets match. Column order follows the first.
 */
export function appendRows(first: Dataset, second: Dataset): Dataset {
  if (first.columns.length === 0 && first.rowCount === 0) return second
  if (second.columns.length === 0 && second.rowCount === 0) return first
  if (!sameColumnSet(first.columns, second.columns)) {
    throw new DatasetError(
      `Cannot append datasets with different columns [${first.columns.join(', ')}] and [${second.columns.join(', ')}]; ` +
        'use a union, concatenate or join read to combine them explicitly',
      { left: [...first.columns], right: [...second.columns] }
    )
  }
  return Dataset.fromRecords([...first.rows, ...second.rows], first.columns)
}

/**
 * Row-append any datasets; columns are the ordered union, gaps are null
 */
export function union(datasets: readonly Dataset[]): Dataset {
  const columns: string[] = []
  const seen = new Set<string>()
  for (const dataset of datasets) {
    for (const column of dataset.columns) {
      if (!seen.has(column)) {
        seen.add(column)
        columns.push(column)
      }
    }
  }
  return Dataset.fromRecords(datasets.flatMap(d => d.rows), columns)
}

/**
 * Place datasets side by side, row i next to row i
 */
export function concatenate(datasets: readonly Dataset[]): Dataset {
  if (datasets.length === 0) return Dataset.empty()
  const rowCount = datasets[0].rowCount
  const columns: string[] = []
  for (const dataset of datasets) {
    if (dataset.rowCount !== rowCount) {
      throw new DatasetError(
        `Cannot concatenate datasets with ${rowCount} and ${dataset.rowCount} rows`,
        { expected: rowCount, actual: dataset.rowCount }
      )
    }
    columns.push(...dataset.columns)
  }
  const records: Row[] = []
  for (let i = 0; i < rowCount; i++) {
    records.push(Object.assign({}, ...datasets.map(d => d.rows[i])))
  }
  return Dataset.fromRecords(records, columns)
}

function keyOf(row: Row, columns: readonly string[]): string {
  return JSON.stringify(columns.map(c => row[c]))
}

/**
 * Join two datasets on explicit key columns. Right-hand columns whose names
 * clash with left-hand ones are suffixed with `_right`; right key columns
 * that share a name with the left key are merged into it.
 */
export function join(left: Dataset, right: Dataset, options: JoinOptions): Dataset {
  const { how, leftOn, rightOn } = options
  if (leftOn.length === 0 || leftOn.length !== rightOn.length) {
    throw new DatasetError('Join requires the same non-zero number of left and right key columns', {
      leftOn,
      rightOn,
    })
  }
  for (const column of leftOn) {
    if (!left.hasColumn(column)) throw new DatasetError(`Join key ${column} missing from left source`, { column })
  }
  for (const column of rightOn) {
    if (!right.hasColumn(column)) throw new DatasetError(`Join key ${column} missing from right source`, { column })
  }

  const mergedKeys = new Set(rightOn.filter((column, i) => column === leftOn[i]))
  const rightNames = new Map<string, string>()
  for (const column of right.columns) {
    if (mergedKeys.has(column)) continue
    rightNames.set(column, left.hasColumn(column) ? `${column}_right` : column)
  }
  const columns = [...left.columns, ...rightNames.values()]

  const rightIndex = new Map<string, number[]>()
  right.rows.forEach((row, i) => {
    const key = keyOf(row, rightOn)
    const bucket = rightIndex.get(key)
    if (bucket) bucket.push(i)
    else rightIndex.set(key, [i])
  })

  const combine = (leftRow: Row | undefined, rightRow: Row | undefined): Row => {
    const record: Row = {}
    for (const column of left.columns) record[column] = leftRow ? leftRow[column] : null
    if (!leftRow && rightRow) {
      rightOn.forEach((column, i) => {
        if (mergedKeys.has(column)) record[leftOn[i]] = rightRow[column]
      })
    }
    for (const [source, target] of rightNames) record[target] = rightRow ? rightRow[source] : null
    return record
  }

  const records: Row[] = []
  const matchedRight = new Set<number>()
  for (const leftRow of left.rows) {
    const matches = rightIndex.get(keyOf(leftRow, leftOn)) ?? []
    if (matches.length === 0) {
      if (how === 'left' || how === 'outer') records.push(combine(leftRow, undefined))
      continue
    }
    for (const i of matches) {
      matchedRight.add(i)
      records.push(combine(leftRow, right.rows[i]))
    }
  }
  if (how === 'right' || how === 'outer') {
    right.rows.forEach((rightRow, i) => {
      if (!matchedRight.has(i)) records.push(combine(undefined, rightRow))
    })
  }

  return Dataset.fromRecords(records, columns)
}
