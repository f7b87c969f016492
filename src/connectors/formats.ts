/**
 * Tabular encodings shared by the file and object-store connectors
 */

import * as yaml from 'js-yaml'
import { Dataset, type Row } from '../dataset/dataset'
import { DatasetError } from '../errors'

export type DataFormat = 'csv' | 'json' | 'jsonl' | 'yaml'

const EXTENSIONS: Record<string, DataFormat> = {
  csv: 'csv',
  txt: 'csv',
  json: 'json',
  jsonl: 'jsonl',
  ndjson: 'jsonl',
  yaml: 'yaml',
  yml: 'yaml',
}

/**
 * Format from an explicit setting, else from the path's extension
 */
export function detectFormat(path: string, explicit?: string): DataFormat {
  const candidate = (explicit ?? path.split('.').pop() ?? '').toLowerCase()
  const format = EXTENSIONS[candidate]
  if (!format) {
    throw new DatasetError(`Cannot determine data format for ${path}${explicit ? ` (format: ${explicit})` : ''}`, {
      path,
    })
  }
  return format
}

// RFC 4180 with a configurable delimiter
export function parseCsv(text: string, delimiter = ','): string[][] {
  const records: string[][] = []
  let field = ''
  let record: string[] = []
  let quoted = false
  // A record of one empty, unquoted field is a blank line
  let fieldWasQuoted = false
  let i = 0
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text

  while (i < body.length) {
    const char = body[i]
    if (quoted) {
      if (char === '"') {
        if (body[i + 1] === '"') {
          field += '"'
          i += 2
          continue
        }
        quoted = false
      } else {
        field += char
      }
      i++
      continue
    }
    if (char === '"') {
      quoted = true
      fieldWasQuoted = true
    } else if (char === delimiter) {
      record.push(field)
      field = ''
      fieldWasQuoted = false
    } else if (char === '\n' || char === '\r') {
      if (record.length > 0 || field !== '' || fieldWasQuoted) {
        record.push(field)
        records.push(record)
      }
      record = []
      field = ''
      fieldWasQuoted = false
      if (char === '\r' && body[i + 1] === '\n') i++
    } else {
      field += char
    }
    i++
  }
  if (quoted) {
    throw new DatasetError('Unterminated quoted field in CSV input')
  }
  if (field !== '' || record.length > 0 || fieldWasQuoted) {
    record.push(field)
    records.push(record)
  }
  return records
}

function csvCell(value: unknown, delimiter: string): string {
  if (value === null || value === undefined) return ''
  const text = typeof value === 'object' ? JSON.stringify(value) : String(value)
  return /["\r\n]/.test(text) || text.includes(delimiter) ? `"${text.replace(/"/g, '""')}"` : text
}

export function formatCsv(dataset: Dataset, delimiter = ','): string {
  const lines = [dataset.columns.map(c => csvCell(c, delimiter)).join(delimiter)]
  for (const row of dataset.rows) {
    lines.push(dataset.columns.map(c => csvCell(row[c], delimiter)).join(delimiter))
  }
  return lines.join('\n') + '\n'
}

function isRecord(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function recordsFrom(value: unknown, source: string): Row[] {
  const list = Array.isArray(value) ? value : [value]
  return list.map((item, index) => {
    if (!isRecord(item)) {
      throw new DatasetError(`${source}: entry ${index} is not an object`, { index })
    }
    return item
  })
}

export interface CodecOptions {
  delimiter?: string
}

export function decode(text: string, format: DataFormat, options: CodecOptions = {}): Dataset {
  switch (format) {
    case 'csv': {
      const [header, ...rows] = parseCsv(text, options.delimiter)
      return header ? Dataset.fromArrays(header, rows) : Dataset.empty()
    }
    case 'json':
      return text.trim() === '' ? Dataset.empty() : Dataset.fromRecords(recordsFrom(JSON.parse(text), 'json'))
    case 'jsonl':
      return Dataset.fromRecords(
        text
          .split(/\r?\n/)
          .filter(line => line.trim() !== '')
          .flatMap(line => recordsFrom(JSON.parse(line), 'jsonl'))
      )
    case 'yaml': {
      const parsed = yaml.load(text)
      return parsed === undefined || parsed === null ? Dataset.empty() : Dataset.fromRecords(recordsFrom(parsed, 'yaml'))
    }
  }
}

export function encode(dataset: Dataset, format: DataFormat, options: CodecOptions = {}): string {
  switch (format) {
    case 'csv':
      return formatCsv(dataset, options.delimiter)
    case 'json':
      return JSON.stringify(dataset.toRecords(), null, 2) + '\n'
    case 'jsonl':
      return dataset.rows.map(row => JSON.stringify(row)).join('\n') + (dataset.rowCount > 0 ? '\n' : '')
    case 'yaml':
      return yaml.dump(dataset.toRecords())
  }
}
