/**
 * Column wrangles - reshape the column set without touching values
 */

import { expandColumnMapping, expandColumns } from '../dataset/columns'
import type { Row } from '../dataset/dataset'
import { ConfigurationError, DatasetError } from '../errors'
import { requireStringList, stringList, stringRecord } from '../registry/config-values'
import type { StepKindDefinition } from '../registry/types'
import { COLUMN_LIST } from './text-wrangles'

function valueKey(row: Row, columns: readonly string[]): string {
  return JSON.stringify(columns.map(column => row[column] ?? null))
}

export const columnWrangles: StepKindDefinition[] = [
  {
    section: 'wrangles',
    kind: 'rename',
    description: 'Rename columns, by input/output lists or a mapping of old to new names',
    schema: {
      type: 'object',
      properties: {
        input: COLUMN_LIST,
        output: COLUMN_LIST,
        mapping: { type: 'object', additionalProperties: { type: 'string' } },
      },
      anyOf: [{ required: ['input', 'output'] }, { required: ['mapping'] }],
      additionalProperties: false,
    },
    errorIsolation: ['skip_step'],
    create: config => {
      const inputs = stringList(config, 'input')
      const outputs = stringList(config, 'output')
      const mapping = stringRecord(config, 'mapping')
      if (!mapping && !(inputs && outputs)) {
        throw new ConfigurationError('rename requires input and output, or mapping')
      }
      if (inputs && outputs && inputs.length !== outputs.length) {
        throw new ConfigurationError(`rename got ${inputs.length} input(s) and ${outputs.length} output(s)`)
      }
      const pairs: Record<string, string> = { ...mapping }
      inputs?.forEach((input, i) => {
        if (outputs) pairs[input] = outputs[i]
      })
      return {
        type: 'wrangle',
        granularity: 'dataset',
        apply: dataset => dataset.rename(expandColumnMapping(dataset.columns, pairs)),
      }
    },
  },
  {
    section: 'wrangles',
    kind: 'drop',
    description: 'Remove columns',
    schema: {
      type: 'object',
      properties: { columns: COLUMN_LIST },
      required: ['columns'],
      additionalProperties: false,
    },
    errorIsolation: ['skip_step'],
    columns: { input: ['columns'] },
    create: config => {
      const columns = requireStringList(config, 'columns')
      return {
        type: 'wrangle',
        granularity: 'dataset',
        apply: dataset => dataset.drop(expandColumns(dataset.columns, columns)),
      }
    },
  },
  {
    section: 'wrangles',
    kind: 'select',
    description: 'Keep only the listed columns, in the listed order',
    schema: {
      type: 'object',
      properties: { columns: COLUMN_LIST },
      required: ['columns'],
      additionalProperties: false,
    },
    errorIsolation: ['skip_step'],
    columns: { input: ['columns'] },
    create: config => {
      const columns = requireStringList(config, 'columns')
      return {
        type: 'wrangle',
        granularity: 'dataset',
        apply: dataset => dataset.select(expandColumns(dataset.columns, columns)),
      }
    },
  },
  {
    section: 'wrangles',
    kind: 'copy',
    description: 'Copy columns under new names',
    schema: {
      type: 'object',
      properties: { input: COLUMN_LIST, output: COLUMN_LIST },
      required: ['input', 'output'],
      additionalProperties: false,
    },
    errorIsolation: ['skip_step'],
    columns: { input: ['input'], output: ['output'] },
    create: config => {
      const inputs = requireStringList(config, 'input')
      const outputs = requireStringList(config, 'output')
      return {
        type: 'wrangle',
        granularity: 'dataset',
        apply: dataset => {
          const columns = expandColumns(dataset.columns, inputs)
          if (columns.length !== outputs.length) {
            throw new DatasetError(`copy got ${columns.length} input column(s) and ${outputs.length} output(s)`)
          }
          return columns.reduce((result, column, i) => result.withColumn(outputs[i], dataset.column(column)), dataset)
        },
      }
    },
  },
  {
    section: 'wrangles',
    kind: 'remove_duplicates',
    description: 'Keep the first of rows with equal values; all columns unless listed',
    schema: {
      type: 'object',
      properties: { columns: COLUMN_LIST },
      additionalProperties: false,
    },
    errorIsolation: ['skip_step'],
    create: config => {
      const selectors = stringList(config, 'columns')
      return {
        type: 'wrangle',
        granularity: 'dataset',
        apply: dataset => {
          const columns = selectors ? expandColumns(dataset.columns, selectors) : dataset.columns
          const seen = new Set<string>()
          return dataset.filterRows(row => {
            const key = valueKey(row, columns)
            if (seen.has(key)) return false
            seen.add(key)
            return true
          })
        },
      }
    },
  },
]
