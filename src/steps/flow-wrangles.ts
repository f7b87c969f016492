/**
 * Flow wrangles - row filtering and nested step lists
 *
 * `group` and `where` are recursive nodes: their work is running their own
 * `wrangles` list through the executor, which records each nested step.
 */

import { Dataset, type Row } from '../dataset/dataset'
import { ConfigurationError, DatasetError } from '../errors'
import { optionalString, requireString } from '../registry/config-values'
import type { StepKindDefinition, WrangleContext } from '../registry/types'

const ROW_INDEX = '__where_row_index'

function rowCondition(config: Record<string, unknown>): (row: Row, ctx: WrangleContext) => boolean {
  const condition = optionalString(config, 'condition')
  const column = optionalString(config, 'column')
  if (condition) {
    return (row, ctx) => ctx.evaluate(condition, { row })
  }
  if (column && ('equal' in config || 'not_equal' in config)) {
    const accepted = 'equal' in config ? [config.equal].flat() : undefined
    const rejected = 'not_equal' in config ? [config.not_equal].flat() : []
    return row => {
      const value = row[column]
      if (accepted && !accepted.some(candidate => candidate === value)) return false
      return !rejected.some(candidate => candidate === value)
    }
  }
  throw new ConfigurationError('A row condition needs condition, or column with equal / not_equal')
}

export const flowWrangles: StepKindDefinition[] = [
  {
    section: 'wrangles',
    kind: 'filter',
    description: 'Keep rows matching a condition',
    schema: {
      type: 'object',
      properties: {
        condition: { type: 'string', description: 'Expression over $.row and $.variables' },
        column: { type: 'string' },
        equal: { description: 'Value or list of values to keep' },
        not_equal: { description: 'Value or list of values to remove' },
      },
      anyOf: [{ required: ['condition'] }, { required: ['column', 'equal'] }, { required: ['column', 'not_equal'] }],
      additionalProperties: false,
    },
    errorIsolation: ['skip_step'],
    columns: { input: ['column'] },
    create: config => {
      const matches = rowCondition(config)
      return {
        type: 'wrangle',
        granularity: 'dataset',
        apply: (dataset, ctx) => dataset.filterRows(row => matches(row, ctx)),
      }
    },
  },
  {
    section: 'wrangles',
    kind: 'group',
    description: 'Run a nested list of wrangles as one step',
    schema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
    children: 'wrangles',
    errorIsolation: ['skip_step'],
    create: () => ({
      type: 'wrangle',
      granularity: 'dataset',
      apply: (dataset, ctx) => ctx.runChildren(dataset),
    }),
  },
  {
    section: 'wrangles',
    kind: 'where',
    description: 'Run nested wrangles on the rows matching a condition; other rows pass through in place',
    schema: {
      type: 'object',
      properties: {
        condition: { type: 'string', description: 'Expression over $.row and $.variables' },
      },
      required: ['condition'],
      additionalProperties: false,
    },
    children: 'wrangles',
    errorIsolation: ['skip_step'],
    create: config => {
      const condition = requireString(config, 'condition')
      return {
        type: 'wrangle',
        granularity: 'dataset',
        apply: async (dataset, ctx) => {
          const matched = dataset.rows.map(row => ctx.evaluate(condition, { row }))
          const subset = Dataset.fromRecords(
            dataset.rows.flatMap((row, index) => (matched[index] ? [{ ...row, [ROW_INDEX]: index }] : [])),
            [...dataset.columns, ROW_INDEX]
          )
          const processed = await ctx.runChildren(subset)
          if (!processed.hasColumn(ROW_INDEX)) {
            throw new DatasetError('Nested wrangles of where removed its row index column')
          }

          // Reassemble in original order; nested steps may drop rows
          const byIndex = new Map<number, Row[]>()
          for (const row of processed.rows) {
            const index = row[ROW_INDEX]
            if (typeof index !== 'number') {
              throw new DatasetError('Nested wrangles of where changed its row index column')
            }
            const { [ROW_INDEX]: _index, ...rest } = row
            byIndex.set(index, [...(byIndex.get(index) ?? []), rest])
          }
          const rows = dataset.rows.flatMap((row, index) => (matched[index] ? byIndex.get(index) ?? [] : [row]))

          const columns = [...dataset.columns]
          for (const column of processed.columns) {
            if (column !== ROW_INDEX && !columns.includes(column)) columns.push(column)
          }
          return Dataset.fromRecords(rows, columns)
        },
      }
    },
  },
]
