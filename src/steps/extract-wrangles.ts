/**
 * Extraction wrangles, applied row by row so a bad value can be isolated
 * with `on_error: skip_row`
 */

import { ConfigurationError } from '../errors'
import { isRecord, optionalBoolean, optionalString, requireString, stringList } from '../registry/config-values'
import type { RowStep, StepKindDefinition } from '../registry/types'
import { COLUMN_LIST } from './text-wrangles'

function parseDictionary(value: unknown, column: string): Record<string, unknown> {
  if (value === null || value === undefined || value === '') return {}
  if (isRecord(value)) return value
  if (typeof value === 'string') {
    const parsed: unknown = JSON.parse(value)
    if (isRecord(parsed)) return parsed
  }
  throw new Error(`Value in ${column} is not a dictionary`)
}

function compile(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'g')
  } catch (error) {
    throw new ConfigurationError(`Invalid regular expression ${pattern}: ${error instanceof Error ? error.message : String(error)}`)
  }
}

export const extractWrangles: StepKindDefinition[] = [
  {
    section: 'wrangles',
    kind: 'split.dictionary',
    description: 'Spread the keys of a dictionary column into columns',
    schema: {
      type: 'object',
      properties: {
        input: { type: 'string' },
        output: COLUMN_LIST,
        prefix: { type: 'string', default: '' },
      },
      required: ['input'],
      additionalProperties: false,
    },
    granularity: 'row',
    errorIsolation: ['skip_row', 'skip_step'],
    columns: { input: ['input'] },
    create: (config): RowStep => {
      const input = requireString(config, 'input')
      const keys = stringList(config, 'output')
      const prefix = optionalString(config, 'prefix') ?? ''
      return {
        type: 'wrangle',
        granularity: 'row',
        applyRow: row => {
          const dictionary = parseDictionary(row[input], input)
          const result = { ...row }
          for (const key of keys ?? Object.keys(dictionary)) {
            result[`${prefix}${key}`] = dictionary[key] ?? null
          }
          return result
        },
      }
    },
  },
  {
    section: 'wrangles',
    kind: 'extract.regex',
    description: 'Collect matches of a pattern from text columns',
    schema: {
      type: 'object',
      properties: {
        input: COLUMN_LIST,
        output: { type: 'string' },
        find: { type: 'string', description: 'Regular expression' },
        first: { type: 'boolean', default: false, description: 'Keep only the first match' },
      },
      required: ['input', 'output', 'find'],
      additionalProperties: false,
    },
    granularity: 'row',
    errorIsolation: ['skip_row', 'skip_step'],
    columns: { input: ['input'], output: ['output'] },
    create: (config): RowStep => {
      const inputs = stringList(config, 'input') ?? []
      const output = requireString(config, 'output')
      const pattern = compile(requireString(config, 'find'))
      const first = optionalBoolean(config, 'first') ?? false
      return {
        type: 'wrangle',
        granularity: 'row',
        applyRow: row => {
          const matches: string[] = []
          for (const column of inputs) {
            const value = row[column]
            if (typeof value !== 'string') continue
            for (const match of value.matchAll(pattern)) matches.push(match[0])
          }
          return { ...row, [output]: first ? matches[0] ?? '' : matches }
        },
      }
    },
  },
]
