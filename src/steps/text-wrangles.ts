/**
 * Text wrangles - per-value string transforms on one or more columns
 *
 * `column` selects the inputs (wildcards allowed); `output`, when given,
 * names one output per input, otherwise values are replaced in place.
 * Non-string values pass through untouched.
 */

import { expandColumns } from '../dataset/columns'
import type { Dataset } from '../dataset/dataset'
import { DatasetError } from '../errors'
import { requireString, requireStringList, stringList } from '../registry/config-values'
import type { DatasetStep, PropertySchema, StepKindDefinition } from '../registry/types'

export const COLUMN_LIST: PropertySchema = {
  anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' }, minItems: 1 }],
}

/**
 * Apply a value transform from each input column to its output column
 */
export function mapColumns(
  dataset: Dataset,
  inputSelectors: readonly string[],
  outputNames: readonly string[] | undefined,
  transform: (value: unknown) => unknown
): Dataset {
  const inputs = expandColumns(dataset.columns, inputSelectors)
  const outputs = outputNames ?? inputs
  if (outputs.length !== inputs.length) {
    throw new DatasetError(`Got ${inputs.length} input column(s) but ${outputs.length} output column(s)`, {
      inputs,
      outputs: [...outputs],
    })
  }
  let result = dataset
  inputs.forEach((input, i) => {
    result = result.withColumn(outputs[i], dataset.column(input).map(transform))
  })
  return result
}

function stringTransform(fn: (text: string) => string): (value: unknown) => unknown {
  return value => (typeof value === 'string' ? fn(value) : value)
}

function textStep(
  config: Record<string, unknown>,
  transform: (value: unknown) => unknown
): DatasetStep {
  const inputs = requireStringList(config, 'column')
  const outputs = stringList(config, 'output')
  return {
    type: 'wrangle',
    granularity: 'dataset',
    apply: dataset => mapColumns(dataset, inputs, outputs, transform),
  }
}

function textKind(
  kind: string,
  description: string,
  build: (config: Record<string, unknown>) => (value: unknown) => unknown,
  extra: Record<string, PropertySchema> = {}
): StepKindDefinition {
  return {
    section: 'wrangles',
    kind,
    description,
    schema: {
      type: 'object',
      properties: { column: COLUMN_LIST, output: COLUMN_LIST, ...extra },
      required: ['column', ...Object.keys(extra)],
      additionalProperties: false,
    },
    errorIsolation: ['skip_step'],
    columns: { input: ['column'], output: ['output'] },
    create: config => textStep(config, build(config)),
  }
}

export const textWrangles: StepKindDefinition[] = [
  textKind('uppercase', 'Convert text to upper case', () => stringTransform(text => text.toUpperCase())),
  textKind('lowercase', 'Convert text to lower case', () => stringTransform(text => text.toLowerCase())),
  textKind('trim', 'Remove leading and trailing whitespace', () => stringTransform(text => text.trim())),
  textKind(
    'prefix',
    'Add text before each value',
    config => {
      const value = requireString(config, 'value')
      return stringTransform(text => `${value}${text}`)
    },
    { value: { type: 'string' } }
  ),
  textKind(
    'suffix',
    'Add text after each value',
    config => {
      const value = requireString(config, 'value')
      return stringTransform(text => `${text}${value}`)
    },
    { value: { type: 'string' } }
  ),
]
