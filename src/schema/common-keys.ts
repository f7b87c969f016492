/**
 * Keys every step of a section accepts. The executor interprets them; step
 * kinds never see them in their configuration.
 */

import type { CommonStepOptions, OnErrorPolicy, RecipeSection } from '../recipe/types'
import { optionalBoolean, optionalString, stringList } from '../registry/config-values'
import type { PropertySchema } from '../registry/types'

const COLUMN_SELECTION: PropertySchema = {
  anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
}

const CONDITION: PropertySchema = {
  type: 'string',
  description: 'Condition over $.dataset and $.variables; the step is skipped when false',
}

export const ON_ERROR_POLICIES: readonly OnErrorPolicy[] = ['fail', 'skip_row', 'skip_step']

export const COMMON_KEYS: Readonly<Record<RecipeSection, Record<string, PropertySchema>>> = {
  read: {
    if: CONDITION,
    columns: { ...COLUMN_SELECTION, description: 'Columns to keep after reading' },
    not_columns: { ...COLUMN_SELECTION, description: 'Columns to remove after reading' },
    order_by: { type: 'string', description: '`column` or `column DESC`' },
  },
  wrangles: {
    if: CONDITION,
    on_error: { type: 'string', enum: ON_ERROR_POLICIES, default: 'fail' },
  },
  write: {
    if: CONDITION,
    columns: { ...COLUMN_SELECTION, description: 'Columns to write' },
    not_columns: { ...COLUMN_SELECTION, description: 'Columns to leave out of the write' },
    best_effort: { type: 'boolean', default: false, description: 'Record a failure without failing the run' },
  },
}

function onErrorOf(value: unknown): OnErrorPolicy {
  return value === 'skip_row' || value === 'skip_step' ? value : 'fail'
}

/**
 * Split validated step configuration into the kind's own keys and the
 * executor's common options
 */
export function splitCommon(
  section: RecipeSection,
  config: Readonly<Record<string, unknown>>
): { configuration: Record<string, unknown>; common: CommonStepOptions } {
  const commonKeys = COMMON_KEYS[section]
  const configuration: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(config)) {
    if (!(key in commonKeys)) configuration[key] = value
  }

  return {
    configuration,
    common: {
      if: optionalString(config, 'if'),
      onError: section === 'wrangles' ? onErrorOf(config.on_error) : 'fail',
      columns: section === 'wrangles' ? undefined : stringList(config, 'columns'),
      notColumns: section === 'wrangles' ? undefined : stringList(config, 'not_columns'),
      orderBy: section === 'read' ? optionalString(config, 'order_by') : undefined,
      bestEffort: section === 'write' ? optionalBoolean(config, 'best_effort') ?? false : false,
    },
  }
}
