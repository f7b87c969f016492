/**
 * Wrangles that call out of process: model prediction and custom functions
 */

import { acquireConnection, type ConnectionLease } from '../connectors/connector'
import { InferenceConnector, type FetchLike, type InferenceHandle } from '../connectors/inference-connector'
import { CustomFunctionError } from '../errors'
import { CUSTOM_FUNCTION_KINDS, createCustomStep, referenceFromConfig } from '../functions/custom-function-loader'
import { optionalNumber, optionalString, requireString, requireStringList } from '../registry/config-values'
import type { RowStep, StepKindDefinition } from '../registry/types'
import { COLUMN_LIST } from './text-wrangles'

export function predictWrangle(fetchImpl?: FetchLike): StepKindDefinition {
  return {
    section: 'wrangles',
    kind: 'predict',
    description: 'Call a model endpoint for every row, in bounded parallel, keeping row order',
    schema: {
      type: 'object',
      properties: {
        input: COLUMN_LIST,
        output: { type: 'string' },
        model_id: { type: 'string' },
        endpoint: { type: 'string' },
        credentials: { type: 'string', description: 'Credential bundle name; defaults to inference' },
        concurrency: { type: 'integer', minimum: 1 },
      },
      required: ['input', 'output', 'model_id'],
      additionalProperties: false,
    },
    granularity: 'row',
    errorIsolation: ['skip_row', 'skip_step'],
    columns: { input: ['input'], output: ['output'] },
    create: (config, factory): RowStep => {
      const inputs = requireStringList(config, 'input')
      const output = requireString(config, 'output')
      const bundle = optionalString(config, 'credentials') ?? 'inference'
      const endpoint = optionalString(config, 'endpoint')
      const location = { model_id: requireString(config, 'model_id'), ...(endpoint && { endpoint }) }
      const connector = new InferenceConnector(fetchImpl, factory.connectorRetry)
      let lease: ConnectionLease<InferenceHandle> | undefined

      return {
        type: 'wrangle',
        granularity: 'row',
        concurrency: optionalNumber(config, 'concurrency') ?? factory.rowConcurrency,
        async begin(_dataset, ctx) {
          lease = await acquireConnection(connector, location, ctx.credentials(bundle), {
            logger: ctx.logger,
            signal: ctx.signal,
          })
        },
        async applyRow(row) {
          if (!lease) throw new Error('predict connection is not open')
          const input = inputs.length === 1 ? row[inputs[0]] : Object.fromEntries(inputs.map(column => [column, row[column]]))
          const prediction = await lease.use(handle => connector.predict(handle, input))
          return { ...row, [output]: prediction }
        },
        async end() {
          const held = lease
          lease = undefined
          await held?.release()
        },
      }
    },
  }
}

export const customWrangle: StepKindDefinition = {
  section: 'wrangles',
  kind: 'custom',
  description: 'Run a function loaded from a file; other keys are passed as params',
  schema: {
    type: 'object',
    properties: {
      file: { type: 'string' },
      function: { type: 'string', description: 'Export name; default export when omitted' },
      type: { type: 'string', enum: CUSTOM_FUNCTION_KINDS, default: 'row' },
      input: COLUMN_LIST,
      output: COLUMN_LIST,
      params: { type: 'object' },
    },
    required: ['file'],
    additionalProperties: true,
  },
  granularity: config => (config.type === 'column' || config.type === 'dataset' ? 'dataset' : 'row'),
  errorIsolation: ['skip_row', 'skip_step'],
  columns: { input: ['input'], output: ['output'] },
  create: async (config, factory) => {
    if (!factory.functions) {
      throw new CustomFunctionError(
        `custom step at ${factory.path} references ${String(config.file)} but custom function loading was not enabled for this run`,
        { file: typeof config.file === 'string' ? config.file : undefined }
      )
    }
    const fn = await factory.functions.load(referenceFromConfig(config))
    return createCustomStep(fn, config)
  },
}
