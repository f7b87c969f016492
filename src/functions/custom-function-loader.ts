/**
 * Custom Function Loader
 *
 * Security model: explicit capability
 * - Code is loaded only through a loader the caller constructs and hands to
 *   the run; without one, any file reference fails
 * - Loaded functions are wrapped as run-scoped step kinds, never added to the
 *   process-wide registry
 */

import { existsSync } from 'fs'
import { isAbsolute, resolve } from 'path'
import { pathToFileURL } from 'url'
import { Dataset, type Row } from '../dataset/dataset'
import { expandColumns } from '../dataset/columns'
import { CustomFunctionError } from '../errors'
import { isRecord, optionalRecord, optionalString, stringList } from '../registry/config-values'
import type { DatasetStep, RowStep, StepKindDefinition, StepSchema } from '../registry/types'

export type CustomFunctionKind = 'row' | 'column' | 'dataset'

export const CUSTOM_FUNCTION_KINDS: readonly CustomFunctionKind[] = ['row', 'column', 'dataset']

export type RowFunction = (row: Row, params: Record<string, unknown>) => unknown
export type ColumnFunction = (values: unknown[], params: Record<string, unknown>) => unknown
export type DatasetFunction = (dataset: Dataset, params: Record<string, unknown>) => unknown

export type CustomFunction = RowFunction | ColumnFunction | DatasetFunction

export interface CustomFunctionReference {
  file: string
  /** Export to use; `default` when omitted */
  symbol?: string
  kind: CustomFunctionKind
}

export interface LoadedFunction {
  name: string
  kind: CustomFunctionKind
  fn: (...args: unknown[]) => unknown
  file?: string
}

export type ModuleImporter = (url: string) => Promise<Record<string, unknown>>

export interface CustomFunctionCapabilityOptions {
  /** Directory relative references resolve against */
  baseDir?: string
  /** Module import, replaceable for sandboxed hosts */
  importer?: ModuleImporter
}

const defaultImporter: ModuleImporter = async url => {
  const loaded: unknown = await import(url)
  return isRecord(loaded) ? loaded : {}
}

function isCallable(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === 'function'
}

function isFunctionKind(value: unknown): value is CustomFunctionKind {
  return CUSTOM_FUNCTION_KINDS.some(kind => kind === value)
}

/**
 * Each signature class takes its subject and, optionally, the step params
 */
export function checkSignature(fn: (...args: unknown[]) => unknown, kind: CustomFunctionKind, name: string): void {
  if (fn.length < 1 || fn.length > 2) {
    throw new CustomFunctionError(
      `Function ${name} declares ${fn.length} parameter(s); ${kind} functions take (${kind === 'row' ? 'row' : kind === 'column' ? 'values' : 'dataset'}, params?)`,
      { symbol: name, kind }
    )
  }
}

export class CustomFunctionLoader {
  private baseDir: string
  private importer: ModuleImporter
  private modules = new Map<string, Record<string, unknown>>()

  constructor(options: CustomFunctionCapabilityOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd()
    this.importer = options.importer ?? defaultImporter
  }

  private async importModule(file: string): Promise<{ path: string; exports: Record<string, unknown> }> {
    const path = isAbsolute(file) ? file : resolve(this.baseDir, file)
    if (!existsSync(path)) {
      throw new CustomFunctionError(`Custom function file not found: ${path}`, { file: path })
    }
    const cached = this.modules.get(path)
    if (cached) return { path, exports: cached }
    let exports: Record<string, unknown>
    try {
      exports = await this.importer(pathToFileURL(path).href)
    } catch (error) {
      throw new CustomFunctionError(
        `Custom function file ${path} failed to load: ${error instanceof Error ? error.message : String(error)}`,
        { file: path },
        { cause: error }
      )
    }
    this.modules.set(path, exports)
    return { path, exports }
  }

  /**
   * Load one function and check its signature class
   */
  async load(reference: CustomFunctionReference): Promise<LoadedFunction> {
    const symbol = reference.symbol ?? 'default'
    const { path, exports } = await this.importModule(reference.file)
    const candidate = exports[symbol]
    if (candidate === undefined) {
      throw new CustomFunctionError(`Function ${symbol} is not exported by ${path}`, { file: path, symbol })
    }
    if (!isCallable(candidate)) {
      throw new CustomFunctionError(`Export ${symbol} of ${path} is not a function`, { file: path, symbol })
    }
    checkSignature(candidate, reference.kind, symbol)
    return { name: symbol, kind: reference.kind, fn: candidate, file: path }
  }

  /**
   * Load every exported function of a file. A function's kind comes from a
   * `kind` property on it, else from the module's `kinds` export, else `row`.
   */
  async loadFile(file: string): Promise<LoadedFunction[]> {
    const { path, exports } = await this.importModule(file)
    const kinds = isRecord(exports.kinds) ? exports.kinds : {}
    const loaded: LoadedFunction[] = []
    for (const [name, value] of Object.entries(exports)) {
      if (name === 'default' || !isCallable(value)) continue
      const declared = 'kind' in value ? value.kind : kinds[name]
      const kind: CustomFunctionKind = isFunctionKind(declared) ? declared : 'row'
      checkSignature(value, kind, name)
      loaded.push({ name, kind, fn: value, file: path })
    }
    if (loaded.length === 0) {
      throw new CustomFunctionError(`No functions exported by ${path}`, { file: path })
    }
    return loaded
  }
}

/**
 * Wrap an in-process function the caller already holds; no loading involved
 */
export function fromFunction(name: string, fn: CustomFunction, kind: CustomFunctionKind): LoadedFunction {
  const callable: unknown = fn
  if (!isCallable(callable)) {
    throw new CustomFunctionError(`Custom function ${name} is not a function`, { symbol: name, kind })
  }
  checkSignature(callable, kind, name)
  return { name, kind, fn: callable }
}

const CUSTOM_SCHEMA: StepSchema = {
  type: 'object',
  description: 'Run-scoped custom function. Keys other than input/output/params are passed as params.',
  properties: {
    input: { type: ['string', 'array'], description: 'Input column(s) for column functions' },
    output: { type: ['string', 'array'], description: 'Output column(s)' },
    params: { type: 'object', description: 'Parameters passed to the function' },
  },
  additionalProperties: true,
}

function paramsOf(config: Record<string, unknown>): Record<string, unknown> {
  const explicit = optionalRecord(config, 'params') ?? {}
  const rest: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(config)) {
    if (key !== 'input' && key !== 'output' && key !== 'params' && key !== 'file' && key !== 'function' && key !== 'type') {
      rest[key] = value
    }
  }
  return { ...rest, ...explicit }
}

function describe(fn: LoadedFunction): string {
  return fn.file ? `${fn.name} (${fn.file})` : fn.name
}

/**
 * Build the executable step for a loaded function and its configuration
 */
export function createCustomStep(fn: LoadedFunction, config: Record<string, unknown>): RowStep | DatasetStep {
  const params = paramsOf(config)
  const output = stringList(config, 'output')

  if (fn.kind === 'row') {
    return {
      type: 'wrangle',
      granularity: 'row',
      async applyRow(row) {
        const result = await fn.fn({ ...row }, params)
        if (output) {
          if (output.length !== 1) {
            throw new CustomFunctionError(`Row function ${describe(fn)} takes a single output column`, { symbol: fn.name })
          }
          return { ...row, [output[0]]: result }
        }
        if (!isRecord(result)) {
          throw new CustomFunctionError(
            `Row function ${describe(fn)} must return an object when no output column is configured`,
            { symbol: fn.name }
          )
        }
        return { ...row, ...result }
      },
    }
  }

  if (fn.kind === 'column') {
    return {
      type: 'wrangle',
      granularity: 'dataset',
      async apply(dataset) {
        const inputs = expandColumns(dataset.columns, stringList(config, 'input') ?? [])
        if (inputs.length === 0) {
          throw new CustomFunctionError(`Column function ${describe(fn)} needs an input column`, { symbol: fn.name })
        }
        const outputs = output ?? inputs
        if (outputs.length !== inputs.length) {
          throw new CustomFunctionError(
            `Column function ${describe(fn)} got ${inputs.length} input and ${outputs.length} output column(s)`,
            { symbol: fn.name }
          )
        }
        let result = dataset
        for (let i = 0; i < inputs.length; i++) {
          const values = await fn.fn(dataset.column(inputs[i]), params)
          if (!Array.isArray(values) || values.length !== dataset.rowCount) {
            throw new CustomFunctionError(
              `Column function ${describe(fn)} must return ${dataset.rowCount} values`,
              { symbol: fn.name }
            )
          }
          result = result.withColumn(outputs[i], values)
        }
        return result
      },
    }
  }

  return {
    type: 'wrangle',
    granularity: 'dataset',
    async apply(dataset) {
      const result = await fn.fn(dataset, params)
      if (result instanceof Dataset) return result
      if (Array.isArray(result) && result.every(isRecord)) return Dataset.fromRecords(result)
      throw new CustomFunctionError(
        `Dataset function ${describe(fn)} must return a Dataset or a list of records`,
        { symbol: fn.name }
      )
    },
  }
}

/**
 * Step kind `custom.<name>` for a loaded function
 */
export function toStepDefinition(fn: LoadedFunction): StepKindDefinition {
  return {
    section: 'wrangles',
    kind: `custom.${fn.name}`,
    description: `Custom ${fn.kind} function ${fn.name}`,
    schema: CUSTOM_SCHEMA,
    granularity: fn.kind === 'row' ? 'row' : 'dataset',
    errorIsolation: fn.kind === 'row' ? ['skip_row', 'skip_step'] : ['skip_step'],
    columns: { input: fn.kind === 'column' ? ['input'] : [], output: ['output'] },
    create: config => createCustomStep(fn, config),
  }
}

export function referenceFromConfig(config: Record<string, unknown>): CustomFunctionReference {
  const file = optionalString(config, 'file')
  if (!file) {
    throw new CustomFunctionError('custom step requires a file')
  }
  const type = config.type ?? 'row'
  if (!isFunctionKind(type)) {
    throw new CustomFunctionError(`Unknown custom function type ${String(type)}`, { file })
  }
  return { file, symbol: optionalString(config, 'function'), kind: type }
}
