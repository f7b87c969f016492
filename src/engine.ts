/**
 * RecipeEngine - wires configuration, logging, the registry and the executor
 *
 * One engine serves many runs. Each run gets its own registry overlay for
 * run-scoped kinds (custom functions, overrides), so nothing one run
 * registers is visible to another.
 */

import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import { loadConfigAuto, mergeConfig } from './config/loader'
import type { CredentialBundle, EngineConfig, EngineConfigInput } from './config/schema'
import type { Dataset } from './dataset/dataset'
import { CustomFunctionError, type SchemaViolation } from './errors'
import {
  CustomFunctionLoader,
  fromFunction,
  toStepDefinition,
  type CustomFunction,
  type CustomFunctionCapabilityOptions,
  type CustomFunctionKind,
} from './functions/custom-function-loader'
import { Observability } from './observability'
import { PipelineExecutor } from './pipeline/pipeline-executor'
import { loadRecipe, type RecipeSource } from './recipe/loader'
import type { RecipeDocument } from './recipe/types'
import type { ScopedStepRegistry, StepRegistry } from './registry/step-registry'
import type { StepKindDefinition } from './registry/types'
import type { RunSummary } from './reporting/result-reporter'
import { renderRecipeSchema } from './schema/generator'
import { analyzeRecipe } from './schema/validator'
import { createBuiltinRegistry, type BuiltinDependencies } from './steps/builtins'

export interface RecipeEngineOptions {
  /** Merged over the config found through RECIPEFLOW_CONFIG_PATH or the default paths */
  config?: EngineConfigInput
  /** Skip the config file lookup */
  ignoreConfigFiles?: boolean
  /** Defaults to a frozen registry of the built-ins */
  registry?: StepRegistry
  dependencies?: BuiltinDependencies
  logger?: Logger
}

export type CustomFunctionEntry = CustomFunction | { fn: CustomFunction; kind: CustomFunctionKind }

export interface EngineRunOptions {
  runId?: string
  variables?: Record<string, unknown>
  /** Environment for `${NAME}` placeholders; defaults to process.env */
  env?: Readonly<Record<string, string | undefined>>
  credentials?: Record<string, CredentialBundle>
  /** In-process functions, registered as `custom.<name>` for this run */
  functions?: Record<string, CustomFunctionEntry>
  /** Files whose exported functions are registered as `custom.<name>` for this run */
  customFunctionFiles?: string[]
  /** Grants dynamic code loading; without it any function file fails the run */
  capability?: CustomFunctionLoader | CustomFunctionCapabilityOptions
  /** Further run-scoped kinds */
  definitions?: StepKindDefinition[]
  /** Let run-scoped kinds replace registered ones */
  override?: boolean
  signal?: AbortSignal
  dataset?: Dataset
}

interface PreparedRun {
  document: RecipeDocument
  registry: ScopedStepRegistry
  loader?: CustomFunctionLoader
  variables: Record<string, unknown>
}

function entryOf(entry: CustomFunctionEntry): { fn: CustomFunction; kind: CustomFunctionKind } {
  if (typeof entry !== 'function') return entry
  const declared = 'kind' in entry ? entry.kind : undefined
  return { fn: entry, kind: declared === 'column' || declared === 'dataset' ? declared : 'row' }
}

export class RecipeEngine {
  readonly config: EngineConfig
  readonly registry: StepRegistry
  private logger: Logger
  private executor: PipelineExecutor

  constructor(options: RecipeEngineOptions = {}) {
    this.config = mergeConfig(options.ignoreConfigFiles ? undefined : loadConfigAuto(), options.config)
    const observability = Observability.getInstance({
      level: this.config.logging.level,
      pretty: this.config.logging.pretty,
    })
    this.logger = options.logger ?? observability.logger
    this.registry = options.registry ?? createBuiltinRegistry(options.dependencies)
    this.executor = new PipelineExecutor({
      registry: this.registry,
      logger: this.logger,
      metrics: observability.getMetrics(),
      connectorRetry: this.config.connectors.retry,
      rowConcurrency: this.config.execution.rowConcurrency,
    })
  }

  private templateOptions(options: EngineRunOptions): { variables: Record<string, unknown>; env: Readonly<Record<string, string | undefined>> } {
    return {
      variables: { ...this.config.variables, ...options.variables },
      env: options.env ?? process.env,
    }
  }

  /**
   * Load, validate and execute a recipe. Failures are reported in the
   * summary, not thrown.
   */
  async run(source: RecipeSource, options: EngineRunOptions = {}): Promise<RunSummary> {
    const runId = options.runId ?? uuidv4()
    let prepared: PreparedRun
    try {
      prepared = await this.prepare(source, options)
    } catch (error) {
      return this.executor.reportFailure(error, runId)
    }

    return this.executor.run(prepared.document, {
      runId,
      registry: prepared.registry,
      variables: prepared.variables,
      credentials: { ...this.config.credentials, ...options.credentials },
      signal: options.signal,
      dataset: options.dataset,
      functions: prepared.loader,
    })
  }

  /**
   * Template the recipe and build the run's registry overlay
   */
  private async prepare(source: RecipeSource, options: EngineRunOptions): Promise<PreparedRun> {
    const templateOptions = this.templateOptions(options)
    const document = loadRecipe(source, templateOptions)
    const { registry, loader } = await this.scopeRegistry(options)
    return { document, registry, loader, variables: templateOptions.variables }
  }

  /**
   * The run-scoped overlay: extra definitions, in-process functions and
   * function files, layered over the engine's registry
   */
  private async scopeRegistry(
    options: EngineRunOptions
  ): Promise<{ registry: ScopedStepRegistry; loader?: CustomFunctionLoader }> {
    const registry = this.registry.scope()
    const register = { override: options.override }

    for (const definition of options.definitions ?? []) {
      registry.register(definition, register)
    }
    for (const [name, entry] of Object.entries(options.functions ?? {})) {
      const { fn, kind } = entryOf(entry)
      registry.register(toStepDefinition(fromFunction(name, fn, kind)), register)
    }

    const loader =
      options.capability instanceof CustomFunctionLoader
        ? options.capability
        : options.capability
          ? new CustomFunctionLoader(options.capability)
          : undefined
    const files = options.customFunctionFiles ?? []
    if (files.length > 0) {
      if (!loader) {
        throw new CustomFunctionError(
          `Custom function files were given but custom function loading was not enabled: ${files.join(', ')}`
        )
      }
      for (const file of files) {
        for (const fn of await loader.loadFile(file)) {
          registry.register(toStepDefinition(fn), register)
        }
      }
    }

    return { registry, loader }
  }

  /**
   * Violations of a recipe against the registry the same options would
   * give a run; empty when valid
   */
  async validate(source: RecipeSource, options: EngineRunOptions = {}): Promise<SchemaViolation[]> {
    const document = loadRecipe(source, this.templateOptions(options))
    const { registry } = await this.scopeRegistry(options)
    return analyzeRecipe(document, registry).violations
  }

  /**
   * The recipe JSON Schema for this engine's registry
   */
  schema(): string {
    return renderRecipeSchema(this.registry)
  }
}

/**
 * Command-line contract: run a recipe file, 0 when it completes, 1 when not.
 * Function files named on the command line are loaded with the caller's
 * consent, so they get the loading capability. Rendering the summary is left
 * to `onSummary`.
 */
export async function runRecipeFile(
  recipePath: string,
  customFunctionFiles: string[] = [],
  options: RecipeEngineOptions & { onSummary?: (summary: RunSummary) => void } = {}
): Promise<0 | 1> {
  const { onSummary, ...engineOptions } = options
  let summary: RunSummary
  try {
    const engine = new RecipeEngine(engineOptions)
    summary = await engine.run(
      { path: recipePath },
      {
        customFunctionFiles,
        ...(customFunctionFiles.length > 0 && { capability: new CustomFunctionLoader() }),
      }
    )
  } catch (error) {
    // Engine construction failed, e.g. an invalid config file
    Observability.getInstance().logger.error({ err: error, recipe: recipePath }, 'Could not start run')
    return 1
  }
  onSummary?.(summary)
  return summary.status === 'completed' ? 0 : 1
}
