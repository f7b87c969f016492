/**
 * Pipeline Executor
 *
 * Runs one recipe through its states:
 *   loaded -> validated -> reading -> transforming -> writing -> completed
 * with `failed` reachable from any of them. Steps run strictly in declaration
 * order; the only concurrency is row dispatch inside a row-granular step.
 */

import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import type { CredentialBundle, RetryPolicy } from '../config/schema'
import { NO_RETRY } from '../connectors/retry'
import { expandColumns, isPatternSelector } from '../dataset/columns'
import { Dataset, type Row } from '../dataset/dataset'
import { appendRows } from '../dataset/merge'
import {
  RecipeError,
  RunCancelledError,
  SchemaViolationError,
  StepExecutionError,
  type RecipeErrorCode,
  type SchemaViolation,
} from '../errors'
import type { CustomFunctionLoader } from '../functions/custom-function-loader'
import { InMemoryMetrics, Observability } from '../observability'
import type { TemplateVariables } from '../recipe/template'
import type { CommonStepOptions, RecipeDocument, StepDescriptor } from '../recipe/types'
import type { StepRegistryView } from '../registry/step-registry'
import {
  granularityOf,
  type ReadStep,
  type RowStep,
  type StepContext,
  type StepFactoryContext,
  type StepInstance,
  type WrangleContext,
  type WrangleStep,
} from '../registry/types'
import { ResultReporter, type RowError, type RunSummary } from '../reporting/result-reporter'
import { analyzeRecipe } from '../schema/validator'
import { mapSettledOrdered, type Settled } from './concurrency'
import { ExpressionEvaluator } from './expression-evaluator'

// Errors a factory raises about its own configuration; reported with the step's location
const STEP_CONFIGURATION_CODES: readonly RecipeErrorCode[] = ['CONFIGURATION', 'DATASET', 'EXPRESSION']

export interface PipelineExecutorOptions {
  registry: StepRegistryView
  logger?: Logger
  metrics?: InMemoryMetrics
  connectorRetry?: RetryPolicy
  /** Default bound for concurrent row dispatch */
  rowConcurrency?: number
  clock?: () => Date
}

export interface RunOptions {
  runId?: string
  variables?: TemplateVariables
  /** Named credential bundles, passed unmodified to connectors */
  credentials?: Readonly<Record<string, CredentialBundle>>
  signal?: AbortSignal
  /** Working dataset before the first read */
  dataset?: Dataset
  /** Run-scoped registry overlay; replaces the executor's registry for this run */
  registry?: StepRegistryView
  /** Dynamic code loading capability, granted by the caller */
  functions?: CustomFunctionLoader
}

interface RunState {
  runId: string
  registry: StepRegistryView
  reporter: ResultReporter
  logger: Logger
  variables: TemplateVariables
  credentials: Readonly<Record<string, CredentialBundle>>
  signal?: AbortSignal
  instances: Map<StepDescriptor, StepInstance>
  functions?: CustomFunctionLoader
}

interface RowOutcome {
  dataset: Dataset
  rowErrors: RowError[]
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Projection shared by read and write steps
 */
export function project(dataset: Dataset, common: Readonly<CommonStepOptions>): Dataset {
  let result = dataset
  if (common.columns) {
    result = result.select(expandColumns(result.columns, common.columns))
  }
  if (common.notColumns) {
    result = result.drop(expandColumns(result.columns, common.notColumns))
  }
  if (common.orderBy) {
    const [column, direction] = common.orderBy.trim().split(/\s+/)
    expandColumns(result.columns, column)
    result = result.sortBy(column, direction?.toUpperCase() === 'DESC')
  }
  return result
}

export class PipelineExecutor {
  private registry: StepRegistryView
  private logger: Logger
  private metrics: InMemoryMetrics
  private connectorRetry: RetryPolicy
  private rowConcurrency: number
  private clock: () => Date

  constructor(options: PipelineExecutorOptions) {
    this.registry = options.registry
    this.logger = options.logger ?? Observability.getInstance().logger
    this.metrics = options.metrics ?? Observability.getInstance().getMetrics()
    this.connectorRetry = options.connectorRetry ?? NO_RETRY
    this.rowConcurrency = options.rowConcurrency ?? 1
    this.clock = options.clock ?? (() => new Date())
  }

  /**
   * Run a templated recipe document. Never throws for a failed run: the
   * failure is reported in the returned summary.
   */
  async run(document: RecipeDocument, options: RunOptions = {}): Promise<RunSummary> {
    const runId = options.runId ?? uuidv4()
    const reporter = new ResultReporter(runId, this.clock)
    const logger = this.logger.child({ runId })
    reporter.transition('loaded')

    const registry = options.registry ?? this.registry
    const { violations, recipe } = analyzeRecipe(document, registry)
    if (!recipe) {
      return this.fail(reporter, logger, new SchemaViolationError(violations), violations)
    }
    reporter.transition('validated')

    const state: RunState = {
      runId,
      registry,
      reporter,
      logger,
      variables: options.variables ?? {},
      credentials: options.credentials ?? {},
      signal: options.signal,
      instances: new Map(),
      functions: options.functions,
    }

    try {
      // Every step is built before any I/O, so a bad custom function or
      // configuration fails the run with nothing opened
      await this.resolveAll(state, [...recipe.read, ...recipe.wrangles, ...recipe.write])

      this.checkCancelled(state)
      reporter.transition('reading')
      let dataset = options.dataset ?? Dataset.empty()
      for (const descriptor of recipe.read) {
        dataset = await this.runRead(state, descriptor, dataset)
      }

      this.checkCancelled(state)
      reporter.transition('transforming')
      dataset = await this.runWrangles(state, recipe.wrangles, dataset)

      this.checkCancelled(state)
      reporter.transition('writing')
      for (const descriptor of recipe.write) {
        await this.runWrite(state, descriptor, dataset)
      }

      reporter.transition('completed')
      this.metrics.increment('run.completed')
      logger.info({ rows: dataset.rowCount, writes: recipe.write.length }, 'Run completed')
      return reporter.summarize({ dataset })
    } catch (error) {
      return this.fail(reporter, logger, error)
    }
  }

  /**
   * Summary for a run that failed before its recipe was loaded, e.g. an
   * unresolved template or a custom function that would not load
   */
  reportFailure(error: unknown, runId: string = uuidv4()): RunSummary {
    const reporter = new ResultReporter(runId, this.clock)
    return this.fail(reporter, this.logger.child({ runId }), error)
  }

  private fail(
    reporter: ResultReporter,
    logger: Logger,
    error: unknown,
    violations?: SchemaViolation[]
  ): RunSummary {
    const at = reporter.currentState
    reporter.transition('failed')
    this.metrics.increment('run.failed')
    logger.error({ err: error, state: at }, 'Run failed')
    return reporter.summarize({ error, violations })
  }

  private checkCancelled(state: RunState): void {
    if (state.signal?.aborted) {
      throw new RunCancelledError(state.reporter.currentState ?? 'loaded')
    }
  }

  private async resolveAll(state: RunState, descriptors: readonly StepDescriptor[]): Promise<void> {
    for (const descriptor of descriptors) {
      state.instances.set(descriptor, await this.createStep(state, descriptor))
      if (descriptor.section === 'wrangles' && descriptor.children) {
        await this.resolveAll(state, descriptor.children)
      }
    }
  }

  private async createStep(state: RunState, descriptor: StepDescriptor): Promise<StepInstance> {
    const definition = state.registry.resolve(descriptor.section, descriptor.kind)
    if (!definition) {
      throw new StepExecutionError(`Unknown ${descriptor.section} kind ${descriptor.kind}`, {
        path: descriptor.path,
        stepIndex: descriptor.stepIndex,
        kind: descriptor.kind,
      })
    }

    const factoryContext: StepFactoryContext = {
      section: descriptor.section,
      kind: descriptor.kind,
      path: descriptor.path,
      functions: state.functions,
      connectorRetry: this.connectorRetry,
      rowConcurrency: this.rowConcurrency,
      readChildren: async () => {
        const steps: ReadStep[] = []
        for (const child of descriptor.children ?? []) {
          const instance = await this.createStep(state, child)
          if (instance.type !== 'read') {
            throw new StepExecutionError(`${child.kind} is not a read step`, {
              path: child.path,
              stepIndex: child.stepIndex,
              kind: child.kind,
            })
          }
          steps.push({
            type: 'read',
            read: async ctx => project(await instance.read({ ...ctx, path: child.path, kind: child.kind }), child.common),
          })
        }
        return steps
      },
    }

    try {
      const instance = await definition.create({ ...descriptor.configuration }, factoryContext)
      const expected = descriptor.section === 'wrangles' ? 'wrangle' : descriptor.section
      if (instance.type !== expected) {
        throw new Error(`factory for ${descriptor.kind} built a ${instance.type} step`)
      }
      if (instance.type === 'wrangle') {
        const declared = granularityOf(definition, descriptor.configuration)
        if (instance.granularity !== declared) {
          throw new Error(`factory for ${descriptor.kind} built a ${instance.granularity} step but the kind declares ${declared}`)
        }
      }
      return instance
    } catch (error) {
      // Connector, function and location-carrying errors keep their own code
      if (error instanceof RecipeError && !STEP_CONFIGURATION_CODES.includes(error.code)) throw error
      throw new StepExecutionError(`Cannot build step ${descriptor.kind} at ${descriptor.path}: ${messageOf(error)}`, {
        path: descriptor.path,
        stepIndex: descriptor.stepIndex,
        kind: descriptor.kind,
      }, { cause: error })
    }
  }

  private instanceOf(state: RunState, descriptor: StepDescriptor): StepInstance {
    const instance = state.instances.get(descriptor)
    if (!instance) {
      throw new StepExecutionError(`Step ${descriptor.kind} at ${descriptor.path} was not resolved`, {
        path: descriptor.path,
        stepIndex: descriptor.stepIndex,
        kind: descriptor.kind,
      })
    }
    return instance
  }

  private stepContext(state: RunState, descriptor: StepDescriptor): StepContext {
    return {
      runId: state.runId,
      path: descriptor.path,
      kind: descriptor.kind,
      logger: state.logger.child({ path: descriptor.path, kind: descriptor.kind }),
      variables: state.variables,
      credentials: name => (name === undefined ? undefined : state.credentials[name]),
      signal: state.signal,
    }
  }

  private evaluate(state: RunState, expression: string, scope: Record<string, unknown>): boolean {
    return ExpressionEvaluator.evaluate(expression, { variables: state.variables, ...scope })
  }

  /**
   * The step's `if` against the current dataset
   */
  private conditionHolds(state: RunState, descriptor: StepDescriptor, dataset: Dataset): boolean {
    if (descriptor.common.if === undefined) return true
    return this.evaluate(state, descriptor.common.if, {
      dataset: { rowCount: dataset.rowCount, columns: [...dataset.columns] },
    })
  }

  private toStepError(descriptor: StepDescriptor, error: unknown, rowIndex?: number): RecipeError {
    if (error instanceof StepExecutionError || error instanceof RunCancelledError) return error
    const where = rowIndex === undefined ? '' : ` on row ${rowIndex}`
    return new StepExecutionError(
      `${descriptor.kind} at ${descriptor.path} failed${where}: ${messageOf(error)}`,
      { path: descriptor.path, stepIndex: descriptor.stepIndex, kind: descriptor.kind, rowIndex },
      { cause: error }
    )
  }

  private recordMetrics(descriptor: StepDescriptor, status: string, durationMs: number): void {
    this.metrics.increment(`steps.${status}`, 1, { section: descriptor.section, kind: descriptor.kind })
    this.metrics.timing('step.duration', durationMs, { kind: descriptor.kind })
  }

  private async runRead(state: RunState, descriptor: StepDescriptor, dataset: Dataset): Promise<Dataset> {
    this.checkCancelled(state)
    const pending = state.reporter.begin(descriptor)
    const ctx = this.stepContext(state, descriptor)

    try {
      if (!this.conditionHolds(state, descriptor, dataset)) {
        const record = pending.finish({ status: 'skipped', reason: `condition ${descriptor.common.if} is false` })
        this.recordMetrics(descriptor, record.status, record.durationMs)
        return dataset
      }

      const instance = this.instanceOf(state, descriptor)
      if (instance.type !== 'read') throw new Error(`${descriptor.kind} is not a read step`)
      ctx.logger.debug('Read started')
      const read = project(await instance.read(ctx), descriptor.common)
      const merged = appendRows(dataset, read)
      const record = pending.finish({ status: 'succeeded' })
      this.recordMetrics(descriptor, record.status, record.durationMs)
      ctx.logger.info({ rows: read.rowCount, durationMs: record.durationMs }, 'Read finished')
      return merged
    } catch (error) {
      // Reads are fatal; connector errors keep their own type
      const failure = error instanceof RecipeError ? error : this.toStepError(descriptor, error)
      const record = pending.finish({ status: 'failed', error: failure })
      this.recordMetrics(descriptor, record.status, record.durationMs)
      throw failure
    }
  }

  private async runWrite(state: RunState, descriptor: StepDescriptor, dataset: Dataset): Promise<void> {
    this.checkCancelled(state)
    const pending = state.reporter.begin(descriptor)
    const ctx = this.stepContext(state, descriptor)

    try {
      if (!this.conditionHolds(state, descriptor, dataset)) {
        const record = pending.finish({ status: 'skipped', reason: `condition ${descriptor.common.if} is false` })
        this.recordMetrics(descriptor, record.status, record.durationMs)
        return
      }

      const instance = this.instanceOf(state, descriptor)
      if (instance.type !== 'write') throw new Error(`${descriptor.kind} is not a write step`)
      ctx.logger.debug('Write started')
      const ack = await instance.write(project(dataset, descriptor.common), ctx)
      state.reporter.recordWrite(ack)
      const record = pending.finish({ status: 'succeeded' })
      this.recordMetrics(descriptor, record.status, record.durationMs)
      ctx.logger.info({ rows: ack.rowsWritten, location: ack.location, durationMs: record.durationMs }, 'Write finished')
    } catch (error) {
      const failure = error instanceof RecipeError ? error : this.toStepError(descriptor, error)
      const record = pending.finish({ status: 'failed', error: failure })
      this.recordMetrics(descriptor, record.status, record.durationMs)
      // Earlier writes stay in place either way
      if (descriptor.common.bestEffort) {
        ctx.logger.warn({ err: failure }, 'Best-effort write failed; continuing')
        return
      }
      throw failure
    }
  }

  private async runWrangles(state: RunState, descriptors: readonly StepDescriptor[], dataset: Dataset): Promise<Dataset> {
    let current = dataset
    for (const descriptor of descriptors) {
      current = await this.runWrangle(state, descriptor, current)
    }
    return current
  }

  private async runWrangle(state: RunState, descriptor: StepDescriptor, dataset: Dataset): Promise<Dataset> {
    this.checkCancelled(state)
    const pending = state.reporter.begin(descriptor)
    const base = this.stepContext(state, descriptor)
    const ctx: WrangleContext = {
      ...base,
      runChildren: input => this.runWrangles(state, descriptor.children ?? [], input),
      evaluate: (expression, scope) => this.evaluate(state, expression, scope),
    }

    try {
      if (!this.conditionHolds(state, descriptor, dataset)) {
        const record = pending.finish({ status: 'skipped', reason: `condition ${descriptor.common.if} is false` })
        this.recordMetrics(descriptor, record.status, record.durationMs)
        return dataset
      }

      const instance = this.instanceOf(state, descriptor)
      if (instance.type !== 'wrangle') throw new Error(`${descriptor.kind} is not a wrangle step`)
      if (descriptor.inputColumns) expandColumns(dataset.columns, descriptor.inputColumns)

      const { dataset: result, rowErrors } = await this.applyWrangle(descriptor, instance, dataset, ctx)
      this.checkOutputs(descriptor, result)

      const record = pending.finish({
        status: 'succeeded',
        ...(rowErrors.length > 0 && { skippedRows: rowErrors.length, rowErrors }),
      })
      this.recordMetrics(descriptor, record.status, record.durationMs)
      ctx.logger.debug({ rows: result.rowCount, durationMs: record.durationMs }, 'Wrangle finished')
      if (rowErrors.length > 0) {
        ctx.logger.warn({ skippedRows: rowErrors.length }, 'Rows skipped after errors')
      }
      return result
    } catch (error) {
      const failure = this.toStepError(descriptor, error)
      if (descriptor.common.onError === 'skip_step' && !(failure instanceof RunCancelledError)) {
        const record = pending.finish({ status: 'skipped', error: failure })
        this.recordMetrics(descriptor, record.status, record.durationMs)
        ctx.logger.warn({ err: failure }, 'Step skipped after error')
        return dataset
      }
      const record = pending.finish({ status: 'failed', error: failure })
      this.recordMetrics(descriptor, record.status, record.durationMs)
      throw failure
    }
  }

  private async applyWrangle(
    descriptor: StepDescriptor,
    instance: WrangleStep,
    dataset: Dataset,
    ctx: WrangleContext
  ): Promise<RowOutcome> {
    if (instance.granularity === 'dataset') {
      return { dataset: await instance.apply(dataset, ctx), rowErrors: [] }
    }
    return this.applyRows(descriptor, instance, dataset, ctx)
  }

  /**
   * Dispatch rows with bounded concurrency; results keep input order
   */
  private async applyRows(descriptor: StepDescriptor, step: RowStep, dataset: Dataset, ctx: WrangleContext): Promise<RowOutcome> {
    await step.begin?.(dataset, ctx)
    let settled: Settled<Row>[]
    try {
      settled = await mapSettledOrdered(dataset.rows, step.concurrency ?? 1, (row, index) =>
        step.applyRow({ ...row }, index, ctx)
      )
    } finally {
      await step.end?.(ctx)
    }

    const rows: Row[] = []
    const rowErrors: RowError[] = []
    for (let index = 0; index < settled.length; index++) {
      const outcome = settled[index]
      if (outcome.ok) {
        rows.push(outcome.value)
        continue
      }
      if (descriptor.common.onError !== 'skip_row') {
        // Lowest failing row, whatever order the calls finished in
        throw this.toStepError(descriptor, outcome.error, index)
      }
      rowErrors.push({ rowIndex: index, message: messageOf(outcome.error) })
    }
    return { dataset: dataset.withRows(rows), rowErrors }
  }

  private checkOutputs(descriptor: StepDescriptor, dataset: Dataset): void {
    for (const column of descriptor.outputColumns ?? []) {
      if (isPatternSelector(column) || column.endsWith('?')) continue
      if (!dataset.hasColumn(column)) {
        throw new StepExecutionError(`${descriptor.kind} at ${descriptor.path} did not produce column ${column}`, {
          path: descriptor.path,
          stepIndex: descriptor.stepIndex,
          kind: descriptor.kind,
        })
      }
    }
  }
}
