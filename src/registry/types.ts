/**
 * Step kind definitions - the contract between the registry and the executor
 *
 * A kind is a registration, not a subclass: a name, a configuration schema
 * and a factory producing an executable step from validated configuration.
 */

import type { Logger } from 'pino'
import type { CredentialBundle, RetryPolicy } from '../config/schema'
import type { Acknowledgement } from '../connectors/connector'
import type { Dataset, Row } from '../dataset/dataset'
import type { RecipeSection } from '../errors'
import type { CustomFunctionLoader } from '../functions/custom-function-loader'
import type { TemplateVariables } from '../recipe/template'

export type JsonType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null'

/**
 * The JSON Schema subset step kinds describe their configuration with
 */
export type PropertySchema = {
  type?: JsonType | JsonType[]
  description?: string
  enum?: readonly (string | number | boolean)[]
  items?: PropertySchema
  minItems?: number
  maxItems?: number
  minimum?: number
  default?: unknown
  properties?: Record<string, PropertySchema>
  required?: string[]
  additionalProperties?: boolean | PropertySchema
  anyOf?: PropertySchema[]
}

export type StepSchema = {
  type: 'object'
  description?: string
  properties: Record<string, PropertySchema>
  required?: string[]
  /** Alternative key sets, at least one of which must be present */
  anyOf?: { required: string[] }[]
  /** `true` declares an open schema: unknown keys are accepted */
  additionalProperties?: boolean
}

export type Granularity = 'dataset' | 'row'
export type IsolationPolicy = 'skip_row' | 'skip_step'

/**
 * Resolves a named credential bundle from run-scoped configuration
 */
export type CredentialResolver = (name: string | undefined) => CredentialBundle | undefined

export interface StepContext {
  runId: string
  path: string
  kind: string
  logger: Logger
  variables: TemplateVariables
  credentials: CredentialResolver
  signal?: AbortSignal
}

export interface WrangleContext extends StepContext {
  /** Run this step's nested step list over a dataset */
  runChildren(dataset: Dataset): Promise<Dataset>
  /** Evaluate a condition expression against a scope */
  evaluate(expression: string, scope: Record<string, unknown>): boolean
}

export interface ReadStep {
  type: 'read'
  read(ctx: StepContext): Promise<Dataset>
}

export interface WriteStep {
  type: 'write'
  write(dataset: Dataset, ctx: StepContext): Promise<Acknowledgement>
}

export interface DatasetStep {
  type: 'wrangle'
  granularity: 'dataset'
  apply(dataset: Dataset, ctx: WrangleContext): Dataset | Promise<Dataset>
}

/**
 * A step applied row by row. The executor owns the iteration, so it can
 * isolate failing rows and dispatch rows concurrently while keeping order.
 */
export interface RowStep {
  type: 'wrangle'
  granularity: 'row'
  /** Concurrent rows in flight; defaults to 1 */
  concurrency?: number
  begin?(dataset: Dataset, ctx: WrangleContext): void | Promise<void>
  applyRow(row: Row, index: number, ctx: WrangleContext): Row | Promise<Row>
  /** Runs once after the rows, whether or not they succeeded */
  end?(ctx: WrangleContext): void | Promise<void>
}

export type WrangleStep = DatasetStep | RowStep
export type StepInstance = ReadStep | WriteStep | WrangleStep

export interface StepFactoryContext {
  section: RecipeSection
  kind: string
  path: string
  /** Present only when the caller granted dynamic code loading */
  functions?: CustomFunctionLoader
  connectorRetry: RetryPolicy
  rowConcurrency: number
  /** The step's nested read steps with their projections applied; aggregating reads only */
  readChildren(): Promise<ReadStep[]>
}

export interface StepKindDefinition {
  section: RecipeSection
  kind: string
  description?: string
  schema: StepSchema
  /**
   * Wrangles only; defaults to dataset. A function when the configuration
   * decides, as for steps whose `type` picks the signature
   */
  granularity?: Granularity | ((config: Readonly<Record<string, unknown>>) => Granularity)
  /** Error isolation the kind supports beyond `fail` */
  errorIsolation?: readonly IsolationPolicy[]
  /** Configuration keys whose values name input/output columns */
  columns?: {
    input?: readonly string[]
    output?: readonly string[]
  }
  /** Key a scalar configuration is assigned to: `{file: out.csv}` means `{file: {name: out.csv}}` */
  shorthand?: string
  /** Configuration key holding a nested step list */
  children?: string
  /** Section the nested steps belong to; defaults to wrangles */
  childSection?: RecipeSection
  create(config: Record<string, unknown>, ctx: StepFactoryContext): StepInstance | Promise<StepInstance>
}

/**
 * The granularity a kind declares for one configuration
 */
export function granularityOf(definition: StepKindDefinition, config: Readonly<Record<string, unknown>>): Granularity {
  const declared = definition.granularity ?? 'dataset'
  return typeof declared === 'function' ? declared(config) : declared
}

export interface RegisterOptions {
  /** Explicitly replace an existing kind */
  override?: boolean
}
