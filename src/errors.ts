/**
 * Error taxonomy for recipe runs
 *
 * Every failure a run can end in maps to one of these classes. Each carries a
 * stable `code` so summaries and callers can branch without string matching.
 */

export type RecipeErrorCode =
  | 'SCHEMA_VIOLATION'
  | 'TEMPLATE_RESOLUTION'
  | 'CONNECTION'
  | 'CONNECTOR_IO'
  | 'CUSTOM_FUNCTION'
  | 'STEP_EXECUTION'
  | 'CONFIGURATION'
  | 'REGISTRY_CONFLICT'
  | 'RUN_CANCELLED'
  | 'DATASET'
  | 'EXPRESSION'

export class RecipeError extends Error {
  public readonly code: RecipeErrorCode
  public readonly details: Record<string, unknown>

  constructor(code: RecipeErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RecipeError'
    this.code = code
    this.details = details
  }
}

/**
 * The rule a step broke during validation
 */
export type ViolationRule =
  | 'unknown_kind'
  | 'missing_required_key'
  | 'unknown_key'
  | 'wrong_type'
  | 'invalid_value'
  | 'malformed_step'
  | 'unsupported_error_policy'

export type RecipeSection = 'read' | 'wrangles' | 'write'

export interface SchemaViolation {
  /** `recipe` for problems with the document's top level */
  section: RecipeSection | 'recipe'
  /** Location within the recipe, e.g. `wrangles[2].wrangles[0]` */
  path: string
  /** Position within the enclosing step list; -1 for the document level */
  stepIndex: number
  /** Kind name as written in the recipe (empty for malformed steps) */
  kind: string
  rule: ViolationRule
  /** Offending configuration key, where the rule concerns one */
  key?: string
  message: string
}

export class SchemaViolationError extends RecipeError {
  constructor(public readonly violations: SchemaViolation[]) {
    super(
      'SCHEMA_VIOLATION',
      `Recipe failed validation with ${violations.length} violation(s):\n  - ${violations.map(v => `${v.path} (${v.kind || '?'}): ${v.message}`).join('\n  - ')}`,
      { violations }
    )
    this.name = 'SchemaViolationError'
  }
}

export class TemplateResolutionError extends RecipeError {
  constructor(message: string, details: { variable?: string; file?: string; chain?: string[] } = {}) {
    super('TEMPLATE_RESOLUTION', message, details)
    this.name = 'TemplateResolutionError'
  }
}

export class ConnectionError extends RecipeError {
  constructor(
    message: string,
    public readonly connector: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super('CONNECTION', message, { connector, attempts }, options)
    this.name = 'ConnectionError'
  }
}

export interface RowRange {
  start: number
  end: number
}

export class ConnectorIOError extends RecipeError {
  constructor(
    message: string,
    public readonly connector: string,
    public readonly location: string,
    public readonly rowRange?: RowRange,
    options?: { cause?: unknown }
  ) {
    super('CONNECTOR_IO', message, { connector, location, ...(rowRange && { rowRange }) }, options)
    this.name = 'ConnectorIOError'
  }
}

export class CustomFunctionError extends RecipeError {
  constructor(message: string, details: { file?: string; symbol?: string; kind?: string } = {}, options?: { cause?: unknown }) {
    super('CUSTOM_FUNCTION', message, details, options)
    this.name = 'CustomFunctionError'
  }
}

export interface StepErrorContext {
  path: string
  stepIndex: number
  kind: string
  rowIndex?: number
}

export class StepExecutionError extends RecipeError {
  public readonly path: string
  public readonly stepIndex: number
  public readonly kind: string
  public readonly rowIndex?: number

  constructor(message: string, context: StepErrorContext, options?: { cause?: unknown }) {
    super('STEP_EXECUTION', message, { ...context }, options)
    this.name = 'StepExecutionError'
    this.path = context.path
    this.stepIndex = context.stepIndex
    this.kind = context.kind
    this.rowIndex = context.rowIndex
  }
}

export class ConfigurationError extends RecipeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIGURATION', message, details)
    this.name = 'ConfigurationError'
  }
}

export class RegistryConflictError extends RecipeError {
  constructor(message: string, details: { section: string; kind: string }) {
    super('REGISTRY_CONFLICT', message, details)
    this.name = 'RegistryConflictError'
  }
}

export class RunCancelledError extends RecipeError {
  constructor(public readonly state: string) {
    super('RUN_CANCELLED', `Run cancelled while ${state}`, { state })
    this.name = 'RunCancelledError'
  }
}

export class DatasetError extends RecipeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('DATASET', message, details)
    this.name = 'DatasetError'
  }
}

export class ExpressionError extends RecipeError {
  constructor(message: string, public readonly expression: string) {
    super('EXPRESSION', message, { expression })
    this.name = 'ExpressionError'
  }
}

export interface SerializedError {
  name: string
  code?: RecipeErrorCode
  message: string
  details?: Record<string, unknown>
}

/**
 * Flatten an error into a plain record for run summaries
 */
export function serializeError(error: unknown): SerializedError {
  if (error instanceof RecipeError) {
    return { name: error.name, code: error.code, message: error.message, details: error.details }
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message }
  }
  return { name: 'Error', message: String(error) }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
