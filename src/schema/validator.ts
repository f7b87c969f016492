/**
 * Schema Validator
 *
 * Checks a templated recipe against the registry's published schemas and
 * builds the immutable step descriptors the executor runs. Every violation
 * in the document is collected; nothing is opened or read here.
 */

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv'
import { SchemaViolationError, type SchemaViolation } from '../errors'
import { RECIPE_SECTIONS, type Recipe, type RecipeDocument, type RecipeSection, type StepDescriptor } from '../recipe/types'
import { isRecord, stringList } from '../registry/config-values'
import type { StepRegistryView } from '../registry/step-registry'
import { granularityOf, type StepKindDefinition, type StepSchema } from '../registry/types'
import { COMMON_KEYS, splitCommon } from './common-keys'

const ajv = new Ajv({ allErrors: true, strict: false })

// Compiled validators per definition and section
const compiled = new WeakMap<StepKindDefinition, ValidateFunction>()

/**
 * The kind's schema with the section's common keys merged in
 */
export function effectiveSchema(definition: StepKindDefinition): StepSchema {
  const properties = { ...COMMON_KEYS[definition.section], ...definition.schema.properties }
  if (definition.children && !properties[definition.children]) {
    properties[definition.children] = { type: 'array', description: `Nested ${definition.childSection ?? 'wrangles'} steps` }
  }
  return { ...definition.schema, properties }
}

function validatorFor(definition: StepKindDefinition): ValidateFunction {
  let validate = compiled.get(definition)
  if (!validate) {
    validate = ajv.compile(effectiveSchema(definition))
    compiled.set(definition, validate)
  }
  return validate
}

interface ParsedStep {
  kind: string
  config: Readonly<Record<string, unknown>>
}

type Location = Pick<SchemaViolation, 'section' | 'path' | 'stepIndex'>

/**
 * A step is `{<kind>: {<configuration>}}`, `{<kind>: null}`, a bare kind name,
 * or `{<kind>: <scalar>}` for kinds with a shorthand key
 */
function parseStep(entry: unknown, at: Location, violations: SchemaViolation[]): { kind: string; value: unknown } | undefined {
  if (typeof entry === 'string' && entry !== '') {
    return { kind: entry, value: null }
  }
  if (isRecord(entry)) {
    const keys = Object.keys(entry)
    if (keys.length === 1) return { kind: keys[0], value: entry[keys[0]] }
  }
  violations.push({
    ...at,
    kind: '',
    rule: 'malformed_step',
    message: 'A step must be a mapping with exactly one kind name as its key',
  })
  return undefined
}

function configOf(
  definition: StepKindDefinition,
  kind: string,
  value: unknown,
  at: Location,
  violations: SchemaViolation[]
): ParsedStep | undefined {
  if (value === null || value === undefined) return { kind, config: {} }
  if (isRecord(value)) return { kind, config: value }
  if (definition.shorthand && (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean')) {
    return { kind, config: { [definition.shorthand]: value } }
  }
  violations.push({
    ...at,
    kind,
    rule: 'malformed_step',
    message: `Configuration of ${kind} must be a mapping`,
  })
  return undefined
}

function stepList(value: unknown, section: RecipeSection, path: string, violations: SchemaViolation[]): unknown[] {
  if (value === undefined || value === null) return []
  if (Array.isArray(value)) return value
  // A lone step may be written without the surrounding list
  if (isRecord(value) && Object.keys(value).length === 1) return [value]
  violations.push({
    section,
    path,
    stepIndex: -1,
    kind: '',
    rule: 'wrong_type',
    message: `${path} must be a list of steps`,
  })
  return []
}

function keyOf(error: ErrorObject): string | undefined {
  const segment = error.instancePath.split('/')[1]
  return segment === undefined || segment === '' ? undefined : segment.replace(/~1/g, '/').replace(/~0/g, '~')
}

function alternativesOf(schema: StepSchema): string {
  return (schema.anyOf ?? []).map(set => set.required.join(' with ')).join(', or ')
}

function toViolation(error: ErrorObject, at: Location, kind: string, schema: StepSchema): SchemaViolation {
  if (error.keyword === 'anyOf' && error.instancePath === '' && schema.anyOf) {
    return { ...at, kind, rule: 'missing_required_key', message: `Missing required keys: ${alternativesOf(schema)}` }
  }
  switch (error.keyword) {
    case 'required': {
      const key = String(error.params.missingProperty)
      return { ...at, kind, rule: 'missing_required_key', key, message: `Missing required key ${key}` }
    }
    case 'additionalProperties': {
      const key = String(error.params.additionalProperty)
      return { ...at, kind, rule: 'unknown_key', key, message: `Unknown key ${key}` }
    }
    case 'type':
    case 'anyOf': {
      const key = keyOf(error)
      return {
        ...at,
        kind,
        rule: 'wrong_type',
        ...(key !== undefined && { key }),
        message: `${error.instancePath.slice(1) || 'configuration'} ${error.keyword === 'anyOf' ? 'has the wrong type' : error.message ?? 'has the wrong type'}`,
      }
    }
    default: {
      const key = keyOf(error)
      return {
        ...at,
        kind,
        rule: 'invalid_value',
        ...(key !== undefined && { key }),
        message: `${key ?? 'configuration'} ${error.message ?? 'is invalid'}`,
      }
    }
  }
}

function validateList(
  registry: StepRegistryView,
  section: RecipeSection,
  entries: readonly unknown[],
  basePath: string,
  violations: SchemaViolation[],
  descriptors: StepDescriptor[]
): void {
  entries.forEach((entry, stepIndex) => {
    const at: Location = { section, path: `${basePath}[${stepIndex}]`, stepIndex }
    const parsed = parseStep(entry, at, violations)
    if (!parsed) return

    const definition = registry.resolve(section, parsed.kind)
    if (!definition) {
      violations.push({
        ...at,
        kind: parsed.kind,
        rule: 'unknown_kind',
        message: `Unknown ${section} kind ${parsed.kind}`,
      })
      return
    }
    const step = configOf(definition, parsed.kind, parsed.value, at, violations)
    if (!step) return

    const before = violations.length
    const validate = validatorFor(definition)
    if (!validate(step.config)) {
      // Branch failures inside anyOf are reported once, by the anyOf itself
      for (const error of (validate.errors ?? []).filter(e => !e.schemaPath.includes('/anyOf/'))) {
        violations.push(toViolation(error, at, step.kind, definition.schema))
      }
    }

    const policy = step.config.on_error
    if (
      section === 'wrangles' &&
      (policy === 'skip_row' || policy === 'skip_step') &&
      (!(definition.errorIsolation ?? []).includes(policy) ||
        (policy === 'skip_row' && granularityOf(definition, step.config) !== 'row'))
    ) {
      violations.push({
        ...at,
        kind: step.kind,
        rule: 'unsupported_error_policy',
        key: 'on_error',
        message: `${step.kind} does not support on_error: ${policy}`,
      })
    }

    let children: StepDescriptor[] | undefined
    if (definition.children) {
      children = []
      const nested = step.config[definition.children]
      validateList(
        registry,
        definition.childSection ?? 'wrangles',
        Array.isArray(nested) ? nested : [],
        `${at.path}.${definition.children}`,
        violations,
        children
      )
    }

    if (violations.length === before) {
      descriptors.push(describe(definition, step, at, children))
    }
  })
}

function declaredColumns(configuration: Readonly<Record<string, unknown>>, keys: readonly string[] | undefined): string[] | undefined {
  if (!keys || keys.length === 0) return undefined
  const columns: string[] = []
  for (const key of keys) {
    const value = configuration[key]
    if (typeof value === 'string' || Array.isArray(value)) {
      columns.push(...(stringList(configuration, key) ?? []))
    }
  }
  return columns
}

function describe(
  definition: StepKindDefinition,
  step: ParsedStep,
  at: Location,
  children: StepDescriptor[] | undefined
): StepDescriptor {
  const { configuration, common } = splitCommon(definition.section, step.config)
  if (definition.children) delete configuration[definition.children]

  const inputColumns = declaredColumns(configuration, definition.columns?.input)
  const declaredOutputs = declaredColumns(configuration, definition.columns?.output)
  // A step without an explicit output writes back to its inputs
  const outputColumns =
    declaredOutputs && declaredOutputs.length > 0 ? declaredOutputs : declaredOutputs ? inputColumns : undefined

  return Object.freeze({
    section: definition.section,
    kind: step.kind,
    path: at.path,
    stepIndex: at.stepIndex,
    configuration: Object.freeze(configuration),
    common: Object.freeze(common),
    ...(inputColumns && inputColumns.length > 0 && { inputColumns: Object.freeze(inputColumns) }),
    ...(outputColumns && outputColumns.length > 0 && { outputColumns: Object.freeze(outputColumns) }),
    ...(children && { children: Object.freeze(children) }),
  })
}

export interface ValidationResult {
  violations: SchemaViolation[]
  /** Present only when there are no violations */
  recipe?: Recipe
}

/**
 * Validate a recipe and, when valid, build its step descriptors
 */
export function analyzeRecipe(document: RecipeDocument, registry: StepRegistryView): ValidationResult {
  const violations: SchemaViolation[] = []

  for (const key of Object.keys(document)) {
    if (!RECIPE_SECTIONS.some(section => section === key)) {
      violations.push({
        section: 'recipe',
        path: key,
        stepIndex: -1,
        kind: '',
        rule: 'unknown_key',
        key,
        message: `Unknown top-level key ${key}; a recipe has read, wrangles and write`,
      })
    }
  }

  const sections: Record<RecipeSection, StepDescriptor[]> = { read: [], wrangles: [], write: [] }
  for (const section of RECIPE_SECTIONS) {
    const entries = stepList(document[section], section, section, violations)
    validateList(registry, section, entries, section, violations, sections[section])
  }

  if (violations.length > 0) return { violations }
  return {
    violations,
    recipe: Object.freeze({
      read: Object.freeze(sections.read),
      wrangles: Object.freeze(sections.wrangles),
      write: Object.freeze(sections.write),
    }),
  }
}

/**
 * Every violation in the recipe, in document order; empty when valid
 */
export function validateRecipe(document: RecipeDocument, registry: StepRegistryView): SchemaViolation[] {
  return analyzeRecipe(document, registry).violations
}

/**
 * @throws SchemaViolationError listing every violation
 */
export function buildRecipe(document: RecipeDocument, registry: StepRegistryView): Recipe {
  const { violations, recipe } = analyzeRecipe(document, registry)
  if (!recipe) throw new SchemaViolationError(violations)
  return recipe
}
