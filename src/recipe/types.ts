/**
 * Recipe document and step descriptor types
 */

import type { RecipeSection } from '../errors'

export type { RecipeSection }

export const RECIPE_SECTIONS: readonly RecipeSection[] = ['read', 'wrangles', 'write']

/**
 * A recipe after templating, before validation. Entries are whatever the
 * author wrote; the validator decides whether they are well formed.
 */
export interface RecipeDocument {
  readonly read?: unknown
  readonly wrangles?: unknown
  readonly write?: unknown
  readonly [key: string]: unknown
}

export type OnErrorPolicy = 'fail' | 'skip_row' | 'skip_step'

/**
 * Keys every step of a section accepts, interpreted by the executor rather
 * than by the step kind
 */
export interface CommonStepOptions {
  /** Condition evaluated against the current dataset; false skips the step */
  if?: string
  onError: OnErrorPolicy
  /** Read/write projection */
  columns?: string[]
  notColumns?: string[]
  /** Read ordering, `column` or `column DESC` */
  orderBy?: string
  /** Write failures are recorded but do not fail the run */
  bestEffort: boolean
}

export interface StepDescriptor {
  readonly section: RecipeSection
  readonly kind: string
  readonly path: string
  readonly stepIndex: number
  /** Kind-specific configuration with common keys removed */
  readonly configuration: Readonly<Record<string, unknown>>
  readonly common: Readonly<CommonStepOptions>
  /** Column selectors the step reads, as declared by its kind */
  readonly inputColumns?: readonly string[]
  /** Columns the step promises to produce */
  readonly outputColumns?: readonly string[]
  /** Nested step list for grouping kinds */
  readonly children?: readonly StepDescriptor[]
}

export interface Recipe {
  readonly read: readonly StepDescriptor[]
  readonly wrangles: readonly StepDescriptor[]
  readonly write: readonly StepDescriptor[]
}
