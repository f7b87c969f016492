/**
 * Recipe loading: YAML/JSON text or file → templated, frozen document
 */

import { existsSync, readFileSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { TemplateResolutionError } from '../errors'
import { resolveTemplates, type TemplateOptions } from './template'
import type { RecipeDocument } from './types'

export type LoadRecipeOptions = Omit<TemplateOptions, 'sourceFile'>

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

function toDocument(resolved: unknown, source: string): RecipeDocument {
  if (resolved === null || resolved === undefined) {
    return deepFreeze({})
  }
  if (typeof resolved !== 'object' || Array.isArray(resolved)) {
    throw new TemplateResolutionError(`Recipe ${source} must be a mapping with read, wrangles and write sections`, {
      file: source,
    })
  }
  return deepFreeze({ ...resolved })
}

function parseYaml(text: string, source: string): unknown {
  try {
    return yaml.load(text)
  } catch (error) {
    throw new TemplateResolutionError(
      `Recipe ${source} could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
      { file: source }
    )
  }
}

/**
 * Parse recipe text (YAML, of which JSON is a subset) and resolve templates
 */
export function loadRecipeText(text: string, options: LoadRecipeOptions = {}): RecipeDocument {
  return toDocument(resolveTemplates(parseYaml(text, '<inline>'), options), '<inline>')
}

/**
 * Read a recipe file and resolve templates; includes resolve relative to it
 */
export function loadRecipeFile(filePath: string, options: LoadRecipeOptions = {}): RecipeDocument {
  const absolutePath = resolve(filePath)
  if (!existsSync(absolutePath)) {
    throw new TemplateResolutionError(`Recipe file not found: ${absolutePath}`, { file: absolutePath })
  }
  const parsed = parseYaml(readFileSync(absolutePath, 'utf-8'), absolutePath)
  return toDocument(resolveTemplates(parsed, { ...options, sourceFile: absolutePath }), absolutePath)
}

/**
 * Resolve templates over an already parsed recipe object
 */
export function loadRecipeObject(recipe: object, options: LoadRecipeOptions = {}): RecipeDocument {
  return toDocument(resolveTemplates(recipe, options), '<object>')
}

export type RecipeSource = string | { path: string } | object

function hasPath(source: object): source is { path: string } {
  return 'path' in source && typeof source.path === 'string' && Object.keys(source).length === 1
}

/**
 * Load from any source: `{path}` reads a file, a string is recipe text
 * unless it names an existing .yml/.yaml/.json file, an object is a
 * parsed recipe.
 */
export function loadRecipe(source: RecipeSource, options: LoadRecipeOptions = {}): RecipeDocument {
  if (typeof source === 'string') {
    if (!source.includes('\n') && /\.(ya?ml|json)$/i.test(source.trim()) && existsSync(resolve(source.trim()))) {
      return loadRecipeFile(source.trim(), options)
    }
    return loadRecipeText(source, options)
  }
  if (hasPath(source)) {
    return loadRecipeFile(source.path, options)
  }
  return loadRecipeObject(source, options)
}
