/**
 * Recipe templating
 *
 * Resolves `{{ name }}` / `${NAME}` placeholders and `{include: path}`
 * directives over a parsed recipe tree. The result contains neither.
 */

import { existsSync, readFileSync } from 'fs'
import { dirname, resolve } from 'path'
import * as yaml from 'js-yaml'
import { TemplateResolutionError } from '../errors'

export type TemplateVariables = Readonly<Record<string, unknown>>

export interface TemplateOptions {
  variables?: TemplateVariables
  /** Consulted after `variables`; pass `{}` to disable environment lookup */
  env?: Readonly<Record<string, string | undefined>>
  /** Directory include paths are resolved against */
  baseDir?: string
  /** File the tree was read from, so it cannot include itself */
  sourceFile?: string
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}|\$\{([A-Za-z_]\w*)\}/g
const SOLE_PLACEHOLDER = /^(?:\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}|\$\{([A-Za-z_]\w*)\})$/

interface ResolveState {
  variables: TemplateVariables
  env: Readonly<Record<string, string | undefined>>
  baseDir: string
  chain: string[]
}

function lookup(name: string, state: ResolveState): unknown {
  if (Object.prototype.hasOwnProperty.call(state.variables, name)) {
    return state.variables[name]
  }
  const fromEnv = state.env[name]
  if (fromEnv !== undefined) return fromEnv
  throw new TemplateResolutionError(`Variable ${name} is not defined`, { variable: name })
}

function resolveString(value: string, state: ResolveState): unknown {
  const sole = SOLE_PLACEHOLDER.exec(value)
  if (sole) {
    return lookup(sole[1] ?? sole[2], state)
  }
  return value.replace(PLACEHOLDER, (_match, curly: string | undefined, dollar: string | undefined) => {
    const resolved = lookup(curly ?? dollar ?? '', state)
    return typeof resolved === 'string' ? resolved : JSON.stringify(resolved)
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function includeTarget(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined
  const keys = Object.keys(value)
  if (keys.length !== 1 || keys[0] !== 'include') return undefined
  const target = value.include
  return typeof target === 'string' ? target : undefined
}

function loadInclude(target: string, state: ResolveState): unknown {
  const file = resolve(state.baseDir, String(resolveString(target, state)))
  if (state.chain.includes(file)) {
    throw new TemplateResolutionError(`Include cycle detected at ${file}`, { file, chain: [...state.chain, file] })
  }
  if (!existsSync(file)) {
    throw new TemplateResolutionError(`Included file not found: ${file}`, { file, chain: state.chain })
  }
  let parsed: unknown
  try {
    parsed = yaml.load(readFileSync(file, 'utf-8'))
  } catch (error) {
    throw new TemplateResolutionError(
      `Included file ${file} could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
      { file }
    )
  }
  return resolveNode(parsed, { ...state, baseDir: dirname(file), chain: [...state.chain, file] })
}

function resolveNode(node: unknown, state: ResolveState): unknown {
  if (typeof node === 'string') {
    return resolveString(node, state)
  }

  if (Array.isArray(node)) {
    const result: unknown[] = []
    for (const item of node) {
      const target = includeTarget(item)
      if (target !== undefined) {
        const included = loadInclude(target, state)
        if (Array.isArray(included)) result.push(...included)
        else result.push(included)
      } else {
        result.push(resolveNode(item, state))
      }
    }
    return result
  }

  if (isRecord(node)) {
    const target = includeTarget(node)
    if (target !== undefined) {
      return loadInclude(target, state)
    }
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(node)) {
      result[key] = resolveNode(value, state)
    }
    return result
  }

  return node
}

/**
 * Resolve every placeholder and include in a parsed recipe tree
 *
 * @throws TemplateResolutionError for undefined variables, missing includes and include cycles
 */
export function resolveTemplates(node: unknown, options: TemplateOptions = {}): unknown {
  return resolveNode(node, {
    variables: options.variables ?? {},
    env: options.env ?? process.env,
    baseDir: options.baseDir ?? (options.sourceFile ? dirname(resolve(options.sourceFile)) : process.cwd()),
    chain: options.sourceFile ? [resolve(options.sourceFile)] : [],
  })
}
