/**
 * Engine configuration from YAML files, layered with programmatic overrides
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { ConfigurationError } from '../errors'
import { validateConfig, validateConfigSafe, type EngineConfig, type EngineConfigInput } from './schema'

export const CONFIG_PATH_ENV = 'RECIPEFLOW_CONFIG_PATH'

export const DEFAULT_CONFIG_PATHS = [
  'recipeflow.config.yaml',
  'recipeflow.config.yml',
  '.recipeflow.yaml',
  '.recipeflow.yml',
]

/**
 * Load and validate config from a YAML file
 * @throws ConfigurationError naming every invalid field
 */
export function loadConfig(filePath: string): EngineConfig {
  const path = resolve(filePath)
  if (!existsSync(path)) {
    throw new ConfigurationError(`Config file not found: ${path}`, { path })
  }

  let raw: unknown
  try {
    raw = yaml.load(readFileSync(path, 'utf-8'))
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${path} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    )
  }

  const result = validateConfigSafe(raw)
  if (!result.success) {
    throw new ConfigurationError(`Invalid config in ${path}: ${result.errors.join('; ')}`, { path, errors: result.errors })
  }
  return result.data
}

/**
 * Config named by RECIPEFLOW_CONFIG_PATH, else the first default path
 * present, else none
 */
export function loadConfigAuto(
  env: Readonly<Record<string, string | undefined>> = process.env,
  cwd: string = process.cwd()
): EngineConfig | undefined {
  const configured = env[CONFIG_PATH_ENV]
  if (configured) {
    return loadConfig(resolve(cwd, configured))
  }
  const found = DEFAULT_CONFIG_PATHS.map(path => resolve(cwd, path)).find(path => existsSync(path))
  return found ? loadConfig(found) : undefined
}

/**
 * Layer programmatic overrides on top of a loaded config. Maps are merged
 * key by key; scalars in the override win.
 */
export function mergeConfig(base: EngineConfigInput | undefined, override: EngineConfigInput | undefined): EngineConfig {
  const b = base ?? {}
  const o = override ?? {}
  return validateConfig({
    logging: { ...b.logging, ...o.logging },
    connectors: {
      retry: { ...b.connectors?.retry, ...o.connectors?.retry },
    },
    execution: { ...b.execution, ...o.execution },
    credentials: { ...b.credentials, ...o.credentials },
    variables: { ...b.variables, ...o.variables },
  })
}
