/**
 * Typed accessors over validated step configuration
 *
 * Configuration reaches factories as `Record<string, unknown>` after schema
 * validation; these narrow it without casts and fail loudly if a schema and
 * its factory ever disagree.
 */

import { ConfigurationError } from '../errors'

export type StepConfig = Readonly<Record<string, unknown>>

function mismatch(key: string, expected: string, value: unknown): ConfigurationError {
  return new ConfigurationError(`Configuration key ${key} must be ${expected}, got ${JSON.stringify(value)}`, { key })
}

export function requireString(config: StepConfig, key: string): string {
  const value = config[key]
  if (typeof value !== 'string') throw mismatch(key, 'a string', value)
  return value
}

export function optionalString(config: StepConfig, key: string): string | undefined {
  const value = config[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') throw mismatch(key, 'a string', value)
  return value
}

export function optionalNumber(config: StepConfig, key: string): number | undefined {
  const value = config[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'number') throw mismatch(key, 'a number', value)
  return value
}

export function optionalBoolean(config: StepConfig, key: string): boolean | undefined {
  const value = config[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'boolean') throw mismatch(key, 'a boolean', value)
  return value
}

/**
 * A string or list of strings, normalised to a list
 */
export function stringList(config: StepConfig, key: string): string[] | undefined {
  const value = config[key]
  if (value === undefined || value === null) return undefined
  if (typeof value === 'string') return [value]
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value]
  }
  throw mismatch(key, 'a string or list of strings', value)
}

export function requireStringList(config: StepConfig, key: string): string[] {
  const list = stringList(config, key)
  if (!list) throw mismatch(key, 'a string or list of strings', undefined)
  return list
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function optionalRecord(config: StepConfig, key: string): Record<string, unknown> | undefined {
  const value = config[key]
  if (value === undefined || value === null) return undefined
  if (!isRecord(value)) throw mismatch(key, 'a mapping', value)
  return value
}

export function stringRecord(config: StepConfig, key: string): Record<string, string> | undefined {
  const record = optionalRecord(config, key)
  if (!record) return undefined
  const result: Record<string, string> = {}
  for (const [k, v] of Object.entries(record)) {
    if (typeof v !== 'string') throw mismatch(`${key}.${k}`, 'a string', v)
    result[k] = v
  }
  return result
}

export function optionalList(config: StepConfig, key: string): unknown[] | undefined {
  const value = config[key]
  if (value === undefined || value === null) return undefined
  if (!Array.isArray(value)) throw mismatch(key, 'a list', value)
  return value
}

export function oneOf<T extends string>(config: StepConfig, key: string, allowed: readonly T[], fallback: T): T {
  const value = config[key]
  if (value === undefined || value === null) return fallback
  const match = allowed.find(option => option === value)
  if (match === undefined) throw mismatch(key, `one of ${allowed.join(', ')}`, value)
  return match
}
