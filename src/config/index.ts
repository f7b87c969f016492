/**
 * Configuration module
 * YAML-based engine config with Zod validation and defaults
 */

export * from './schema'
export * from './loader'
