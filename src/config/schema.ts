/**
 * Zod schemas for engine configuration
 * Validates YAML config files and programmatic overrides
 */

import { z } from 'zod'

/**
 * Connector open retry policy
 */
export const RetryPolicySchema = z.object({
  maxRetries: z.number().int().min(0).default(2),
  initialDelayMs: z.number().int().min(0).default(200),
  maxDelayMs: z.number().int().min(0).default(2000),
  backoffMultiplier: z.number().positive().default(2),
})

export type RetryPolicy = z.infer<typeof RetryPolicySchema>

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

export const ConnectorsConfigSchema = z.object({
  retry: RetryPolicySchema.default({}),
})

export const ExecutionConfigSchema = z.object({
  // Upper bound on concurrent row dispatch inside a single step
  rowConcurrency: z.number().int().positive().default(4),
})

/**
 * Credential bundles are opaque to the engine: passed unmodified to connectors
 */
export const CredentialBundleSchema = z.record(z.string(), z.unknown())

export type CredentialBundle = z.infer<typeof CredentialBundleSchema>

/**
 * Complete engine configuration
 */
export const EngineConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  connectors: ConnectorsConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
  credentials: z.record(z.string(), CredentialBundleSchema).default({}),
  variables: z.record(z.string(), z.string()).default({}),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type EngineConfigInput = z.input<typeof EngineConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): EngineConfig {
  return EngineConfigSchema.parse(config ?? {})
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(config: unknown): { success: true; data: EngineConfig } | { success: false; errors: string[] } {
  const result = EngineConfigSchema.safeParse(config ?? {})

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
