// Engine
export * from './engine'

// Errors
export * from './errors'

// Configuration and observability
export * from './config'
export * from './observability'

// Recipe model
export * from './recipe/types'
export * from './recipe/template'
export * from './recipe/loader'

// Data
export * from './dataset'

// Registry, schema and steps
export * from './registry'
export * from './schema'
export * from './steps'
export * from './functions/custom-function-loader'

// Connectors
export * from './connectors'

// Execution and reporting
export * from './pipeline'
export * from './reporting/result-reporter'
