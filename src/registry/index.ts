export * from './types'
export * from './step-registry'
export * from './config-values'
