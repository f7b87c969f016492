export * from './connector'
export * from './retry'
export * from './formats'
export * from './file-connector'
export * from './memory-connector'
export * from './postgres-connector'
export * from './blob-connector'
export * from './inference-connector'
