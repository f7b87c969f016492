export * from './pipeline-executor'
export * from './expression-evaluator'
export * from './concurrency'
