export * from './builtins'
export * from './io-steps'
export * from './text-wrangles'
export * from './column-wrangles'
export * from './extract-wrangles'
export * from './flow-wrangles'
export * from './model-wrangles'
