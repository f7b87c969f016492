export * from './common-keys'
export * from './validator'
export * from './generator'
