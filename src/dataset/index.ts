export * from './dataset'
export * from './columns'
export * from './merge'
