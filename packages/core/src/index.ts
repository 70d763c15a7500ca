export * from './format'
export * from './result'
export * from './types'
