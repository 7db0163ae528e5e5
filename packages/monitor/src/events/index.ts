export * from './classifier'
export * from './status-change'
export * from './types'
