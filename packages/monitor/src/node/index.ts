export * from './monitor-node'
export * from './types'
