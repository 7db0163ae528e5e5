export * from './proc-net'
export * from './types'
