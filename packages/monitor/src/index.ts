export * from './blocks'
export * from './config'
export * from './errors'
export * from './events'
export * from './logging'
export * from './node'
export * from './os'
export * from './peers'
export * from './service'
export * from './sink'
export * from './sources'
export * from './types'
