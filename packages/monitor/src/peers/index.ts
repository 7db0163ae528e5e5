export * from './tracker'
export * from './transitions'
export * from './types'
