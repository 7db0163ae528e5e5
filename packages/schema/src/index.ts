export * from './custom/address'
export * from './custom/event'
export * from './custom/number'
export * from './custom/timestamp'
export * from './custom/types'
