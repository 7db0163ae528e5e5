export * from './metrics'
export * from './metrics/blocks'
export * from './metrics/events'
export * from './metrics/peers'
export * from './options'
export * from './server/http'
export * from './utils/registryMetricCreator'
