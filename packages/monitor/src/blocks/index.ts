export * from './correlator'
export * from './delta'
export * from './types'
