export { Config } from './config'
export * as ConfigConstants from './constants'
export * from './networks'
export * from './types'
export {
  createConfigFromDefaults,
  createConfigOptions,
  resolveApiBaseUrl,
} from './utils'
export type { ResolvedConfigOptions } from './utils'
