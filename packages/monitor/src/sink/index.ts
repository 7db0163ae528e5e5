import type { SampleSink } from '../blocks/types'
import type { Config } from '../config'
import { HttpSampleSink } from './http'
import { LogSampleSink } from './log'

export * from './http'
export * from './log'

/**
 * HTTP upload when an API key is configured and this is not a dry run
 */
export function createSampleSink(config: Config): SampleSink {
  const { dryRun, apiKey } = config.options
  if (dryRun || apiKey === undefined) return new LogSampleSink(config.logger)
  return HttpSampleSink.fromConfig(config)
}
