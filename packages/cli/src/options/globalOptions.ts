import { LOG_LEVELS, type LogLevel } from '@blockperf/monitor'
import type { Options } from 'yargs'

export type GlobalArgs = {
  logLevel: LogLevel
}

export const globalOptions: Record<keyof GlobalArgs, Options> = {
  logLevel: {
    description: 'Logging verbosity level',
    type: 'string',
    choices: LOG_LEVELS,
    default: 'info',
  },
}
