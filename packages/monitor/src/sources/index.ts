import type { Config } from '../config'
import { EventSourceKind } from '../config/types'
import { ErrorCode, ValidationError } from '../errors'
import { FileTailEventSource } from './file-tail'
import { JournaldEventSource } from './journald'
import { JsonLinesEventSource } from './jsonlines'
import type { EventSource } from './types'

export * from './file-tail'
export * from './journald'
export * from './jsonlines'
export * from './line-decoder'
export * from './types'

/**
 * Event source selected by the `source` option
 */
export function createEventSource(config: Config): EventSource {
  const { source, logFile, fromStart, journaldIdentifier } = config.options
  switch (source) {
    case EventSourceKind.Journald:
      return new JournaldEventSource({ identifier: journaldIdentifier, config })
    case EventSourceKind.Stdin:
      return new JsonLinesEventSource(process.stdin, { config })
    case EventSourceKind.File:
      if (logFile === undefined) {
        throw new ValidationError('logFile is required when source is file', {
          code: ErrorCode.CONFIGURATION_ERROR,
          context: { component: 'sources' },
        })
      }
      return new FileTailEventSource({ path: logFile, fromStart, config })
  }
}
