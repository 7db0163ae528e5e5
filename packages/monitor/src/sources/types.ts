import type { NormalizedEvent } from '@blockperf/schema'

/**
 * Ordered stream of trace events. Iteration ends when the source is
 * closed or exhausted.
 */
export interface EventSource {
  events(): AsyncIterable<NormalizedEvent>
  close(): Promise<void>
}
