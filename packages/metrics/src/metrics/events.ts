import type { RegistryMetricCreator } from '../utils/registryMetricCreator'

export type EventMetrics = ReturnType<typeof createEventMetrics>

/**
 * Create event ingestion metrics
 */
export function createEventMetrics(register: RegistryMetricCreator) {
  return {
    received: register.counter<{ kind: string }>({
      name: 'blockperf_events_total',
      help: 'Trace events dispatched by classified kind',
      labelNames: ['kind'],
    }),
    ignored: register.counter<{ reason: string }>({
      name: 'blockperf_events_ignored_total',
      help: 'Trace events discarded by the classifier',
      labelNames: ['reason'],
    }),
    undecodable: register.counter({
      name: 'blockperf_events_undecodable_total',
      help: 'Log lines that could not be decoded into an event',
    }),
    outOfOrder: register.counter({
      name: 'blockperf_events_out_of_order_total',
      help: 'Events older than the event dispatched before them',
    }),
  }
}
