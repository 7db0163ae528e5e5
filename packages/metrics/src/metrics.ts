import { collectDefaultMetrics } from 'prom-client'
import { type BlockMetrics, createBlockMetrics } from './metrics/blocks'
import { createEventMetrics, type EventMetrics } from './metrics/events'
import { createPeerMetrics, type PeerMetrics } from './metrics/peers'
import type { MetricsOptions } from './options'
import { RegistryMetricCreator } from './utils/registryMetricCreator'

export type Metrics = {
  peers: PeerMetrics
  blocks: BlockMetrics
  events: EventMetrics
  register: RegistryMetricCreator
}

export function createMetrics(opts: MetricsOptions): Metrics {
  const register = new RegistryMetricCreator()
  const peers = createPeerMetrics(register)
  const blocks = createBlockMetrics(register)
  const events = createEventMetrics(register)

  if (opts.metadata) {
    register.static({
      name: 'blockperf_version',
      help: 'Monitor version information',
      value: opts.metadata,
    })
  }

  if (opts.collectDefaultMetrics) {
    collectDefaultMetrics({
      register,
      prefix: opts.prefix ? `${opts.prefix}_` : '',
    })
  }

  return { peers, blocks, events, register }
}
