import type { RegistryMetricCreator } from '../utils/registryMetricCreator'

export type PeerMetrics = ReturnType<typeof createPeerMetrics>

/**
 * Create peer tracker metrics
 */
export function createPeerMetrics(register: RegistryMetricCreator) {
  return {
    peers: register.gauge<{ state: string; direction: string }>({
      name: 'blockperf_peers',
      help: 'Tracked peers by state and direction',
      labelNames: ['state', 'direction'],
    }),
    transitions: register.counter<{ kind: string }>({
      name: 'blockperf_peer_transitions_total',
      help: 'Peer state transitions applied from node traces',
      labelNames: ['kind'],
    }),
    stateMismatches: register.counter({
      name: 'blockperf_peer_state_mismatches_total',
      help: 'Transitions whose from-state disagreed with the tracked state',
    }),
    reconciledPeers: register.counter<{ result: string }>({
      name: 'blockperf_peer_reconciled_total',
      help: 'Peers added or removed by OS connection reconciliation',
      labelNames: ['result'],
    }),
    reconcileFailures: register.counter({
      name: 'blockperf_peer_reconcile_failures_total',
      help: 'Reconciliation passes skipped because the OS snapshot failed',
    }),
    governorPeers: register.gauge<{ state: string }>({
      name: 'blockperf_inbound_governor_peers',
      help: 'Latest inbound governor counters reported by the node',
      labelNames: ['state'],
    }),
    restarts: register.counter({
      name: 'blockperf_node_restarts_total',
      help: 'Node restarts observed in the trace stream',
    }),
  }
}
