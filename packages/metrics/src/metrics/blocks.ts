import type { RegistryMetricCreator } from '../utils/registryMetricCreator'

export type BlockMetrics = ReturnType<typeof createBlockMetrics>

/**
 * Create block correlation metrics
 */
export function createBlockMetrics(register: RegistryMetricCreator) {
  return {
    openRecords: register.gauge({
      name: 'blockperf_block_records_open',
      help: 'Block records waiting for missing milestones',
    }),
    samplesEmitted: register.counter({
      name: 'blockperf_block_samples_emitted_total',
      help: 'Block samples handed to the sample sink',
    }),
    recordsSwept: register.counter({
      name: 'blockperf_block_records_swept_total',
      help: 'Block records dropped by the staleness sweep',
    }),
    sinkFailures: register.counter({
      name: 'blockperf_block_sink_failures_total',
      help: 'Block samples the sink failed to accept',
    }),
    delaySeconds: register.histogram<{ delta: string }>({
      name: 'blockperf_block_delay_seconds',
      help: 'Block propagation deltas',
      labelNames: ['delta'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
    }),
  }
}
