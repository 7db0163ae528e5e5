import type { HttpMetricsServerOpts } from './server/http'

export type Metadata = {
  /** Version string, e.g., "0.1.0" */
  version: string
  /** Network name */
  network: string
}

export type MetricsOptions = HttpMetricsServerOpts & {
  enabled?: boolean
  /** Optional metadata to send to Prometheus */
  metadata?: Metadata
  /** Optional prefix for the Node.js default metrics */
  prefix?: string
  /** Whether to collect default Node.js metrics */
  collectDefaultMetrics?: boolean
}

export const defaultMetricsOptions: MetricsOptions = {
  enabled: false,
  port: 9101,
  address: '127.0.0.1',
  collectDefaultMetrics: true,
  prefix: 'blockperf',
}
