import {
  ConfigConstants,
  type EventSourceKind,
  NETWORK_NAMES,
  type Network,
} from '@blockperf/monitor'
import type { Options } from 'yargs'

/**
 * Arguments of `blockperf run`, one per monitor config option
 */
export type RunArgs = {
  // Network
  network: Network
  localAddress: string
  localPort: number

  // Source
  source: EventSourceKind
  logFile?: string
  fromStart: boolean
  journaldIdentifier: string

  // Upload
  apiUrl?: string
  apiPort: number
  apiPath: string
  apiKey?: string
  apiClientId?: string
  dryRun: boolean
  sinkTimeout: number

  // Timing
  reconcileInterval: number
  sweepInterval: number
  blockStaleAfter: number
  finalizedRetention: number
  statsInterval: number

  // Metrics
  metricsEnabled: boolean
  metricsPort: number
  metricsAddress: string
}

export const runOptions: Record<keyof RunArgs, Options> = {
  // ============================================================================
  // Network
  // ============================================================================
  network: {
    description: 'Cardano network the node runs on',
    type: 'string',
    choices: NETWORK_NAMES,
    default: ConfigConstants.NETWORK_DEFAULT,
    group: 'Network:',
  },
  localAddress: {
    description: 'Public address of the node, reported with every sample',
    type: 'string',
    default: ConfigConstants.LOCAL_ADDRESS_DEFAULT,
    group: 'Network:',
  },
  localPort: {
    description: 'Port the node listens on',
    type: 'number',
    default: ConfigConstants.LOCAL_PORT_DEFAULT,
    group: 'Network:',
  },

  // ============================================================================
  // Source
  // ============================================================================
  source: {
    description: 'Where node trace events are read from',
    type: 'string',
    choices: ['journald', 'file', 'stdin'],
    default: ConfigConstants.SOURCE_DEFAULT,
    group: 'Source:',
  },
  logFile: {
    description: 'JSON log file to follow when --source is file',
    type: 'string',
    group: 'Source:',
  },
  fromStart: {
    description: 'Read the log file from its beginning',
    type: 'boolean',
    default: false,
    group: 'Source:',
  },
  journaldIdentifier: {
    description: 'SYSLOG_IDENTIFIER of the node in the journal',
    type: 'string',
    default: ConfigConstants.JOURNALD_IDENTIFIER_DEFAULT,
    group: 'Source:',
  },

  // ============================================================================
  // Upload
  // ============================================================================
  apiUrl: {
    description: 'Full API URL, overrides the network default and port/path',
    type: 'string',
    group: 'Upload:',
  },
  apiPort: {
    description: 'API port',
    type: 'number',
    default: ConfigConstants.API_PORT_DEFAULT,
    group: 'Upload:',
  },
  apiPath: {
    description: 'API path prefix',
    type: 'string',
    default: ConfigConstants.API_PATH_DEFAULT,
    group: 'Upload:',
  },
  apiKey: {
    description: 'API key; without one samples are only logged',
    type: 'string',
    group: 'Upload:',
  },
  apiClientId: {
    description: 'Client id sent with every upload',
    type: 'string',
    group: 'Upload:',
  },
  dryRun: {
    description: 'Log samples instead of uploading them',
    type: 'boolean',
    default: false,
    group: 'Upload:',
  },
  sinkTimeout: {
    description: 'Upload timeout in milliseconds',
    type: 'number',
    default: ConfigConstants.SINK_TIMEOUT,
    group: 'Upload:',
  },

  // ============================================================================
  // Timing
  // ============================================================================
  reconcileInterval: {
    description: 'Milliseconds between OS connection reconciliations',
    type: 'number',
    default: ConfigConstants.RECONCILE_INTERVAL,
    group: 'Timing:',
  },
  sweepInterval: {
    description: 'Milliseconds between stale block sweeps',
    type: 'number',
    default: ConfigConstants.SWEEP_INTERVAL,
    group: 'Timing:',
  },
  blockStaleAfter: {
    description: 'Milliseconds after which an unfinished block is dropped',
    type: 'number',
    default: ConfigConstants.BLOCK_STALE_AFTER,
    group: 'Timing:',
  },
  finalizedRetention: {
    description: 'Milliseconds a reported block hash is remembered',
    type: 'number',
    default: ConfigConstants.FINALIZED_RETENTION,
    group: 'Timing:',
  },
  statsInterval: {
    description: 'Milliseconds between peer statistics log lines',
    type: 'number',
    default: ConfigConstants.STATS_INTERVAL,
    group: 'Timing:',
  },

  // ============================================================================
  // Metrics
  // ============================================================================
  metricsEnabled: {
    description: 'Serve Prometheus metrics and health probes',
    type: 'boolean',
    default: false,
    group: 'Metrics:',
  },
  metricsPort: {
    description: 'Metrics server port',
    type: 'number',
    default: 9101,
    group: 'Metrics:',
  },
  metricsAddress: {
    description: 'Metrics server bind address',
    type: 'string',
    default: '127.0.0.1',
    group: 'Metrics:',
  },
}
