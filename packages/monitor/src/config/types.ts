import type { MetricsOptions } from '@blockperf/metrics'
import type { Logger, LogLevel } from '../logging'
import type { Network } from './networks'

export const EventSourceKind = {
  Journald: 'journald',
  File: 'file',
  Stdin: 'stdin',
} as const

export type EventSourceKind =
  (typeof EventSourceKind)[keyof typeof EventSourceKind]

export interface ConfigOptions {
  /**
   * Cardano network the node runs on
   *
   * Default: mainnet
   */
  network?: Network

  /**
   * Full API URL, bypasses the network default and apiPort/apiPath
   */
  apiUrl?: string

  apiPort?: number

  apiPath?: string

  /**
   * Key sent as X-Api-Key. Without it samples are only logged.
   */
  apiKey?: string

  apiClientId?: string

  /**
   * Address and port the node itself listens on, reported with every
   * sample and used to pick the node's sockets from the OS tables
   *
   * Default: 0.0.0.0:3001
   */
  localAddress?: string
  localPort?: number

  /**
   * Where trace events are read from
   *
   * Default: journald
   */
  source?: EventSourceKind

  /** Log file to follow when source is `file` */
  logFile?: string

  /** Read the log file from its beginning instead of its end */
  fromStart?: boolean

  /** SYSLOG_IDENTIFIER of the node's journal entries */
  journaldIdentifier?: string

  /** Milliseconds between OS connection reconciliations */
  reconcileInterval?: number

  /** Milliseconds between stale block record sweeps */
  sweepInterval?: number

  /** Milliseconds after which an unfinished block record is dropped */
  blockStaleAfter?: number

  /** Milliseconds a finalized block hash is remembered */
  finalizedRetention?: number

  /** Milliseconds between peer statistics log lines */
  statsInterval?: number

  /** Milliseconds before a sample upload is aborted */
  sinkTimeout?: number

  /** Log samples instead of uploading them */
  dryRun?: boolean

  /** Reported as bpVersion */
  version?: string

  /**
   * A custom winston logger can be provided
   * if setting logging verbosity is not sufficient
   */
  logger?: Logger

  logLevel?: LogLevel

  metrics?: MetricsOptions

  /** Millisecond wall clock, replaceable in tests */
  clock?: () => number
}
