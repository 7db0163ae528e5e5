import type { BlockCorrelator } from '../blocks/correlator'
import type { SampleSink } from '../blocks/types'
import type { Config } from '../config'
import type { OsConnectionSnapshot } from '../os/types'
import type { PeerTracker } from '../peers/tracker'
import type { Dispatcher } from '../service/dispatcher'
import type { EventSource } from '../sources/types'

/**
 * Options for initializing a MonitorNode
 */
export interface MonitorNodeInitOptions {
  config: Config

  /**
   * Where trace events come from
   *
   * Default: selected by config.options.source
   */
  source?: EventSource

  /**
   * Receiver of finished samples
   *
   * Default: HTTP upload, or a log-only sink for dry runs
   */
  sink?: SampleSink

  /**
   * OS connection table used for reconciliation
   *
   * Default: /proc/net/tcp and /proc/net/tcp6
   */
  snapshot?: OsConnectionSnapshot
}

export interface MonitorNodeModules {
  config: Config
  source: EventSource
  snapshot: OsConnectionSnapshot
  peers: PeerTracker
  blocks: BlockCorrelator
  dispatcher: Dispatcher
}
