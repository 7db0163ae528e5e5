import { Network } from './networks'
import { EventSourceKind } from './types'

export const NETWORK_DEFAULT = Network.Mainnet
export const API_PORT_DEFAULT = 443
export const API_PATH_DEFAULT = '/api/v0/'
export const LOCAL_ADDRESS_DEFAULT = '0.0.0.0'
export const LOCAL_PORT_DEFAULT = 3001
export const SOURCE_DEFAULT = EventSourceKind.Journald
export const JOURNALD_IDENTIFIER_DEFAULT = 'cardano-node'
export const RECONCILE_INTERVAL = 30_000
export const SWEEP_INTERVAL = 60_000
export const BLOCK_STALE_AFTER = 300_000
// A closed hash (emitted or swept) is forgotten only once it is older than
// FINALIZED_RETENTION and FINALIZED_BLOCK_DEPTH blocks below the highest
// header seen. A header for it arriving after both is treated as new.
export const FINALIZED_RETENTION = 3_600_000
export const FINALIZED_BLOCK_DEPTH = 2160
export const STATS_INTERVAL = 30_000
export const SINK_TIMEOUT = 30_000
export const FILE_POLL_INTERVAL = 250
export const VERSION = '0.1.0'
