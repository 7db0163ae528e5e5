export const PeerState = {
  Unknown: 'Unknown',
  Cold: 'Cold',
  Warm: 'Warm',
  Hot: 'Hot',
} as const

export type PeerState = (typeof PeerState)[keyof typeof PeerState]

/** States a trace can report. Unknown only comes from reconciliation. */
export type LogPeerState = Exclude<PeerState, 'Unknown'>

export const Direction = {
  Inbound: 'Inbound',
  Outbound: 'Outbound',
} as const

export type Direction = (typeof Direction)[keyof typeof Direction]

export interface Peer {
  remoteAddress: string
  remotePort: number
  direction: Direction
  state: PeerState
  localAddress?: string
  localPort?: number
  /** Tracker clock, milliseconds */
  lastUpdated: number
}

/** Outbound governor status changes */
export type StatusChangeKind =
  | 'ColdToWarm'
  | 'WarmToHot'
  | 'HotToWarm'
  | 'WarmToCold'

/** Inbound governor promotions and demotions */
export type GovernorTransitionKind =
  | 'PromotedToWarm'
  | 'PromotedToHot'
  | 'DemotedToWarm'
  | 'DemotedToCold'

export type TransitionKind = StatusChangeKind | GovernorTransitionKind

export interface TransitionInput {
  kind: TransitionKind
  remoteAddress: string
  remotePort: number
  localAddress?: string
  localPort?: number
  direction: Direction
}

export interface ReconcileResult {
  added: number
  removed: number
}

export interface PeerStatistics {
  total: number
  inbound: Record<PeerState, number>
  outbound: Record<PeerState, number>
}

export interface GovernorCounters {
  idlePeers: number
  coldPeers: number
  warmPeers: number
  hotPeers: number
}
