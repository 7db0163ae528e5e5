import type {
  Direction,
  GovernorCounters,
  LogPeerState,
  TransitionInput,
} from '../peers/types'

export type PeerTransitionEventKind =
  | 'PeerPromotedWarm'
  | 'PeerPromotedHot'
  | 'PeerDemotedWarm'
  | 'PeerDemotedCold'
  | 'PeerStatusChanged'

export type IgnoreReason =
  | 'unknown-namespace'
  | 'malformed-payload'
  | 'invalid-status-change'
  | 'invalid-transition'

interface ClassifiedBase {
  /** Nanoseconds since epoch, copied from the trace */
  at: bigint
  ns: string
}

export interface InboundGovernorCountersEvent extends ClassifiedBase {
  kind: 'InboundGovernorCounters'
  direction: Direction
  counters: GovernorCounters
}

export interface NodeRestartEvent extends ClassifiedBase {
  kind: 'NodeRestart'
}

export interface PeerTransitionEvent extends ClassifiedBase {
  kind: PeerTransitionEventKind
  transition: TransitionInput
  /** States as written in a status change trace */
  reported?: { from: LogPeerState; to: LogPeerState }
}

export interface BlockHeaderSeenEvent extends ClassifiedBase {
  kind: 'BlockHeaderSeen'
  blockHash: string
  blockNo: number
  slotNo: number
  blockSize?: number
  remoteAddress: string
  remotePort: number
}

export interface BlockFetchRequestedEvent extends ClassifiedBase {
  kind: 'BlockFetchRequested'
  blockHash: string
  remoteAddress: string
  remotePort: number
}

export interface BlockDownloadedEvent extends ClassifiedBase {
  kind: 'BlockDownloaded'
  blockHash: string
  blockSize: number
  remoteAddress: string
  remotePort: number
}

export interface AdoptedHeader {
  blockHash: string
  blockNo: number
  slotNo: number
}

export interface BlockAdoptedEvent extends ClassifiedBase {
  kind: 'BlockAdopted'
  /** AddedToCurrentChain or SwitchedToAFork */
  via: 'AddedToCurrentChain' | 'SwitchedToAFork'
  headers: AdoptedHeader[]
}

export interface IgnoredEvent extends ClassifiedBase {
  kind: 'Ignored'
  reason: IgnoreReason
  detail?: string
}

export type ClassifiedEvent =
  | InboundGovernorCountersEvent
  | NodeRestartEvent
  | PeerTransitionEvent
  | BlockHeaderSeenEvent
  | BlockFetchRequestedEvent
  | BlockDownloadedEvent
  | BlockAdoptedEvent
  | IgnoredEvent

export type ClassifiedKind = ClassifiedEvent['kind']
