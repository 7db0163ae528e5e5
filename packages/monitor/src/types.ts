import type { BlockRecord, BlockSample } from './blocks/types'
import type { IgnoredEvent } from './events/types'
import type { Peer, PeerState } from './peers/types'

export type Event = (typeof Event)[keyof typeof Event]
/**
 * Types for the central event bus, emitted
 * by the stateful components of the monitor.
 */
export const Event = {
  PEER_STATE_CHANGED: 'peer:state:changed',
  PEER_ADDED: 'peer:added',
  PEER_REMOVED: 'peer:removed',
  PEERS_RESET: 'peer:reset',
  BLOCK_SAMPLE: 'block:sample',
  BLOCK_DROPPED: 'block:dropped',
  EVENT_IGNORED: 'event:ignored',
  MONITOR_SHUTDOWN: 'monitor:shutdown',
} as const

export interface EventParams {
  [Event.PEER_STATE_CHANGED]: [peer: Readonly<Peer>, previous: PeerState]
  [Event.PEER_ADDED]: [peer: Readonly<Peer>]
  [Event.PEER_REMOVED]: [peer: Readonly<Peer>]
  [Event.PEERS_RESET]: [dropped: number]
  [Event.BLOCK_SAMPLE]: [sample: BlockSample]
  [Event.BLOCK_DROPPED]: [record: Readonly<BlockRecord>]
  [Event.EVENT_IGNORED]: [event: IgnoredEvent]
  [Event.MONITOR_SHUTDOWN]: []
}
