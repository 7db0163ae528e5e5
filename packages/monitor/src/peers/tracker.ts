import debug from 'debug'
import type { Config } from '../config'
import type { OsConnection } from '../os/types'
import { Event } from '../types'
import { TRANSITIONS } from './transitions'
import {
  Direction,
  type GovernorCounters,
  type Peer,
  PeerState,
  type PeerStatistics,
  type ReconcileResult,
  type TransitionInput,
} from './types'

const log = debug('blockperf:peers')

export interface PeerTrackerOptions {
  config: Config
}

function emptyCounts(): Record<PeerState, number> {
  return { Unknown: 0, Cold: 0, Warm: 0, Hot: 0 }
}

/**
 * Owns the peer map. Existence follows the OS connection table, the state
 * value follows node traces.
 */
export class PeerTracker {
  private readonly config: Config
  private readonly peers: Map<string, Peer>
  private counters: GovernorCounters | undefined

  /**
   * Transitions whose from-state disagreed with the tracked state
   */
  public stateMismatches = 0

  constructor(options: PeerTrackerOptions) {
    this.config = options.config
    this.peers = new Map()
  }

  static key(remoteAddress: string, remotePort: number): string {
    return `${remoteAddress}|${remotePort}`
  }

  get size(): number {
    return this.peers.size
  }

  get governorCounters(): Readonly<GovernorCounters> | undefined {
    return this.counters
  }

  get(remoteAddress: string, remotePort: number): Readonly<Peer> | undefined {
    const peer = this.peers.get(PeerTracker.key(remoteAddress, remotePort))
    return peer ? Object.freeze({ ...peer }) : undefined
  }

  /**
   * Apply a promotion, demotion or status change. The trace's to-state
   * always wins; a from-state that disagrees with the tracked one is only
   * logged and counted.
   */
  applyTransitionEvent(input: TransitionInput): Readonly<Peer> {
    const { from, to } = TRANSITIONS[input.kind]
    const key = PeerTracker.key(input.remoteAddress, input.remotePort)
    const now = this.config.now()

    let peer = this.peers.get(key)
    if (!peer) {
      peer = {
        remoteAddress: input.remoteAddress,
        remotePort: input.remotePort,
        direction: input.direction,
        state: PeerState.Unknown,
        lastUpdated: now,
      }
      this.peers.set(key, peer)
    } else if (peer.state !== PeerState.Unknown && peer.state !== from) {
      this.stateMismatches++
      this.config.metrics?.peers.stateMismatches.inc()
      log(
        '%s %s expected %s but tracked %s, applying %s',
        key,
        input.kind,
        from,
        peer.state,
        to,
      )
    }

    const previous = peer.state
    peer.state = to
    peer.direction = input.direction
    peer.lastUpdated = now
    if (input.localAddress !== undefined) peer.localAddress = input.localAddress
    if (input.localPort !== undefined) peer.localPort = input.localPort

    this.config.metrics?.peers.transitions.inc({ kind: input.kind })
    this.updateGauges()

    const snapshot = Object.freeze({ ...peer })
    this.config.events.emit(Event.PEER_STATE_CHANGED, snapshot, previous)
    return snapshot
  }

  /**
   * Align peer existence with the established sockets of the node.
   * Unknown sockets become Unknown peers; peers without a socket go.
   */
  reconcile(connections: Iterable<OsConnection>): ReconcileResult {
    const established = new Map<string, OsConnection>()
    for (const conn of connections) {
      if (!conn.established) continue
      established.set(PeerTracker.key(conn.remoteAddress, conn.remotePort), conn)
    }

    const now = this.config.now()
    let added = 0
    let removed = 0

    for (const [key, conn] of established) {
      if (this.peers.has(key)) continue
      const peer: Peer = {
        remoteAddress: conn.remoteAddress,
        remotePort: conn.remotePort,
        direction: conn.direction,
        state: PeerState.Unknown,
        localAddress: conn.localAddress,
        localPort: conn.localPort,
        lastUpdated: now,
      }
      this.peers.set(key, peer)
      added++
      this.config.events.emit(Event.PEER_ADDED, Object.freeze({ ...peer }))
    }

    for (const [key, peer] of this.peers) {
      if (established.has(key)) continue
      this.peers.delete(key)
      removed++
      this.config.events.emit(Event.PEER_REMOVED, Object.freeze({ ...peer }))
    }

    if (added > 0) {
      this.config.metrics?.peers.reconciledPeers.inc({ result: 'added' }, added)
    }
    if (removed > 0) {
      this.config.metrics?.peers.reconciledPeers.inc(
        { result: 'removed' },
        removed,
      )
    }
    this.updateGauges()
    return { added, removed }
  }

  snapshot(): readonly Readonly<Peer>[] {
    return Array.from(this.peers.values(), (peer) =>
      Object.freeze({ ...peer }),
    )
  }

  statistics(): PeerStatistics {
    const stats: PeerStatistics = {
      total: this.peers.size,
      inbound: emptyCounts(),
      outbound: emptyCounts(),
    }
    for (const peer of this.peers.values()) {
      const counts =
        peer.direction === Direction.Inbound ? stats.inbound : stats.outbound
      counts[peer.state]++
    }
    return stats
  }

  updateGovernorCounters(counters: GovernorCounters): void {
    this.counters = { ...counters }
    const gauge = this.config.metrics?.peers.governorPeers
    gauge?.set({ state: 'idle' }, counters.idlePeers)
    gauge?.set({ state: 'cold' }, counters.coldPeers)
    gauge?.set({ state: 'warm' }, counters.warmPeers)
    gauge?.set({ state: 'hot' }, counters.hotPeers)
  }

  /**
   * Forget every peer, used when the node restarts
   */
  reset(): number {
    const dropped = this.peers.size
    this.peers.clear()
    this.counters = undefined
    this.config.metrics?.peers.restarts.inc()
    this.updateGauges()
    this.config.events.emit(Event.PEERS_RESET, dropped)
    return dropped
  }

  private updateGauges(): void {
    const gauge = this.config.metrics?.peers.peers
    if (!gauge) return
    const stats = this.statistics()
    for (const state of Object.values(PeerState)) {
      gauge.set({ state, direction: Direction.Inbound }, stats.inbound[state])
      gauge.set({ state, direction: Direction.Outbound }, stats.outbound[state])
    }
  }
}
