import type { NormalizedEvent } from '@blockperf/schema'
import debug from 'debug'
import type { BlockCorrelator } from '../blocks/correlator'
import type { Config } from '../config'
import { classifyEvent } from '../events/classifier'
import type { ClassifiedEvent } from '../events/types'
import type { PeerTracker } from '../peers/tracker'
import type { EventSource } from '../sources/types'
import { Event } from '../types'

const log = debug('blockperf:dispatcher')

export interface DispatcherOptions {
  config: Config
  peers: PeerTracker
  blocks: BlockCorrelator
}

/**
 * Feeds trace events, one at a time and in arrival order, through the
 * classifier into the peer tracker and the block correlator.
 */
export class Dispatcher {
  private readonly config: Config
  private readonly peers: PeerTracker
  private readonly blocks: BlockCorrelator
  private lastAt: bigint | undefined

  public dispatched = 0
  public ignored = 0
  public outOfOrder = 0

  constructor(options: DispatcherOptions) {
    this.config = options.config
    this.peers = options.peers
    this.blocks = options.blocks
  }

  /**
   * Pull events from the source until it ends or the signal aborts
   */
  async run(source: EventSource, signal?: AbortSignal): Promise<void> {
    for await (const event of source.events()) {
      if (signal?.aborted) break
      this.dispatch(event)
    }
  }

  dispatch(event: NormalizedEvent): ClassifiedEvent {
    this.dispatched++
    this.checkOrder(event)

    const classified = classifyEvent(event)
    this.config.metrics?.events.received.inc({ kind: classified.kind })

    switch (classified.kind) {
      case 'Ignored':
        this.ignored++
        this.config.metrics?.events.ignored.inc({ reason: classified.reason })
        if (classified.reason !== 'unknown-namespace') {
          log(
            'ignored %s: %s %s',
            classified.ns,
            classified.reason,
            classified.detail ?? '',
          )
        }
        this.config.events.emit(Event.EVENT_IGNORED, classified)
        break
      case 'InboundGovernorCounters':
        this.peers.updateGovernorCounters(classified.counters)
        break
      case 'NodeRestart': {
        const dropped = this.peers.reset()
        this.config.logger?.info(`Node restarted, forgot ${dropped} peers`)
        break
      }
      case 'PeerPromotedWarm':
      case 'PeerPromotedHot':
      case 'PeerDemotedWarm':
      case 'PeerDemotedCold':
      case 'PeerStatusChanged':
        this.peers.applyTransitionEvent(classified.transition)
        break
      case 'BlockHeaderSeen':
        this.blocks.onHeaderSeen({
          blockHash: classified.blockHash,
          blockNo: classified.blockNo,
          slotNo: classified.slotNo,
          blockSize: classified.blockSize,
          remoteAddress: classified.remoteAddress,
          remotePort: classified.remotePort,
          at: classified.at,
        })
        break
      case 'BlockFetchRequested':
        this.blocks.onFetchRequested(classified.blockHash, classified.at)
        break
      case 'BlockDownloaded':
        this.blocks.onDownloaded({
          blockHash: classified.blockHash,
          remoteAddress: classified.remoteAddress,
          remotePort: classified.remotePort,
          at: classified.at,
          blockSize: classified.blockSize,
        })
        break
      case 'BlockAdopted':
        for (const header of classified.headers) {
          this.blocks.onAdopted(header.blockHash, classified.at)
        }
        break
    }
    return classified
  }

  // Accepted either way, only flagged
  private checkOrder(event: NormalizedEvent): void {
    if (this.lastAt !== undefined && event.at < this.lastAt) {
      this.outOfOrder++
      this.config.metrics?.events.outOfOrder.inc()
      log(
        'out of order %s: %s ns behind',
        event.ns,
        String(this.lastAt - event.at),
      )
      return
    }
    this.lastAt = event.at
  }
}
