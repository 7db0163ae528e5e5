import { describe, expect, it, vi } from 'vitest'
import { BlockCorrelator } from '../../src/blocks/correlator'
import { slotTimeNs } from '../../src/blocks/delta'
import { Dispatcher } from '../../src/service/dispatcher'
import { PeerTracker } from '../../src/peers/tracker'
import { LogSampleSink } from '../../src/sink/log'
import { Event } from '../../src/types'
import {
  ArrayEventSource,
  CONNECTION_ID,
  testConfig,
  traceEvent,
} from '../helpers'

const HASH = 'abcdef0123456789'
const MS = 1_000_000n

function setup() {
  const { config, clock } = testConfig()
  const sink = new LogSampleSink(undefined, true)
  const peers = new PeerTracker({ config })
  const blocks = new BlockCorrelator({ config, sink })
  const dispatcher = new Dispatcher({ config, peers, blocks })
  return { config, clock, sink, peers, blocks, dispatcher }
}

function blockTrace(slotStart: bigint) {
  const peer = { connectionId: CONNECTION_ID }
  return [
    traceEvent(
      'ChainSync.Client.DownloadedHeader',
      { block: HASH, blockNo: 42, slot: 1000, peer },
      slotStart + 300n * MS,
    ),
    traceEvent(
      'BlockFetch.Client.SendFetchRequest',
      { head: HASH, peer },
      slotStart + 500n * MS,
    ),
    traceEvent(
      'BlockFetch.Client.CompletedBlockFetch',
      { block: HASH, size: 2048, peer },
      slotStart + 1000n * MS,
    ),
    traceEvent(
      'ChainDB.AddBlockEvent.AddedToCurrentChain',
      { headers: [{ hash: HASH, blockNo: 42, slotNo: 1000 }] },
      slotStart + 1200n * MS,
    ),
  ]
}

describe('Dispatcher', () => {
  it('should route block traces into one sample', () => {
    const { config, sink, dispatcher } = setup()
    const slotStart = slotTimeNs(config.network, 1000)
    for (const event of blockTrace(slotStart)) dispatcher.dispatch(event)

    expect(sink.samples).toHaveLength(1)
    expect(sink.samples[0]).toMatchObject({
      blockHash: HASH,
      blockSize: 2048,
      headerDelta: '0.3',
      blockReqDelta: '0.2',
      blockRspDelta: '0.5',
      blockAdoptDelta: '0.2',
      blockG: '1.2',
      headerRemoteAddr: '3.228.174.253',
      blockRemoteAddress: '3.228.174.253',
      blockRemotePort: 6000,
    })
    expect(dispatcher.dispatched).toBe(4)
    expect(dispatcher.outOfOrder).toBe(0)
  })

  it('should route peer traces into the tracker', () => {
    const { peers, dispatcher } = setup()
    dispatcher.dispatch(
      traceEvent('Net.PeerSelection.Actions.StatusChanged', {
        peerStatusChangeType: 'ColdToWarm 3.228.174.253:6000',
      }),
    )
    dispatcher.dispatch(
      traceEvent('Net.InboundGovernor.Remote.PromotedToWarmRemote', {
        connectionId: {
          localAddress: { address: '10.0.0.5', port: 3001 },
          remoteAddress: { address: '1.2.3.4', port: 40123 },
        },
      }),
    )
    dispatcher.dispatch(
      traceEvent('Net.InboundGovernor.Local.InboundGovernorCounters', {
        idlePeers: 0,
        coldPeers: 1,
        warmPeers: 2,
        hotPeers: 3,
      }),
    )

    expect(peers.get('3.228.174.253', 6000)).toMatchObject({
      state: 'Warm',
      direction: 'Outbound',
    })
    expect(peers.get('1.2.3.4', 40123)).toMatchObject({
      state: 'Warm',
      direction: 'Inbound',
      localAddress: '10.0.0.5',
      localPort: 3001,
    })
    expect(peers.governorCounters).toEqual({
      idlePeers: 0,
      coldPeers: 1,
      warmPeers: 2,
      hotPeers: 3,
    })
  })

  it('should reset peers when the node restarts', () => {
    const { peers, dispatcher } = setup()
    dispatcher.dispatch(
      traceEvent('Net.PeerSelection.Actions.StatusChanged', {
        peerStatusChangeType: 'ColdToWarm 3.228.174.253:6000',
      }),
    )
    const classified = dispatcher.dispatch(
      traceEvent('Net.Server.Local.Started'),
    )
    expect(classified.kind).toBe('NodeRestart')
    expect(peers.size).toBe(0)
  })

  it('should count ignored events and publish them', () => {
    const { config, dispatcher } = setup()
    const listener = vi.fn()
    config.events.on(Event.EVENT_IGNORED, listener)
    dispatcher.dispatch(traceEvent('Mempool.AddedTx'))
    dispatcher.dispatch(
      traceEvent('Net.PeerSelection.Actions.StatusChanged', {
        peerStatusChangeType: 'nonsense',
      }),
    )
    expect(dispatcher.ignored).toBe(2)
    expect(listener.mock.calls.map(([event]) => event.reason)).toEqual([
      'unknown-namespace',
      'invalid-status-change',
    ])
  })

  it('should flag but still process events that go back in time', () => {
    const { peers, dispatcher } = setup()
    dispatcher.dispatch(traceEvent('Mempool.AddedTx', {}, 10n))
    dispatcher.dispatch(
      traceEvent(
        'Net.PeerSelection.Actions.StatusChanged',
        { peerStatusChangeType: 'ColdToWarm 3.228.174.253:6000' },
        5n,
      ),
    )
    dispatcher.dispatch(traceEvent('Mempool.AddedTx', {}, 7n))
    dispatcher.dispatch(traceEvent('Mempool.AddedTx', {}, 10n))

    expect(dispatcher.outOfOrder).toBe(2)
    expect(dispatcher.dispatched).toBe(4)
    expect(peers.get('3.228.174.253', 6000)?.state).toBe('Warm')
  })

  it('should consume a source until it ends', async () => {
    const { config, sink, dispatcher } = setup()
    const slotStart = slotTimeNs(config.network, 1000)
    await dispatcher.run(new ArrayEventSource(blockTrace(slotStart)))
    expect(dispatcher.dispatched).toBe(4)
    expect(sink.samples).toHaveLength(1)
  })

  it('should stop consuming once the signal aborts', async () => {
    const { config, dispatcher } = setup()
    const abort = new AbortController()
    abort.abort()
    const slotStart = slotTimeNs(config.network, 1000)
    await dispatcher.run(new ArrayEventSource(blockTrace(slotStart)), abort.signal)
    expect(dispatcher.dispatched).toBe(0)
  })
})
