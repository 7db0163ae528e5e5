import {
  type NormalizedEvent,
  zBlockHash,
  zConnectionId,
  zConnectionIdString,
  zFlexibleInt,
} from '@blockperf/schema'
import { z } from 'zod'
import {
  isGovernorTransitionKind,
  statusChangeFor,
} from '../peers/transitions'
import { Direction, type GovernorTransitionKind } from '../peers/types'
import { parseStatusChange } from './status-change'
import type {
  ClassifiedEvent,
  IgnoreReason,
  PeerTransitionEventKind,
} from './types'

const GOVERNOR_COUNTERS =
  /(?:^|\.)InboundGovernor\.(Local|Remote)\.InboundGovernorCounters$/
const GOVERNOR_TRANSITION =
  /(?:^|\.)InboundGovernor\.(Local|Remote)\.((?:Promoted|Demoted)To(?:Warm|Hot|Cold))Remote$/
const NODE_STARTED = /(?:^|\.)Server\.Local\.Started$/
const STATUS_CHANGED = /(?:^|\.)PeerSelection\.Actions\.StatusChanged$/
const DOWNLOADED_HEADER = /(?:^|\.)ChainSync\.Client\.DownloadedHeader$/
const SEND_FETCH_REQUEST = /(?:^|\.)BlockFetch\.Client\.SendFetchRequest$/
const COMPLETED_BLOCK_FETCH = /(?:^|\.)BlockFetch\.Client\.CompletedBlockFetch$/
const ADD_BLOCK =
  /(?:^|\.)ChainDB\.AddBlockEvent\.(AddedToCurrentChain|SwitchedToAFork)$/

const GOVERNOR_EVENT_KIND: Record<
  GovernorTransitionKind,
  PeerTransitionEventKind
> = {
  PromotedToWarm: 'PeerPromotedWarm',
  PromotedToHot: 'PeerPromotedHot',
  DemotedToWarm: 'PeerDemotedWarm',
  DemotedToCold: 'PeerDemotedCold',
}

// One schema per payload variant
const countersPayload = z.object({
  idlePeers: zFlexibleInt(),
  coldPeers: zFlexibleInt(),
  warmPeers: zFlexibleInt(),
  hotPeers: zFlexibleInt(),
})

const governorTransitionPayload = z.object({
  connectionId: zConnectionId(),
})

const statusChangePayload = z.object({
  peerStatusChangeType: z.string(),
})

const peerPayload = z.object({
  connectionId: zConnectionIdString(),
})

const headerPayload = z.object({
  block: zBlockHash(),
  blockNo: zFlexibleInt(),
  slot: zFlexibleInt(),
  size: zFlexibleInt().optional(),
  peer: peerPayload,
})

const fetchRequestPayload = z.object({
  head: zBlockHash(),
  peer: peerPayload,
})

const completedFetchPayload = z.object({
  block: zBlockHash(),
  size: zFlexibleInt(),
  peer: peerPayload,
})

const addBlockPayload = z.object({
  headers: z
    .array(
      z.object({
        hash: zBlockHash(),
        blockNo: zFlexibleInt(),
        slotNo: zFlexibleInt(),
      }),
    )
    .min(1),
})

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ')
}

/** `.Remote.` traces describe connections the remote side opened */
function governorDirection(side: string | undefined): Direction {
  return side === 'Remote' ? Direction.Inbound : Direction.Outbound
}

/**
 * Map one trace event onto a typed variant. Never throws: anything
 * unrecognized or malformed comes back as `Ignored`.
 */
export function classifyEvent(event: NormalizedEvent): ClassifiedEvent {
  const { at, ns, data } = event
  const ignored = (
    reason: IgnoreReason,
    detail?: string,
  ): ClassifiedEvent => ({ kind: 'Ignored', at, ns, reason, detail })

  let match = GOVERNOR_COUNTERS.exec(ns)
  if (match) {
    const payload = countersPayload.safeParse(data)
    if (!payload.success) {
      return ignored('malformed-payload', describeIssues(payload.error))
    }
    return {
      kind: 'InboundGovernorCounters',
      at,
      ns,
      direction: governorDirection(match[1]),
      counters: payload.data,
    }
  }

  match = GOVERNOR_TRANSITION.exec(ns)
  if (match) {
    const [, side, transition = ''] = match
    if (!isGovernorTransitionKind(transition)) {
      return ignored('invalid-transition', transition)
    }
    const payload = governorTransitionPayload.safeParse(data)
    if (!payload.success) {
      return ignored('malformed-payload', describeIssues(payload.error))
    }
    const { localAddress, remoteAddress } = payload.data.connectionId
    return {
      kind: GOVERNOR_EVENT_KIND[transition],
      at,
      ns,
      transition: {
        kind: transition,
        remoteAddress: remoteAddress.address,
        remotePort: remoteAddress.port,
        localAddress: localAddress.address,
        localPort: localAddress.port,
        direction: governorDirection(side),
      },
    }
  }

  if (NODE_STARTED.test(ns)) {
    return { kind: 'NodeRestart', at, ns }
  }

  if (STATUS_CHANGED.test(ns)) {
    const payload = statusChangePayload.safeParse(data)
    if (!payload.success) {
      return ignored('malformed-payload', describeIssues(payload.error))
    }
    const text = payload.data.peerStatusChangeType
    const change = parseStatusChange(text)
    if (!change) return ignored('invalid-status-change', text)
    const kind = statusChangeFor(change.from, change.to)
    if (!kind) return ignored('invalid-transition', text)
    return {
      kind: 'PeerStatusChanged',
      at,
      ns,
      reported: { from: change.from, to: change.to },
      transition: {
        kind,
        remoteAddress: change.remote.address,
        remotePort: change.remote.port,
        localAddress: change.local?.address,
        localPort: change.local?.port,
        direction: Direction.Outbound,
      },
    }
  }

  if (DOWNLOADED_HEADER.test(ns)) {
    const payload = headerPayload.safeParse(data)
    if (!payload.success) {
      return ignored('malformed-payload', describeIssues(payload.error))
    }
    const { block, blockNo, slot, size, peer } = payload.data
    return {
      kind: 'BlockHeaderSeen',
      at,
      ns,
      blockHash: block,
      blockNo,
      slotNo: slot,
      blockSize: size,
      remoteAddress: peer.connectionId.remoteAddress.address,
      remotePort: peer.connectionId.remoteAddress.port,
    }
  }

  if (SEND_FETCH_REQUEST.test(ns)) {
    const payload = fetchRequestPayload.safeParse(data)
    if (!payload.success) {
      return ignored('malformed-payload', describeIssues(payload.error))
    }
    const { head, peer } = payload.data
    return {
      kind: 'BlockFetchRequested',
      at,
      ns,
      blockHash: head,
      remoteAddress: peer.connectionId.remoteAddress.address,
      remotePort: peer.connectionId.remoteAddress.port,
    }
  }

  if (COMPLETED_BLOCK_FETCH.test(ns)) {
    const payload = completedFetchPayload.safeParse(data)
    if (!payload.success) {
      return ignored('malformed-payload', describeIssues(payload.error))
    }
    const { block, size, peer } = payload.data
    return {
      kind: 'BlockDownloaded',
      at,
      ns,
      blockHash: block,
      blockSize: size,
      remoteAddress: peer.connectionId.remoteAddress.address,
      remotePort: peer.connectionId.remoteAddress.port,
    }
  }

  match = ADD_BLOCK.exec(ns)
  if (match) {
    const payload = addBlockPayload.safeParse(data)
    if (!payload.success) {
      return ignored('malformed-payload', describeIssues(payload.error))
    }
    return {
      kind: 'BlockAdopted',
      at,
      ns,
      via:
        match[1] === 'SwitchedToAFork'
          ? 'SwitchedToAFork'
          : 'AddedToCurrentChain',
      headers: payload.data.headers.map(({ hash, blockNo, slotNo }) => ({
        blockHash: hash,
        blockNo,
        slotNo,
      })),
    }
  }

  return ignored('unknown-namespace')
}
