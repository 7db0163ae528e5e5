import type { NetworkConfig } from '../config/networks'
import type { CompleteBlockRecord } from './types'

export const NS_PER_MS = 1_000_000n
export const NS_PER_SECOND = 1_000_000_000n

export interface BlockDeltas {
  headerDelta: bigint
  blockReqDelta: bigint
  blockRspDelta: bigint
  blockAdoptDelta: bigint
  /** Slot start to adoption */
  blockG: bigint
}

/**
 * Start of a slot in nanoseconds since the Unix epoch
 */
export function slotTimeNs(network: NetworkConfig, slotNo: number): bigint {
  const startMs = BigInt(network.startTime) * 1000n
  return (startMs + BigInt(slotNo) * BigInt(network.slotLength)) * NS_PER_MS
}

export function computeDeltas(
  record: CompleteBlockRecord,
  slotTime: bigint,
): BlockDeltas {
  const header = record.headerFirstSeen.at
  const request = record.blockRequestSent.at
  const download = record.blockDownloadCompleted.at
  const adopted = record.blockAdopted.at
  return {
    headerDelta: header - slotTime,
    blockReqDelta: request - header,
    blockRspDelta: download - request,
    blockAdoptDelta: adopted - download,
    blockG: adopted - slotTime,
  }
}

/**
 * Exact decimal seconds without trailing zeros: 300000000n is "0.3",
 * -50000000n is "-0.05"
 */
export function formatSeconds(ns: bigint): string {
  const sign = ns < 0n ? '-' : ''
  const abs = ns < 0n ? -ns : ns
  const whole = abs / NS_PER_SECOND
  const fraction = (abs % NS_PER_SECOND)
    .toString()
    .padStart(9, '0')
    .replace(/0+$/, '')
  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`
}

export function toSeconds(ns: bigint): number {
  return Number(ns) / 1e9
}
