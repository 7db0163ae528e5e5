export interface PeerMilestone {
  /** Nanoseconds since epoch */
  at: bigint
  remoteAddress: string
  remotePort: number
}

export interface Milestone {
  at: bigint
}

/**
 * In-flight block, keyed by hash. Each milestone is written once.
 * A download or adoption may open the record before its header, so
 * blockNo and slotNo stay unset until the header trace arrives.
 */
export interface BlockRecord {
  blockHash: string
  blockNo?: number
  slotNo?: number
  blockSize?: number
  headerFirstSeen?: PeerMilestone
  blockRequestSent?: Milestone
  blockDownloadCompleted?: PeerMilestone
  blockAdopted?: Milestone
  /** Engine clock when the record was opened, milliseconds */
  createdAt: number
}

export type CompleteBlockRecord = BlockRecord &
  Required<
    Pick<
      BlockRecord,
      | 'blockNo'
      | 'slotNo'
      | 'headerFirstSeen'
      | 'blockRequestSent'
      | 'blockDownloadCompleted'
      | 'blockAdopted'
    >
  >

/**
 * Finished propagation sample in the shape the backend accepts.
 * Deltas are decimal seconds.
 */
export interface BlockSample {
  magic: number
  bpVersion: string
  blockNo: number
  slotNo: number
  blockHash: string
  blockSize: number
  headerRemoteAddr: string
  headerRemotePort: number
  headerDelta: string
  blockReqDelta: string
  blockRspDelta: string
  blockAdoptDelta: string
  blockRemoteAddress: string
  blockRemotePort: number
  blockLocalAddress: string
  blockLocalPort: number
  blockG: string
}

export interface SampleSink {
  submit(sample: BlockSample): Promise<void>
}

export interface HeaderSeenInput {
  blockHash: string
  blockNo: number
  slotNo: number
  blockSize?: number
  remoteAddress: string
  remotePort: number
  at: bigint
}

export interface DownloadedInput {
  blockHash: string
  remoteAddress: string
  remotePort: number
  at: bigint
  blockSize?: number
}
