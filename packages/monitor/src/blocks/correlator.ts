import debug from 'debug'
import { type Config, ConfigConstants } from '../config'
import { ErrorCode, StateError, toMonitorError } from '../errors'
import { Event } from '../types'
import {
  computeDeltas,
  formatSeconds,
  slotTimeNs,
  toSeconds,
} from './delta'
import type {
  BlockRecord,
  BlockSample,
  CompleteBlockRecord,
  DownloadedInput,
  HeaderSeenInput,
  SampleSink,
} from './types'

const log = debug('blockperf:blocks')

export interface BlockCorrelatorOptions {
  config: Config
  sink: SampleSink
}

interface ClosedBlock {
  /** Engine clock when the hash was emitted or swept */
  closedAt: number
  blockNo?: number
}

function isComplete(record: BlockRecord): record is CompleteBlockRecord {
  return (
    record.headerFirstSeen !== undefined &&
    record.blockNo !== undefined &&
    record.slotNo !== undefined &&
    record.blockRequestSent !== undefined &&
    record.blockDownloadCompleted !== undefined &&
    record.blockAdopted !== undefined
  )
}

/**
 * Correlates header, fetch, download and adoption traces of a block into
 * one BlockSample. Every milestone is first-writer-wins and each block
 * hash is emitted at most once.
 */
export class BlockCorrelator {
  private readonly config: Config
  private readonly sink: SampleSink

  private readonly open: Map<string, BlockRecord>
  // emitted and swept hashes, pruned by sweep()
  private readonly finalized: Map<string, ClosedBlock>
  private readonly swept: Map<string, ClosedBlock>
  // highest blockNo of any header seen
  private tip = 0

  /**
   * Samples handed to the sink
   */
  public emitted = 0

  /**
   * Records dropped by sweep() without emission
   */
  public dropped = 0

  constructor(options: BlockCorrelatorOptions) {
    this.config = options.config
    this.sink = options.sink
    this.open = new Map()
    this.finalized = new Map()
    this.swept = new Map()
  }

  get openCount(): number {
    return this.open.size
  }

  get finalizedCount(): number {
    return this.finalized.size
  }

  get(blockHash: string): Readonly<BlockRecord> | undefined {
    const record = this.open.get(blockHash)
    return record ? Object.freeze({ ...record }) : undefined
  }

  isFinalized(blockHash: string): boolean {
    return this.finalized.has(blockHash)
  }

  isSwept(blockHash: string): boolean {
    return this.swept.has(blockHash)
  }

  onHeaderSeen(input: HeaderSeenInput): void {
    if (input.blockNo > this.tip) this.tip = input.blockNo
    const record = this.openRecord(input.blockHash)
    if (!record || record.headerFirstSeen) return

    record.blockNo = input.blockNo
    record.slotNo = input.slotNo
    record.headerFirstSeen = {
      at: input.at,
      remoteAddress: input.remoteAddress,
      remotePort: input.remotePort,
    }
    if (record.blockSize === undefined) record.blockSize = input.blockSize
    this.tryFinalize(record)
  }

  onFetchRequested(blockHash: string, at: bigint): void {
    const record = this.open.get(blockHash)
    if (!record || record.blockRequestSent) return
    record.blockRequestSent = { at }
    this.tryFinalize(record)
  }

  onDownloaded(input: DownloadedInput): void {
    const record = this.openRecord(input.blockHash)
    if (!record || record.blockDownloadCompleted) return
    record.blockDownloadCompleted = {
      at: input.at,
      remoteAddress: input.remoteAddress,
      remotePort: input.remotePort,
    }
    if (record.blockSize === undefined) record.blockSize = input.blockSize
    this.tryFinalize(record)
  }

  onAdopted(blockHash: string, at: bigint): void {
    const record = this.openRecord(blockHash)
    if (!record || record.blockAdopted) return
    record.blockAdopted = { at }
    if (!this.tryFinalize(record)) {
      log('adopted %s before all milestones were seen', blockHash)
    }
  }

  /**
   * Drop open records older than the staleness threshold and forget
   * closed hashes once they are both past their retention and deep enough
   * below the tip. Returns the dropped count.
   */
  sweep(now: number = this.config.now()): number {
    const { blockStaleAfter } = this.config.options
    let dropped = 0

    for (const [blockHash, record] of this.open) {
      if (now - record.createdAt <= blockStaleAfter) continue
      this.open.delete(blockHash)
      this.swept.set(blockHash, { closedAt: now, blockNo: record.blockNo })
      dropped++
      log('dropping stale record %s slot=%s', blockHash, record.slotNo)
      this.config.events.emit(Event.BLOCK_DROPPED, Object.freeze({ ...record }))
    }

    this.prune(this.finalized, now)
    this.prune(this.swept, now)

    if (dropped > 0) {
      this.dropped += dropped
      this.config.metrics?.blocks.recordsSwept.inc(dropped)
    }
    this.config.metrics?.blocks.openRecords.set(this.open.size)
    return dropped
  }

  // Existing open record, a new one, or undefined once the hash is closed
  private openRecord(blockHash: string): BlockRecord | undefined {
    if (this.finalized.has(blockHash) || this.swept.has(blockHash)) {
      return undefined
    }
    let record = this.open.get(blockHash)
    if (record === undefined) {
      record = { blockHash, createdAt: this.config.now() }
      this.open.set(blockHash, record)
      this.config.metrics?.blocks.openRecords.set(this.open.size)
    }
    return record
  }

  // Hashes without a known blockNo fall back to wall time alone
  private prune(closed: Map<string, ClosedBlock>, now: number): void {
    const { finalizedRetention } = this.config.options
    for (const [blockHash, entry] of closed) {
      if (now - entry.closedAt <= finalizedRetention) continue
      if (
        entry.blockNo !== undefined &&
        this.tip - entry.blockNo <= ConfigConstants.FINALIZED_BLOCK_DEPTH
      ) {
        continue
      }
      closed.delete(blockHash)
    }
  }

  private tryFinalize(record: BlockRecord): boolean {
    if (!isComplete(record)) return false
    this.finalize(record)
    return true
  }

  private finalize(record: CompleteBlockRecord): void {
    if (this.finalized.has(record.blockHash)) {
      throw new StateError(`Block ${record.blockHash} was already emitted`, {
        code: ErrorCode.DUPLICATE_SAMPLE,
        context: { component: 'blocks', blockHash: record.blockHash },
      })
    }

    const sample = this.buildSample(record)
    this.open.delete(record.blockHash)
    this.finalized.set(record.blockHash, {
      closedAt: this.config.now(),
      blockNo: record.blockNo,
    })
    this.emitted++

    const metrics = this.config.metrics?.blocks
    metrics?.samplesEmitted.inc()
    metrics?.openRecords.set(this.open.size)

    this.config.events.emit(Event.BLOCK_SAMPLE, sample)
    void this.sink.submit(sample).catch((err: unknown) => {
      const error = toMonitorError(err, {
        component: 'blocks',
        operation: 'submit',
        blockHash: sample.blockHash,
      })
      metrics?.sinkFailures.inc()
      this.config.logger?.warn(
        `Sample for block ${sample.blockNo} not delivered: ${error.message}`,
      )
    })
  }

  private buildSample(record: CompleteBlockRecord): BlockSample {
    const { network, options } = this.config
    const deltas = computeDeltas(record, slotTimeNs(network, record.slotNo))

    const histogram = this.config.metrics?.blocks.delaySeconds
    histogram?.observe({ delta: 'header' }, toSeconds(deltas.headerDelta))
    histogram?.observe({ delta: 'request' }, toSeconds(deltas.blockReqDelta))
    histogram?.observe({ delta: 'response' }, toSeconds(deltas.blockRspDelta))
    histogram?.observe({ delta: 'adopt' }, toSeconds(deltas.blockAdoptDelta))

    return Object.freeze({
      magic: network.magic,
      bpVersion: options.version,
      blockNo: record.blockNo,
      slotNo: record.slotNo,
      blockHash: record.blockHash,
      // 0 when neither the header nor the fetch trace carried a size
      blockSize: record.blockSize ?? 0,
      headerRemoteAddr: record.headerFirstSeen.remoteAddress,
      headerRemotePort: record.headerFirstSeen.remotePort,
      headerDelta: formatSeconds(deltas.headerDelta),
      blockReqDelta: formatSeconds(deltas.blockReqDelta),
      blockRspDelta: formatSeconds(deltas.blockRspDelta),
      blockAdoptDelta: formatSeconds(deltas.blockAdoptDelta),
      blockRemoteAddress: record.blockDownloadCompleted.remoteAddress,
      blockRemotePort: record.blockDownloadCompleted.remotePort,
      blockLocalAddress: options.localAddress,
      blockLocalPort: options.localPort,
      blockG: formatSeconds(deltas.blockG),
    })
  }
}
