import type { BlockSample, SampleSink } from '../blocks/types'
import type { Logger } from '../logging'

/**
 * Logs samples instead of uploading them
 */
export class LogSampleSink implements SampleSink {
  public readonly samples: BlockSample[] = []

  constructor(
    private readonly logger?: Logger,
    /** Keep submitted samples in memory, for inspection */
    private readonly retain = false,
  ) {}

  async submit(sample: BlockSample): Promise<void> {
    if (this.retain) this.samples.push(sample)
    this.logger?.info(
      `Block ${sample.blockNo} slot=${sample.slotNo} hash=${sample.blockHash.slice(0, 16)} ` +
        `header=${sample.headerDelta}s request=${sample.blockReqDelta}s ` +
        `response=${sample.blockRspDelta}s adopt=${sample.blockAdoptDelta}s ` +
        `g=${sample.blockG}s from=${sample.blockRemoteAddress}:${sample.blockRemotePort}`,
    )
  }
}
