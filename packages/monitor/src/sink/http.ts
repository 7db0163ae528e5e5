import debug from 'debug'
import type { BlockSample, SampleSink } from '../blocks/types'
import type { Config } from '../config'
import { ErrorCode, NetworkError } from '../errors'

const log = debug('blockperf:sink:http')

export const BLOCK_SAMPLE_PATH = 'submit/blocksample'

export interface HttpSampleSinkOptions {
  /** Base URL ending in a slash, see resolveApiBaseUrl */
  baseUrl: string
  apiKey?: string
  clientId?: string
  /** Milliseconds before the request is aborted */
  timeout: number
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError'
}

/**
 * Uploads every sample to the blockperf API
 */
export class HttpSampleSink implements SampleSink {
  public readonly url: string
  private readonly headers: Record<string, string>
  private readonly timeout: number

  constructor(options: HttpSampleSinkOptions) {
    this.url = `${options.baseUrl}${BLOCK_SAMPLE_PATH}`
    this.timeout = options.timeout
    this.headers = { 'Content-Type': 'application/json' }
    if (options.apiKey !== undefined) this.headers['X-Api-Key'] = options.apiKey
    if (options.clientId !== undefined) {
      this.headers['X-Client-Id'] = options.clientId
    }
  }

  static fromConfig(config: Config): HttpSampleSink {
    const { apiBaseUrl, apiKey, apiClientId, sinkTimeout } = config.options
    return new HttpSampleSink({
      baseUrl: apiBaseUrl,
      apiKey,
      clientId: apiClientId,
      timeout: sinkTimeout,
    })
  }

  async submit(sample: BlockSample): Promise<void> {
    const context = {
      component: 'sink',
      operation: 'submit',
      blockHash: sample.blockHash,
    }

    let response: Response
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(sample),
        signal: AbortSignal.timeout(this.timeout),
      })
    } catch (err) {
      if (isTimeout(err)) {
        throw new NetworkError(`Upload timed out after ${this.timeout}ms`, {
          code: ErrorCode.SINK_TIMEOUT,
          context,
          cause: err,
        })
      }
      throw new NetworkError(
        `Upload failed: ${err instanceof Error ? err.message : String(err)}`,
        { code: ErrorCode.SINK_REQUEST_FAILED, context, cause: err },
      )
    }

    if (!response.ok) {
      const body = await response.text()
      throw new NetworkError(
        `Upload rejected with ${response.status}: ${body.slice(0, 200)}`,
        {
          code: ErrorCode.SINK_REJECTED,
          context,
          metadata: { status: response.status },
          // 4xx means the sample itself was refused
          retryable: response.status >= 500,
        },
      )
    }
    log('submitted block %d (%s)', sample.blockNo, sample.blockHash)
  }
}
