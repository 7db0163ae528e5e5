import { describe, expect, it, vi } from 'vitest'
import type { BlockSample } from '../../src/blocks/types'
import { ErrorCode, NetworkError } from '../../src/errors'
import { getLogger } from '../../src/logging'
import {
  createSampleSink,
  HttpSampleSink,
  LogSampleSink,
} from '../../src/sink'
import { testConfig } from '../helpers'

const SAMPLE: BlockSample = {
  magic: 2,
  bpVersion: '0.1.0',
  blockNo: 42,
  slotNo: 1000,
  blockHash: 'abcdef0123456789',
  blockSize: 2048,
  headerRemoteAddr: '3.228.174.253',
  headerRemotePort: 6000,
  headerDelta: '0.3',
  blockReqDelta: '0.2',
  blockRspDelta: '0.5',
  blockAdoptDelta: '0.2',
  blockRemoteAddress: '1.2.3.4',
  blockRemotePort: 3001,
  blockLocalAddress: '10.0.0.5',
  blockLocalPort: 3001,
  blockG: '1.2',
}

function sink() {
  return new HttpSampleSink({
    baseUrl: 'https://api.example.test:443/api/v0/',
    apiKey: 'test-secret',
    clientId: 'test-client',
    timeout: 1000,
  })
}

// ============================================================================
// HTTP upload
// ============================================================================

describe('HttpSampleSink', () => {
  it('should post the sample as JSON with credentials', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => {
      return new Response(null, { status: 201 })
    })
    vi.stubGlobal('fetch', fetchMock)

    await sink().submit(SAMPLE)

    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = fetchMock.mock.calls[0] ?? ['', undefined]
    expect(url).toBe('https://api.example.test:443/api/v0/submit/blocksample')
    expect(init?.method).toBe('POST')
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      'X-Api-Key': 'test-secret',
      'X-Client-Id': 'test-client',
    })
    expect(JSON.parse(String(init?.body))).toEqual(SAMPLE)
    expect(init?.signal).toBeInstanceOf(AbortSignal)
  })

  it('should reject with a permanent error on client errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('unknown client', { status: 401 })),
    )
    const error = await sink()
      .submit(SAMPLE)
      .catch((err: unknown) => err)
    expect(error).toBeInstanceOf(NetworkError)
    expect(error).toMatchObject({
      code: ErrorCode.SINK_REJECTED,
      message: 'Upload rejected with 401: unknown client',
      retryable: false,
      recoveryType: 'permanent',
    })
  })

  it('should mark server errors as retryable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('', { status: 503 })),
    )
    await expect(sink().submit(SAMPLE)).rejects.toMatchObject({
      code: ErrorCode.SINK_REJECTED,
      retryable: true,
      metadata: { status: 503 },
    })
  })

  it('should distinguish timeouts from transport failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw Object.assign(new Error('The operation timed out.'), {
          name: 'TimeoutError',
        })
      }),
    )
    await expect(sink().submit(SAMPLE)).rejects.toMatchObject({
      code: ErrorCode.SINK_TIMEOUT,
      message: 'Upload timed out after 1000ms',
    })

    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed')
      }),
    )
    await expect(sink().submit(SAMPLE)).rejects.toMatchObject({
      code: ErrorCode.SINK_REQUEST_FAILED,
      message: 'Upload failed: fetch failed',
    })
  })

  it('should build its URL from the config', () => {
    const { config } = testConfig({ network: 'preview', apiKey: 'test-secret' })
    expect(HttpSampleSink.fromConfig(config).url).toBe(
      'https://preview.api.openblockperf.cardano.org:443/api/v0/submit/blocksample',
    )
  })
})

// ============================================================================
// Sink selection
// ============================================================================

describe('createSampleSink', () => {
  it('should upload only with an API key outside dry runs', () => {
    expect(createSampleSink(testConfig().config)).toBeInstanceOf(LogSampleSink)
    expect(
      createSampleSink(testConfig({ apiKey: 'test-secret', dryRun: true }).config),
    ).toBeInstanceOf(LogSampleSink)
    expect(
      createSampleSink(testConfig({ apiKey: 'test-secret' }).config),
    ).toBeInstanceOf(HttpSampleSink)
  })
})

describe('LogSampleSink', () => {
  it('should log a summary of every sample', async () => {
    const logger = getLogger({ logLevel: 'error' })
    const info = vi.spyOn(logger, 'info')
    await new LogSampleSink(logger).submit(SAMPLE)
    expect(info).toHaveBeenCalledWith(
      'Block 42 slot=1000 hash=abcdef0123456789 header=0.3s request=0.2s ' +
        'response=0.5s adopt=0.2s g=1.2s from=1.2.3.4:3001',
    )
  })
})
