import type { NormalizedEvent } from '@blockperf/schema'
import debug from 'debug'
import { type FileHandle, open, stat } from 'node:fs/promises'
import { StringDecoder } from 'node:string_decoder'
import { setTimeout as sleep } from 'node:timers/promises'
import type { Config } from '../config'
import { FILE_POLL_INTERVAL } from '../config/constants'
import { ErrorCode, SystemError } from '../errors'
import { LineDecoder } from './line-decoder'
import type { EventSource } from './types'

const log = debug('blockperf:sources:file')

const CHUNK_SIZE = 64 * 1024

export interface FileTailEventSourceOptions {
  path: string
  /** Start at the first byte instead of the current end of the file */
  fromStart?: boolean
  /** Milliseconds between reads once the end of the file is reached */
  pollInterval?: number
  config?: Config
}

/**
 * Follows a JSON log file the way `tail -F` does. A file that shrinks is
 * read again from the start, a file replaced by rotation is reopened.
 */
export class FileTailEventSource implements EventSource {
  public readonly decoder: LineDecoder
  private readonly path: string
  private readonly fromStart: boolean
  private readonly pollInterval: number
  private readonly abort = new AbortController()

  constructor(options: FileTailEventSourceOptions) {
    this.path = options.path
    this.fromStart = options.fromStart ?? false
    this.pollInterval = options.pollInterval ?? FILE_POLL_INTERVAL
    this.decoder = new LineDecoder(options.config)
  }

  get closed(): boolean {
    return this.abort.signal.aborted
  }

  async *events(): AsyncGenerator<NormalizedEvent> {
    let handle = await this.openFile()
    let position = this.fromStart ? 0 : (await handle.stat()).size
    let text = new StringDecoder('utf8')
    let pending = ''
    const chunk = Buffer.alloc(CHUNK_SIZE)

    try {
      while (!this.closed) {
        const { bytesRead } = await handle.read(chunk, 0, CHUNK_SIZE, position)
        if (bytesRead > 0) {
          position += bytesRead
          pending += text.write(chunk.subarray(0, bytesRead))
          const lines = pending.split('\n')
          pending = lines.pop() ?? ''
          for (const line of lines) {
            const event = this.decoder.decode(line)
            if (event) yield event
          }
          continue
        }

        const [current, opened] = await Promise.all([
          this.statPath(),
          handle.stat(),
        ])
        if (current !== undefined && current.ino !== opened.ino) {
          log('%s was replaced, reopening', this.path)
          await handle.close()
          handle = await this.openFile()
          position = 0
          pending = ''
          text = new StringDecoder('utf8')
          continue
        }
        if (opened.size < position) {
          log('%s was truncated, reading from the start', this.path)
          position = 0
          pending = ''
          text = new StringDecoder('utf8')
          continue
        }
        await this.pause()
      }
    } finally {
      await handle.close()
    }
  }

  async close(): Promise<void> {
    this.abort.abort()
  }

  private async openFile(): Promise<FileHandle> {
    try {
      return await open(this.path, 'r')
    } catch (err) {
      throw new SystemError(`Cannot open ${this.path}`, {
        code: ErrorCode.EVENT_SOURCE_FAILED,
        context: { component: 'sources', operation: 'open' },
        cause: err,
      })
    }
  }

  // undefined while a rotated file has not been recreated yet
  private async statPath(): Promise<{ ino: number } | undefined> {
    try {
      return await stat(this.path)
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return undefined
      }
      throw err
    }
  }

  private async pause(): Promise<void> {
    try {
      await sleep(this.pollInterval, undefined, { signal: this.abort.signal })
    } catch (err) {
      if (!this.closed) throw err
    }
  }
}
