import type { NormalizedEvent } from '@blockperf/schema'
import debug from 'debug'
import { type ChildProcess, spawn } from 'node:child_process'
import { createInterface } from 'node:readline'
import type { Config } from '../config'
import { ErrorCode, SystemError } from '../errors'
import { LineDecoder } from './line-decoder'
import type { EventSource } from './types'

const log = debug('blockperf:sources:journald')

export interface JournaldEventSourceOptions {
  /** SYSLOG_IDENTIFIER of the node's entries */
  identifier: string
  /** Binary to run, journalctl from PATH by default */
  command?: string
  config?: Config
}

/**
 * Text of the MESSAGE field of one `journalctl --output=json` line.
 * journald encodes messages that are not valid UTF-8 as a byte array.
 */
export function journalMessage(line: string): string | undefined {
  let entry: unknown
  try {
    entry = JSON.parse(line)
  } catch (err) {
    log('invalid journal line: %s', err instanceof Error ? err.message : err)
    return undefined
  }
  if (typeof entry !== 'object' || entry === null || !('MESSAGE' in entry)) {
    return undefined
  }
  const message = entry.MESSAGE
  if (typeof message === 'string') return message
  if (
    Array.isArray(message) &&
    message.every((b): b is number => typeof b === 'number')
  ) {
    return Buffer.from(message).toString('utf8')
  }
  return undefined
}

/**
 * Follows new journal entries of the node through journalctl
 */
export class JournaldEventSource implements EventSource {
  public readonly decoder: LineDecoder
  private readonly identifier: string
  private readonly command: string
  private child: ChildProcess | undefined
  private closing = false

  constructor(options: JournaldEventSourceOptions) {
    this.identifier = options.identifier
    this.command = options.command ?? 'journalctl'
    this.decoder = new LineDecoder(options.config)
  }

  get args(): string[] {
    return [
      '--follow',
      '--output=json',
      '--lines=0',
      `--identifier=${this.identifier}`,
    ]
  }

  async *events(): AsyncGenerator<NormalizedEvent> {
    const child = spawn(this.command, this.args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    })
    this.child = child

    let failure: Error | undefined
    let stderr = ''
    const exited = new Promise<number | null>((resolve) => {
      child.once('close', (code) => resolve(code))
    })
    child.once('error', (err) => {
      failure = err
      child.stdout?.destroy()
    })
    child.stderr?.setEncoding('utf8')
    child.stderr?.on('data', (data: string) => {
      stderr = (stderr + data).slice(-2000)
    })

    if (!child.stdout) throw this.failed('journalctl has no stdout')
    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity })
    try {
      for await (const line of lines) {
        const message = journalMessage(line)
        if (message === undefined) continue
        const event = this.decoder.decode(message)
        if (event) yield event
      }
    } finally {
      lines.close()
      if (child.exitCode === null && !child.killed) child.kill()
    }

    if (failure) throw this.failed(failure.message, failure)
    const code = await exited
    if (!this.closing && code !== 0) {
      throw this.failed(`journalctl exited with ${code}: ${stderr.trim()}`)
    }
  }

  async close(): Promise<void> {
    this.closing = true
    this.child?.kill()
  }

  private failed(message: string, cause?: unknown): SystemError {
    return new SystemError(message, {
      code: ErrorCode.EVENT_SOURCE_FAILED,
      context: { component: 'sources', operation: 'journald' },
      cause,
    })
  }
}
