import { type NormalizedEvent, zNormalizedEvent } from '@blockperf/schema'
import debug from 'debug'
import type { Config } from '../config'

const log = debug('blockperf:sources')

const eventSchema = zNormalizedEvent()

/**
 * Turns one JSON log line into a NormalizedEvent. Lines that are not JSON
 * or lack the event envelope are counted and skipped.
 */
export class LineDecoder {
  public undecodable = 0

  constructor(private readonly config?: Config) {}

  decode(line: string): NormalizedEvent | undefined {
    const text = line.trim()
    if (text.length === 0) return undefined

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (err) {
      return this.reject(text, err instanceof Error ? err.message : String(err))
    }

    const parsed = eventSchema.safeParse(json)
    if (!parsed.success) {
      return this.reject(text, parsed.error.issues[0]?.message ?? 'invalid')
    }
    return parsed.data
  }

  private reject(text: string, reason: string): undefined {
    this.undecodable++
    this.config?.metrics?.events.undecodable.inc()
    log('skipping line (%s): %s', reason, text.slice(0, 200))
    return undefined
  }
}
