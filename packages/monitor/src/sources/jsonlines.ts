import type { NormalizedEvent } from '@blockperf/schema'
import { createInterface, type Interface } from 'node:readline'
import type { Readable } from 'node:stream'
import type { Config } from '../config'
import { LineDecoder } from './line-decoder'
import type { EventSource } from './types'

export interface JsonLinesEventSourceOptions {
  config?: Config
}

/**
 * Events from any stream of newline separated JSON, e.g. stdin
 */
export class JsonLinesEventSource implements EventSource {
  public readonly decoder: LineDecoder
  private lines: Interface | undefined

  constructor(
    private readonly input: Readable,
    options: JsonLinesEventSourceOptions = {},
  ) {
    this.decoder = new LineDecoder(options.config)
  }

  async *events(): AsyncGenerator<NormalizedEvent> {
    const lines = createInterface({ input: this.input, crlfDelay: Infinity })
    this.lines = lines
    try {
      for await (const line of lines) {
        const event = this.decoder.decode(line)
        if (event) yield event
      }
    } finally {
      lines.close()
    }
  }

  async close(): Promise<void> {
    this.lines?.close()
    this.input.destroy()
  }
}
