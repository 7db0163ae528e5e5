import type { NormalizedEvent } from '@blockperf/schema'
import { Config, type ConfigOptions } from '../src/config'
import type { EventSource } from '../src/sources/types'

export const LOCAL = '10.0.0.5:3001'
export const REMOTE = '3.228.174.253:6000'
export const CONNECTION_ID = `${LOCAL} ${REMOTE}`

export function traceEvent(
  ns: string,
  data: Record<string, unknown> = {},
  at = 0n,
): NormalizedEvent {
  return Object.freeze({ at, ns, data, sev: 'Info', thread: '1', host: 'test' })
}

/**
 * Config with a manually advanced clock
 */
export function testConfig(options: ConfigOptions = {}) {
  const clock = { now: 1_000_000 }
  const config = new Config({
    localAddress: '10.0.0.5',
    localPort: 3001,
    clock: () => clock.now,
    ...options,
  })
  return { config, clock }
}

export class ArrayEventSource implements EventSource {
  public closed = false

  constructor(private readonly items: NormalizedEvent[]) {}

  async *events(): AsyncGenerator<NormalizedEvent> {
    for (const item of this.items) {
      if (this.closed) return
      yield item
    }
  }

  async close(): Promise<void> {
    this.closed = true
  }
}
