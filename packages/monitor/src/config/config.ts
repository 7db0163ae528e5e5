import { createMetrics, type Metrics } from '@blockperf/metrics'
import { EventEmitter } from 'eventemitter3'
import type { Logger } from '../logging'
import type { EventParams } from '../types'
import { NETWORK_CONFIGS, type NetworkConfig } from './networks'
import type { ConfigOptions } from './types'
import { createConfigOptions, type ResolvedConfigOptions } from './utils'

export class Config {
  public readonly events: EventEmitter<EventParams>
  public readonly options: ResolvedConfigOptions
  public readonly network: NetworkConfig
  public readonly logger?: Logger
  public readonly metrics?: Metrics

  public shutdown: boolean
  protected readonly startTime: number

  constructor(options: ConfigOptions = {}) {
    this.events = new EventEmitter<EventParams>()
    this.options = createConfigOptions(options)
    this.network = NETWORK_CONFIGS[this.options.network]
    this.logger = this.options.logger
    this.shutdown = false
    this.startTime = this.options.clock()

    if (this.options.metrics.enabled) {
      this.metrics = createMetrics({
        ...this.options.metrics,
        metadata: {
          version: this.options.version,
          network: this.options.network,
        },
      })
    }
  }

  now(): number {
    return this.options.clock()
  }

  /** Seconds since the config was created */
  uptime(): number {
    return Math.floor((this.now() - this.startTime) / 1000)
  }
}
