import {
  getHttpMetricsServer,
  type HealthCheckFn,
  type HttpMetricsServer,
} from '@blockperf/metrics'
import { BlockCorrelator } from '../blocks/correlator'
import type { Config } from '../config'
import { toMonitorError } from '../errors'
import { ProcNetConnectionSnapshot } from '../os/proc-net'
import type { OsConnectionSnapshot } from '../os/types'
import { PeerTracker } from '../peers/tracker'
import type { Peer, ReconcileResult } from '../peers/types'
import { Dispatcher } from '../service/dispatcher'
import { createSampleSink } from '../sink'
import { createEventSource } from '../sources'
import type { EventSource } from '../sources/types'
import { Event } from '../types'
import type { MonitorNodeInitOptions, MonitorNodeModules } from './types'

/**
 * Wires source, dispatcher, tracker and correlator together and runs the
 * reconcile, sweep and statistics timers.
 */
export class MonitorNode {
  public readonly config: Config
  public readonly source: EventSource
  public readonly snapshot: OsConnectionSnapshot
  public readonly tracker: PeerTracker
  public readonly blocks: BlockCorrelator
  public readonly dispatcher: Dispatcher

  public running: boolean
  /** Settles when the event source ends or fails */
  public done: Promise<void> | undefined

  protected metricsServer?: HttpMetricsServer
  private readonly abort = new AbortController()
  private reconcileInterval: NodeJS.Timeout | undefined
  private sweepInterval: NodeJS.Timeout | undefined
  private statsInterval: NodeJS.Timeout | undefined
  private reconciling = false

  public static async init(
    options: MonitorNodeInitOptions,
  ): Promise<MonitorNode> {
    const { config } = options
    const peers = new PeerTracker({ config })
    const blocks = new BlockCorrelator({
      config,
      sink: options.sink ?? createSampleSink(config),
    })
    const node = new MonitorNode({
      config,
      source: options.source ?? createEventSource(config),
      snapshot:
        options.snapshot ??
        new ProcNetConnectionSnapshot({ localPort: config.options.localPort }),
      peers,
      blocks,
      dispatcher: new Dispatcher({ config, peers, blocks }),
    })

    const metricsOptions = config.options.metrics
    if (metricsOptions.enabled && config.metrics) {
      const healthCheck: HealthCheckFn = async () => ({
        healthy: node.running,
        ready: node.running,
        live: node.running,
        details: {
          peers: node.tracker.size,
          openBlocks: node.blocks.openCount,
          samples: node.blocks.emitted,
          uptime: config.uptime(),
        },
      })
      node.metricsServer = await getHttpMetricsServer(
        {
          port: metricsOptions.port,
          address: metricsOptions.address,
          healthCheck,
        },
        { register: config.metrics.register },
      )
      config.logger?.info(`Metrics served at ${node.metricsServer.address}`)
    }
    return node
  }

  protected constructor(modules: MonitorNodeModules) {
    this.config = modules.config
    this.source = modules.source
    this.snapshot = modules.snapshot
    this.tracker = modules.peers
    this.blocks = modules.blocks
    this.dispatcher = modules.dispatcher
    this.running = false

    this.config.events.on(Event.BLOCK_SAMPLE, (sample) => {
      this.config.logger?.info(
        `Sample block=${sample.blockNo} slot=${sample.slotNo} g=${sample.blockG}s`,
      )
    })
    this.config.events.on(Event.BLOCK_DROPPED, (record) => {
      this.config.logger?.debug(
        `Dropped incomplete block ${record.blockNo ?? 'unknown'} (${record.blockHash})`,
      )
    })
  }

  /**
   * Reconcile once, start the timers and begin consuming events
   */
  async start(): Promise<boolean> {
    if (this.running) return false
    this.running = true
    const { reconcileInterval, sweepInterval, statsInterval } =
      this.config.options

    await this.reconcile()
    this.reconcileInterval = setInterval(() => {
      void this.reconcile()
    }, reconcileInterval)
    this.sweepInterval = setInterval(() => this.sweep(), sweepInterval)
    this.statsInterval = setInterval(() => this.stats(), statsInterval)

    this.done = this.dispatcher
      .run(this.source, this.abort.signal)
      .catch((err: unknown) => {
        const error = toMonitorError(err, {
          component: 'node',
          operation: 'run',
        })
        this.config.logger?.error(`Event source failed: ${error.message}`)
        throw error
      })
      .finally(() => {
        this.clearTimers()
        this.running = false
      })

    this.config.logger?.info(
      `Monitoring ${this.config.options.network} node on port ${this.config.options.localPort}`,
    )
    return true
  }

  async stop(): Promise<boolean> {
    if (!this.running) return false
    this.config.shutdown = true
    this.config.events.emit(Event.MONITOR_SHUTDOWN)
    this.abort.abort()
    this.clearTimers()
    await this.source.close()
    await this.metricsServer?.close()
    this.running = false
    return true
  }

  /**
   * Compare the tracked peers with the OS table. A failing snapshot skips
   * the pass; the next tick retries.
   */
  async reconcile(): Promise<ReconcileResult | undefined> {
    if (this.reconciling) return undefined
    this.reconciling = true
    try {
      const connections = await this.snapshot.listConnections()
      const result = this.tracker.reconcile(connections)
      if (result.added > 0 || result.removed > 0) {
        this.config.logger?.debug(
          `Reconciled peers added=${result.added} removed=${result.removed}`,
        )
      }
      return result
    } catch (err) {
      const error = toMonitorError(err, {
        component: 'node',
        operation: 'reconcile',
      })
      this.config.metrics?.peers.reconcileFailures.inc()
      this.config.logger?.warn(`Reconciliation skipped: ${error.message}`)
      return undefined
    } finally {
      this.reconciling = false
    }
  }

  sweep(): number {
    return this.blocks.sweep()
  }

  peers(): readonly Readonly<Peer>[] {
    return this.tracker.snapshot()
  }

  protected stats(): void {
    const { total, inbound, outbound } = this.tracker.statistics()
    this.config.logger?.info(
      `Peers total=${total} ` +
        `in(cold=${inbound.Cold} warm=${inbound.Warm} hot=${inbound.Hot} unknown=${inbound.Unknown}) ` +
        `out(cold=${outbound.Cold} warm=${outbound.Warm} hot=${outbound.Hot} unknown=${outbound.Unknown}) ` +
        `openBlocks=${this.blocks.openCount} samples=${this.blocks.emitted}`,
    )
  }

  private clearTimers(): void {
    clearInterval(this.reconcileInterval)
    clearInterval(this.sweepInterval)
    clearInterval(this.statsInterval)
    this.reconcileInterval = undefined
    this.sweepInterval = undefined
    this.statsInterval = undefined
  }
}
