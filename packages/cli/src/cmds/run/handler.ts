import {
  Config,
  type ConfigOptions,
  getLogger,
  type Logger,
  MonitorNode,
} from '@blockperf/monitor'
import type { GlobalArgs } from '../../options/globalOptions.js'
import type { RunArgs } from './options.js'

export type RunHandlerArgs = RunArgs & GlobalArgs

/**
 * Map parsed arguments onto monitor config options
 */
export function configOptionsFromArgs(
  args: RunHandlerArgs,
  logger?: Logger,
): ConfigOptions {
  const {
    // Global
    logLevel,

    // Metrics
    metricsEnabled,
    metricsPort,
    metricsAddress,
  } = args

  return {
    logger,
    logLevel,

    // Network
    network: args.network,
    localAddress: args.localAddress,
    localPort: args.localPort,

    // Source
    source: args.source,
    logFile: args.logFile,
    fromStart: args.fromStart,
    journaldIdentifier: args.journaldIdentifier,

    // Upload
    apiUrl: args.apiUrl,
    apiPort: args.apiPort,
    apiPath: args.apiPath,
    apiKey: args.apiKey,
    apiClientId: args.apiClientId,
    dryRun: args.dryRun,
    sinkTimeout: args.sinkTimeout,

    // Timing
    reconcileInterval: args.reconcileInterval,
    sweepInterval: args.sweepInterval,
    blockStaleAfter: args.blockStaleAfter,
    finalizedRetention: args.finalizedRetention,
    statsInterval: args.statsInterval,

    metrics: {
      enabled: metricsEnabled,
      port: metricsPort,
      address: metricsAddress,
    },
  }
}

export async function runHandler(args: RunHandlerArgs): Promise<void> {
  const logger = getLogger({
    logLevel: args.logLevel,
    plain: !process.stdout.isTTY,
  })
  const config = new Config(configOptionsFromArgs(args, logger))
  const { options } = config

  const node = await MonitorNode.init({ config })
  await node.start()

  logger.info('='.repeat(60))
  logger.info(`Network:       ${options.network} (magic ${config.network.magic})`)
  logger.info(`Node:          ${options.localAddress}:${options.localPort}`)
  logger.info(
    `Source:        ${options.source === 'file' ? options.logFile : options.source}`,
  )
  logger.info(
    `Upload:        ${options.dryRun || !options.apiKey ? 'disabled (logging samples)' : options.apiBaseUrl}`,
  )
  if (options.metrics.enabled) {
    logger.info(
      `Metrics:       http://${options.metrics.address}:${options.metrics.port}/metrics`,
    )
  }
  logger.info('='.repeat(60))

  // Handle graceful shutdown
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`)
    node.stop().catch((err: unknown) => {
      logger.error(
        `Shutdown failed: ${err instanceof Error ? err.message : String(err)}`,
      )
      process.exitCode = 1
    })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  await node.done
  logger.info(
    `Stopped after ${config.uptime()}s, ${node.blocks.emitted} samples reported`,
  )
}
