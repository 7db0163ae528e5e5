import { defaultMetricsOptions, type MetricsOptions } from '@blockperf/metrics'
import { z } from 'zod'
import { ErrorCode, ValidationError } from '../errors'
import { LOG_LEVELS, type Logger, type LogLevel } from '../logging'
import * as constants from './constants'
import { Network, NETWORK_CONFIGS } from './networks'
import { type ConfigOptions, EventSourceKind } from './types'

/**
 * Resolved config options with all defaults applied
 */
export interface ResolvedConfigOptions {
  readonly network: Network
  /** Base URL that endpoint paths are appended to, ends with a slash */
  readonly apiBaseUrl: string
  readonly apiKey?: string
  readonly apiClientId?: string
  readonly localAddress: string
  readonly localPort: number
  readonly source: EventSourceKind
  readonly logFile?: string
  readonly fromStart: boolean
  readonly journaldIdentifier: string
  readonly reconcileInterval: number
  readonly sweepInterval: number
  readonly blockStaleAfter: number
  readonly finalizedRetention: number
  readonly statsInterval: number
  readonly sinkTimeout: number
  readonly dryRun: boolean
  readonly version: string
  readonly logLevel: LogLevel
  readonly logger?: Logger
  readonly metrics: MetricsOptions
  readonly clock: () => number
}

const interval = z.number().int().positive()

const optionsSchema = z
  .object({
    network: z.nativeEnum(Network).optional(),
    apiUrl: z.string().url().optional(),
    apiPort: z.number().int().min(1).max(65535).optional(),
    apiPath: z.string().startsWith('/').optional(),
    apiKey: z.string().min(1).optional(),
    apiClientId: z.string().min(1).optional(),
    localAddress: z.string().min(1).optional(),
    localPort: z.number().int().min(1).max(65535).optional(),
    source: z.nativeEnum(EventSourceKind).optional(),
    logFile: z.string().min(1).optional(),
    journaldIdentifier: z.string().min(1).optional(),
    reconcileInterval: interval.optional(),
    sweepInterval: interval.optional(),
    blockStaleAfter: interval.optional(),
    finalizedRetention: interval.optional(),
    statsInterval: interval.optional(),
    sinkTimeout: interval.optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .refine((opts) => opts.source !== 'file' || opts.logFile !== undefined, {
    message: 'logFile is required when source is file',
    path: ['logFile'],
  })

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`
}

/**
 * Full API base URL. An explicit apiUrl is used as given.
 */
export function resolveApiBaseUrl(
  network: Network,
  options: Pick<ConfigOptions, 'apiUrl' | 'apiPort' | 'apiPath'>,
): string {
  if (options.apiUrl !== undefined) return withTrailingSlash(options.apiUrl)
  const port = options.apiPort ?? constants.API_PORT_DEFAULT
  const path = options.apiPath ?? constants.API_PATH_DEFAULT
  return withTrailingSlash(`${NETWORK_CONFIGS[network].apiUrl}:${port}${path}`)
}

/**
 * Create config options with all defaults applied
 */
export function createConfigFromDefaults(): ResolvedConfigOptions {
  return {
    network: constants.NETWORK_DEFAULT,
    apiBaseUrl: resolveApiBaseUrl(constants.NETWORK_DEFAULT, {}),
    localAddress: constants.LOCAL_ADDRESS_DEFAULT,
    localPort: constants.LOCAL_PORT_DEFAULT,
    source: constants.SOURCE_DEFAULT,
    fromStart: false,
    journaldIdentifier: constants.JOURNALD_IDENTIFIER_DEFAULT,
    reconcileInterval: constants.RECONCILE_INTERVAL,
    sweepInterval: constants.SWEEP_INTERVAL,
    blockStaleAfter: constants.BLOCK_STALE_AFTER,
    finalizedRetention: constants.FINALIZED_RETENTION,
    statsInterval: constants.STATS_INTERVAL,
    sinkTimeout: constants.SINK_TIMEOUT,
    dryRun: false,
    version: constants.VERSION,
    logLevel: 'info',
    metrics: defaultMetricsOptions,
    clock: Date.now,
  }
}

/**
 * Create config options from user-provided options, applying defaults.
 * Throws a ValidationError for out of range or inconsistent values.
 */
export function createConfigOptions(
  options: ConfigOptions = {},
): ResolvedConfigOptions {
  const parsed = optionsSchema.safeParse(options)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`,
    )
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, {
      code: ErrorCode.CONFIGURATION_ERROR,
      context: { component: 'config' },
      metadata: { issues },
    })
  }

  const defaults = createConfigFromDefaults()
  const network = options.network ?? defaults.network

  return {
    network,
    apiBaseUrl: resolveApiBaseUrl(network, options),
    apiKey: options.apiKey,
    apiClientId: options.apiClientId,
    localAddress: options.localAddress ?? defaults.localAddress,
    localPort: options.localPort ?? defaults.localPort,
    source: options.source ?? defaults.source,
    logFile: options.logFile,
    fromStart: options.fromStart ?? defaults.fromStart,
    journaldIdentifier:
      options.journaldIdentifier ?? defaults.journaldIdentifier,
    reconcileInterval: options.reconcileInterval ?? defaults.reconcileInterval,
    sweepInterval: options.sweepInterval ?? defaults.sweepInterval,
    blockStaleAfter: options.blockStaleAfter ?? defaults.blockStaleAfter,
    finalizedRetention:
      options.finalizedRetention ?? defaults.finalizedRetention,
    statsInterval: options.statsInterval ?? defaults.statsInterval,
    sinkTimeout: options.sinkTimeout ?? defaults.sinkTimeout,
    dryRun: options.dryRun ?? defaults.dryRun,
    version: options.version ?? defaults.version,
    logLevel: options.logLevel ?? defaults.logLevel,
    logger: options.logger,
    metrics: { ...defaults.metrics, ...options.metrics },
    clock: options.clock ?? defaults.clock,
  }
}
