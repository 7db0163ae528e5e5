import debug from 'debug'
import http from 'node:http'
import type { AddressInfo, Socket } from 'node:net'
import type { Gauge, Registry } from 'prom-client'
import { RegistryMetricCreator } from '../utils/registryMetricCreator'

const log = debug('blockperf:metrics:http')

export type HealthStatus = {
  healthy: boolean
  ready: boolean
  live: boolean
  details?: Record<string, unknown>
}

export type HealthCheckFn = () => Promise<HealthStatus>

export type HttpMetricsServerOpts = {
  port: number
  address?: string
  healthCheck?: HealthCheckFn
}

export type HttpMetricsServer = {
  /** Bound address, e.g. http://127.0.0.1:9101 */
  readonly address: string
  close(): Promise<void>
}

enum RequestStatus {
  success = 'success',
  error = 'error',
}

type Probe = {
  key: 'healthy' | 'ready' | 'live'
  up: string
  down: string
}

const PROBES: Record<string, Probe> = {
  '/health': { key: 'healthy', up: 'healthy', down: 'unhealthy' },
  '/ready': { key: 'ready', up: 'ready', down: 'not_ready' },
  '/live': { key: 'live', up: 'alive', down: 'dead' },
}

async function wrapError<T>(
  promise: Promise<T>,
): Promise<{ err: Error } | { result: T }> {
  try {
    return { result: await promise }
  } catch (err) {
    return { err: err instanceof Error ? err : new Error(String(err)) }
  }
}

function sendJson(
  res: http.ServerResponse,
  statusCode: number,
  body: Record<string, unknown>,
): void {
  res
    .writeHead(statusCode, { 'content-type': 'application/json' })
    .end(JSON.stringify(body))
}

async function answerProbe(
  res: http.ServerResponse,
  probe: Probe,
  healthCheck: HealthCheckFn | undefined,
): Promise<void> {
  if (!healthCheck) {
    // Server is running
    sendJson(res, 200, { status: probe.up })
    return
  }
  const outcome = await wrapError(healthCheck())
  if ('err' in outcome) {
    sendJson(res, 500, { status: 'error', error: outcome.err.message })
    return
  }
  const up = outcome.result[probe.key]
  sendJson(res, up ? 200 : 503, {
    status: up ? probe.up : probe.down,
    ...outcome.result.details,
  })
}

/**
 * Tracks open sockets so close() does not wait for keep-alive clients
 */
class SocketTracker {
  private readonly sockets = new Set<Socket>()

  constructor(
    server: http.Server,
    private readonly activeSockets: Gauge,
  ) {
    server.on('connection', (socket: Socket) => {
      this.sockets.add(socket)
      this.activeSockets.set(this.sockets.size)
      socket.once('close', () => {
        this.sockets.delete(socket)
        this.activeSockets.set(this.sockets.size)
      })
    })
  }

  terminate(): void {
    for (const socket of this.sockets) {
      if (!socket.destroyed) socket.destroy()
    }
    this.sockets.clear()
    this.activeSockets.set(0)
  }
}

export async function getHttpMetricsServer(
  opts: HttpMetricsServerOpts,
  {
    register,
    getOtherMetrics = async () => [],
  }: { register: Registry; getOtherMetrics?: () => Promise<string[]> },
): Promise<HttpMetricsServer> {
  // Separate registry, scraping the main one from inside its own collect would deadlock
  const httpServerRegister = new RegistryMetricCreator()

  const scrapeTimeMetric = httpServerRegister.histogram<{
    status: RequestStatus
  }>({
    name: 'blockperf_metrics_scrape_seconds',
    help: 'Metrics server async time to scrape metrics',
    labelNames: ['status'],
    buckets: [0.1, 1, 10],
  })

  const activeSockets = httpServerRegister.gauge({
    name: 'blockperf_metrics_server_active_sockets_count',
    help: 'Metrics server current count of active sockets',
  })

  async function serveMetrics(res: http.ServerResponse): Promise<void> {
    const timer = scrapeTimeMetric.startTimer()
    const outcome = await wrapError(register.metrics())
    if ('err' in outcome) {
      timer({ status: RequestStatus.error })
      res
        .writeHead(500, { 'content-type': 'text/plain' })
        .end(outcome.err.stack)
      return
    }
    timer({ status: RequestStatus.success })

    const httpServerMetrics = await httpServerRegister.metrics()
    const otherMetrics = await getOtherMetrics()
    res
      .writeHead(200, { 'content-type': register.contentType })
      .end([outcome.result, httpServerMetrics, ...otherMetrics].join('\n\n'))
  }

  const server = http.createServer((req, res) => {
    const url = req.url?.split('?')[0] ?? ''
    let handling: Promise<void> | undefined

    if (req.method === 'GET') {
      const probe = PROBES[url]
      if (probe) handling = answerProbe(res, probe, opts.healthCheck)
      else if (url === '/metrics') handling = serveMetrics(res)
    }

    if (!handling) {
      res.writeHead(404).end()
      return
    }
    handling.catch((err: unknown) => {
      log('request %s failed: %o', url, err)
      if (!res.headersSent) res.writeHead(500).end()
    })
  })

  const sockets = new SocketTracker(server, activeSockets)

  const address = await new Promise<string>((resolve, reject) => {
    server.once('error', (err) => {
      log('error starting metrics HTTP server %o', err)
      reject(err)
    })
    server.listen(opts.port, opts.address, () => {
      const bound = server.address()
      if (bound === null || typeof bound === 'string') {
        resolve(String(bound))
        return
      }
      const { port, address: host, family }: AddressInfo = bound
      resolve(`http://${family === 'IPv6' ? `[${host}]` : host}:${port}`)
    })
  })
  log('started metrics HTTP server %s', address)

  return {
    address,
    async close(): Promise<void> {
      sockets.terminate()
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err)
          else resolve()
        })
      })
      log('metrics HTTP server closed')
    },
  }
}
