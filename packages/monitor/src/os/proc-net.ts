import { readFile } from 'node:fs/promises'
import { ErrorCode, SystemError } from '../errors'
import { Direction } from '../peers/types'
import type { OsConnection, OsConnectionSnapshot } from './types'

const TCP_ESTABLISHED = '01'

export type AddressFamily = 4 | 6

export interface ProcNetSnapshotOptions {
  /** Port the node listens on; other sockets are not the node's */
  localPort: number
  tcpPath?: string
  tcp6Path?: string
}

function hexBytes(hex: string): number[] {
  const bytes: number[] = []
  for (let i = 0; i < hex.length; i += 2) {
    bytes.push(Number.parseInt(hex.slice(i, i + 2), 16))
  }
  return bytes
}

// The kernel prints each 32 bit word in host (little endian) order
function wordsToNetworkOrder(bytes: number[]): number[] {
  const out: number[] = []
  for (let i = 0; i < bytes.length; i += 4) {
    out.push(...bytes.slice(i, i + 4).reverse())
  }
  return out
}

/**
 * RFC 5952 text form: lowercase, leading zeros dropped, the longest run
 * of two or more zero groups shortened to `::`
 */
export function formatIPv6(bytes: readonly number[]): string {
  const groups: number[] = []
  for (let i = 0; i < 16; i += 2) {
    groups.push(((bytes[i] ?? 0) << 8) | (bytes[i + 1] ?? 0))
  }

  let bestStart = -1
  let bestLength = 0
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++
      continue
    }
    let j = i
    while (j < groups.length && groups[j] === 0) j++
    if (j - i > bestLength) {
      bestStart = i
      bestLength = j - i
    }
    i = j
  }

  const hex = groups.map((group) => group.toString(16))
  if (bestLength < 2) return hex.join(':')
  const head = hex.slice(0, bestStart).join(':')
  const tail = hex.slice(bestStart + bestLength).join(':')
  return `${head}::${tail}`
}

/**
 * Decode an address column such as `0100007F:0BB9`
 */
export function decodeProcAddress(
  column: string,
  family: AddressFamily,
): { address: string; port: number } | undefined {
  const [addressHex, portHex] = column.split(':')
  const width = family === 4 ? 8 : 32
  if (
    addressHex === undefined ||
    portHex === undefined ||
    addressHex.length !== width ||
    !/^[0-9A-Fa-f]+$/.test(addressHex) ||
    !/^[0-9A-Fa-f]{4}$/.test(portHex)
  ) {
    return undefined
  }

  const bytes = wordsToNetworkOrder(hexBytes(addressHex))
  const port = Number.parseInt(portHex, 16)
  if (family === 4) return { address: bytes.join('.'), port }

  const mapped =
    bytes.slice(0, 10).every((b) => b === 0) &&
    bytes[10] === 0xff &&
    bytes[11] === 0xff
  if (mapped) return { address: bytes.slice(12).join('.'), port }
  return { address: formatIPv6(bytes), port }
}

/**
 * Outbound when the remote side is on a listening-port style number.
 * Node-to-node connections reuse the listening port locally, so the
 * local port alone cannot tell.
 */
export function guessDirection(remotePort: number): Direction {
  return remotePort >= 1000 && remotePort < 10000
    ? Direction.Outbound
    : Direction.Inbound
}

/**
 * Parse the text of /proc/net/tcp or /proc/net/tcp6
 */
export function parseProcNetTcp(
  text: string,
  family: AddressFamily,
  localPort: number,
): OsConnection[] {
  const connections: OsConnection[] = []
  const lines = text.split('\n').slice(1)
  for (const line of lines) {
    const columns = line.trim().split(/\s+/)
    if (columns.length < 4) continue
    const [, localColumn = '', remoteColumn = '', state] = columns
    const local = decodeProcAddress(localColumn, family)
    const remote = decodeProcAddress(remoteColumn, family)
    if (!local || !remote || local.port !== localPort) continue
    connections.push({
      localAddress: local.address,
      localPort: local.port,
      remoteAddress: remote.address,
      remotePort: remote.port,
      direction: guessDirection(remote.port),
      established: state === TCP_ESTABLISHED,
    })
  }
  return connections
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'EACCES')
  )
}

/**
 * Reads the kernel TCP tables of the host the node runs on
 */
export class ProcNetConnectionSnapshot implements OsConnectionSnapshot {
  private readonly localPort: number
  private readonly tcpPath: string
  private readonly tcp6Path: string

  constructor(options: ProcNetSnapshotOptions) {
    this.localPort = options.localPort
    this.tcpPath = options.tcpPath ?? '/proc/net/tcp'
    this.tcp6Path = options.tcp6Path ?? '/proc/net/tcp6'
  }

  async listConnections(): Promise<OsConnection[]> {
    const [v4, v6] = await Promise.all([
      this.readTable(this.tcpPath, 4, true),
      this.readTable(this.tcp6Path, 6, false),
    ])
    return [...v4, ...v6]
  }

  private async readTable(
    path: string,
    family: AddressFamily,
    required: boolean,
  ): Promise<OsConnection[]> {
    let text: string
    try {
      text = await readFile(path, 'utf8')
    } catch (err) {
      // tcp6 is absent on hosts without IPv6
      if (!required && isMissingFile(err)) return []
      throw new SystemError(`Cannot read ${path}`, {
        code: ErrorCode.OS_SNAPSHOT_FAILED,
        context: { component: 'os', operation: 'listConnections' },
        retryable: true,
        cause: err,
      })
    }
    return parseProcNetTcp(text, family, this.localPort)
  }
}
