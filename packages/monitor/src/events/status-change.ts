import {
  ENDPOINT_PATTERN,
  type Endpoint,
  isIpAddress,
} from '@blockperf/schema'
import type { LogPeerState } from '../peers/types'

export interface StatusChange {
  from: LogPeerState
  to: LogPeerState
  local?: Endpoint
  remote: Endpoint
}

const STATE = '(Cold|Warm|Hot)'
const ENDPOINT = ENDPOINT_PATTERN.source

// "ColdToWarm (Just 172.0.118.125:3001) 3.228.174.253:6000"
// "ColdToWarm 3.228.174.253:6000"
const STATUS_CHANGE = new RegExp(
  `^${STATE}To${STATE}(?: \\(Just ${ENDPOINT}\\))? ${ENDPOINT}$`,
)

function endpoint(
  bracketed: string | undefined,
  plain: string | undefined,
  port: string | undefined,
): Endpoint | undefined {
  const address = bracketed ?? plain
  if (address === undefined || port === undefined) return undefined
  if (!isIpAddress(address)) return undefined
  const num = Number(port)
  return num <= 65535 ? { address, port: num } : undefined
}

function isLogPeerState(value: string | undefined): value is LogPeerState {
  return value === 'Cold' || value === 'Warm' || value === 'Hot'
}

/**
 * Parse the `peerStatusChangeType` field of a peer selection trace.
 * Anything outside the two known forms yields undefined.
 */
export function parseStatusChange(text: string): StatusChange | undefined {
  const match = STATUS_CHANGE.exec(text.trim())
  if (match === null) return undefined

  const [, from, to, lb, lp, lport, rb, rp, rport] = match
  if (!isLogPeerState(from) || !isLogPeerState(to)) return undefined

  const remote = endpoint(rb, rp, rport)
  if (remote === undefined) return undefined

  const hasLocal = lport !== undefined
  const local = hasLocal ? endpoint(lb, lp, lport) : undefined
  if (hasLocal && local === undefined) return undefined

  return local ? { from, to, local, remote } : { from, to, remote }
}
