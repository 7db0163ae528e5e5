import { z } from 'zod'
import { zPort } from './number'
import type { ConnectionId, Endpoint } from './types'

/** `[v6addr]:port` or `host:port` */
export const ENDPOINT_PATTERN = /(?:\[([^\]\s]+)\]|([^:\s[\]]+)):(\d{1,5})/

const ENDPOINT = new RegExp(`^${ENDPOINT_PATTERN.source}$`)

export function parseEndpoint(text: string): Endpoint | undefined {
  const match = ENDPOINT.exec(text.trim())
  if (match === null) return undefined
  const [, bracketed, plain, portText] = match
  const address = bracketed ?? plain
  const port = Number(portText)
  if (address === undefined || port > 65535) return undefined
  return { address, port }
}

/** IPv4 or IPv6 literal, hex digits in either case */
export const zIpAddress = () =>
  z
    .string()
    .transform((val) => val.toLowerCase())
    .pipe(z.string().ip())

export function isIpAddress(text: string): boolean {
  return zIpAddress().safeParse(text).success
}

export function formatEndpoint({ address, port }: Endpoint): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`
}

/**
 * Parse the compact connection id used by chain-sync and block-fetch
 * traces: `"<local>:<port> <remote>:<port>"`.
 */
export function parseConnectionIdString(
  text: string,
): ConnectionId | undefined {
  const parts = text.trim().split(/\s+/)
  if (parts.length !== 2) return undefined
  const [local, remote] = parts.map(parseEndpoint)
  if (local === undefined || remote === undefined) return undefined
  return { localAddress: local, remoteAddress: remote }
}

export const zEndpoint = () =>
  z.object({
    address: z.string().min(1),
    port: zPort(),
  })

/** Structured connection id of inbound governor traces */
export const zConnectionId = () =>
  z.object({
    localAddress: zEndpoint(),
    remoteAddress: zEndpoint(),
  })

export const zConnectionIdString = (options: { errorMessage?: string } = {}) =>
  z.string().transform((val, ctx) => {
    const connectionId = parseConnectionIdString(val)
    if (connectionId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: options.errorMessage ?? `Invalid connection id: ${val}`,
      })
      return z.NEVER
    }
    return connectionId
  })

const QUOTED = /^"(.*)"$/
const HEX = /^[0-9a-fA-F]+$/

/** Block hash, tolerating the extra quoting some traces add */
export const zBlockHash = () =>
  z.string().transform((val, ctx) => {
    const hash = val.trim().replace(QUOTED, '$1')
    if (!HEX.test(hash)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid block hash: ${val}`,
      })
      return z.NEVER
    }
    return hash.toLowerCase()
  })
