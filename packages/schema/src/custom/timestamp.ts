import { z } from 'zod'

const NS_PER_MS = 1_000_000n

// 2025-09-12T16:51:39.269022269Z, fractional part and offset optional
const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})?$/

/**
 * Parse an ISO-8601 timestamp into nanoseconds since the Unix epoch.
 * Returns undefined for anything that is not a valid instant.
 */
export function parseTimestampNs(value: string): bigint | undefined {
  const match = ISO_TIMESTAMP.exec(value.trim())
  if (match === null) return undefined

  const [, seconds, fraction = '', zone = 'Z'] = match
  const ms = Date.parse(`${seconds}${zone}`)
  if (Number.isNaN(ms)) return undefined

  return BigInt(ms) * NS_PER_MS + BigInt(fraction.padEnd(9, '0'))
}

/**
 * Render nanoseconds since the epoch as an ISO-8601 string with nanosecond
 * precision, always in UTC.
 */
export function formatTimestampNs(ns: bigint): string {
  const seconds = ns / 1_000_000_000n
  const fraction = ns % 1_000_000_000n
  const iso = new Date(Number(seconds) * 1000).toISOString()
  return `${iso.slice(0, 19)}.${fraction.toString().padStart(9, '0')}Z`
}

export const zTimestampNs = (options: { errorMessage?: string } = {}) =>
  z.union([z.string(), z.bigint()]).transform((val, ctx) => {
    if (typeof val === 'bigint') return val
    const ns = parseTimestampNs(val)
    if (ns === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: options.errorMessage ?? `Invalid timestamp: ${val}`,
      })
      return z.NEVER
    }
    return ns
  })
