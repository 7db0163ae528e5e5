import { describe, expect, it } from 'vitest'
import {
  formatEndpoint,
  isIpAddress,
  parseConnectionIdString,
  parseEndpoint,
  zBlockHash,
  zConnectionId,
  zFlexibleInt,
  zNormalizedEvent,
  zPort,
} from '../../src'

// ============================================================================
// Endpoints
// ============================================================================

describe('isIpAddress', () => {
  it('should accept IPv4 and IPv6 literals', () => {
    expect(isIpAddress('3.228.174.253')).toBe(true)
    expect(isIpAddress('2a05:d014::1')).toBe(true)
    expect(isIpAddress('2A05:D014::1')).toBe(true)
    expect(isIpAddress('::ffff:10.0.0.5')).toBe(true)
  })

  it('should reject host names and malformed addresses', () => {
    expect(isIpAddress('notanip')).toBe(false)
    expect(isIpAddress('relay.example.org')).toBe(false)
    expect(isIpAddress('256.1.1.1')).toBe(false)
    expect(isIpAddress('')).toBe(false)
  })
})

describe('parseEndpoint', () => {
  it('should parse IPv4 endpoints', () => {
    expect(parseEndpoint('3.228.174.253:6000')).toEqual({
      address: '3.228.174.253',
      port: 6000,
    })
  })

  it('should parse bracketed IPv6 endpoints', () => {
    expect(parseEndpoint('[2a05:d014::1]:3001')).toEqual({
      address: '2a05:d014::1',
      port: 3001,
    })
  })

  it('should reject missing ports and out of range ports', () => {
    expect(parseEndpoint('10.0.0.1')).toBeUndefined()
    expect(parseEndpoint('10.0.0.1:70000')).toBeUndefined()
    expect(parseEndpoint('2a05:d014::1:3001')).toBeUndefined()
  })
})

describe('formatEndpoint', () => {
  it('should bracket IPv6 addresses', () => {
    expect(formatEndpoint({ address: '::1', port: 3001 })).toBe('[::1]:3001')
    expect(formatEndpoint({ address: '10.0.0.1', port: 1 })).toBe('10.0.0.1:1')
  })
})

describe('parseConnectionIdString', () => {
  it('should split local and remote endpoints', () => {
    expect(
      parseConnectionIdString('172.0.118.125:3001 3.228.174.253:6000'),
    ).toEqual({
      localAddress: { address: '172.0.118.125', port: 3001 },
      remoteAddress: { address: '3.228.174.253', port: 6000 },
    })
  })

  it('should reject a single endpoint', () => {
    expect(parseConnectionIdString('172.0.118.125:3001')).toBeUndefined()
  })
})

// ============================================================================
// Schemas
// ============================================================================

describe('zFlexibleInt', () => {
  it('should accept numbers and decimal strings', () => {
    expect(zFlexibleInt().parse(12)).toBe(12)
    expect(zFlexibleInt().parse('11745123')).toBe(11745123)
  })

  it('should reject fractions, garbage and bounds violations', () => {
    expect(zFlexibleInt().safeParse('1.5').success).toBe(false)
    expect(zFlexibleInt().safeParse('abc').success).toBe(false)
    expect(zFlexibleInt().safeParse(-1).success).toBe(false)
    expect(zPort().safeParse(65536).success).toBe(false)
  })

  it('should fall back to the default value', () => {
    expect(zFlexibleInt({ defaultValue: 7 }).parse(undefined)).toBe(7)
  })
})

describe('zConnectionId', () => {
  it('should coerce string ports', () => {
    const result = zConnectionId().parse({
      localAddress: { address: '10.0.0.1', port: '3001' },
      remoteAddress: { address: '10.0.0.2', port: '41234' },
    })
    expect(result.remoteAddress.port).toBe(41234)
    expect(result.localAddress.port).toBe(3001)
  })
})

describe('zBlockHash', () => {
  it('should strip quotes and lowercase', () => {
    expect(zBlockHash().parse('"ABCDEF01"')).toBe('abcdef01')
  })

  it('should reject non hex values', () => {
    expect(zBlockHash().safeParse('not-a-hash').success).toBe(false)
  })
})

describe('zNormalizedEvent', () => {
  it('should fill defaults and freeze the event', () => {
    const event = zNormalizedEvent().parse({
      at: '1970-01-01T00:00:01Z',
      ns: 'Net.Server.Local.Started',
      thread: 27,
    })
    expect(event).toEqual({
      at: 1_000_000_000n,
      ns: 'Net.Server.Local.Started',
      data: {},
      sev: 'Info',
      thread: '27',
      host: '',
    })
    expect(Object.isFrozen(event)).toBe(true)
  })

  it('should reject events without a namespace', () => {
    expect(
      zNormalizedEvent().safeParse({ at: '1970-01-01T00:00:01Z' }).success,
    ).toBe(false)
  })
})
