import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ErrorCode, SystemError } from '../../src/errors'
import {
  decodeProcAddress,
  formatIPv6,
  guessDirection,
  parseProcNetTcp,
  ProcNetConnectionSnapshot,
} from '../../src/os/proc-net'

const HEADER =
  '  sl  local_address rem_address   st tx_queue rx_queue tr tm->when retrnsmt   uid  timeout inode'

const TCP = [
  HEADER,
  '   0: 0500000A:0BB9 FDAEE403:1770 01 00000000:00000000 00:00000000 00000000  1000        0 1001 1',
  '   1: 0500000A:0BB9 04030201:9CBB 01 00000000:00000000 00:00000000 00000000  1000        0 1002 1',
  '   2: 00000000:0BB9 00000000:0000 0A 00000000:00000000 00:00000000 00000000  1000        0 1003 1',
  '   3: 0100007F:1F90 0100007F:D431 01 00000000:00000000 00:00000000 00000000  1000        0 1004 1',
  '',
].join('\n')

const TCP6 = [
  HEADER,
  '   0: 0000000000000000FFFF00000500000A:0BB9 14D0052A000000000000000001000000:0BB9 01 00000000:00000000 00:00000000 00000000  1000        0 2001 1',
  '',
].join('\n')

describe('decodeProcAddress', () => {
  it('should decode little endian IPv4 columns', () => {
    expect(decodeProcAddress('0500000A:0BB9', 4)).toEqual({
      address: '10.0.0.5',
      port: 3001,
    })
  })

  it('should unwrap IPv4-mapped IPv6 addresses', () => {
    expect(
      decodeProcAddress('0000000000000000FFFF00000500000A:0BB9', 6),
    ).toEqual({ address: '10.0.0.5', port: 3001 })
  })

  it('should write IPv6 addresses in their short form', () => {
    expect(
      decodeProcAddress('14D0052A000000000000000001000000:1770', 6),
    ).toEqual({ address: '2a05:d014::1', port: 6000 })
  })

  it('should reject columns of the wrong width', () => {
    expect(decodeProcAddress('0500000A:0BB9', 6)).toBeUndefined()
    expect(decodeProcAddress('0500000A', 4)).toBeUndefined()
    expect(decodeProcAddress('XYZ0000A:0BB9', 4)).toBeUndefined()
  })
})

describe('formatIPv6', () => {
  it('should compress the longest zero run only', () => {
    expect(formatIPv6(new Array<number>(16).fill(0))).toBe('::')
    expect(formatIPv6([...new Array<number>(15).fill(0), 1])).toBe('::1')
    expect(
      formatIPv6([0x20, 0x01, 0x0d, 0xb8, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 1]),
    ).toBe('2001:db8::1:0:0:1')
  })

  it('should not compress a single zero group', () => {
    expect(
      formatIPv6([0x20, 0x01, 0x0d, 0xb8, 0, 0, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1]),
    ).toBe('2001:db8:0:1:1:1:1:1')
  })
})

describe('guessDirection', () => {
  it('should treat listener style remote ports as outbound', () => {
    expect(guessDirection(3001)).toBe('Outbound')
    expect(guessDirection(6000)).toBe('Outbound')
    expect(guessDirection(40123)).toBe('Inbound')
    expect(guessDirection(0)).toBe('Inbound')
  })
})

describe('parseProcNetTcp', () => {
  it('should keep sockets on the node port', () => {
    expect(parseProcNetTcp(TCP, 4, 3001)).toEqual([
      {
        localAddress: '10.0.0.5',
        localPort: 3001,
        remoteAddress: '3.228.174.253',
        remotePort: 6000,
        direction: 'Outbound',
        established: true,
      },
      {
        localAddress: '10.0.0.5',
        localPort: 3001,
        remoteAddress: '1.2.3.4',
        remotePort: 40123,
        direction: 'Inbound',
        established: true,
      },
      {
        localAddress: '0.0.0.0',
        localPort: 3001,
        remoteAddress: '0.0.0.0',
        remotePort: 0,
        direction: 'Inbound',
        established: false,
      },
    ])
  })
})

describe('ProcNetConnectionSnapshot', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'blockperf-procnet-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should merge the IPv4 and IPv6 tables', async () => {
    await writeFile(join(dir, 'tcp'), TCP)
    await writeFile(join(dir, 'tcp6'), TCP6)
    const snapshot = new ProcNetConnectionSnapshot({
      localPort: 3001,
      tcpPath: join(dir, 'tcp'),
      tcp6Path: join(dir, 'tcp6'),
    })
    const connections = await snapshot.listConnections()
    expect(connections).toHaveLength(4)
    expect(connections[3]).toEqual({
      localAddress: '10.0.0.5',
      localPort: 3001,
      remoteAddress: '2a05:d014::1',
      remotePort: 3001,
      direction: 'Outbound',
      established: true,
    })
  })

  it('should tolerate a missing IPv6 table', async () => {
    await writeFile(join(dir, 'tcp'), TCP)
    const snapshot = new ProcNetConnectionSnapshot({
      localPort: 3001,
      tcpPath: join(dir, 'tcp'),
      tcp6Path: join(dir, 'missing'),
    })
    await expect(snapshot.listConnections()).resolves.toHaveLength(3)
  })

  it('should fail when the IPv4 table cannot be read', async () => {
    const snapshot = new ProcNetConnectionSnapshot({
      localPort: 3001,
      tcpPath: join(dir, 'missing'),
      tcp6Path: join(dir, 'missing6'),
    })
    const error = await snapshot.listConnections().catch((err: unknown) => err)
    expect(error).toBeInstanceOf(SystemError)
    expect(error).toMatchObject({
      code: ErrorCode.OS_SNAPSHOT_FAILED,
      retryable: true,
    })
  })
})
