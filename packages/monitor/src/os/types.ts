import type { Direction } from '../peers/types'

/**
 * One TCP socket of the monitored node as seen by the kernel
 */
export interface OsConnection {
  localAddress: string
  localPort: number
  remoteAddress: string
  remotePort: number
  direction: Direction
  established: boolean
}

/**
 * Source of ground truth for which peers are actually connected
 */
export interface OsConnectionSnapshot {
  listConnections(): Promise<OsConnection[]>
}
