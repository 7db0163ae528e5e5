export const Network = {
  Mainnet: 'mainnet',
  Preprod: 'preprod',
  Preview: 'preview',
} as const

export type Network = (typeof Network)[keyof typeof Network]

export interface NetworkConfig {
  name: Network
  magic: number
  /** Shelley genesis system start, seconds since epoch */
  startTime: number
  /** Milliseconds */
  slotLength: number
  apiUrl: string
}

// Start times from each network's shelley-genesis.json
export const NETWORK_CONFIGS: Readonly<Record<Network, NetworkConfig>> = {
  [Network.Mainnet]: {
    name: Network.Mainnet,
    magic: 764824073,
    startTime: 1591566291, // Sun Jun 07 2020 21:44:51 GMT+0000
    slotLength: 1000,
    apiUrl: 'https://api.openblockperf.cardano.org',
  },
  [Network.Preprod]: {
    name: Network.Preprod,
    magic: 1,
    startTime: 1654041600, // Wed Jun 01 2022 00:00:00 GMT+0000
    slotLength: 1000,
    apiUrl: 'https://preprod.api.openblockperf.cardano.org',
  },
  [Network.Preview]: {
    name: Network.Preview,
    magic: 2,
    startTime: 1666656000, // Tue Oct 25 2022 00:00:00 GMT+0000
    slotLength: 1000,
    apiUrl: 'https://preview.api.openblockperf.cardano.org',
  },
}

export const NETWORK_NAMES: readonly Network[] = Object.values(Network)
