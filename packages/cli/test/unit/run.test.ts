import { Config } from '@blockperf/monitor'
import { describe, expect, it } from 'vitest'
import {
  configOptionsFromArgs,
  type RunHandlerArgs,
} from '../../src/cmds/run/handler.js'

const ARGS: RunHandlerArgs = {
  logLevel: 'debug',
  network: 'preprod',
  localAddress: '10.0.0.5',
  localPort: 3001,
  source: 'file',
  logFile: '/var/log/cardano/node.json',
  fromStart: true,
  journaldIdentifier: 'cardano-node',
  apiPort: 443,
  apiPath: '/api/v0/',
  apiKey: 'test-secret',
  apiClientId: 'test-client',
  dryRun: false,
  sinkTimeout: 5000,
  reconcileInterval: 10_000,
  sweepInterval: 20_000,
  blockStaleAfter: 120_000,
  finalizedRetention: 600_000,
  statsInterval: 60_000,
  metricsEnabled: false,
  metricsPort: 9200,
  metricsAddress: '0.0.0.0',
}

describe('configOptionsFromArgs', () => {
  it('should map every argument onto a valid config', () => {
    const config = new Config(configOptionsFromArgs(ARGS))
    expect(config.options).toMatchObject({
      network: 'preprod',
      apiBaseUrl: 'https://preprod.api.openblockperf.cardano.org:443/api/v0/',
      apiKey: 'test-secret',
      apiClientId: 'test-client',
      localAddress: '10.0.0.5',
      localPort: 3001,
      source: 'file',
      logFile: '/var/log/cardano/node.json',
      fromStart: true,
      reconcileInterval: 10_000,
      sweepInterval: 20_000,
      blockStaleAfter: 120_000,
      finalizedRetention: 600_000,
      statsInterval: 60_000,
      sinkTimeout: 5000,
      logLevel: 'debug',
    })
    expect(config.options.metrics).toMatchObject({
      enabled: false,
      port: 9200,
      address: '0.0.0.0',
    })
  })

  it('should let an explicit API URL win', () => {
    const options = configOptionsFromArgs({
      ...ARGS,
      apiUrl: 'http://localhost:8080/api/v0',
    })
    expect(new Config(options).options.apiBaseUrl).toBe(
      'http://localhost:8080/api/v0/',
    )
  })
})
