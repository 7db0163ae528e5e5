#!/usr/bin/env tsx

import { getCli, yarg } from './cli.js'

const cli = getCli()

function exitWithError(message: string): never {
  console.error(` ✖ ${message}\n`)
  process.exit(1)
}

cli
  .fail((msg, err) => {
    if (msg?.includes('Not enough non-option arguments')) {
      yarg.showHelp()
      console.log('\n')
    }
    exitWithError(
      err !== undefined ? err.stack || err.message : msg || 'Unknown error',
    )
  })
  .parseAsync()
  .catch((err: unknown) => {
    exitWithError(err instanceof Error ? err.message : String(err))
  })
