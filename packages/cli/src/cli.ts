import { ConfigConstants } from '@blockperf/monitor'
import yargs, { type Argv } from 'yargs'
import { hideBin } from 'yargs/helpers'
import { commands } from './cmds/index.js'
import { globalOptions } from './options/globalOptions.js'

const topBanner = `⛓️  blockperf: Cardano block propagation monitor
  * Version: ${ConfigConstants.VERSION}`

const bottomBanner = `📖 Every option can also be set as a BLOCKPERF_* environment variable,
  e.g. BLOCKPERF_API_KEY or BLOCKPERF_LOG_FILE`

export const yarg = yargs(hideBin(process.argv))

export function getCli(): Argv {
  let cli = yarg

  // Register all commands
  for (const cmd of commands) {
    cli = cli.command(cmd)
  }

  return cli
    .env('BLOCKPERF')
    .parserConfiguration({
      'dot-notation': false,
    })
    .options(globalOptions)
    .scriptName('blockperf')
    .demandCommand(1)
    .showHelpOnFail(false)
    .usage(topBanner)
    .epilogue(bottomBanner)
    .version(topBanner)
    .alias('h', 'help')
    .alias('v', 'version')
    .recommendCommands()
    .strict()
}
