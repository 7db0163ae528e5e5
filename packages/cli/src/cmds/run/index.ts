import type { CommandModule } from 'yargs'
import { type RunHandlerArgs, runHandler } from './handler.js'
import { runOptions } from './options.js'

export const runCommand: CommandModule<{}, RunHandlerArgs> = {
  command: 'run',
  describe: 'Monitor a running cardano-node and report block samples',
  builder: runOptions,
  handler: async (args) => {
    await runHandler(args)
  },
}
