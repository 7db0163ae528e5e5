export { getCli, yarg } from './src/cli.js'
export {
  configOptionsFromArgs,
  type RunHandlerArgs,
  runHandler,
} from './src/cmds/run/handler.js'
export { type RunArgs, runOptions } from './src/cmds/run/options.js'
export { type GlobalArgs, globalOptions } from './src/options/globalOptions.js'
