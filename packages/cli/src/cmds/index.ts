import { runCommand } from './run/index.js'

export const commands = [runCommand]
