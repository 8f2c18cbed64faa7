/**
 * @wharf/cli
 *
 * The `wharf` operator command. `createProgram` builds the commander program
 * around a CliEnvironment; the bin passes the real process.
 */

export { createProgram, processEnvironment, VERSION } from './commands/index.js'
export type { CliEnvironment, CommandContext, ContextOverrides, GlobalOptions } from './context.js'
export { createContext, GlobalOptionsSchema } from './context.js'
export { reportError, runCommand } from './run-command.js'
export type { Terminal } from './terminal.js'
export { isYes, nodeTerminal } from './terminal.js'
