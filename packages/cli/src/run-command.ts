/**
 * Wharf CLI — Command boundary
 *
 * The one place errors are caught. A WharfError prints as
 *
 *   error[<category>.<kind>]: <message>
 *   <detail, verbatim>
 *
 * and exits with its kind's code; anything else exits with 1.
 */

import { EXIT_UNEXPECTED, isWharfError } from '@wharf/kernel'
import type { Command } from 'commander'
import { createContext, GlobalOptionsSchema } from './context.js'
import type { CliEnvironment, CommandContext, GlobalOptions } from './context.js'
import type { Terminal } from './terminal.js'
import { t } from './theme.js'

export function reportError(terminal: Terminal, err: unknown): number {
  if (isWharfError(err)) {
    terminal.err(t.red(`error[${err.code}]: ${err.message}`))
    for (const line of err.detail.split('\n')) {
      if (line.trim() !== '') terminal.err(line)
    }
    return err.exitCode
  }
  terminal.err(t.red(`error: ${err instanceof Error ? err.message : String(err)}`))
  return EXIT_UNEXPECTED
}

export function globalOptions(command: Command): GlobalOptions {
  return GlobalOptionsSchema.parse(command.optsWithGlobals())
}

/**
 * Run a command body with a freshly wired context. The body returns the
 * exit code when it is not 0.
 */
export async function runCommand(
  cli: CliEnvironment,
  command: Command,
  body: (ctx: CommandContext, options: GlobalOptions) => Promise<number | void>,
): Promise<void> {
  try {
    const options = globalOptions(command)
    const code = await body(createContext(options, cli), options)
    if (typeof code === 'number') cli.setExitCode(code)
  } catch (err: unknown) {
    cli.setExitCode(reportError(cli.terminal, err))
  }
}
