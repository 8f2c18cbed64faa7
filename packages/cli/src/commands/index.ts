/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by:
 *   src/bin/wharf.ts   (the `wharf` command)
 *   test/*.test.ts     (with a captured terminal and overrides)
 */

import { Command } from 'commander'
import type { CliEnvironment } from '../context.js'
import { nodeTerminal } from '../terminal.js'
import { buildCommand } from './build.js'
import { deployCommand } from './deploy.js'
import { destroyCommand } from './destroy.js'
import { inspectCommand } from './inspect.js'
import { keysCommands } from './keys.js'
import { logCommand } from './log.js'
import { outputsCommand } from './outputs.js'
import { planCommand } from './plan.js'
import { signCommand } from './sign.js'
import { statusCommand } from './status.js'

export const VERSION = '0.1.0'

export function processEnvironment(): CliEnvironment {
  return {
    terminal: nodeTerminal,
    setExitCode: (code) => {
      process.exitCode = code
    },
    cwd: process.cwd(),
    env: process.env,
  }
}

export function createProgram(cli: CliEnvironment = processEnvironment()): Command {
  const program = new Command()
    .name('wharf')
    .description(
      'Wharf: build a signed WebAssembly actor and deploy it behind an HTTP route.\n' +
      'Every change to deployed resources requires explicit operator confirmation.',
    )
    .version(VERSION)
    .option('-C, --project <dir>', 'Project directory (default: the current directory)')
    .option('--state-dir <dir>', 'State directory (env: WHARF_STATE_DIR)')
    .option('--key-dir <dir>', 'Key directory (env: WHARF_KEY_DIR)')
    .option('--profile <profile>', 'Build profile, debug or release (env: WHARF_PROFILE)')
    .option('-y, --yes', 'Apply changes without asking')

  for (const command of keysCommands(cli)) program.addCommand(command)
  program.addCommand(buildCommand(cli))
  program.addCommand(signCommand(cli))
  program.addCommand(inspectCommand(cli))
  program.addCommand(planCommand(cli))
  program.addCommand(deployCommand(cli))
  program.addCommand(destroyCommand(cli))
  program.addCommand(outputsCommand(cli))
  program.addCommand(statusCommand(cli))
  program.addCommand(logCommand(cli))

  return program
}
