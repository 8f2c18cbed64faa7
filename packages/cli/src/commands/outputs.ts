/**
 * wharf outputs — Print the resolved outputs of the last apply
 */

import { Command } from 'commander';
import type { CliEnvironment } from '../context.js';
import { formatOutputs } from '../format.js';
import { runCommand } from '../run-command.js';

export function outputsCommand(cli: CliEnvironment): Command {
  return new Command('outputs')
    .description('Print the invocation URLs, function names and declared outputs')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runCommand(cli, command, async (ctx) => {
        const { outputs } = ctx.store.load();
        if (options.json === true) {
          cli.terminal.out(JSON.stringify(outputs, null, 2));
          return;
        }
        for (const line of formatOutputs(outputs)) cli.terminal.out(line);
      });
    });
}
