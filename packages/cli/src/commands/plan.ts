/**
 * wharf plan — Show the changes a deploy would make
 *
 * Reads state and the last built artifact; takes no lock and changes
 * nothing in the cloud.
 */

import { Command } from 'commander';
import { loadStack } from '@wharf/pipeline';
import type { CliEnvironment } from '../context.js';
import { formatChangeSet } from '../format.js';
import { runCommand } from '../run-command.js';
import { collectAssignment, stackVariables } from '../variables.js';

export function planCommand(cli: CliEnvironment): Command {
  return new Command('plan')
    .description('Show the changes needed to bring the deployment in line with the stack')
    .option('--var <name=value>', 'Set a stack variable, repeatable', collectAssignment, [])
    .action(async (options: { var: string[] }, command: Command) => {
      await runCommand(cli, command, async (ctx) => {
        const stack = loadStack(ctx.config.stackPath);
        const variables = stackVariables(ctx.config.variables, options.var, stack.definition);
        const changes = ctx.deployer.plan(stack.definition, variables);
        for (const line of formatChangeSet(changes)) cli.terminal.out(line);
      });
    });
}
