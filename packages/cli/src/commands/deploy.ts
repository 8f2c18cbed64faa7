/**
 * wharf deploy — Plan and apply the stack
 *
 * Confirm-on-change: the plan is printed and applied only after the operator
 * agrees (or with --yes). Runs under the deploy lock. A provider rejection
 * stops the apply; whatever was applied before it stays recorded in state.
 */

import { Command } from 'commander';
import type { ChangeSet } from '@wharf/kernel';
import type { DeployOutcome } from '@wharf/pipeline';
import { loadStack } from '@wharf/pipeline';
import type { CliEnvironment, GlobalOptions } from '../context.js';
import { formatChangeSet, formatOutputs } from '../format.js';
import { runCommand } from '../run-command.js';
import { t } from '../theme.js';
import { collectAssignment, stackVariables } from '../variables.js';
import { buildArtifact } from './build.js';

/** Print the plan, then ask unless --yes was given. */
export function confirmChanges(
  cli: CliEnvironment,
  options: GlobalOptions,
  question: string,
): (changes: ChangeSet) => Promise<boolean> {
  return async (changes) => {
    for (const line of formatChangeSet(changes)) cli.terminal.out(line);
    if (options.yes) return true;
    cli.terminal.out('');
    return cli.terminal.confirm(question);
  };
}

export interface OutcomeMessages {
  readonly unchanged: string;
  readonly applied: (count: number) => string;
}

export function reportOutcome(cli: CliEnvironment, outcome: DeployOutcome, messages: OutcomeMessages): void {
  switch (outcome.status) {
    case 'declined':
      cli.terminal.out(t.amber('Cancelled. Nothing was changed.'));
      return;
    case 'no-changes':
      cli.terminal.out(t.green(messages.unchanged));
      break;
    case 'applied':
      cli.terminal.out('');
      cli.terminal.out(t.green(messages.applied(outcome.applied)));
      break;
  }
  cli.terminal.out('');
  cli.terminal.out('Outputs:');
  for (const line of formatOutputs(outcome.state.outputs)) cli.terminal.out(line);
}

export function deployCommand(cli: CliEnvironment): Command {
  return new Command('deploy')
    .description('Plan and apply the stack (asks before changing anything)')
    .option('--build', 'Build and sign the actor first')
    .option('--var <name=value>', 'Set a stack variable, repeatable', collectAssignment, [])
    .action(async (options: { build?: boolean; var: string[] }, command: Command) => {
      await runCommand(cli, command, async (ctx, globals) => {
        if (options.build === true) {
          await buildArtifact(cli.terminal, ctx);
          cli.terminal.out('');
        }
        const stack = loadStack(ctx.config.stackPath);
        const variables = stackVariables(ctx.config.variables, options.var, stack.definition);
        const outcome = await ctx.deployer.deploy(
          stack.definition,
          variables,
          confirmChanges(cli, globals, 'Apply these changes?'),
        );
        reportOutcome(cli, outcome, {
          unchanged: 'No changes. The deployed state matches the stack.',
          applied: (count) => `Apply complete: ${count} operation(s) applied.`,
        });
      });
    });
}
