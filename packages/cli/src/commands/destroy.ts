/**
 * wharf destroy — Delete every deployed resource
 *
 * Deletes in reverse dependency order, under the deploy lock, after the
 * operator confirms (or with --yes).
 */

import { Command } from 'commander';
import type { CliEnvironment } from '../context.js';
import { runCommand } from '../run-command.js';
import { confirmChanges, reportOutcome } from './deploy.js';

export function destroyCommand(cli: CliEnvironment): Command {
  return new Command('destroy')
    .description('Delete every deployed resource (asks first)')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(cli, command, async (ctx, globals) => {
        const outcome = await ctx.deployer.destroy(
          confirmChanges(cli, globals, 'Destroy these resources?'),
        );
        reportOutcome(cli, outcome, {
          unchanged: 'Nothing to destroy.',
          applied: (count) => `Destroy complete: ${count} resource(s) deleted.`,
        });
      });
    });
}
