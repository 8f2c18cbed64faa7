/**
 * wharf keys, keys-account, keys-module — Generate signing keys
 *
 * Keys are generated once, by explicit operator action, and written to the
 * key directory as `account.nk` and `module.nk`. An existing key file is only
 * replaced with --force.
 */

import { Command } from 'commander';
import type { KeyRole } from '@wharf/kernel';
import type { CliEnvironment, CommandContext } from '../context.js';
import { runCommand } from '../run-command.js';
import { t } from '../theme.js';

const ROLE_LABELS: Record<KeyRole, string> = {
  account: 'Account key',
  module: 'Module key',
};

async function generate(cli: CliEnvironment, ctx: CommandContext, role: KeyRole, force: boolean): Promise<void> {
  const pair = await ctx.keys.generate(role, { force });
  cli.terminal.out(`${ROLE_LABELS[role]}: ${t.blue(pair.public_key)}`);
  cli.terminal.out(t.muted(`  written to ${pair.path ?? ctx.keyStore.pathFor(role)}`));
}

function keyCommand(cli: CliEnvironment, name: string, description: string, roles: ReadonlyArray<KeyRole>): Command {
  return new Command(name)
    .description(description)
    .option('--force', 'Replace an existing key file')
    .action(async (options: { force?: boolean }, command: Command) => {
      await runCommand(cli, command, async (ctx) => {
        for (const role of roles) {
          await generate(cli, ctx, role, options.force === true);
        }
      });
    });
}

export function keysCommands(cli: CliEnvironment): Command[] {
  return [
    keyCommand(cli, 'keys', 'Generate the account (issuer) and module (subject) keys', ['account', 'module']),
    keyCommand(cli, 'keys-account', 'Generate the account (issuer) key', ['account']),
    keyCommand(cli, 'keys-module', 'Generate the module (subject) key', ['module']),
  ];
}
