/**
 * wharf inspect <path> — Show the claims embedded in a signed module
 *
 * Exits with the invalid-artifact code when the module hash or the
 * signature does not verify.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { BUILD_EXIT_CODES } from '@wharf/kernel';
import type { CliEnvironment } from '../context.js';
import { runCommand } from '../run-command.js';
import { t } from '../theme.js';

function check(ok: boolean, good: string, bad: string): string {
  return ok ? t.green(good) : t.red(bad);
}

export function inspectCommand(cli: CliEnvironment): Command {
  return new Command('inspect')
    .description('Decode and verify the claims of a signed module')
    .argument('<path>', 'Path of the signed module')
    .option('--json', 'Output as JSON')
    .action(async (path: string, options: { json?: boolean }, command: Command) => {
      await runCommand(cli, command, async (ctx) => {
        const inspected = ctx.builder.inspect(resolve(cli.cwd, path));
        const { claims } = inspected;
        const verified = inspected.hash_matches && inspected.signature_valid;

        if (options.json === true) {
          cli.terminal.out(
            JSON.stringify(
              {
                path: inspected.path,
                content_hash: inspected.content_hash,
                module_hash: inspected.module_hash,
                hash_matches: inspected.hash_matches,
                signature_valid: inspected.signature_valid,
                claims,
              },
              null,
              2,
            ),
          );
        } else {
          cli.terminal.out(t.white(inspected.path));
          cli.terminal.out(`  name:         ${claims.wascap.name}`);
          cli.terminal.out(`  issuer:       ${claims.iss}`);
          cli.terminal.out(`  subject:      ${claims.sub}`);
          cli.terminal.out(`  capabilities: ${claims.wascap.caps.length === 0 ? '(none)' : claims.wascap.caps.join(', ')}`);
          cli.terminal.out(`  module hash:  ${claims.wascap.hash} ${check(inspected.hash_matches, '(matches)', '(MISMATCH)')}`);
          cli.terminal.out(`  signature:    ${check(inspected.signature_valid, 'valid', 'INVALID')}`);
          cli.terminal.out(`  file hash:    ${inspected.content_hash}`);
        }
        return verified ? undefined : BUILD_EXIT_CODES.InvalidArtifact;
      });
    });
}
