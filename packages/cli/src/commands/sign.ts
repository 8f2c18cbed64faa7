/**
 * wharf sign <module> — Sign an existing module
 *
 * The signing half of `build`, for a module compiled elsewhere. Name and
 * capabilities default to the build section of the config.
 */

import { basename, extname, resolve } from 'node:path';
import { Command } from 'commander';
import type { CliEnvironment } from '../context.js';
import { runCommand } from '../run-command.js';
import { printArtifact } from './build.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function signCommand(cli: CliEnvironment): Command {
  return new Command('sign')
    .description('Sign a compiled module with the account and module keys')
    .argument('<module>', 'Path of the unsigned module')
    .option('-o, --output <path>', 'Where to write the signed module (default: <module>_signed.wasm)')
    .option('--name <name>', 'Name embedded in the claims')
    .option('--cap <capability>', 'Capability claim, repeatable (replaces the configured set)', collect, [])
    .action(async (module: string, options: { output?: string; name?: string; cap: string[] }, command: Command) => {
      await runCommand(cli, command, async (ctx) => {
        const modulePath = resolve(cli.cwd, module);
        const build = ctx.config.build;
        const artifact = await ctx.builder.sign({
          modulePath,
          outputPath: options.output !== undefined ? resolve(cli.cwd, options.output) : undefined,
          name: options.name ?? build?.name ?? basename(modulePath, extname(modulePath)),
          capabilities: options.cap.length > 0 ? options.cap : (build?.capabilities ?? []),
          keys: ctx.keys.loadPair(),
        });
        printArtifact(cli.terminal, 'Signed', artifact);
      });
    });
}
