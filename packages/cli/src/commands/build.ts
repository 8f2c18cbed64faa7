/**
 * wharf build — Compile and sign the actor
 *
 * Runs the compiler on the configured crate, signs the module with the
 * account and module keys and records the artifact for the next deploy.
 */

import { Command } from 'commander';
import { ConfigError } from '@wharf/kernel';
import type { Artifact } from '@wharf/kernel';
import { CONFIG_FILE } from '@wharf/runtime-host';
import type { BuildSettings, WharfConfig } from '@wharf/runtime-host';
import type { CliEnvironment, CommandContext } from '../context.js';
import { runCommand } from '../run-command.js';
import type { Terminal } from '../terminal.js';
import { t } from '../theme.js';

/** @throws {ConfigError} InvalidConfig when the config declares no build */
export function requireBuildSettings(config: WharfConfig): BuildSettings {
  if (config.build === undefined) {
    throw new ConfigError(
      'InvalidConfig',
      `No build section in ${CONFIG_FILE}`,
      'Add a "build" object naming at least the "crate" to compile.',
    );
  }
  return config.build;
}

export function printArtifact(terminal: Terminal, verb: string, artifact: Artifact): void {
  const caps = artifact.capabilities.map((c) => c.name);
  terminal.out(`${t.green(verb)} ${t.white(artifact.name)}`);
  terminal.out(`  signed:       ${artifact.signed_path}`);
  terminal.out(`  hash:         ${artifact.content_hash}`);
  terminal.out(`  capabilities: ${caps.length === 0 ? '(none)' : caps.join(', ')}`);
  terminal.out(`  issuer:       ${artifact.issuer.public_key}`);
  terminal.out(`  subject:      ${artifact.subject.public_key}`);
}

export async function buildArtifact(terminal: Terminal, ctx: CommandContext): Promise<Artifact> {
  const settings = requireBuildSettings(ctx.config);
  const keys = ctx.keys.loadPair();
  terminal.out(t.muted(`Compiling ${settings.crate} (${settings.profile})`));
  const artifact = await ctx.builder.build({
    sourceDir: settings.sourceDir,
    crate: settings.crate,
    profile: settings.profile,
    name: settings.name,
    capabilities: settings.capabilities,
    keys,
  });
  printArtifact(terminal, 'Built', artifact);
  return artifact;
}

export function buildCommand(cli: CliEnvironment): Command {
  return new Command('build')
    .description('Compile the actor and sign it with its capabilities')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(cli, command, async (ctx) => {
        await buildArtifact(cli.terminal, ctx);
      });
    });
}
