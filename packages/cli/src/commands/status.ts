/**
 * wharf status — Show the deployment state
 *
 * Displays:
 * - State serial and lineage
 * - The last built artifact
 * - The deploy lock holder, if any
 * - Applied resources and resolved outputs
 */

import { Command } from 'commander';
import type { CliEnvironment } from '../context.js';
import { formatOutputs } from '../format.js';
import { runCommand } from '../run-command.js';
import { t } from '../theme.js';

export function statusCommand(cli: CliEnvironment): Command {
  return new Command('status')
    .description('Show applied resources, outputs, the last artifact and the lock')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runCommand(cli, command, async (ctx) => {
        const state = ctx.store.load();
        const artifact = ctx.store.loadArtifact();
        const holder = ctx.lock.holder();
        const resources = Object.values(state.resources).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
        const out = (line: string): void => cli.terminal.out(line);

        if (options.json === true) {
          out(JSON.stringify({
            project: ctx.config.projectDir,
            state_dir: ctx.config.stateDir,
            serial: state.serial,
            lineage: state.serial === 0 ? null : state.lineage,
            updated_at: state.serial === 0 ? null : state.updated_at,
            artifact: artifact ?? null,
            lock: holder ?? null,
            resources: resources.map((r) => ({ id: r.id, kind: r.kind, updated_at: r.updated_at })),
            outputs: state.outputs,
          }, null, 2));
          return;
        }

        // Human-readable output.
        out(t.blue('\n─── Wharf Status ────────────────────────────────────'));
        out(`Project:   ${ctx.config.projectDir}`);
        out(`State:     ${state.serial === 0 ? t.muted('never applied') : `serial ${state.serial} (lineage ${state.lineage})`}`);
        if (state.serial > 0) out(`Updated:   ${state.updated_at}`);
        out(`Artifact:  ${artifact === undefined ? t.muted('none built') : `${artifact.name} ${artifact.content_hash}`}`);
        out(`Lock:      ${holder === undefined ? 'free' : t.amber(`held by pid ${holder.pid} (${holder.command}) since ${holder.acquired_at}`)}`);

        out('\nResources:');
        if (resources.length === 0) {
          out(t.muted('  (none)'));
        } else {
          for (const r of resources) {
            out(`  ${r.id}  ${t.muted(r.kind)}`);
          }
        }

        out('\nOutputs:');
        for (const line of formatOutputs(state.outputs)) out(line);
        out(t.blue('─────────────────────────────────────────────────────\n'));
      });
    });
}
