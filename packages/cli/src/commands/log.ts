/**
 * wharf log — Query the deploy log
 *
 * Every key generation, build, plan, resource change, failure and lock
 * rejection is recorded in logs/deploy.jsonl. Duplicate and malformed lines
 * are dropped on read and reported on stderr.
 */

import { Command, InvalidArgumentError } from 'commander';
import { DEPLOY_LOG, readLog } from '@wharf/runtime-host';
import type { LoggedEvent } from '@wharf/runtime-host';
import type { CliEnvironment } from '../context.js';
import { runCommand } from '../run-command.js';
import { t } from '../theme.js';

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return n;
}

function formatEvent(event: LoggedEvent): string {
  const subject = event.resource_id !== undefined ? ` ${event.resource_id}` : '';
  const serial = event.serial !== undefined ? t.muted(` #${event.serial}`) : '';
  const detail = event.detail !== undefined ? ` ${t.muted(event.detail)}` : '';
  const type = event.type === 'apply.failed' || event.type === 'lock.rejected' ? t.red(event.type) : t.blue(event.type);
  return `${event.timestamp}  ${type}${subject}${serial}${detail}`;
}

export function logCommand(cli: CliEnvironment): Command {
  return new Command('log')
    .description('Query the deploy log')
    .option('--type <type>', 'Only events of this type (e.g. resource.created)')
    .option('--resource <id>', 'Only events about this resource')
    .option('--since <iso-date>', 'Only events at or after this ISO 8601 timestamp')
    .option('--limit <n>', 'Show at most the last n events', parseLimit)
    .option('--json', 'Output as JSON')
    .action(async (
      options: { type?: string; resource?: string; since?: string; limit?: number; json?: boolean },
      command: Command,
    ) => {
      await runCommand(cli, command, async (ctx) => {
        const { events, stats } = readLog(ctx.io.readLogRaw(DEPLOY_LOG));
        let selected = events.filter((e) =>
          (options.type === undefined || e.type === options.type) &&
          (options.resource === undefined || e.resource_id === options.resource) &&
          (options.since === undefined || e.timestamp >= options.since),
        );
        if (options.limit !== undefined) selected = selected.slice(-options.limit);

        if (stats.parseErrors > 0) cli.terminal.err(t.amber(`warning: skipped ${stats.parseErrors} malformed line(s)`));
        if (stats.partialTrailingLine) cli.terminal.err(t.amber('warning: the last line was cut off mid-write'));
        if (stats.outOfOrder) cli.terminal.err(t.amber('warning: events were written out of timestamp order'));

        if (options.json === true) {
          cli.terminal.out(JSON.stringify(selected, null, 2));
          return;
        }
        if (selected.length === 0) {
          cli.terminal.out(t.muted('(no events)'));
          return;
        }
        for (const event of selected) cli.terminal.out(formatEvent(event));
      });
    });
}
