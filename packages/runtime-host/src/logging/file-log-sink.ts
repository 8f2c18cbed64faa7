/**
 * Wharf Runtime Host — File-backed Deploy Log Sink
 *
 * Implements the LogSink interface from @wharf/kernel by appending JSONL
 * entries to `<stateDir>/logs/deploy.jsonl`.
 *
 * The kernel owns the LogSink interface and DeployLogger class. This sink
 * is the only place that writes deploy log entries to disk. It is
 * synchronous: the entry is on disk before the pipeline moves on.
 */

import type { DeployEvent, LogSink } from '@wharf/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const DEPLOY_LOG = 'deploy.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newEventId: () => string = ulid,
  ) {}

  append(event: DeployEvent): void {
    this.stateIO.appendLine(DEPLOY_LOG, JSON.stringify({ event_id: this.newEventId(), ...event }));
  }
}
