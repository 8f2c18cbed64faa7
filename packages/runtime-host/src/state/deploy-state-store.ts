/**
 * Wharf Runtime Host — Deploy State Store
 *
 * Persists the last-known applied state (`state/deploy-state.json`) and the
 * last build's artifact record (`state/artifact.json`).
 *
 * Every save is a compare-and-swap on `serial`: the state on disk must still
 * carry the serial the caller loaded, otherwise another invocation changed it
 * in between and the save is refused with ConcurrentModificationError.
 */

import { randomUUID } from 'node:crypto';
import { ApplyError, ConfigError, emptyState, systemClock } from '@wharf/kernel';
import type { ArtifactRecord, Clock, DeployedState } from '@wharf/kernel';
import type { z } from 'zod';
import { ArtifactRecordSchema, DeployedStateSchema, formatIssues } from './schemas.js';
import type { StateIO } from './state-io.js';

export const STATE_FILE = 'deploy-state.json';
export const ARTIFACT_FILE = 'artifact.json';

export interface DeployStateStoreOptions {
  readonly clock?: Clock | undefined;
  /** Lineage for a state created from scratch. Called at most once per store. */
  readonly newLineage?: (() => string) | undefined;
}

export class DeployStateStore {
  private readonly clock: Clock;
  private readonly newLineage: () => string;
  private pendingLineage: string | undefined;

  constructor(
    private readonly io: StateIO,
    options: DeployStateStoreOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.newLineage = options.newLineage ?? (() => randomUUID());
  }

  private read<T>(filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    let raw: unknown;
    try {
      raw = this.io.readJson(filename);
    } catch (err: unknown) {
      if (err instanceof SyntaxError) {
        throw new ConfigError('InvalidState', `${filename} is not valid JSON`, err.message);
      }
      throw err;
    }
    if (raw === undefined) return undefined;
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError('InvalidState', `${filename} does not match the expected schema`, formatIssues(parsed.error));
    }
    return parsed.data;
  }

  /**
   * Load the applied state; an empty state when none was saved yet. Until the
   * first save, every load of the same store carries the same lineage, so a
   * plan made against the empty state can still be applied.
   */
  load(): DeployedState {
    return this.read(STATE_FILE, DeployedStateSchema) ?? emptyState(this.lineageForEmptyState());
  }

  private lineageForEmptyState(): string {
    if (this.pendingLineage === undefined) this.pendingLineage = this.newLineage();
    return this.pendingLineage;
  }

  /** True once a state has been saved. */
  exists(): boolean {
    return this.io.readText(STATE_FILE) !== undefined;
  }

  /**
   * Save `state`, which must still carry the serial it was loaded with.
   * Returns the state as written (serial + 1, fresh `updated_at`).
   *
   * @throws {ApplyError} ConcurrentModificationError when the state on disk has moved on
   */
  save(state: DeployedState): DeployedState {
    const onDisk = this.read(STATE_FILE, DeployedStateSchema);
    const diskSerial = onDisk?.serial ?? 0;
    if (diskSerial !== state.serial || (onDisk !== undefined && onDisk.lineage !== state.lineage)) {
      throw new ApplyError(
        'ConcurrentModificationError',
        'Deployed state was changed by another invocation',
        `expected serial ${state.serial} of lineage ${state.lineage}, ` +
          `found serial ${diskSerial} of lineage ${onDisk?.lineage ?? '(none)'}`,
      );
    }
    const next: DeployedState = { ...state, serial: state.serial + 1, updated_at: this.clock() };
    this.io.writeJson(STATE_FILE, next);
    return next;
  }

  loadArtifact(): ArtifactRecord | undefined {
    return this.read(ARTIFACT_FILE, ArtifactRecordSchema);
  }

  saveArtifact(record: ArtifactRecord): void {
    this.io.writeJson(ARTIFACT_FILE, record);
  }
}
