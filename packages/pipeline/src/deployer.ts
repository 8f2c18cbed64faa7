/**
 * Wharf Pipeline — Deployer
 *
 * Sequences the state-changing commands: plan → confirm → apply, and
 * destroy, each under the deploy lock. Planning alone takes no lock: it
 * only reads state, and apply refuses a plan whose base serial is stale.
 */

import { ApplyError, artifactRef, hasChanges } from '@wharf/kernel';
import type { ArtifactRecord, ChangeSet, DeployedState, DeployLogger } from '@wharf/kernel';
import type { AttributeValue, StackDefinition } from '@wharf/stack-dsl';
import type { Provisioner } from './provisioner.js';

/** Advisory lock around state-changing commands. StateLock implements it. */
export interface DeployLock {
  /** @throws {ApplyError} ConcurrentModificationError when already held */
  acquire(command: string): void;
  release(): void;
}

export interface ArtifactSource {
  loadArtifact(): ArtifactRecord | undefined;
}

/** Asked before a non-empty change set is applied; false aborts. */
export type ConfirmChanges = (changes: ChangeSet) => Promise<boolean>;

export type DeployOutcome =
  | { readonly status: 'applied'; readonly changes: ChangeSet; readonly state: DeployedState; readonly applied: number }
  | { readonly status: 'no-changes'; readonly changes: ChangeSet; readonly state: DeployedState }
  | { readonly status: 'declined'; readonly changes: ChangeSet };

export interface DeployerDeps {
  readonly provisioner: Provisioner;
  readonly lock: DeployLock;
  readonly artifacts: ArtifactSource;
  readonly logger: DeployLogger;
}

export class Deployer {
  constructor(private readonly deps: DeployerDeps) {}

  plan(definition: StackDefinition, variables: Readonly<Record<string, AttributeValue>>): ChangeSet {
    const record = this.deps.artifacts.loadArtifact();
    return this.deps.provisioner.plan(definition, variables, record !== undefined ? artifactRef(record) : undefined);
  }

  async deploy(
    definition: StackDefinition,
    variables: Readonly<Record<string, AttributeValue>>,
    confirm: ConfirmChanges = () => Promise.resolve(true),
  ): Promise<DeployOutcome> {
    return this.locked('deploy', () => this.run(this.plan(definition, variables), confirm));
  }

  async destroy(confirm: ConfirmChanges = () => Promise.resolve(true)): Promise<DeployOutcome> {
    return this.locked('destroy', () => this.run(this.deps.provisioner.planDestroy(), confirm));
  }

  private async run(changes: ChangeSet, confirm: ConfirmChanges): Promise<DeployOutcome> {
    if (!hasChanges(changes)) {
      // outputs may still need refreshing
      const result = await this.deps.provisioner.apply(changes);
      return { status: 'no-changes', changes, state: result.state };
    }
    if (!(await confirm(changes))) {
      return { status: 'declined', changes };
    }
    const result = await this.deps.provisioner.apply(changes);
    return { status: 'applied', changes, state: result.state, applied: result.applied };
  }

  private async locked<T>(command: string, fn: () => Promise<T>): Promise<T> {
    try {
      this.deps.lock.acquire(command);
    } catch (err: unknown) {
      if (err instanceof ApplyError) {
        this.deps.logger.record('lock.rejected', { detail: `${command}: ${err.detail}` });
      }
      throw err;
    }
    try {
      return await fn();
    } finally {
      this.deps.lock.release();
    }
  }
}
