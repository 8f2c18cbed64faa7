/**
 * Wharf Kernel — Change Set Types
 */

import type { AttributeValue, ResourceKind, StackDefinition } from '@wharf/stack-dsl';
import type { ArtifactRef } from './artifact.js';

export type ChangeAction = 'create' | 'update' | 'replace' | 'delete';

/** Shown in plans for values that depend on a resource not yet applied. */
export const UNKNOWN_VALUE = '(known after apply)';

/**
 * One step of a change set.
 *
 * `after` holds the planned attribute values; a value that cannot be known
 * until a dependency is applied is rendered as UNKNOWN_VALUE. Apply resolves
 * `after` again against the state as it grows, so plans never carry stale
 * provider values forward.
 */
export interface ResourceOperation {
  readonly action: ChangeAction;
  readonly id: string;
  readonly kind: ResourceKind;
  readonly before?: Readonly<Record<string, AttributeValue>> | undefined;
  readonly after?: Readonly<Record<string, AttributeValue>> | undefined;
  /** Attribute names whose value differs (all names for create and delete). */
  readonly changed: ReadonlyArray<string>;
  readonly depends_on: ReadonlyArray<string>;
}

/**
 * The ordered operations that reconcile the declared stack with the state.
 *
 * `lineage` and `base_serial` pin the change set to the state it was planned
 * against; apply refuses it once that state has moved on.
 */
export interface ChangeSet {
  readonly lineage: string;
  readonly base_serial: number;
  /** Hash of the compiled stack; empty for a destroy plan. */
  readonly definition_hash: string;
  readonly operations: ReadonlyArray<ResourceOperation>;
  /** Ids of declared resources that need no change, sorted. */
  readonly unchanged: ReadonlyArray<string>;
  /** Inputs apply needs to resolve attributes; absent for destroy. */
  readonly inputs?: PlanInputs | undefined;
}

export interface PlanInputs {
  readonly definition: StackDefinition;
  readonly variables: Readonly<Record<string, AttributeValue>>;
  readonly artifact?: ArtifactRef | undefined;
}

export function hasChanges(changes: ChangeSet): boolean {
  return changes.operations.length > 0;
}
