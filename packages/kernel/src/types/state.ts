/**
 * Wharf Kernel — Deployed State Types
 *
 * DeployedState is the last-known applied state: the only shared mutable
 * record in the system. It is loaded at start, saved after every applied
 * operation, and guarded by the deploy lock.
 */

import type { AttributeValue, ResourceKind } from '@wharf/stack-dsl';

/** A provisioned entity as recorded after a successful provider call. */
export interface AppliedResource {
  readonly id: string;
  readonly kind: ResourceKind;
  /** Resolved declared attributes, as sent to the provider. */
  readonly attributes: Readonly<Record<string, AttributeValue>>;
  /** Provider-assigned attributes (ARNs, ids, URLs). */
  readonly computed: Readonly<Record<string, AttributeValue>>;
  /** Ids of the resources this one depended on when it was applied. */
  readonly depends_on: ReadonlyArray<string>;
  readonly created_at: string;
  readonly updated_at: string;
}

export const STATE_VERSION = 1;

export interface DeployedState {
  readonly version: typeof STATE_VERSION;
  /** Random id fixed when the state is first created. */
  readonly lineage: string;
  /** Increases by one on every save. 0 means never saved. */
  readonly serial: number;
  /** Applied resources, keyed by id. */
  readonly resources: Readonly<Record<string, AppliedResource>>;
  /** Resolved outputs (invocation URLs, function names, declared outputs). */
  readonly outputs: Readonly<Record<string, string>>;
  readonly updated_at: string;
}

export function emptyState(lineage: string): DeployedState {
  return {
    version: STATE_VERSION,
    lineage,
    serial: 0,
    resources: {},
    outputs: {},
    updated_at: new Date(0).toISOString(),
  };
}
