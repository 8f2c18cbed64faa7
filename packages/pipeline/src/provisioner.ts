/**
 * Wharf Pipeline — Infrastructure Provisioner
 *
 * plan:  declared stack + variables + artifact + last-known state → ChangeSet
 * apply: ChangeSet → provider calls → DeployedState
 *
 * Apply runs the operations in plan order, one at a time. Before each
 * operation:
 *   - every dependency must already be in state (DependencyMissing otherwise)
 *   - attributes are resolved again, strictly, against the state as it is now,
 *     so provider-assigned values from earlier operations flow forward
 *
 * State is saved after every provider call. A provider failure stops the
 * apply, leaves the state saved so far in place and is reported as
 * ExternalProviderRejected. There is no rollback.
 */

import {
  ApplyError,
  ConfigError,
  planChanges,
  planDestroy,
  resolveAttributes,
  resolveOutputs,
  resolveVariables,
  systemClock,
} from '@wharf/kernel';
import type {
  AppliedResource,
  ArtifactRef,
  ChangeSet,
  Clock,
  ComputedAttributes,
  DeployedState,
  DeployLogger,
  PlanInputs,
  ResourceOperation,
  ResourceProvider,
} from '@wharf/kernel';
import { canonicalize, hash } from '@wharf/stack-dsl';
import type { AttributeValue, StackDefinition } from '@wharf/stack-dsl';

/** Load/save of the deployed state. DeployStateStore implements it. */
export interface StateStore {
  load(): DeployedState;
  save(state: DeployedState): DeployedState;
}

export interface ProvisionerDeps {
  readonly provider: ResourceProvider;
  readonly store: StateStore;
  readonly logger: DeployLogger;
  readonly clock?: Clock | undefined;
}

export interface ApplyResult {
  readonly state: DeployedState;
  /** Operations that ran to completion. */
  readonly applied: number;
}

type Attributes = Readonly<Record<string, AttributeValue>>;

function withResource(state: DeployedState, resource: AppliedResource): DeployedState {
  return { ...state, resources: { ...state.resources, [resource.id]: resource } };
}

function withoutResource(state: DeployedState, id: string): DeployedState {
  const resources = { ...state.resources };
  delete resources[id];
  return { ...state, resources };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Provisioner {
  private readonly clock: Clock;

  constructor(private readonly deps: ProvisionerDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Plan the changes that bring the deployed state to `definition`.
   *
   * @param variables - Provided variable values; the stack's defaults fill the rest
   * @throws {ApplyError} DependencyCycle
   * @throws {ConfigError} InvalidConfig for unknown or missing variables
   */
  plan(
    definition: StackDefinition,
    variables: Attributes,
    artifact?: ArtifactRef | undefined,
  ): ChangeSet {
    const resolved = resolveVariables(definition, variables);
    const changes = planChanges(definition, this.deps.store.load(), {
      variables: resolved,
      artifact,
      definitionHash: hash(definition),
    });
    this.deps.logger.record('plan.created', {
      serial: changes.base_serial,
      detail: `${changes.operations.length} operation(s), ${changes.unchanged.length} unchanged`,
    });
    return changes;
  }

  /** Plan the deletion of everything in state. */
  planDestroy(): ChangeSet {
    const changes = planDestroy(this.deps.store.load());
    this.deps.logger.record('plan.created', {
      serial: changes.base_serial,
      detail: `destroy: ${changes.operations.length} operation(s)`,
    });
    return changes;
  }

  /**
   * Execute a ChangeSet.
   *
   * @throws {ApplyError} ConcurrentModificationError when the state moved on since planning
   * @throws {ApplyError} DependencyMissing when an operation's dependency is not in state
   * @throws {ApplyError} ExternalProviderRejected when the provider refuses an operation
   */
  async apply(changes: ChangeSet): Promise<ApplyResult> {
    let state = this.deps.store.load();
    if (state.lineage !== changes.lineage || state.serial !== changes.base_serial) {
      throw new ApplyError(
        'ConcurrentModificationError',
        'The deployed state changed after this plan was made',
        `planned against serial ${changes.base_serial}, state is at serial ${state.serial}. Plan again.`,
      );
    }

    let applied = 0;
    for (const operation of changes.operations) {
      try {
        state = await this.execute(operation, state, changes.inputs);
      } catch (err: unknown) {
        this.deps.logger.record('apply.failed', {
          resource_id: operation.id,
          resource_kind: operation.kind,
          serial: state.serial,
          detail: err instanceof ApplyError && err.detail !== '' ? `${err.message}: ${err.detail}` : describeError(err),
        });
        throw err;
      }
      applied++;
    }

    const outputs = resolveOutputs(state.resources, changes.inputs ?? {});
    if (applied > 0 || canonicalize(outputs) !== canonicalize(state.outputs)) {
      state = this.deps.store.save({ ...state, outputs });
    }
    this.deps.logger.record('apply.completed', { serial: state.serial, detail: `${applied} operation(s)` });
    return { state, applied };
  }

  private async execute(
    operation: ResourceOperation,
    state: DeployedState,
    inputs: PlanInputs | undefined,
  ): Promise<DeployedState> {
    const current = state.resources[operation.id];

    if (operation.action === 'delete') {
      if (current === undefined) return state;
      await this.call(operation, () => this.deps.provider.delete(current));
      const next = this.deps.store.save(withoutResource(state, operation.id));
      this.deps.logger.record('resource.deleted', {
        resource_id: operation.id,
        resource_kind: operation.kind,
        serial: next.serial,
      });
      return next;
    }

    for (const dependency of operation.depends_on) {
      if (state.resources[dependency] === undefined) {
        throw new ApplyError(
          'DependencyMissing',
          `Cannot ${operation.action} '${operation.id}': its dependency '${dependency}' has not been applied`,
          '',
          operation.id,
        );
      }
    }
    const attributes = this.resolve(operation, state, inputs);
    const now = this.clock();

    if (operation.action === 'update' && current !== undefined) {
      const computed = await this.call(operation, () => this.deps.provider.update(current, attributes));
      const next = this.deps.store.save(
        withResource(state, { ...current, attributes, computed, depends_on: operation.depends_on, updated_at: now }),
      );
      this.deps.logger.record('resource.updated', {
        resource_id: operation.id,
        resource_kind: operation.kind,
        serial: next.serial,
        detail: operation.changed.join(', '),
      });
      return next;
    }

    let base = state;
    if (current !== undefined) {
      // replace: the old resource goes first, and the state records that it is gone
      await this.call(operation, () => this.deps.provider.delete(current));
      base = this.deps.store.save(withoutResource(state, operation.id));
    }
    const computed = await this.call(operation, () =>
      this.deps.provider.create(operation.id, operation.kind, attributes),
    );
    const next = this.deps.store.save(
      withResource(base, {
        id: operation.id,
        kind: operation.kind,
        attributes,
        computed,
        depends_on: operation.depends_on,
        created_at: now,
        updated_at: now,
      }),
    );
    this.deps.logger.record(current === undefined ? 'resource.created' : 'resource.replaced', {
      resource_id: operation.id,
      resource_kind: operation.kind,
      serial: next.serial,
    });
    return next;
  }

  private resolve(operation: ResourceOperation, state: DeployedState, inputs: PlanInputs | undefined): Attributes {
    const declared = inputs?.definition.resources.find((r) => r.id === operation.id);
    if (inputs === undefined || declared === undefined) {
      throw new ConfigError(
        'InvalidState',
        `The change set has no declaration for '${operation.id}' to ${operation.action}`,
      );
    }
    const { values } = resolveAttributes(declared.attributes, {
      variables: inputs.variables,
      artifact: inputs.artifact,
      resources: state.resources,
      strict: true,
    });
    return values;
  }

  private async call<T extends ComputedAttributes | void>(
    operation: ResourceOperation,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw new ApplyError(
        'ExternalProviderRejected',
        `${this.deps.provider.name} rejected ${operation.action} of ${operation.kind} '${operation.id}'`,
        describeError(err),
        operation.id,
      );
    }
  }
}
