/**
 * Wharf Kernel — Planner
 *
 * Diffs the declared stack against the last-known applied state and produces
 * an ordered ChangeSet.
 *
 * Ordering:
 * - creates, replaces and updates follow the desired graph's topological
 *   order, so every dependency is applied before its dependents
 * - deletes of resources no longer declared follow, in reverse topological
 *   order of the edges recorded in state
 *
 * Diffing is by identity and attribute equality. A declared resource whose
 * kind changed is replaced. A value that depends on a resource about to be
 * created or replaced, or on a volatile attribute of a resource about to be
 * updated, is unknown and makes its resource an update.
 *
 * The planner is pure: no I/O, no clock.
 */

import { canonicalize, RESOURCE_KIND_SCHEMAS } from '@wharf/stack-dsl';
import type { AttributeValue, StackDefinition } from '@wharf/stack-dsl';
import { ResourceGraph } from '../graph/resource-graph.js';
import { resolveAttributes } from '../resolve/interpolation.js';
import type { ArtifactRef } from '../types/artifact.js';
import { UNKNOWN_VALUE } from '../types/change.js';
import type { ChangeSet, ResourceOperation } from '../types/change.js';
import type { AppliedResource, DeployedState } from '../types/state.js';

export interface PlanOptions {
  /** Resolved variable values (defaults already applied). */
  readonly variables: Readonly<Record<string, AttributeValue>>;
  readonly artifact?: ArtifactRef | undefined;
  readonly definitionHash: string;
}

function sameValue(a: AttributeValue | undefined, b: AttributeValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return canonicalize(a) === canonicalize(b);
}

/**
 * Plan the operations that bring `state` to `definition`.
 *
 * @throws {ApplyError} DependencyCycle when the declared graph has a cycle
 * @throws {ConfigError} InvalidConfig when a variable or the artifact is missing
 */
export function planChanges(
  definition: StackDefinition,
  state: DeployedState,
  options: PlanOptions,
): ChangeSet {
  const graph = ResourceGraph.fromDefinition(definition);
  const order = graph.topologicalOrder();
  const declared = new Map(definition.resources.map((r) => [r.id, r]));

  const recreated = new Set<string>();
  const updated = new Set<string>();
  const isPending = (id: string, attribute: string): boolean => {
    if (recreated.has(id)) return true;
    if (!updated.has(id)) return false;
    const kind = state.resources[id]?.kind;
    return kind !== undefined && RESOURCE_KIND_SCHEMAS[kind].volatile.includes(attribute);
  };

  const operations: ResourceOperation[] = [];
  const unchanged: string[] = [];

  for (const id of order) {
    const resource = declared.get(id);
    if (resource === undefined) continue;

    const { values, unknown } = resolveAttributes(resource.attributes, {
      variables: options.variables,
      artifact: options.artifact,
      resources: state.resources,
      isPending,
    });
    const after: Record<string, AttributeValue> = { ...values };
    for (const name of unknown) after[name] = UNKNOWN_VALUE;

    const current = state.resources[id];
    if (current === undefined || current.kind !== resource.kind) {
      recreated.add(id);
      const names = new Set([...Object.keys(after), ...Object.keys(current?.attributes ?? {})]);
      operations.push({
        action: current === undefined ? 'create' : 'replace',
        id,
        kind: resource.kind,
        before: current?.attributes,
        after,
        changed: [...names].sort(),
        depends_on: resource.depends_on,
      });
      continue;
    }

    const names = new Set([...Object.keys(after), ...Object.keys(current.attributes)]);
    const changed = [...names]
      .filter((name) => unknown.includes(name) || !sameValue(values[name], current.attributes[name]))
      .sort();

    if (changed.length === 0) {
      unchanged.push(id);
      continue;
    }
    updated.add(id);
    operations.push({
      action: 'update',
      id,
      kind: resource.kind,
      before: current.attributes,
      after,
      changed,
      depends_on: resource.depends_on,
    });
  }

  for (const id of ResourceGraph.fromState(state).reverseTopologicalOrder()) {
    const current = state.resources[id];
    if (declared.has(id) || current === undefined) continue;
    operations.push(deleteOperation(current));
  }

  return {
    lineage: state.lineage,
    base_serial: state.serial,
    definition_hash: options.definitionHash,
    operations,
    unchanged: unchanged.sort(),
    inputs: { definition, variables: options.variables, artifact: options.artifact },
  };
}

/** Plan the deletion of every applied resource, dependents first. */
export function planDestroy(state: DeployedState): ChangeSet {
  const operations: ResourceOperation[] = [];
  for (const id of ResourceGraph.fromState(state).reverseTopologicalOrder()) {
    const current = state.resources[id];
    if (current !== undefined) operations.push(deleteOperation(current));
  }
  return {
    lineage: state.lineage,
    base_serial: state.serial,
    definition_hash: '',
    operations,
    unchanged: [],
  };
}

function deleteOperation(current: AppliedResource): ResourceOperation {
  return {
    action: 'delete',
    id: current.id,
    kind: current.kind,
    before: current.attributes,
    changed: Object.keys(current.attributes).sort(),
    depends_on: current.depends_on,
  };
}
