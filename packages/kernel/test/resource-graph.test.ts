/**
 * Wharf Kernel — Resource Graph Tests
 *
 * graph/order: dependencies come before dependents, ties broken by id
 * graph/reverse: delete order is the exact reverse
 * graph/cycle: cycles are rejected and named
 * graph/state: graphs rebuilt from state drop edges to missing resources
 *
 * All tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import { ResourceKind } from '@wharf/stack-dsl';
import type { ResourceDefinition, StackDefinition } from '@wharf/stack-dsl';
import { ApplyError, ResourceGraph } from '../src/index.js';
import { applied, compiled, SMALL_STACK, stateWith } from './fixtures.js';

function apiResource(id: string, depends_on: string[]): ResourceDefinition {
  return {
    id,
    kind: ResourceKind.GatewayApi,
    attributes: { name: { kind: 'template', parts: [{ kind: 'literal', value: id }] } },
    depends_on,
  };
}

function handBuilt(edges: Record<string, string[]>): StackDefinition {
  return {
    variables: {},
    outputs: [],
    resources: Object.entries(edges).map(([id, deps]) => apiResource(id, deps)),
  };
}

describe('graph/order: topological order', () => {
  it('places a dependency before its dependent', () => {
    const graph = ResourceGraph.fromDefinition(compiled(SMALL_STACK));
    expect(graph.topologicalOrder()).toEqual(['role', 'fn']);
  });

  it('breaks ties by smallest id', () => {
    const graph = ResourceGraph.fromDefinition(
      handBuilt({ perm: ['fn', 'route'], fn: ['role'], route: ['api'], role: [], api: [] }),
    );
    expect(graph.topologicalOrder()).toEqual(['api', 'role', 'fn', 'route', 'perm']);
  });

  it('indexes dependents', () => {
    const graph = ResourceGraph.fromDefinition(handBuilt({ perm: ['fn', 'route'], fn: [], route: [] }));
    expect(graph.dependentsOf('fn')).toEqual(['perm']);
    expect(graph.dependenciesOf('perm')).toEqual(['fn', 'route']);
  });
});

describe('graph/reverse: delete order', () => {
  it('is the reverse of the apply order', () => {
    const graph = ResourceGraph.fromDefinition(
      handBuilt({ perm: ['fn', 'route'], fn: ['role'], route: ['api'], role: [], api: [] }),
    );
    expect(graph.reverseTopologicalOrder()).toEqual(['perm', 'route', 'fn', 'role', 'api']);
  });
});

describe('graph/cycle: cycles are rejected', () => {
  it('finds the cycle path', () => {
    const graph = ResourceGraph.fromDefinition(handBuilt({ a: ['b'], b: ['c'], c: ['a'], d: [] }));
    expect(graph.findCycle()).toEqual(['a', 'b', 'c', 'a']);
  });

  it('throws DependencyCycle from topologicalOrder', () => {
    const graph = ResourceGraph.fromDefinition(handBuilt({ a: ['b'], b: ['a'] }));
    let caught: unknown;
    try {
      graph.topologicalOrder();
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ApplyError);
    if (!(caught instanceof ApplyError)) return;
    expect(caught.kind).toBe('DependencyCycle');
    expect(caught.message).toBe('Dependency cycle: a -> b -> a');
    expect(caught.exitCode).toBe(21);
  });

  it('returns undefined for an acyclic graph', () => {
    expect(ResourceGraph.fromDefinition(handBuilt({ a: ['b'], b: [] })).findCycle()).toBeUndefined();
  });

  it('rejects edges to undeclared resources', () => {
    expect(() => ResourceGraph.fromDefinition(handBuilt({ a: ['ghost'] }))).toThrow(
      "Resource 'a' depends on undeclared resource 'ghost'",
    );
  });
});

describe('graph/state: graphs from applied state', () => {
  it('drops edges to resources no longer in state', () => {
    const state = stateWith(
      applied('fn', ResourceKind.Function, {}, {}, ['role', 'gone']),
      applied('role', ResourceKind.IamRole, {}),
    );
    const graph = ResourceGraph.fromState(state);
    expect(graph.dependenciesOf('fn')).toEqual(['role']);
    expect(graph.reverseTopologicalOrder()).toEqual(['fn', 'role']);
  });
});
