/**
 * Wharf Kernel — Resource Graph
 *
 * An explicit in-memory DAG of resources keyed by id. Edges point from a
 * resource to the resources it depends on.
 *
 * Ordering is deterministic: among resources whose dependencies are all
 * satisfied, the lexicographically smallest id comes first. Identical graphs
 * always produce identical apply orders.
 */

import type { ResourceKind, StackDefinition } from '@wharf/stack-dsl';
import { ApplyError } from '../errors/index.js';
import type { DeployedState } from '../types/state.js';

export interface GraphNode {
  readonly id: string;
  readonly kind: ResourceKind;
  readonly depends_on: ReadonlyArray<string>;
}

function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class ResourceGraph {
  private readonly dependents = new Map<string, string[]>();

  private constructor(private readonly nodes: ReadonlyMap<string, GraphNode>) {
    for (const id of nodes.keys()) this.dependents.set(id, []);
    for (const node of nodes.values()) {
      for (const dep of node.depends_on) this.dependents.get(dep)?.push(node.id);
    }
    for (const list of this.dependents.values()) list.sort(byId);
  }

  /**
   * Build the desired graph of a compiled stack.
   *
   * @throws {ApplyError} DependencyMissing when an edge names an undeclared id
   */
  static fromDefinition(definition: StackDefinition): ResourceGraph {
    const nodes = new Map<string, GraphNode>();
    for (const r of definition.resources) {
      nodes.set(r.id, { id: r.id, kind: r.kind, depends_on: [...r.depends_on].sort(byId) });
    }
    for (const node of nodes.values()) {
      const missing = node.depends_on.find((dep) => !nodes.has(dep));
      if (missing !== undefined) {
        throw new ApplyError(
          'DependencyMissing',
          `Resource '${node.id}' depends on undeclared resource '${missing}'`,
          '',
          node.id,
        );
      }
    }
    return new ResourceGraph(nodes);
  }

  /**
   * Build the graph recorded in applied state. Edges to resources that are
   * no longer in state are dropped.
   */
  static fromState(state: DeployedState): ResourceGraph {
    const nodes = new Map<string, GraphNode>();
    for (const r of Object.values(state.resources)) {
      nodes.set(r.id, {
        id: r.id,
        kind: r.kind,
        depends_on: r.depends_on.filter((dep) => dep in state.resources).sort(byId),
      });
    }
    return new ResourceGraph(nodes);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  /** All ids, sorted. */
  ids(): string[] {
    return [...this.nodes.keys()].sort(byId);
  }

  dependenciesOf(id: string): ReadonlyArray<string> {
    return this.nodes.get(id)?.depends_on ?? [];
  }

  dependentsOf(id: string): ReadonlyArray<string> {
    return this.dependents.get(id) ?? [];
  }

  /**
   * Returns one dependency cycle as a closed path (`[a, b, a]`), or
   * undefined when the graph is acyclic.
   */
  findCycle(): string[] | undefined {
    const marks = new Map<string, 'visiting' | 'done'>();
    const path: string[] = [];

    const visit = (id: string): string[] | undefined => {
      marks.set(id, 'visiting');
      path.push(id);
      for (const dep of this.dependenciesOf(id)) {
        const mark = marks.get(dep);
        if (mark === 'visiting') {
          return [...path.slice(path.indexOf(dep)), dep];
        }
        if (mark === undefined) {
          const cycle = visit(dep);
          if (cycle !== undefined) return cycle;
        }
      }
      path.pop();
      marks.set(id, 'done');
      return undefined;
    };

    for (const id of this.ids()) {
      if (marks.has(id)) continue;
      const cycle = visit(id);
      if (cycle !== undefined) return cycle;
    }
    return undefined;
  }

  /**
   * Dependencies before dependents (Kahn's algorithm, smallest id first).
   *
   * @throws {ApplyError} DependencyCycle naming one cycle
   */
  topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    for (const node of this.nodes.values()) remaining.set(node.id, node.depends_on.length);

    const ready = this.ids().filter((id) => remaining.get(id) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
      const id = ready.shift();
      if (id === undefined) break;
      order.push(id);
      for (const dependent of this.dependentsOf(id)) {
        const left = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, left);
        if (left === 0) {
          ready.push(dependent);
          ready.sort(byId);
        }
      }
    }

    if (order.length !== this.nodes.size) {
      const cycle = this.findCycle() ?? [];
      throw new ApplyError('DependencyCycle', `Dependency cycle: ${cycle.join(' -> ')}`);
    }
    return order;
  }

  /** Dependents before dependencies: the order resources are deleted in. */
  reverseTopologicalOrder(): string[] {
    return this.topologicalOrder().reverse();
  }
}
