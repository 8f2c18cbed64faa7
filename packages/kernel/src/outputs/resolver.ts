/**
 * Wharf Kernel — Output Resolver
 *
 * Pure read of applied state. Produces:
 *
 *   url.<route>.<stage>   invocation URL of each route reachable through a
 *                         deployment of the route's API
 *   function.<id>         stable name of each compute function
 *   <name>                each `output` block of the stack
 *
 * Declared outputs whose references cannot be resolved from state (after a
 * partial apply) are left out rather than reported with placeholder text.
 */

import { ResourceKind } from '@wharf/stack-dsl';
import type { AttributeValue, StackDefinition } from '@wharf/stack-dsl';
import { renderText, resolveValue } from '../resolve/interpolation.js';
import type { ArtifactRef } from '../types/artifact.js';
import type { AppliedResource } from '../types/state.js';

export interface OutputInputs {
  readonly definition?: StackDefinition | undefined;
  readonly variables?: Readonly<Record<string, AttributeValue>> | undefined;
  readonly artifact?: ArtifactRef | undefined;
}

function text(value: AttributeValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function ofKind(resources: ReadonlyArray<AppliedResource>, kind: ResourceKind): AppliedResource[] {
  return resources.filter((r) => r.kind === kind);
}

/**
 * Join a stage URL and a route path with exactly one slash between them.
 * `https://x/test` + `/helloworld` → `https://x/test/helloworld`.
 */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function resolveOutputs(
  resources: Readonly<Record<string, AppliedResource>>,
  inputs: OutputInputs = {},
): Record<string, string> {
  const applied = Object.values(resources).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const outputs: Record<string, string> = {};

  const routes = ofKind(applied, ResourceKind.GatewayRoute);
  for (const deployment of ofKind(applied, ResourceKind.GatewayDeployment)) {
    const api = text(deployment.attributes['rest_api']);
    const stage = text(deployment.attributes['stage_name']);
    const invokeUrl = text(deployment.computed['invoke_url']);
    if (api === undefined || stage === undefined || invokeUrl === undefined) continue;
    for (const route of routes) {
      const path = text(route.computed['path']);
      if (path === undefined || text(route.attributes['rest_api']) !== api) continue;
      outputs[`url.${route.id}.${stage}`] = joinUrl(invokeUrl, path);
    }
  }

  for (const fn of ofKind(applied, ResourceKind.Function)) {
    const name = text(fn.attributes['name']);
    if (name !== undefined) outputs[`function.${fn.id}`] = name;
  }

  for (const output of inputs.definition?.outputs ?? []) {
    const resolved = resolveValue(output.value, {
      variables: inputs.variables ?? {},
      artifact: inputs.artifact,
      resources,
    });
    if (resolved.known) outputs[output.name] = renderText(resolved.value);
  }

  const sorted: Record<string, string> = {};
  for (const key of Object.keys(outputs).sort()) {
    const value = outputs[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}
