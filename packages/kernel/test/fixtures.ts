/**
 * Shared kernel test fixtures: a small stack and helpers for building
 * applied state by hand.
 */

import { compileStack, ResourceKind } from '@wharf/stack-dsl';
import type { AttributeValue, StackDefinition } from '@wharf/stack-dsl';
import { emptyState } from '../src/index.js';
import type { AppliedResource, ArtifactRef, DeployedState } from '../src/index.js';

export const FIXED_TIME = '2026-01-01T00:00:00.000Z';

export const ARTIFACT: ArtifactRef = {
  hash: 'abc123',
  path: '/build/hello_signed.wasm',
  name: 'hello',
};

export const ROLE_ARN = 'arn:aws:iam::000000000000:role/hello-role';

export const SMALL_STACK = [
  'resource "iam.role" "role" {',
  '  name                = "hello-role"',
  '  assume_role_service = "lambda.amazonaws.com"',
  '}',
  'resource "compute.function" "fn" {',
  '  name        = "hello"',
  '  runtime     = "provided.al2"',
  '  handler     = "bootstrap"',
  '  role        = "${role.arn}"',
  '  package     = "${artifact.path}"',
  '  source_hash = "${artifact.hash}"',
  '}',
].join('\n');

export function compiled(source: string): StackDefinition {
  const result = compileStack(source);
  if (!result.ok) {
    throw new Error(result.errors.map((e) => e.message).join('; '));
  }
  return result.definition;
}

export function applied(
  id: string,
  kind: ResourceKind,
  attributes: Record<string, AttributeValue>,
  computed: Record<string, AttributeValue> = {},
  depends_on: string[] = [],
): AppliedResource {
  return { id, kind, attributes, computed, depends_on, created_at: FIXED_TIME, updated_at: FIXED_TIME };
}

export function stateWith(...resources: AppliedResource[]): DeployedState {
  const base = emptyState('lineage-1');
  return {
    ...base,
    serial: 3,
    resources: Object.fromEntries(resources.map((r) => [r.id, r])),
  };
}

/** State matching SMALL_STACK applied with ARTIFACT. */
export function smallStackState(): DeployedState {
  return stateWith(
    applied(
      'role',
      ResourceKind.IamRole,
      { assume_role_service: 'lambda.amazonaws.com', name: 'hello-role' },
      { arn: ROLE_ARN, id: 'hello-role' },
    ),
    applied(
      'fn',
      ResourceKind.Function,
      {
        handler: 'bootstrap',
        name: 'hello',
        package: '/build/hello_signed.wasm',
        role: ROLE_ARN,
        runtime: 'provided.al2',
        source_hash: 'abc123',
      },
      { arn: 'arn:aws:lambda:us-east-1:000000000000:function:hello', version: '1' },
      ['role'],
    ),
  );
}
