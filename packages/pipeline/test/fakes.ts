/**
 * In-process collaborators for pipeline tests.
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { appendCustomSection, BuildError, DeployLogger } from '@wharf/kernel';
import type {
  AppliedResource,
  ComputedAttributes,
  CompileOutput,
  CompileRequest,
  Compiler,
  ResourceProvider,
} from '@wharf/kernel';
import { DeployStateStore, FileLogSink, MemoryStateIO } from '@wharf/runtime-host';
import { RESOURCE_KIND_SCHEMAS } from '@wharf/stack-dsl';
import type { AttributeValue, ResourceKind } from '@wharf/stack-dsl';

export const FIXED_TIME = '2026-01-01T00:00:00.000Z';

export const WASM_HEADER = Uint8Array.of(0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00);

export function tempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `wharf-${label}-`));
}

/** Sequential event ids, so log lines are predictable. */
export function sequentialIds(): () => string {
  let n = 0;
  return () => `E${++n}`;
}

export function memoryContext(): { io: MemoryStateIO; store: DeployStateStore; logger: DeployLogger } {
  const io = new MemoryStateIO();
  const store = new DeployStateStore(io, { clock: () => FIXED_TIME, newLineage: () => 'lineage-1' });
  const logger = new DeployLogger(new FileLogSink(io, sequentialIds()), () => FIXED_TIME);
  return { io, store, logger };
}

/** Event types written to deploy.jsonl, in order. */
export function loggedTypes(io: MemoryStateIO): string[] {
  return io.readLines('deploy.jsonl').map((line) => {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === 'object' && parsed !== null && 'type' in parsed ? String(parsed.type) : '';
  });
}

/**
 * Writes a fixed module into its own directory instead of running cargo.
 * `body` lets a test change what the "source" compiles to.
 */
export class FakeCompiler implements Compiler {
  readonly calls: CompileRequest[] = [];
  body: Uint8Array = Uint8Array.of(1, 2, 3);
  failure: BuildError | undefined;

  constructor(private readonly outDir: string) {}

  compile(request: CompileRequest): Promise<CompileOutput> {
    this.calls.push(request);
    if (this.failure !== undefined) return Promise.reject(this.failure);
    const modulePath = join(this.outDir, `${request.crate}.wasm`);
    writeFileSync(modulePath, appendCustomSection(WASM_HEADER, 'name', this.body));
    return Promise.resolve({ modulePath, diagnostics: '' });
  }
}

/**
 * Records every call. Computed attributes are `<attr>:<id>`; volatile ones
 * get the update count appended, so updates are visible downstream.
 */
export class FakeProvider implements ResourceProvider {
  readonly name = 'fake';
  readonly calls: string[] = [];
  /** Resource ids whose operations are refused. */
  readonly refuse = new Set<string>();
  private readonly updates = new Map<string, number>();

  private computed(id: string, kind: ResourceKind): Record<string, AttributeValue> {
    const schema = RESOURCE_KIND_SCHEMAS[kind];
    const count = this.updates.get(id) ?? 0;
    return Object.fromEntries(
      schema.computed.map((attr) => [attr, schema.volatile.includes(attr) ? `${attr}:${id}:${count}` : `${attr}:${id}`]),
    );
  }

  private check(action: string, id: string): void {
    this.calls.push(`${action} ${id}`);
    if (this.refuse.has(id)) throw new Error(`AccessDenied: ${action} ${id}`);
  }

  create(id: string, kind: ResourceKind, _attributes: Readonly<Record<string, AttributeValue>>): Promise<ComputedAttributes> {
    try {
      this.check('create', id);
    } catch (err: unknown) {
      return Promise.reject(err);
    }
    this.updates.set(id, 0);
    return Promise.resolve(this.computed(id, kind));
  }

  update(current: AppliedResource, _attributes: Readonly<Record<string, AttributeValue>>): Promise<ComputedAttributes> {
    try {
      this.check('update', current.id);
    } catch (err: unknown) {
      return Promise.reject(err);
    }
    this.updates.set(current.id, (this.updates.get(current.id) ?? 0) + 1);
    return Promise.resolve(this.computed(current.id, current.kind));
  }

  delete(current: AppliedResource): Promise<void> {
    try {
      this.check('delete', current.id);
    } catch (err: unknown) {
      return Promise.reject(err);
    }
    this.updates.delete(current.id);
    return Promise.resolve();
  }
}

export const ARTIFACT = {
  hash: 'abc123',
  path: '/build/hello_signed.wasm',
  name: 'hello',
};

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
  'output "function_arn" { value = "${fn.arn}" }',
].join('\n');
