/**
 * Wharf Kernel — Collaborator Interfaces
 *
 * Every side effect of the pipeline flows through one of these interfaces:
 * running tools, compiling, signing, generating keys and talking to the
 * cloud provider. The pipeline logic only sees the interfaces, so it can be
 * exercised without invoking real binaries or a real cloud.
 *
 * No implementations are provided here. Concrete collaborators live in
 * @wharf/runtime-host and the provider modules, and are injected.
 */

import type { AttributeValue, ResourceKind } from '@wharf/stack-dsl';
import type { CapabilityClaim } from '../types/capability.js';
import type { KeyPair, KeyRole, SigningKeys } from '../types/key.js';
import type { AppliedResource } from '../types/state.js';

// ---------------------------------------------------------------------------
// Subprocess execution
// ---------------------------------------------------------------------------

export interface ExecOptions {
  readonly cwd?: string | undefined;
  readonly env?: Readonly<Record<string, string>> | undefined;
  readonly timeoutMs?: number | undefined;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs an external tool. Resolves with the exit code and captured output,
 * whatever the exit code; rejects only when the process cannot be started.
 */
export interface ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options?: ExecOptions): Promise<ExecResult>;
}

// ---------------------------------------------------------------------------
// Build collaborators
// ---------------------------------------------------------------------------

export type BuildProfile = 'debug' | 'release';

export interface CompileRequest {
  readonly sourceDir: string;
  /** Crate (package) name; the compiled module is `<crate>.wasm`. */
  readonly crate: string;
  readonly profile: BuildProfile;
}

export interface CompileOutput {
  /** Absolute path of the unsigned module. */
  readonly modulePath: string;
  /** Tool output, kept for the log. */
  readonly diagnostics: string;
}

/** @throws {BuildError} CompilationFailed carrying the tool's diagnostic text */
export interface Compiler {
  compile(request: CompileRequest): Promise<CompileOutput>;
}

export interface SignRequest {
  readonly modulePath: string;
  readonly outputPath: string;
  readonly name: string;
  readonly capabilities: ReadonlyArray<CapabilityClaim>;
  readonly keys: SigningKeys;
}

/** @throws {BuildError} SigningFailed carrying the tool's diagnostic text */
export interface Signer {
  sign(request: SignRequest): Promise<void>;
}

/** @throws {KeyError} GenerationFailed */
export interface KeyGenerator {
  generate(role: KeyRole): Promise<KeyPair>;
}

// ---------------------------------------------------------------------------
// Resource provider
// ---------------------------------------------------------------------------

/** Provider-assigned attributes of a created or updated resource. */
export type ComputedAttributes = Readonly<Record<string, AttributeValue>>;

/**
 * The cloud API the provisioner drives. Implementations reject an operation
 * by throwing; the provisioner reports that as ExternalProviderRejected.
 */
export interface ResourceProvider {
  readonly name: string;
  create(
    id: string,
    kind: ResourceKind,
    attributes: Readonly<Record<string, AttributeValue>>,
  ): Promise<ComputedAttributes>;
  update(
    current: AppliedResource,
    attributes: Readonly<Record<string, AttributeValue>>,
  ): Promise<ComputedAttributes>;
  delete(current: AppliedResource): Promise<void>;
}
