/**
 * Wharf Pipeline — Artifact Builder
 *
 * compile → sign → hash.
 *
 * The signed module is always written next to the compiled one as
 * `<stem>_signed.wasm`, and its SHA-256 content hash is what the stack
 * interpolates as `${artifact.hash}`: the provisioner redeploys the
 * function exactly when that hash changes.
 *
 * No retries: the first failing step aborts the build.
 */

import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import {
  BuildError,
  decodeClaims,
  identityOf,
  normalizeCapabilities,
  systemClock,
} from '@wharf/kernel';
import type {
  Artifact,
  ArtifactRecord,
  BuildProfile,
  CapabilityClaim,
  Clock,
  Compiler,
  DecodedClaims,
  DeployLogger,
  Signer,
  SigningKeys,
} from '@wharf/kernel';

export interface BuildRequest {
  readonly sourceDir: string;
  readonly crate: string;
  readonly profile: BuildProfile;
  /** Name embedded in the claims. */
  readonly name: string;
  readonly capabilities: ReadonlyArray<string>;
  readonly keys: SigningKeys;
}

export interface SignModuleRequest {
  readonly modulePath: string;
  /** Defaults to `<stem>_signed.wasm` beside the module. */
  readonly outputPath?: string | undefined;
  readonly name: string;
  readonly capabilities: ReadonlyArray<string>;
  readonly keys: SigningKeys;
}

export interface InspectedArtifact extends DecodedClaims {
  readonly path: string;
  /** SHA-256 hex digest of the file as it is on disk. */
  readonly content_hash: string;
}

/** Where the last artifact record is kept. DeployStateStore implements it. */
export interface ArtifactStore {
  saveArtifact(record: ArtifactRecord): void;
}

export interface ArtifactBuilderDeps {
  readonly compiler: Compiler;
  readonly signer: Signer;
  readonly store: ArtifactStore;
  readonly logger: DeployLogger;
  readonly clock?: Clock | undefined;
}

/** `/out/hello.wasm` → `/out/hello_signed.wasm` */
export function signedPathFor(modulePath: string): string {
  const ext = extname(modulePath);
  return join(dirname(modulePath), `${basename(modulePath, ext)}_signed${ext === '' ? '.wasm' : ext}`);
}

export function contentHash(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

function capabilityClaims(names: ReadonlyArray<string>): ReadonlyArray<CapabilityClaim> {
  const result = normalizeCapabilities(names);
  if (!result.ok) {
    throw new BuildError(
      'SigningFailed',
      `Invalid capability name(s): ${result.invalid.join(', ')}`,
      'Capabilities are namespaced as <namespace>:<id>, e.g. awslambda:event.',
    );
  }
  return result.claims;
}

function readModule(path: string): Uint8Array {
  try {
    return readFileSync(path);
  } catch (err: unknown) {
    throw new BuildError('InvalidArtifact', `Cannot read ${path}`, String(err));
  }
}

export class ArtifactBuilder {
  private readonly clock: Clock;

  constructor(private readonly deps: ArtifactBuilderDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Compile, sign and hash the actor.
   *
   * @throws {BuildError} SigningFailed for an invalid capability, before the compiler runs
   * @throws {BuildError} CompilationFailed or SigningFailed from the collaborators
   */
  async build(request: BuildRequest): Promise<Artifact> {
    const capabilities = capabilityClaims(request.capabilities);
    const compiled = await this.deps.compiler.compile({
      sourceDir: request.sourceDir,
      crate: request.crate,
      profile: request.profile,
    });
    const artifact = await this.signModule({
      modulePath: compiled.modulePath,
      outputPath: signedPathFor(compiled.modulePath),
      name: request.name,
      capabilities,
      keys: request.keys,
    });
    this.deps.logger.record('artifact.built', { detail: `${artifact.name} ${artifact.content_hash}` });
    return artifact;
  }

  /** Sign an existing module without compiling. */
  async sign(request: SignModuleRequest): Promise<Artifact> {
    const capabilities = capabilityClaims(request.capabilities);
    return this.signModule({
      modulePath: request.modulePath,
      outputPath: request.outputPath ?? signedPathFor(request.modulePath),
      name: request.name,
      capabilities,
      keys: request.keys,
    });
  }

  /**
   * Decode the claims embedded in a signed module.
   *
   * @throws {BuildError} InvalidArtifact when the file is unreadable, not a
   *   module, or carries no valid claims
   */
  inspect(path: string): InspectedArtifact {
    const bytes = readModule(path);
    return { path, content_hash: contentHash(bytes), ...decodeClaims(bytes) };
  }

  private async signModule(request: {
    readonly modulePath: string;
    readonly outputPath: string;
    readonly name: string;
    readonly capabilities: ReadonlyArray<CapabilityClaim>;
    readonly keys: SigningKeys;
  }): Promise<Artifact> {
    try {
      await this.deps.signer.sign(request);
    } catch (err: unknown) {
      if (err instanceof BuildError) throw err;
      throw new BuildError(
        'SigningFailed',
        `Could not sign ${request.modulePath}`,
        err instanceof Error ? err.message : String(err),
      );
    }

    const artifact: Artifact = {
      name: request.name,
      unsigned_path: request.modulePath,
      signed_path: request.outputPath,
      content_hash: contentHash(readModule(request.outputPath)),
      capabilities: request.capabilities,
      issuer: request.keys.issuer,
      subject: request.keys.subject,
    };
    this.deps.store.saveArtifact({
      name: artifact.name,
      unsigned_path: artifact.unsigned_path,
      signed_path: artifact.signed_path,
      content_hash: artifact.content_hash,
      capabilities: artifact.capabilities,
      issuer: identityOf(artifact.issuer),
      subject: identityOf(artifact.subject),
      built_at: this.clock(),
    });
    this.deps.logger.record('artifact.signed', {
      detail: `${artifact.signed_path} ${artifact.subject.public_key}`,
    });
    return artifact;
  }
}
