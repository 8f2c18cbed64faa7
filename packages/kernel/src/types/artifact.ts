/**
 * Wharf Kernel — Artifact Types
 */

import type { CapabilityClaim } from './capability.js';
import type { KeyIdentity, KeyPair } from './key.js';

/**
 * A signed module produced by the Artifact Builder.
 *
 * Immutable once signed. `content_hash` is the SHA-256 hex digest of the
 * signed file; re-signing produces a new artifact and a new hash.
 */
export interface Artifact {
  readonly name: string;
  readonly unsigned_path: string;
  readonly signed_path: string;
  readonly content_hash: string;
  readonly capabilities: ReadonlyArray<CapabilityClaim>;
  readonly issuer: KeyPair;
  readonly subject: KeyPair;
}

/**
 * The persisted form of an Artifact (`state/artifact.json`).
 * Keys are reduced to their public identity.
 */
export interface ArtifactRecord {
  readonly name: string;
  readonly unsigned_path: string;
  readonly signed_path: string;
  readonly content_hash: string;
  readonly capabilities: ReadonlyArray<CapabilityClaim>;
  readonly issuer: KeyIdentity;
  readonly subject: KeyIdentity;
  /** ISO 8601 timestamp of the build. */
  readonly built_at: string;
}

/** The artifact fields a stack may interpolate. */
export interface ArtifactRef {
  readonly hash: string;
  readonly path: string;
  readonly name: string;
}

export function artifactRef(record: Pick<ArtifactRecord, 'content_hash' | 'signed_path' | 'name'>): ArtifactRef {
  return { hash: record.content_hash, path: record.signed_path, name: record.name };
}
