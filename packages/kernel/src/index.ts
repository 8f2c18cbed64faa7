/**
 * @wharf/kernel
 *
 * Wharf kernel — domain types, error taxonomy, resource graph, planner,
 * output resolver, artifact codecs and collaborator interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API. node:crypto is used
 * for hashing (pure computation, not I/O); Ed25519 comes from @noble/curves.
 *
 * Concrete collaborators and state persistence live in @wharf/runtime-host.
 */

// Types
export type { KeyIdentity, KeyPair, KeyRole, SigningKeys } from './types/key.js';
export { identityOf, KEY_ROLES } from './types/key.js';

export type { CapabilityClaim, CapabilitySetResult } from './types/capability.js';
export { CAPABILITY_NAME_PATTERN, normalizeCapabilities } from './types/capability.js';

export type { Artifact, ArtifactRecord, ArtifactRef } from './types/artifact.js';
export { artifactRef } from './types/artifact.js';

export type { AppliedResource, DeployedState } from './types/state.js';
export { emptyState, STATE_VERSION } from './types/state.js';

export type { ChangeAction, ChangeSet, PlanInputs, ResourceOperation } from './types/change.js';
export { hasChanges, UNKNOWN_VALUE } from './types/change.js';

export type { DeployEvent, DeployEventType } from './types/event.js';

// Errors
export type {
  ApplyErrorKind,
  BuildErrorKind,
  ConfigErrorKind,
  ErrorCategory,
  KeyErrorKind,
} from './errors/index.js';
export {
  APPLY_EXIT_CODES,
  ApplyError,
  BUILD_EXIT_CODES,
  BuildError,
  CONFIG_EXIT_CODES,
  ConfigError,
  EXIT_OK,
  EXIT_UNEXPECTED,
  isWharfError,
  KEY_EXIT_CODES,
  KeyError,
  WharfError,
} from './errors/index.js';

// Graph, planning and outputs
export type { GraphNode } from './graph/resource-graph.js';
export { ResourceGraph } from './graph/resource-graph.js';

export type { Resolved, ResolutionContext } from './resolve/interpolation.js';
export {
  renderText,
  resolveAttributes,
  resolveReference,
  resolveValue,
  resolveVariables,
} from './resolve/interpolation.js';

export type { PlanOptions } from './plan/planner.js';
export { planChanges, planDestroy } from './plan/planner.js';

export type { OutputInputs } from './outputs/resolver.js';
export { joinUrl, resolveOutputs } from './outputs/resolver.js';

// Codecs
export {
  base32Decode,
  base32Encode,
  crc16,
  decodePublicKey,
  decodeSeed,
  encodePublicKey,
  encodeSeed,
  PREFIX_BYTES,
} from './codec/nkeys.js';
export {
  generateSeed,
  PUBLIC_KEY_LENGTH,
  publicKeyFromSeed,
  SEED_LENGTH,
  SIGNATURE_LENGTH,
  signDetached,
  verifyDetached,
} from './codec/ed25519.js';
export type { WasmSection } from './codec/wasm.js';
export {
  appendCustomSection,
  customSection,
  decodeLeb128,
  encodeLeb128,
  isWasmModule,
  readSections,
  withoutCustomSection,
} from './codec/wasm.js';
export type { ClaimsOptions, DecodedClaims, ModuleClaims } from './codec/claims.js';
export {
  CLAIMS_SECTION,
  decodeClaims,
  embedClaims,
  encodeClaims,
  moduleHash,
  ModuleClaimsSchema,
} from './codec/claims.js';

// Collaborator interfaces (no implementations; those live in runtime-host)
export type {
  BuildProfile,
  CompileOutput,
  CompileRequest,
  Compiler,
  ComputedAttributes,
  ExecAdapter,
  ExecOptions,
  ExecResult,
  KeyGenerator,
  ResourceProvider,
  SignRequest,
  Signer,
} from './adapters/index.js';

// Logging
export type { LogSink } from './logging/log-sink.js';
export type { Clock } from './logging/deploy-log.js';
export { DeployLogger, systemClock } from './logging/deploy-log.js';
