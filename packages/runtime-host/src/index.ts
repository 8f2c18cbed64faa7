/**
 * @wharf/runtime-host
 *
 * Wharf runtime host: the concrete side of the kernel's collaborator
 * interfaces. File-backed state and lock, key files and generators,
 * subprocess tools, signers, the deploy log sink and project configuration.
 */

// State
export type { StateIO } from './state/state-io.js';
export { FileStateIO, isNodeError, MemoryStateIO } from './state/state-io.js';
export type { DeployStateStoreOptions } from './state/deploy-state-store.js';
export { ARTIFACT_FILE, DeployStateStore, STATE_FILE } from './state/deploy-state-store.js';
export type { LockInfo } from './state/lock.js';
export { LOCK_FILE, StateLock } from './state/lock.js';
export {
  AppliedResourceSchema,
  ArtifactRecordSchema,
  AttributeValueSchema,
  DeployedStateSchema,
  formatIssues,
} from './state/schemas.js';

// Keys
export { FileKeyStore } from './keys/file-key-store.js';
export { keyPairFromRawSeed, keyPairFromSeedText } from './keys/key-material.js';
export { Ed25519KeyGenerator } from './keys/ed25519-generator.js';
export { NkKeyGenerator } from './keys/nk-generator.js';

// Tools
export { NodeExecAdapter } from './adapters/exec.js';
export { CargoCompiler, compiledModulePath, WASM_TARGET } from './tools/cargo-compiler.js';
export { EmbeddedSigner } from './signing/embedded-signer.js';
export { WascapSigner } from './signing/wascap-signer.js';

// Logging
export { DEPLOY_LOG, FileLogSink } from './logging/file-log-sink.js';
export type { LoggedEvent, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { LoggedEventSchema, readLog } from './logging/log-reader.js';
export { ulid } from './logging/ulid.js';

// Configuration
export type {
  BuildSettings,
  ConfigOverrides,
  LoadConfigOptions,
  WharfConfig,
  WharfConfigFile,
} from './config.js';
export { CONFIG_FILE, loadConfig, WharfConfigSchema } from './config.js';
