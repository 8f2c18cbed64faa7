/**
 * @wharf/pipeline
 *
 * Wharf pipeline — the Key Manager, Artifact Builder and Infrastructure
 * Provisioner, and the deploy sequencing that ties them to the lock.
 *
 * Every side effect goes through an injected collaborator; wiring the
 * concrete ones is the CLI's job.
 */

export type { GenerateOptions, KeyStore } from './key-manager.js';
export { KeyManager } from './key-manager.js';

export type {
  ArtifactBuilderDeps,
  ArtifactStore,
  BuildRequest,
  InspectedArtifact,
  SignModuleRequest,
} from './artifact-builder.js';
export { ArtifactBuilder, contentHash, signedPathFor } from './artifact-builder.js';

export type { ApplyResult, ProvisionerDeps, StateStore } from './provisioner.js';
export { Provisioner } from './provisioner.js';

export type { LoadedStack } from './stack-loader.js';
export { compileStackSource, loadStack } from './stack-loader.js';

export type {
  ArtifactSource,
  ConfirmChanges,
  DeployerDeps,
  DeployLock,
  DeployOutcome,
} from './deployer.js';
export { Deployer } from './deployer.js';
