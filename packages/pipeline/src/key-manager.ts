/**
 * Wharf Pipeline — Key Manager
 *
 * Creates and loads the account (issuer) and module (subject) keys.
 *
 * Keys are generated once by explicit operator action and never rotated
 * implicitly: generating over an existing key file requires `force`.
 * Seeds never reach the deploy log; only public keys are recorded.
 */

import type { DeployLogger, KeyGenerator, KeyPair, KeyRole, SigningKeys } from '@wharf/kernel';

/** Persistent key storage. FileKeyStore from @wharf/runtime-host implements it. */
export interface KeyStore {
  load(role: KeyRole): KeyPair;
  loadFile(path: string, expectedRole?: KeyRole): KeyPair;
  save(pair: KeyPair, options?: { readonly force?: boolean | undefined }): KeyPair;
}

export interface GenerateOptions {
  readonly force?: boolean | undefined;
}

export class KeyManager {
  constructor(
    private readonly store: KeyStore,
    private readonly generator: KeyGenerator,
    private readonly logger: DeployLogger,
  ) {}

  /**
   * Generate a key of `role` and write it to the key directory.
   *
   * @throws {KeyError} GenerationFailed when generation fails or the key file
   *   exists and `force` is not set
   */
  async generate(role: KeyRole, options: GenerateOptions = {}): Promise<KeyPair> {
    const pair = await this.generator.generate(role);
    const saved = this.store.save(pair, { force: options.force });
    this.logger.record('key.generated', { detail: `${role} ${saved.public_key}` });
    return saved;
  }

  /**
   * Load a key file by path.
   *
   * @throws {KeyError} NotFound or Invalid
   */
  load(path: string, expectedRole?: KeyRole): KeyPair {
    return this.store.loadFile(path, expectedRole);
  }

  /** Load the issuer and subject keys from the key directory. */
  loadPair(): SigningKeys {
    return { issuer: this.store.load('account'), subject: this.store.load('module') };
  }
}
