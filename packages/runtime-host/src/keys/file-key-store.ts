/**
 * Wharf Runtime Host — Key File Store
 *
 * Key files live in the key directory (default `.keys/`):
 *
 *   account.nk   issuer seed
 *   module.nk    subject seed
 *
 * Each file holds the nkeys seed in plain text followed by a newline, with
 * mode 0600. Keys are not encrypted at rest; protecting the key directory
 * is the operator's responsibility.
 */

import { chmodSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { KeyError } from '@wharf/kernel';
import type { KeyPair, KeyRole } from '@wharf/kernel';
import { isNodeError } from '../state/state-io.js';
import { keyPairFromSeedText } from './key-material.js';

const KEY_FILE_MODE = 0o600;

export class FileKeyStore {
  constructor(readonly keyDir: string) {}

  pathFor(role: KeyRole): string {
    return resolve(join(this.keyDir, `${role}.nk`));
  }

  /**
   * Load a key file by path. The role is taken from the seed itself.
   *
   * @throws {KeyError} NotFound when the file does not exist; Invalid when it
   *   does not hold a valid seed
   */
  loadFile(path: string, expectedRole?: KeyRole): KeyPair {
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        throw new KeyError(
          'NotFound',
          `Key file not found: ${path}`,
          "Generate keys with 'wharf keys' (or 'wharf keys-account' / 'wharf keys-module').",
        );
      }
      throw err;
    }
    return keyPairFromSeedText(text, expectedRole, path);
  }

  load(role: KeyRole): KeyPair {
    return this.loadFile(this.pathFor(role), role);
  }

  /**
   * Write a key file. An existing file is only replaced with `force`.
   *
   * @throws {KeyError} GenerationFailed when the file exists and `force` is not set
   */
  save(pair: KeyPair, options: { readonly force?: boolean | undefined } = {}): KeyPair {
    const path = this.pathFor(pair.role);
    mkdirSync(this.keyDir, { recursive: true });
    try {
      writeFileSync(path, pair.seed + '\n', {
        encoding: 'utf-8',
        mode: KEY_FILE_MODE,
        flag: options.force === true ? 'w' : 'wx',
      });
    } catch (err: unknown) {
      if (isNodeError(err, 'EEXIST')) {
        throw new KeyError(
          'GenerationFailed',
          `Refusing to overwrite existing key file ${path}`,
          'Keys are never rotated implicitly. Pass --force to replace it.',
        );
      }
      throw err;
    }
    // mode only applies when the file is created
    chmodSync(path, KEY_FILE_MODE);
    return { ...pair, path };
  }
}
