/**
 * Wharf Runtime Host — Key Material
 *
 * Builds KeyPairs from raw seeds and seed text, deriving the public key so
 * that a seed file alone is enough to recover the full pair.
 */

import { decodeSeed, encodePublicKey, encodeSeed, KeyError, publicKeyFromSeed } from '@wharf/kernel';
import type { KeyPair, KeyRole } from '@wharf/kernel';

export function keyPairFromRawSeed(role: KeyRole, seed: Uint8Array): KeyPair {
  return {
    role,
    seed: encodeSeed(role, seed),
    public_key: encodePublicKey(role, publicKeyFromSeed(seed)),
  };
}

/**
 * Parse seed text (as stored in a `.nk` file).
 *
 * @param expectedRole - When given, a seed of another role is rejected
 * @throws {KeyError} Invalid
 */
export function keyPairFromSeedText(text: string, expectedRole?: KeyRole, path?: string): KeyPair {
  const { role, seed } = decodeSeed(text);
  if (expectedRole !== undefined && role !== expectedRole) {
    throw new KeyError('Invalid', `Expected an ${expectedRole} seed, found a ${role} seed${path !== undefined ? ` in ${path}` : ''}`);
  }
  return { ...keyPairFromRawSeed(role, seed), path };
}
