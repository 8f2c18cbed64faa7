/**
 * Wharf Kernel — Ed25519 primitives over raw 32-byte keys
 *
 * Thin wrappers around @noble/curves. A seed is the 32-byte Ed25519 secret
 * key; signatures are the 64-byte detached form.
 */

import { ed25519 } from '@noble/curves/ed25519.js';

export const SEED_LENGTH = 32;
export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

/** A fresh random seed from the platform CSPRNG. */
export function generateSeed(): Uint8Array {
  return ed25519.keygen().secretKey;
}

/** Derive the 32-byte public key of a 32-byte seed. */
export function publicKeyFromSeed(seed: Uint8Array): Uint8Array {
  return ed25519.getPublicKey(seed);
}

export function signDetached(seed: Uint8Array, message: Uint8Array): Uint8Array {
  return ed25519.sign(message, seed);
}

/** False for a signature or key of the wrong length as well as a bad signature. */
export function verifyDetached(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  if (publicKey.length !== PUBLIC_KEY_LENGTH || signature.length !== SIGNATURE_LENGTH) return false;
  return ed25519.verify(signature, message, publicKey);
}
