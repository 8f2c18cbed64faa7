/**
 * Wharf Kernel — Key Types
 *
 * An account key issues signatures; a module key is the identity of the
 * artifact being signed. Both are Ed25519 keys in the nkeys text encoding.
 */

export type KeyRole = 'account' | 'module';

export const KEY_ROLES: ReadonlyArray<KeyRole> = ['account', 'module'];

/**
 * A key pair as held in memory.
 *
 * `seed` is secret material and must never be logged. `path` is set when the
 * pair was loaded from or written to a key file.
 */
export interface KeyPair {
  readonly role: KeyRole;
  /** nkeys seed, `SA...` for accounts, `SM...` for modules. */
  readonly seed: string;
  /** nkeys public key, `A...` for accounts, `M...` for modules. */
  readonly public_key: string;
  readonly path?: string | undefined;
}

/** The public half of a key pair, safe to persist and display. */
export interface KeyIdentity {
  readonly role: KeyRole;
  readonly public_key: string;
}

/** Issuer (account) and subject (module) keys used to sign an artifact. */
export interface SigningKeys {
  readonly issuer: KeyPair;
  readonly subject: KeyPair;
}

export function identityOf(pair: KeyPair): KeyIdentity {
  return { role: pair.role, public_key: pair.public_key };
}
