/**
 * Wharf Kernel — Embedded Module Claims
 *
 * A signed module carries a compact JWT in its `jwt` custom section:
 *
 *   header  { typ: 'jwt', alg: 'Ed25519' }
 *   claims  { jti, iss, sub, wascap: { name, hash, tags, caps, prov } }
 *
 * `iss` is the account public key, `sub` the module public key, and `hash`
 * the uppercase SHA-256 of the module with its `jwt` section removed. The
 * token is signed with the account seed. There is no issued-at claim, and
 * Ed25519 signatures are deterministic, so the same module, keys and
 * capabilities always produce the same signed bytes.
 */

import { createHash } from 'node:crypto';
import { canonicalize } from '@wharf/stack-dsl';
import { z } from 'zod';
import { BuildError, KeyError } from '../errors/index.js';
import type { CapabilityClaim } from '../types/capability.js';
import type { SigningKeys } from '../types/key.js';
import { publicKeyFromSeed, signDetached, verifyDetached } from './ed25519.js';
import { decodePublicKey, decodeSeed, encodePublicKey } from './nkeys.js';
import { appendCustomSection, customSection, withoutCustomSection } from './wasm.js';

export const CLAIMS_SECTION = 'jwt';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const HeaderSchema = z.object({
  typ: z.literal('jwt'),
  alg: z.literal('Ed25519'),
});

export const ModuleClaimsSchema = z.object({
  jti: z.string().min(1),
  iss: z.string().min(1),
  sub: z.string().min(1),
  wascap: z.object({
    name: z.string(),
    hash: z.string().regex(/^[0-9A-F]{64}$/),
    tags: z.array(z.string()),
    caps: z.array(z.string()),
    prov: z.boolean(),
  }),
});

export type ModuleClaims = z.infer<typeof ModuleClaimsSchema>;

export interface DecodedClaims {
  readonly claims: ModuleClaims;
  readonly token: string;
  /** Hash of the module as it is now, without its claims section. */
  readonly module_hash: string;
  readonly hash_matches: boolean;
  readonly signature_valid: boolean;
}

export interface ClaimsOptions {
  readonly name: string;
  readonly capabilities: ReadonlyArray<CapabilityClaim>;
  readonly keys: SigningKeys;
  readonly tags?: ReadonlyArray<string> | undefined;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function base64url(text: string | Uint8Array): string {
  return Buffer.from(text).toString('base64url');
}

export function moduleHash(module: Uint8Array): string {
  return createHash('sha256').update(withoutCustomSection(module, CLAIMS_SECTION)).digest('hex').toUpperCase();
}

function seedOf(keys: SigningKeys, which: 'issuer' | 'subject'): Uint8Array {
  const pair = keys[which];
  const decoded = decodeSeed(pair.seed);
  const expected = which === 'issuer' ? 'account' : 'module';
  if (decoded.role !== expected) {
    throw new KeyError('Invalid', `The ${which} key must be an ${expected} key, got a ${decoded.role} key`);
  }
  if (encodePublicKey(decoded.role, publicKeyFromSeed(decoded.seed)) !== pair.public_key) {
    throw new KeyError('Invalid', `The ${which} seed does not match its public key`);
  }
  return decoded.seed;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/** Build the signed claims token for a module. */
export function encodeClaims(module: Uint8Array, options: ClaimsOptions): string {
  const issuerSeed = seedOf(options.keys, 'issuer');
  seedOf(options.keys, 'subject');

  const hash = moduleHash(module);
  const caps = options.capabilities.map((c) => c.name);
  const claims: ModuleClaims = {
    jti: createHash('sha256')
      .update(`${options.keys.subject.public_key}:${hash}:${caps.join(',')}`)
      .digest('hex')
      .slice(0, 32),
    iss: options.keys.issuer.public_key,
    sub: options.keys.subject.public_key,
    wascap: { name: options.name, hash, tags: [...(options.tags ?? [])], caps, prov: false },
  };

  const signingInput = `${base64url(canonicalize({ typ: 'jwt', alg: 'Ed25519' }))}.${base64url(canonicalize(claims))}`;
  const signature = signDetached(issuerSeed, new TextEncoder().encode(signingInput));
  return `${signingInput}.${base64url(signature)}`;
}

/** Replace any claims section of `module` with a freshly signed one. */
export function embedClaims(module: Uint8Array, options: ClaimsOptions): Uint8Array {
  const stripped = withoutCustomSection(module, CLAIMS_SECTION);
  const token = encodeClaims(stripped, options);
  return appendCustomSection(stripped, CLAIMS_SECTION, new TextEncoder().encode(token));
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function decodeJson(segment: string, what: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch (err: unknown) {
    throw new BuildError('InvalidArtifact', `Claims ${what} is not valid JSON`, String(err));
  }
}

/**
 * Decode and verify the claims embedded in a signed module.
 *
 * @throws {BuildError} InvalidArtifact when the module has no claims section
 *   or the token is malformed
 */
export function decodeClaims(module: Uint8Array): DecodedClaims {
  const section = customSection(module, CLAIMS_SECTION);
  if (section === undefined) {
    throw new BuildError('InvalidArtifact', 'Module has no embedded claims (missing jwt section)');
  }
  const token = new TextDecoder().decode(section);
  const [header, body, signature, ...rest] = token.split('.');
  if (header === undefined || body === undefined || signature === undefined || rest.length > 0) {
    throw new BuildError('InvalidArtifact', 'Embedded claims are not a three-part token');
  }

  const parsedHeader = HeaderSchema.safeParse(decodeJson(header, 'header'));
  if (!parsedHeader.success) {
    throw new BuildError('InvalidArtifact', 'Unsupported claims header', parsedHeader.error.message);
  }
  const parsedClaims = ModuleClaimsSchema.safeParse(decodeJson(body, 'body'));
  if (!parsedClaims.success) {
    throw new BuildError('InvalidArtifact', 'Malformed module claims', parsedClaims.error.message);
  }
  const claims = parsedClaims.data;

  let issuer: Uint8Array;
  try {
    issuer = decodePublicKey('account', claims.iss);
  } catch (err: unknown) {
    if (err instanceof KeyError) {
      throw new BuildError('InvalidArtifact', `Issuer '${claims.iss}' is not an account public key`, err.message);
    }
    throw err;
  }

  const module_hash = moduleHash(module);
  return {
    claims,
    token,
    module_hash,
    hash_matches: module_hash === claims.wascap.hash,
    signature_valid: verifyDetached(
      issuer,
      new TextEncoder().encode(`${header}.${body}`),
      new Uint8Array(Buffer.from(signature, 'base64url')),
    ),
  };
}
