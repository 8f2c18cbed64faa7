/**
 * Wharf Kernel — Codec Tests
 *
 * nkeys: seed and public key text encoding, checksums and prefixes
 * wasm: LEB128 and custom section handling
 * ed25519: detached signatures over raw keys
 * claims: signing and verifying the embedded jwt section
 *
 * Keys are derived from fixed seed bytes. All tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import {
  appendCustomSection,
  base32Decode,
  base32Encode,
  BuildError,
  crc16,
  customSection,
  decodeClaims,
  decodeLeb128,
  decodePublicKey,
  decodeSeed,
  embedClaims,
  encodeLeb128,
  encodePublicKey,
  encodeSeed,
  generateSeed,
  KeyError,
  moduleHash,
  publicKeyFromSeed,
  readSections,
  signDetached,
  verifyDetached,
} from '../src/index.js';
import type { KeyPair, KeyRole } from '../src/index.js';

const WASM_HEADER = Uint8Array.of(0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00);

function keyPair(role: KeyRole, fill: number): KeyPair {
  const seed = new Uint8Array(32).fill(fill);
  return { role, seed: encodeSeed(role, seed), public_key: encodePublicKey(role, publicKeyFromSeed(seed)) };
}

const ACCOUNT = keyPair('account', 1);
const MODULE = keyPair('module', 2);
const KEYS = { issuer: ACCOUNT, subject: MODULE };
const CAPS = [{ name: 'awslambda:event' }, { name: 'wascc:logging' }];

function sampleModule(): Uint8Array {
  return appendCustomSection(WASM_HEADER, 'name', Uint8Array.of(1, 2, 3));
}

// ---------------------------------------------------------------------------
// nkeys
// ---------------------------------------------------------------------------

describe('nkeys encoding', () => {
  it('encodes seeds with SA/SM prefixes', () => {
    expect(ACCOUNT.seed.startsWith('SA')).toBe(true);
    expect(MODULE.seed.startsWith('SM')).toBe(true);
    expect(ACCOUNT.seed).toHaveLength(58);
  });

  it('encodes public keys with A/M prefixes', () => {
    expect(ACCOUNT.public_key.startsWith('A')).toBe(true);
    expect(MODULE.public_key.startsWith('M')).toBe(true);
    expect(MODULE.public_key).toHaveLength(56);
  });

  it('decodes a seed back to its role and bytes', () => {
    const decoded = decodeSeed(MODULE.seed);
    expect(decoded.role).toBe('module');
    expect(Array.from(decoded.seed)).toEqual(new Array<number>(32).fill(2));
  });

  it('rejects a seed with a corrupted character', () => {
    const chars = ACCOUNT.seed.split('');
    chars[10] = chars[10] === 'A' ? 'B' : 'A';
    expect(() => decodeSeed(chars.join(''))).toThrow(new KeyError('Invalid', 'Key checksum mismatch'));
  });

  it('rejects text outside the alphabet', () => {
    expect(() => decodeSeed('not-a-seed!')).toThrow('Key is not a valid nkeys string');
  });

  it('rejects a public key of the wrong role', () => {
    expect(() => decodePublicKey('module', ACCOUNT.public_key)).toThrow('Not a module public key');
    expect(decodePublicKey('account', ACCOUNT.public_key)).toHaveLength(32);
  });

  it('uses CRC-16/XMODEM and RFC 4648 base32', () => {
    expect(crc16(new TextEncoder().encode('123456789'))).toBe(0x31c3);
    expect(base32Encode(new TextEncoder().encode('foobar'))).toBe('MZXW6YTBOI');
    expect(new TextDecoder().decode(base32Decode('MZXW6YTBOI'))).toBe('foobar');
  });
});

// ---------------------------------------------------------------------------
// wasm
// ---------------------------------------------------------------------------

describe('ed25519', () => {
  const seed = new Uint8Array(32).fill(7);
  const message = new TextEncoder().encode('hello');

  it('signs deterministically and verifies with the derived public key', () => {
    const signature = signDetached(seed, message);
    expect(signature).toHaveLength(64);
    expect(signDetached(seed, message)).toEqual(signature);
    expect(verifyDetached(publicKeyFromSeed(seed), message, signature)).toBe(true);
  });

  it('rejects a signature over another message or by another key', () => {
    const signature = signDetached(seed, message);
    expect(verifyDetached(publicKeyFromSeed(seed), new TextEncoder().encode('hellp'), signature)).toBe(false);
    expect(verifyDetached(publicKeyFromSeed(new Uint8Array(32).fill(8)), message, signature)).toBe(false);
  });

  it('rejects a truncated signature', () => {
    const signature = signDetached(seed, message);
    expect(verifyDetached(publicKeyFromSeed(seed), message, signature.subarray(0, 63))).toBe(false);
  });

  it('generates distinct 32-byte seeds', () => {
    const a = generateSeed();
    expect(a).toHaveLength(32);
    expect(generateSeed()).not.toEqual(a);
  });
});

describe('wasm sections', () => {
  it('encodes and decodes LEB128', () => {
    expect(Array.from(encodeLeb128(624485))).toEqual([0xe5, 0x8e, 0x26]);
    expect(decodeLeb128(Uint8Array.of(0xe5, 0x8e, 0x26), 0)).toEqual({ value: 624485, next: 3 });
    expect(Array.from(encodeLeb128(0))).toEqual([0]);
  });

  it('appends and reads a custom section', () => {
    const module = sampleModule();
    expect(Array.from(module.subarray(8))).toEqual([0, 8, 4, 0x6e, 0x61, 0x6d, 0x65, 1, 2, 3]);
    expect(readSections(module).map((s) => [s.id, s.name])).toEqual([[0, 'name']]);
    expect(Array.from(customSection(module, 'name') ?? [])).toEqual([1, 2, 3]);
    expect(customSection(module, 'jwt')).toBeUndefined();
  });

  it('rejects bytes that are not a module', () => {
    expect(() => readSections(Uint8Array.of(1, 2, 3))).toThrow(BuildError);
  });

  it('rejects a section that runs past the end', () => {
    const truncated = Uint8Array.of(...WASM_HEADER, 1, 10, 0);
    expect(() => readSections(truncated)).toThrow('Section at offset 8 runs past the end of the module');
  });
});

// ---------------------------------------------------------------------------
// claims
// ---------------------------------------------------------------------------

describe('embedded claims', () => {
  it('signs a module and verifies the embedded claims', () => {
    const signed = embedClaims(sampleModule(), { name: 'hello', capabilities: CAPS, keys: KEYS });
    const decoded = decodeClaims(signed);

    expect(decoded.claims.iss).toBe(ACCOUNT.public_key);
    expect(decoded.claims.sub).toBe(MODULE.public_key);
    expect(decoded.claims.wascap.name).toBe('hello');
    expect(decoded.claims.wascap.caps).toEqual(['awslambda:event', 'wascc:logging']);
    expect(decoded.claims.wascap.hash).toBe(moduleHash(sampleModule()));
    expect(decoded.hash_matches).toBe(true);
    expect(decoded.signature_valid).toBe(true);
  });

  it('produces identical bytes for identical inputs', () => {
    const a = embedClaims(sampleModule(), { name: 'hello', capabilities: CAPS, keys: KEYS });
    const b = embedClaims(sampleModule(), { name: 'hello', capabilities: CAPS, keys: KEYS });
    expect(a).toEqual(b);
    expect(embedClaims(a, { name: 'hello', capabilities: CAPS, keys: KEYS })).toEqual(a);
  });

  it('changes the bytes but not the key ids when capabilities change', () => {
    const a = embedClaims(sampleModule(), { name: 'hello', capabilities: CAPS, keys: KEYS });
    const b = embedClaims(sampleModule(), { name: 'hello', capabilities: CAPS.slice(0, 1), keys: KEYS });
    expect(a).not.toEqual(b);
    expect(decodeClaims(b).claims.iss).toBe(decodeClaims(a).claims.iss);
    expect(decodeClaims(b).claims.sub).toBe(decodeClaims(a).claims.sub);
  });

  it('detects a module modified after signing', () => {
    const signed = embedClaims(sampleModule(), { name: 'hello', capabilities: CAPS, keys: KEYS });
    const tampered = appendCustomSection(signed, 'extra', Uint8Array.of(9));
    const decoded = decodeClaims(tampered);
    expect(decoded.hash_matches).toBe(false);
    expect(decoded.signature_valid).toBe(true);
  });

  it('requires an account issuer whose seed matches its public key', () => {
    expect(() =>
      embedClaims(sampleModule(), { name: 'h', capabilities: CAPS, keys: { issuer: MODULE, subject: MODULE } }),
    ).toThrow('The issuer key must be an account key, got a module key');

    const mismatched = { ...ACCOUNT, public_key: keyPair('account', 3).public_key };
    expect(() =>
      embedClaims(sampleModule(), { name: 'h', capabilities: CAPS, keys: { issuer: mismatched, subject: MODULE } }),
    ).toThrow('The issuer seed does not match its public key');
  });

  it('rejects a module without claims', () => {
    expect(() => decodeClaims(sampleModule())).toThrow(
      new BuildError('InvalidArtifact', 'Module has no embedded claims (missing jwt section)'),
    );
  });
});
