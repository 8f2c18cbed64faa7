/**
 * Wharf Kernel — nkeys Text Encoding
 *
 * Ed25519 keys are exchanged as nkeys strings: a prefix byte naming the key
 * type, the 32 key bytes and a CRC-16 checksum, base32 encoded without
 * padding.
 *
 *   public key  [prefix][32-byte public key][crc16 LE]          → 'A...' / 'M...'
 *   seed        [SEED | prefix>>5][(prefix&31)<<3][32-byte seed][crc16 LE] → 'SA...' / 'SM...'
 *
 * The checksum is CRC-16/XMODEM over every byte before it.
 */

import { KeyError } from '../errors/index.js';
import { KEY_ROLES } from '../types/key.js';
import type { KeyRole } from '../types/key.js';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';

const PREFIX_SEED = 18 << 3;

export const PREFIX_BYTES: Readonly<Record<KeyRole, number>> = {
  account: 0,
  module: 12 << 3,
};

const KEY_LENGTH = 32;

// ---------------------------------------------------------------------------
// Base32 (RFC 4648, no padding)
// ---------------------------------------------------------------------------

export function base32Encode(bytes: Uint8Array): string {
  let out = '';
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      out += BASE32_ALPHABET.charAt((buffer >> bits) & 0x1f);
    }
    buffer &= (1 << bits) - 1;
  }
  if (bits > 0) {
    out += BASE32_ALPHABET.charAt((buffer << (5 - bits)) & 0x1f);
  }
  return out;
}

/** Returns undefined on any character outside the alphabet. */
export function base32Decode(text: string): Uint8Array | undefined {
  const out: number[] = [];
  let buffer = 0;
  let bits = 0;
  for (const ch of text) {
    const value = BASE32_ALPHABET.indexOf(ch);
    if (value === -1) return undefined;
    buffer = (buffer << 5) | value;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      out.push((buffer >> bits) & 0xff);
    }
    buffer &= (1 << bits) - 1;
  }
  return Uint8Array.from(out);
}

// ---------------------------------------------------------------------------
// CRC-16/XMODEM
// ---------------------------------------------------------------------------

export function crc16(bytes: Uint8Array): number {
  let crc = 0;
  for (const byte of bytes) {
    crc ^= byte << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
    }
  }
  return crc;
}

function withChecksum(payload: Uint8Array): Uint8Array {
  const crc = crc16(payload);
  const out = new Uint8Array(payload.length + 2);
  out.set(payload);
  out[payload.length] = crc & 0xff;
  out[payload.length + 1] = crc >> 8;
  return out;
}

function checkedPayload(text: string, expectedLength: number): Uint8Array {
  const raw = base32Decode(text);
  if (raw === undefined || raw.length !== expectedLength + 2) {
    throw new KeyError('Invalid', 'Key is not a valid nkeys string');
  }
  const payload = raw.subarray(0, expectedLength);
  const stored = (raw[expectedLength] ?? 0) | ((raw[expectedLength + 1] ?? 0) << 8);
  if (crc16(payload) !== stored) {
    throw new KeyError('Invalid', 'Key checksum mismatch');
  }
  return payload;
}

// ---------------------------------------------------------------------------
// Public keys
// ---------------------------------------------------------------------------

export function encodePublicKey(role: KeyRole, publicKey: Uint8Array): string {
  if (publicKey.length !== KEY_LENGTH) {
    throw new KeyError('Invalid', `Public key must be ${KEY_LENGTH} bytes, got ${publicKey.length}`);
  }
  const payload = new Uint8Array(1 + KEY_LENGTH);
  payload[0] = PREFIX_BYTES[role];
  payload.set(publicKey, 1);
  return base32Encode(withChecksum(payload));
}

/** @throws {KeyError} Invalid on a bad checksum or a key of another role */
export function decodePublicKey(role: KeyRole, text: string): Uint8Array {
  const payload = checkedPayload(text, 1 + KEY_LENGTH);
  if (payload[0] !== PREFIX_BYTES[role]) {
    throw new KeyError('Invalid', `Not a ${role} public key`);
  }
  return payload.slice(1);
}

// ---------------------------------------------------------------------------
// Seeds
// ---------------------------------------------------------------------------

export function encodeSeed(role: KeyRole, seed: Uint8Array): string {
  if (seed.length !== KEY_LENGTH) {
    throw new KeyError('Invalid', `Seed must be ${KEY_LENGTH} bytes, got ${seed.length}`);
  }
  const prefix = PREFIX_BYTES[role];
  const payload = new Uint8Array(2 + KEY_LENGTH);
  payload[0] = PREFIX_SEED | (prefix >> 5);
  payload[1] = (prefix & 31) << 3;
  payload.set(seed, 2);
  return base32Encode(withChecksum(payload));
}

/**
 * Decode a seed string, returning its role and raw 32-byte seed.
 *
 * @throws {KeyError} Invalid on a bad checksum or an unknown prefix
 */
export function decodeSeed(text: string): { readonly role: KeyRole; readonly seed: Uint8Array } {
  const payload = checkedPayload(text.trim(), 2 + KEY_LENGTH);
  const b1 = payload[0] ?? 0;
  const b2 = payload[1] ?? 0;
  if ((b1 & 0xf8) !== PREFIX_SEED) {
    throw new KeyError('Invalid', 'Not an nkeys seed');
  }
  const prefix = ((b1 & 7) << 5) | ((b2 & 0xf8) >> 3);
  const role = KEY_ROLES.find((r) => PREFIX_BYTES[r] === prefix);
  if (role === undefined) {
    throw new KeyError('Invalid', `Unsupported seed type (prefix byte ${prefix})`);
  }
  return { role, seed: payload.slice(2) };
}
