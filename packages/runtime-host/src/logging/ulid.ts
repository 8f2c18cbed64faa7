/**
 * Wharf Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier: 26 characters
 * of Crockford Base32, a 48-bit millisecond timestamp followed by 80 random
 * bits. Used as event_id in deploy.jsonl so that merged or re-synced log
 * files can be deduplicated on read.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

// Excludes I, L, O, U.
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const BITS_PER_CHAR = 5;
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & BigInt(0x1f))) + out;
    v >>= BigInt(BITS_PER_CHAR);
  }
  return out;
}

/**
 * Generate a new ULID.
 *
 * The random part is not incremented within the same millisecond; ordering
 * of events within a millisecond is informational only.
 *
 * @param nowMs - Timestamp to encode; defaults to Date.now()
 */
export function ulid(nowMs: number = Date.now()): string {
  let random = BigInt(0);
  for (const byte of randomBytes(10)) {
    random = (random << BigInt(8)) | BigInt(byte);
  }
  return encodeCrockford(BigInt(nowMs), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
