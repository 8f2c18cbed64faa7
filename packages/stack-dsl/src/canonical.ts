/**
 * Wharf Stack DSL — Canonical JSON and hashing
 *
 * Standard JSON.stringify does not guarantee property ordering. canonicalize()
 * sorts object keys at every level so identical data structures produce
 * identical strings regardless of property insertion order. Properties whose
 * value is `undefined` are omitted, matching a JSON round trip.
 */

import { createHash } from 'node:crypto';

export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((item: unknown) => canonicalize(item)).join(',') + ']';
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return '{' + pairs.join(',') + '}';
  }
  throw new TypeError(`Cannot canonicalize value of type ${typeof value}`);
}

/** SHA-256 hex digest of the canonical JSON form of `value`. */
export function canonicalHash(value: unknown): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}
