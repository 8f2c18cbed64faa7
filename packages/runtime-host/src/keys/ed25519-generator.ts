/**
 * Wharf Runtime Host — In-process Key Generator
 *
 * Generates Ed25519 seeds in process. The default generator: it needs no
 * external tool.
 */

import { generateSeed } from '@wharf/kernel';
import type { KeyGenerator, KeyPair, KeyRole } from '@wharf/kernel';
import { keyPairFromRawSeed } from './key-material.js';

export class Ed25519KeyGenerator implements KeyGenerator {
  generate(role: KeyRole): Promise<KeyPair> {
    return Promise.resolve(keyPairFromRawSeed(role, generateSeed()));
  }
}
