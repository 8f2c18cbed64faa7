/**
 * Wharf Pipeline — Key Manager Tests
 */

import { describe, it, expect } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { KeyError } from '@wharf/kernel';
import { Ed25519KeyGenerator, FileKeyStore } from '@wharf/runtime-host';
import { KeyManager } from '../src/key-manager.js';
import { memoryContext, tempDir } from './fakes.js';

function setup() {
  const context = memoryContext();
  const keyDir = tempDir('km');
  const manager = new KeyManager(new FileKeyStore(keyDir), new Ed25519KeyGenerator(), context.logger);
  return { ...context, keyDir, manager };
}

describe('KeyManager', () => {
  it('generates a key file and logs only its public key', async () => {
    const { manager, keyDir, io } = setup();
    const pair = await manager.generate('account');

    expect(existsSync(join(keyDir, 'account.nk'))).toBe(true);
    expect(pair.path).toBe(join(keyDir, 'account.nk'));
    const lines = io.readLines('deploy.jsonl');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain(`"detail":"account ${pair.public_key}"`);
    expect(lines[0]).not.toContain(pair.seed);
  });

  it('never overwrites a key without force', async () => {
    const { manager } = setup();
    const first = await manager.generate('module');
    await expect(manager.generate('module')).rejects.toMatchObject({ kind: 'GenerationFailed', exitCode: 13 });
    const replaced = await manager.generate('module', { force: true });
    expect(replaced.public_key).not.toBe(first.public_key);
  });

  it('loads the issuer and subject pair', async () => {
    const { manager } = setup();
    const account = await manager.generate('account');
    const module = await manager.generate('module');
    expect(manager.loadPair()).toEqual({ issuer: account, subject: module });
  });

  it('reports a missing key as NotFound', () => {
    const { manager, keyDir } = setup();
    expect(() => manager.load(join(keyDir, 'account.nk'))).toThrow(KeyError);
    try {
      manager.loadPair();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(KeyError);
      if (err instanceof KeyError) expect(err.kind).toBe('NotFound');
    }
  });
});
