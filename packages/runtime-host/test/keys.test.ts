/**
 * Wharf Runtime Host — Key Store and Generator Tests
 */

import { describe, it, expect } from 'vitest';
import { readFileSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { decodePublicKey, KeyError } from '@wharf/kernel';
import { Ed25519KeyGenerator } from '../src/keys/ed25519-generator.js';
import { FileKeyStore } from '../src/keys/file-key-store.js';
import { keyPairFromSeedText } from '../src/keys/key-material.js';
import { NkKeyGenerator } from '../src/keys/nk-generator.js';
import { FakeExec, keyPair, tempDir } from './fakes.js';

const ACCOUNT = keyPair('account', 1);
const MODULE = keyPair('module', 2);

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof KeyError) return err.kind;
    throw err;
  }
  return undefined;
}

describe('keyPairFromSeedText', () => {
  it('derives the public key from the seed and ignores surrounding whitespace', () => {
    expect(keyPairFromSeedText(`  ${ACCOUNT.seed}\n`)).toEqual({ ...ACCOUNT, path: undefined });
  });

  it('rejects a seed of the wrong role', () => {
    expect(() => keyPairFromSeedText(MODULE.seed, 'account', '/keys/account.nk')).toThrow(
      'Expected an account seed, found a module seed in /keys/account.nk',
    );
  });
});

describe('FileKeyStore', () => {
  it('writes <role>.nk with mode 0600 and reads it back', () => {
    const dir = tempDir('keys');
    const store = new FileKeyStore(dir);
    const saved = store.save(ACCOUNT);

    expect(saved.path).toBe(join(dir, 'account.nk'));
    expect(readFileSync(join(dir, 'account.nk'), 'utf-8')).toBe(ACCOUNT.seed + '\n');
    expect(statSync(join(dir, 'account.nk')).mode & 0o777).toBe(0o600);
    expect(store.load('account')).toEqual(saved);
  });

  it('refuses to overwrite an existing key without force', () => {
    const store = new FileKeyStore(tempDir('keys-force'));
    store.save(keyPair('account', 1));
    expect(kindOf(() => store.save(keyPair('account', 3)))).toBe('GenerationFailed');
    expect(store.load('account').public_key).toBe(keyPair('account', 1).public_key);
  });

  it('overwrites with force', () => {
    const store = new FileKeyStore(tempDir('keys-force2'));
    store.save(keyPair('account', 1));
    store.save(keyPair('account', 3), { force: true });
    expect(store.load('account').public_key).toBe(keyPair('account', 3).public_key);
  });

  it('reports a missing key file as NotFound', () => {
    const store = new FileKeyStore(tempDir('keys-missing'));
    expect(kindOf(() => store.load('module'))).toBe('NotFound');
  });

  it('reports a corrupted key file as Invalid', () => {
    const dir = tempDir('keys-corrupt');
    const store = new FileKeyStore(dir);
    store.save(MODULE);
    const seed = MODULE.seed;
    const flipped = seed.slice(0, 10) + (seed.charAt(10) === 'A' ? 'B' : 'A') + seed.slice(11);
    writeFileSync(join(dir, 'module.nk'), flipped);
    expect(kindOf(() => store.load('module'))).toBe('Invalid');
  });

  it('rejects an account seed stored as module.nk', () => {
    const dir = tempDir('keys-swap');
    writeFileSync(join(dir, 'module.nk'), ACCOUNT.seed);
    expect(kindOf(() => new FileKeyStore(dir).load('module'))).toBe('Invalid');
  });

  it('loads a key file by path with its role taken from the seed', () => {
    const dir = tempDir('keys-path');
    writeFileSync(join(dir, 'issuer.nk'), ACCOUNT.seed);
    const pair = new FileKeyStore(dir).loadFile(join(dir, 'issuer.nk'));
    expect(pair.role).toBe('account');
    expect(pair.public_key).toBe(ACCOUNT.public_key);
  });
});

describe('Ed25519KeyGenerator', () => {
  it('generates distinct valid keys of the requested role', async () => {
    const generator = new Ed25519KeyGenerator();
    const a = await generator.generate('module');
    const b = await generator.generate('module');

    expect(a.role).toBe('module');
    expect(a.seed.startsWith('SM')).toBe(true);
    expect(a.public_key.startsWith('M')).toBe(true);
    expect(decodePublicKey('module', a.public_key)).toHaveLength(32);
    expect(a.seed).not.toBe(b.seed);
    expect(keyPairFromSeedText(a.seed).public_key).toBe(a.public_key);
  });
});

describe('NkKeyGenerator', () => {
  const output = (seed: string, publicKey: string): string => `Public Key: ${publicKey}\nSeed: ${seed}\n`;

  it('runs `nk gen <role>` and reads the seed and public key', async () => {
    const exec = new FakeExec(() => ({ exitCode: 0, stdout: output(ACCOUNT.seed, ACCOUNT.public_key), stderr: '' }));
    const pair = await new NkKeyGenerator(exec).generate('account');

    expect(exec.calls).toEqual([{ command: 'nk', args: ['gen', 'account'], options: undefined }]);
    expect(pair.seed).toBe(ACCOUNT.seed);
    expect(pair.public_key).toBe(ACCOUNT.public_key);
  });

  it('fails when the tool exits non-zero', async () => {
    const exec = new FakeExec(() => ({ exitCode: 2, stdout: '', stderr: 'bad role\n' }));
    await expect(new NkKeyGenerator(exec).generate('module')).rejects.toMatchObject({
      kind: 'GenerationFailed',
      message: "'nk gen module' exited with code 2",
      detail: 'bad role',
    });
  });

  it('fails when the tool cannot be started', async () => {
    const exec = new FakeExec(() => new Error('spawn nk ENOENT'));
    await expect(new NkKeyGenerator(exec).generate('module')).rejects.toMatchObject({
      kind: 'GenerationFailed',
      message: "Failed to start 'nk'",
    });
  });

  it('fails when the output has no seed line', async () => {
    const exec = new FakeExec(() => ({ exitCode: 0, stdout: 'nothing here\n', stderr: '' }));
    await expect(new NkKeyGenerator(exec).generate('module')).rejects.toMatchObject({ kind: 'GenerationFailed' });
  });

  it('fails when the printed public key does not match the seed', async () => {
    const exec = new FakeExec(() => ({ exitCode: 0, stdout: output(MODULE.seed, keyPair('module', 9).public_key), stderr: '' }));
    await expect(new NkKeyGenerator(exec).generate('module')).rejects.toMatchObject({
      kind: 'GenerationFailed',
      message: "'nk' printed a public key that does not match its seed",
    });
  });

  it('fails when the tool prints a seed of another role', async () => {
    const exec = new FakeExec(() => ({ exitCode: 0, stdout: output(ACCOUNT.seed, ACCOUNT.public_key), stderr: '' }));
    await expect(new NkKeyGenerator(exec).generate('module')).rejects.toMatchObject({
      kind: 'GenerationFailed',
      message: "'nk' printed an invalid seed",
    });
  });
});
