/**
 * Wharf Runtime Host — StateLock Tests
 */

import { describe, it, expect } from 'vitest';
import { ApplyError } from '@wharf/kernel';
import { LOCK_FILE, StateLock } from '../src/state/lock.js';
import { MemoryStateIO } from '../src/state/state-io.js';
import { FIXED_TIME } from './fakes.js';

describe('StateLock', () => {
  it('records its holder while held and removes the file on release', () => {
    const io = new MemoryStateIO();
    const lock = new StateLock(io, () => FIXED_TIME, 4242);
    lock.acquire('deploy');
    expect(lock.holder()).toEqual({ pid: 4242, command: 'deploy', acquired_at: FIXED_TIME });
    lock.release();
    expect(io.readText(LOCK_FILE)).toBeUndefined();
  });

  it('rejects a second holder with ConcurrentModificationError', () => {
    const io = new MemoryStateIO();
    new StateLock(io, () => FIXED_TIME, 1).acquire('deploy');
    const second = new StateLock(io, () => FIXED_TIME, 2);
    try {
      second.acquire('destroy');
      expect.unreachable('acquire should have thrown');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ApplyError);
      if (err instanceof ApplyError) {
        expect(err.kind).toBe('ConcurrentModificationError');
        expect(err.detail).toBe(`lock held by pid 1 (deploy) since ${FIXED_TIME}`);
      }
    }
  });

  it('does not remove a lock it never acquired', () => {
    const io = new MemoryStateIO();
    new StateLock(io, () => FIXED_TIME, 1).acquire('deploy');
    new StateLock(io, () => FIXED_TIME, 2).release();
    expect(io.readText(LOCK_FILE)).toBeDefined();
  });

  it('can be acquired again after release', () => {
    const io = new MemoryStateIO();
    const lock = new StateLock(io, () => FIXED_TIME, 1);
    lock.acquire('deploy');
    lock.release();
    lock.acquire('destroy');
    expect(lock.holder()?.command).toBe('destroy');
  });

  it('treats an unreadable lock file as held by an unknown owner', () => {
    const io = new MemoryStateIO();
    io.createExclusive(LOCK_FILE, 'garbage');
    const lock = new StateLock(io, () => FIXED_TIME, 1);
    expect(lock.holder()).toBeUndefined();
    expect(() => lock.acquire('deploy')).toThrow('Another wharf invocation holds the deploy lock');
  });
});
