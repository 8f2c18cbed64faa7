/**
 * Wharf Runtime Host — Deploy Lock
 *
 * An advisory lock file (`state/deploy.lock`) created exclusively when a
 * state-changing command starts and removed when it ends, whether it
 * succeeded or failed. A second invocation that finds the lock is rejected
 * with ConcurrentModificationError.
 *
 * A lock left behind by a crashed process must be removed by the operator
 * (`wharf status` shows its owner).
 */

import { ApplyError, systemClock } from '@wharf/kernel';
import type { Clock } from '@wharf/kernel';
import { z } from 'zod';
import type { StateIO } from './state-io.js';

export const LOCK_FILE = 'deploy.lock';

const LockInfoSchema = z.object({
  pid: z.number().int(),
  command: z.string(),
  acquired_at: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export class StateLock {
  private held = false;

  constructor(
    private readonly io: StateIO,
    private readonly clock: Clock = systemClock,
    private readonly pid: number = process.pid,
  ) {}

  /** The current holder, if the lock file exists and is readable. */
  holder(): LockInfo | undefined {
    const raw = this.io.readText(LOCK_FILE);
    if (raw === undefined) return undefined;
    try {
      const parsed = LockInfoSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : undefined;
    } catch (err: unknown) {
      if (err instanceof SyntaxError) return undefined;
      throw err;
    }
  }

  /** @throws {ApplyError} ConcurrentModificationError when the lock is held */
  acquire(command: string): void {
    const info: LockInfo = { pid: this.pid, command, acquired_at: this.clock() };
    if (!this.io.createExclusive(LOCK_FILE, JSON.stringify(info) + '\n')) {
      const holder = this.holder();
      throw new ApplyError(
        'ConcurrentModificationError',
        'Another wharf invocation holds the deploy lock',
        holder !== undefined
          ? `lock held by pid ${holder.pid} (${holder.command}) since ${holder.acquired_at}`
          : `remove ${LOCK_FILE} if no other invocation is running`,
      );
    }
    this.held = true;
  }

  release(): void {
    if (!this.held) return;
    this.io.remove(LOCK_FILE);
    this.held = false;
  }
}
