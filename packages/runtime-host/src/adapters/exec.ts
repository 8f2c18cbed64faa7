/**
 * Wharf Runtime Host — Subprocess Execution Adapter
 *
 * Implements the ExecAdapter interface from @wharf/kernel with
 * node:child_process.spawn. Every external tool the pipeline drives (cargo,
 * wascap, nk) runs through this adapter, so tests can swap in a fake.
 */

import { spawn } from 'node:child_process';
import type { ExecAdapter, ExecOptions, ExecResult } from '@wharf/kernel';

// ---------------------------------------------------------------------------
// NodeExecAdapter
// ---------------------------------------------------------------------------

/**
 * Spawns the command with no shell, collecting stdout and stderr.
 *
 * `options.env` is merged over the parent environment. A process killed by
 * the timeout or a signal resolves with exit code 1.
 */
export class NodeExecAdapter implements ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options: ExecOptions = {}): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

      child.on('close', (exitCode: number | null) => {
        resolve({
          exitCode: exitCode ?? 1,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        });
      });

      child.on('error', (err: Error) => { reject(err); });
    });
  }
}
