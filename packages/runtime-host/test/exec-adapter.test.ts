/**
 * Wharf Runtime Host — NodeExecAdapter Tests
 *
 * Runs the Node binary executing these tests as the child process.
 */

import { describe, it, expect } from 'vitest';
import { realpath } from 'node:fs/promises';
import { NodeExecAdapter } from '../src/adapters/exec.js';
import { tempDir } from './fakes.js';

describe('NodeExecAdapter', () => {
  it('runs in the requested working directory', async () => {
    const cwd = await realpath(tempDir('exec'));
    const result = await new NodeExecAdapter().run(process.execPath, ['-e', 'process.stdout.write(process.cwd())'], { cwd });
    expect(result.exitCode).toBe(0);
    expect(await realpath(result.stdout)).toBe(cwd);
  });

  it('merges the requested environment over the parent environment', async () => {
    const result = await new NodeExecAdapter().run(
      process.execPath,
      ['-e', 'process.stdout.write(String(process.env.WHARF_TEST_VALUE) + ":" + String(process.env.PATH !== undefined))'],
      { env: { WHARF_TEST_VALUE: 'x' } },
    );
    expect(result.stdout).toBe('x:true');
  });

  it('resolves with a non-zero exit code and captured stderr', async () => {
    const result = await new NodeExecAdapter().run(process.execPath, ['-e', 'process.stderr.write("bad"); process.exit(3)']);
    expect(result).toEqual({ exitCode: 3, stdout: '', stderr: 'bad' });
  });

  it('rejects when the command cannot be started', async () => {
    await expect(new NodeExecAdapter().run('wharf-no-such-command', [])).rejects.toThrow();
  });
});
