/**
 * Wharf Runtime Host — Cargo Compiler
 *
 * Compiles the actor crate to an unsigned WebAssembly module:
 *
 *   cargo build --target wasm32-unknown-unknown --color never [--release]
 *
 * run in the crate's source directory. The module is then found at
 * `target/wasm32-unknown-unknown/<profile>/<crate_name>.wasm`, where hyphens
 * in the crate name become underscores.
 */

import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { BuildError } from '@wharf/kernel';
import type { CompileOutput, CompileRequest, Compiler, ExecAdapter } from '@wharf/kernel';

export const WASM_TARGET = 'wasm32-unknown-unknown';

export function compiledModulePath(request: CompileRequest): string {
  const file = `${request.crate.replace(/-/g, '_')}.wasm`;
  return resolve(join(request.sourceDir, 'target', WASM_TARGET, request.profile, file));
}

export class CargoCompiler implements Compiler {
  constructor(
    private readonly exec: ExecAdapter,
    private readonly command: string = 'cargo',
  ) {}

  async compile(request: CompileRequest): Promise<CompileOutput> {
    const args = ['build', '--target', WASM_TARGET, '--color', 'never'];
    if (request.profile === 'release') args.push('--release');

    let result;
    try {
      result = await this.exec.run(this.command, args, { cwd: request.sourceDir });
    } catch (err: unknown) {
      throw new BuildError('CompilationFailed', `Failed to start '${this.command}'`, String(err));
    }
    if (result.exitCode !== 0) {
      throw new BuildError(
        'CompilationFailed',
        `'${this.command} build' exited with code ${result.exitCode}`,
        result.stderr.trim(),
      );
    }

    const modulePath = compiledModulePath(request);
    if (!existsSync(modulePath)) {
      throw new BuildError(
        'CompilationFailed',
        `Compiler reported success but produced no module at ${modulePath}`,
        result.stderr.trim(),
      );
    }
    return { modulePath, diagnostics: result.stderr };
  }
}
