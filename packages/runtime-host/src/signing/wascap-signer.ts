/**
 * Wharf Runtime Host — wascap Signer
 *
 *   wascap sign <in> <out> --issuer <account.nk> --subject <module.nk> \
 *     --cap <claim>... --name <name>
 *
 * The external tool reads keys from files, so both key pairs must have been
 * loaded from disk.
 */

import { BuildError } from '@wharf/kernel';
import type { ExecAdapter, KeyPair, SignRequest, Signer } from '@wharf/kernel';

function keyPath(pair: KeyPair): string {
  if (pair.path === undefined) {
    throw new BuildError('SigningFailed', `The ${pair.role} key has no file path; wascap reads keys from files`);
  }
  return pair.path;
}

export class WascapSigner implements Signer {
  constructor(
    private readonly exec: ExecAdapter,
    private readonly command: string = 'wascap',
  ) {}

  async sign(request: SignRequest): Promise<void> {
    const args = [
      'sign',
      request.modulePath,
      request.outputPath,
      '--issuer',
      keyPath(request.keys.issuer),
      '--subject',
      keyPath(request.keys.subject),
      ...request.capabilities.flatMap((claim) => ['--cap', claim.name]),
      '--name',
      request.name,
    ];

    let result;
    try {
      result = await this.exec.run(this.command, args);
    } catch (err: unknown) {
      throw new BuildError('SigningFailed', `Failed to start '${this.command}'`, String(err));
    }
    if (result.exitCode !== 0) {
      throw new BuildError(
        'SigningFailed',
        `'${this.command} sign' exited with code ${result.exitCode}`,
        result.stderr.trim(),
      );
    }
  }
}
