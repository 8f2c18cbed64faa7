/**
 * Wharf Runtime Host — nk Key Generator
 *
 * Shells out to `nk gen <role>` and reads the `Seed:` and `Public Key:`
 * lines it prints. The seed is decoded and its public key re-derived, so a
 * tool that prints mismatched lines is caught here rather than at signing.
 */

import { KeyError } from '@wharf/kernel';
import type { ExecAdapter, KeyGenerator, KeyPair, KeyRole } from '@wharf/kernel';
import { keyPairFromSeedText } from './key-material.js';

function field(output: string, label: string): string | undefined {
  const pattern = new RegExp(`^\\s*${label}:\\s*(\\S+)\\s*$`, 'm');
  return pattern.exec(output)?.[1];
}

export class NkKeyGenerator implements KeyGenerator {
  constructor(
    private readonly exec: ExecAdapter,
    private readonly command: string = 'nk',
  ) {}

  async generate(role: KeyRole): Promise<KeyPair> {
    let result;
    try {
      result = await this.exec.run(this.command, ['gen', role]);
    } catch (err: unknown) {
      throw new KeyError('GenerationFailed', `Failed to start '${this.command}'`, String(err));
    }
    if (result.exitCode !== 0) {
      throw new KeyError(
        'GenerationFailed',
        `'${this.command} gen ${role}' exited with code ${result.exitCode}`,
        result.stderr.trim(),
      );
    }

    const seed = field(result.stdout, 'Seed');
    const publicKey = field(result.stdout, 'Public Key');
    if (seed === undefined || publicKey === undefined) {
      throw new KeyError('GenerationFailed', `Could not read a seed and public key from '${this.command}' output`, result.stdout.trim());
    }

    let pair: KeyPair;
    try {
      pair = keyPairFromSeedText(seed, role);
    } catch (err: unknown) {
      if (err instanceof KeyError) {
        throw new KeyError('GenerationFailed', `'${this.command}' printed an invalid seed`, err.message);
      }
      throw err;
    }
    if (pair.public_key !== publicKey) {
      throw new KeyError('GenerationFailed', `'${this.command}' printed a public key that does not match its seed`);
    }
    return pair;
  }
}
