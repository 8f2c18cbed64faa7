/**
 * Wharf Runtime Host — Embedded Signer
 *
 * Signs in-process: reads the unsigned module, embeds a claims token in its
 * `jwt` custom section and writes the signed module. Produces the same
 * layout as wascap without needing the tool installed.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { BuildError, embedClaims } from '@wharf/kernel';
import type { SignRequest, Signer } from '@wharf/kernel';

export class EmbeddedSigner implements Signer {
  sign(request: SignRequest): Promise<void> {
    try {
      const module = readFileSync(request.modulePath);
      const signed = embedClaims(module, {
        name: request.name,
        capabilities: request.capabilities,
        keys: request.keys,
      });
      writeFileSync(request.outputPath, signed);
      return Promise.resolve();
    } catch (err: unknown) {
      if (err instanceof BuildError) return Promise.reject(err);
      const detail = err instanceof Error ? err.message : String(err);
      return Promise.reject(new BuildError('SigningFailed', `Could not sign ${request.modulePath}`, detail));
    }
  }
}
