/**
 * Wharf Lambda Runtime — Bootstrap
 *
 * Starts the runtime inside a function: reads the function settings, wires
 * the runtime provider to the host's dispatcher and binds the actor.
 */

import { encodeCapabilityConfiguration, OP_BIND_ACTOR } from './codec.js';
import type { InvocationClient } from './client.js';
import { ConsoleRuntimeLog } from './log.js';
import type { RuntimeLog } from './log.js';
import type { Dispatcher } from './poller.js';
import { LambdaRuntimeProvider, SYSTEM_ACTOR } from './runtime-provider.js';
import { loadFunctionSettings } from './settings.js';

export interface StartRuntimeOptions {
  /** Public key (subject) of the actor the function serves. */
  readonly actor: string;
  readonly dispatcher: Dispatcher;
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  readonly log?: RuntimeLog | undefined;
  readonly createClient?: ((endpoint: string) => InvocationClient) | undefined;
  readonly idleDelayMs?: number | undefined;
}

export async function startRuntime(options: StartRuntimeOptions): Promise<LambdaRuntimeProvider> {
  const env = options.env ?? process.env;
  const log = options.log ?? ConsoleRuntimeLog.fromEnv(env);
  log.info('wharf-lambda-runtime starting');

  const settings = loadFunctionSettings(env);
  const provider = new LambdaRuntimeProvider({
    log,
    createClient: options.createClient,
    idleDelayMs: options.idleDelayMs,
  });
  provider.configureDispatch(options.dispatcher);
  await provider.handleCall(
    SYSTEM_ACTOR,
    OP_BIND_ACTOR,
    encodeCapabilityConfiguration({ module: options.actor, values: settings }),
  );
  return provider;
}
