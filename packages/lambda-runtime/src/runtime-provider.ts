/**
 * Wharf Lambda Runtime — Runtime Capability Provider
 *
 * The `awslambda:runtime` capability. The host binds an actor to it with
 * BindActor from `system`, which starts a poller for that actor against the
 * configured runtime API; RemoveActor stops it. Nothing else is accepted.
 */

import { RuntimeClient } from './client.js';
import type { InvocationClient } from './client.js';
import {
  CapabilityConfigurationSchema,
  decodeMessage,
  OP_BIND_ACTOR,
  OP_REMOVE_ACTOR,
} from './codec.js';
import type { CapabilityConfiguration } from './codec.js';
import { errorMessage } from './log.js';
import type { RuntimeLog } from './log.js';
import { NULL_DISPATCHER, Poller } from './poller.js';
import type { Dispatcher } from './poller.js';

export const CAPABILITY_ID = 'awslambda:runtime';
export const SYSTEM_ACTOR = 'system';

/** A host-side capability an actor can be bound to. */
export interface CapabilityProvider {
  readonly capabilityId: string;
  readonly name: string;
  configureDispatch(dispatcher: Dispatcher): void;
  handleCall(actor: string, operation: string, message: Uint8Array): Promise<Uint8Array>;
}

export interface LambdaRuntimeProviderOptions {
  readonly log: RuntimeLog;
  readonly createClient?: ((endpoint: string) => InvocationClient) | undefined;
  readonly setTraceId?: ((traceId: string) => void) | undefined;
  readonly idleDelayMs?: number | undefined;
}

export class LambdaRuntimeProvider implements CapabilityProvider {
  readonly capabilityId = CAPABILITY_ID;
  readonly name = 'Wharf AWS Lambda runtime provider';

  private dispatcher: Dispatcher = NULL_DISPATCHER;
  private readonly pollers = new Map<string, Poller>();
  private readonly draining = new Set<Promise<void>>();
  private readonly log: RuntimeLog;
  private readonly createClient: (endpoint: string) => InvocationClient;

  constructor(private readonly options: LambdaRuntimeProviderOptions) {
    this.log = options.log;
    this.createClient = options.createClient ?? ((endpoint) => new RuntimeClient(endpoint, { log: options.log }));
  }

  configureDispatch(dispatcher: Dispatcher): void {
    this.log.debug(`${CAPABILITY_ID} configure_dispatch`);
    this.dispatcher = dispatcher;
  }

  async handleCall(actor: string, operation: string, message: Uint8Array): Promise<Uint8Array> {
    this.log.info(`${CAPABILITY_ID} handle_call '${operation}' from '${actor}'`);
    if (actor === SYSTEM_ACTOR && operation === OP_BIND_ACTOR) {
      this.startPolling(decodeMessage(CapabilityConfigurationSchema, message, 'capability configuration'));
    } else if (actor === SYSTEM_ACTOR && operation === OP_REMOVE_ACTOR) {
      this.stopPolling(decodeMessage(CapabilityConfigurationSchema, message, 'capability configuration'));
    } else {
      throw new Error(`Unsupported operation: ${operation}`);
    }
    return new Uint8Array(0);
  }

  /** Actors with a running poller. */
  running(): string[] {
    return [...this.pollers.keys()].sort();
  }

  /** Stop every poller and wait for all of them to finish. */
  async shutdown(): Promise<void> {
    for (const actor of [...this.pollers.keys()]) {
      this.stop(actor);
    }
    await Promise.all([...this.draining]);
  }

  private startPolling(config: CapabilityConfiguration): void {
    this.log.debug(`${CAPABILITY_ID} start_polling`);
    const endpoint = config.values['AWS_LAMBDA_RUNTIME_API'];
    if (endpoint === undefined || endpoint === '') {
      throw new Error('Missing configuration value: AWS_LAMBDA_RUNTIME_API');
    }
    if (this.pollers.has(config.module)) {
      throw new Error(`A poller is already running for actor ${config.module}`);
    }
    const poller = new Poller({
      actor: config.module,
      client: this.createClient(endpoint),
      dispatcher: () => this.dispatcher,
      log: this.log,
      setTraceId: this.options.setTraceId,
      idleDelayMs: this.options.idleDelayMs,
    });
    const done: Promise<void> = poller
      .run()
      .catch((err: unknown) => {
        this.log.error(`Poller for actor ${config.module} failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.draining.delete(done);
      });
    this.pollers.set(config.module, poller);
    this.draining.add(done);
  }

  private stopPolling(config: CapabilityConfiguration): void {
    this.log.debug(`${CAPABILITY_ID} stop_polling`);
    if (!this.pollers.has(config.module)) {
      this.log.error(`Received request to stop poller for unknown actor ${config.module}. Ignoring`);
      return;
    }
    this.stop(config.module);
  }

  private stop(actor: string): void {
    const poller = this.pollers.get(actor);
    if (poller === undefined) return;
    poller.stop();
    this.pollers.delete(actor);
  }
}
