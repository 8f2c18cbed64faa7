/**
 * Wharf Lambda Runtime — Poller
 *
 * Pulls invocation events for one actor and answers each one:
 *
 *   1. no event, or an event without a request id: skipped
 *   2. the trace id is exported as `_X_AMZN_TRACE_ID`
 *   3. a request id that was already dispatched is answered with an error
 *   4. the event is tried as an ALB HTTP request (HandleRequest)
 *   5. when it is not one, or fails before reaching the actor, it is
 *      dispatched as a raw event (HandleEvent)
 *   6. the actor's answer is sent as the response; a failure as the error
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { parseAlbRequest, toAlbResponse, toHttpRequest } from './alb.js';
import type { InvocationClient, InvocationEvent } from './client.js';
import {
  decodeMessage,
  encodeHttpRequest,
  encodeLambdaEvent,
  HttpResponseSchema,
  LambdaResponseSchema,
  OP_HANDLE_EVENT,
  OP_HANDLE_REQUEST,
} from './codec.js';
import { errorMessage } from './log.js';
import type { RuntimeLog } from './log.js';

/** Delivers a message to an actor and returns its reply. */
export interface Dispatcher {
  dispatch(actor: string, operation: string, message: Uint8Array): Promise<Uint8Array>;
}

/** The dispatcher in place until the host configures one. */
export const NULL_DISPATCHER: Dispatcher = {
  async dispatch(actor: string, operation: string): Promise<Uint8Array> {
    throw new Error(`No dispatcher configured for ${operation} on ${actor}`);
  },
};

export const TRACE_ID_VARIABLE = '_X_AMZN_TRACE_ID';

export interface PollerOptions {
  readonly actor: string;
  readonly client: InvocationClient;
  /** Read on every dispatch, so a reconfigured dispatcher takes effect. */
  readonly dispatcher: () => Dispatcher;
  readonly log: RuntimeLog;
  readonly setTraceId?: ((traceId: string) => void) | undefined;
  /** Pause after a poll that handled nothing. */
  readonly idleDelayMs?: number | undefined;
}

type HttpAttempt =
  | { readonly kind: 'not-http' }
  | { readonly kind: 'response'; readonly body: Buffer }
  | { readonly kind: 'failed'; readonly message: string; readonly dispatched: boolean };

export class Poller {
  readonly actor: string;
  private readonly client: InvocationClient;
  private readonly dispatcher: () => Dispatcher;
  private readonly log: RuntimeLog;
  private readonly setTraceId: (traceId: string) => void;
  private readonly idleDelayMs: number;
  private readonly dispatched = new Set<string>();
  private stopped = false;

  constructor(options: PollerOptions) {
    this.actor = options.actor;
    this.client = options.client;
    this.dispatcher = options.dispatcher;
    this.log = options.log;
    this.setTraceId =
      options.setTraceId ??
      ((traceId) => {
        process.env[TRACE_ID_VARIABLE] = traceId;
      });
    this.idleDelayMs = options.idleDelayMs ?? 100;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Takes effect once the poll in flight completes. */
  stop(): void {
    this.stopped = true;
  }

  async run(): Promise<void> {
    this.log.info(`Starting poller for actor ${this.actor}`);
    while (!this.stopped) {
      const handled = await this.pollOnce();
      if (!handled && !this.stopped && this.idleDelayMs > 0) {
        await sleep(this.idleDelayMs);
      }
    }
    this.log.info(`Poller for actor ${this.actor} stopped`);
  }

  /** Handle at most one event. Resolves false when there was none to handle. */
  async pollOnce(): Promise<boolean> {
    this.log.debug('Poller get next event');
    let event: InvocationEvent | undefined;
    try {
      event = await this.client.nextInvocationEvent();
    } catch (err: unknown) {
      this.log.error('Failed to get the next invocation event', err);
      return false;
    }
    if (event === undefined) {
      this.log.warn('No event');
      return false;
    }
    const requestId = event.requestId;
    if (requestId === undefined) {
      this.log.warn('No request ID');
      return false;
    }
    if (event.traceId !== undefined) {
      this.setTraceId(event.traceId);
    }

    if (this.dispatched.has(requestId)) {
      await this.sendError(requestId, `Already dispatched: ${requestId}`);
      return true;
    }

    const http = await this.tryHttpRequest(event.body, requestId);
    switch (http.kind) {
      case 'response':
        await this.sendResponse(requestId, http.body);
        return true;
      case 'failed':
        if (http.dispatched) {
          this.log.error(http.message);
          await this.sendError(requestId, http.message);
          return true;
        }
        this.log.warn(http.message);
        break;
      case 'not-http':
        break;
    }

    try {
      const body = await this.dispatchEvent(event.body, requestId);
      await this.sendResponse(requestId, body);
    } catch (err: unknown) {
      this.log.error(errorMessage(err));
      await this.sendError(requestId, errorMessage(err));
    }
    return true;
  }

  private async tryHttpRequest(payload: Buffer, requestId: string): Promise<HttpAttempt> {
    const alb = parseAlbRequest(payload);
    if (alb === undefined) return { kind: 'not-http' };

    let message: Buffer;
    try {
      message = encodeHttpRequest(toHttpRequest(alb));
    } catch (err: unknown) {
      return { kind: 'failed', message: errorMessage(err), dispatched: false };
    }

    this.log.info('Poller dispatch HTTP request');
    let reply: Uint8Array;
    try {
      reply = await this.dispatcher().dispatch(this.actor, OP_HANDLE_REQUEST, message);
    } catch (err: unknown) {
      return { kind: 'failed', message: `Guest failed to handle HTTP request: ${errorMessage(err)}`, dispatched: false };
    }
    this.dispatched.add(requestId);

    try {
      const response = decodeMessage(HttpResponseSchema, reply, 'HTTP response');
      return { kind: 'response', body: Buffer.from(JSON.stringify(toAlbResponse(response)), 'utf-8') };
    } catch (err: unknown) {
      return { kind: 'failed', message: errorMessage(err), dispatched: true };
    }
  }

  private async dispatchEvent(payload: Buffer, requestId: string): Promise<Buffer> {
    this.log.info('Poller dispatch Lambda raw event');
    let reply: Uint8Array;
    try {
      reply = await this.dispatcher().dispatch(this.actor, OP_HANDLE_EVENT, encodeLambdaEvent({ body: payload }));
    } catch (err: unknown) {
      throw new Error(`Guest failed to handle Lambda event: ${errorMessage(err)}`);
    }
    this.dispatched.add(requestId);
    return decodeMessage(LambdaResponseSchema, reply, 'Lambda response').body;
  }

  private async sendResponse(requestId: string, body: Buffer): Promise<void> {
    this.log.debug('Poller send response');
    try {
      await this.client.sendInvocationResponse(requestId, body);
    } catch (err: unknown) {
      this.log.error('Unable to send invocation response', err);
    }
  }

  private async sendError(requestId: string, message: string): Promise<void> {
    this.log.debug('Poller send error');
    try {
      await this.client.sendInvocationError(requestId, message);
    } catch (err: unknown) {
      this.log.error('Unable to send invocation error', err);
    }
  }
}
