/**
 * Poller: HTTP and raw event dispatch, fallbacks, duplicate request ids and
 * failures on both sides of the actor.
 */

import { describe, expect, it } from 'vitest';
import {
  decodeMessage,
  encodeHttpResponse,
  encodeLambdaResponse,
  HttpRequestSchema,
  LambdaEventSchema,
  OP_HANDLE_EVENT,
  OP_HANDLE_REQUEST,
} from '../src/codec.js';
import { Poller } from '../src/poller.js';
import type { Dispatcher } from '../src/poller.js';
import { captureLog, event, FakeClient, FakeDispatcher } from './fakes.js';

const ALB_REQUEST = JSON.stringify({
  httpMethod: 'GET',
  path: '/helloworld',
  queryStringParameters: { name: 'wharf' },
  headers: { accept: 'text/plain' },
  body: '',
  isBase64Encoded: false,
});

/** An actor that greets HTTP requests and echoes raw events. */
function helloActor(): FakeDispatcher {
  return new FakeDispatcher((operation, message) => {
    if (operation === OP_HANDLE_REQUEST) {
      return encodeHttpResponse({
        status_code: 200,
        status: 'OK',
        header: { 'content-type': 'text/plain' },
        body: Buffer.from('Hello, world'),
      });
    }
    const raw = decodeMessage(LambdaEventSchema, message, 'Lambda event');
    return encodeLambdaResponse({ body: Buffer.from(`echo ${raw.body.toString('utf-8')}`) });
  });
}

function makePoller(client: FakeClient, dispatcher: Dispatcher, traces: string[] = []) {
  const { log, lines } = captureLog();
  const poller = new Poller({
    actor: 'MACTOR',
    client,
    dispatcher: () => dispatcher,
    log,
    setTraceId: (traceId) => traces.push(traceId),
    idleDelayMs: 0,
  });
  return { poller, lines };
}

describe('Poller', () => {
  it('serves an ALB request as HTTP and answers with an ALB response', async () => {
    const client = new FakeClient([event(ALB_REQUEST, 'req-1')]);
    const actor = helloActor();
    const { poller } = makePoller(client, actor);

    expect(await poller.pollOnce()).toBe(true);

    const call = actor.calls[0];
    expect(actor.calls.map((c) => c.operation)).toEqual([OP_HANDLE_REQUEST]);
    expect(call?.actor).toBe('MACTOR');
    const seen = decodeMessage(HttpRequestSchema, call?.message ?? Buffer.alloc(0), 'HTTP request');
    expect(seen.method).toBe('GET');
    expect(seen.path).toBe('/helloworld');
    expect(seen.query_string).toBe('name=wharf');
    expect(seen.header).toEqual({ accept: 'text/plain' });
    expect(seen.body.length).toBe(0);

    expect(client.responses).toHaveLength(1);
    const [requestId, body] = client.responses[0] ?? ['', ''];
    expect(requestId).toBe('req-1');
    expect(JSON.parse(body)).toEqual({
      statusCode: 200,
      statusDescription: 'OK',
      headers: { 'content-type': 'text/plain' },
      multiValueHeaders: {},
      body: Buffer.from('Hello, world').toString('base64'),
      isBase64Encoded: true,
    });
  });

  it('decodes a base64 ALB body before dispatch', async () => {
    const request = JSON.stringify({
      httpMethod: 'POST',
      path: '/helloworld',
      body: Buffer.from('payload').toString('base64'),
      isBase64Encoded: true,
    });
    const actor = helloActor();
    const { poller } = makePoller(new FakeClient([event(request, 'req-1')]), actor);
    await poller.pollOnce();
    const seen = decodeMessage(HttpRequestSchema, actor.calls[0]?.message ?? Buffer.alloc(0), 'HTTP request');
    expect(seen.body.toString('utf-8')).toBe('payload');
    expect(seen.query_string).toBe('');
  });

  it('falls back to a raw event when the JSON is not an HTTP request', async () => {
    const client = new FakeClient([event('{"detail":"tick"}', 'req-1')]);
    const actor = helloActor();
    const { poller, lines } = makePoller(client, actor);

    await poller.pollOnce();

    expect(actor.calls.map((c) => c.operation)).toEqual([OP_HANDLE_EVENT]);
    expect(client.responses).toEqual([['req-1', 'echo {"detail":"tick"}']]);
    expect(lines).toContain('WARN Missing method in ALB request');
  });

  it('dispatches a non-JSON payload as a raw event', async () => {
    const client = new FakeClient([event('plain text', 'req-1')]);
    const actor = helloActor();
    const { poller } = makePoller(client, actor);

    await poller.pollOnce();

    expect(actor.calls.map((c) => c.operation)).toEqual([OP_HANDLE_EVENT]);
    expect(client.responses).toEqual([['req-1', 'echo plain text']]);
  });

  it('exports the trace id', async () => {
    const traces: string[] = [];
    const { poller } = makePoller(new FakeClient([event('x', 'req-1', 'Root=1-abc')]), helloActor(), traces);
    await poller.pollOnce();
    expect(traces).toEqual(['Root=1-abc']);
  });

  it('skips polls without an event or without a request id', async () => {
    const client = new FakeClient([event('x')]);
    const actor = helloActor();
    const { poller, lines } = makePoller(client, actor);

    expect(await poller.pollOnce()).toBe(false);
    expect(await poller.pollOnce()).toBe(false);

    expect(actor.calls).toEqual([]);
    expect(lines.filter((l) => l.startsWith('WARN'))).toEqual(['WARN No request ID', 'WARN No event']);
  });

  it('refuses a request id that was already dispatched', async () => {
    const client = new FakeClient([event('x', 'req-1'), event('x', 'req-1')]);
    const actor = helloActor();
    const { poller } = makePoller(client, actor);

    await poller.pollOnce();
    await poller.pollOnce();

    expect(actor.calls).toHaveLength(1);
    expect(client.responses).toEqual([['req-1', 'echo x']]);
    expect(client.errors).toEqual([['req-1', 'Already dispatched: req-1']]);
  });

  it('retries a failed HTTP dispatch as a raw event and reports a second failure', async () => {
    const client = new FakeClient([event(ALB_REQUEST, 'req-1')]);
    const actor = new FakeDispatcher(() => new Error('boom'));
    const { poller, lines } = makePoller(client, actor);

    await poller.pollOnce();

    expect(actor.calls.map((c) => c.operation)).toEqual([OP_HANDLE_REQUEST, OP_HANDLE_EVENT]);
    expect(client.errors).toEqual([['req-1', 'Guest failed to handle Lambda event: boom']]);
    expect(lines).toContain('WARN Guest failed to handle HTTP request: boom');
  });

  it('reports an unreadable HTTP reply without dispatching again', async () => {
    const client = new FakeClient([event(ALB_REQUEST, 'req-1')]);
    const actor = new FakeDispatcher(() => Buffer.from('{"status":"OK"}'));
    const { poller } = makePoller(client, actor);

    await poller.pollOnce();

    expect(actor.calls).toHaveLength(1);
    expect(client.errors).toEqual([
      ['req-1', 'Failed to deserialize HTTP response: status_code: Required; header: Required; body: Required'],
    ]);
  });

  it('logs a failed poll and carries on', async () => {
    const client = new FakeClient([new Error('socket hang up'), event('x', 'req-1')]);
    const { poller, lines } = makePoller(client, helloActor());

    expect(await poller.pollOnce()).toBe(false);
    expect(await poller.pollOnce()).toBe(true);

    expect(lines).toContain('ERROR Failed to get the next invocation event: socket hang up');
    expect(client.responses).toEqual([['req-1', 'echo x']]);
  });

  it('logs a response that cannot be delivered', async () => {
    const client = new FakeClient([event('x', 'req-1')]);
    client.failSends = true;
    const { poller, lines } = makePoller(client, helloActor());

    expect(await poller.pollOnce()).toBe(true);
    expect(lines).toContain('ERROR Unable to send invocation response: socket hang up');
  });

  it('runs until stopped', async () => {
    const client = new FakeClient([event('x', 'req-1')]);
    const actor = helloActor();
    const { poller } = makePoller(client, actor);
    const original = client.sendInvocationResponse.bind(client);
    client.sendInvocationResponse = async (requestId, body) => {
      await original(requestId, body);
      poller.stop();
    };

    await poller.run();

    expect(poller.isStopped).toBe(true);
    expect(client.responses).toEqual([['req-1', 'echo x']]);
  });
});
