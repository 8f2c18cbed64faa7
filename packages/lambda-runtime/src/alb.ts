/**
 * Wharf Lambda Runtime — ALB Target Group Events
 *
 * An invocation whose payload is an ALB target group request is served as
 * an HTTP request. Every field of the request is optional on the wire, so any
 * JSON object with fields of the right types parses; one without a method or
 * path fails conversion and is served as a raw event instead.
 */

import { z } from 'zod';
import type { HttpRequest, HttpResponse } from './codec.js';

export const AlbRequestSchema = z.object({
  httpMethod: z.string().nullish(),
  path: z.string().nullish(),
  queryStringParameters: z.record(z.string()).nullish(),
  headers: z.record(z.string()).nullish(),
  body: z.string().nullish(),
  isBase64Encoded: z.boolean().optional(),
});

export type AlbRequest = z.infer<typeof AlbRequestSchema>;

export interface AlbResponse {
  readonly statusCode: number;
  readonly statusDescription: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly multiValueHeaders: Readonly<Record<string, ReadonlyArray<string>>>;
  readonly body: string;
  readonly isBase64Encoded: boolean;
}

/** The payload as an ALB request; undefined when it is not one. */
export function parseAlbRequest(payload: Buffer): AlbRequest | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(payload.toString('utf-8'));
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
  const parsed = AlbRequestSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/** @throws {Error} when the request has no method or no path */
export function toHttpRequest(request: AlbRequest): HttpRequest {
  if (request.httpMethod === undefined || request.httpMethod === null) {
    throw new Error('Missing method in ALB request');
  }
  if (request.path === undefined || request.path === null) {
    throw new Error('Missing path in ALB request');
  }
  const body = request.body ?? undefined;
  return {
    method: request.httpMethod,
    path: request.path,
    query_string: new URLSearchParams(request.queryStringParameters ?? {}).toString(),
    header: request.headers ?? {},
    body:
      body === undefined
        ? Buffer.alloc(0)
        : request.isBase64Encoded === true
          ? Buffer.from(body, 'base64')
          : Buffer.from(body, 'utf-8'),
  };
}

export function toAlbResponse(response: HttpResponse): AlbResponse {
  return {
    statusCode: response.status_code,
    statusDescription: response.status,
    headers: response.header,
    multiValueHeaders: {},
    body: response.body.toString('base64'),
    isBase64Encoded: true,
  };
}
