/**
 * Wharf Lambda Runtime — Host/Actor Messages
 *
 * Messages between the runtime and the actor it serves are JSON documents;
 * binary bodies travel as base64 strings. Everything decoded is validated.
 *
 * Operations:
 *   BindActor / RemoveActor   host → runtime provider (CapabilityConfiguration)
 *   HandleRequest             runtime → actor (HttpRequest → HttpResponse)
 *   HandleEvent               runtime → actor (LambdaEvent → LambdaResponse)
 */

import { z } from 'zod';

export const OP_BIND_ACTOR = 'BindActor';
export const OP_REMOVE_ACTOR = 'RemoveActor';
export const OP_HANDLE_REQUEST = 'HandleRequest';
export const OP_HANDLE_EVENT = 'HandleEvent';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const Base64Body = z.string().transform((text) => Buffer.from(text, 'base64'));

export const CapabilityConfigurationSchema = z.object({
  module: z.string().min(1),
  values: z.record(z.string()),
});

export const HttpRequestSchema = z.object({
  method: z.string(),
  path: z.string(),
  query_string: z.string(),
  header: z.record(z.string()),
  body: Base64Body,
});

export const HttpResponseSchema = z.object({
  status_code: z.number().int(),
  status: z.string(),
  header: z.record(z.string()),
  body: Base64Body,
});

export const LambdaEventSchema = z.object({ body: Base64Body });
export const LambdaResponseSchema = z.object({ body: Base64Body });

export type CapabilityConfiguration = z.infer<typeof CapabilityConfigurationSchema>;
export type HttpRequest = z.infer<typeof HttpRequestSchema>;
export type HttpResponse = z.infer<typeof HttpResponseSchema>;
export type LambdaEvent = z.infer<typeof LambdaEventSchema>;
export type LambdaResponse = z.infer<typeof LambdaResponseSchema>;

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function bytes(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value), 'utf-8');
}

export function encodeCapabilityConfiguration(config: CapabilityConfiguration): Buffer {
  return bytes(config);
}

export function encodeHttpRequest(request: HttpRequest): Buffer {
  return bytes({ ...request, body: request.body.toString('base64') });
}

export function encodeHttpResponse(response: HttpResponse): Buffer {
  return bytes({ ...response, body: response.body.toString('base64') });
}

export function encodeLambdaEvent(event: LambdaEvent): Buffer {
  return bytes({ body: event.body.toString('base64') });
}

export function encodeLambdaResponse(response: LambdaResponse): Buffer {
  return bytes({ body: response.body.toString('base64') });
}

/**
 * Parse and validate a message.
 * @throws {Error} naming `what` when the bytes are not JSON or do not match
 */
export function decodeMessage<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, message: Uint8Array, what: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(message).toString('utf-8'));
  } catch (err: unknown) {
    throw new Error(`Failed to deserialize ${what}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Failed to deserialize ${what}: ${issues}`);
  }
  return parsed.data;
}
