/**
 * Wharf Simulated Provider — Request Validation
 *
 * The shape each API call accepts, per resource kind. Attributes the stack
 * may declare but the simulated API ignores (descriptions, authorization)
 * pass through unvalidated.
 */

import { z } from 'zod';

const name = z.string().min(1);

export const RoleRequest = z.object({
  name: z.string().regex(/^[\w+=,.@-]{1,64}$/, 'must be 1-64 characters of [A-Za-z0-9+=,.@_-]'),
  assume_role_service: name,
});

export const PolicyAttachmentRequest = z.object({
  role: name,
  policy_arn: z.string().startsWith('arn:', 'must be an ARN'),
});

export const FunctionRequest = z.object({
  name: z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, 'must be 1-64 characters of [A-Za-z0-9_-]'),
  runtime: name,
  handler: name,
  role: name,
  package: name,
  source_hash: name,
  memory_size: z.number().int().min(128).max(10240).optional(),
  timeout: z.number().int().min(1).max(900).optional(),
  environment: z.record(z.string()).optional(),
});

export const PermissionRequest = z.object({
  function: name,
  principal: name,
  source_arn: name,
  action: name.optional(),
  statement_id: z.string().regex(/^[A-Za-z0-9_-]{1,100}$/).optional(),
});

export const ApiRequest = z.object({
  name,
});

export const RouteRequest = z.object({
  rest_api: name,
  path_part: z.string().regex(/^(\{[A-Za-z0-9_]+\+?\}|[A-Za-z0-9._~-]+)$/, 'must be one path segment'),
  http_method: z.enum(['ANY', 'GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']),
  parent_id: name.optional(),
});

export const IntegrationRequest = z.object({
  rest_api: name,
  route: name,
  uri: name,
});

export const DeploymentRequest = z.object({
  rest_api: name,
  stage_name: z.string().regex(/^[A-Za-z0-9_-]{1,128}$/, 'must be 1-128 characters of [A-Za-z0-9_-]'),
});
