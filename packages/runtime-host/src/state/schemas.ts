/**
 * Wharf Runtime Host — Persisted Record Schemas
 *
 * Everything read back from disk is validated before use. A record that
 * fails validation is reported as ConfigError{InvalidState}; it is never
 * replaced by an empty default.
 */

import { ResourceKind } from '@wharf/stack-dsl';
import type { AttributeValue } from '@wharf/stack-dsl';
import { z } from 'zod';

export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(AttributeValueSchema), z.record(AttributeValueSchema)]),
);

export const AppliedResourceSchema = z.object({
  id: z.string().min(1),
  kind: z.nativeEnum(ResourceKind),
  attributes: z.record(AttributeValueSchema),
  computed: z.record(AttributeValueSchema),
  depends_on: z.array(z.string()),
  created_at: z.string(),
  updated_at: z.string(),
});

export const DeployedStateSchema = z
  .object({
    version: z.literal(1),
    lineage: z.string().min(1),
    serial: z.number().int().nonnegative(),
    resources: z.record(AppliedResourceSchema),
    outputs: z.record(z.string()),
    updated_at: z.string(),
  })
  .superRefine((state, ctx) => {
    for (const [key, resource] of Object.entries(state.resources)) {
      if (key !== resource.id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['resources', key, 'id'],
          message: `Resource stored under '${key}' has id '${resource.id}'`,
        });
      }
    }
  });

const KeyIdentitySchema = z.object({
  role: z.enum(['account', 'module']),
  public_key: z.string().min(1),
});

export const ArtifactRecordSchema = z.object({
  name: z.string().min(1),
  unsigned_path: z.string().min(1),
  signed_path: z.string().min(1),
  content_hash: z.string().regex(/^[0-9a-f]{64}$/),
  capabilities: z.array(z.object({ name: z.string() })),
  issuer: KeyIdentitySchema,
  subject: KeyIdentitySchema,
  built_at: z.string(),
});

/** `path: message` for each issue, one per line. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
