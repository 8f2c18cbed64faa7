/**
 * Wharf Simulated Provider — Cloud State
 *
 * The simulated cloud persists as `state/simulated-cloud.json` beside the
 * deployed state. Records are keyed by the stack's resource id; `counter`
 * feeds the generated physical ids; `timeline` is every API call in order,
 * rejected ones included.
 */

import { ResourceKind } from '@wharf/stack-dsl';
import { AttributeValueSchema } from '@wharf/runtime-host';
import { z } from 'zod';

export const CLOUD_FILE = 'simulated-cloud.json';

export const CloudRecordSchema = z.object({
  id: z.string().min(1),
  kind: z.nativeEnum(ResourceKind),
  attributes: z.record(AttributeValueSchema),
  computed: z.record(AttributeValueSchema),
  created_at: z.string(),
  updated_at: z.string(),
});

export type CloudRecord = z.infer<typeof CloudRecordSchema>;

export const TimelineEntrySchema = z.object({
  seq: z.number().int().positive(),
  at: z.string(),
  action: z.enum(['create', 'update', 'delete']),
  kind: z.nativeEnum(ResourceKind),
  id: z.string(),
  outcome: z.enum(['ok', 'rejected']),
  detail: z.string().optional(),
});

export type TimelineEntry = z.infer<typeof TimelineEntrySchema>;

export const CloudStateSchema = z.object({
  version: z.literal(1),
  counter: z.number().int().nonnegative(),
  records: z.record(CloudRecordSchema),
  timeline: z.array(TimelineEntrySchema),
});

export type CloudState = z.infer<typeof CloudStateSchema>;

export function emptyCloud(): CloudState {
  return { version: 1, counter: 0, records: {}, timeline: [] };
}
