/**
 * Wharf Runtime Host — LogReader
 *
 * Pure function for reading deploy.jsonl with dedupe-on-read.
 *
 * Guarantees:
 *   - every valid JSONL line whose shape is a deploy event is returned;
 *     malformed lines are dropped and counted in parseErrors
 *   - events are deduplicated by event_id, first seen wins
 *   - content not ending with '\n' has its last line dropped and flagged
 *     as a partial trailing line (a write interrupted mid-line)
 *   - more than one timestamp regression in file order flags outOfOrder
 *   - output is sorted by (timestamp asc, event_id asc)
 *
 * This function has no I/O. Callers obtain raw content via StateIO.readLogRaw().
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LoggedEventSchema = z
  .object({
    event_id: z.string().min(1),
    type: z.enum([
      'key.generated',
      'artifact.built',
      'artifact.signed',
      'plan.created',
      'resource.created',
      'resource.updated',
      'resource.replaced',
      'resource.deleted',
      'apply.completed',
      'apply.failed',
      'lock.rejected',
    ]),
    timestamp: z.string(),
    resource_id: z.string().optional(),
    resource_kind: z.string().optional(),
    serial: z.number().int().optional(),
    detail: z.string().optional(),
  })
  .passthrough();

/** A deploy event as stored in deploy.jsonl. */
export type LoggedEvent = z.infer<typeof LoggedEventSchema>;

export interface LogReadStats {
  /** Non-empty lines processed, before filtering. */
  totalLines: number;
  /** Events included in the output (after dedup). */
  parsedEvents: number;
  duplicates: number;
  parseErrors: number;
  partialTrailingLine: boolean;
  /** A single regression is tolerated (clock skew); more suggests reordering. */
  outOfOrder: boolean;
}

export interface LogReadResult {
  events: ReadonlyArray<LoggedEvent>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function parseLine(line: string): LoggedEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  const result = LoggedEventSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

/**
 * Parse, deduplicate and sort deploy log content.
 *
 * @param rawContent - Raw JSONL text content of the log file
 */
export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lineList = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const orderedEvents: LoggedEvent[] = [];

  for (const line of lineList) {
    const event = parseLine(line);
    if (event === undefined) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    orderedEvents.push(event);
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const event of orderedEvents) {
    if (previous !== undefined && event.timestamp < previous) regressions++;
    previous = event.timestamp;
  }

  const sorted = [...orderedEvents].sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    if (a.event_id < b.event_id) return -1;
    if (a.event_id > b.event_id) return 1;
    return 0;
  });

  return {
    events: sorted,
    stats: {
      totalLines: lineList.length,
      parsedEvents: orderedEvents.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}
