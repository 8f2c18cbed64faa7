/**
 * Wharf Kernel — Deploy Events
 *
 * Every pipeline step that changes something on disk or in the cloud is
 * recorded as one DeployEvent in the append-only deploy log. Failures are
 * recorded too: a partial apply must be reconstructable from the log alone.
 */

export type DeployEventType =
  | 'key.generated'
  | 'artifact.built'
  | 'artifact.signed'
  | 'plan.created'
  | 'resource.created'
  | 'resource.updated'
  | 'resource.replaced'
  | 'resource.deleted'
  | 'apply.completed'
  | 'apply.failed'
  | 'lock.rejected';

export interface DeployEvent {
  readonly type: DeployEventType;
  /** ISO 8601 timestamp, taken from the injected clock. */
  readonly timestamp: string;
  readonly resource_id?: string | undefined;
  readonly resource_kind?: string | undefined;
  /** State serial after the event, for state-changing events. */
  readonly serial?: number | undefined;
  /** Public key, content hash, operation count or error text. */
  readonly detail?: string | undefined;
}
