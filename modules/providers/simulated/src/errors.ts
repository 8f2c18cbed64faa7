/**
 * Wharf Simulated Provider — API Errors
 *
 * Rejections carry an AWS-style error code. The provisioner reports them as
 * ExternalProviderRejected with this message as the detail.
 */

export type CloudErrorCode =
  | 'ValidationException'
  | 'ResourceNotFoundException'
  | 'ResourceConflictException'
  | 'DeleteConflict'
  | 'InjectedFault';

export class CloudApiError extends Error {
  constructor(
    readonly code: CloudErrorCode,
    detail: string,
  ) {
    super(`${code}: ${detail}`);
    this.name = 'CloudApiError';
  }
}
