/**
 * Wharf Kernel — Error Taxonomy
 *
 * Every failure the pipeline reports is a WharfError with a category, a
 * discriminating kind and the process exit code the CLI uses for it.
 * `detail` carries the diagnostic text of the external tool or provider,
 * printed verbatim below the one-line summary.
 *
 * Errors are never recovered inside the pipeline; they propagate unchanged
 * to the CLI boundary.
 */

export type ErrorCategory = 'build' | 'key' | 'apply' | 'config';

export type BuildErrorKind = 'CompilationFailed' | 'SigningFailed' | 'InvalidArtifact';
export type KeyErrorKind = 'NotFound' | 'GenerationFailed' | 'Invalid';
export type ApplyErrorKind =
  | 'DependencyCycle'
  | 'ExternalProviderRejected'
  | 'ConcurrentModificationError'
  | 'DependencyMissing';
export type ConfigErrorKind = 'InvalidConfig' | 'InvalidStack' | 'InvalidState';

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_OK = 0;
export const EXIT_UNEXPECTED = 1;

export const BUILD_EXIT_CODES: Readonly<Record<BuildErrorKind, number>> = {
  CompilationFailed: 10,
  SigningFailed: 11,
  InvalidArtifact: 14,
};

export const KEY_EXIT_CODES: Readonly<Record<KeyErrorKind, number>> = {
  NotFound: 12,
  GenerationFailed: 13,
  Invalid: 13,
};

export const APPLY_EXIT_CODES: Readonly<Record<ApplyErrorKind, number>> = {
  ExternalProviderRejected: 20,
  DependencyCycle: 21,
  ConcurrentModificationError: 22,
  DependencyMissing: 23,
};

export const CONFIG_EXIT_CODES: Readonly<Record<ConfigErrorKind, number>> = {
  InvalidConfig: 2,
  InvalidStack: 2,
  InvalidState: 2,
};

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class WharfError<K extends string = string> extends Error {
  constructor(
    readonly category: ErrorCategory,
    readonly kind: K,
    message: string,
    readonly exitCode: number,
    readonly detail: string = '',
  ) {
    super(message);
    this.name = 'WharfError';
  }

  /** `<category>.<kind>`, as printed by the CLI. */
  get code(): string {
    return `${this.category}.${this.kind}`;
  }
}

export class BuildError extends WharfError<BuildErrorKind> {
  constructor(kind: BuildErrorKind, message: string, detail = '') {
    super('build', kind, message, BUILD_EXIT_CODES[kind], detail);
    this.name = 'BuildError';
  }
}

export class KeyError extends WharfError<KeyErrorKind> {
  constructor(kind: KeyErrorKind, message: string, detail = '') {
    super('key', kind, message, KEY_EXIT_CODES[kind], detail);
    this.name = 'KeyError';
  }
}

export class ApplyError extends WharfError<ApplyErrorKind> {
  constructor(
    kind: ApplyErrorKind,
    message: string,
    detail = '',
    /** The resource whose operation failed, when there is one. */
    readonly resourceId?: string,
  ) {
    super('apply', kind, message, APPLY_EXIT_CODES[kind], detail);
    this.name = 'ApplyError';
  }
}

export class ConfigError extends WharfError<ConfigErrorKind> {
  constructor(kind: ConfigErrorKind, message: string, detail = '') {
    super('config', kind, message, CONFIG_EXIT_CODES[kind], detail);
    this.name = 'ConfigError';
  }
}

export function isWharfError(err: unknown): err is WharfError {
  return err instanceof WharfError;
}
