/**
 * Wharf Pipeline — Stack Loader
 *
 * Reads and compiles the stack document. Any parse or compile error makes
 * the whole stack invalid; the errors are listed one per line in the
 * error detail as `<file>:<line>:<column>: <message>`.
 */

import { readFileSync } from 'node:fs';
import { ConfigError } from '@wharf/kernel';
import { compileStack, hash } from '@wharf/stack-dsl';
import type { CompileError, StackDefinition } from '@wharf/stack-dsl';

export interface LoadedStack {
  readonly path: string;
  readonly definition: StackDefinition;
  readonly hash: string;
}

function formatError(path: string, error: CompileError): string {
  const where = error.line !== undefined ? `${path}:${error.line}:${error.column ?? 1}` : path;
  const context = error.context !== undefined ? ` (${error.context})` : '';
  return `${where}: ${error.message}${context}`;
}

/** @throws {ConfigError} InvalidStack */
export function compileStackSource(path: string, source: string): LoadedStack {
  const result = compileStack(source);
  if (!result.ok) {
    throw new ConfigError(
      'InvalidStack',
      `${path} has ${result.errors.length} error(s)`,
      result.errors.map((e) => formatError(path, e)).join('\n'),
    );
  }
  return { path, definition: result.definition, hash: hash(result.definition) };
}

/** @throws {ConfigError} InvalidStack when the file is missing or invalid */
export function loadStack(path: string): LoadedStack {
  let source: string;
  try {
    source = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigError('InvalidStack', `Cannot read stack file ${path}`, String(err));
  }
  return compileStackSource(path, source);
}
