/**
 * Wharf Stack DSL — String Templates
 *
 * Splits a string literal into literal text and `${...}` references.
 *
 *   ${var.region}        variable
 *   ${artifact.hash}     field of the built artifact (hash | path | name)
 *   ${hello.arn}         attribute of another resource
 *   $${                  a literal `${`
 */

import { ARTIFACT_FIELDS } from './types.js';
import type { ArtifactField, ParseError, Position, Reference, TemplatePart } from './types.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_\-]*$/;

export type TemplateResult =
  | { readonly ok: true; readonly parts: ReadonlyArray<TemplatePart> }
  | { readonly ok: false; readonly error: ParseError };

function isArtifactField(value: string): value is ArtifactField {
  return ARTIFACT_FIELDS.some((field) => field === value);
}

function parseReference(expr: string): Reference | string {
  const segments = expr.split('.');
  if (segments.length !== 2 || !segments.every((s) => IDENTIFIER.test(s))) {
    return `Invalid reference '\${${expr}}': expected <scope>.<name>`;
  }
  const [scope = '', name = ''] = segments;
  if (scope === 'var') return { scope: 'var', name };
  if (scope === 'artifact') {
    if (!isArtifactField(name)) {
      return `Unknown artifact field '${name}' (expected one of: ${ARTIFACT_FIELDS.join(', ')})`;
    }
    return { scope: 'artifact', field: name };
  }
  return { scope: 'resource', id: scope, attribute: name };
}

/**
 * Parse the unescaped value of a string token into template parts.
 *
 * @param text - String literal value with escapes already applied
 * @param pos - Position of the string token, used for error reporting
 */
export function parseTemplate(text: string, pos: Position): TemplateResult {
  const parts: TemplatePart[] = [];
  let literal = '';
  let i = 0;

  const flush = (): void => {
    if (literal !== '') {
      parts.push({ kind: 'literal', value: literal });
      literal = '';
    }
  };

  while (i < text.length) {
    if (text.startsWith('$${', i)) {
      literal += '${';
      i += 3;
      continue;
    }
    if (text.startsWith('${', i)) {
      const close = text.indexOf('}', i + 2);
      if (close === -1) {
        return { ok: false, error: { ...pos, message: 'Unterminated interpolation' } };
      }
      const ref = parseReference(text.slice(i + 2, close).trim());
      if (typeof ref === 'string') {
        return { ok: false, error: { ...pos, message: ref } };
      }
      flush();
      parts.push({ kind: 'ref', ref });
      i = close + 1;
      continue;
    }
    literal += text.charAt(i);
    i++;
  }
  flush();
  return { ok: true, parts };
}

/** Render a reference back to its `${...}` source form. */
export function formatReference(ref: Reference): string {
  switch (ref.scope) {
    case 'var':
      return `\${var.${ref.name}}`;
    case 'artifact':
      return `\${artifact.${ref.field}}`;
    case 'resource':
      return `\${${ref.id}.${ref.attribute}}`;
  }
}
