/**
 * Wharf Stack DSL — Parser Tests
 *
 * Covers block structure, value forms, template splitting and the position
 * reported for lexical and syntax errors.
 *
 * Tests are pure: no I/O, no clock dependency, no state.
 */

import { describe, it, expect } from 'vitest';
import { parse, parseTemplate, tokenize } from '@wharf/stack-dsl';

const ORIGIN = { line: 1, column: 1 };

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

describe('parse: blocks', () => {
  it('parses a resource block with two labels', () => {
    const result = parse(
      [
        'resource "iam.role" "lambda_role" {',
        '  name = "hello-role"',
        '  assume_role_service = "lambda.amazonaws.com"',
        '}',
      ].join('\n'),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [block] = result.ast.blocks;
    expect(block?.type).toBe('resource');
    expect(block?.labels).toEqual(['iam.role', 'lambda_role']);
    expect(block?.body.map((a) => a.name)).toEqual(['name', 'assume_role_service']);
    expect(block?.body[0]?.value).toEqual({
      kind: 'string',
      parts: [{ kind: 'literal', value: 'hello-role' }],
      pos: { line: 2, column: 10 },
    });
  });

  it('parses numbers, booleans, lists and maps', () => {
    const result = parse(
      [
        'resource "compute.function" "hello" {',
        '  memory_size = 128',
        '  timeout = -1.5',
        '  publish = true',
        '  depends_on = ["a", "b",]',
        '  environment = { WHARF_LOG = "info", "x-y" = "z" }',
        '}',
      ].join('\n'),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const body = result.ast.blocks[0]?.body ?? [];
    expect(body[0]?.value).toMatchObject({ kind: 'number', value: 128 });
    expect(body[1]?.value).toMatchObject({ kind: 'number', value: -1.5 });
    expect(body[2]?.value).toMatchObject({ kind: 'boolean', value: true });
    expect(body[3]?.value).toMatchObject({ kind: 'list' });
    const list = body[3]?.value;
    expect(list?.kind === 'list' ? list.items.length : -1).toBe(2);
    const map = body[4]?.value;
    expect(map?.kind === 'map' ? map.entries.map((e) => e.name) : []).toEqual(['WHARF_LOG', 'x-y']);
  });

  it('ignores # and // comments', () => {
    const result = parse(
      ['# stack', 'output "url" { // trailing', '  value = "x" # note', '}'].join('\n'),
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.ast.blocks).toHaveLength(1);
    expect(result.ast.blocks[0]?.labels).toEqual(['url']);
  });

  it('accepts an empty document', () => {
    expect(parse('  \n# nothing\n')).toEqual({ ok: true, ast: { blocks: [] } });
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('parse: errors', () => {
  it('rejects an unknown block type at its position', () => {
    expect(parse('module "x" {}')).toEqual({
      ok: false,
      errors: [
        {
          line: 1,
          column: 1,
          message: "Unknown block type 'module' (expected variable, resource or output)",
        },
      ],
    });
  });

  it('rejects an unquoted string value', () => {
    expect(parse('variable "region" {\n  default = us-east-1\n}')).toEqual({
      ok: false,
      errors: [{ line: 2, column: 13, message: "Unexpected identifier 'us-east-1' (strings must be quoted)" }],
    });
  });

  it('rejects an unterminated string', () => {
    expect(parse('variable "x')).toEqual({
      ok: false,
      errors: [{ line: 1, column: 10, message: 'Unterminated string literal' }],
    });
  });

  it('rejects a resource block with one label', () => {
    const result = parse('resource "iam.role" {}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors[0]?.message).toBe("Expected resource label, found '{'");
  });

  it('rejects a missing closing brace', () => {
    const result = parse('output "a" {\n  value = "x"\n');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors[0]?.message).toBe("Expected '}', found end of input");
  });
});

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

describe('parseTemplate', () => {
  it('splits literals and references', () => {
    expect(parseTemplate('arn:${hello.arn}/x', ORIGIN)).toEqual({
      ok: true,
      parts: [
        { kind: 'literal', value: 'arn:' },
        { kind: 'ref', ref: { scope: 'resource', id: 'hello', attribute: 'arn' } },
        { kind: 'literal', value: '/x' },
      ],
    });
  });

  it('recognizes variable and artifact scopes', () => {
    expect(parseTemplate('${var.region}${artifact.hash}', ORIGIN)).toEqual({
      ok: true,
      parts: [
        { kind: 'ref', ref: { scope: 'var', name: 'region' } },
        { kind: 'ref', ref: { scope: 'artifact', field: 'hash' } },
      ],
    });
  });

  it('treats $${ as a literal ${', () => {
    expect(parseTemplate('$${var.x}', ORIGIN)).toEqual({
      ok: true,
      parts: [{ kind: 'literal', value: '${var.x}' }],
    });
  });

  it('rejects unknown artifact fields', () => {
    expect(parseTemplate('${artifact.size}', ORIGIN)).toEqual({
      ok: false,
      error: { line: 1, column: 1, message: "Unknown artifact field 'size' (expected one of: hash, path, name)" },
    });
  });

  it('rejects references without exactly two segments', () => {
    const result = parseTemplate('${a.b.c}', ORIGIN);
    expect(result.ok).toBe(false);
  });

  it('rejects an unterminated interpolation', () => {
    expect(parseTemplate('${var.x', ORIGIN)).toEqual({
      ok: false,
      error: { line: 1, column: 1, message: 'Unterminated interpolation' },
    });
  });
});

describe('tokenize', () => {
  it('unescapes string literals', () => {
    const result = tokenize('"a\\"b\\n"');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.tokens[0]).toEqual({ type: 'string', text: 'a"b\n', pos: { line: 1, column: 1 } });
  });

  it('rejects unknown escapes', () => {
    const result = tokenize('"\\q"');
    expect(result.ok).toBe(false);
  });
});
