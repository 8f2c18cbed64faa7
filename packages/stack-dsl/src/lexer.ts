/**
 * Wharf Stack DSL — Lexer
 *
 * Splits stack source into tokens. Whitespace and newlines are insignificant;
 * `#` and `//` start a comment that runs to the end of the line.
 *
 * String tokens carry their unescaped value. Interpolations (`${...}`) are
 * left in place for the template parser.
 */

import type { ParseError, Position } from './types.js';

export type TokenType =
  | 'ident'
  | 'string'
  | 'number'
  | 'lbrace'
  | 'rbrace'
  | 'lbracket'
  | 'rbracket'
  | 'equals'
  | 'comma'
  | 'eof';

export interface Token {
  readonly type: TokenType;
  readonly text: string;
  readonly pos: Position;
}

export type LexResult =
  | { readonly ok: true; readonly tokens: ReadonlyArray<Token> }
  | { readonly ok: false; readonly error: ParseError };

const PUNCTUATION: Readonly<Record<string, TokenType>> = {
  '{': 'lbrace',
  '}': 'rbrace',
  '[': 'lbracket',
  ']': 'rbracket',
  '=': 'equals',
  ',': 'comma',
};

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  t: '\t',
  r: '\r',
};

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_\-]/;
const DIGIT = /[0-9]/;

/**
 * Tokenize a stack document.
 *
 * Fails on the first unrecognized character, unterminated string, or
 * unknown escape sequence.
 */
export function tokenize(source: string): LexResult {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  let column = 1;

  const advance = (): string => {
    const ch = source.charAt(i);
    i++;
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
    return ch;
  };

  while (i < source.length) {
    const ch = source.charAt(i);
    const pos: Position = { line, column };

    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
      advance();
      continue;
    }

    if (ch === '#' || (ch === '/' && source.charAt(i + 1) === '/')) {
      while (i < source.length && source.charAt(i) !== '\n') advance();
      continue;
    }

    const punct = PUNCTUATION[ch];
    if (punct !== undefined) {
      advance();
      tokens.push({ type: punct, text: ch, pos });
      continue;
    }

    if (ch === '"') {
      advance();
      let value = '';
      let closed = false;
      while (i < source.length) {
        const c = advance();
        if (c === '"') {
          closed = true;
          break;
        }
        if (c === '\n') break;
        if (c === '\\') {
          const next = advance();
          const escaped = ESCAPES[next];
          if (escaped === undefined) {
            return {
              ok: false,
              error: { line, column: column - 2, message: `Unknown escape sequence '\\${next}'` },
            };
          }
          value += escaped;
          continue;
        }
        value += c;
      }
      if (!closed) {
        return { ok: false, error: { ...pos, message: 'Unterminated string literal' } };
      }
      tokens.push({ type: 'string', text: value, pos });
      continue;
    }

    if (DIGIT.test(ch) || (ch === '-' && DIGIT.test(source.charAt(i + 1)))) {
      let text = advance();
      while (i < source.length && DIGIT.test(source.charAt(i))) text += advance();
      if (source.charAt(i) === '.' && DIGIT.test(source.charAt(i + 1))) {
        text += advance();
        while (i < source.length && DIGIT.test(source.charAt(i))) text += advance();
      }
      tokens.push({ type: 'number', text, pos });
      continue;
    }

    if (IDENT_START.test(ch)) {
      let text = advance();
      while (i < source.length && IDENT_PART.test(source.charAt(i))) text += advance();
      tokens.push({ type: 'ident', text, pos });
      continue;
    }

    return { ok: false, error: { ...pos, message: `Unexpected character '${ch}'` } };
  }

  tokens.push({ type: 'eof', text: '', pos: { line, column } });
  return { ok: true, tokens };
}
