/**
 * Wharf Stack DSL — Parser
 *
 * Parses stack source text into an Abstract Syntax Tree (AST).
 *
 * The parser is responsible for syntactic analysis only. It does not check
 * resource kinds, attribute names or reference targets; those are the
 * compiler's responsibility.
 *
 * Grammar:
 *
 *   stack     := block* EOF
 *   block     := ('variable' | 'output') STRING '{' attribute* '}'
 *              | 'resource' STRING STRING '{' attribute* '}'
 *   attribute := IDENT '=' value
 *   value     := STRING | NUMBER | 'true' | 'false' | list | map
 *   list      := '[' (value (',' value)* ','?)? ']'
 *   map       := '{' ((IDENT | STRING) '=' value ','?)* '}'
 *
 * Parse failures are never partial: if any error is encountered, no AST
 * is returned.
 */

import { tokenize } from './lexer.js';
import type { Token, TokenType } from './lexer.js';
import { parseTemplate } from './template.js';
import type {
  ASTAttribute,
  ASTBlock,
  ASTValue,
  BlockType,
  ParseError,
  ParseResult,
} from './types.js';

const BLOCK_LABELS: Readonly<Record<BlockType, number>> = {
  variable: 1,
  resource: 2,
  output: 1,
};

function isBlockType(text: string): text is BlockType {
  return Object.prototype.hasOwnProperty.call(BLOCK_LABELS, text);
}

/** Raised internally to unwind to parse(); never escapes this module. */
class ParseFailure extends Error {
  constructor(readonly error: ParseError) {
    super(error.message);
    this.name = 'ParseFailure';
  }
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  private peek(): Token {
    const token = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new ParseFailure({ line: 1, column: 1, message: 'Empty token stream' });
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private fail(token: Token, message: string): never {
    throw new ParseFailure({ ...token.pos, message });
  }

  private expect(type: TokenType, what: string): Token {
    const token = this.next();
    if (token.type !== type) {
      this.fail(token, `Expected ${what}, found ${describe(token)}`);
    }
    return token;
  }

  parseStack(): ReadonlyArray<ASTBlock> {
    const blocks: ASTBlock[] = [];
    while (this.peek().type !== 'eof') {
      blocks.push(this.parseBlock());
    }
    return blocks;
  }

  private parseBlock(): ASTBlock {
    const head = this.expect('ident', 'block type');
    const type = head.text;
    if (!isBlockType(type)) {
      return this.fail(head, `Unknown block type '${type}' (expected variable, resource or output)`);
    }
    const labels: string[] = [];
    for (let n = 0; n < BLOCK_LABELS[type]; n++) {
      labels.push(this.expect('string', `${type} label`).text);
    }
    this.expect('lbrace', "'{'");
    const body = this.parseAttributes();
    this.expect('rbrace', "'}'");
    return { type, labels, body, pos: head.pos };
  }

  private parseAttributes(): ReadonlyArray<ASTAttribute> {
    const attributes: ASTAttribute[] = [];
    while (this.peek().type === 'ident') {
      const name = this.next();
      this.expect('equals', "'='");
      attributes.push({ name: name.text, value: this.parseValue(), pos: name.pos });
    }
    return attributes;
  }

  private parseValue(): ASTValue {
    const token = this.next();
    switch (token.type) {
      case 'string': {
        const template = parseTemplate(token.text, token.pos);
        if (!template.ok) throw new ParseFailure(template.error);
        return { kind: 'string', parts: template.parts, pos: token.pos };
      }
      case 'number':
        return { kind: 'number', value: Number(token.text), pos: token.pos };
      case 'ident':
        if (token.text === 'true' || token.text === 'false') {
          return { kind: 'boolean', value: token.text === 'true', pos: token.pos };
        }
        return this.fail(token, `Unexpected identifier '${token.text}' (strings must be quoted)`);
      case 'lbracket':
        return this.parseList(token);
      case 'lbrace':
        return this.parseMap(token);
      default:
        return this.fail(token, `Expected a value, found ${describe(token)}`);
    }
  }

  private parseList(open: Token): ASTValue {
    const items: ASTValue[] = [];
    while (this.peek().type !== 'rbracket') {
      items.push(this.parseValue());
      if (this.peek().type === 'comma') {
        this.next();
        continue;
      }
      break;
    }
    this.expect('rbracket', "']'");
    return { kind: 'list', items, pos: open.pos };
  }

  private parseMap(open: Token): ASTValue {
    const entries: ASTAttribute[] = [];
    while (this.peek().type === 'ident' || this.peek().type === 'string') {
      const key = this.next();
      this.expect('equals', "'='");
      entries.push({ name: key.text, value: this.parseValue(), pos: key.pos });
      if (this.peek().type === 'comma') this.next();
    }
    this.expect('rbrace', "'}'");
    return { kind: 'map', entries, pos: open.pos };
  }
}

function describe(token: Token): string {
  if (token.type === 'eof') return 'end of input';
  if (token.type === 'string') return `string "${token.text}"`;
  return `'${token.text}'`;
}

/**
 * Parse a stack document.
 *
 * Returns a discriminated union:
 * - `{ ok: true, ast }` on success
 * - `{ ok: false, errors }` on any lexical or syntax error
 */
export function parse(source: string): ParseResult {
  const lexed = tokenize(source);
  if (!lexed.ok) {
    return { ok: false, errors: [lexed.error] };
  }
  try {
    const blocks = new Parser(lexed.tokens).parseStack();
    return { ok: true, ast: { blocks } };
  } catch (err: unknown) {
    if (err instanceof ParseFailure) {
      return { ok: false, errors: [err.error] };
    }
    throw err;
  }
}
