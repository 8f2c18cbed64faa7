/**
 * @wharf/stack-dsl
 *
 * Wharf Stack DSL — lexer, parser, compiler, and type definitions.
 *
 * This package is the base layer of the Wharf type system. It defines:
 * - The resource kind taxonomy (ResourceKind enum) and attribute schemas
 * - All AST and compiled definition types
 * - The parse(), compile(), compileStack() and hash() functions
 * - Canonical JSON hashing shared by the kernel
 *
 * All other Wharf packages depend on this package. This package has no
 * internal Wharf dependencies.
 */

// Types
export type {
  ASTAttribute,
  ASTBlock,
  ASTValue,
  ArtifactField,
  AttributeValue,
  BlockType,
  CompileError,
  CompileResult,
  DeclaredValue,
  OutputDefinition,
  ParseError,
  ParseResult,
  Position,
  Reference,
  ResourceDefinition,
  ResourceKindSchema,
  StackAST,
  StackDefinition,
  TemplatePart,
  VariableDefinition,
} from './types.js';

export { ARTIFACT_FIELDS, RESOURCE_KIND_SCHEMAS, ResourceKind } from './types.js';

// Functions
export { canonicalHash, canonicalize } from './canonical.js';
export { compile, compileStack, hash } from './compiler.js';
export { parse } from './parser.js';
export { formatReference, parseTemplate } from './template.js';
export type { TemplateResult } from './template.js';
export { tokenize } from './lexer.js';
export type { LexResult, Token, TokenType } from './lexer.js';
