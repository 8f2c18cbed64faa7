/**
 * Wharf Stack DSL — Core Type Definitions
 *
 * This module defines all types for the stack document: the resource kind
 * taxonomy, AST nodes produced by the parser, the compiled stack definition,
 * and result types.
 *
 * These types are the base layer of the Wharf type system. The kernel
 * depends on this package; this package has no internal Wharf dependencies.
 */

// ---------------------------------------------------------------------------
// Resource Kind Taxonomy
// ---------------------------------------------------------------------------

/**
 * The canonical set of resource kinds a stack may declare.
 *
 * Unknown kinds are rejected at compile time. Providers implement exactly
 * this set; adding a kind means extending the taxonomy and every provider.
 */
export enum ResourceKind {
  /** Execution role assumed by the compute function. */
  IamRole = 'iam.role',
  /** Managed policy attached to a role. */
  IamPolicyAttachment = 'iam.policy_attachment',
  /** The compute function running the signed actor. */
  Function = 'compute.function',
  /** Grant allowing a principal (the gateway) to invoke a function. */
  FunctionPermission = 'compute.permission',
  /** HTTP gateway API. */
  GatewayApi = 'gateway.rest_api',
  /** A path segment plus HTTP method on a gateway API. */
  GatewayRoute = 'gateway.route',
  /** Proxy integration binding a route to a function. */
  GatewayIntegration = 'gateway.integration',
  /** A deployment of a gateway API to a named stage. */
  GatewayDeployment = 'gateway.deployment',
}

/**
 * Attribute schema of a resource kind.
 *
 * `computed` attributes are assigned by the provider at create time and may be
 * referenced by other resources. `volatile` is the subset of computed
 * attributes that change whenever the resource is updated.
 */
export interface ResourceKindSchema {
  readonly required: ReadonlyArray<string>;
  readonly optional: ReadonlyArray<string>;
  readonly computed: ReadonlyArray<string>;
  readonly volatile: ReadonlyArray<string>;
}

export const RESOURCE_KIND_SCHEMAS: Readonly<Record<ResourceKind, ResourceKindSchema>> = {
  [ResourceKind.IamRole]: {
    required: ['name', 'assume_role_service'],
    optional: ['description'],
    computed: ['arn', 'id'],
    volatile: [],
  },
  [ResourceKind.IamPolicyAttachment]: {
    required: ['role', 'policy_arn'],
    optional: [],
    computed: ['id'],
    volatile: [],
  },
  [ResourceKind.Function]: {
    required: ['name', 'runtime', 'handler', 'role', 'package', 'source_hash'],
    optional: ['environment', 'memory_size', 'timeout', 'description'],
    computed: ['arn', 'invoke_arn', 'id', 'version'],
    volatile: ['version'],
  },
  [ResourceKind.FunctionPermission]: {
    required: ['function', 'principal', 'source_arn'],
    optional: ['action', 'statement_id'],
    computed: ['id'],
    volatile: [],
  },
  [ResourceKind.GatewayApi]: {
    required: ['name'],
    optional: ['description'],
    computed: ['id', 'root_resource_id', 'execution_arn'],
    volatile: [],
  },
  [ResourceKind.GatewayRoute]: {
    required: ['rest_api', 'path_part', 'http_method'],
    optional: ['parent_id', 'authorization'],
    computed: ['id', 'path'],
    volatile: [],
  },
  [ResourceKind.GatewayIntegration]: {
    required: ['rest_api', 'route', 'uri'],
    optional: ['type', 'integration_http_method'],
    computed: ['id'],
    volatile: [],
  },
  [ResourceKind.GatewayDeployment]: {
    required: ['rest_api', 'stage_name'],
    optional: ['description'],
    computed: ['id', 'invoke_url'],
    volatile: ['id'],
  },
};

/** Fields of the built artifact a stack may interpolate as `${artifact.<field>}`. */
export const ARTIFACT_FIELDS = ['hash', 'path', 'name'] as const;
export type ArtifactField = (typeof ARTIFACT_FIELDS)[number];

// ---------------------------------------------------------------------------
// Attribute values
// ---------------------------------------------------------------------------

/**
 * A fully resolved attribute value, as persisted in applied state and sent to
 * providers. JSON-compatible by construction.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | ReadonlyArray<AttributeValue>
  | { readonly [key: string]: AttributeValue };

// ---------------------------------------------------------------------------
// References and templates
// ---------------------------------------------------------------------------

/** The target of a `${...}` interpolation. */
export type Reference =
  | { readonly scope: 'var'; readonly name: string }
  | { readonly scope: 'artifact'; readonly field: ArtifactField }
  | { readonly scope: 'resource'; readonly id: string; readonly attribute: string };

export type TemplatePart =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'ref'; readonly ref: Reference };

export interface Position {
  readonly line: number;
  readonly column: number;
}

// ---------------------------------------------------------------------------
// AST — produced by parser
// ---------------------------------------------------------------------------

export type ASTValue =
  | { readonly kind: 'string'; readonly parts: ReadonlyArray<TemplatePart>; readonly pos: Position }
  | { readonly kind: 'number'; readonly value: number; readonly pos: Position }
  | { readonly kind: 'boolean'; readonly value: boolean; readonly pos: Position }
  | { readonly kind: 'list'; readonly items: ReadonlyArray<ASTValue>; readonly pos: Position }
  | { readonly kind: 'map'; readonly entries: ReadonlyArray<ASTAttribute>; readonly pos: Position };

export interface ASTAttribute {
  readonly name: string;
  readonly value: ASTValue;
  readonly pos: Position;
}

export type BlockType = 'variable' | 'resource' | 'output';

export interface ASTBlock {
  readonly type: BlockType;
  readonly labels: ReadonlyArray<string>;
  readonly body: ReadonlyArray<ASTAttribute>;
  readonly pos: Position;
}

export interface StackAST {
  readonly blocks: ReadonlyArray<ASTBlock>;
}

// ---------------------------------------------------------------------------
// Compiled stack definition — produced by compiler
// ---------------------------------------------------------------------------

/**
 * A declared (unresolved) attribute value. Strings are kept as templates so
 * interpolations can be resolved against applied state at plan and apply time.
 */
export type DeclaredValue =
  | { readonly kind: 'template'; readonly parts: ReadonlyArray<TemplatePart> }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'list'; readonly items: ReadonlyArray<DeclaredValue> }
  | { readonly kind: 'map'; readonly entries: Readonly<Record<string, DeclaredValue>> };

export interface VariableDefinition {
  readonly name: string;
  readonly default?: AttributeValue | undefined;
  readonly description?: string | undefined;
}

export interface ResourceDefinition {
  readonly id: string;
  readonly kind: ResourceKind;
  readonly attributes: Readonly<Record<string, DeclaredValue>>;
  /** Explicit `depends_on` plus every referenced resource id. Sorted, unique. */
  readonly depends_on: ReadonlyArray<string>;
}

export interface OutputDefinition {
  readonly name: string;
  readonly value: DeclaredValue;
  readonly description?: string | undefined;
}

/**
 * The compiled desired-state document.
 *
 * Deterministic: resources are sorted by id, outputs by name, so identical
 * source (modulo block order) produces an identical definition and hash.
 */
export interface StackDefinition {
  readonly variables: Readonly<Record<string, VariableDefinition>>;
  readonly resources: ReadonlyArray<ResourceDefinition>;
  readonly outputs: ReadonlyArray<OutputDefinition>;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface ParseError {
  readonly line: number;
  readonly column: number;
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly ast: StackAST }
  | { readonly ok: false; readonly errors: ReadonlyArray<ParseError> };

export interface CompileError {
  readonly message: string;
  /** Block or attribute the error refers to, e.g. `resource "hello"`. */
  readonly context?: string | undefined;
  readonly line?: number | undefined;
  readonly column?: number | undefined;
}

export type CompileResult =
  | { readonly ok: true; readonly definition: StackDefinition }
  | { readonly ok: false; readonly errors: ReadonlyArray<CompileError> };
