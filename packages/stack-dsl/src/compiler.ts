/**
 * Wharf Stack DSL — Compiler
 *
 * Compiles a parsed stack AST into a validated StackDefinition.
 *
 * Compilation rejects:
 * - unknown block types, wrong label counts, duplicate names or ids
 * - unknown resource kinds and attributes not in the kind's schema
 * - missing required attributes
 * - references to undeclared variables, unknown resources, a resource's own
 *   attributes, or attributes the target kind does not have
 * - malformed or dangling `depends_on` entries
 * - a `compute.permission` that does not depend on a `compute.function` and
 *   on a `gateway.route` of the API its `source_arn` names
 *
 * Cycles are not detected here: the kernel's ResourceGraph owns ordering.
 */

import { canonicalHash } from './canonical.js';
import { parse } from './parser.js';
import { formatReference } from './template.js';
import { RESOURCE_KIND_SCHEMAS, ResourceKind } from './types.js';
import type {
  ASTAttribute,
  ASTBlock,
  ASTValue,
  AttributeValue,
  CompileError,
  CompileResult,
  DeclaredValue,
  OutputDefinition,
  Position,
  Reference,
  ResourceDefinition,
  StackAST,
  StackDefinition,
  VariableDefinition,
} from './types.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_\-]*$/;
const RESERVED_IDS = new Set(['var', 'artifact', 'depends_on']);
const KNOWN_KINDS = new Set<string>(Object.values(ResourceKind));

function isResourceKind(value: string): value is ResourceKind {
  return KNOWN_KINDS.has(value);
}

interface PendingResource {
  readonly id: string;
  readonly kind: ResourceKind;
  readonly attributes: Record<string, DeclaredValue>;
  readonly explicitDeps: ReadonlyArray<{ readonly id: string; readonly pos: Position }>;
  readonly refs: ReadonlyArray<{ readonly ref: Reference; readonly pos: Position }>;
  readonly pos: Position;
}

// ---------------------------------------------------------------------------
// Value conversion
// ---------------------------------------------------------------------------

class Collector {
  readonly errors: CompileError[] = [];

  error(message: string, context: string, pos?: Position): void {
    this.errors.push({ message, context, line: pos?.line, column: pos?.column });
  }
}

function toDeclared(
  value: ASTValue,
  refs: Array<{ ref: Reference; pos: Position }>,
): DeclaredValue {
  switch (value.kind) {
    case 'string':
      for (const part of value.parts) {
        if (part.kind === 'ref') refs.push({ ref: part.ref, pos: value.pos });
      }
      return { kind: 'template', parts: value.parts };
    case 'number':
      return { kind: 'number', value: value.value };
    case 'boolean':
      return { kind: 'boolean', value: value.value };
    case 'list':
      return { kind: 'list', items: value.items.map((item) => toDeclared(item, refs)) };
    case 'map': {
      const entries: Record<string, DeclaredValue> = {};
      for (const entry of value.entries) {
        entries[entry.name] = toDeclared(entry.value, refs);
      }
      return { kind: 'map', entries };
    }
  }
}

/** Convert a value that must not contain interpolations. Returns undefined if it does. */
function toLiteral(value: ASTValue): AttributeValue | undefined {
  switch (value.kind) {
    case 'string': {
      let text = '';
      for (const part of value.parts) {
        if (part.kind === 'ref') return undefined;
        text += part.value;
      }
      return text;
    }
    case 'number':
    case 'boolean':
      return value.value;
    case 'list': {
      const items: AttributeValue[] = [];
      for (const item of value.items) {
        const literal = toLiteral(item);
        if (literal === undefined) return undefined;
        items.push(literal);
      }
      return items;
    }
    case 'map': {
      const entries: Record<string, AttributeValue> = {};
      for (const entry of value.entries) {
        const literal = toLiteral(entry.value);
        if (literal === undefined) return undefined;
        entries[entry.name] = literal;
      }
      return entries;
    }
  }
}

/** A list of plain strings, or undefined when the value is anything else. */
function literalStrings(value: ASTValue): string[] | undefined {
  if (value.kind !== 'list') return undefined;
  const result: string[] = [];
  for (const item of value.items) {
    if (item.kind !== 'string') return undefined;
    const literal = toLiteral(item);
    if (typeof literal !== 'string') return undefined;
    result.push(literal);
  }
  return result;
}

function checkDuplicateAttributes(body: ReadonlyArray<ASTAttribute>, context: string, out: Collector): void {
  const seen = new Set<string>();
  for (const attr of body) {
    if (seen.has(attr.name)) out.error(`Duplicate attribute '${attr.name}'`, context, attr.pos);
    seen.add(attr.name);
  }
}

// ---------------------------------------------------------------------------
// Block compilers
// ---------------------------------------------------------------------------

function compileVariable(block: ASTBlock, out: Collector): VariableDefinition | undefined {
  const name = block.labels[0] ?? '';
  const context = `variable "${name}"`;
  if (!IDENTIFIER.test(name)) {
    out.error(`Invalid variable name '${name}'`, context, block.pos);
    return undefined;
  }
  checkDuplicateAttributes(block.body, context, out);

  let defaultValue: AttributeValue | undefined;
  let description: string | undefined;
  for (const attr of block.body) {
    if (attr.name === 'default') {
      defaultValue = toLiteral(attr.value);
      if (defaultValue === undefined) {
        out.error('Variable defaults cannot contain interpolations', context, attr.pos);
      }
    } else if (attr.name === 'description') {
      const literal = toLiteral(attr.value);
      if (typeof literal !== 'string') {
        out.error('description must be a plain string', context, attr.pos);
      } else {
        description = literal;
      }
    } else {
      out.error(`Unknown variable attribute '${attr.name}'`, context, attr.pos);
    }
  }
  return { name, default: defaultValue, description };
}

function compileResource(block: ASTBlock, out: Collector): PendingResource | undefined {
  const [kindLabel = '', id = ''] = block.labels;
  const context = `resource "${kindLabel}" "${id}"`;

  if (!isResourceKind(kindLabel)) {
    out.error(
      `Unknown resource kind '${kindLabel}' (expected one of: ${[...KNOWN_KINDS].sort().join(', ')})`,
      context,
      block.pos,
    );
    return undefined;
  }
  if (!IDENTIFIER.test(id) || RESERVED_IDS.has(id)) {
    out.error(`Invalid resource id '${id}'`, context, block.pos);
    return undefined;
  }
  checkDuplicateAttributes(block.body, context, out);

  const schema = RESOURCE_KIND_SCHEMAS[kindLabel];
  const allowed = new Set([...schema.required, ...schema.optional]);
  const attributes: Record<string, DeclaredValue> = {};
  const explicitDeps: Array<{ id: string; pos: Position }> = [];
  const refs: Array<{ ref: Reference; pos: Position }> = [];

  for (const attr of block.body) {
    if (attr.name === 'depends_on') {
      const ids = literalStrings(attr.value);
      if (ids === undefined) {
        out.error('depends_on must be a list of resource ids', context, attr.pos);
        continue;
      }
      for (const dep of ids) explicitDeps.push({ id: dep, pos: attr.pos });
      continue;
    }
    if (!allowed.has(attr.name)) {
      out.error(`Unknown attribute '${attr.name}' for kind ${kindLabel}`, context, attr.pos);
      continue;
    }
    attributes[attr.name] = toDeclared(attr.value, refs);
  }

  for (const required of schema.required) {
    if (!(required in attributes)) {
      out.error(`Missing required attribute '${required}'`, context, block.pos);
    }
  }

  return { id, kind: kindLabel, attributes, explicitDeps, refs, pos: block.pos };
}

function compileOutput(
  block: ASTBlock,
  out: Collector,
): { definition: OutputDefinition; refs: Array<{ ref: Reference; pos: Position }> } | undefined {
  const name = block.labels[0] ?? '';
  const context = `output "${name}"`;
  if (!IDENTIFIER.test(name)) {
    out.error(`Invalid output name '${name}'`, context, block.pos);
    return undefined;
  }
  checkDuplicateAttributes(block.body, context, out);

  const refs: Array<{ ref: Reference; pos: Position }> = [];
  let value: DeclaredValue | undefined;
  let description: string | undefined;
  for (const attr of block.body) {
    if (attr.name === 'value') {
      value = toDeclared(attr.value, refs);
    } else if (attr.name === 'description') {
      const literal = toLiteral(attr.value);
      if (typeof literal === 'string') description = literal;
      else out.error('description must be a plain string', context, attr.pos);
    } else {
      out.error(`Unknown output attribute '${attr.name}'`, context, attr.pos);
    }
  }
  if (value === undefined) {
    out.error("Missing required attribute 'value'", context, block.pos);
    return undefined;
  }
  return { definition: { name, value, description }, refs };
}

// ---------------------------------------------------------------------------
// Reference validation
// ---------------------------------------------------------------------------

function checkReference(
  ref: Reference,
  pos: Position,
  context: string,
  selfId: string | undefined,
  variables: ReadonlyMap<string, VariableDefinition>,
  resources: ReadonlyMap<string, PendingResource>,
  out: Collector,
): void {
  const shown = formatReference(ref);
  switch (ref.scope) {
    case 'var':
      if (!variables.has(ref.name)) out.error(`${shown} refers to an undeclared variable`, context, pos);
      return;
    case 'artifact':
      return;
    case 'resource': {
      if (ref.id === selfId) {
        out.error(`${shown} refers to the resource itself`, context, pos);
        return;
      }
      const target = resources.get(ref.id);
      if (target === undefined) {
        out.error(`${shown} refers to an unknown resource`, context, pos);
        return;
      }
      const schema = RESOURCE_KIND_SCHEMAS[target.kind];
      const known = [...schema.required, ...schema.optional, ...schema.computed];
      if (!known.includes(ref.attribute)) {
        out.error(`${shown}: kind ${target.kind} has no attribute '${ref.attribute}'`, context, pos);
      }
      return;
    }
  }
}

// ---------------------------------------------------------------------------
// Ordering rules
// ---------------------------------------------------------------------------

function referencedIds(value: DeclaredValue | undefined, into: Set<string> = new Set()): Set<string> {
  if (value === undefined) return into;
  switch (value.kind) {
    case 'template':
      for (const part of value.parts) {
        if (part.kind === 'ref' && part.ref.scope === 'resource') into.add(part.ref.id);
      }
      break;
    case 'list':
      for (const item of value.items) referencedIds(item, into);
      break;
    case 'map':
      for (const entry of Object.values(value.entries)) referencedIds(entry, into);
      break;
    case 'number':
    case 'boolean':
      break;
  }
  return into;
}

/**
 * A permission grant is created after the function it grants and the route
 * that invokes it, so both must be among its dependencies. When `source_arn`
 * names gateway APIs, the route must belong to one of them.
 */
function checkPermissionOrdering(
  permission: PendingResource,
  deps: ReadonlySet<string>,
  resources: ReadonlyMap<string, PendingResource>,
  out: Collector,
): void {
  const context = `resource "${permission.kind}" "${permission.id}"`;
  const dependencies = [...deps].flatMap((id) => {
    const resource = resources.get(id);
    return resource === undefined ? [] : [resource];
  });

  if (!dependencies.some((dep) => dep.kind === ResourceKind.Function)) {
    out.error(
      'A compute.permission must depend on the compute.function it grants (reference it or list it in depends_on)',
      context,
      permission.pos,
    );
  }

  const apis = [...referencedIds(permission.attributes['source_arn'])].filter(
    (id) => resources.get(id)?.kind === ResourceKind.GatewayApi,
  );
  const routes = dependencies.filter((dep) => dep.kind === ResourceKind.GatewayRoute);
  const matching =
    apis.length === 0
      ? routes
      : routes.filter((route) => apis.some((api) => referencedIds(route.attributes['rest_api']).has(api)));
  if (matching.length === 0) {
    const which = apis.length === 0 ? 'a gateway.route' : `a gateway.route of ${apis.sort().join(', ')}`;
    out.error(
      `A compute.permission must depend on ${which} (reference it or list it in depends_on)`,
      context,
      permission.pos,
    );
  }
}

// ---------------------------------------------------------------------------
// compile
// ---------------------------------------------------------------------------

/**
 * Compile a parsed stack into a StackDefinition.
 *
 * All errors are collected; a definition is returned only when there are none.
 */
export function compile(ast: StackAST): CompileResult {
  const out = new Collector();
  const variables = new Map<string, VariableDefinition>();
  const resources = new Map<string, PendingResource>();
  const outputs: Array<{ definition: OutputDefinition; refs: Array<{ ref: Reference; pos: Position }> }> = [];

  for (const block of ast.blocks) {
    switch (block.type) {
      case 'variable': {
        const variable = compileVariable(block, out);
        if (variable === undefined) break;
        if (variables.has(variable.name)) {
          out.error(`Duplicate variable '${variable.name}'`, `variable "${variable.name}"`, block.pos);
          break;
        }
        variables.set(variable.name, variable);
        break;
      }
      case 'resource': {
        const resource = compileResource(block, out);
        if (resource === undefined) break;
        if (resources.has(resource.id)) {
          out.error(`Duplicate resource id '${resource.id}'`, `resource "${resource.kind}" "${resource.id}"`, block.pos);
          break;
        }
        resources.set(resource.id, resource);
        break;
      }
      case 'output': {
        const output = compileOutput(block, out);
        if (output === undefined) break;
        if (outputs.some((o) => o.definition.name === output.definition.name)) {
          out.error(`Duplicate output '${output.definition.name}'`, `output "${output.definition.name}"`, block.pos);
          break;
        }
        outputs.push(output);
        break;
      }
    }
  }

  const definitions: ResourceDefinition[] = [];
  for (const resource of resources.values()) {
    const context = `resource "${resource.kind}" "${resource.id}"`;
    const deps = new Set<string>();
    for (const { ref, pos } of resource.refs) {
      checkReference(ref, pos, context, resource.id, variables, resources, out);
      if (ref.scope === 'resource' && ref.id !== resource.id && resources.has(ref.id)) deps.add(ref.id);
    }
    for (const dep of resource.explicitDeps) {
      if (dep.id === resource.id) {
        out.error('A resource cannot depend on itself', context, dep.pos);
      } else if (!resources.has(dep.id)) {
        out.error(`depends_on refers to an unknown resource '${dep.id}'`, context, dep.pos);
      } else {
        deps.add(dep.id);
      }
    }
    if (resource.kind === ResourceKind.FunctionPermission) {
      checkPermissionOrdering(resource, deps, resources, out);
    }
    definitions.push({
      id: resource.id,
      kind: resource.kind,
      attributes: resource.attributes,
      depends_on: [...deps].sort(),
    });
  }

  for (const output of outputs) {
    const context = `output "${output.definition.name}"`;
    for (const { ref, pos } of output.refs) {
      checkReference(ref, pos, context, undefined, variables, resources, out);
    }
  }

  if (out.errors.length > 0) {
    return { ok: false, errors: out.errors };
  }

  const variableRecord: Record<string, VariableDefinition> = {};
  for (const name of [...variables.keys()].sort()) {
    const variable = variables.get(name);
    if (variable !== undefined) variableRecord[name] = variable;
  }

  return {
    ok: true,
    definition: {
      variables: variableRecord,
      resources: definitions.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)),
      outputs: outputs
        .map((o) => o.definition)
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
    },
  };
}

/**
 * Parse and compile stack source in one step.
 * Parse errors are reported as compile errors with their positions.
 */
export function compileStack(source: string): CompileResult {
  const parsed = parse(source);
  if (!parsed.ok) {
    return {
      ok: false,
      errors: parsed.errors.map((e) => ({ message: e.message, line: e.line, column: e.column })),
    };
  }
  return compile(parsed.ast);
}

/**
 * Compute the SHA-256 hash of a compiled stack definition.
 * Pure: identical definitions always produce identical hashes.
 */
export function hash(definition: StackDefinition): string {
  return canonicalHash(definition);
}
