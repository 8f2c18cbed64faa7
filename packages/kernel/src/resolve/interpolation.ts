/**
 * Wharf Kernel — Interpolation
 *
 * Resolves declared attribute values (templates with `${...}` references)
 * against variables, the built artifact and applied state.
 *
 * A string consisting of a single reference keeps the raw referenced value,
 * so `role = "${role.arn}"` and `memory_size = "${var.memory}"` keep their
 * types. Any other template renders each part to text and concatenates.
 *
 * A reference to a resource attribute that is not known yet resolves to
 * `unknown`, and so does every value containing it.
 */

import { canonicalize, formatReference } from '@wharf/stack-dsl';
import type {
  AttributeValue,
  DeclaredValue,
  Reference,
  StackDefinition,
  TemplatePart,
} from '@wharf/stack-dsl';
import { ApplyError, ConfigError } from '../errors/index.js';
import type { ArtifactRef } from '../types/artifact.js';
import type { AppliedResource } from '../types/state.js';

export type Resolved =
  | { readonly known: true; readonly value: AttributeValue }
  | { readonly known: false };

const UNKNOWN: Resolved = { known: false };

export interface ResolutionContext {
  readonly variables: Readonly<Record<string, AttributeValue>>;
  readonly artifact?: ArtifactRef | undefined;
  readonly resources: Readonly<Record<string, AppliedResource>>;
  /**
   * Returns true when `${id.attribute}` must be treated as unknown even if
   * state has a value, because a planned change will alter it.
   */
  readonly isPending?: ((id: string, attribute: string) => boolean) | undefined;
  /**
   * When true, a reference to a resource missing from state is an error
   * instead of unknown. Set during apply, when every dependency must exist.
   */
  readonly strict?: boolean | undefined;
}

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

/**
 * Merge provided variable values over the stack's defaults.
 *
 * @throws {ConfigError} InvalidConfig for an unknown variable or one with no value
 */
export function resolveVariables(
  definition: StackDefinition,
  provided: Readonly<Record<string, AttributeValue>>,
): Record<string, AttributeValue> {
  const unknown = Object.keys(provided).filter((name) => !(name in definition.variables));
  if (unknown.length > 0) {
    throw new ConfigError('InvalidConfig', `Unknown variable(s): ${unknown.sort().join(', ')}`);
  }
  const values: Record<string, AttributeValue> = {};
  for (const variable of Object.values(definition.variables)) {
    const value = provided[variable.name] ?? variable.default;
    if (value === undefined) {
      throw new ConfigError('InvalidConfig', `Variable '${variable.name}' has no value and no default`);
    }
    values[variable.name] = value;
  }
  return values;
}

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

function lookupAttribute(resource: AppliedResource, attribute: string): AttributeValue | undefined {
  return resource.computed[attribute] ?? resource.attributes[attribute];
}

export function resolveReference(ref: Reference, ctx: ResolutionContext): Resolved {
  switch (ref.scope) {
    case 'var': {
      const value = ctx.variables[ref.name];
      if (value === undefined) {
        throw new ConfigError('InvalidConfig', `${formatReference(ref)} has no value`);
      }
      return { known: true, value };
    }
    case 'artifact': {
      if (ctx.artifact === undefined) {
        throw new ConfigError(
          'InvalidConfig',
          `${formatReference(ref)} is referenced but no artifact has been built`,
          "Run 'wharf build' first.",
        );
      }
      return { known: true, value: ctx.artifact[ref.field] };
    }
    case 'resource': {
      if (ctx.isPending?.(ref.id, ref.attribute) === true) return UNKNOWN;
      const resource = ctx.resources[ref.id];
      if (resource === undefined) {
        if (ctx.strict === true) {
          throw new ApplyError(
            'DependencyMissing',
            `${formatReference(ref)} refers to '${ref.id}', which has not been applied`,
            '',
            ref.id,
          );
        }
        return UNKNOWN;
      }
      const value = lookupAttribute(resource, ref.attribute);
      if (value === undefined) {
        if (ctx.strict === true) {
          throw new ApplyError(
            'DependencyMissing',
            `${formatReference(ref)}: '${ref.id}' has no attribute '${ref.attribute}' in state`,
            '',
            ref.id,
          );
        }
        return UNKNOWN;
      }
      return { known: true, value };
    }
  }
}

/** Render a resolved value as template text. */
export function renderText(value: AttributeValue): string {
  return typeof value === 'string' ? value : canonicalize(value);
}

function resolveTemplate(parts: ReadonlyArray<TemplatePart>, ctx: ResolutionContext): Resolved {
  const [only] = parts;
  if (parts.length === 1 && only?.kind === 'ref') {
    return resolveReference(only.ref, ctx);
  }
  let text = '';
  for (const part of parts) {
    if (part.kind === 'literal') {
      text += part.value;
      continue;
    }
    const resolved = resolveReference(part.ref, ctx);
    if (!resolved.known) return UNKNOWN;
    text += renderText(resolved.value);
  }
  return { known: true, value: text };
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

export function resolveValue(value: DeclaredValue, ctx: ResolutionContext): Resolved {
  switch (value.kind) {
    case 'template':
      return resolveTemplate(value.parts, ctx);
    case 'number':
    case 'boolean':
      return { known: true, value: value.value };
    case 'list': {
      const items: AttributeValue[] = [];
      for (const item of value.items) {
        const resolved = resolveValue(item, ctx);
        if (!resolved.known) return UNKNOWN;
        items.push(resolved.value);
      }
      return { known: true, value: items };
    }
    case 'map': {
      const entries: Record<string, AttributeValue> = {};
      for (const [key, entry] of Object.entries(value.entries)) {
        const resolved = resolveValue(entry, ctx);
        if (!resolved.known) return UNKNOWN;
        entries[key] = resolved.value;
      }
      return { known: true, value: entries };
    }
  }
}

/**
 * Resolve every declared attribute of a resource.
 * Returns the known values and the names of the attributes that are unknown.
 */
export function resolveAttributes(
  attributes: Readonly<Record<string, DeclaredValue>>,
  ctx: ResolutionContext,
): { readonly values: Record<string, AttributeValue>; readonly unknown: ReadonlyArray<string> } {
  const values: Record<string, AttributeValue> = {};
  const unknown: string[] = [];
  for (const name of Object.keys(attributes).sort()) {
    const declared = attributes[name];
    if (declared === undefined) continue;
    const resolved = resolveValue(declared, ctx);
    if (resolved.known) values[name] = resolved.value;
    else unknown.push(name);
  }
  return { values, unknown };
}
