/**
 * Wharf Simulated Provider
 *
 * An in-process stand-in for the IAM, function and HTTP gateway APIs. Every
 * call loads the cloud from StateIO, applies the request and writes it back,
 * so the cloud outlives the process exactly like the deployed state does.
 *
 * The simulated API keeps the semantics the pipeline depends on:
 *   - identifiers, ARNs and invoke URLs are assigned by the provider
 *   - a request naming a resource that does not exist is rejected
 *   - a role still used by a function or a policy attachment cannot be deleted
 *   - `injectFault` makes matching calls fail, for tests
 *
 * Generated identifiers come from a counter kept in the cloud file, so the
 * same sequence of calls always produces the same identifiers.
 */

import { ConfigError, systemClock } from '@wharf/kernel';
import type { AppliedResource, Clock, ComputedAttributes, ResourceProvider } from '@wharf/kernel';
import { formatIssues } from '@wharf/runtime-host';
import type { StateIO } from '@wharf/runtime-host';
import { ResourceKind } from '@wharf/stack-dsl';
import type { AttributeValue } from '@wharf/stack-dsl';
import type { z } from 'zod';
import {
  ApiRequest,
  DeploymentRequest,
  FunctionRequest,
  IntegrationRequest,
  PermissionRequest,
  PolicyAttachmentRequest,
  RoleRequest,
  RouteRequest,
} from './attributes.js';
import { CLOUD_FILE, CloudStateSchema, emptyCloud } from './cloud-state.js';
import type { CloudRecord, CloudState, TimelineEntry } from './cloud-state.js';
import { CloudApiError } from './errors.js';

export const PROVIDER_NAME = 'simulated';

export type ProviderAction = TimelineEntry['action'];

type Attributes = Readonly<Record<string, AttributeValue>>;

export interface SimulatedProviderOptions {
  readonly io: StateIO;
  readonly region: string;
  readonly accountId: string;
  readonly clock?: Clock | undefined;
}

/** Matches calls by every field it sets. */
export interface FaultRule {
  readonly action?: ProviderAction | undefined;
  readonly kind?: ResourceKind | undefined;
  readonly id?: string | undefined;
  readonly message?: string | undefined;
  /** How many matching calls fail; every one when omitted. */
  readonly times?: number | undefined;
}

interface ActiveFault {
  readonly rule: FaultRule;
  remaining: number | undefined;
}

function text(value: AttributeValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function request<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: ResourceKind, attributes: Attributes): T {
  const parsed = schema.safeParse(attributes);
  if (!parsed.success) {
    throw new CloudApiError('ValidationException', `Invalid ${kind} request: ${formatIssues(parsed.error).replace(/\n/g, '; ')}`);
  }
  return parsed.data;
}

export class SimulatedProvider implements ResourceProvider {
  readonly name = PROVIDER_NAME;
  private readonly io: StateIO;
  private readonly region: string;
  private readonly accountId: string;
  private readonly clock: Clock;
  private readonly faults: ActiveFault[] = [];

  constructor(options: SimulatedProviderOptions) {
    this.io = options.io;
    this.region = options.region;
    this.accountId = options.accountId;
    this.clock = options.clock ?? systemClock;
  }

  // -------------------------------------------------------------------------
  // ResourceProvider
  // -------------------------------------------------------------------------

  async create(id: string, kind: ResourceKind, attributes: Attributes): Promise<ComputedAttributes> {
    return this.call('create', kind, id, (cloud) => {
      if (cloud.records[id] !== undefined) {
        throw new CloudApiError('ResourceConflictException', `${kind} '${id}' already exists`);
      }
      const computed = this.assign(cloud, kind, id, attributes, undefined);
      const now = this.clock();
      cloud.records[id] = { id, kind, attributes: { ...attributes }, computed, created_at: now, updated_at: now };
      return computed;
    });
  }

  async update(current: AppliedResource, attributes: Attributes): Promise<ComputedAttributes> {
    return this.call('update', current.kind, current.id, (cloud) => {
      const previous = this.existing(cloud, current);
      const computed = this.assign(cloud, current.kind, current.id, attributes, previous);
      cloud.records[current.id] = {
        ...previous,
        attributes: { ...attributes },
        computed,
        updated_at: this.clock(),
      };
      return computed;
    });
  }

  async delete(current: AppliedResource): Promise<void> {
    return this.call('delete', current.kind, current.id, (cloud) => {
      const previous = this.existing(cloud, current);
      if (previous.kind === ResourceKind.IamRole) {
        this.assertRoleUnused(cloud, previous);
      }
      delete cloud.records[current.id];
    });
  }

  // -------------------------------------------------------------------------
  // Inspection and fault injection
  // -------------------------------------------------------------------------

  injectFault(rule: FaultRule): void {
    this.faults.push({ rule, remaining: rule.times });
  }

  clearFaults(): void {
    this.faults.length = 0;
  }

  /** Every resource in the cloud, ordered by id. */
  records(): CloudRecord[] {
    return Object.values(this.load().records).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  record(id: string): CloudRecord | undefined {
    return this.load().records[id];
  }

  timeline(): TimelineEntry[] {
    return this.load().timeline;
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  private load(): CloudState {
    let raw: unknown;
    try {
      raw = this.io.readJson(CLOUD_FILE);
    } catch (err: unknown) {
      if (err instanceof SyntaxError) {
        throw new ConfigError('InvalidState', `${CLOUD_FILE} is not valid JSON`, err.message);
      }
      throw err;
    }
    if (raw === undefined) return emptyCloud();
    const parsed = CloudStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError('InvalidState', `${CLOUD_FILE} does not match the expected schema`, formatIssues(parsed.error));
    }
    return parsed.data;
  }

  /**
   * Run one API call against a freshly loaded cloud. A rejected call changes
   * nothing but the timeline.
   */
  private call<T>(action: ProviderAction, kind: ResourceKind, id: string, operation: (cloud: CloudState) => T): T {
    const cloud = this.load();
    try {
      this.checkFaults(action, kind, id);
      const result = operation(cloud);
      this.io.writeJson(CLOUD_FILE, this.withEntry(cloud, { action, kind, id, outcome: 'ok' }));
      return result;
    } catch (err: unknown) {
      if (err instanceof CloudApiError) {
        const untouched = this.load();
        this.io.writeJson(CLOUD_FILE, this.withEntry(untouched, { action, kind, id, outcome: 'rejected', detail: err.message }));
      }
      throw err;
    }
  }

  private withEntry(cloud: CloudState, entry: Omit<TimelineEntry, 'seq' | 'at'>): CloudState {
    return {
      ...cloud,
      timeline: [...cloud.timeline, { seq: cloud.timeline.length + 1, at: this.clock(), ...entry }],
    };
  }

  private checkFaults(action: ProviderAction, kind: ResourceKind, id: string): void {
    for (const fault of this.faults) {
      const { rule } = fault;
      if (rule.action !== undefined && rule.action !== action) continue;
      if (rule.kind !== undefined && rule.kind !== kind) continue;
      if (rule.id !== undefined && rule.id !== id) continue;
      if (fault.remaining !== undefined) {
        if (fault.remaining <= 0) continue;
        fault.remaining -= 1;
      }
      throw new CloudApiError('InjectedFault', rule.message ?? `${action} of ${kind} '${id}' failed`);
    }
  }

  private nextId(cloud: CloudState): string {
    cloud.counter += 1;
    return cloud.counter.toString(36).padStart(10, '0');
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  private existing(cloud: CloudState, current: AppliedResource): CloudRecord {
    const record = cloud.records[current.id];
    if (record === undefined || record.kind !== current.kind) {
      throw new CloudApiError('ResourceNotFoundException', `${current.kind} '${current.id}' does not exist`);
    }
    return record;
  }

  private ofKind(cloud: CloudState, kind: ResourceKind, except?: string): CloudRecord[] {
    return Object.values(cloud.records).filter((r) => r.kind === kind && r.id !== except);
  }

  /** A role by name or ARN. */
  private findRole(cloud: CloudState, ref: string): CloudRecord | undefined {
    return this.ofKind(cloud, ResourceKind.IamRole).find(
      (r) => text(r.attributes['name']) === ref || text(r.computed['arn']) === ref,
    );
  }

  /** A function by name or ARN. */
  private findFunction(cloud: CloudState, ref: string): CloudRecord | undefined {
    return this.ofKind(cloud, ResourceKind.Function).find(
      (r) => text(r.attributes['name']) === ref || text(r.computed['arn']) === ref,
    );
  }

  private findApi(cloud: CloudState, apiId: string): CloudRecord {
    const api = this.ofKind(cloud, ResourceKind.GatewayApi).find((r) => text(r.computed['id']) === apiId);
    if (api === undefined) {
      throw new CloudApiError('ResourceNotFoundException', `Invalid REST API identifier specified ${this.accountId}:${apiId}`);
    }
    return api;
  }

  private findRoute(cloud: CloudState, apiId: string, routeId: string, except?: string): CloudRecord | undefined {
    return this.ofKind(cloud, ResourceKind.GatewayRoute, except).find(
      (r) => text(r.attributes['rest_api']) === apiId && text(r.computed['id']) === routeId,
    );
  }

  private assertUniqueName(cloud: CloudState, kind: ResourceKind, id: string, name: string): void {
    const clash = this.ofKind(cloud, kind, id).find((r) => text(r.attributes['name']) === name);
    if (clash !== undefined) {
      throw new CloudApiError('ResourceConflictException', `${kind} named '${name}' already exists as '${clash.id}'`);
    }
  }

  private assertRoleUnused(cloud: CloudState, role: CloudRecord): void {
    const name = text(role.attributes['name']) ?? role.id;
    const arn = text(role.computed['arn']);
    const fn = this.ofKind(cloud, ResourceKind.Function).find((r) => text(r.attributes['role']) === arn);
    if (fn !== undefined) {
      throw new CloudApiError('DeleteConflict', `Role '${name}' is still used by function '${fn.id}'`);
    }
    const attachment = this.ofKind(cloud, ResourceKind.IamPolicyAttachment).find((r) => {
      const ref = text(r.attributes['role']);
      return ref === name || ref === arn;
    });
    if (attachment !== undefined) {
      throw new CloudApiError('DeleteConflict', `Role '${name}' still has policy attachment '${attachment.id}'`);
    }
  }

  // -------------------------------------------------------------------------
  // Computed attributes
  // -------------------------------------------------------------------------

  private assign(
    cloud: CloudState,
    kind: ResourceKind,
    id: string,
    attributes: Attributes,
    previous: CloudRecord | undefined,
  ): Record<string, AttributeValue> {
    const kept = (key: string): string => text(previous?.computed[key]) ?? this.nextId(cloud);

    switch (kind) {
      case ResourceKind.IamRole: {
        const req = request(RoleRequest, kind, attributes);
        this.assertUniqueName(cloud, kind, id, req.name);
        return { arn: `arn:aws:iam::${this.accountId}:role/${req.name}`, id: req.name };
      }

      case ResourceKind.IamPolicyAttachment: {
        const req = request(PolicyAttachmentRequest, kind, attributes);
        if (this.findRole(cloud, req.role) === undefined) {
          throw new CloudApiError('ResourceNotFoundException', `The role with name ${req.role} cannot be found`);
        }
        return { id: kept('id') };
      }

      case ResourceKind.Function: {
        const req = request(FunctionRequest, kind, attributes);
        const role = this.ofKind(cloud, ResourceKind.IamRole).find((r) => text(r.computed['arn']) === req.role);
        if (role === undefined) {
          throw new CloudApiError('ResourceNotFoundException', `The role defined for the function does not exist: ${req.role}`);
        }
        this.assertUniqueName(cloud, kind, id, req.name);
        const arn = `arn:aws:lambda:${this.region}:${this.accountId}:function:${req.name}`;
        const version = Number.parseInt(text(previous?.computed['version']) ?? '0', 10) + 1;
        return {
          arn,
          invoke_arn: `arn:aws:apigateway:${this.region}:lambda:path/2015-03-31/functions/${arn}/invocations`,
          id: req.name,
          version: String(version),
        };
      }

      case ResourceKind.FunctionPermission: {
        const req = request(PermissionRequest, kind, attributes);
        if (this.findFunction(cloud, req.function) === undefined) {
          throw new CloudApiError('ResourceNotFoundException', `Function not found: ${req.function}`);
        }
        if (req.source_arn.startsWith('arn:aws:execute-api:')) {
          const api = this.ofKind(cloud, ResourceKind.GatewayApi).find((r) => {
            const prefix = text(r.computed['execution_arn']);
            return prefix !== undefined && (req.source_arn === prefix || req.source_arn.startsWith(`${prefix}/`));
          });
          if (api === undefined) {
            throw new CloudApiError('ResourceNotFoundException', `No REST API matches source ARN ${req.source_arn}`);
          }
        }
        return { id: req.statement_id ?? `AllowExecution${kept('id')}` };
      }

      case ResourceKind.GatewayApi: {
        request(ApiRequest, kind, attributes);
        const apiId = kept('id');
        return {
          id: apiId,
          root_resource_id: kept('root_resource_id'),
          execution_arn: `arn:aws:execute-api:${this.region}:${this.accountId}:${apiId}`,
        };
      }

      case ResourceKind.GatewayRoute: {
        const req = request(RouteRequest, kind, attributes);
        const api = this.findApi(cloud, req.rest_api);
        const root = text(api.computed['root_resource_id']);
        const parentId = req.parent_id ?? root;
        let parentPath = '';
        if (parentId !== root) {
          const parent = parentId === undefined ? undefined : this.findRoute(cloud, req.rest_api, parentId, id);
          if (parent === undefined) {
            throw new CloudApiError('ResourceNotFoundException', `Invalid resource identifier specified: ${parentId ?? ''}`);
          }
          parentPath = text(parent.computed['path']) ?? '';
        }
        const path = `${parentPath}/${req.path_part}`;
        const clash = this.ofKind(cloud, kind, id).find(
          (r) =>
            text(r.attributes['rest_api']) === req.rest_api &&
            text(r.computed['path']) === path &&
            text(r.attributes['http_method']) === req.http_method,
        );
        if (clash !== undefined) {
          throw new CloudApiError('ResourceConflictException', `${req.http_method} ${path} is already defined by '${clash.id}'`);
        }
        return { id: kept('id'), path };
      }

      case ResourceKind.GatewayIntegration: {
        const req = request(IntegrationRequest, kind, attributes);
        this.findApi(cloud, req.rest_api);
        if (this.findRoute(cloud, req.rest_api, req.route) === undefined) {
          throw new CloudApiError('ResourceNotFoundException', `Invalid resource identifier specified: ${req.route}`);
        }
        if (req.uri.includes(':lambda:path/')) {
          const target = this.ofKind(cloud, ResourceKind.Function).find((r) => {
            const arn = text(r.computed['arn']);
            return arn !== undefined && req.uri.includes(`/functions/${arn}/`);
          });
          if (target === undefined) {
            throw new CloudApiError('ResourceNotFoundException', `Function in integration URI not found: ${req.uri}`);
          }
        }
        return { id: kept('id') };
      }

      case ResourceKind.GatewayDeployment: {
        const req = request(DeploymentRequest, kind, attributes);
        this.findApi(cloud, req.rest_api);
        return {
          id: this.nextId(cloud),
          invoke_url: `https://${req.rest_api}.execute-api.${this.region}.amazonaws.com/${req.stage_name}`,
        };
      }
    }
  }
}
