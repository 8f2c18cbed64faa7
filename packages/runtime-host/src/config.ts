/**
 * Wharf Runtime Host — Project Configuration
 *
 * Reads `wharf.config.json` from the project directory and resolves the
 * settings each command needs. Precedence, highest first:
 *
 *   1. Explicit overrides (CLI flags: --state-dir, --key-dir, --profile)
 *   2. Environment: WHARF_STATE_DIR, WHARF_KEY_DIR, WHARF_PROFILE
 *   3. wharf.config.json
 *   4. Defaults
 *
 * Relative paths are resolved against the project directory. A missing
 * config file is not an error; a malformed one is.
 */

import { readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@wharf/kernel';
import type { BuildProfile } from '@wharf/kernel';
import type { AttributeValue } from '@wharf/stack-dsl';
import { isNodeError } from './state/state-io.js';
import { formatIssues } from './state/schemas.js';

export const CONFIG_FILE = 'wharf.config.json';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const ProfileSchema = z.enum(['debug', 'release']);

const VariableValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const WharfConfigSchema = z
  .object({
    stack: z.string().min(1).default('stack.wharf'),
    state_dir: z.string().min(1).default('.wharf'),
    key_dir: z.string().min(1).default('.keys'),
    provider: z
      .object({
        name: z.literal('simulated').default('simulated'),
        region: z.string().min(1).default('us-east-1'),
        account_id: z.string().regex(/^[0-9]{12}$/, 'must be a 12-digit account id').default('000000000000'),
      })
      .strict()
      .default({}),
    build: z
      .object({
        source_dir: z.string().min(1).default('.'),
        crate: z.string().min(1),
        profile: ProfileSchema.default('release'),
        name: z.string().min(1).optional(),
        capabilities: z.array(z.string()).default([]),
        signer: z.enum(['embedded', 'wascap']).default('embedded'),
      })
      .strict()
      .optional(),
    keys: z
      .object({
        generator: z.enum(['ed25519', 'nk']).default('ed25519'),
      })
      .strict()
      .default({}),
    variables: z.record(VariableValueSchema).default({}),
  })
  .strict();

export type WharfConfigFile = z.infer<typeof WharfConfigSchema>;

// ---------------------------------------------------------------------------
// Resolved configuration
// ---------------------------------------------------------------------------

export interface BuildSettings {
  readonly sourceDir: string;
  readonly crate: string;
  readonly profile: BuildProfile;
  /** Name embedded in the claims; defaults to the crate name. */
  readonly name: string;
  readonly capabilities: ReadonlyArray<string>;
  readonly signer: 'embedded' | 'wascap';
}

export interface WharfConfig {
  readonly projectDir: string;
  readonly stackPath: string;
  readonly stateDir: string;
  readonly keyDir: string;
  readonly provider: { readonly name: 'simulated'; readonly region: string; readonly accountId: string };
  /** Absent when the config file declares no build section. */
  readonly build: BuildSettings | undefined;
  readonly keyGenerator: 'ed25519' | 'nk';
  readonly variables: Readonly<Record<string, AttributeValue>>;
}

export interface ConfigOverrides {
  readonly stateDir?: string | undefined;
  readonly keyDir?: string | undefined;
  readonly profile?: string | undefined;
}

export interface LoadConfigOptions {
  readonly projectDir: string;
  readonly overrides?: ConfigOverrides | undefined;
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

function firstSet(...values: ReadonlyArray<string | undefined>): string | undefined {
  return values.find((v) => v !== undefined && v !== '');
}

function parseProfile(value: string, source: string): BuildProfile {
  const parsed = ProfileSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError('InvalidConfig', `Invalid build profile '${value}' from ${source} (expected debug or release)`);
  }
  return parsed.data;
}

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return {};
    throw err;
  }
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError('InvalidConfig', `${path} is not valid JSON`, String(err));
  }
}

/**
 * Load and resolve the project configuration.
 *
 * @throws {ConfigError} InvalidConfig when the file or an override is invalid
 */
export function loadConfig(options: LoadConfigOptions): WharfConfig {
  const projectDir = resolve(options.projectDir);
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const configPath = join(projectDir, CONFIG_FILE);

  const parsed = WharfConfigSchema.safeParse(readConfigFile(configPath));
  if (!parsed.success) {
    throw new ConfigError('InvalidConfig', `Invalid ${CONFIG_FILE}`, formatIssues(parsed.error));
  }
  const file = parsed.data;
  const inProject = (path: string): string => (isAbsolute(path) ? path : resolve(projectDir, path));

  const stateDir = firstSet(overrides.stateDir, env['WHARF_STATE_DIR']) ?? file.state_dir;
  const keyDir = firstSet(overrides.keyDir, env['WHARF_KEY_DIR']) ?? file.key_dir;

  let build: BuildSettings | undefined;
  if (file.build !== undefined) {
    const profile =
      overrides.profile !== undefined && overrides.profile !== ''
        ? parseProfile(overrides.profile, '--profile')
        : env['WHARF_PROFILE'] !== undefined && env['WHARF_PROFILE'] !== ''
          ? parseProfile(env['WHARF_PROFILE'], 'WHARF_PROFILE')
          : file.build.profile;
    build = {
      sourceDir: inProject(file.build.source_dir),
      crate: file.build.crate,
      profile,
      name: file.build.name ?? file.build.crate,
      capabilities: file.build.capabilities,
      signer: file.build.signer,
    };
  }

  return {
    projectDir,
    stackPath: inProject(file.stack),
    stateDir: inProject(stateDir),
    keyDir: inProject(keyDir),
    provider: { name: file.provider.name, region: file.provider.region, accountId: file.provider.account_id },
    build,
    keyGenerator: file.keys.generator,
    variables: file.variables,
  };
}
