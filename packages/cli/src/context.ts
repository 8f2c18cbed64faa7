/**
 * Wharf CLI — Command Context
 *
 * Resolves the project configuration and wires the concrete collaborators
 * behind the pipeline: file state and lock, the deploy log, key files, the
 * toolchain and the simulated provider. Tests swap individual collaborators
 * through `overrides`.
 */

import { resolve } from 'node:path'
import { z } from 'zod'
import { DeployLogger } from '@wharf/kernel'
import type { Clock, Compiler, ExecAdapter, KeyGenerator, ResourceProvider, Signer } from '@wharf/kernel'
import { ArtifactBuilder, Deployer, KeyManager, Provisioner } from '@wharf/pipeline'
import { SimulatedProvider } from '@wharf/provider-simulated'
import {
  CargoCompiler,
  DeployStateStore,
  Ed25519KeyGenerator,
  EmbeddedSigner,
  FileKeyStore,
  FileLogSink,
  FileStateIO,
  loadConfig,
  NkKeyGenerator,
  NodeExecAdapter,
  StateLock,
  WascapSigner,
} from '@wharf/runtime-host'
import type { StateIO, WharfConfig } from '@wharf/runtime-host'
import type { Terminal } from './terminal.js'

// ---------------------------------------------------------------------------
// Global options
// ---------------------------------------------------------------------------

export const GlobalOptionsSchema = z.object({
  project: z.string().optional(),
  stateDir: z.string().optional(),
  keyDir: z.string().optional(),
  profile: z.string().optional(),
  yes: z.boolean().default(false),
})

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>

// ---------------------------------------------------------------------------
// CLI environment
// ---------------------------------------------------------------------------

export interface ContextOverrides {
  readonly compiler?: Compiler | undefined
  readonly exec?: ExecAdapter | undefined
  readonly provider?: ResourceProvider | undefined
  readonly clock?: Clock | undefined
  readonly newEventId?: (() => string) | undefined
}

/** What the process gives the CLI. The bin passes the real one. */
export interface CliEnvironment {
  readonly terminal: Terminal
  readonly setExitCode: (code: number) => void
  readonly cwd: string
  readonly env: Readonly<Record<string, string | undefined>>
  readonly overrides?: ContextOverrides | undefined
}

export interface CommandContext {
  readonly config: WharfConfig
  readonly io: StateIO
  readonly store: DeployStateStore
  readonly lock: StateLock
  readonly logger: DeployLogger
  readonly keyStore: FileKeyStore
  readonly keys: KeyManager
  readonly builder: ArtifactBuilder
  readonly deployer: Deployer
}

export function createContext(options: GlobalOptions, cli: CliEnvironment): CommandContext {
  const overrides = cli.overrides ?? {}
  const config = loadConfig({
    projectDir: resolve(cli.cwd, options.project ?? '.'),
    overrides: { stateDir: options.stateDir, keyDir: options.keyDir, profile: options.profile },
    env: cli.env,
  })

  const io = new FileStateIO(config.stateDir)
  const store = new DeployStateStore(io, { clock: overrides.clock })
  const lock = new StateLock(io, overrides.clock)
  const logger = new DeployLogger(new FileLogSink(io, overrides.newEventId), overrides.clock)

  const exec = overrides.exec ?? new NodeExecAdapter()
  const generator: KeyGenerator =
    config.keyGenerator === 'nk' ? new NkKeyGenerator(exec) : new Ed25519KeyGenerator()
  const signer: Signer = config.build?.signer === 'wascap' ? new WascapSigner(exec) : new EmbeddedSigner()

  const keyStore = new FileKeyStore(config.keyDir)
  const keys = new KeyManager(keyStore, generator, logger)
  const builder = new ArtifactBuilder({
    compiler: overrides.compiler ?? new CargoCompiler(exec),
    signer,
    store,
    logger,
    clock: overrides.clock,
  })

  const provider =
    overrides.provider ??
    new SimulatedProvider({
      io,
      region: config.provider.region,
      accountId: config.provider.accountId,
      clock: overrides.clock,
    })
  const provisioner = new Provisioner({ provider, store, logger, clock: overrides.clock })
  const deployer = new Deployer({ provisioner, lock, artifacts: store, logger })

  return { config, io, store, lock, logger, keyStore, keys, builder, deployer }
}
