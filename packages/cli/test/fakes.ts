/**
 * Test harness for the `wharf` program: a temporary project, a captured
 * terminal and in-process collaborators.
 */

import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import { appendCustomSection } from '@wharf/kernel';
import type { CompileOutput, CompileRequest, Compiler, ResourceProvider } from '@wharf/kernel';
import { SimulatedProvider } from '@wharf/provider-simulated';
import { FileStateIO } from '@wharf/runtime-host';
import { createProgram } from '../src/commands/index.js';
import type { CliEnvironment } from '../src/context.js';
import type { Terminal } from '../src/terminal.js';

export const FIXED_TIME = '2026-01-01T00:00:00.000Z';
export const ACCOUNT_ID = '123456789012';
export const REGION = 'us-east-1';

const WASM_HEADER = Uint8Array.of(0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00);

export const HELLO_STACK = readFileSync(
  new URL('../../../examples/hello-lambda/stack.wharf', import.meta.url),
  'utf-8',
);

export const BUILD_CONFIG = {
  provider: { account_id: ACCOUNT_ID },
  build: { crate: 'hello', capabilities: ['wascc:logging', 'awslambda:event'] },
};

export interface Project {
  readonly dir: string;
  readonly stateDir: string;
  readonly keyDir: string;
  /** Where the fake compiler writes, and where build signs to. */
  readonly modulePath: string;
  readonly signedPath: string;
}

export function tempProject(config: object = BUILD_CONFIG, stack: string = HELLO_STACK): Project {
  const dir = mkdtempSync(join(tmpdir(), 'wharf-cli-'));
  writeFileSync(join(dir, 'wharf.config.json'), JSON.stringify(config, null, 2));
  writeFileSync(join(dir, 'stack.wharf'), stack);
  return {
    dir,
    stateDir: join(dir, '.wharf'),
    keyDir: join(dir, '.keys'),
    modulePath: join(dir, 'target', 'hello.wasm'),
    signedPath: join(dir, 'target', 'hello_signed.wasm'),
  };
}

/** The same simulated cloud the CLI uses for `project`. */
export function cloudOf(project: Project): SimulatedProvider {
  return new SimulatedProvider({
    io: new FileStateIO(project.stateDir),
    region: REGION,
    accountId: ACCOUNT_ID,
    clock: () => FIXED_TIME,
  });
}

/** Writes a fixed module to `<sourceDir>/target/<crate>.wasm`. */
export class FakeCompiler implements Compiler {
  readonly calls: CompileRequest[] = [];

  compile(request: CompileRequest): Promise<CompileOutput> {
    this.calls.push(request);
    const dir = join(request.sourceDir, 'target');
    mkdirSync(dir, { recursive: true });
    const modulePath = join(dir, `${request.crate}.wasm`);
    writeFileSync(modulePath, appendCustomSection(WASM_HEADER, 'name', Uint8Array.of(1, 2, 3)));
    return Promise.resolve({ modulePath, diagnostics: '' });
  }
}

/** Records plain-text lines; answers prompts from `answers`, then no. */
export function captureTerminal(answers: boolean[] = []): { terminal: Terminal; lines: CapturedTerminalLines } {
  const lines: CapturedTerminalLines = { out: [], err: [], questions: [] };
  const terminal: Terminal = {
    out: (line) => {
      lines.out.push(...stripVTControlCharacters(line).split('\n'));
    },
    err: (line) => {
      lines.err.push(...stripVTControlCharacters(line).split('\n'));
    },
    confirm: (question) => {
      lines.questions.push(question);
      return Promise.resolve(answers.shift() ?? false);
    },
  };
  return { terminal, lines };
}

export interface CapturedTerminalLines {
  readonly out: string[];
  readonly err: string[];
  readonly questions: string[];
}

export interface RunResult extends CapturedTerminalLines {
  readonly code: number;
}

export interface RunOptions {
  readonly answers?: boolean[] | undefined;
  readonly provider?: ResourceProvider | undefined;
  readonly compiler?: Compiler | undefined;
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

let eventCounter = 0;

/** Event ids stay unique across runs against the same log. */
function nextEventId(): string {
  eventCounter += 1;
  return `E${String(eventCounter).padStart(6, '0')}`;
}

/** Run `wharf <args>` in the project directory. */
export async function wharf(project: Project, args: string[], options: RunOptions = {}): Promise<RunResult> {
  const { terminal, lines } = captureTerminal(options.answers);
  let code = 0;
  const cli: CliEnvironment = {
    terminal,
    setExitCode: (value) => {
      code = value;
    },
    cwd: project.dir,
    env: options.env ?? {},
    overrides: {
      compiler: options.compiler ?? new FakeCompiler(),
      provider: options.provider,
      clock: () => FIXED_TIME,
      newEventId: nextEventId,
    },
  };
  const program = createProgram(cli);
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({
      writeOut: (text) => lines.out.push(text.trimEnd()),
      writeErr: (text) => lines.err.push(text.trimEnd()),
    });
  }
  await program.parseAsync(args, { from: 'user' });
  return { code, ...lines };
}
