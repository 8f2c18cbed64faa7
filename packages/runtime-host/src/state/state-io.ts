/**
 * Wharf Runtime Host — StateIO Interface
 *
 * A state-directory-scoped, injectable I/O abstraction for JSON state files,
 * the deploy lock and JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a state directory (`.wharf/`)
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Every stateful class injects StateIO rather than touching node:fs, so the
 * pipeline can be exercised without a file system.
 */

import {
  appendFileSync,
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * All file paths are relative filenames. JSON state and the lock address the
 * `state/` subdirectory; log lines address the `logs/` subdirectory.
 */
export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * Returns `undefined` if the file does not exist. Malformed JSON throws a
   * SyntaxError: persisted state is never silently replaced by a default.
   * The result is unvalidated; callers parse it with a schema.
   */
  readJson(filename: string): unknown;

  /** Serialize `value` as JSON, replacing any existing file. */
  writeJson(filename: string, value: unknown): void;

  /**
   * Create a state file only if it does not exist yet.
   * Returns false, and writes nothing, when it already exists.
   */
  createExclusive(filename: string, content: string): boolean;

  /** Read a state file as text; `undefined` if it does not exist. */
  readText(filename: string): string | undefined;

  /** Delete a state file. Deleting a missing file is not an error. */
  remove(filename: string): void;

  /** Append one line (a newline is added) to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw content of a log file; '' if it does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Reads and writes `<stateDir>/state/<filename>`.
 * Appends log lines to `<stateDir>/logs/<logfilename>`.
 *
 * Directory creation is on demand. Synchronous I/O matches the CLI's
 * single-process, sequential design. ENOENT is the only error treated as
 * "absent"; everything else is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly stateDir: string) {}

  private statePath(filename: string): string {
    return join(this.stateDir, 'state', filename);
  }

  readJson(filename: string): unknown {
    const raw = this.readText(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    mkdirSync(join(this.stateDir, 'state'), { recursive: true });
    writeFileSync(this.statePath(filename), JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  createExclusive(filename: string, content: string): boolean {
    mkdirSync(join(this.stateDir, 'state'), { recursive: true });
    try {
      writeFileSync(this.statePath(filename), content, { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (err: unknown) {
      if (isNodeError(err, 'EEXIST')) {
        return false;
      }
      throw err;
    }
  }

  readText(filename: string): string | undefined {
    try {
      return readFileSync(this.statePath(filename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  remove(filename: string): void {
    rmSync(this.statePath(filename), { force: true });
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.stateDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.stateDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO implementation.
 *
 * State files are kept as serialized text so readJson round-trips through
 * JSON exactly as FileStateIO does (undefined properties disappear, etc.).
 * Multiple instances are completely isolated from each other.
 */
export class MemoryStateIO implements StateIO {
  private readonly files: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const raw = this.files.get(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.files.set(filename, JSON.stringify(value, null, 2) + '\n');
  }

  createExclusive(filename: string, content: string): boolean {
    if (this.files.has(filename)) return false;
    this.files.set(filename, content);
    return true;
  }

  readText(filename: string): string | undefined {
    return this.files.get(filename);
  }

  remove(filename: string): void {
    this.files.delete(filename);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Return all lines appended to a log file.
   *
   * Specific to MemoryStateIO; use it in tests to check audit output.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}
