/**
 * Wharf Lambda Runtime — Console Log
 *
 * Inside the function, output goes to stderr and from there to the function's
 * log stream. `WHARF_LOG` sets the level (default `info`); `WHARF_TRACE`
 * adds stack traces to logged errors.
 */

export const LOG_LEVELS = ['off', 'error', 'warn', 'info', 'debug'] as const;
export type RuntimeLogLevel = (typeof LOG_LEVELS)[number];

export interface RuntimeLog {
  error(message: string, err?: unknown): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

function isLevel(value: string): value is RuntimeLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ConsoleRuntimeLog implements RuntimeLog {
  constructor(
    private readonly level: RuntimeLogLevel = 'info',
    private readonly trace = false,
    private readonly write: (line: string) => void = (line) => {
      process.stderr.write(line + '\n');
    },
  ) {}

  /** Unknown `WHARF_LOG` values fall back to `info`. */
  static fromEnv(env: Readonly<Record<string, string | undefined>>, write?: (line: string) => void): ConsoleRuntimeLog {
    const requested = (env['WHARF_LOG'] ?? '').trim().toLowerCase();
    const traceFlag = (env['WHARF_TRACE'] ?? '').trim().toLowerCase();
    return new ConsoleRuntimeLog(
      isLevel(requested) ? requested : 'info',
      traceFlag === '1' || traceFlag === 'true',
      write,
    );
  }

  private enabled(level: RuntimeLogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private emit(level: Exclude<RuntimeLogLevel, 'off'>, message: string): void {
    if (this.level === 'off' || !this.enabled(level)) return;
    this.write(`${level.toUpperCase()} ${message}`);
  }

  error(message: string, err?: unknown): void {
    if (err === undefined) {
      this.emit('error', message);
      return;
    }
    const stack = this.trace && err instanceof Error && err.stack !== undefined ? `\n${err.stack}` : '';
    this.emit('error', `${message}: ${errorMessage(err)}${stack}`);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  debug(message: string): void {
    this.emit('debug', message);
  }
}
