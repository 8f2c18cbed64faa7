import { describe, expect, it } from 'vitest';
import { ConfigError } from '@wharf/kernel';
import { ConsoleRuntimeLog } from '../src/log.js';
import { loadFunctionSettings } from '../src/settings.js';
import { LAMBDA_ENV } from './fakes.js';

describe('loadFunctionSettings', () => {
  it('returns the seven function settings and nothing else', () => {
    expect(loadFunctionSettings({ ...LAMBDA_ENV, PATH: '/usr/bin' })).toEqual(LAMBDA_ENV);
  });

  it('names every missing or empty value', () => {
    const env: Record<string, string | undefined> = {
      ...LAMBDA_ENV,
      AWS_LAMBDA_RUNTIME_API: '',
      LAMBDA_TASK_ROOT: undefined,
    };
    expect(() => loadFunctionSettings(env)).toThrow(ConfigError);
    expect(() => loadFunctionSettings(env)).toThrow(
      'Missing Lambda environment value(s): AWS_LAMBDA_RUNTIME_API, LAMBDA_TASK_ROOT',
    );
  });
});

describe('ConsoleRuntimeLog', () => {
  function logFor(env: Record<string, string>): { log: ConsoleRuntimeLog; lines: string[] } {
    const lines: string[] = [];
    return { log: ConsoleRuntimeLog.fromEnv(env, (line) => lines.push(line)), lines };
  }

  it('writes info and above by default', () => {
    const { log, lines } = logFor({});
    log.debug('hidden');
    log.info('starting');
    log.error('failed', new Error('boom'));
    expect(lines).toEqual(['INFO starting', 'ERROR failed: boom']);
  });

  it('filters by WHARF_LOG', () => {
    const { log, lines } = logFor({ WHARF_LOG: 'WARN' });
    log.info('hidden');
    log.warn('careful');
    expect(lines).toEqual(['WARN careful']);
  });

  it('writes nothing when WHARF_LOG is off', () => {
    const { log, lines } = logFor({ WHARF_LOG: 'off' });
    log.error('failed');
    expect(lines).toEqual([]);
  });

  it('falls back to info for an unknown level', () => {
    const { log, lines } = logFor({ WHARF_LOG: 'loud' });
    log.debug('hidden');
    log.info('shown');
    expect(lines).toEqual(['INFO shown']);
  });

  it('adds the stack trace when WHARF_TRACE is set', () => {
    const { log, lines } = logFor({ WHARF_TRACE: '1' });
    log.error('failed', new Error('boom'));
    expect(lines).toHaveLength(1);
    expect(lines[0]?.startsWith('ERROR failed: boom\nError: boom\n')).toBe(true);
  });
});
