import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, isLogLevel, nullLogger } from '../src/index.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with level and module', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createConsoleLogger({ prefix: 'skills' });
    log.warn('Skill "deploy" failed to load', 42);
    expect(warn).toHaveBeenCalledWith('[WARN] [skills] Skill "deploy" failed to load', 42);
  });

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createConsoleLogger({ level: 'error' });

    log.debug('hidden');
    log.info('hidden');
    log.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] shown');
  });

  it('defaults to info level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = createConsoleLogger();

    log.debug('hidden');
    log.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[INFO] shown');
  });
});

describe('nullLogger', () => {
  it('accepts every level without output', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    nullLogger.warn('ignored');
    expect(warn).not.toHaveBeenCalled();
    vi.restoreAllMocks();
  });
});

describe('isLogLevel', () => {
  it('recognizes known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});
