import { describe, expect, it, vi } from 'vitest';

import { Logger, parseLogLevel } from '../../src/core/logger.js';

describe('parseLogLevel', () => {
  it('normalizes known levels', () => {
    expect(parseLogLevel(' WARN ')).toBe('warn');
    expect(parseLogLevel('debug', 'error')).toBe('debug');
  });

  it('falls back for unknown input', () => {
    expect(parseLogLevel('loud', 'error')).toBe('error');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});

describe('Logger', () => {
  it('drops messages below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new Logger('warn');
    logger.info('hidden');
    logger.debug('hidden');
    expect(log).not.toHaveBeenCalled();
  });

  it('prefixes the level and scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    new Logger('info').child('pipeline').warn('slow market');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/ WARN \[pipeline\] slow market$/);
  });

  it('nests scopes', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    new Logger('error').child('cli').child('backtest').error('failed', 'detail');
    expect(error.mock.calls[0]?.[0]).toMatch(/ ERROR \[cli:backtest\] failed detail$/);
  });

  it('prints error stacks', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('disk unavailable');
    new Logger().error('write failed', failure);
    expect(error.mock.calls[0]?.[0]).toContain('Error: disk unavailable');
  });
});
