import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger } from './consoleLogger';
import type { PlanRequested } from '../types/events';

const event: PlanRequested = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'PlanRequested',
  payload: { goal: 'survive' },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes events as JSON to stderr at debug level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'debug' });
    logger.log(event);
    logger.trace(event, 'hello');

    expect(errorSpy).toHaveBeenCalledWith(JSON.stringify(event));
    expect(errorSpy).toHaveBeenCalledWith('hello', JSON.stringify(event));
  });

  it('defaults to info and hides events and debug messages', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.log(event);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(errorSpy.mock.calls).toEqual([['i'], ['w']]);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('filters by the configured level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const warnOnly = new ConsoleLogger({ level: 'warn' });
    warnOnly.info('i');
    warnOnly.warn('w');
    expect(errorSpy.mock.calls).toEqual([['w']]);

    errorSpy.mockClear();
    new ConsoleLogger({ level: 'silent' }).error(new Error('boom'));
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('handles both error branches', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    logger.child({ oracle: 'fake' }).warn('warn');

    expect(errorSpy.mock.calls).toEqual([['no-prefix'], ['[a=1 b=x] hello'], ['[oracle=fake] warn']]);
  });
});
