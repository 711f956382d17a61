import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, isLogLevel, logDebug, setLogLevel, type LogLevel } from '../logger.js';

let previousLevel: LogLevel;

beforeEach(() => {
  previousLevel = getLogLevel();
  setLogLevel('debug');
});

afterEach(() => {
  setLogLevel(previousLevel);
  vi.restoreAllMocks();
});

describe('telemetry logger', () => {
  it('logs the message only when context is undefined', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logDebug('hello');

    expect(spy).toHaveBeenCalledWith('hello');
  });

  it('logs the message only when context is empty', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logDebug('hello', {});

    expect(spy).toHaveBeenCalledWith('hello');
  });

  it('logs message and context when context has keys', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const context = { path: '/work/app' };

    logDebug('hello', context);

    expect(spy).toHaveBeenCalledWith('hello', context);
  });

  it('writes to stderr, never stdout', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logDebug('hello');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('drops debug messages above the debug level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    for (const level of ['info', 'warn', 'error', 'silent'] as const) {
      setLogLevel(level);
      logDebug(`suppressed at ${level}`);
    }

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('recognizes valid level names only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
