import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  getLogLevel,
  isLogLevel,
  logDebug,
  logError,
  logInfo,
  logWarning,
  resetLogLevel,
  setLogLevel,
} from '../logger.js';

beforeEach(() => {
  setLogLevel('debug');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is undefined`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { file: 'library.json' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }
});

describe('log level threshold', () => {
  it('drops messages below the configured level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    logDebug('debug');
    logInfo('info');
    logWarning('warn');
    logError('error');

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('error');
  });

  it('emits nothing when silent', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');

    logError('boom');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('resets to info', () => {
    setLogLevel('error');
    resetLogLevel();
    expect(getLogLevel()).toBe('info');
  });

  it('recognises level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
