import { afterEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarn, setLogLevel } from '../src/logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('prefixes lines with a timestamp and level', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-02-11T00:00:00.000Z'));
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logInfo('hello');
    logInfo('with meta', { id: 1 });

    expect(logSpy).toHaveBeenNthCalledWith(1, '[2026-02-11T00:00:00.000Z] INFO hello');
    expect(logSpy).toHaveBeenNthCalledWith(2, '[2026-02-11T00:00:00.000Z] INFO with meta', { id: 1 });
  });

  it('drops lines below the configured level but always keeps errors', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logDebug('hidden at info');
    setLogLevel('error');
    logInfo('hidden');
    logWarn('hidden');
    logError('shown');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
