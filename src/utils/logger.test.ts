import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, logger, parseLogLevel } from './logger';

afterEach(() => {
  logger.setLevel(LogLevel.NONE);
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('parses level names', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });

  it('writes timestamped lines at or above the level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.INFO);

    logger.info('Segmenting SALAMI_1.mp3');
    logger.debug('hidden');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2},\d{3}: INFO: Segmenting SALAMI_1\.mp3$/);
  });
});
