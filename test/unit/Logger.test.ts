import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, createLogger, formatLogEntry } from '../../src/utils/Logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format entries with timestamp, padded level and context', () => {
    const timestamp = new Date('2024-01-02T03:04:05.000Z');

    expect(formatLogEntry({ level: 'info', message: 'hello', context: 'Exporter', timestamp })).toBe(
      '2024-01-02T03:04:05.000Z INFO  [Exporter] hello'
    );
    expect(formatLogEntry({ level: 'error', message: 'boom', timestamp })).toBe(
      '2024-01-02T03:04:05.000Z ERROR  boom'
    );
  });

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger('warn', 'Test');
    logger.debug('hidden');
    logger.warn('shown', { key: 1 });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/ WARN  \[Test\] shown$/);
    expect(warn.mock.calls[0]?.[1]).toEqual({ key: 1 });
  });

  it('should write nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('silent').error('quiet');

    expect(error).not.toHaveBeenCalled();
  });

  it('should chain child contexts', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    new Logger('debug', 'Exporter').child('Parser').info('parsed');

    expect(info.mock.calls[0]?.[0]).toMatch(/ INFO  \[Exporter:Parser\] parsed$/);
  });

  it('should report enabled levels', () => {
    const logger = new Logger('info');

    expect(logger.isEnabled('debug')).toBe(false);
    expect(logger.isEnabled('info')).toBe(true);
    expect(logger.isEnabled('error')).toBe(true);
    expect(logger.isEnabled('silent')).toBe(false);
  });
});
