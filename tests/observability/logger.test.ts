import { describe, it, expect, afterEach, vi } from 'vitest';
import { configureLogger, formatLogLine, isLevelEnabled, logger } from '../../src/observability/logger';

describe('logger', () => {
  afterEach(() => {
    configureLogger({ level: 'error', format: 'plain' });
    vi.restoreAllMocks();
  });

  it('should format plain lines as level, event and key=value pairs', () => {
    configureLogger({ format: 'plain' });

    expect(formatLogLine('info', 'whois_connect', { host: 'whois.example.test', port: 43 }))
      .toBe('[info] whois_connect host=whois.example.test port=43');
  });

  it('should quote plain values that need it and skip undefined ones', () => {
    configureLogger({ format: 'plain' });

    const line = formatLogLine('warn', 'lookup_failed', {
      reason: 'as 1 not found',
      empty: '',
      missing: undefined,
      error: new Error('boom')
    });

    expect(line).toBe('[warn] lookup_failed reason="as 1 not found" empty="" error="boom"');
  });

  it('should format json lines with type, level, event and timestamp', () => {
    configureLogger({ format: 'json' });

    const parsed: unknown = JSON.parse(formatLogLine('error', 'storage_failed', { asn: '64500', error: new Error('gone') }));

    expect(parsed).toEqual({
      type: 'log',
      level: 'error',
      event: 'storage_failed',
      timestamp: expect.any(String),
      asn: '64500',
      error: 'gone'
    });
  });

  it('should drop events below the configured level', () => {
    configureLogger({ level: 'warn', format: 'plain' });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.info('quiet');
    logger.warn('loud', { n: 1 });

    expect(isLevelEnabled('debug')).toBe(false);
    expect(isLevelEnabled('error')).toBe(true);
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[warn] loud n=1');
  });

  it('should send info and debug to stdout', () => {
    configureLogger({ level: 'debug', format: 'plain' });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.debug('whois_query', { asn: '64500' });

    expect(log).toHaveBeenCalledWith('[debug] whois_query asn=64500');
  });
});
