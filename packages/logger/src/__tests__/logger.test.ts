import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { validateLoggerEnv } from '../env.schema.js';
import { getLogger, initLogger } from '../logger.js';

function captureLines(): { destination: { write: (msg: string) => void }; entries: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  return {
    destination: {
      write: (msg: string) => {
        lines.push(msg);
      },
    },
    entries: () => lines.map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger();
  });

  afterEach(() => {
    initLogger();
  });

  it('should be silent under test without a destination', () => {
    const logger = getLogger('silent');

    expect(() => logger.info('nothing to see')).not.toThrow();
  });

  it('should write category and message as JSON', () => {
    const capture = captureLines();
    initLogger({ destination: capture.destination, level: 'info' });

    getLogger('RequestEngine').info('request finished');

    const entries = capture.entries();
    expect(entries).toHaveLength(1);
    expect(entries[0]?.['category']).toBe('RequestEngine');
    expect(entries[0]?.['msg']).toBe('request finished');
    expect(entries[0]?.['level']).toBe(30);
  });

  it('should merge context objects into the entry', () => {
    const capture = captureLines();
    initLogger({ destination: capture.destination, level: 'info' });

    getLogger('test').warn({ attempt: 2, host: 'api.example.com' }, 'retrying');

    const entries = capture.entries();
    expect(entries[0]?.['attempt']).toBe(2);
    expect(entries[0]?.['host']).toBe('api.example.com');
    expect(entries[0]?.['level']).toBe(40);
  });

  it('should respect log levels', () => {
    const capture = captureLines();
    initLogger({ destination: capture.destination, level: 'warn' });
    const logger = getLogger('test');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(capture.entries().map((entry) => entry['msg'])).toEqual(['warn message', 'error message']);
  });

  it('should apply new configuration to loggers captured earlier', () => {
    const logger = getLogger('captured');
    const capture = captureLines();

    initLogger({ destination: capture.destination, level: 'debug' });
    logger.debug('after reconfigure');

    expect(capture.entries()).toHaveLength(1);
  });
});

describe('validateLoggerEnv', () => {
  it('should apply defaults', () => {
    const env = validateLoggerEnv({});

    expect(env.LOGGER_LOG_LEVEL).toBe('info');
    expect(env.LOGGER_CONSOLE_ENABLED).toBe(true);
    expect(env.LOGGER_SERVICE_NAME).toBe('steady-http');
    expect(env.NODE_ENV).toBe('development');
  });

  it('should parse boolean flags', () => {
    expect(validateLoggerEnv({ LOGGER_CONSOLE_ENABLED: 'false' }).LOGGER_CONSOLE_ENABLED).toBe(false);
  });

  it('should reject unknown log levels', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_LEVEL: 'loud' })).toThrow(/LOGGER_LOG_LEVEL/);
  });
});
