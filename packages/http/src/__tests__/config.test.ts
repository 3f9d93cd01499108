import { describe, expect, it } from 'vitest';

import { parseEngineConfig, parseScriptBehavior } from '../config.js';
import { ConfigurationError } from '../errors.js';

const settingsDocument = () => ({
  'script-behavior': {
    'api-timeouts': {
      'async-max-wait': 300,
      'async-poll-interval': 5,
      'rest-timeout-seconds': 30,
    },
    'circuit-breaker': {
      enabled: true,
      'failure-threshold': 5,
      'timeout-seconds': 60,
    },
    'connection-pool': { 'max-sessions': 10 },
    jitter: { 'max-factor': 1.5, 'min-factor': 0.5 },
    'rate-limiting': {
      'burst-size': 20,
      'calls-per-second': 10,
      enabled: true,
    },
    'retry-strategy': { 'backoff-factor': 2, 'max-retries': 3 },
  },
});

describe('parseEngineConfig', () => {
  const required = {
    backoffFactor: 2,
    breakerTimeoutSeconds: 60,
    burstSize: 1,
    callsPerSecond: 1,
    failureThreshold: 3,
    jitterMaxFactor: 1.5,
    jitterMinFactor: 0.5,
    maxRetries: 2,
    maxSessions: 4,
    maxWaitSeconds: 60,
    pollIntervalSeconds: 2,
    requestTimeoutSeconds: 10,
  };

  it('fills optional fields with defaults', () => {
    expect(parseEngineConfig(required)).toEqual({
      ...required,
      baseDelaySeconds: 1,
      breakerEnabled: true,
      maxDelaySeconds: 60,
      userAgent: 'steady-http/1.0.0',
    });
  });

  it('lists every missing field', () => {
    try {
      parseEngineConfig({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map((issue) => issue.path)).toEqual([
          'backoffFactor',
          'breakerTimeoutSeconds',
          'burstSize',
          'callsPerSecond',
          'failureThreshold',
          'jitterMaxFactor',
          'jitterMinFactor',
          'maxRetries',
          'maxSessions',
          'maxWaitSeconds',
          'pollIntervalSeconds',
          'requestTimeoutSeconds',
        ]);
      }
    }
  });

  it('rejects an inverted jitter range', () => {
    expect(() => parseEngineConfig({ ...required, jitterMaxFactor: 0.5, jitterMinFactor: 1.5 })).toThrow(
      'jitterMinFactor: jitterMinFactor must not exceed jitterMaxFactor'
    );
  });

  it('rejects a burst size below one', () => {
    expect(() => parseEngineConfig({ ...required, burstSize: 0 })).toThrow(ConfigurationError);
  });
});

describe('parseScriptBehavior', () => {
  it('maps the kebab-case document onto the engine configuration', () => {
    expect(parseScriptBehavior(settingsDocument())).toEqual({
      backoffFactor: 2,
      baseDelaySeconds: 1,
      breakerEnabled: true,
      breakerTimeoutSeconds: 60,
      burstSize: 20,
      callsPerSecond: 10,
      failureThreshold: 5,
      jitterMaxFactor: 1.5,
      jitterMinFactor: 0.5,
      maxDelaySeconds: 60,
      maxRetries: 3,
      maxSessions: 10,
      maxWaitSeconds: 300,
      pollIntervalSeconds: 5,
      requestTimeoutSeconds: 30,
      userAgent: 'steady-http/1.0.0',
    });
  });

  it('disables rate limiting and the breaker when their sections say so', () => {
    const document = settingsDocument();
    const behavior = {
      ...document['script-behavior'],
      'circuit-breaker': { enabled: false },
      'rate-limiting': { enabled: false },
    };

    const config = parseScriptBehavior({ 'script-behavior': behavior });

    expect(config).toMatchObject({ breakerEnabled: false, burstSize: 1, callsPerSecond: 0 });
  });

  it('names the missing key', () => {
    const document = settingsDocument();
    const { 'async-max-wait': _dropped, ...timeouts } = document['script-behavior']['api-timeouts'];

    expect(() =>
      parseScriptBehavior({ 'script-behavior': { ...document['script-behavior'], 'api-timeouts': timeouts } })
    ).toThrow('script-behavior.api-timeouts.async-max-wait: Required');
  });
});
