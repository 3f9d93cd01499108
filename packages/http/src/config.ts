import { z } from 'zod';

import { ConfigurationError } from './errors.js';

const positiveSeconds = z.number().positive();

export const engineConfigSchema = z
  .object({
    backoffFactor: z.number().min(1),
    baseDelaySeconds: positiveSeconds.default(1),
    baseUrl: z.string().url().optional(),
    breakerEnabled: z.boolean().default(true),
    breakerTimeoutSeconds: z.number().min(0),
    burstSize: z.number().min(1),
    /** 0 disables rate limiting */
    callsPerSecond: z.number().min(0),
    defaultHeaders: z.record(z.string()).optional(),
    failureThreshold: z.number().int().positive(),
    jitterMaxFactor: z.number().min(0),
    jitterMinFactor: z.number().min(0),
    maxDelaySeconds: positiveSeconds.default(60),
    maxRetries: z.number().int().min(0),
    maxSessions: z.number().int().positive(),
    maxWaitSeconds: positiveSeconds,
    pollIntervalSeconds: positiveSeconds,
    requestTimeoutSeconds: positiveSeconds,
    userAgent: z.string().min(1).default('steady-http/1.0.0'),
  })
  .refine((config) => config.jitterMinFactor <= config.jitterMaxFactor, {
    message: 'jitterMinFactor must not exceed jitterMaxFactor',
    path: ['jitterMinFactor'],
  });

export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate engine configuration up front.
 * @throws ConfigurationError listing every missing or invalid field
 */
export function parseEngineConfig(input: unknown): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const details = issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n');
    throw new ConfigurationError(`Invalid engine configuration:\n${details}`, issues);
  }
  return result.data;
}

const rateLimitingSchema = z.discriminatedUnion('enabled', [
  z.object({
    'burst-size': z.number().min(1),
    'calls-per-second': z.number().positive(),
    enabled: z.literal(true),
  }),
  z.object({ enabled: z.literal(false) }),
]);

const circuitBreakerSchema = z.discriminatedUnion('enabled', [
  z.object({
    enabled: z.literal(true),
    'failure-threshold': z.number().int().positive(),
    'timeout-seconds': z.number().min(0),
  }),
  z.object({ enabled: z.literal(false) }),
]);

/**
 * Kebab-case settings document: the `script-behavior` section of a
 * project configuration file
 */
export const scriptBehaviorSchema = z.object({
  'script-behavior': z.object({
    'api-timeouts': z.object({
      'async-max-wait': positiveSeconds,
      'async-poll-interval': positiveSeconds,
      'rest-timeout-seconds': positiveSeconds,
    }),
    'circuit-breaker': circuitBreakerSchema,
    'connection-pool': z.object({
      'max-sessions': z.number().int().positive(),
    }),
    jitter: z.object({
      'max-factor': z.number().min(0),
      'min-factor': z.number().min(0),
    }),
    'rate-limiting': rateLimitingSchema,
    'retry-strategy': z.object({
      'backoff-factor': z.number().min(1),
      'max-retries': z.number().int().min(0),
    }),
  }),
});

export type ScriptBehaviorDocument = z.infer<typeof scriptBehaviorSchema>;

// Placeholders for a disabled breaker; the breaker ignores them
const DISABLED_BREAKER_THRESHOLD = 5;
const DISABLED_BREAKER_TIMEOUT_SECONDS = 60;

/**
 * Map a settings document onto EngineConfig.
 * A disabled rate-limiting section becomes callsPerSecond 0.
 * @throws ConfigurationError when a required key is missing
 */
export function parseScriptBehavior(document: unknown): EngineConfig {
  const result = scriptBehaviorSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const details = issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n');
    throw new ConfigurationError(`Invalid script-behavior document:\n${details}`, issues);
  }

  const behavior = result.data['script-behavior'];
  const rateLimiting = behavior['rate-limiting'];
  const breaker = behavior['circuit-breaker'];

  return parseEngineConfig({
    backoffFactor: behavior['retry-strategy']['backoff-factor'],
    breakerEnabled: breaker.enabled,
    breakerTimeoutSeconds: breaker.enabled ? breaker['timeout-seconds'] : DISABLED_BREAKER_TIMEOUT_SECONDS,
    burstSize: rateLimiting.enabled ? rateLimiting['burst-size'] : 1,
    callsPerSecond: rateLimiting.enabled ? rateLimiting['calls-per-second'] : 0,
    failureThreshold: breaker.enabled ? breaker['failure-threshold'] : DISABLED_BREAKER_THRESHOLD,
    jitterMaxFactor: behavior.jitter['max-factor'],
    jitterMinFactor: behavior.jitter['min-factor'],
    maxRetries: behavior['retry-strategy']['max-retries'],
    maxSessions: behavior['connection-pool']['max-sessions'],
    maxWaitSeconds: behavior['api-timeouts']['async-max-wait'],
    pollIntervalSeconds: behavior['api-timeouts']['async-poll-interval'],
    requestTimeoutSeconds: behavior['api-timeouts']['rest-timeout-seconds'],
  } satisfies EngineConfigInput);
}
