// Pure types for functional core
// No classes, only data structures

import type { Dispatcher } from 'undici';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Token bucket state (immutable).
 * Invariant: 0 <= tokens <= capacity
 */
export interface TokenBucket {
  capacity: number;
  /** Undefined until the first acquire sets the clock reference */
  lastRefillAt: number | undefined;
  refillRatePerSecond: number;
  tokens: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  bucket: TokenBucket;
  waitMs: number;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface FailureCounter {
  consecutiveFailures: number;
  openedAt: number | undefined;
}

/**
 * Circuit breaker state (immutable)
 */
export interface CircuitBreakerState {
  counter: FailureCounter;
  failureThreshold: number;
  lastSuccessAt: number | undefined;
  state: CircuitState;
  timeoutMs: number;
  trialInFlight: boolean;
}

export interface JitterRange {
  maxFactor: number;
  minFactor: number;
}

export interface BackoffPolicy {
  backoffFactor: number;
  baseDelayMs: number;
  jitter: JitterRange;
  maxDelayMs: number;
}

/**
 * Retries are bounded by attempt count; polling by wall-clock time.
 */
export type BackoffBudget = { kind: 'attempts'; maxAttempts: number } | { kind: 'deadline'; maxElapsedMs: number };

export interface BackoffProgress {
  attempts: number;
  elapsedMs: number;
}

export type BackoffStep = { delayMs: number; kind: 'wait' } | { kind: 'exhausted' };

/**
 * How a single HTTP response is treated by the retry loop
 */
export type ResponseClass = 'success' | 'pending' | 'rate_limited' | 'server' | 'authentication' | 'client';

export type ErrorKind =
  | 'authentication'
  | 'rate_limited'
  | 'circuit_open'
  | 'timeout'
  | 'operation'
  | 'transient_network'
  | 'cancelled';

/**
 * What the breaker should learn from a terminal outcome.
 * 'none' frees a half-open trial without a transition.
 */
export type BreakerSignal = 'success' | 'failure' | 'none';

export interface RateLimitHeaderInfo {
  delayMs: number | undefined;
  source: string;
}

export interface HeaderLookup {
  get(name: string): string | null;
}

/**
 * The subset of a fetch Response the engine reads
 */
export interface HttpResponseLike {
  readonly headers: HeaderLookup;
  readonly ok: boolean;
  readonly status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  body: string | null;
  dispatcher?: Dispatcher | undefined;
  headers: Record<string, string>;
  method: HttpMethod;
  signal: AbortSignal;
}

/**
 * Immutable input to one logical call
 */
export interface RequestSpec {
  readonly body: string | undefined;
  readonly headers: Readonly<Record<string, string>>;
  readonly idempotent: boolean;
  readonly method: HttpMethod;
  readonly url: string;
}

export interface CompletedResponse {
  body: string;
  headers: HeaderLookup;
  status: number;
}

/**
 * Tagged result of the retry and poll loops.
 * Only the engine turns failures into error classes.
 */
export type AttemptOutcome =
  | { attempts: number; kind: 'success'; response: CompletedResponse }
  | {
      attempts: number;
      kind: 'pending';
      location: string | undefined;
      response: CompletedResponse;
      retryAfterMs: number | undefined;
    }
  | {
      attempts: number;
      breakerSignal: BreakerSignal;
      failure: ErrorKind;
      kind: 'failure';
      message: string;
      statusCode: number | undefined;
    };

export interface PendingOperation {
  locationUrl: string;
  retryAfterHintMs: number | undefined;
  startedAt: number;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  /** Must resolve early (not reject) when the signal fires */
  delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  fetch: (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
  /** Uniform in [0, 1) */
  random: () => number;
}
