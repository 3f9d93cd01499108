import * as Backoff from './core/backoff.js';
import * as HttpUtils from './core/http-utils.js';
import type {
  AttemptOutcome,
  BackoffPolicy,
  CompletedResponse,
  ErrorKind,
  HttpEffects,
  HttpMethod,
  HttpResponseLike,
  RequestSpec,
} from './core/types.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import type { RateLimiter } from './rate-limiter.js';
import type { HttpClientHooks } from './types.js';

export interface RetryPolicy {
  backoff: BackoffPolicy;
  maxRetries: number;
}

export type SendFn = (spec: RequestSpec, signal: AbortSignal) => Promise<HttpResponseLike>;

/**
 * One physical attempt, reported after it settles
 */
export interface AttemptEvent {
  attemptNumber: number;
  durationMs: number;
  error: string | undefined;
  method: HttpMethod;
  status: number | undefined;
  url: string;
}

export interface ExecutionContext {
  breaker?: CircuitBreaker | undefined;
  limiter?: RateLimiter | undefined;
  onAttempt?: ((event: AttemptEvent) => void) | undefined;
  onResponse?: ((response: CompletedResponse) => void) | undefined;
  /** The caller already took a rate limit token for the first attempt */
  preAcquired: boolean;
  signal?: AbortSignal | undefined;
  timeoutMs: number;
}

export type RetryExecutorEffects = Pick<HttpEffects, 'delay' | 'log' | 'now' | 'random'>;

type SendResult =
  | { kind: 'response'; response: CompletedResponse }
  | { failure: Extract<ErrorKind, 'cancelled' | 'timeout' | 'transient_network'>; kind: 'error'; message: string };

type FailureOutcome = Extract<AttemptOutcome, { kind: 'failure' }>;

interface RetryPlan {
  delayMs: number;
  /** Returned when the attempt budget is spent */
  exhausted: FailureOutcome;
  kind: 'retry';
  reason: 'rate_limit' | 'retry';
}

const describe = (response: CompletedResponse): string => `HTTP ${response.status}: ${response.body.slice(0, 200)}`;

/**
 * Runs up to maxRetries + 1 sequential attempts of one request and
 * classifies the result. Never records on the circuit breaker.
 */
export class RetryExecutor {
  constructor(
    private readonly policy: RetryPolicy,
    private readonly effects: RetryExecutorEffects,
    private readonly hooks: HttpClientHooks = {}
  ) {}

  async execute(spec: RequestSpec, send: SendFn, context: ExecutionContext): Promise<AttemptOutcome> {
    const budget = { kind: 'attempts', maxAttempts: this.policy.maxRetries + 1 } as const;
    const startedAt = this.effects.now();
    let attempts = 0;

    while (true) {
      if (context.signal?.aborted) {
        return this.cancelled(attempts);
      }

      if (attempts > 0 || !context.preAcquired) {
        if (attempts > 0 && context.breaker?.isRejecting()) {
          this.effects.log('warn', `Circuit opened during retries, giving up - URL: ${HttpUtils.sanitizeUrl(spec.url)}`);
          return this.failure(attempts, 'circuit_open', 'Circuit breaker opened while retrying', undefined, 'none');
        }

        const acquired = await context.limiter?.acquire(context.signal);
        if (acquired?.isErr()) {
          return this.cancelled(attempts);
        }
      }

      attempts += 1;
      const attemptStartedAt = this.effects.now();
      this.effects.log(
        'debug',
        `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(spec.url)}, Method: ${spec.method}, Attempt: ${attempts}/${budget.maxAttempts}`
      );

      const result = await this.sendOnce(spec, send, context);

      context.onAttempt?.({
        attemptNumber: attempts,
        durationMs: this.effects.now() - attemptStartedAt,
        error: result.kind === 'error' ? result.message : undefined,
        method: spec.method,
        status: result.kind === 'response' ? result.response.status : undefined,
        url: spec.url,
      });

      const progress = { attempts, elapsedMs: this.effects.now() - startedAt };
      const decision = this.classify(spec, attempts, result, context);
      if (decision.kind !== 'retry') {
        return decision;
      }

      const { delayMs, exhausted, reason } = decision;
      const step = Backoff.planNextDelay(budget, progress, delayMs);
      if (step.kind === 'exhausted') {
        this.effects.log('warn', `Request failed, no retries remaining - ${exhausted.message}`, {
          attempts,
          method: spec.method,
          url: HttpUtils.sanitizeUrl(spec.url),
        });
        return exhausted;
      }

      this.effects.log(
        'debug',
        `Retrying after delay - Reason: ${reason}, Delay: ${Math.round(step.delayMs)}ms, NextAttempt: ${attempts + 1}`
      );
      this.hooks.onBackoff?.({ attemptNumber: attempts, delayMs: step.delayMs, reason });
      await this.effects.delay(step.delayMs, context.signal);
    }
  }

  /**
   * Terminal outcome, or how long to wait before the next attempt and
   * what to report if no attempt remains
   */
  private classify(
    spec: RequestSpec,
    attempts: number,
    result: SendResult,
    context: ExecutionContext
  ): AttemptOutcome | RetryPlan {
    if (result.kind === 'error') {
      if (result.failure === 'cancelled') {
        return this.cancelled(attempts);
      }
      const exhausted = this.failure(attempts, result.failure, result.message, undefined, 'failure');
      if (!spec.idempotent) {
        return exhausted;
      }
      return { delayMs: this.backoffDelay(attempts), exhausted, kind: 'retry', reason: 'retry' };
    }

    const response = result.response;
    context.onResponse?.(response);

    switch (HttpUtils.classifyStatus(response.status)) {
      case 'success':
        return { attempts, kind: 'success', response };
      case 'pending': {
        const retryAfter = response.headers.get('retry-after');
        return {
          attempts,
          kind: 'pending',
          location: response.headers.get('location') ?? undefined,
          response,
          retryAfterMs: retryAfter ? HttpUtils.parseRetryAfter(retryAfter, this.effects.now()) : undefined,
        };
      }
      case 'authentication':
        return this.failure(attempts, 'authentication', describe(response), response.status, 'success');
      case 'client':
        // Dependency answered, so this counts as healthy
        return this.failure(attempts, 'operation', describe(response), response.status, 'success');
      case 'rate_limited': {
        const hint = HttpUtils.parseRateLimitHeaders(response.headers, this.effects.now());
        this.hooks.onRateLimited?.({ retryAfterMs: hint.delayMs, status: response.status });
        this.effects.log(
          'warn',
          `Rate limit 429 response received - Source: ${hint.source}, Attempt: ${attempts}/${this.policy.maxRetries + 1}`
        );
        return {
          delayMs:
            hint.delayMs === undefined
              ? this.backoffDelay(attempts)
              : Backoff.applyJitterToHint(hint.delayMs, this.policy.backoff.jitter, this.effects.random()),
          exhausted: this.failure(attempts, 'rate_limited', 'Rate limit exceeded', response.status, 'failure'),
          kind: 'retry',
          reason: 'rate_limit',
        };
      }
      case 'server': {
        const exhausted = this.failure(attempts, 'operation', describe(response), response.status, 'failure');
        if (!spec.idempotent) {
          return exhausted;
        }
        return { delayMs: this.backoffDelay(attempts), exhausted, kind: 'retry', reason: 'retry' };
      }
    }
  }

  private backoffDelay(attempts: number): number {
    const delay = Backoff.computeBackoffDelay(attempts - 1, this.policy.backoff);
    return Backoff.applyJitter(delay, this.policy.backoff.jitter, this.effects.random());
  }

  /**
   * One request with its own timeout, linked to the caller's signal
   */
  private async sendOnce(spec: RequestSpec, send: SendFn, context: ExecutionContext): Promise<SendResult> {
    const controller = new AbortController();
    let timedOut = false;

    const onCallerAbort = () => controller.abort();
    context.signal?.addEventListener('abort', onCallerAbort, { once: true });
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, context.timeoutMs);

    try {
      const response = await send(spec, controller.signal);
      const body = await response.text();
      return { kind: 'response', response: { body, headers: response.headers, status: response.status } };
    } catch (error) {
      if (context.signal?.aborted) {
        return { failure: 'cancelled', kind: 'error', message: 'Request cancelled' };
      }
      if (timedOut) {
        return { failure: 'timeout', kind: 'error', message: `Request timeout after ${context.timeoutMs}ms` };
      }
      const message = error instanceof Error ? error.message : String(error);
      this.effects.log('warn', `Request failed - URL: ${HttpUtils.sanitizeUrl(spec.url)}, Error: ${message}`, {
        method: spec.method,
      });
      return { failure: 'transient_network', kind: 'error', message };
    } finally {
      clearTimeout(timeoutId);
      context.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private cancelled(attempts: number): FailureOutcome {
    return this.failure(attempts, 'cancelled', 'Request cancelled', undefined, 'none');
  }

  private failure(
    attempts: number,
    failure: ErrorKind,
    message: string,
    statusCode: number | undefined,
    breakerSignal: FailureOutcome['breakerSignal']
  ): FailureOutcome {
    return { attempts, breakerSignal, failure, kind: 'failure', message, statusCode };
  }
}
