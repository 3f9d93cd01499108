import { getLogger, type Logger } from '@steady/logger';
import { err, ok, type Result } from 'neverthrow';
import type { Dispatcher } from 'undici';
import type { ZodType } from 'zod';

import { AsyncOperationPoller } from './async-poller.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { parseEngineConfig, type EngineConfig } from './config.js';
import * as HttpUtils from './core/http-utils.js';
import type { AttemptOutcome, BreakerSignal, ErrorKind, HttpEffects, HttpMethod, RequestSpec } from './core/types.js';
import { createAgentTransportFactory, createDefaultEffects } from './effects.js';
import { createEngineError, type RequestEngineError } from './errors.js';
import { type InstrumentationCollector, sanitizeEndpoint } from './instrumentation.js';
import { RateLimiter } from './rate-limiter.js';
import type { RateLimiterRegistry } from './rate-limiter-registry.js';
import { type AttemptEvent, type ExecutionContext, RetryExecutor, type SendFn } from './retry-executor.js';
import { type SessionLease, SessionPool, type TransportFactory } from './session-pool.js';
import type { HttpClientHooks, MethodOptions, RequestOptions, SuccessfulOperation } from './types.js';

export type EngineResult<T> = Result<SuccessfulOperation<T>, RequestEngineError>;

export interface RequestEngineOptions {
  circuitBreaker?: CircuitBreaker | undefined;
  effects?: Partial<HttpEffects> | undefined;
  hooks?: HttpClientHooks | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  /** Used in logger categories and breaker statistics */
  name?: string | undefined;
  rateLimiter?: RateLimiter | undefined;
  /** Per-endpoint limiters; replaces the engine's single limiter when given */
  rateLimiters?: RateLimiterRegistry | undefined;
  sessionPool?: SessionPool<Dispatcher> | undefined;
  /** Opaque bearer token, sent as Authorization on every request */
  token?: string | undefined;
  transportFactory?: TransportFactory<Dispatcher> | undefined;
}

interface CallContext {
  endpoint: string;
  method: HttpMethod;
  startedAt: number;
}

interface Completion {
  attempts: number;
  outcome: AttemptOutcome;
  polls: number;
}

/**
 * Resilient HTTP entry point. One logical call runs:
 * breaker check, rate limit token, session lease, retries, optional 202 polling,
 * then exactly one breaker record for the whole call.
 */
export class RequestEngine {
  readonly config: EngineConfig;

  private readonly breaker: CircuitBreaker;
  private readonly effects: HttpEffects;
  private readonly executor: RetryExecutor;
  private readonly hooks: HttpClientHooks;
  private readonly instrumentation: InstrumentationCollector | undefined;
  private readonly limiter: RateLimiter;
  private readonly logger: Logger;
  private readonly poller: AsyncOperationPoller;
  private readonly rateLimiters: RateLimiterRegistry | undefined;
  private readonly sessions: SessionPool<Dispatcher>;
  private readonly token: string | undefined;

  /**
   * @throws ConfigurationError when the configuration is incomplete or invalid
   */
  constructor(config: unknown, options: RequestEngineOptions = {}) {
    this.config = parseEngineConfig(config);
    const name = options.name ?? 'default';

    this.logger = getLogger(`RequestEngine:${name}`);
    this.effects = { ...createDefaultEffects(this.logger), ...options.effects };
    this.hooks = options.hooks ?? {};
    this.instrumentation = options.instrumentation;
    this.rateLimiters = options.rateLimiters;
    this.token = options.token;

    const { delay, now } = this.effects;

    this.breaker =
      options.circuitBreaker ??
      new CircuitBreaker(
        {
          enabled: this.config.breakerEnabled,
          failureThreshold: this.config.failureThreshold,
          name,
          timeoutSeconds: this.config.breakerTimeoutSeconds,
        },
        { now }
      );

    this.limiter =
      options.rateLimiter ??
      new RateLimiter({ burstSize: this.config.burstSize, callsPerSecond: this.config.callsPerSecond }, { delay, now });

    this.sessions =
      options.sessionPool ??
      new SessionPool(
        options.transportFactory ?? createAgentTransportFactory(),
        { maxSessions: this.config.maxSessions },
        { now }
      );

    const jitter = { maxFactor: this.config.jitterMaxFactor, minFactor: this.config.jitterMinFactor };
    this.executor = new RetryExecutor(
      {
        backoff: {
          backoffFactor: this.config.backoffFactor,
          baseDelayMs: this.config.baseDelaySeconds * 1000,
          jitter,
          maxDelayMs: this.config.maxDelaySeconds * 1000,
        },
        maxRetries: this.config.maxRetries,
      },
      this.effects,
      this.hooks
    );
    this.poller = new AsyncOperationPoller(
      {
        jitter,
        maxWaitMs: this.config.maxWaitSeconds * 1000,
        pollIntervalMs: this.config.pollIntervalSeconds * 1000,
      },
      this.executor,
      this.effects,
      this.hooks
    );

    this.logger.debug(
      {
        baseUrl: this.config.baseUrl,
        breakerEnabled: this.config.breakerEnabled,
        callsPerSecond: this.config.callsPerSecond,
        maxRetries: this.config.maxRetries,
        maxSessions: this.config.maxSessions,
        timeoutSeconds: this.config.requestTimeoutSeconds,
      },
      'Request engine initialized'
    );
  }

  /**
   * GET with schema validation of the payload
   */
  async get<T>(target: string, options: MethodOptions & { schema: ZodType<T> }): Promise<EngineResult<T>>;
  async get<T = unknown>(target: string, options?: MethodOptions): Promise<EngineResult<T>>;
  async get(target: string, options: MethodOptions = {}): Promise<EngineResult<unknown>> {
    return this.request('GET', target, options);
  }

  async post<T>(target: string, body: unknown, options: MethodOptions & { schema: ZodType<T> }): Promise<EngineResult<T>>;
  async post<T = unknown>(target: string, body?: unknown, options?: MethodOptions): Promise<EngineResult<T>>;
  async post(target: string, body?: unknown, options: MethodOptions = {}): Promise<EngineResult<unknown>> {
    return this.request('POST', target, { ...options, body });
  }

  async put<T>(target: string, body: unknown, options: MethodOptions & { schema: ZodType<T> }): Promise<EngineResult<T>>;
  async put<T = unknown>(target: string, body?: unknown, options?: MethodOptions): Promise<EngineResult<T>>;
  async put(target: string, body?: unknown, options: MethodOptions = {}): Promise<EngineResult<unknown>> {
    return this.request('PUT', target, { ...options, body });
  }

  async patch<T>(
    target: string,
    body: unknown,
    options: MethodOptions & { schema: ZodType<T> }
  ): Promise<EngineResult<T>>;
  async patch<T = unknown>(target: string, body?: unknown, options?: MethodOptions): Promise<EngineResult<T>>;
  async patch(target: string, body?: unknown, options: MethodOptions = {}): Promise<EngineResult<unknown>> {
    return this.request('PATCH', target, { ...options, body });
  }

  async delete<T>(target: string, options: MethodOptions & { schema: ZodType<T> }): Promise<EngineResult<T>>;
  async delete<T = unknown>(target: string, options?: MethodOptions): Promise<EngineResult<T>>;
  async delete(target: string, options: MethodOptions = {}): Promise<EngineResult<unknown>> {
    return this.request('DELETE', target, options);
  }

  /**
   * Run one logical call. Transient failures are retried internally;
   * the error side only carries the terminal classification.
   */
  async request<T>(
    method: HttpMethod,
    target: string,
    options: RequestOptions & { schema: ZodType<T> }
  ): Promise<EngineResult<T>>;
  async request<T = unknown>(method: HttpMethod, target: string, options?: RequestOptions): Promise<EngineResult<T>>;
  async request(method: HttpMethod, target: string, options: RequestOptions = {}): Promise<EngineResult<unknown>> {
    const startedAt = this.effects.now();
    const call: CallContext = { endpoint: sanitizeEndpoint(target), method, startedAt };
    this.hooks.onRequestStart?.({ endpoint: call.endpoint, method, timestamp: startedAt });

    let url: string;
    let hostKey: string;
    try {
      url = HttpUtils.buildUrl(this.config.baseUrl, target);
      hostKey = HttpUtils.hostKeyFor(url);
    } catch (error) {
      return this.fail(call, 'operation', error instanceof Error ? error.message : String(error), 0, 0, undefined);
    }

    if (this.sessions.closed) {
      return this.fail(call, 'operation', 'Request engine is closed', 0, 0, undefined);
    }
    if (options.signal?.aborted) {
      return this.fail(call, 'cancelled', 'Request cancelled', 0, 0, undefined);
    }

    if (!this.breaker.allow()) {
      this.effects.log('warn', `Circuit breaker open, rejecting request - URL: ${HttpUtils.sanitizeUrl(url)}`, {
        method,
        ...this.breaker.getStatistics(),
      });
      return this.fail(call, 'circuit_open', `Circuit breaker '${this.breaker.name}' is open`, 0, 0, undefined);
    }

    const limiter = this.rateLimiters?.forUrl(url) ?? this.limiter;
    const acquired = await limiter.acquire(options.signal);
    if (acquired.isErr()) {
      this.breaker.releaseTrial();
      return this.fail(call, 'cancelled', 'Request cancelled while waiting for rate limit', 0, 0, undefined);
    }
    if (acquired.value > 0) {
      this.effects.log('debug', `Rate limit enforced before sending request - WaitTimeMs: ${acquired.value}`);
    }

    let lease: SessionLease<Dispatcher>;
    try {
      lease = await this.sessions.lease(hostKey);
    } catch (error) {
      this.breaker.releaseTrial();
      return this.fail(call, 'operation', error instanceof Error ? error.message : String(error), 0, 0, undefined);
    }

    let completion: Completion;
    try {
      completion = await this.complete(this.buildSpec(method, url, options), lease, limiter, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.effects.log('error', `Request aborted unexpectedly - URL: ${HttpUtils.sanitizeUrl(url)}, Error: ${message}`, {
        method,
      });
      this.breaker.releaseTrial();
      return this.fail(call, 'operation', message, 0, 0, undefined);
    } finally {
      await lease.release();
    }

    return this.finish(call, completion, options.schema);
  }

  getStatus() {
    return {
      circuit: this.breaker.getStatistics(),
      rateLimit: this.limiter.getStatus(),
      sessions: this.sessions.size,
    };
  }

  /**
   * Release every pooled transport. Idempotent.
   */
  async close(): Promise<void> {
    this.logger.debug('Closing request engine sessions');
    await this.sessions.close();
  }

  private baseHeaders(extra: Record<string, string> | undefined): Record<string, string> {
    return {
      Accept: 'application/json',
      Prefer: 'return=representation',
      'User-Agent': this.config.userAgent,
      ...(this.token ? { Authorization: `Bearer ${this.token}` } : {}),
      ...this.config.defaultHeaders,
      ...extra,
    };
  }

  private buildSpec(method: HttpMethod, url: string, options: RequestOptions): RequestSpec {
    const { contentType, text } = HttpUtils.serializeBody(options.body);
    const headers = this.baseHeaders(options.headers);

    if (contentType && !Object.keys(headers).some((name) => name.toLowerCase() === 'content-type')) {
      headers['Content-Type'] = contentType;
    }
    if (options.etag) {
      headers['If-Match'] = options.etag;
    }

    return Object.freeze({
      body: text,
      headers: Object.freeze(headers),
      idempotent: options.idempotent ?? HttpUtils.isIdempotentMethod(method),
      method,
      url,
    });
  }

  /**
   * Retries, then polling when the server accepted the work asynchronously
   */
  private async complete(
    spec: RequestSpec,
    lease: SessionLease<Dispatcher>,
    limiter: RateLimiter,
    options: RequestOptions
  ): Promise<Completion> {
    const send: SendFn = (request, signal) =>
      this.effects.fetch(request.url, {
        // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
        body: request.body ?? null,
        dispatcher: lease.transport,
        headers: { ...request.headers },
        method: request.method,
        signal,
      });

    const execution: Omit<ExecutionContext, 'preAcquired'> = {
      breaker: this.breaker,
      limiter,
      onAttempt: (event) => this.recordMetric(event),
      onResponse: (response) => {
        this.rateLimiters?.updateFromHeaders(spec.url, response.headers);
      },
      signal: options.signal,
      timeoutMs: options.timeoutMs ?? this.config.requestTimeoutSeconds * 1000,
    };

    const outcome = await this.executor.execute(spec, send, { ...execution, preAcquired: true });
    if (outcome.kind !== 'pending') {
      return { attempts: outcome.attempts, outcome, polls: 0 };
    }

    if (!outcome.location) {
      this.effects.log('warn', `202 response missing Location header - URL: ${HttpUtils.sanitizeUrl(spec.url)}`);
      return { attempts: outcome.attempts, outcome, polls: 0 };
    }

    let locationUrl: string;
    try {
      locationUrl = HttpUtils.resolveLocation(outcome.location, spec.url);
    } catch {
      return {
        attempts: outcome.attempts,
        outcome: {
          attempts: outcome.attempts,
          breakerSignal: 'success',
          failure: 'operation',
          kind: 'failure',
          message: `Invalid Location header: ${outcome.location}`,
          statusCode: outcome.response.status,
        },
        polls: 0,
      };
    }

    const polled = await this.poller.poll(
      {
        locationUrl,
        retryAfterHintMs: outcome.retryAfterMs,
        startedAt: this.effects.now(),
      },
      { execution, headers: this.baseHeaders(options.headers), send }
    );

    return { attempts: outcome.attempts + polled.attempts, outcome: polled.outcome, polls: polled.polls };
  }

  private finish(
    call: CallContext,
    completion: Completion,
    schema: ZodType<unknown> | undefined
  ): EngineResult<unknown> {
    const { attempts, outcome, polls } = completion;

    if (outcome.kind === 'failure') {
      this.recordOnBreaker(outcome.breakerSignal);
      return this.fail(call, outcome.failure, outcome.message, attempts, polls, outcome.statusCode);
    }

    // Any completed response counts as healthy for the breaker
    this.recordOnBreaker('success');

    const response = outcome.response;
    const decoded = HttpUtils.decodePayload(response.body, response.headers.get('content-type'));
    if (decoded.isErr()) {
      return this.fail(call, 'operation', decoded.error.message, attempts, polls, response.status);
    }

    let payload = decoded.value;
    if (schema) {
      const parseResult = schema.safeParse(payload);
      if (!parseResult.success) {
        const issues = parseResult.error.issues
          .slice(0, 5)
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        this.effects.log('error', `Response validation failed: ${issues}`, {
          endpoint: call.endpoint,
          method: call.method,
          status: response.status,
          truncatedPayload: response.body.slice(0, 500),
        });
        return this.fail(call, 'operation', `Response validation failed: ${issues}`, attempts, polls, response.status);
      }
      payload = parseResult.data;
    }

    const totalElapsedMs = this.effects.now() - call.startedAt;
    this.hooks.onRequestSuccess?.({
      attempts,
      durationMs: totalElapsedMs,
      endpoint: call.endpoint,
      method: call.method,
      polls,
      status: response.status,
    });

    return ok(
      Object.freeze({
        attempts,
        errorKind: undefined,
        payload,
        polls,
        statusCode: response.status,
        success: true as const,
        totalElapsedMs,
      })
    );
  }

  private fail(
    call: CallContext,
    kind: ErrorKind,
    message: string,
    attempts: number,
    polls: number,
    statusCode: number | undefined
  ): Result<never, RequestEngineError> {
    const elapsedMs = this.effects.now() - call.startedAt;
    this.hooks.onRequestFailure?.({
      attempts,
      durationMs: elapsedMs,
      endpoint: call.endpoint,
      error: message,
      errorKind: kind,
      method: call.method,
      status: statusCode,
    });
    return err(createEngineError(kind, message, { attempts, elapsedMs, polls, statusCode }));
  }

  private recordOnBreaker(signal: BreakerSignal): void {
    switch (signal) {
      case 'success':
        this.breaker.recordSuccess();
        break;
      case 'failure':
        this.breaker.recordFailure();
        break;
      case 'none':
        this.breaker.releaseTrial();
        break;
    }
  }

  private recordMetric(event: AttemptEvent): void {
    if (!this.instrumentation) {
      return;
    }

    this.instrumentation.record({
      durationMs: event.durationMs,
      endpoint: sanitizeEndpoint(event.url),
      error: event.error,
      host: new URL(event.url).host,
      method: event.method,
      status: event.status ?? 0,
      timestamp: this.effects.now(),
    });
  }
}
