import type { ZodType } from 'zod';

import type { ErrorKind, HttpMethod } from './core/types.js';

export interface SuccessfulOperation<T> {
  readonly attempts: number;
  readonly errorKind: undefined;
  readonly payload: T;
  readonly polls: number;
  readonly statusCode: number;
  readonly success: true;
  readonly totalElapsedMs: number;
}

export interface FailedOperation {
  readonly attempts: number;
  readonly errorKind: ErrorKind;
  readonly payload: undefined;
  readonly polls: number;
  readonly statusCode: number | undefined;
  readonly success: false;
  readonly totalElapsedMs: number;
}

/**
 * Outcome of one logical call, including every retry and poll
 */
export type OperationResult<T> = SuccessfulOperation<T> | FailedOperation;

export interface RequestOptions {
  body?: unknown;
  /** Sent as If-Match for optimistic concurrency */
  etag?: string | undefined;
  headers?: Record<string, string> | undefined;
  /** Defaults to the HTTP semantics of the method */
  idempotent?: boolean | undefined;
  schema?: ZodType<unknown> | undefined;
  signal?: AbortSignal | undefined;
  timeoutMs?: number | undefined;
}

export type MethodOptions = Omit<RequestOptions, 'body'>;

export interface HttpClientHooks {
  /**
   * Called once when a logical request starts (before any retry attempts).
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: (event: { endpoint: string; method: HttpMethod; timestamp: number }) => void;

  /**
   * Called once when a logical request succeeds.
   * The durationMs includes time spent on all retries and polls.
   */
  onRequestSuccess?: (event: {
    attempts: number;
    durationMs: number;
    endpoint: string;
    method: HttpMethod;
    polls: number;
    status: number;
  }) => void;

  onRequestFailure?: (event: {
    attempts: number;
    durationMs: number;
    endpoint: string;
    error: string;
    errorKind: ErrorKind;
    method: HttpMethod;
    status?: number | undefined;
  }) => void;

  onRateLimited?: (event: { retryAfterMs?: number | undefined; status: number }) => void;

  /**
   * Called before each retry attempt (including after rate limit backoffs)
   */
  onBackoff?: (event: { attemptNumber: number; delayMs: number; reason: 'rate_limit' | 'retry' }) => void;

  /**
   * Called before each poll of an accepted (202) operation
   */
  onPoll?: (event: { delayMs: number; location: string; pollNumber: number }) => void;
}
