import type { ErrorKind } from './core/types.js';
import type { FailedOperation } from './types.js';

export interface ErrorDetails {
  attempts: number;
  elapsedMs: number;
  polls?: number | undefined;
  statusCode?: number | undefined;
}

/**
 * Base class for every error the engine returns.
 * Carries the failed OperationResult so callers can tell a fast
 * circuit rejection (0 attempts) from exhausted retries.
 */
export abstract class RequestEngineError extends Error {
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly polls: number;
  readonly result: FailedOperation;
  readonly statusCode: number | undefined;

  protected constructor(
    readonly kind: ErrorKind,
    message: string,
    details: ErrorDetails
  ) {
    super(message);
    this.attempts = details.attempts;
    this.elapsedMs = details.elapsedMs;
    this.polls = details.polls ?? 0;
    this.statusCode = details.statusCode;
    this.result = Object.freeze({
      attempts: this.attempts,
      errorKind: kind,
      payload: undefined,
      polls: this.polls,
      statusCode: this.statusCode,
      success: false,
      totalElapsedMs: this.elapsedMs,
    });
  }
}

/** 401/403: never retried */
export class AuthenticationError extends RequestEngineError {
  constructor(message: string, details: ErrorDetails) {
    super('authentication', message, details);
    this.name = 'AuthenticationError';
  }
}

/** 429 after retries were exhausted */
export class RateLimitedError extends RequestEngineError {
  constructor(message: string, details: ErrorDetails) {
    super('rate_limited', message, details);
    this.name = 'RateLimitedError';
  }
}

/** Breaker rejected the call without network I/O */
export class CircuitOpenError extends RequestEngineError {
  constructor(message: string, details: ErrorDetails) {
    super('circuit_open', message, details);
    this.name = 'CircuitOpenError';
  }
}

/** Per-attempt timeouts exhausted, or the async poll budget ran out */
export class TimeoutError extends RequestEngineError {
  constructor(message: string, details: ErrorDetails) {
    super('timeout', message, details);
    this.name = 'TimeoutError';
  }
}

export class OperationError extends RequestEngineError {
  constructor(message: string, details: ErrorDetails) {
    super('operation', message, details);
    this.name = 'OperationError';
  }
}

export class TransientNetworkError extends RequestEngineError {
  constructor(message: string, details: ErrorDetails) {
    super('transient_network', message, details);
    this.name = 'TransientNetworkError';
  }
}

export class CancelledError extends RequestEngineError {
  constructor(message: string, details: ErrorDetails) {
    super('cancelled', message, details);
    this.name = 'CancelledError';
  }
}

export const createEngineError = (kind: ErrorKind, message: string, details: ErrorDetails): RequestEngineError => {
  switch (kind) {
    case 'authentication':
      return new AuthenticationError(message, details);
    case 'rate_limited':
      return new RateLimitedError(message, details);
    case 'circuit_open':
      return new CircuitOpenError(message, details);
    case 'timeout':
      return new TimeoutError(message, details);
    case 'operation':
      return new OperationError(message, details);
    case 'transient_network':
      return new TransientNetworkError(message, details);
    case 'cancelled':
      return new CancelledError(message, details);
  }
};

/**
 * Thrown (not returned) when an engine is constructed from invalid configuration
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: { message: string; path: string }[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
