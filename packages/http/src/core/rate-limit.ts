// Pure token bucket functions
// All functions take state and return new state without side effects

import type { RateLimitDecision, TokenBucket } from './types.js';

const assertPositiveFinite = (fieldName: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid rate limit configuration: ${fieldName} must be a positive finite number, got ${value}`);
  }
};

/**
 * Create a full bucket. The clock reference is set on first refill.
 */
export const createTokenBucket = (callsPerSecond: number, burstSize: number): TokenBucket => {
  assertPositiveFinite('callsPerSecond', callsPerSecond);
  if (!Number.isFinite(burstSize) || burstSize < 1) {
    throw new Error(`Invalid rate limit configuration: burstSize must be at least 1, got ${burstSize}`);
  }

  return {
    capacity: burstSize,
    lastRefillAt: undefined,
    refillRatePerSecond: callsPerSecond,
    tokens: burstSize,
  };
};

/**
 * Add tokens for the time elapsed since the last refill, capped at capacity
 */
export const refillBucket = (bucket: TokenBucket, currentTime: number): TokenBucket => {
  if (bucket.lastRefillAt === undefined) {
    return { ...bucket, lastRefillAt: currentTime };
  }

  const elapsedSeconds = (currentTime - bucket.lastRefillAt) / 1000;
  if (elapsedSeconds <= 0) {
    return bucket;
  }

  return {
    ...bucket,
    lastRefillAt: currentTime,
    tokens: Math.min(bucket.capacity, bucket.tokens + elapsedSeconds * bucket.refillRatePerSecond),
  };
};

/**
 * Milliseconds until one whole token is available (0 if one already is)
 */
export const calculateWaitTime = (bucket: TokenBucket): number => {
  if (bucket.tokens >= 1) {
    return 0;
  }
  return Math.ceil(((1 - bucket.tokens) / bucket.refillRatePerSecond) * 1000);
};

/**
 * Refill, then take one token if available
 */
export const consumeToken = (bucket: TokenBucket, currentTime: number): RateLimitDecision => {
  const refilled = refillBucket(bucket, currentTime);

  if (refilled.tokens >= 1) {
    return {
      allowed: true,
      bucket: { ...refilled, tokens: Math.max(0, refilled.tokens - 1) },
      waitMs: 0,
    };
  }

  return { allowed: false, bucket: refilled, waitMs: calculateWaitTime(refilled) };
};

/**
 * Get current bucket status (for monitoring/debugging)
 */
export const getTokenBucketStatus = (bucket: TokenBucket, currentTime: number) => {
  const refilled = refillBucket(bucket, currentTime);

  return {
    callsPerSecond: bucket.refillRatePerSecond,
    capacity: bucket.capacity,
    tokens: refilled.tokens,
    waitMs: calculateWaitTime(refilled),
  };
};
