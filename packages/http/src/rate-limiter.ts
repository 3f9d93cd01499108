import { err, ok, type Result } from 'neverthrow';

import * as RateLimitCore from './core/rate-limit.js';
import type { HttpEffects, TokenBucket } from './core/types.js';
import { abortableDelay } from './effects.js';

export interface RateLimiterOptions {
  /** Refill rate; 0 disables limiting */
  callsPerSecond: number;
  burstSize: number;
}

export type RateLimiterEffects = Pick<HttpEffects, 'delay' | 'now'>;

/**
 * Token bucket throttle shared by concurrent callers.
 * Bucket state only changes while holding the async lock; waits happen outside it.
 */
export class RateLimiter {
  private readonly effects: RateLimiterEffects;

  // Undefined when limiting is disabled
  private bucket: TokenBucket | undefined;

  private lock: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions, effects: Partial<RateLimiterEffects> = {}) {
    this.effects = {
      delay: abortableDelay,
      now: () => Date.now(),
      ...effects,
    };

    if (!Number.isFinite(options.callsPerSecond) || options.callsPerSecond < 0) {
      throw new Error(`Invalid rate limit configuration: callsPerSecond must be >= 0, got ${options.callsPerSecond}`);
    }

    this.bucket =
      options.callsPerSecond === 0 ? undefined : RateLimitCore.createTokenBucket(options.callsPerSecond, options.burstSize);
  }

  get enabled(): boolean {
    return this.bucket !== undefined;
  }

  /**
   * Wait for and consume one token.
   * Resolves with the milliseconds spent waiting, or an error if the signal fired first.
   */
  async acquire(signal?: AbortSignal): Promise<Result<number, Error>> {
    if (!this.bucket) {
      return ok(0);
    }

    const startedAt = this.effects.now();

    // Loop to avoid recursion while ensuring we never wait while holding the lock.
    while (true) {
      if (signal?.aborted) {
        return err(new Error('Rate limiter wait aborted'));
      }

      const previousLock = this.lock;
      let releaseLock: () => void = () => undefined;
      this.lock = new Promise<void>((resolve) => {
        releaseLock = resolve;
      });

      let waitMs = 0;
      try {
        await previousLock;

        const bucket = this.bucket;
        if (!bucket) {
          return ok(0);
        }

        const decision = RateLimitCore.consumeToken(bucket, this.effects.now());
        this.bucket = decision.bucket;
        if (decision.allowed) {
          return ok(this.effects.now() - startedAt);
        }
        waitMs = decision.waitMs;
      } finally {
        releaseLock();
      }

      await this.effects.delay(waitMs, signal);
    }
  }

  getStatus() {
    if (!this.bucket) {
      return { enabled: false as const };
    }
    return { enabled: true as const, ...RateLimitCore.getTokenBucketStatus(this.bucket, this.effects.now()) };
  }
}
