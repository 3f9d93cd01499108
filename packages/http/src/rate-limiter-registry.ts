import { getLogger, type Logger } from '@steady/logger';

import type { HeaderLookup } from './core/types.js';
import { RateLimiter, type RateLimiterEffects } from './rate-limiter.js';

export interface EndpointLimits {
  burstSize?: number | undefined;
  callsPerSecond: number;
  /** Endpoints naming the same pool share one bucket */
  sharedPool?: string | undefined;
}

export interface RateLimitSnapshot {
  limit: number;
  remaining: number;
}

/**
 * Rate limiters per API endpoint.
 * Lookup order: exact host match, then the first pattern contained in the URL, then defaults.
 * Limiters are keyed by shared pool name, else by host.
 */
export class RateLimiterRegistry {
  private readonly endpoints = new Map<string, EndpointLimits>();
  private readonly limiters = new Map<string, RateLimiter>();
  private readonly logger: Logger;

  constructor(
    private readonly defaults: EndpointLimits,
    private readonly effects: Partial<RateLimiterEffects> = {}
  ) {
    this.logger = getLogger('RateLimiterRegistry');
  }

  /**
   * @param pattern - host (e.g. "api.example.com") or URL fragment (e.g. "/v2/reports")
   */
  configureEndpoint(pattern: string, limits: EndpointLimits): void {
    this.endpoints.set(pattern, limits);
  }

  forUrl(url: string): RateLimiter {
    const host = new URL(url).host;
    const limits = this.findLimits(url, host);
    const key = limits.sharedPool ?? host;

    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new RateLimiter({ burstSize: limits.burstSize ?? 1, callsPerSecond: limits.callsPerSecond }, this.effects);
      this.limiters.set(key, limiter);
      this.logger.debug(
        { burstSize: limits.burstSize ?? 1, callsPerSecond: limits.callsPerSecond, key },
        'Created rate limiter'
      );
    }
    return limiter;
  }

  /**
   * Read X-RateLimit-Limit / X-RateLimit-Remaining from a response
   */
  updateFromHeaders(url: string, headers: HeaderLookup): RateLimitSnapshot | undefined {
    const limit = Number(headers.get('x-ratelimit-limit') ?? Number.NaN);
    const remaining = Number(headers.get('x-ratelimit-remaining') ?? Number.NaN);
    if (!Number.isFinite(limit) || !Number.isFinite(remaining)) {
      return undefined;
    }

    const host = new URL(url).host;
    this.logger.debug({ host, limit, remaining }, 'Rate limit headers received');
    if (remaining === 0) {
      this.logger.warn({ host, limit }, 'Server reports rate limit quota exhausted');
    }
    return { limit, remaining };
  }

  get size(): number {
    return this.limiters.size;
  }

  private findLimits(url: string, host: string): EndpointLimits {
    const exact = this.endpoints.get(host);
    if (exact) {
      return exact;
    }

    for (const [pattern, limits] of this.endpoints) {
      if (url.includes(pattern)) {
        return limits;
      }
    }

    return this.defaults;
  }
}
