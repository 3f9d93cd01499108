import { describe, expect, it } from 'vitest';

import { RateLimiterRegistry } from '../rate-limiter-registry.js';

import { createFakeClock } from './test-utils.js';

describe('RateLimiterRegistry', () => {
  it('creates one limiter per host with the default limits', () => {
    const registry = new RateLimiterRegistry({ burstSize: 4, callsPerSecond: 2 }, createFakeClock());

    const first = registry.forUrl('https://a.example.com/items');
    const again = registry.forUrl('https://a.example.com/other');
    const other = registry.forUrl('https://b.example.com/items');

    expect(again).toBe(first);
    expect(other).not.toBe(first);
    expect(registry.size).toBe(2);
    expect(first.getStatus()).toMatchObject({ callsPerSecond: 2, capacity: 4 });
  });

  it('prefers an exact host match over defaults', () => {
    const registry = new RateLimiterRegistry({ callsPerSecond: 10 }, createFakeClock());
    registry.configureEndpoint('slow.example.com', { burstSize: 1, callsPerSecond: 0.5 });

    expect(registry.forUrl('https://slow.example.com/x').getStatus()).toMatchObject({
      callsPerSecond: 0.5,
      capacity: 1,
    });
  });

  it('matches URL fragments', () => {
    const registry = new RateLimiterRegistry({ callsPerSecond: 10 }, createFakeClock());
    registry.configureEndpoint('/v2/reports', { callsPerSecond: 1 });

    expect(registry.forUrl('https://api.example.com/v2/reports/7').getStatus()).toMatchObject({ callsPerSecond: 1 });
  });

  it('shares one bucket between endpoints in the same pool', () => {
    const registry = new RateLimiterRegistry({ callsPerSecond: 10 }, createFakeClock());
    registry.configureEndpoint('a.example.com', { callsPerSecond: 3, sharedPool: 'tenant' });
    registry.configureEndpoint('b.example.com', { callsPerSecond: 3, sharedPool: 'tenant' });

    expect(registry.forUrl('https://a.example.com/')).toBe(registry.forUrl('https://b.example.com/'));
    expect(registry.size).toBe(1);
  });

  it('reads quota headers', () => {
    const registry = new RateLimiterRegistry({ callsPerSecond: 1 });
    const headers = new Headers({ 'x-ratelimit-limit': '100', 'x-ratelimit-remaining': '0' });

    expect(registry.updateFromHeaders('https://api.example.com/x', headers)).toEqual({ limit: 100, remaining: 0 });
    expect(registry.updateFromHeaders('https://api.example.com/x', new Headers())).toBeUndefined();
  });
});
