// Functional core exports
// Pure functions for rate limiting, breaking, backoff and HTTP parsing

export * from './backoff.js';
export * from './circuit-breaker.js';
export * from './http-utils.js';
export * from './rate-limit.js';
export * from './types.js';
