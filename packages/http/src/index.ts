// Resilient HTTP request engine
export * from './engine.js';
export * from './errors.js';
export * from './config.js';
export * from './types.js';

// Components, usable on their own or injected into an engine
export * from './async-poller.js';
export * from './circuit-breaker.js';
export * from './effects.js';
export * from './instrumentation.js';
export * from './rate-limiter.js';
export * from './rate-limiter-registry.js';
export * from './retry-executor.js';
export * from './session-pool.js';

// Pure functional core
export * from './core/index.js';
