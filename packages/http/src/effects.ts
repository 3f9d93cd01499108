import type { Logger } from '@steady/logger';
import { Agent, type Dispatcher, fetch as undiciFetch } from 'undici';

import type { HttpEffects, HttpRequestInit, HttpResponseLike } from './core/types.js';
import type { TransportFactory } from './session-pool.js';

/**
 * Sleep that resolves early when the signal fires.
 * Callers check signal.aborted afterwards.
 */
export const abortableDelay = (ms: number, signal?: AbortSignal): Promise<void> => {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export const undiciSend = (url: string, init: HttpRequestInit): Promise<HttpResponseLike> => {
  return undiciFetch(url, {
    body: init.body,
    headers: init.headers,
    method: init.method,
    signal: init.signal,
    ...(init.dispatcher ? { dispatcher: init.dispatcher } : {}),
  });
};

export const createDefaultEffects = (logger: Logger): HttpEffects => ({
  delay: abortableDelay,
  fetch: undiciSend,
  log: (level, message, metadata) => {
    if (metadata) {
      logger[level](metadata, message);
    } else {
      logger[level](message);
    }
  },
  now: () => Date.now(),
  random: () => Math.random(),
});

export interface AgentTransportOptions {
  connectionsPerHost?: number | undefined;
  keepAliveMaxTimeoutMs?: number | undefined;
  keepAliveTimeoutMs?: number | undefined;
}

/**
 * One undici Agent (keep-alive connection pool) per host key
 */
export const createAgentTransportFactory = (options: AgentTransportOptions = {}): TransportFactory<Dispatcher> => ({
  close: (transport) => transport.close(),
  create: () =>
    new Agent({
      connections: options.connectionsPerHost ?? 10,
      keepAliveMaxTimeout: options.keepAliveMaxTimeoutMs ?? 60_000,
      keepAliveTimeout: options.keepAliveTimeoutMs ?? 10_000,
      pipelining: 1,
    }),
});
