// Pure HTTP utility functions
// All functions are pure - no side effects

import { err, ok, type Result } from 'neverthrow';

import type { HeaderLookup, HttpMethod, RateLimitHeaderInfo, ResponseClass } from './types.js';

/**
 * Resolve a request target against an optional base URL.
 * Absolute targets are used as-is.
 */
export const buildUrl = (baseUrl: string | undefined, target: string): string => {
  if (/^https?:\/\//i.test(target)) {
    return target;
  }

  if (!baseUrl) {
    throw new Error(`Relative target "${target}" requires a configured baseUrl`);
  }

  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  if (!target || target === '/') {
    return cleanBaseUrl;
  }

  const cleanTarget = target.startsWith('/') ? target : `/${target}`;
  return `${cleanBaseUrl}${cleanTarget}`;
};

/**
 * Resolve a Location header (absolute or relative) against the request URL
 */
export const resolveLocation = (location: string, requestUrl: string): string => {
  return new URL(location, requestUrl).toString();
};

/**
 * Session pool key: scheme and authority of the target
 */
export const hostKeyFor = (url: string): string => {
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}`;
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * GET, PUT and DELETE are idempotent by HTTP semantics; POST and PATCH are not
 */
export const isIdempotentMethod = (method: HttpMethod): boolean => {
  return method === 'GET' || method === 'PUT' || method === 'DELETE';
};

/**
 * Classify an HTTP status for the retry loop
 */
export const classifyStatus = (status: number): ResponseClass => {
  if (status === 202) {
    return 'pending';
  }
  if (status >= 200 && status < 300) {
    return 'success';
  }
  if (status === 429) {
    return 'rate_limited';
  }
  if (status === 401 || status === 403) {
    return 'authentication';
  }
  if (status >= 500 && status < 600) {
    return 'server';
  }
  return 'client';
};

/**
 * Parse Retry-After header value in milliseconds.
 * Supports both delay-seconds and HTTP-date formats.
 */
export const parseRetryAfter = (value: string, currentTime: number): number | undefined => {
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date)) {
    return Math.max(0, date - currentTime);
  }

  return undefined;
};

/**
 * Parse Unix timestamp (seconds) and calculate delay in milliseconds
 */
export const parseUnixTimestamp = (value: string, currentTime: number): number | undefined => {
  const timestamp = parseInt(value, 10);
  if (isNaN(timestamp) || timestamp <= 0) {
    return undefined;
  }

  const delayMs = timestamp * 1000 - currentTime;
  return delayMs > 0 ? delayMs : undefined;
};

/**
 * Parse rate limit headers to determine retry delay
 * Checks multiple header formats in order of preference:
 * 1. Retry-After (seconds or HTTP-date)
 * 2. X-RateLimit-Reset (Unix timestamp)
 * 3. RateLimit-Reset (delta-seconds)
 */
export const parseRateLimitHeaders = (headers: HeaderLookup, currentTime: number): RateLimitHeaderInfo => {
  const retryAfter = headers.get('retry-after');
  if (retryAfter) {
    const delayMs = parseRetryAfter(retryAfter, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'Retry-After' };
    }
  }

  const xRateLimitReset = headers.get('x-ratelimit-reset');
  if (xRateLimitReset) {
    const delayMs = parseUnixTimestamp(xRateLimitReset, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'X-RateLimit-Reset' };
    }
  }

  const rateLimitReset = headers.get('ratelimit-reset');
  if (rateLimitReset) {
    const seconds = parseInt(rateLimitReset, 10);
    if (!isNaN(seconds) && seconds >= 0) {
      return { delayMs: seconds * 1000, source: 'RateLimit-Reset' };
    }
  }

  return { delayMs: undefined, source: 'default' };
};

/**
 * Serialize a request body. Objects become JSON.
 */
export const serializeBody = (body: unknown): { contentType: string | undefined; text: string | undefined } => {
  if (body === undefined || body === null) {
    return { contentType: undefined, text: undefined };
  }
  if (typeof body === 'string') {
    return { contentType: undefined, text: body };
  }
  return { contentType: 'application/json', text: JSON.stringify(body) };
};

/**
 * Decode a response body. Empty bodies decode to undefined, JSON bodies are parsed,
 * anything else is returned as text.
 */
export const decodePayload = (body: string, contentType: string | null): Result<unknown, Error> => {
  if (body.length === 0) {
    return ok(undefined);
  }

  const declaredJson = contentType !== null && /[/+]json\b/i.test(contentType);
  const looksJson = /^\s*[[{]/.test(body);
  if (!declaredJson && !looksJson) {
    return ok(body);
  }

  try {
    const parsed: unknown = JSON.parse(body);
    return ok(parsed);
  } catch (error) {
    if (!declaredJson) {
      return ok(body);
    }
    const reason = error instanceof Error ? error.message : String(error);
    return err(new Error(`Malformed JSON response: ${reason}`));
  }
};
