import { describe, expect, it, vi } from 'vitest';

import { AsyncOperationPoller, type PollPolicy } from '../async-poller.js';
import type { HttpEffects, HttpResponseLike, RequestSpec } from '../core/types.js';
import { RetryExecutor } from '../retry-executor.js';
import type { HttpClientHooks } from '../types.js';

import { createTestEffects, type FetchStep, response } from './test-utils.js';

const STATUS_URL = 'https://api.example.com/status/1';

const pollPolicy: PollPolicy = {
  jitter: { maxFactor: 1, minFactor: 1 },
  maxWaitMs: 10_000,
  pollIntervalMs: 2000,
};

const scriptedSend = (...steps: FetchStep[]) => {
  let index = 0;
  return vi.fn((_spec: RequestSpec, _signal: AbortSignal): Promise<HttpResponseLike> => {
    const step = steps[Math.min(index, steps.length - 1)];
    index += 1;
    if (step === undefined || step instanceof Error) {
      return Promise.reject(step ?? new Error('no steps'));
    }
    return Promise.resolve(step);
  });
};

const setup = (policy: PollPolicy = pollPolicy, hooks: HttpClientHooks = {}, overrides: Partial<HttpEffects> = {}) => {
  const { clock, effects } = createTestEffects(overrides);
  const executor = new RetryExecutor(
    {
      backoff: { backoffFactor: 2, baseDelayMs: 1000, jitter: { maxFactor: 1, minFactor: 1 }, maxDelayMs: 60_000 },
      maxRetries: 0,
    },
    effects
  );
  return { clock, poller: new AsyncOperationPoller(policy, executor, effects, hooks) };
};

describe('AsyncOperationPoller', () => {
  it('polls the Location until the operation completes', async () => {
    const { clock, poller } = setup();
    const send = scriptedSend(response(202), response(200, { done: true }));

    const result = await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: 1000, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: { Authorization: 'Bearer test-token' }, send }
    );

    expect(result.polls).toBe(2);
    expect(result.attempts).toBe(2);
    expect(result.outcome.kind).toBe('success');
    if (result.outcome.kind === 'success') {
      expect(result.outcome.response.body).toBe('{"done":true}');
    }
    // The previous hint carries over when a 202 sends none
    expect(clock.delays).toEqual([1000, 1000]);
    expect(send).toHaveBeenCalledWith(
      {
        body: undefined,
        headers: { Authorization: 'Bearer test-token' },
        idempotent: true,
        method: 'GET',
        url: STATUS_URL,
      },
      expect.any(AbortSignal)
    );
  });

  it('falls back to the configured interval without a hint', async () => {
    const { clock, poller } = setup();
    const send = scriptedSend(response(200, { done: true }));

    await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: undefined, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: {}, send }
    );

    expect(clock.delays).toEqual([2000]);
  });

  it('follows a new Retry-After and Location from a pending poll', async () => {
    const { clock, poller } = setup();
    const send = scriptedSend(
      response(202, '', { 'Retry-After': '3', Location: '/status/2' }),
      response(200, { done: true })
    );

    await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: undefined, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: {}, send }
    );

    expect(clock.delays).toEqual([2000, 3000]);
    expect(send.mock.calls[1]?.[0].url).toBe('https://api.example.com/status/2');
  });

  it('times out once the wait budget is spent, never sleeping past it', async () => {
    const { clock, poller } = setup({ ...pollPolicy, maxWaitMs: 5000 });
    const send = scriptedSend(response(202));

    const result = await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: undefined, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: {}, send }
    );

    expect(clock.delays).toEqual([2000, 2000, 1000]);
    expect(result.polls).toBe(3);
    expect(result.outcome).toEqual({
      attempts: 3,
      breakerSignal: 'success',
      failure: 'timeout',
      kind: 'failure',
      message: 'Async operation timeout after 5.0s (3 polls)',
      statusCode: undefined,
    });
  });

  it('returns the failure of a status request', async () => {
    const { poller } = setup();
    const send = scriptedSend(response(500, 'job crashed'));

    const result = await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: undefined, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: {}, send }
    );

    expect(result.polls).toBe(1);
    expect(result.outcome).toMatchObject({
      breakerSignal: 'failure',
      failure: 'operation',
      message: 'HTTP 500: job crashed',
      statusCode: 500,
    });
  });

  it('does not hold exhausted 429s on a status request against the breaker', async () => {
    const { clock, poller } = setup();
    const send = scriptedSend(response(429));

    const result = await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: undefined, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: {}, send }
    );

    expect(clock.delays).toEqual([2000]);
    expect(result).toEqual({
      attempts: 1,
      outcome: {
        attempts: 1,
        breakerSignal: 'success',
        failure: 'rate_limited',
        kind: 'failure',
        message: 'Rate limit exceeded',
        statusCode: 429,
      },
      polls: 1,
    });
  });

  it('fails the operation when a pending poll sends an unparseable Location', async () => {
    const { poller } = setup();
    const send = scriptedSend(response(202, '', { Location: 'http://[bad' }), response(200));

    const result = await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: undefined, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: {}, send }
    );

    expect(send).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      attempts: 1,
      outcome: {
        attempts: 1,
        breakerSignal: 'success',
        failure: 'operation',
        kind: 'failure',
        message: 'Invalid Location header: http://[bad',
        statusCode: 202,
      },
      polls: 1,
    });
  });

  it('stops when the caller cancels during a wait', async () => {
    const controller = new AbortController();
    const { poller } = setup(pollPolicy, {}, {
      delay: () => {
        controller.abort();
        return Promise.resolve();
      },
    });
    const send = scriptedSend(response(200));

    const result = await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: undefined, startedAt: 0 },
      { execution: { signal: controller.signal, timeoutMs: 1000 }, headers: {}, send }
    );

    expect(result).toMatchObject({ attempts: 0, outcome: { failure: 'cancelled' }, polls: 1 });
    expect(send).not.toHaveBeenCalled();
  });

  it('reports each poll through the hook', async () => {
    const onPoll = vi.fn();
    const { poller } = setup(pollPolicy, { onPoll });
    const send = scriptedSend(response(202), response(200));

    await poller.poll(
      { locationUrl: STATUS_URL, retryAfterHintMs: 500, startedAt: 0 },
      { execution: { timeoutMs: 1000 }, headers: {}, send }
    );

    expect(onPoll.mock.calls).toEqual([
      [{ delayMs: 500, location: STATUS_URL, pollNumber: 1 }],
      [{ delayMs: 500, location: STATUS_URL, pollNumber: 2 }],
    ]);
  });
});
