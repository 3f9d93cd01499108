import * as Backoff from './core/backoff.js';
import * as HttpUtils from './core/http-utils.js';
import type { AttemptOutcome, HttpEffects, JitterRange, PendingOperation, RequestSpec } from './core/types.js';
import type { ExecutionContext, RetryExecutor, SendFn } from './retry-executor.js';
import type { HttpClientHooks } from './types.js';

export interface PollPolicy {
  jitter: JitterRange;
  maxWaitMs: number;
  pollIntervalMs: number;
}

export interface PollContext {
  execution: Omit<ExecutionContext, 'preAcquired'>;
  /** Headers for the status GETs (auth, accept) */
  headers: Readonly<Record<string, string>>;
  send: SendFn;
}

export interface PollResult {
  /** Physical attempts made by status GETs, retries included */
  attempts: number;
  outcome: AttemptOutcome;
  polls: number;
}

export type PollerEffects = Pick<HttpEffects, 'delay' | 'log' | 'now' | 'random'>;

/**
 * Follows a 202 Accepted operation by GETting its Location until it
 * completes, fails or runs out of wall-clock budget.
 */
export class AsyncOperationPoller {
  constructor(
    private readonly policy: PollPolicy,
    private readonly executor: RetryExecutor,
    private readonly effects: PollerEffects,
    private readonly hooks: HttpClientHooks = {}
  ) {}

  async poll(pending: PendingOperation, context: PollContext): Promise<PollResult> {
    const budget = { kind: 'deadline', maxElapsedMs: this.policy.maxWaitMs } as const;
    const signal = context.execution.signal;
    let locationUrl = pending.locationUrl;
    let hintMs = pending.retryAfterHintMs;
    let attempts = 0;
    let polls = 0;

    this.effects.log('info', `Async operation started, polling ${HttpUtils.sanitizeUrl(locationUrl)}`);

    while (true) {
      const elapsedMs = this.effects.now() - pending.startedAt;
      const jittered =
        hintMs === undefined
          ? Backoff.applyJitter(this.policy.pollIntervalMs, this.policy.jitter, this.effects.random())
          : Backoff.applyJitterToHint(hintMs, this.policy.jitter, this.effects.random());

      const step = Backoff.planNextDelay(budget, { attempts: polls, elapsedMs }, jittered);
      if (step.kind === 'exhausted') {
        const elapsedSeconds = (elapsedMs / 1000).toFixed(1);
        this.effects.log('warn', `Async operation timeout after ${elapsedSeconds}s (${polls} polls)`);
        return {
          attempts,
          outcome: {
            attempts,
            // Still pending is not a dependency failure
            breakerSignal: 'success',
            failure: 'timeout',
            kind: 'failure',
            message: `Async operation timeout after ${elapsedSeconds}s (${polls} polls)`,
            statusCode: undefined,
          },
          polls,
        };
      }

      polls += 1;
      this.hooks.onPoll?.({ delayMs: step.delayMs, location: locationUrl, pollNumber: polls });
      this.effects.log('debug', `Polling attempt ${polls}, waiting ${Math.round(step.delayMs)}ms`);
      await this.effects.delay(step.delayMs, signal);

      if (signal?.aborted) {
        return {
          attempts,
          outcome: {
            attempts,
            breakerSignal: 'none',
            failure: 'cancelled',
            kind: 'failure',
            message: 'Request cancelled',
            statusCode: undefined,
          },
          polls,
        };
      }

      const spec: RequestSpec = {
        body: undefined,
        headers: context.headers,
        idempotent: true,
        method: 'GET',
        url: locationUrl,
      };
      const outcome = await this.executor.execute(spec, context.send, { ...context.execution, preAcquired: false });
      attempts += outcome.attempts;

      if (outcome.kind === 'success') {
        this.effects.log('info', `Async operation completed after ${polls} polls`);
        return { attempts, outcome, polls };
      }
      if (outcome.kind === 'failure') {
        // Throttled status checks never count against the breaker
        const breakerSignal = outcome.failure === 'rate_limited' ? 'success' : outcome.breakerSignal;
        return { attempts, outcome: { ...outcome, breakerSignal }, polls };
      }

      // Still processing; keep the previous hint when none is sent
      if (outcome.retryAfterMs !== undefined) {
        hintMs = outcome.retryAfterMs;
      }
      if (outcome.location) {
        try {
          locationUrl = HttpUtils.resolveLocation(outcome.location, locationUrl);
        } catch {
          this.effects.log('warn', `Invalid Location header while polling: ${outcome.location}`);
          return {
            attempts,
            outcome: {
              attempts,
              breakerSignal: 'success',
              failure: 'operation',
              kind: 'failure',
              message: `Invalid Location header: ${outcome.location}`,
              statusCode: outcome.response.status,
            },
            polls,
          };
        }
      }
    }
  }
}
