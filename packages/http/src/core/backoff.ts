// Shared backoff/jitter primitive for the retry loop and the async poller
// All functions are pure - randomness is passed in

import type { BackoffBudget, BackoffPolicy, BackoffProgress, BackoffStep, JitterRange } from './types.js';

/**
 * delay = min(maxDelay, baseDelay * factor^attemptIndex)
 */
export const computeBackoffDelay = (attemptIndex: number, policy: BackoffPolicy): number => {
  const delay = policy.baseDelayMs * Math.pow(policy.backoffFactor, attemptIndex);
  return Math.min(delay, policy.maxDelayMs);
};

/**
 * Scale a delay by a factor drawn uniformly from [minFactor, maxFactor]
 */
export const applyJitter = (delayMs: number, jitter: JitterRange, random: number): number => {
  const factor = jitter.minFactor + (jitter.maxFactor - jitter.minFactor) * random;
  return delayMs * factor;
};

/**
 * Jitter a server-provided hint without ever waiting less than the hint
 */
export const applyJitterToHint = (hintMs: number, jitter: JitterRange, random: number): number => {
  return Math.max(hintMs, applyJitter(hintMs, jitter, random));
};

export const isBudgetExhausted = (budget: BackoffBudget, progress: BackoffProgress): boolean => {
  switch (budget.kind) {
    case 'attempts':
      return progress.attempts >= budget.maxAttempts;
    case 'deadline':
      return progress.elapsedMs >= budget.maxElapsedMs;
  }
};

/**
 * Decide the next wait, or report the budget exhausted.
 * Deadline budgets never sleep past the deadline.
 */
export const planNextDelay = (
  budget: BackoffBudget,
  progress: BackoffProgress,
  delayMs: number
): BackoffStep => {
  if (isBudgetExhausted(budget, progress)) {
    return { kind: 'exhausted' };
  }

  if (budget.kind === 'deadline') {
    const remainingMs = budget.maxElapsedMs - progress.elapsedMs;
    return { delayMs: Math.max(0, Math.min(delayMs, remainingMs)), kind: 'wait' };
  }

  return { delayMs: Math.max(0, delayMs), kind: 'wait' };
};
