// Pure circuit breaker functions
// All functions take state and return new state without side effects

import type { CircuitBreakerState } from './types.js';

export const createCircuitBreakerState = (failureThreshold: number, timeoutMs: number): CircuitBreakerState => {
  if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
    throw new Error(`Invalid circuit breaker configuration: failureThreshold must be a positive integer, got ${failureThreshold}`);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new Error(`Invalid circuit breaker configuration: timeoutMs must be a non-negative number, got ${timeoutMs}`);
  }

  return {
    counter: { consecutiveFailures: 0, openedAt: undefined },
    failureThreshold,
    lastSuccessAt: undefined,
    state: 'closed',
    timeoutMs,
    trialInFlight: false,
  };
};

/**
 * Whether an open breaker has waited out its cooldown
 */
export const hasCooldownElapsed = (state: CircuitBreakerState, currentTime: number): boolean => {
  if (state.state !== 'open' || state.counter.openedAt === undefined) {
    return false;
  }
  return currentTime - state.counter.openedAt >= state.timeoutMs;
};

/**
 * Decide whether a request may proceed.
 * An open breaker past its cooldown moves to half-open and hands out the single trial.
 */
export const evaluateAllow = (
  state: CircuitBreakerState,
  currentTime: number
): { allowed: boolean; state: CircuitBreakerState } => {
  switch (state.state) {
    case 'closed':
      return { allowed: true, state };
    case 'open':
      if (!hasCooldownElapsed(state, currentTime)) {
        return { allowed: false, state };
      }
      return { allowed: true, state: { ...state, state: 'half-open', trialInFlight: true } };
    case 'half-open':
      if (state.trialInFlight) {
        return { allowed: false, state };
      }
      return { allowed: true, state: { ...state, trialInFlight: true } };
  }
};

/**
 * Record a success (closes the breaker and resets the failure count).
 * An open breaker only leaves through its cooldown and the half-open trial.
 */
export const recordSuccess = (state: CircuitBreakerState, currentTime: number): CircuitBreakerState => {
  if (state.state === 'open') {
    // Late success from a call admitted before opening
    return { ...state, lastSuccessAt: currentTime };
  }

  return {
    ...state,
    counter: { consecutiveFailures: 0, openedAt: undefined },
    lastSuccessAt: currentTime,
    state: 'closed',
    trialInFlight: false,
  };
};

/**
 * Record a failure and return new state
 */
export const recordFailure = (state: CircuitBreakerState, currentTime: number): CircuitBreakerState => {
  const consecutiveFailures = state.counter.consecutiveFailures + 1;

  switch (state.state) {
    case 'half-open':
      return {
        ...state,
        counter: { consecutiveFailures, openedAt: currentTime },
        state: 'open',
        trialInFlight: false,
      };
    case 'open':
      // Late failures from calls admitted before opening do not extend the cooldown
      return { ...state, counter: { ...state.counter, consecutiveFailures } };
    case 'closed':
      if (consecutiveFailures >= state.failureThreshold) {
        return {
          ...state,
          counter: { consecutiveFailures, openedAt: currentTime },
          state: 'open',
        };
      }
      return { ...state, counter: { ...state.counter, consecutiveFailures } };
  }
};

/**
 * Free the half-open trial slot without deciding the outcome
 */
export const releaseTrial = (state: CircuitBreakerState): CircuitBreakerState => {
  if (state.state !== 'half-open' || !state.trialInFlight) {
    return state;
  }
  return { ...state, trialInFlight: false };
};

export const resetCircuit = (state: CircuitBreakerState): CircuitBreakerState => {
  return {
    ...state,
    counter: { consecutiveFailures: 0, openedAt: undefined },
    state: 'closed',
    trialInFlight: false,
  };
};

/**
 * Get comprehensive circuit breaker statistics
 */
export const getCircuitStatistics = (state: CircuitBreakerState, currentTime: number) => {
  const openedAt = state.counter.openedAt;
  const timeUntilHalfOpenMs =
    state.state === 'open' && openedAt !== undefined ? Math.max(0, state.timeoutMs - (currentTime - openedAt)) : 0;

  return {
    consecutiveFailures: state.counter.consecutiveFailures,
    failureThreshold: state.failureThreshold,
    lastSuccessAt: state.lastSuccessAt,
    openedAt,
    state: state.state,
    timeoutMs: state.timeoutMs,
    timeUntilHalfOpenMs,
    trialInFlight: state.trialInFlight,
  };
};
