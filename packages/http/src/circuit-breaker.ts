import { getLogger, type Logger } from '@steady/logger';

import * as CircuitBreakerCore from './core/circuit-breaker.js';
import type { CircuitBreakerState, CircuitState, HttpEffects } from './core/types.js';

export interface CircuitBreakerOptions {
  /** When false the breaker always allows and never transitions */
  enabled?: boolean | undefined;
  failureThreshold: number;
  name?: string | undefined;
  timeoutSeconds: number;
}

export type CircuitBreakerEffects = Pick<HttpEffects, 'now'>;

/**
 * Per-dependency breaker. Holds the only mutable copy of its state;
 * every transition is computed by the pure functions in core/circuit-breaker.
 */
export class CircuitBreaker {
  readonly enabled: boolean;
  readonly name: string;

  private readonly effects: CircuitBreakerEffects;
  private readonly logger: Logger;
  private circuitState: CircuitBreakerState;

  constructor(options: CircuitBreakerOptions, effects: Partial<CircuitBreakerEffects> = {}) {
    this.effects = { now: () => Date.now(), ...effects };
    this.enabled = options.enabled ?? true;
    this.name = options.name ?? 'default';
    this.logger = getLogger(`CircuitBreaker:${this.name}`);
    this.circuitState = CircuitBreakerCore.createCircuitBreakerState(
      options.failureThreshold,
      options.timeoutSeconds * 1000
    );
  }

  get state(): CircuitState {
    return this.circuitState.state;
  }

  /**
   * May a request go out? In half-open state only one caller gets true
   * until the trial is recorded or released.
   */
  allow(): boolean {
    if (!this.enabled) {
      return true;
    }

    const decision = CircuitBreakerCore.evaluateAllow(this.circuitState, this.effects.now());
    this.transition(decision.state);
    return decision.allowed;
  }

  /**
   * Open and still cooling down. Does not consume the half-open trial.
   */
  isRejecting(): boolean {
    if (!this.enabled) {
      return false;
    }
    return (
      this.circuitState.state === 'open' &&
      !CircuitBreakerCore.hasCooldownElapsed(this.circuitState, this.effects.now())
    );
  }

  recordSuccess(): void {
    if (!this.enabled) {
      return;
    }
    this.transition(CircuitBreakerCore.recordSuccess(this.circuitState, this.effects.now()));
  }

  recordFailure(): void {
    if (!this.enabled) {
      return;
    }
    this.transition(CircuitBreakerCore.recordFailure(this.circuitState, this.effects.now()));
  }

  /**
   * Give back a half-open trial whose outcome says nothing about the dependency
   * (e.g. the caller cancelled)
   */
  releaseTrial(): void {
    if (!this.enabled) {
      return;
    }
    this.transition(CircuitBreakerCore.releaseTrial(this.circuitState));
  }

  reset(): void {
    this.transition(CircuitBreakerCore.resetCircuit(this.circuitState));
  }

  getStatistics() {
    return {
      enabled: this.enabled,
      name: this.name,
      ...CircuitBreakerCore.getCircuitStatistics(this.circuitState, this.effects.now()),
    };
  }

  private transition(next: CircuitBreakerState): void {
    const previous = this.circuitState.state;
    this.circuitState = next;

    if (previous === next.state) {
      return;
    }

    if (next.state === 'open') {
      this.logger.warn(
        {
          consecutiveFailures: next.counter.consecutiveFailures,
          from: previous,
          timeoutMs: next.timeoutMs,
        },
        'Circuit breaker opened'
      );
    } else {
      this.logger.info({ from: previous, to: next.state }, 'Circuit breaker state changed');
    }
  }
}
