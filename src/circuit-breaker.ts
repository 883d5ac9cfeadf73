/**
 * circuit-breaker.ts
 * Per-backend failure-counting circuit breaker and its registry
 */

import { createLogger } from './utils/logger.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  threshold: number;
  cooldownMs: number;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failureCount: number;
  lastFailure: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  threshold: 5,
  cooldownMs: 30000,
};

const log = createLogger('circuit-breaker');

/**
 * Counts consecutive connect-class failures for one backend.
 *
 * Half-open admits every caller until a result is recorded; concurrent probes
 * are not limited to one.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureTime = 0;

  constructor(
    readonly name: string,
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now,
    private readonly onStateChange?: (oldState: CircuitState, newState: CircuitState) => void
  ) {}

  allowRequest(): boolean {
    if (this.state === 'closed' || this.state === 'half-open') {
      return true;
    }
    if (this.now() - this.lastFailureTime > this.config.cooldownMs) {
      this.transitionTo('half-open');
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    this.failureCount = 0;
    if (this.state !== 'closed') {
      this.transitionTo('closed');
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.failureCount >= this.config.threshold && this.state !== 'open') {
      this.transitionTo('open');
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      lastFailure: this.lastFailureTime,
    };
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;
    if (newState === 'open') {
      log.warn(`Circuit breaker ${this.name} opened after ${this.failureCount} failures`);
    } else {
      log.info(`Circuit breaker ${this.name} transitioned from ${oldState} to ${newState}`);
    }
    this.onStateChange?.(oldState, newState);
  }
}

/**
 * Breakers keyed by backend name, created lazily on first use
 */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  getOrCreate(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(name, this.config, this.now);
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  getAllStats(): Record<string, CircuitBreakerStats> {
    const stats: Record<string, CircuitBreakerStats> = {};
    for (const [name, breaker] of this.breakers) {
      stats[name] = breaker.getStats();
    }
    return stats;
  }
}
