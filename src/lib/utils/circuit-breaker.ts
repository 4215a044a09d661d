import logger from './logger';
import { updateCircuitBreakerState } from './metrics';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  successThreshold?: number;
  openDurationMs?: number;
  name?: string;
}

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit breaker '${name}' is OPEN`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Stops calling a failing dependency for a while after repeated failures.
 * Used around the messaging API so an outage does not stall every check cycle.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private successes = 0;
  private nextAttemptTime = 0;

  private readonly failureThreshold: number;
  private readonly successThreshold: number;
  private readonly openDurationMs: number;
  private readonly name: string;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.successThreshold = options.successThreshold ?? 1;
    this.openDurationMs = options.openDurationMs ?? 60000;
    this.name = options.name ?? 'unnamed';
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (Date.now() < this.nextAttemptTime) {
        throw new CircuitOpenError(this.name);
      }

      this.transition('half-open');
      this.successes = 0;
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.failures = 0;
    this.successes = 0;
    this.nextAttemptTime = 0;
    this.transition('closed');
  }

  private onSuccess(): void {
    this.failures = 0;

    if (this.state === 'half-open') {
      this.successes++;
      if (this.successes >= this.successThreshold) {
        this.successes = 0;
        this.transition('closed');
      }
    }
  }

  private onFailure(): void {
    this.failures++;

    if (this.state === 'half-open' || this.failures >= this.failureThreshold) {
      this.nextAttemptTime = Date.now() + this.openDurationMs;
      this.transition('open');

      logger.error(`Circuit breaker '${this.name}' opened`, {
        failures: this.failures,
        threshold: this.failureThreshold,
        nextAttemptTime: new Date(this.nextAttemptTime).toISOString(),
      });
    }
  }

  private transition(state: CircuitState): void {
    if (this.state !== state) {
      logger.info(`Circuit breaker '${this.name}' ${state.toUpperCase()}`);
    }
    this.state = state;
    updateCircuitBreakerState(this.name, state);
  }
}
