import logger from './logger';
import { toError } from './errors';

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Fraction of the delay added or removed at random (0 disables jitter) */
  jitterRatio?: number;
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Outcome of a retried operation, kept together with the attempt count
 */
export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export class RetryError extends Error {
  constructor(
    public readonly lastError: Error,
    public readonly attempts: number
  ) {
    super(lastError.message);
    this.name = 'RetryError';
  }
}

export class RetryStrategy {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly backoffMultiplier: number;
  private readonly jitterRatio: number;
  private readonly shouldRetry: (error: Error) => boolean;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30000;
    this.backoffMultiplier = options.backoffMultiplier ?? 2;
    this.jitterRatio = options.jitterRatio ?? 0;
    this.shouldRetry = options.shouldRetry ?? (() => true);
  }

  /**
   * Run the operation, retrying retryable failures.
   * Rejects with a RetryError carrying the last failure and the attempt count.
   */
  async run<T>(operation: (attempt: number) => Promise<T>, context?: string): Promise<RetryOutcome<T>> {
    for (let attempt = 0; ; attempt++) {
      try {
        const value = await operation(attempt);
        return { value, attempts: attempt + 1 };
      } catch (error) {
        const lastError = toError(error);

        if (attempt + 1 >= this.maxAttempts || !this.shouldRetry(lastError)) {
          throw new RetryError(lastError, attempt + 1);
        }

        const delay = this.calculateDelay(attempt);

        logger.warn('Operation failed, retrying', {
          context,
          attempt: attempt + 1,
          maxAttempts: this.maxAttempts,
          delayMs: delay,
          error: lastError.message,
        });

        await this.sleep(delay);
      }
    }
  }

  /**
   * Run the operation and rethrow the last failure unchanged
   */
  async execute<T>(operation: () => Promise<T>, context?: string): Promise<T> {
    try {
      const outcome = await this.run(operation, context);
      return outcome.value;
    } catch (error) {
      throw error instanceof RetryError ? error.lastError : error;
    }
  }

  /**
   * Delay after the given 0-indexed attempt: base * multiplier^attempt
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay = this.baseDelayMs * Math.pow(this.backoffMultiplier, attempt);
    const cappedDelay = Math.min(exponentialDelay, this.maxDelayMs);

    if (this.jitterRatio === 0) {
      return Math.floor(cappedDelay);
    }

    const jitter = cappedDelay * this.jitterRatio * (Math.random() - 0.5) * 2;
    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
