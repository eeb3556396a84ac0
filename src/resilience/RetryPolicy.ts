import { ErrorUtils } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/delay.js';

/**
 * Retry configuration
 */
export interface RetryConfig {
  /**
   * Total attempts, including the first
   * @default 3
   */
  maxAttempts: number;

  /**
   * Delay after the first failed attempt (ms); grows linearly, 2s, 4s, ...
   * @default 2000
   */
  baseDelay: number;

  /**
   * Decides whether a failure is worth another attempt
   * @default ErrorUtils.isTransient
   */
  shouldRetry: (error: unknown) => boolean;

  sleep: Sleep;
}

/**
 * Retry statistics for a single operation
 */
export interface RetryStats {
  attempts: number;
  totalDelay: number;
  errors: unknown[];
  /** The signal aborted before the attempts ran out */
  aborted: boolean;
}

/**
 * Thrown when every attempt failed with a retriable error, or when the
 * signal aborted between attempts
 */
export class RetryExhaustedError extends Error {
  readonly lastError: unknown;
  readonly stats: RetryStats;

  constructor(lastError: unknown, stats: RetryStats) {
    const verb = stats.aborted ? 'Interrupted' : 'Gave up';
    super(`${verb} after ${stats.attempts} attempts: ${ErrorUtils.describe(lastError)}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.lastError = lastError;
    this.stats = stats;
  }
}

/**
 * Retry policy with bounded attempts and linear backoff.
 * A non-retriable error is rethrown as is; running out of attempts
 * throws RetryExhaustedError.
 */
export class RetryPolicy {
  private config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      baseDelay: config.baseDelay ?? 2000,
      shouldRetry: config.shouldRetry ?? ((error) => ErrorUtils.isTransient(error)),
      sleep: config.sleep ?? defaultSleep,
    };

    if (this.config.maxAttempts < 1) {
      throw new Error('maxAttempts must be >= 1');
    }
    if (this.config.baseDelay < 0) {
      throw new Error('baseDelay must be >= 0');
    }
  }

  /**
   * Executes an operation with retry logic
   * @throws RetryExhaustedError, or the first non-retriable error
   */
  async execute<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const [result] = await this.executeWithStats(operation, signal);
    return result;
  }

  /**
   * Executes operation with stats collection
   * @returns Tuple of [result, stats]
   */
  async executeWithStats<T>(
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<[T, RetryStats]> {
    const stats: RetryStats = {
      attempts: 0,
      totalDelay: 0,
      errors: [],
      aborted: false,
    };

    for (let attempt = 1; ; attempt++) {
      stats.attempts = attempt;

      try {
        const result = await operation();
        return [result, stats];
      } catch (error) {
        stats.errors.push(error);

        if (!this.config.shouldRetry(error)) {
          throw error;
        }

        if (attempt >= this.config.maxAttempts || signal?.aborted) {
          stats.aborted = signal?.aborted ?? false;
          throw new RetryExhaustedError(error, stats);
        }

        const delay = this.calculateDelay(attempt);
        stats.totalDelay += delay;
        await this.config.sleep(delay, signal);

        // An aborted sleep returns early
        if (signal?.aborted) {
          stats.aborted = true;
          throw new RetryExhaustedError(error, stats);
        }
      }
    }
  }

  /**
   * Delay to wait after the given failed attempt (1-indexed)
   */
  calculateDelay(attempt: number): number {
    return this.config.baseDelay * attempt;
  }
}
