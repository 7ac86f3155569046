/**
 * Retry Strategy System
 *
 * Configurable retry policies for transient failures. Works with the
 * ApplicationError hierarchy: an error is retried only when it is flagged
 * retryable (and, when the policy lists codes, its code is listed).
 *
 * The backoff itself is a pure function of the policy and attempt number;
 * reporting goes through the policy's `onRetry` callback.
 */

import { ApplicationError, ErrorCode } from './ApplicationError.js';
import { JobCanceledError } from './jobErrors.js';
import { logger } from '../middleware/logging.js';
import { delay, SleepFn } from '../utils/delay.js';

// ============================================
// RETRY POLICY CONFIGURATION
// ============================================

export interface RetryPolicy {
  /**
   * Maximum number of attempts, including the first one
   */
  maxAttempts: number;

  /**
   * Initial delay in milliseconds before first retry
   */
  initialDelayMs: number;

  /**
   * Maximum delay in milliseconds between retries
   */
  maxDelayMs: number;

  /**
   * Backoff multiplier (e.g., 2 for exponential backoff)
   */
  backoffMultiplier: number;

  /**
   * Jitter factor (0-1) to randomize retry delays
   */
  jitterFactor: number;

  /**
   * Error codes that should be retried
   */
  retryableErrorCodes?: ErrorCode[];

  /**
   * Custom function to determine if error is retryable
   * If provided, this overrides the error's built-in retryable flag
   */
  shouldRetry?: (error: Error, attemptNumber: number) => boolean;

  /**
   * Callback invoked before each retry attempt
   */
  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

// ============================================
// PREDEFINED RETRY POLICIES
// ============================================

/**
 * Default retry policy for general operational errors
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Network-specific retry policy: only transport and server-side failures
 */
export const NETWORK_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterFactor: 0.2,
  retryableErrorCodes: [
    ErrorCode.NETWORK_CONNECTION_FAILED,
    ErrorCode.NETWORK_TIMEOUT,
    ErrorCode.PROVIDER_RATE_LIMIT,
    ErrorCode.PROVIDER_SERVER_ERROR,
  ],
};

// ============================================
// BACKOFF
// ============================================

/**
 * Exponential backoff with jitter, capped at `maxDelayMs`.
 * `random` is injectable so the result is deterministic in tests.
 */
export function computeBackoffDelay(
  policy: Pick<RetryPolicy, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitterFactor'>,
  attemptNumber: number,
  random: () => number = Math.random
): number {
  const exponentialDelay =
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attemptNumber - 1);

  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);

  const jitter = cappedDelay * policy.jitterFactor * (random() - 0.5);

  return Math.min(policy.maxDelayMs, Math.max(0, Math.floor(cappedDelay + jitter)));
}

// ============================================
// RETRY STRATEGY CLASS
// ============================================

export class RetryStrategy {
  constructor(
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly sleep: SleepFn = delay
  ) {}

  /**
   * Execute an operation with retry logic
   */
  async execute<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation',
    signal?: AbortSignal
  ): Promise<T> {
    const result = await this.executeWithResult(operation, operationName, signal);
    if (result.success) {
      return result.value;
    }
    throw result.error;
  }

  /**
   * Execute an operation and return detailed result.
   * An aborted signal stops further attempts and surfaces JobCanceledError.
   */
  async executeWithResult<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation',
    signal?: AbortSignal
  ): Promise<RetryResult<T>> {
    let attemptCount = 0;
    let totalDelayMs = 0;
    let lastError: Error | undefined;

    while (attemptCount < this.policy.maxAttempts) {
      attemptCount++;

      try {
        const value = await operation();
        return {
          success: true,
          value,
          attemptCount,
          totalDelayMs,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        const shouldRetry = this.shouldRetryError(lastError, attemptCount);

        if (!shouldRetry || attemptCount >= this.policy.maxAttempts) {
          logger.warn(`${operationName} failed after ${attemptCount} attempt(s)`, {
            error: lastError.message,
            attemptCount,
            totalDelayMs,
          });

          return {
            success: false,
            error: lastError,
            attemptCount,
            totalDelayMs,
          };
        }

        const delayMs = Math.max(
          computeBackoffDelay(this.policy, attemptCount),
          Math.min(extractRetryAfter(lastError) ?? 0, this.policy.maxDelayMs)
        );
        totalDelayMs += delayMs;

        if (this.policy.onRetry) {
          this.policy.onRetry(lastError, attemptCount, delayMs);
        }

        logger.debug(`Retrying ${operationName} after error`, {
          error: lastError.message,
          attemptNumber: attemptCount,
          nextAttemptIn: delayMs,
          totalAttempts: this.policy.maxAttempts,
        });

        if (signal?.aborted) {
          return { success: false, error: new JobCanceledError(undefined), attemptCount, totalDelayMs };
        }

        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError) {
          return {
            success: false,
            error: sleepError instanceof Error ? sleepError : new JobCanceledError(undefined),
            attemptCount,
            totalDelayMs,
          };
        }
      }
    }

    return {
      success: false,
      error: lastError ?? new Error(`${operationName} was not attempted`),
      attemptCount,
      totalDelayMs,
    };
  }

  /**
   * Determine if an error should be retried
   */
  private shouldRetryError(error: Error, attemptNumber: number): boolean {
    if (this.policy.shouldRetry) {
      return this.policy.shouldRetry(error, attemptNumber);
    }

    if (error instanceof ApplicationError) {
      if (!error.retryable) {
        return false;
      }

      if (this.policy.retryableErrorCodes) {
        return this.policy.retryableErrorCodes.includes(error.code);
      }

      return true;
    }

    // Non-application errors are not retried unless shouldRetry says so
    return false;
  }
}

// ============================================
// HELPER FUNCTIONS
// ============================================

/**
 * Create a retry strategy with custom policy
 */
export function createRetryStrategy(
  policy: Partial<RetryPolicy>,
  sleep: SleepFn = delay
): RetryStrategy {
  return new RetryStrategy({ ...DEFAULT_RETRY_POLICY, ...policy }, sleep);
}

/**
 * Extract retry-after delay (ms) from a RateLimitError's context
 */
export function extractRetryAfter(error: Error): number | undefined {
  if (error instanceof ApplicationError) {
    const retryAfter = error.context.metadata?.retryAfter;
    if (typeof retryAfter === 'number') {
      return retryAfter * 1000;
    }
  }
  return undefined;
}
