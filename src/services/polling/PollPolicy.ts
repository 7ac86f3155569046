import { PollingConfig } from '../../config/types.js';
import { RetryPolicy, NETWORK_RETRY_POLICY, ValidationError } from '../../errors/index.js';

/**
 * How a job is polled. A plain value: reporting goes through PollObserver.
 */
export interface PollPolicy {
  /** Wait between status checks; no wait in the poller is ever longer */
  intervalMs: number;
  /** Status checks allowed in one run; ignored when `indefinite` */
  maxAttempts: number;
  /** Poll until a terminal state or cancellation; requires a cancel signal */
  indefinite: boolean;
  perCallTimeoutMs: number;
  /** Extra tries for a status check that failed transiently */
  transientRetries: number;
  /** First backoff between transient retries; grows exponentially, capped at intervalMs */
  transientBackoffMs: number;
}

export function createPollPolicy(config: PollingConfig, overrides: Partial<PollPolicy> = {}): PollPolicy {
  return {
    intervalMs: config.intervalMs,
    maxAttempts: config.maxAttempts,
    indefinite: false,
    perCallTimeoutMs: config.perCallTimeoutMs,
    transientRetries: config.transientRetries,
    transientBackoffMs: config.transientBackoffMs,
    ...overrides,
  };
}

/**
 * @throws ValidationError for unusable policies, including indefinite polling without a way to stop it
 */
export function assertValidPollPolicy(policy: PollPolicy, signal?: AbortSignal, jobId?: string): void {
  const context = { service: 'JobPoller', operation: 'run', ...(jobId !== undefined && { jobId }) };

  if (!Number.isFinite(policy.intervalMs) || policy.intervalMs < 0) {
    throw new ValidationError(`Poll interval must be >= 0 ms, got ${policy.intervalMs}`, context);
  }
  if (policy.indefinite && !signal) {
    throw new ValidationError('Indefinite polling requires a cancellation signal', context);
  }
  if (!policy.indefinite && (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1)) {
    throw new ValidationError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`, context);
  }
  if (!Number.isInteger(policy.transientRetries) || policy.transientRetries < 0) {
    throw new ValidationError(`transientRetries must be >= 0, got ${policy.transientRetries}`, context);
  }
}

/**
 * True when another status check is allowed after `checksDone` checks
 */
export function hasAttemptsLeft(policy: PollPolicy, checksDone: number): boolean {
  return policy.indefinite || checksDone < policy.maxAttempts;
}

/**
 * Retry policy for a single status check. Backoff never exceeds the poll interval.
 */
export function toCheckRetryPolicy(
  policy: PollPolicy,
  onRetry?: RetryPolicy['onRetry']
): RetryPolicy {
  return {
    ...NETWORK_RETRY_POLICY,
    maxAttempts: 1 + policy.transientRetries,
    initialDelayMs: Math.min(policy.transientBackoffMs, policy.intervalMs),
    maxDelayMs: policy.intervalMs,
    ...(onRetry && { onRetry }),
  };
}
