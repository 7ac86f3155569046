import pMap from 'p-map';
import { RenderJobApi, StatusPayload } from '../render/types.js';
import { JobRecordStore } from '../jobStore/types.js';
import { Job, isRemoteFailureStatus, isTerminalStatus } from '../../types/jobs.js';
import {
  ApplicationError,
  ErrorContext,
  JobCanceledError,
  PollingTimeoutError,
  RemoteJobFailure,
  RetryStrategy,
  StageExecutionError,
} from '../../errors/index.js';
import { delay, SleepFn } from '../../utils/delay.js';
import { logger } from '../../middleware/logging.js';
import { PollPolicy, assertValidPollPolicy, hasAttemptsLeft, toCheckRetryPolicy } from './PollPolicy.js';

/**
 * Outcome of a poll run. `job` is the last stored state, except that a local
 * timeout reports status POLLING_TIMEOUT (which is never written to the store).
 */
export interface PollResult {
  job: Job;
  /** Set for every outcome except COMPLETED */
  error?: ApplicationError;
  /** Status checks made during this run */
  checks: number;
}

/**
 * Progress hooks. Kept apart from the polling algorithm so callers can log,
 * report or record without changing it.
 */
export interface PollObserver {
  onCheck?(job: Job, check: number): void;
  onTransientError?(jobId: string, error: Error, retry: number, delayMs: number): void;
  onWait?(jobId: string, delayMs: number, check: number): void;
  onFinish?(result: PollResult): void;
}

export interface JobPollerOptions {
  sleep?: SleepFn;
  observer?: PollObserver;
  now?: () => Date;
}

export interface RunManyOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * Store update for one successful status check
 */
export function applyStatusPayload(current: Job, payload: StatusPayload, checkedAt: Date): Job {
  const next: Job = {
    ...current,
    status: payload.status,
    attempts: current.attempts + 1,
    lastCheckedAt: checkedAt.toISOString(),
    data: payload.raw,
  };

  if (payload.outputUrl) {
    next.remoteOutputUrl = payload.outputUrl;
  }
  if (isRemoteFailureStatus(payload.status)) {
    next.error = {
      kind: payload.status,
      message: payload.error ?? `Remote job ended with status ${payload.rawStatus}`,
    };
  }

  return next;
}

/**
 * Polls remote render jobs until they reach a terminal state, the attempt
 * budget runs out, or the caller cancels.
 */
export class JobPoller {
  private readonly sleep: SleepFn;
  private readonly observer: PollObserver;
  private readonly now: () => Date;

  constructor(
    private readonly api: RenderJobApi,
    private readonly store: JobRecordStore,
    options: JobPollerOptions = {}
  ) {
    this.sleep = options.sleep ?? delay;
    this.observer = options.observer ?? {};
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Poll one job. Never throws for remote outcomes: fatal errors, remote
   * failures, local timeouts and cancellation are all returned in the result.
   * Store failures and invalid policies do throw.
   */
  async run(
    jobId: string,
    policy: PollPolicy,
    signal?: AbortSignal,
    context: ErrorContext = {}
  ): Promise<PollResult> {
    assertValidPollPolicy(policy, signal, jobId);

    const errorContext: ErrorContext = { service: 'JobPoller', operation: 'run', ...context, jobId };
    const retry = new RetryStrategy(
      toCheckRetryPolicy(policy, (error, retryNumber, delayMs) => {
        this.observer.onTransientError?.(jobId, error, retryNumber, delayMs);
      }),
      this.sleep
    );

    let job = await this.ensureRecord(jobId, context);
    let checks = 0;
    let lastTransient: ApplicationError | undefined;

    const finish = (result: PollResult): PollResult => {
      logger.info('[JobPoller] Polling finished', {
        service: 'JobPoller',
        operation: 'run',
        jobId,
        status: result.job.status,
        checks: result.checks,
        error: result.error?.code,
      });
      this.observer.onFinish?.(result);
      return result;
    };

    const canceled = (): PollResult =>
      finish({ job, checks, error: new JobCanceledError(jobId, undefined, errorContext) });

    if (isTerminalStatus(job.status)) {
      return finish(this.terminalResult(job, checks, errorContext));
    }

    logger.info('[JobPoller] Polling job', {
      service: 'JobPoller',
      operation: 'run',
      jobId,
      intervalMs: policy.intervalMs,
      maxAttempts: policy.indefinite ? 'indefinite' : policy.maxAttempts,
    });

    for (;;) {
      if (signal?.aborted) {
        return canceled();
      }

      checks++;
      const result = await retry.executeWithResult(
        () => this.api.fetchStatus(jobId, { timeoutMs: policy.perCallTimeoutMs, ...(signal && { signal }) }),
        `fetchStatus ${jobId}`,
        signal
      );

      if (result.success) {
        const payload = result.value;
        job = await this.store.update(jobId, current => applyStatusPayload(current, payload, this.now()));
        lastTransient = undefined;
        this.observer.onCheck?.(job, checks);

        if (isTerminalStatus(job.status)) {
          return finish(this.terminalResult(job, checks, errorContext));
        }
      } else {
        if (signal?.aborted || result.error instanceof JobCanceledError) {
          return canceled();
        }

        const error = result.error instanceof ApplicationError
          ? result.error
          : new StageExecutionError(context.stage ?? 'poll', result.error.message, errorContext, result.error);
        error.context.jobId ??= jobId;

        if (!error.retryable) {
          logger.error('[JobPoller] Fatal error while polling', {
            service: 'JobPoller',
            operation: 'run',
            jobId,
            code: error.code,
            error: error.message,
          });
          return finish({ job, checks, error });
        }

        // Transient retries for this check are used up; the check still counts
        lastTransient = error;
        logger.warn('[JobPoller] Status check failed after retries', {
          service: 'JobPoller',
          operation: 'run',
          jobId,
          check: checks,
          error: error.message,
        });
      }

      if (!hasAttemptsLeft(policy, checks)) {
        return finish({
          job: { ...job, status: 'POLLING_TIMEOUT' },
          checks,
          error: new PollingTimeoutError(jobId, checks, job.status, errorContext, lastTransient),
        });
      }

      if (signal?.aborted) {
        return canceled();
      }

      this.observer.onWait?.(jobId, policy.intervalMs, checks);
      try {
        await this.sleep(policy.intervalMs, signal);
      } catch (sleepError) {
        if (signal?.aborted || sleepError instanceof JobCanceledError) {
          return canceled();
        }
        throw sleepError;
      }
    }
  }

  /**
   * One status check, persisted. Errors propagate to the caller.
   * Terminal jobs and local (non-video) jobs are returned as stored without
   * asking the rendering service.
   */
  async refresh(jobId: string, options: { timeoutMs?: number; signal?: AbortSignal } = {}): Promise<Job> {
    const stored = await this.ensureRecord(jobId, {});
    if (stored.kind !== 'VideoRender' || isTerminalStatus(stored.status)) {
      return stored;
    }

    const payload = await this.api.fetchStatus(jobId, options);
    const job = await this.store.update(jobId, current => applyStatusPayload(current, payload, this.now()));

    logger.info('[JobPoller] Job refreshed', {
      service: 'JobPoller',
      operation: 'refresh',
      jobId,
      status: job.status,
    });

    return job;
  }

  /**
   * Resume polling for several jobs with bounded concurrency. Results keep the input order.
   */
  async runMany(jobIds: string[], policy: PollPolicy, options: RunManyOptions = {}): Promise<PollResult[]> {
    return pMap(jobIds, jobId => this.run(jobId, policy, options.signal), {
      concurrency: options.concurrency ?? 1,
    });
  }

  /**
   * Jobs submitted elsewhere (or before a restart) may be unknown to the store
   */
  private async ensureRecord(jobId: string, context: ErrorContext): Promise<Job> {
    const { job, created } = await this.store.saveIfAbsent({
      id: jobId,
      kind: 'VideoRender',
      status: 'SUBMITTED',
      inputs: [],
      createdAt: this.now().toISOString(),
      attempts: 0,
      ...(context.itemId !== undefined && { itemId: context.itemId }),
      ...(context.stage !== undefined && { stage: context.stage }),
    });

    if (created) {
      logger.info('[JobPoller] Registered unknown job', {
        service: 'JobPoller',
        operation: 'ensureRecord',
        jobId,
      });
    }

    return job;
  }

  private terminalResult(job: Job, checks: number, context: ErrorContext): PollResult {
    if (isRemoteFailureStatus(job.status)) {
      return {
        job,
        checks,
        error: new RemoteJobFailure(job.id, job.status, job.error?.message, context),
      };
    }
    return { job, checks };
  }
}
