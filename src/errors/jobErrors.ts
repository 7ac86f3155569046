import {
  ApplicationError,
  ErrorCode,
  ErrorContext,
  OperationalError,
  ResourceNotFoundError,
} from './ApplicationError.js';

/**
 * Errors raised while driving remote render jobs through their lifecycle.
 * Each one carries the job id and stage name in its context.
 */

export class JobNotFoundError extends ResourceNotFoundError {
  constructor(jobId: string, context?: ErrorContext, cause?: Error) {
    super('job', jobId, `Job not found: ${jobId}`, { ...context, jobId }, cause);
  }
}

/**
 * The remote service reported a failure terminal state (FAILED, REJECTED, CANCELED, TIMED_OUT).
 */
export class RemoteJobFailure extends OperationalError {
  constructor(
    jobId: string,
    public readonly remoteStatus: string,
    public readonly remoteMessage?: string,
    context?: ErrorContext
  ) {
    super(
      `Remote job ${jobId} ended with status ${remoteStatus}${remoteMessage ? `: ${remoteMessage}` : ''}`,
      ErrorCode.JOB_REMOTE_FAILED,
      502,
      false,
      {
        ...context,
        jobId,
        metadata: { ...context?.metadata, remoteStatus, remoteMessage },
      }
    );
  }
}

/**
 * The local polling budget ran out before the job reached a terminal state.
 * The job may still finish remotely and can be polled again by id.
 */
export class PollingTimeoutError extends OperationalError {
  constructor(
    jobId: string,
    public readonly attempts: number,
    public readonly lastStatus: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      `Stopped polling job ${jobId} after ${attempts} attempt(s); last status ${lastStatus}`,
      ErrorCode.JOB_POLLING_TIMEOUT,
      504,
      true,
      {
        ...context,
        jobId,
        metadata: { ...context?.metadata, attempts, lastStatus },
      },
      cause
    );
  }
}

export class JobCanceledError extends OperationalError {
  constructor(jobId: string | undefined, message?: string, context?: ErrorContext) {
    super(
      message || (jobId ? `Polling of job ${jobId} was canceled` : 'Operation was canceled'),
      ErrorCode.JOB_CANCELED,
      499,
      false,
      { ...context, ...(jobId !== undefined && { jobId }) }
    );
  }
}

export class RehostFailure extends OperationalError {
  constructor(
    public readonly remoteUrl: string,
    message: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      ErrorCode.JOB_REHOST_FAILED,
      502,
      false,
      { ...context, metadata: { ...context?.metadata, remoteUrl } },
      cause
    );
  }
}

/**
 * Wraps a non-application error thrown by a stage so the item result still
 * names the stage, item and job.
 */
export class StageExecutionError extends OperationalError {
  constructor(stage: string, message: string, context?: ErrorContext, cause?: Error) {
    super(
      message,
      ErrorCode.PIPELINE_STAGE_FAILED,
      500,
      false,
      { ...context, stage },
      cause
    );
  }
}

/**
 * Returns the error as an ApplicationError tagged with the stage (and job and
 * item, when known). Context fields already set on the error are kept.
 */
export function toApplicationError(
  error: unknown,
  stage: string,
  context?: ErrorContext
): ApplicationError {
  if (error instanceof ApplicationError) {
    error.context.stage ??= stage;
    if (context?.jobId !== undefined) {
      error.context.jobId ??= context.jobId;
    }
    if (context?.itemId !== undefined) {
      error.context.itemId ??= context.itemId;
    }
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);
  return new StageExecutionError(stage, message, context, cause);
}
