/**
 * Render job types
 *
 * A Job mirrors one unit of work on a remote rendering service. Its id is
 * assigned by the remote side at submission (audio renders, which complete
 * synchronously, get a locally generated id).
 */

export const JOB_STATUSES = [
  'SUBMITTED',
  'PENDING',
  'PROCESSING',
  'COMPLETED',
  'FAILED',
  'REJECTED',
  'CANCELED',
  'TIMED_OUT',
  'POLLING_TIMEOUT',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/**
 * Terminal states reported by the remote service. Once stored, a job in one
 * of these states never changes status again.
 */
export type TerminalJobStatus = 'COMPLETED' | 'FAILED' | 'REJECTED' | 'CANCELED' | 'TIMED_OUT';

export type RemoteFailureStatus = Exclude<TerminalJobStatus, 'COMPLETED'>;

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'COMPLETED',
  'FAILED',
  'REJECTED',
  'CANCELED',
  'TIMED_OUT',
]);

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return TERMINAL_STATUSES.has(status);
}

export function isRemoteFailureStatus(status: JobStatus): status is RemoteFailureStatus {
  return isTerminalStatus(status) && status !== 'COMPLETED';
}

export const JOB_KINDS = ['AudioRender', 'VideoRender'] as const;

export type JobKind = (typeof JOB_KINDS)[number];

export interface JobInput {
  type: 'video' | 'audio' | 'image' | 'text';
  url: string;
  contentType?: string;
}

export interface JobErrorInfo {
  kind: string;
  message: string;
}

export interface Job {
  id: string;
  kind: JobKind;
  status: JobStatus;
  inputs: JobInput[];
  remoteOutputUrl?: string;
  rehostedUrl?: string;
  error?: JobErrorInfo;
  createdAt: string;
  lastCheckedAt?: string;
  /** Number of status checks persisted for this job */
  attempts: number;
  itemId?: string;
  stage?: string;
  /** Last raw status payload returned by the remote service */
  data?: unknown;
}

export interface JobFilters {
  status?: JobStatus;
  kind?: JobKind;
  itemId?: string;
  limit?: number;
}

/**
 * Best URL for a finished job: the rehosted copy when available.
 */
export function resolveOutputUrl(job: Job): string | undefined {
  return job.rehostedUrl ?? job.remoteOutputUrl;
}
