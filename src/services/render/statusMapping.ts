import { JobStatus } from '../../types/jobs.js';

const REMOTE_STATUS_MAP: Readonly<Record<string, JobStatus>> = {
  SUBMITTED: 'SUBMITTED',
  PENDING: 'PENDING',
  QUEUED: 'PENDING',
  PROCESSING: 'PROCESSING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  REJECTED: 'REJECTED',
  CANCELED: 'CANCELED',
  CANCELLED: 'CANCELED',
  TIMED_OUT: 'TIMED_OUT',
};

/**
 * Map a status string from the rendering service onto JobStatus.
 * Matching ignores case; anything unrecognized counts as still PROCESSING.
 */
export function mapRemoteStatus(rawStatus: string): JobStatus {
  return REMOTE_STATUS_MAP[rawStatus.trim().toUpperCase()] ?? 'PROCESSING';
}
