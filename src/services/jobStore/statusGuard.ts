import { Job, isTerminalStatus } from '../../types/jobs.js';
import { logger } from '../../middleware/logging.js';

/**
 * Merge a proposed job state onto the stored one while keeping the
 * record invariants:
 * - id and createdAt never change
 * - a terminal status (and the outcome fields that came with it) is final
 * - POLLING_TIMEOUT is a caller-side verdict and is never stored
 */
export function guardJobTransition(previous: Job | undefined, proposed: Job): Job {
  let next: Job = { ...proposed };

  if (next.status === 'POLLING_TIMEOUT') {
    next.status = previous ? previous.status : 'SUBMITTED';
  }

  if (!previous) {
    return next;
  }

  next.id = previous.id;
  next.createdAt = previous.createdAt;

  if (isTerminalStatus(previous.status) && next.status !== previous.status) {
    logger.warn('[JobRecordStore] Ignoring status change of terminal job', {
      service: 'JobRecordStore',
      operation: 'guardJobTransition',
      jobId: previous.id,
      storedStatus: previous.status,
      proposedStatus: proposed.status,
    });

    next = {
      ...next,
      status: previous.status,
    };
    if (previous.remoteOutputUrl !== undefined) {
      next.remoteOutputUrl = previous.remoteOutputUrl;
    } else {
      delete next.remoteOutputUrl;
    }
    if (previous.error !== undefined) {
      next.error = previous.error;
    } else {
      delete next.error;
    }
  }

  return next;
}
