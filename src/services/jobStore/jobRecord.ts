import { Job } from '../../types/jobs.js';
import { StoredJob, storedJobSchema } from '../../validation/jobSchemas.js';
import { SchemaValidationError } from '../../errors/index.js';

/**
 * Persistent shape of a job: `{ id, created_at, last_checked, status, data, ... }`.
 * Both store backends write this shape (the SQLite backend spreads it over columns).
 */
export function jobToRecord(job: Job): StoredJob {
  return {
    id: job.id,
    kind: job.kind,
    status: job.status,
    inputs: job.inputs,
    ...(job.remoteOutputUrl !== undefined && { remote_output_url: job.remoteOutputUrl }),
    ...(job.rehostedUrl !== undefined && { rehosted_url: job.rehostedUrl }),
    ...(job.error !== undefined && { error: job.error }),
    attempts: job.attempts,
    ...(job.itemId !== undefined && { item_id: job.itemId }),
    ...(job.stage !== undefined && { stage: job.stage }),
    ...(job.data !== undefined && { data: job.data }),
    created_at: job.createdAt,
    ...(job.lastCheckedAt !== undefined && { last_checked: job.lastCheckedAt }),
  };
}

export function jobFromRecord(record: StoredJob): Job {
  return {
    id: record.id,
    kind: record.kind,
    status: record.status,
    inputs: record.inputs,
    ...(record.remote_output_url !== undefined && { remoteOutputUrl: record.remote_output_url }),
    ...(record.rehosted_url !== undefined && { rehostedUrl: record.rehosted_url }),
    ...(record.error !== undefined && { error: record.error }),
    attempts: record.attempts,
    ...(record.item_id !== undefined && { itemId: record.item_id }),
    ...(record.stage !== undefined && { stage: record.stage }),
    ...(record.data !== undefined && { data: record.data }),
    createdAt: record.created_at,
    ...(record.last_checked !== undefined && { lastCheckedAt: record.last_checked }),
  };
}

/**
 * Validate an untrusted value (a parsed file or database row) as a job record
 */
export function parseJobRecord(value: unknown, source: string): Job {
  const result = storedJobSchema.safeParse(value);
  if (!result.success) {
    throw new SchemaValidationError(
      result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      `Invalid job record in ${source}`,
      { service: 'JobRecordStore', operation: 'parseJobRecord' }
    );
  }
  return jobFromRecord(result.data);
}
