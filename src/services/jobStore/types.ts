import { Job, JobFilters } from '../../types/jobs.js';

/**
 * Produces the next state of a job from its current state.
 * Must not mutate its argument.
 */
export type JobMutator = (current: Job) => Job;

/**
 * Durable mapping from job id to Job.
 *
 * Implementations enforce status monotonicity: a job stored in a terminal
 * state keeps that status forever, and POLLING_TIMEOUT is never written.
 */
export interface JobRecordStore {
  /**
   * Prepare the backing storage (create directories, run migrations)
   */
  initialize(): Promise<void>;

  /**
   * Insert or replace a job record
   */
  save(job: Job): Promise<Job>;

  /**
   * Insert the job unless its id is already stored, in which case the stored
   * record is returned untouched. Check and insert run under the id's lock.
   */
  saveIfAbsent(job: Job): Promise<{ job: Job; created: boolean }>;

  /**
   * @throws JobNotFoundError when no record exists for the id
   */
  load(id: string): Promise<Job>;

  /**
   * Like load, but resolves undefined for unknown ids
   */
  find(id: string): Promise<Job | undefined>;

  /**
   * Atomic read-modify-write for one id. Concurrent updates of the same id
   * are serialized; updates of different ids proceed independently.
   *
   * @throws JobNotFoundError when no record exists for the id
   */
  update(id: string, mutator: JobMutator): Promise<Job>;

  /**
   * Newest first
   */
  list(filters?: JobFilters): Promise<Job[]>;

  close(): Promise<void>;
}
