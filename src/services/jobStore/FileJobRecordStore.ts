import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { Job, JobFilters } from '../../types/jobs.js';
import { JobMutator, JobRecordStore } from './types.js';
import { guardJobTransition } from './statusGuard.js';
import { jobToRecord, parseJobRecord } from './jobRecord.js';
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { ErrorCode, FileSystemError, JobNotFoundError } from '../../errors/index.js';
import { getErrorCode, getErrorMessage } from '../../utils/errorHandling.js';
import { logger } from '../../middleware/logging.js';

/**
 * File-backed job record store: one `<id>.json` file per job in a directory.
 * Writes go to a temporary file first and are renamed into place.
 */
export class FileJobRecordStore implements JobRecordStore {
  private readonly locks = new KeyedMutex();

  constructor(private readonly directory: string) {}

  async initialize(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    logger.info('[FileJobRecordStore] Job directory ready', {
      service: 'FileJobRecordStore',
      operation: 'initialize',
      directory: this.directory,
    });
  }

  async save(job: Job): Promise<Job> {
    return this.locks.runExclusive(job.id, async () => {
      const existing = await this.read(job.id);
      const next = guardJobTransition(existing, job);
      await this.write(next);
      return next;
    });
  }

  async saveIfAbsent(job: Job): Promise<{ job: Job; created: boolean }> {
    return this.locks.runExclusive(job.id, async () => {
      const existing = await this.read(job.id);
      if (existing) {
        return { job: existing, created: false };
      }

      const next = guardJobTransition(undefined, job);
      await this.write(next);
      return { job: next, created: true };
    });
  }

  async load(id: string): Promise<Job> {
    const job = await this.read(id);
    if (!job) {
      throw new JobNotFoundError(id, { service: 'FileJobRecordStore', operation: 'load' });
    }
    return job;
  }

  async find(id: string): Promise<Job | undefined> {
    return this.read(id);
  }

  async update(id: string, mutator: JobMutator): Promise<Job> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.read(id);
      if (!current) {
        throw new JobNotFoundError(id, { service: 'FileJobRecordStore', operation: 'update' });
      }

      const next = guardJobTransition(current, mutator({ ...current }));
      await this.write(next);
      return next;
    });
  }

  async list(filters?: JobFilters): Promise<Job[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return [];
      }
      throw this.fsError('list', this.directory, error, ErrorCode.FS_READ_FAILED);
    }

    const jobs: Job[] = [];
    for (const entry of entries.filter(name => name.endsWith('.json'))) {
      const filePath = path.join(this.directory, entry);
      try {
        jobs.push(parseJobRecord(JSON.parse(await fs.readFile(filePath, 'utf8')), filePath));
      } catch (error) {
        logger.warn('[FileJobRecordStore] Skipping unreadable job file', {
          service: 'FileJobRecordStore',
          operation: 'list',
          file: filePath,
          error: getErrorMessage(error),
        });
      }
    }

    const filtered = jobs
      .filter(job => !filters?.status || job.status === filters.status)
      .filter(job => !filters?.kind || job.kind === filters.kind)
      .filter(job => !filters?.itemId || job.itemId === filters.itemId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));

    return filters?.limit !== undefined ? filtered.slice(0, filters.limit) : filtered;
  }

  async close(): Promise<void> {
    await this.locks.idle();
  }

  /**
   * Job ids come from a remote service. The name is a reversible percent
   * encoding of the id that leaves only [A-Za-z0-9_%-], so distinct ids get
   * distinct files and none can escape the directory.
   */
  private filePath(id: string): string {
    const encoded = encodeURIComponent(id).replace(
      /[!'()*.~]/g,
      char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
    );
    return path.join(this.directory, `${encoded}.json`);
  }

  private async read(id: string): Promise<Job | undefined> {
    const filePath = this.filePath(id);
    let contents: string;
    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw this.fsError('read', filePath, error, ErrorCode.FS_READ_FAILED);
    }
    const job = parseJobRecord(JSON.parse(contents), filePath);
    // Case-insensitive filesystems can still fold two ids onto one file
    if (job.id !== id) {
      throw new FileSystemError(
        `Job file ${filePath} holds job ${job.id}, not ${id}`,
        ErrorCode.FS_READ_FAILED,
        filePath,
        false,
        { service: 'FileJobRecordStore', operation: 'read', jobId: id }
      );
    }
    return job;
  }

  private async write(job: Job): Promise<void> {
    const filePath = this.filePath(job.id);
    const tempPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(jobToRecord(job), null, 2), 'utf8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw this.fsError('write', filePath, error, ErrorCode.FS_WRITE_FAILED);
    }
  }

  private fsError(operation: string, filePath: string, error: unknown, code: ErrorCode): FileSystemError {
    return new FileSystemError(
      `Job store ${operation} failed for ${filePath}: ${getErrorMessage(error)}`,
      code,
      filePath,
      false,
      { service: 'FileJobRecordStore', operation },
      error instanceof Error ? error : undefined
    );
  }
}
