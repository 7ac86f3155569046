import { DatabaseConnection, SqlParam } from '../../types/database.js';
import { Job, JobFilters } from '../../types/jobs.js';
import { JobMutator, JobRecordStore } from './types.js';
import { guardJobTransition } from './statusGuard.js';
import { jobToRecord, parseJobRecord } from './jobRecord.js';
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { MigrationRunner } from '../../database/MigrationRunner.js';
import { JobNotFoundError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';

interface RenderJobRow {
  id: string;
  kind: string;
  status: string;
  inputs: string;
  remote_output_url: string | null;
  rehosted_url: string | null;
  error: string | null;
  attempts: number;
  item_id: string | null;
  stage: string | null;
  data: string | null;
  created_at: string;
  last_checked: string | null;
}

function parseJsonColumn(value: string | null): unknown {
  return value === null ? undefined : JSON.parse(value);
}

/**
 * SQLite-backed job record store (table `render_jobs`)
 */
export class SQLiteJobRecordStore implements JobRecordStore {
  private readonly locks = new KeyedMutex();

  constructor(private readonly db: DatabaseConnection) {}

  async initialize(): Promise<void> {
    await new MigrationRunner(this.db).migrate();
  }

  async save(job: Job): Promise<Job> {
    return this.locks.runExclusive(job.id, async () => {
      const existing = await this.selectById(job.id);
      const next = guardJobTransition(existing, job);
      await this.write(next);

      logger.debug('[SQLiteJobRecordStore] Job saved', {
        service: 'SQLiteJobRecordStore',
        operation: 'save',
        jobId: next.id,
        status: next.status,
        created: existing === undefined,
      });

      return next;
    });
  }

  async saveIfAbsent(job: Job): Promise<{ job: Job; created: boolean }> {
    return this.locks.runExclusive(job.id, async () => {
      const existing = await this.selectById(job.id);
      if (existing) {
        return { job: existing, created: false };
      }

      const next = guardJobTransition(undefined, job);
      await this.write(next);
      return { job: next, created: true };
    });
  }

  async load(id: string): Promise<Job> {
    const job = await this.selectById(id);
    if (!job) {
      throw new JobNotFoundError(id, { service: 'SQLiteJobRecordStore', operation: 'load' });
    }
    return job;
  }

  async find(id: string): Promise<Job | undefined> {
    return this.selectById(id);
  }

  async update(id: string, mutator: JobMutator): Promise<Job> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.selectById(id);
      if (!current) {
        throw new JobNotFoundError(id, { service: 'SQLiteJobRecordStore', operation: 'update' });
      }

      const next = guardJobTransition(current, mutator({ ...current }));
      await this.write(next);

      logger.debug('[SQLiteJobRecordStore] Job updated', {
        service: 'SQLiteJobRecordStore',
        operation: 'update',
        jobId: id,
        previousStatus: current.status,
        status: next.status,
        attempts: next.attempts,
      });

      return next;
    });
  }

  async list(filters?: JobFilters): Promise<Job[]> {
    const conditions: string[] = [];
    const params: SqlParam[] = [];

    if (filters?.status) {
      conditions.push('status = ?');
      params.push(filters.status);
    }
    if (filters?.kind) {
      conditions.push('kind = ?');
      params.push(filters.kind);
    }
    if (filters?.itemId) {
      conditions.push('item_id = ?');
      params.push(filters.itemId);
    }

    let sql = 'SELECT * FROM render_jobs';
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    sql += ' ORDER BY created_at DESC, rowid DESC';
    if (filters?.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(filters.limit);
    }

    const rows = await this.db.query<RenderJobRow>(sql, params);
    return rows.map(row => this.mapRow(row));
  }

  async close(): Promise<void> {
    // The connection belongs to DatabaseManager, which closes it on shutdown
    await this.locks.idle();
  }

  private async selectById(id: string): Promise<Job | undefined> {
    const row = await this.db.get<RenderJobRow>('SELECT * FROM render_jobs WHERE id = ?', [id]);
    return row ? this.mapRow(row) : undefined;
  }

  private async write(job: Job): Promise<void> {
    const record = jobToRecord(job);

    await this.db.execute(
      `INSERT INTO render_jobs (
        id, kind, status, inputs, remote_output_url, rehosted_url, error,
        attempts, item_id, stage, data, created_at, last_checked
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        kind = excluded.kind,
        status = excluded.status,
        inputs = excluded.inputs,
        remote_output_url = excluded.remote_output_url,
        rehosted_url = excluded.rehosted_url,
        error = excluded.error,
        attempts = excluded.attempts,
        item_id = excluded.item_id,
        stage = excluded.stage,
        data = excluded.data,
        last_checked = excluded.last_checked`,
      [
        record.id,
        record.kind,
        record.status,
        JSON.stringify(record.inputs),
        record.remote_output_url ?? null,
        record.rehosted_url ?? null,
        record.error ? JSON.stringify(record.error) : null,
        record.attempts,
        record.item_id ?? null,
        record.stage ?? null,
        record.data === undefined ? null : JSON.stringify(record.data),
        record.created_at,
        record.last_checked ?? null,
      ]
    );
  }

  private mapRow(row: RenderJobRow): Job {
    return parseJobRecord(
      {
        id: row.id,
        kind: row.kind,
        status: row.status,
        inputs: parseJsonColumn(row.inputs),
        remote_output_url: row.remote_output_url ?? undefined,
        rehosted_url: row.rehosted_url ?? undefined,
        error: parseJsonColumn(row.error),
        attempts: row.attempts,
        item_id: row.item_id ?? undefined,
        stage: row.stage ?? undefined,
        data: parseJsonColumn(row.data),
        created_at: row.created_at,
        last_checked: row.last_checked ?? undefined,
      },
      `render_jobs row ${row.id}`
    );
  }
}
