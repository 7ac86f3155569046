import { MigrationInterface } from '../../types/database.js';
import { logger } from '../../middleware/logging.js';

/**
 * Migration: Create render_jobs table
 *
 * One row per remote render job. `data` keeps the last raw status payload,
 * `inputs` and `error` are JSON columns.
 */
export const renderJobsMigration: MigrationInterface = {
  version: '20261018_001',
  name: 'create_render_jobs',

  up: async (db) => {
    await db.execute(`
      CREATE TABLE IF NOT EXISTS render_jobs (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL CHECK (kind IN ('AudioRender', 'VideoRender')),
        status TEXT NOT NULL,
        inputs TEXT NOT NULL DEFAULT '[]',
        remote_output_url TEXT,
        rehosted_url TEXT,
        error TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        item_id TEXT,
        stage TEXT,
        data TEXT,
        created_at TEXT NOT NULL,
        last_checked TEXT
      )
    `);

    logger.info('Created table: render_jobs');

    await db.execute(`
      CREATE INDEX IF NOT EXISTS idx_render_jobs_status
      ON render_jobs(status, created_at DESC)
    `);

    await db.execute(`
      CREATE INDEX IF NOT EXISTS idx_render_jobs_item
      ON render_jobs(item_id)
    `);
  },

  down: async (db) => {
    await db.execute('DROP INDEX IF EXISTS idx_render_jobs_item');
    await db.execute('DROP INDEX IF EXISTS idx_render_jobs_status');
    await db.execute('DROP TABLE IF EXISTS render_jobs');
  },
};
