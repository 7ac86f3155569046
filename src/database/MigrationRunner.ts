import { DatabaseConnection, MigrationInterface } from '../types/database.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { logger } from '../middleware/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { renderJobsMigration } from './migrations/20261018_001_create_render_jobs.js';

interface MigrationRecord {
  version: string;
}

/**
 * Migration Runner
 *
 * Applies pending migrations in version order, each inside its own transaction,
 * and records them in the `migrations` table.
 */
export class MigrationRunner {
  private db: DatabaseConnection;
  private migrations: MigrationInterface[];

  constructor(db: DatabaseConnection, migrations: MigrationInterface[] = [renderJobsMigration]) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version.localeCompare(b.version));
  }

  async ensureMigrationTable(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS migrations (
        version VARCHAR(255) PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        executed_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async getExecutedMigrations(): Promise<string[]> {
    const results = await this.db.query<MigrationRecord>(
      'SELECT version FROM migrations ORDER BY version'
    );
    return results.map(row => row.version);
  }

  async migrate(): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    for (const migration of this.migrations) {
      if (executedMigrations.includes(migration.version)) {
        continue;
      }

      logger.info(`Running migration: ${migration.version} - ${migration.name}`);

      try {
        await this.db.beginTransaction();
        await migration.up(this.db);
        await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [
          migration.version,
          migration.name,
        ]);
        await this.db.commit();

        logger.info(`Migration completed: ${migration.version}`);
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(
          `Migration failed: ${migration.version} - ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'migrate', metadata: { version: migration.version } },
          error instanceof Error ? error : undefined
        );
      }
    }
  }
}
