import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseConfig, DatabaseConnection, SqlParam } from '../../types/database.js';
import {
  DatabaseError,
  DuplicateKeyError,
  FileSystemError,
  ErrorCode,
} from '../../errors/index.js';

export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const dbPath = this.config.filename;

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (err) {
        throw new FileSystemError(
          `Failed to create database directory: ${dir}`,
          ErrorCode.FS_PERMISSION_DENIED,
          dir,
          false,
          { service: 'SqliteConnection', operation: 'connect' },
          err instanceof Error ? err : undefined
        );
      }
    }

    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to connect to SQLite database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            true,
            {
              service: 'SqliteConnection',
              operation: 'connect',
              metadata: { dbPath },
            },
            err
          ));
        } else {
          resolve(handle);
        }
      });
    });

    this.db = db;
    await this.execute('PRAGMA foreign_keys = ON');
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows);
        }
      });
    });
  }

  async get<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row);
        }
      });
    });
  }

  async execute(
    sql: string,
    params: SqlParam[] = []
  ): Promise<{ affectedRows: number; insertId?: number }> {
    const db = this.requireDb('execute');

    return new Promise((resolve, reject) => {
      const self = this;
      db.run(sql, params, function (err) {
        if (err) {
          reject(self.convertDatabaseError(err, sql, 'execute'));
        } else {
          // 'this' is the statement context, providing changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to close database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            false,
            { service: 'SqliteConnection', operation: 'close' },
            err
          ));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  async beginTransaction(): Promise<void> {
    await this.execute('BEGIN TRANSACTION');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  private requireDb(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  /**
   * Convert SQLite errors to ApplicationError types
   */
  private convertDatabaseError(
    error: Error,
    sql: string,
    operation: string
  ): Error {
    const errorMessage = error.message.toLowerCase();
    const context = {
      service: 'SqliteConnection',
      operation,
      metadata: { sql, sqliteError: error.message },
    };

    if (errorMessage.includes('unique constraint')) {
      const match = error.message.match(/unique constraint failed: (\w+)\.(\w+)/i);
      return new DuplicateKeyError(
        match?.[1] ?? 'unknown',
        match?.[2] ?? 'unknown',
        error.message,
        context
      );
    }

    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      true,
      context,
      error
    );
  }
}
