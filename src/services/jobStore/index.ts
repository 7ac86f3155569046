import { JobStoreConfig } from '../../config/types.js';
import { DatabaseConnection } from '../../types/database.js';
import { FileJobRecordStore } from './FileJobRecordStore.js';
import { SQLiteJobRecordStore } from './SQLiteJobRecordStore.js';
import { JobRecordStore } from './types.js';

export type { JobRecordStore, JobMutator } from './types.js';
export { FileJobRecordStore } from './FileJobRecordStore.js';
export { SQLiteJobRecordStore } from './SQLiteJobRecordStore.js';

/**
 * Pick the store backend from configuration. The SQLite backend needs an open connection.
 */
export function createJobRecordStore(
  config: JobStoreConfig,
  getConnection: () => DatabaseConnection
): JobRecordStore {
  return config.backend === 'file'
    ? new FileJobRecordStore(config.directory)
    : new SQLiteJobRecordStore(getConnection());
}
