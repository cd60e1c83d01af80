import { logger } from '../middleware/logger.js';
import type { AppConfig } from '../utils/config.js';
import { createMemoryStore } from './memory-store.js';
import { createPostgresStore } from './postgres-store.js';
import { createSqliteStore } from './sqlite-store.js';
import type { RecordStore } from './record-store.js';

export type StoreOptions = Pick<AppConfig, 'STORE_DIALECT' | 'SQLITE_PATH' | 'DATABASE_URL'>;

export async function createRecordStore(options: StoreOptions): Promise<RecordStore> {
  switch (options.STORE_DIALECT) {
    case 'memory':
      logger.warn('Using in-memory record store; data is lost on exit');
      return createMemoryStore();
    case 'sqlite':
      return createSqliteStore(options.SQLITE_PATH);
    case 'postgres':
      if (!options.DATABASE_URL) {
        throw new Error('DATABASE_URL is required for the postgres store');
      }
      return createPostgresStore(options.DATABASE_URL);
  }
}

export { COLLECTIONS, joinPath } from './paths.js';
export type { RecordStore, StoreValue, StoreRecord, Unsubscribe } from './record-store.js';
