/**
 * Record Store selection and SQLite connection setup.
 * SQLite when a database path is configured, in-memory otherwise.
 */
import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from '@/observability/logger.js';
import { createMemoryRecordStore } from './record-store/memory-record-store.js';
import { createSqliteRecordStore } from './record-store/sqlite-record-store.js';
import type { RecordStore } from './record-store/types.js';

export interface RecordStoreOptions {
  /** SQLite file path, or `:memory:`. Omit for the in-memory store. */
  dbPath?: string;
  logger: Logger;
}

/** Open a better-sqlite3 database, creating the parent directory of a file path. */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  return db;
}

export function openRecordStore(options: RecordStoreOptions): RecordStore {
  const { dbPath, logger } = options;
  if (!dbPath) {
    logger.info('Using in-memory record store', { component: 'database' });
    return createMemoryRecordStore();
  }

  const store = createSqliteRecordStore(openDatabase(dbPath));
  logger.info('Opened SQLite record store', { component: 'database', dbPath });
  return store;
}
