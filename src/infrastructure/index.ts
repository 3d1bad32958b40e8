// Record Store implementations and selection
export type { RecordStore } from './record-store/types.js';
export { createMemoryRecordStore } from './record-store/memory-record-store.js';
export type { MemoryRecordStoreSeed } from './record-store/memory-record-store.js';
export { createSqliteRecordStore, initRecordStoreDb } from './record-store/sqlite-record-store.js';
export { openDatabase, openRecordStore } from './database.js';
export type { RecordStoreOptions } from './database.js';
