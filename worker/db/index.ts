export * from './schema';
export { openSqliteStore, SqliteStore } from './sqlite';
export type { DataStore, SqliteDb } from './sqlite';
