import Database from 'better-sqlite3';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync, readFileSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema';
import { collections } from './schema';
import type { CollectionName, CollectionRow } from './schema';

export type SqliteDb = BetterSQLite3Database<typeof schema>;

/** Bulk-write snapshot store keyed by collection name. */
export interface DataStore {
  bulkInsert<K extends CollectionName>(collection: K, rows: CollectionRow<K>[]): Promise<void>;
  count(collection: CollectionName): Promise<number>;
  query(statement: string, params?: unknown[]): Promise<Record<string, unknown>[]>;
  close(): Promise<void>;
}

const INSERT_CHUNK_SIZE = 500;
const IN_MEMORY = ':memory:';

type Insertors = { [K in CollectionName]: (rows: CollectionRow<K>[]) => void };

const buildInsertors = (db: SqliteDb): Insertors => ({
  organizations: (rows) => db.insert(schema.organizations).values(rows).run(),
  teams: (rows) => db.insert(schema.teams).values(rows).run(),
  users: (rows) => db.insert(schema.users).values(rows).run(),
  team_memberships: (rows) => db.insert(schema.teamMemberships).values(rows).run(),
  projects: (rows) => db.insert(schema.projects).values(rows).run(),
  project_memberships: (rows) => db.insert(schema.projectMemberships).values(rows).run(),
  sections: (rows) => db.insert(schema.sections).values(rows).run(),
  tasks: (rows) => db.insert(schema.tasks).values(rows).run(),
  comments: (rows) => db.insert(schema.comments).values(rows).run(),
  custom_field_definitions: (rows) => db.insert(schema.customFieldDefinitions).values(rows).run(),
  custom_field_enum_options: (rows) => db.insert(schema.customFieldEnumOptions).values(rows).run(),
  custom_field_values: (rows) => db.insert(schema.customFieldValues).values(rows).run(),
  tags: (rows) => db.insert(schema.tags).values(rows).run(),
  task_tags: (rows) => db.insert(schema.taskTags).values(rows).run(),
  attachments: (rows) => db.insert(schema.attachments).values(rows).run(),
  generation_logs: (rows) => db.insert(schema.generationLogs).values(rows).run(),
});

export class SqliteStore implements DataStore {
  readonly db: SqliteDb;
  private readonly insertors: Insertors;

  constructor(private readonly sqlite: Database.Database) {
    this.db = drizzle(sqlite, { schema });
    this.insertors = buildInsertors(this.db);
  }

  async bulkInsert<K extends CollectionName>(collection: K, rows: CollectionRow<K>[]) {
    if (rows.length === 0) return;
    const insert = this.insertors[collection];
    const writeAll = this.sqlite.transaction(() => {
      for (let offset = 0; offset < rows.length; offset += INSERT_CHUNK_SIZE) {
        insert(rows.slice(offset, offset + INSERT_CHUNK_SIZE));
      }
    });
    writeAll();
  }

  async count(collection: CollectionName) {
    const row = this.db.get<{ count: number }>(sql`select count(*) as count from ${collections[collection]}`);
    return row.count;
  }

  async query(statement: string, params: unknown[] = []) {
    const prepared = this.sqlite.prepare<unknown[], Record<string, unknown>>(statement);
    if (!prepared.reader) {
      prepared.run(...params);
      return [];
    }
    return prepared.all(...params);
  }

  async close() {
    if (this.sqlite.open) this.sqlite.close();
  }
}

const schemaSql = () => readFileSync(new URL('./schema.sql', import.meta.url), 'utf8');

/**
 * Opens a fresh store: any file already at `path` is removed first, so every
 * run starts empty. Pass `:memory:` for a throwaway database.
 */
export const openSqliteStore = (path: string) => {
  if (path !== IN_MEMORY) {
    rmSync(path, { force: true });
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(schemaSql());
  return new SqliteStore(sqlite);
};
