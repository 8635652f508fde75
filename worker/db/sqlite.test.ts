import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { toGenerationLogRow, toOrganizationRow, toTeamRow, toUserRow } from '../services/serializers';
import { openSqliteStore } from './sqlite';
import type { SqliteStore } from './sqlite';

const CREATED = Date.UTC(2025, 0, 1);

const organization = toOrganizationRow({
  id: 'org-1',
  name: 'Test Org',
  domain: 'example.test',
  isOrganization: true,
  createdAt: CREATED,
});

const userRow = (index: number, email = `user${index}@example.test`) =>
  toUserRow({
    id: `user-${index}`,
    organizationId: 'org-1',
    email,
    firstName: 'Test',
    lastName: `User${index}`,
    role: 'member',
    jobTitle: 'Engineer',
    department: 'Engineering',
    isActive: true,
    createdAt: CREATED,
    lastActiveAt: CREATED,
  });

describe('SqliteStore', () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = openSqliteStore(':memory:');
    await store.bulkInsert('organizations', [organization]);
  });

  afterEach(async () => {
    await store.close();
  });

  it('writes batches larger than one chunk', async () => {
    await store.bulkInsert(
      'users',
      Array.from({ length: 1203 }, (_, index) => userRow(index))
    );
    expect(await store.count('users')).toBe(1203);
  });

  it('ignores empty batches', async () => {
    await store.bulkInsert('users', []);
    expect(await store.count('users')).toBe(0);
  });

  it('maps fields to snake_case columns', async () => {
    await store.bulkInsert('users', [userRow(1)]);
    const rows = await store.query('select email, is_active, created_at from users where id = ?', ['user-1']);
    expect(rows).toEqual([{ email: 'user1@example.test', is_active: 1, created_at: '2025-01-01T00:00:00.000Z' }]);
  });

  it('enforces foreign keys', async () => {
    const orphan = toTeamRow({
      id: 'team-1',
      organizationId: 'org-missing',
      name: 'Engineering',
      description: null,
      department: 'Engineering',
      createdAt: CREATED,
    });
    await expect(store.bulkInsert('teams', [orphan])).rejects.toThrow('FOREIGN KEY constraint failed');
  });

  it('rolls back the whole batch when one row fails', async () => {
    const rows = Array.from({ length: 600 }, (_, index) => userRow(index));
    rows.push(userRow(600, 'user0@example.test'));
    await expect(store.bulkInsert('users', rows)).rejects.toThrow('UNIQUE constraint failed');
    expect(await store.count('users')).toBe(0);
  });

  it('runs write statements through query', async () => {
    await store.bulkInsert('users', [userRow(1), userRow(2)]);
    await expect(store.query('delete from users where id = ?', ['user-2'])).resolves.toEqual([]);
    expect(await store.count('users')).toBe(1);
  });

  it('stores log payloads as JSON text', async () => {
    await store.bulkInsert('generation_logs', [
      toGenerationLogRow({ id: 'log-1', kind: 'stage_complete', payload: { stage: 'teams', count: 3 }, createdAt: CREATED }),
    ]);
    await expect(store.query('select kind, payload from generation_logs')).resolves.toEqual([
      { kind: 'stage_complete', payload: '{"stage":"teams","count":3}' },
    ]);
  });
});
