/**
 * Property-based tests for User Repository
 * Property 3: The latest sync of a (device, uid) supersedes earlier ones
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import * as fc from 'fast-check';
import {
  initTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  testExecute,
  testSelect,
  countRows,
} from '../test-utils/index.js';
import { getUser, getUserCount, listUsers, upsertUsers } from './user.repository.js';
import type { PersistedUserRow, UserRow } from '../../types/index.js';

initTestDatabase();

function user(overrides: Partial<PersistedUserRow> = {}): PersistedUserRow {
  return {
    deviceIp: '10.0.0.5',
    uid: 1,
    userId: '1001',
    name: 'Alice',
    privilege: 'Default',
    password: '',
    groupId: '1',
    card: 0,
    ...overrides,
  };
}

describe('User Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  describe('Property 3: Supersede on re-sync', () => {
    it('keeps one row per (device, uid) holding the newest values', () => {
      upsertUsers([user({ name: 'Alice' }), user({ uid: 2, userId: '1002', name: 'Bob' })]);
      const summary = upsertUsers([user({ name: 'Alice Smith', privilege: 'Admin', card: 4242 })]);

      expect(summary).toEqual({ upsertedCount: 1, errorCount: 0 });
      expect(getUserCount('10.0.0.5')).toBe(2);
      expect(getUser('10.0.0.5', 1)).toMatchObject({
        name: 'Alice Smith',
        privilege: 'Admin',
        card: 4242,
        userId: '1001',
      });
      expect(getUser('10.0.0.5', 2)?.name).toBe('Bob');
    });

    it('ends with the last-written values for every key, for any sequence of batches', () => {
      const userArb = fc.record({
        deviceIp: fc.constantFrom('10.0.0.5', '10.0.0.6'),
        uid: fc.integer({ min: 0, max: 8 }),
        userId: fc.string({ maxLength: 6 }),
        name: fc.string({ maxLength: 12 }),
        privilege: fc.constantFrom('Admin' as const, 'Default' as const),
        password: fc.constantFrom('', '1234'),
        groupId: fc.constantFrom('', '1', '2'),
        card: fc.integer({ min: 0, max: 99999 }),
      });

      fc.assert(
        fc.property(fc.array(fc.array(userArb, { maxLength: 10 }), { maxLength: 4 }), (batches) => {
          resetTestDatabase();
          const expected = new Map<string, PersistedUserRow>();

          for (const batch of batches) {
            upsertUsers(batch);
            for (const row of batch) {
              expected.set(`${row.deviceIp}|${row.uid}`, row);
            }
          }

          expect(countRows('users')).toBe(expected.size);
          for (const row of expected.values()) {
            expect(getUser(row.deviceIp, row.uid)).toMatchObject({
              name: row.name,
              userId: row.userId,
              privilege: row.privilege,
              password: row.password,
              groupId: row.groupId,
              card: row.card,
            });
          }
        }),
        { numRuns: 50 }
      );
    });

    it('refreshes synced_at on update', () => {
      upsertUsers([user()]);
      testExecute("UPDATE users SET synced_at = '2000-01-01 00:00:00'");

      upsertUsers([user({ name: 'Alice B' })]);

      const rows = testSelect<UserRow>('SELECT * FROM users');
      expect(rows).toHaveLength(1);
      expect(rows[0]?.synced_at).not.toBe('2000-01-01 00:00:00');
    });
  });

  describe('Storage format', () => {
    it('stores card as text, empty when zero', () => {
      upsertUsers([user({ uid: 1, card: 0 }), user({ uid: 2, card: 123456 })]);

      const rows = testSelect<Pick<UserRow, 'uid' | 'card'>>('SELECT uid, card FROM users ORDER BY uid');
      expect(rows).toEqual([
        { uid: 1, card: '' },
        { uid: 2, card: '123456' },
      ]);
    });

    it('rolls back the whole batch when a row cannot be written', () => {
      upsertUsers([user({ uid: 9, name: 'Existing' })]);
      testExecute(`
        CREATE TRIGGER fail_user BEFORE INSERT ON users
        WHEN NEW.name = 'FAIL'
        BEGIN SELECT RAISE(ABORT, 'forced failure'); END
      `);

      try {
        const summary = upsertUsers([user({ uid: 1 }), user({ uid: 2, name: 'FAIL' })]);
        expect(summary).toEqual({ upsertedCount: 0, errorCount: 2 });
        expect(listUsers().map((u) => u.uid)).toEqual([9]);
      } finally {
        testExecute('DROP TRIGGER fail_user');
      }
    });
  });

  describe('Read side', () => {
    it('lists users by device, ordered by uid', () => {
      upsertUsers([
        user({ deviceIp: '10.0.0.6', uid: 3 }),
        user({ uid: 5 }),
        user({ uid: 2 }),
      ]);

      expect(listUsers({ deviceIp: '10.0.0.5' }).map((u) => u.uid)).toEqual([2, 5]);
      expect(listUsers().map((u) => `${u.deviceIp}/${u.uid}`)).toEqual(['10.0.0.5/2', '10.0.0.5/5', '10.0.0.6/3']);
      expect(getUserCount()).toBe(3);
      expect(getUser('10.0.0.6', 99)).toBeNull();
    });
  });
});
