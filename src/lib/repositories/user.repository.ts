/**
 * User Repository
 * Idempotent upserts and reads for the users table, keyed by (device_ip, uid)
 */

import { execute, select, withRelaxedDurability } from '../database.js';
import type {
  PersistedUserRow,
  StoredUser,
  UserPrivilege,
  UserQuery,
  UserRow,
  UserWriteSummary,
} from '../../types/index.js';

/**
 * Map database row to StoredUser model
 */
function mapRowToUser(row: UserRow): StoredUser {
  const card = Number.parseInt(row.card ?? '', 10);
  const privilege: UserPrivilege = row.privilege === 'Admin' ? 'Admin' : 'Default';
  return {
    id: row.id,
    deviceIp: row.device_ip,
    uid: row.uid,
    name: row.name ?? '',
    privilege,
    password: row.password ?? '',
    groupId: row.group_id ?? '',
    userId: row.user_id ?? '',
    card: Number.isNaN(card) ? 0 : card,
    syncedAt: row.synced_at,
  };
}

/**
 * Upsert users. A row for an existing (device_ip, uid) is superseded by the
 * incoming values: device-side attributes change over time and the latest
 * sync is authoritative.
 */
export function upsertUsers(rows: PersistedUserRow[]): UserWriteSummary {
  if (rows.length === 0) {
    return { upsertedCount: 0, errorCount: 0 };
  }

  return withRelaxedDurability(() => {
    const savepointName = 'upsert_users';
    try {
      execute(`SAVEPOINT ${savepointName}`);
      for (const row of rows) {
        execute(
          `INSERT INTO users (device_ip, uid, name, privilege, password, group_id, user_id, card)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(device_ip, uid) DO UPDATE SET
             name = excluded.name,
             privilege = excluded.privilege,
             password = excluded.password,
             group_id = excluded.group_id,
             user_id = excluded.user_id,
             card = excluded.card,
             synced_at = CURRENT_TIMESTAMP`,
          [
            row.deviceIp,
            row.uid,
            row.name,
            row.privilege,
            row.password,
            row.groupId,
            row.userId,
            row.card ? String(row.card) : '',
          ]
        );
      }
      execute(`RELEASE SAVEPOINT ${savepointName}`);
      console.log(`[upsertUsers] Saved ${rows.length} users`);
      return { upsertedCount: rows.length, errorCount: 0 };
    } catch (error) {
      rollbackSavepoint(savepointName);
      const errMsg = error instanceof Error ? error.message : String(error);
      console.error(`[upsertUsers] Failed to save ${rows.length} users:`, errMsg);
      return { upsertedCount: 0, errorCount: rows.length };
    }
  });
}

function rollbackSavepoint(name: string): void {
  try {
    execute(`ROLLBACK TO SAVEPOINT ${name}`);
    execute(`RELEASE SAVEPOINT ${name}`);
  } catch (error) {
    const errMsg = error instanceof Error ? error.message : String(error);
    console.warn(`[upsertUsers] Could not roll back savepoint ${name}:`, errMsg);
  }
}

/**
 * List stored users, optionally for one device, ordered by device then uid
 */
export function listUsers(query: UserQuery = {}): StoredUser[] {
  let sql = 'SELECT * FROM users WHERE 1=1';
  const params: unknown[] = [];

  if (query.deviceIp) {
    sql += ' AND device_ip = ?';
    params.push(query.deviceIp);
  }

  sql += ' ORDER BY device_ip ASC, uid ASC';
  return select<UserRow>(sql, params).map(mapRowToUser);
}

/**
 * Get one stored user by its key
 */
export function getUser(deviceIp: string, uid: number): StoredUser | null {
  const rows = select<UserRow>('SELECT * FROM users WHERE device_ip = ? AND uid = ?', [deviceIp, uid]);
  const row = rows[0];
  return row ? mapRowToUser(row) : null;
}

/**
 * Get total user count, optionally for one device
 */
export function getUserCount(deviceIp?: string): number {
  const rows = deviceIp
    ? select<{ count: number }>('SELECT COUNT(*) as count FROM users WHERE device_ip = ?', [deviceIp])
    : select<{ count: number }>('SELECT COUNT(*) as count FROM users');
  return rows[0]?.count ?? 0;
}

export const userRepository = {
  upsertUsers,
  listUsers,
  getUser,
  getUserCount,
};
