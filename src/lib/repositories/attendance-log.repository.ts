/**
 * Attendance Repository
 * Append-only, deduplicating storage for the attendance table
 */

import { execute, select, withRelaxedDurability } from '../database.js';
import type {
  AttendanceQuery,
  AttendanceRow,
  AttendanceWriteSummary,
  PersistedAttendanceRow,
  StoredAttendance,
} from '../../types/index.js';

export const DEFAULT_ATTENDANCE_CHUNK_SIZE = 1000;

export interface AppendAttendanceOptions {
  chunkSize?: number;
}

/**
 * Map database row to StoredAttendance model
 */
function mapRowToAttendance(row: AttendanceRow): StoredAttendance {
  return {
    id: row.id,
    deviceIp: row.device_ip,
    uid: row.uid ?? 0,
    userId: row.user_id,
    name: row.name ?? '',
    timestamp: row.timestamp,
    status: row.status ?? 0,
    punch: row.punch ?? 0,
    importedAt: row.imported_at,
  };
}

/**
 * Append attendance rows, ignoring any whose (device_ip, user_id, timestamp)
 * key is already stored. Re-syncing the same device is therefore a no-op.
 *
 * Rows are written in chunks, each under its own savepoint. A chunk that
 * fails is rolled back and its row count goes to `errorCount`; later chunks
 * are still attempted. Rows without a user id never reach the table and are
 * counted as skipped.
 */
export function appendAttendance(
  rows: PersistedAttendanceRow[],
  options: AppendAttendanceOptions = {}
): AttendanceWriteSummary {
  const summary: AttendanceWriteSummary = {
    insertedCount: 0,
    duplicateCount: 0,
    skippedCount: 0,
    errorCount: 0,
  };

  const writable: PersistedAttendanceRow[] = [];
  for (const row of rows) {
    if (row.userId.trim() === '') {
      summary.skippedCount++;
    } else {
      writable.push(row);
    }
  }

  if (writable.length === 0) {
    return summary;
  }

  const chunkSize = Math.max(1, Math.floor(options.chunkSize ?? DEFAULT_ATTENDANCE_CHUNK_SIZE));

  withRelaxedDurability(() => {
    for (let chunkStart = 0; chunkStart < writable.length; chunkStart += chunkSize) {
      const chunk = writable.slice(chunkStart, chunkStart + chunkSize);
      const savepointName = `insert_attendance_${chunkStart}`;

      try {
        execute(`SAVEPOINT ${savepointName}`);

        let inserted = 0;
        for (const row of chunk) {
          const result = execute(
            `INSERT OR IGNORE INTO attendance (device_ip, uid, user_id, name, timestamp, status, punch)
             VALUES (?, ?, ?, ?, ?, ?, ?)`,
            [row.deviceIp, row.uid, row.userId, row.name, row.timestamp, row.status, row.punch]
          );
          inserted += result.rowsAffected;
        }

        execute(`RELEASE SAVEPOINT ${savepointName}`);

        // Counted only once the chunk is committed
        summary.insertedCount += inserted;
        summary.duplicateCount += chunk.length - inserted;
        console.log(`[insertAttendance] Progress: ${Math.min(chunkStart + chunk.length, writable.length)} / ${writable.length} records processed`);
      } catch (error) {
        summary.errorCount += chunk.length;
        try {
          execute(`ROLLBACK TO SAVEPOINT ${savepointName}`);
          execute(`RELEASE SAVEPOINT ${savepointName}`);
        } catch (rollbackError) {
          const rbMsg = rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
          console.warn(`[insertAttendance] Rollback of ${savepointName} failed:`, rbMsg);
        }
        const errMsg = error instanceof Error ? error.message : String(error);
        console.error(`[insertAttendance] Chunk starting at ${chunkStart} failed (${chunk.length} rows):`, errMsg);
      }
    }
  });

  return summary;
}

/**
 * List stored attendance, newest first
 */
export function listAttendance(query: AttendanceQuery = {}): StoredAttendance[] {
  let sql = 'SELECT * FROM attendance WHERE 1=1';
  const params: unknown[] = [];

  if (query.deviceIp) {
    sql += ' AND device_ip = ?';
    params.push(query.deviceIp);
  }
  if (query.userId) {
    sql += ' AND user_id = ?';
    params.push(query.userId);
  }

  sql += ' ORDER BY timestamp DESC, id DESC';

  if (query.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(query.limit);
  }

  return select<AttendanceRow>(sql, params).map(mapRowToAttendance);
}

/**
 * Get total attendance count, optionally for one device
 */
export function getAttendanceCount(deviceIp?: string): number {
  const rows = deviceIp
    ? select<{ count: number }>('SELECT COUNT(*) as count FROM attendance WHERE device_ip = ?', [deviceIp])
    : select<{ count: number }>('SELECT COUNT(*) as count FROM attendance');
  return rows[0]?.count ?? 0;
}

export const attendanceRepository = {
  appendAttendance,
  listAttendance,
  getAttendanceCount,
};
