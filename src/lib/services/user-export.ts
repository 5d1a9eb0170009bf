/**
 * User Export
 * CSV rendering of a device's user roster
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { UserRecord } from '../../types/index.js';

export const USERS_CSV_HEADERS = ['UID', 'Name', 'Privilege', 'Password', 'Group ID', 'User ID', 'Card'];

const CSV_LINE_END = '\r\n';

/**
 * Escape a value for CSV format
 */
export function escapeCSVValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  // Quote when the value contains a comma, quote or line break
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function toCSVLine(values: Array<string | number>): string {
  return values.map(escapeCSVValue).join(',') + CSV_LINE_END;
}

/**
 * Render users as CSV: header first, one line per user, CRLF-terminated
 */
export function exportUsersToCSV(users: UserRecord[]): string {
  let csv = toCSVLine(USERS_CSV_HEADERS);
  for (const user of users) {
    csv += toCSVLine([
      user.uid,
      user.name,
      user.privilege === 'Admin' ? 'Admin' : 'User',
      user.password,
      user.groupId,
      user.userId,
      user.card ? String(user.card) : '',
    ]);
  }
  return csv;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `users_export_<ip with underscores>_<YYYYMMDD_HHmmss>.csv`, local time
 */
export function defaultUsersExportFilename(deviceIp: string, at: Date = new Date()): string {
  const stamp =
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}_` +
    `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `users_export_${deviceIp.replace(/\./g, '_')}_${stamp}.csv`;
}

export interface WriteUsersCsvOptions {
  /** Directory for the default file name; created if missing */
  dir: string;
  /** Explicit target path; overrides `dir` and the default name */
  filePath?: string;
  now?: Date;
}

/**
 * Write the roster as UTF-8 CSV and return the path written
 */
export async function writeUsersCsv(
  users: UserRecord[],
  deviceIp: string,
  options: WriteUsersCsvOptions
): Promise<string> {
  let filePath = options.filePath;
  if (!filePath) {
    await mkdir(options.dir, { recursive: true });
    filePath = join(options.dir, defaultUsersExportFilename(deviceIp, options.now));
  }

  await writeFile(filePath, exportUsersToCSV(users), 'utf8');
  console.log(`[UserExport] CSV exported: ${filePath}`);
  return filePath;
}
