/**
 * Test database utilities
 * Opens the real store on an in-memory better-sqlite3 database
 */

import { closeDatabase, execute, getDatabase, initDatabase, select } from '../database.js';
import type Database from 'better-sqlite3';

export function initTestDatabase(): Database.Database {
  return initDatabase(':memory:');
}

export function closeTestDatabase(): void {
  closeDatabase();
}

/**
 * Clear all data but keep the schema
 */
export function resetTestDatabase(): void {
  getDatabase().exec(`
    DELETE FROM attendance;
    DELETE FROM users;
    DELETE FROM sqlite_sequence;
  `);
}

export function testExecute(query: string, bindValues: unknown[] = []): { rowsAffected: number } {
  return execute(query, bindValues);
}

export function testSelect<T>(query: string, bindValues: unknown[] = []): T[] {
  return select<T>(query, bindValues);
}

export function countRows(table: 'users' | 'attendance'): number {
  return testSelect<{ count: number }>(`SELECT COUNT(*) as count FROM ${table}`)[0]?.count ?? 0;
}
