import Database from 'better-sqlite3';
import { SCHEMA } from './schema.js';

let db: Database.Database | null = null;

/**
 * Open the database file (or `:memory:`) and create the schema if absent.
 * Re-opening with a handle already open returns the existing handle.
 */
export function initDatabase(file: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(file);
  // WAL lets readers (reports, exports) run while a sync writes
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 30000');
  db.pragma('synchronous = FULL');
  ensureSchema();
  return db;
}

/**
 * Get the database instance.
 * Throws if database is not initialized.
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Close the database connection.
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Idempotently create the `users` and `attendance` tables and their indexes.
 */
export function ensureSchema(): void {
  getDatabase().exec(SCHEMA);
}

/**
 * Execute a SQL statement that doesn't return rows (INSERT, UPDATE, SAVEPOINT...).
 */
export function execute(
  query: string,
  bindValues: unknown[] = []
): { rowsAffected: number; lastInsertId: number } {
  const result = getDatabase().prepare(query).run(...bindValues);
  return {
    rowsAffected: result.changes,
    lastInsertId: Number(result.lastInsertRowid),
  };
}

/**
 * Execute a SQL query that returns rows (SELECT).
 */
export function select<T>(query: string, bindValues: unknown[] = []): T[] {
  return getDatabase().prepare(query).all(...bindValues) as T[];
}

/**
 * Run a bulk load with fsync relaxed, re-arming full durability once the
 * whole operation has finished (successfully or not). Committed chunks stay
 * intact if the process dies mid-load; only the in-flight chunk is lost.
 */
export function withRelaxedDurability<T>(fn: () => T): T {
  const database = getDatabase();
  database.pragma('synchronous = OFF');
  try {
    return fn();
  } finally {
    database.pragma('synchronous = FULL');
  }
}

/**
 * Read the current `synchronous` pragma (0 = OFF, 1 = NORMAL, 2 = FULL, 3 = EXTRA).
 */
export function getSynchronousLevel(): number {
  const value = getDatabase().pragma('synchronous', { simple: true });
  return typeof value === 'number' ? value : Number(value);
}

