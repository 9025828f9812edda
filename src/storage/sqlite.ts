/**
 * SQLite Storage Layer for Cronark
 *
 * Provides persistent per-worker key/value state.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import type { StateStore, StoredValue, WorkerName } from '../types.js';

/** Scope used when no worker is given */
const GLOBAL_SCOPE = 'global';

/**
 * SQLite-based state store.
 *
 * Values are stored JSON-encoded so numbers come back as numbers. Uses WAL
 * mode so a status query does not block a running worker.
 */
export class SQLiteStore implements StateStore {
  private db: Database.Database;

  /**
   * Create a new SQLiteStore instance
   *
   * @param dbPath - Path to the SQLite database file (parent directories are
   *   created), or `:memory:`
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  /**
   * Create database tables if they don't exist
   */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS worker_state (
        scope TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        updated_at INTEGER DEFAULT (strftime('%s', 'now') * 1000),
        PRIMARY KEY (scope, key)
      );
    `);
  }

  /**
   * Get a value
   *
   * @param key - State key
   * @param worker - Worker scope, global when omitted
   * @returns The value or null if not found
   */
  get(key: string, worker?: WorkerName | null): StoredValue | null {
    const stmt = this.db.prepare(`
      SELECT value
      FROM worker_state
      WHERE scope = ? AND key = ?
    `);

    const row = stmt.get(scopeOf(worker), key) as { value: string } | undefined;

    if (!row) {
      return null;
    }

    return decode(row.value);
  }

  /**
   * Set a value; null deletes the key
   *
   * @param key - State key
   * @param value - Value to store
   * @param worker - Worker scope, global when omitted
   */
  set(key: string, value: StoredValue | null, worker?: WorkerName | null): boolean {
    if (value === null) {
      this.db
        .prepare('DELETE FROM worker_state WHERE scope = ? AND key = ?')
        .run(scopeOf(worker), key);
      return true;
    }

    const stmt = this.db.prepare(`
      INSERT INTO worker_state (scope, key, value, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(scope, key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `);

    stmt.run(scopeOf(worker), key, JSON.stringify(value), Date.now());
    return true;
  }

  /**
   * Delete every key of a scope
   */
  clear(worker?: WorkerName | null): boolean {
    this.db.prepare('DELETE FROM worker_state WHERE scope = ?').run(scopeOf(worker));
    return true;
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}

function scopeOf(worker?: WorkerName | null): string {
  return worker === undefined || worker === null ? GLOBAL_SCOPE : `worker:${worker}`;
}

function decode(raw: string): StoredValue | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return raw;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  return null;
}
