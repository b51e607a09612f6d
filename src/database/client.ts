/**
 * SQLite connection for the history store
 * Opens the database file, applies the schema and exposes small helpers
 */

import BetterSqlite3 from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from '../utils/logger.js';

export type SqliteDatabase = BetterSqlite3.Database;

/**
 * Database client configuration options
 */
export interface DatabaseClientOptions {
  logger?: Logger;

  /**
   * Log every statement at debug level
   */
  logQueries?: boolean;

  readonly?: boolean;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS history_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    execution_id TEXT NOT NULL UNIQUE,
    branch TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    run_id INTEGER,
    commit_sha TEXT,
    risk_level TEXT NOT NULL,
    total INTEGER NOT NULL,
    passed INTEGER NOT NULL,
    failed INTEGER NOT NULL,
    pass_rate REAL NOT NULL,
    duration_ms REAL NOT NULL,
    summary_json TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_history_runs_branch_timestamp
    ON history_runs (branch, timestamp);

  CREATE TABLE IF NOT EXISTS history_results (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    history_run_id INTEGER NOT NULL,
    automation_key TEXT NOT NULL,
    feature_name TEXT NOT NULL,
    scenario_name TEXT NOT NULL,
    example_index INTEGER,
    status TEXT NOT NULL CHECK (status IN ('passed', 'failed')),
    duration_ms REAL NOT NULL,
    tags_json TEXT NOT NULL DEFAULT '[]',
    error_message TEXT,
    FOREIGN KEY (history_run_id) REFERENCES history_runs(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_history_results_key
    ON history_results (automation_key);
`;

/**
 * Open (creating when needed) a history database. `:memory:` gives a private
 * in-process database.
 */
export function openDatabase(path: string, options: DatabaseClientOptions = {}): SqliteDatabase {
  const { logger, logQueries = false } = options;

  if (path !== ':memory:' && !options.readonly) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new BetterSqlite3(path, {
    readonly: options.readonly ?? false,
    fileMustExist: options.readonly ?? false,
    verbose: logQueries && logger ? (message) => logger.debug('Query', { sql: String(message) }) : undefined,
  });

  if (!options.readonly) {
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
  }

  logger?.debug('History database opened', { path, readonly: options.readonly ?? false });
  return db;
}

export function healthCheck(db: SqliteDatabase): boolean {
  try {
    db.prepare('SELECT 1').get();
    return true;
  } catch {
    return false;
  }
}

/**
 * Executes a callback within a transaction
 */
export function executeTransaction<T>(db: SqliteDatabase, callback: () => T): T {
  return db.transaction(callback)();
}
