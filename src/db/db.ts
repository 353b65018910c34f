import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { dbPath } from '../config.js';
import { DEFAULT_CONFIG } from '../core/types.js';

let _db: Database.Database | null = null;

/** Open a queue database, creating the file and schema if needed. */
export function openDB(file: string): Database.Database {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  initSchema(db);
  return db;
}

export function getDB() {
  if (_db) return _db;
  _db = openDB(dbPath());
  return _db;
}

export function initSchema(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS jobs (
      id TEXT PRIMARY KEY,
      command TEXT NOT NULL,
      state TEXT NOT NULL DEFAULT 'pending',
      attempts INTEGER NOT NULL DEFAULT 0,
      retry_limit INTEGER NOT NULL DEFAULT 3,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      next_run_at TEXT DEFAULT NULL,
      last_error TEXT DEFAULT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_jobs_pending_next_run
      ON jobs (state, next_run_at);

    CREATE TABLE IF NOT EXISTS config (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);

  const seed = db.prepare('INSERT OR IGNORE INTO config(key, value) VALUES (?, ?)');
  seed.run('max_retries', String(DEFAULT_CONFIG.max_retries));
  seed.run('backoff_base_seconds', String(DEFAULT_CONFIG.backoff_base_seconds));
}
