import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';

const SCHEMA = `
-- Reference tariff dataset
CREATE TABLE IF NOT EXISTS tariff_codes (
  code TEXT PRIMARY KEY,
  description TEXT NOT NULL,
  duty_rate TEXT,
  corrupt INTEGER NOT NULL DEFAULT 0
);

-- Loop breaker attempt records, never deleted
CREATE TABLE IF NOT EXISTS classification_attempts (
  thread_key TEXT PRIMARY KEY,
  subject TEXT NOT NULL DEFAULT '',
  attempts INTEGER NOT NULL,
  prior_codes TEXT NOT NULL DEFAULT '[]',
  first_seen TEXT NOT NULL,
  last_seen TEXT NOT NULL
);

-- Learned description -> code memory
CREATE TABLE IF NOT EXISTS classification_memory (
  description_key TEXT PRIMARY KEY,
  description TEXT NOT NULL,
  code TEXT NOT NULL,
  confidence REAL NOT NULL,
  source TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

export type SqliteDatabase = Database.Database;

export function initializeDatabase(dbPath: string = ':memory:'): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  // WAL lets gate reads proceed while another request holds the write lock
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);

  return db;
}

export function closeDatabase(db: SqliteDatabase): void {
  db.close();
}
