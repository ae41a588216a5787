import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS jobs (
      job_id TEXT PRIMARY KEY,
      account_id TEXT NOT NULL,
      input_ref TEXT NOT NULL,
      check_sets TEXT NOT NULL,
      status TEXT NOT NULL,
      phase TEXT NOT NULL,
      progress_pct INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      started_at TEXT,
      finished_at TEXT,
      estimated_cost INTEGER NOT NULL,
      actual_cost INTEGER,
      error_code TEXT,
      error_message TEXT,
      fingerprint TEXT NOT NULL,
      declared_duration_s REAL,
      cached INTEGER NOT NULL DEFAULT 0,
      report_json TEXT
    );

    CREATE TABLE IF NOT EXISTS credit_transactions (
      id TEXT PRIMARY KEY,
      account_id TEXT NOT NULL,
      kind TEXT NOT NULL CHECK(kind IN ('grant', 'debit', 'refund')),
      amount INTEGER NOT NULL,
      reason TEXT NOT NULL,
      job_id TEXT,
      idempotency_key TEXT UNIQUE NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS processed_external_events (
      event_id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      account_id TEXT NOT NULL,
      amount INTEGER NOT NULL,
      processed_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_jobs_account ON jobs(account_id);
    CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
    CREATE INDEX IF NOT EXISTS idx_credit_account ON credit_transactions(account_id);
    CREATE INDEX IF NOT EXISTS idx_credit_job ON credit_transactions(job_id);
  `);
}

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  initSchema(db);
  return db;
}
