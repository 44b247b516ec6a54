import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from '../../utils/logger.js';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS deliveries (
    delivery_id TEXT PRIMARY KEY,
    claimed_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS review_jobs (
    job_id TEXT PRIMARY KEY,
    delivery_id TEXT NOT NULL,
    repository_id TEXT NOT NULL,
    pull_request_number INTEGER NOT NULL,
    head_commit_sha TEXT NOT NULL,
    base_commit_sha TEXT,
    installation_id INTEGER,
    status TEXT NOT NULL,
    created_at TEXT NOT NULL,
    attempt_count INTEGER NOT NULL DEFAULT 0,
    error TEXT
  );

  CREATE TABLE IF NOT EXISTS active_jobs (
    pr_key TEXT PRIMARY KEY,
    job_id TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS diff_chunks (
    chunk_id TEXT PRIMARY KEY,
    job_id TEXT NOT NULL,
    ordinal INTEGER NOT NULL,
    file_path TEXT,
    hunk_first INTEGER,
    hunk_last INTEGER,
    token_estimate INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS diff_chunks_job ON diff_chunks (job_id, ordinal);

  CREATE TABLE IF NOT EXISTS review_comments (
    job_id TEXT NOT NULL,
    finding_ref TEXT NOT NULL,
    external_comment_id TEXT,
    post_status TEXT NOT NULL,
    error TEXT,
    PRIMARY KEY (job_id, finding_ref)
  );

  CREATE TABLE IF NOT EXISTS queued_jobs (
    job_id TEXT PRIMARY KEY,
    payload TEXT NOT NULL,
    enqueued_at INTEGER NOT NULL,
    lease_until INTEGER,
    deliveries INTEGER NOT NULL DEFAULT 0,
    last_error TEXT,
    dead INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS queued_jobs_ready ON queued_jobs (dead, lease_until, enqueued_at);
`;

/**
 * Opens (creating when needed) the embedded-mode database holding both the
 * state tables and the queue table.
 */
export function openDatabase(path: string, logger?: Logger): SqliteDatabase {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);

  logger?.info('Database opened', { path });
  return db;
}

export function closeDatabase(db: SqliteDatabase, logger?: Logger): void {
  if (!db.open) return;
  if (!db.memory) {
    db.pragma('wal_checkpoint(TRUNCATE)');
  }
  db.close();
  logger?.info('Database closed', { name: db.name });
}
