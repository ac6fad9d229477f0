import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { CategoryRestoreOutcomeType } from '../types/restore.js';

export type BackupDatabase = Database.Database;

export interface BackupStatusRow {
  category: string;
  running: number;
  synced_at: number;
  required_at: number;
  updated_at: number;
}

export interface RestoreEventRow {
  id: string;
  restore_id: string;
  category: string;
  outcome: CategoryRestoreOutcomeType;
  payload_created_at: number | null;
  detail: string | null;
  recorded_at: number;
}

const IN_MEMORY = ':memory:';

/**
 * Open (or create) the status database and apply the schema.
 * Pass `':memory:'` for an ephemeral database.
 */
export function openBackupDatabase(filePath: string): BackupDatabase {
  if (filePath !== IN_MEMORY) {
    const dir = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(filePath);
  if (filePath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS backup_statuses (
      category TEXT PRIMARY KEY,
      running INTEGER NOT NULL DEFAULT 0,
      synced_at INTEGER NOT NULL DEFAULT 0,
      required_at INTEGER NOT NULL DEFAULT 0,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS backup_restore_events (
      id TEXT PRIMARY KEY,
      restore_id TEXT NOT NULL,
      category TEXT NOT NULL,
      outcome TEXT NOT NULL,
      payload_created_at INTEGER,
      detail TEXT,
      recorded_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_backup_restore_events_recorded_at
      ON backup_restore_events(recorded_at DESC);
  `);

  return db;
}

// ── Backup statuses ──────────────────────────────────────────────────────────

export function getBackupStatusRow(db: BackupDatabase, category: string): BackupStatusRow | undefined {
  return db
    .prepare<[string], BackupStatusRow>(
      `SELECT category, running, synced_at, required_at, updated_at
       FROM backup_statuses
       WHERE category = ?`,
    )
    .get(category);
}

export function listBackupStatusRows(db: BackupDatabase): BackupStatusRow[] {
  return db
    .prepare<[], BackupStatusRow>(
      `SELECT category, running, synced_at, required_at, updated_at
       FROM backup_statuses
       ORDER BY category`,
    )
    .all();
}

export function upsertBackupStatusRow(db: BackupDatabase, row: BackupStatusRow): void {
  db.prepare(
    `INSERT INTO backup_statuses (category, running, synced_at, required_at, updated_at)
     VALUES (@category, @running, @synced_at, @required_at, @updated_at)
     ON CONFLICT(category) DO UPDATE SET
       running = excluded.running,
       synced_at = excluded.synced_at,
       required_at = excluded.required_at,
       updated_at = excluded.updated_at`,
  ).run(row);
}

export function deleteAllBackupStatusRows(db: BackupDatabase): number {
  return db.prepare('DELETE FROM backup_statuses').run().changes;
}

// ── Restore history ──────────────────────────────────────────────────────────

export function saveRestoreEventRow(db: BackupDatabase, row: RestoreEventRow): void {
  db.prepare(
    `INSERT INTO backup_restore_events
       (id, restore_id, category, outcome, payload_created_at, detail, recorded_at)
     VALUES (@id, @restore_id, @category, @outcome, @payload_created_at, @detail, @recorded_at)`,
  ).run(row);
}

export function listRestoreEventRows(db: BackupDatabase, limit = 50): RestoreEventRow[] {
  return db
    .prepare<[number], RestoreEventRow>(
      `SELECT id, restore_id, category, outcome, payload_created_at, detail, recorded_at
       FROM backup_restore_events
       ORDER BY recorded_at DESC, rowid DESC
       LIMIT ?`,
    )
    .all(limit);
}
