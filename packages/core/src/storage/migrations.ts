/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema: knowledge, decision records, comments, users, admin events',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS knowledge_entries (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          question TEXT NOT NULL,
          answer TEXT NOT NULL DEFAULT '',
          tags TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS decision_records (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          background TEXT NOT NULL DEFAULT '',
          steps TEXT NOT NULL DEFAULT '',
          result TEXT NOT NULL DEFAULT '',
          tags TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS comments (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          decision_record_id INTEGER NOT NULL,
          author TEXT NOT NULL DEFAULT '',
          body TEXT NOT NULL,
          rating INTEGER NOT NULL CHECK (rating BETWEEN 1 AND 5),
          created_at TEXT NOT NULL,
          FOREIGN KEY (decision_record_id) REFERENCES decision_records(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS users (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          username TEXT NOT NULL UNIQUE,
          password_hash TEXT NOT NULL,
          is_admin INTEGER NOT NULL DEFAULT 0,
          is_active INTEGER NOT NULL DEFAULT 1,
          created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS admin_events (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          actor_username TEXT NOT NULL,
          action TEXT NOT NULL,
          target_username TEXT NOT NULL,
          details TEXT,
          created_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_knowledge_entries_created ON knowledge_entries(created_at);
        CREATE INDEX IF NOT EXISTS idx_decision_records_created ON decision_records(created_at);
        CREATE INDEX IF NOT EXISTS idx_comments_decision ON comments(decision_record_id);
        CREATE INDEX IF NOT EXISTS idx_admin_events_created ON admin_events(created_at);
      `)
    },
  },
  {
    version: 2,
    description: 'Append-only guard on admin_events',
    up(db) {
      db.exec(`
        CREATE TRIGGER IF NOT EXISTS admin_events_no_update
        BEFORE UPDATE ON admin_events
        BEGIN
          SELECT RAISE(ABORT, 'admin_events is append-only');
        END;

        CREATE TRIGGER IF NOT EXISTS admin_events_no_delete
        BEFORE DELETE ON admin_events
        BEGIN
          SELECT RAISE(ABORT, 'admin_events is append-only');
        END;
      `)
    },
  },
]

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  db.exec(`CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`)

  const currentVersion = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined

  const applied = currentVersion?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
      console.error(`[storage] applied migration ${migration.version}: ${migration.description}`)
    }
  }
}
