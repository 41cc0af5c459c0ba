import type Database from 'better-sqlite3';

/**
 * Initialize the database schema.
 * Creates the notes, note_links, labels, settings and sync_log tables.
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS notes (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL DEFAULT '',
      content TEXT NOT NULL DEFAULT '',
      note_type TEXT NOT NULL DEFAULT 'note',
      checklist_items TEXT NOT NULL DEFAULT '[]',
      labels TEXT NOT NULL DEFAULT '[]',
      pinned INTEGER NOT NULL DEFAULT 0,
      archived INTEGER NOT NULL DEFAULT 0,
      trashed INTEGER NOT NULL DEFAULT 0,
      color TEXT NOT NULL DEFAULT '',
      local_modified TEXT,
      content_hash TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_notes_pinned ON notes(pinned);
    CREATE INDEX IF NOT EXISTS idx_notes_archived ON notes(archived);
    CREATE INDEX IF NOT EXISTS idx_notes_trashed ON notes(trashed);

    CREATE TABLE IF NOT EXISTS note_links (
      note_id TEXT NOT NULL,
      provider TEXT NOT NULL,
      remote_id TEXT,
      sync_status TEXT NOT NULL DEFAULT 'local_only',
      remote_modified TEXT,
      conflict_remote TEXT,
      updated_at TEXT NOT NULL,

      PRIMARY KEY (note_id, provider),
      FOREIGN KEY (note_id) REFERENCES notes(id) ON DELETE CASCADE
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_links_remote ON note_links(provider, remote_id);
    CREATE INDEX IF NOT EXISTS idx_links_status ON note_links(provider, sync_status);

    CREATE TABLE IF NOT EXISTS labels (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      color TEXT NOT NULL DEFAULT '',
      remote_id TEXT
    );

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT
    );

    CREATE TABLE IF NOT EXISTS sync_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      provider TEXT NOT NULL DEFAULT '',
      action TEXT NOT NULL,
      note_id TEXT NOT NULL DEFAULT '',
      status TEXT NOT NULL,
      message TEXT NOT NULL DEFAULT ''
    );
  `);

  migrateSchema(db);
}

/**
 * Run schema migrations for existing databases.
 * Each migration checks if it's needed before applying.
 */
function migrateSchema(db: Database.Database): void {
  const linkColumns = db.prepare('PRAGMA table_info(note_links)').all() as Array<{
    name: string;
  }>;
  const linkColumnNames = new Set(linkColumns.map((c) => c.name));

  // Migration 1: conflict snapshot column
  if (!linkColumnNames.has('conflict_remote')) {
    db.exec(`ALTER TABLE note_links ADD COLUMN conflict_remote TEXT`);
  }

  const logColumns = db.prepare('PRAGMA table_info(sync_log)').all() as Array<{
    name: string;
  }>;

  // Migration 2: per-provider sync log
  if (!logColumns.some((c) => c.name === 'provider')) {
    db.exec(`ALTER TABLE sync_log ADD COLUMN provider TEXT NOT NULL DEFAULT ''`);
  }
  db.exec('CREATE INDEX IF NOT EXISTS idx_sync_log_provider ON sync_log(provider)');
}
