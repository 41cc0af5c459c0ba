import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import { initSchema } from './schema.js';

export const DEFAULT_DB_DIR = resolve(homedir(), '.keepsync-notes');
const DEFAULT_DB_PATH = resolve(DEFAULT_DB_DIR, 'notes.db');

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;
let openPath: string | null = null;

/** Absolute path of the database file, or ':memory:' unchanged. */
export function resolveDbPath(dbPath?: string): string {
  if (!dbPath) return DEFAULT_DB_PATH;
  return dbPath === IN_MEMORY ? IN_MEMORY : resolve(dbPath);
}

/**
 * The shared note store connection, opened on first use.
 *
 * Tool handlers and background sync cycles all go through this one
 * connection. better-sqlite3 runs every statement synchronously, so writes
 * never interleave.
 */
export function getDb(dbPath?: string): Database.Database {
  if (db) return db;

  const path = resolveDbPath(dbPath);
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const connection = new Database(path);
  connection.pragma('journal_mode = WAL');
  connection.pragma('foreign_keys = ON');
  connection.pragma('synchronous = NORMAL');
  // Another server process may hold the write lock briefly
  connection.pragma('busy_timeout = 5000');
  initSchema(connection);

  db = connection;
  openPath = path;
  return connection;
}

/** Path of the open database, or null when none is open. */
export function currentDbPath(): string | null {
  return openPath;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
    openPath = null;
  }
}

/** Close any open connection and open a fresh one (':memory:' by default). */
export function resetDb(dbPath: string = IN_MEMORY): Database.Database {
  closeDb();
  return getDb(dbPath);
}
