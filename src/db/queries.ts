import { randomUUID } from 'node:crypto';
import { getDb } from './connection.js';
import { contentHash, normalizeLabels, syncedFieldsDiffer } from '../notes/hash.js';
import { buildNote, type NoteParams } from '../notes/note.js';
import {
  EDIT_REPENDING_STATUSES,
  PRIMARY_PROVIDER,
  rowToLink,
  rowToNote,
  type Label,
  type Note,
  type NoteLink,
  type NoteLinkRow,
  type NoteRow,
  type SyncLogEntry,
  type SyncStatus,
} from '../types.js';

/** Notes joined with their primary-provider link. Bind PRIMARY_PROVIDER first. */
const NOTE_SELECT = `
  SELECT n.*, l.remote_id AS remote_id, l.sync_status AS sync_status, l.remote_modified AS remote_modified
  FROM notes n
  LEFT JOIN note_links l ON l.note_id = n.id AND l.provider = ?
`;

const NOTE_ORDER = 'ORDER BY n.pinned DESC, n.updated_at DESC';

// === Note CRUD ===

export interface SaveNoteOptions {
  /**
   * 'local' (default) is a user edit: a change to any synced field stamps
   * local_modified and moves the note's links to pending_push.
   * 'sync' is a write made by a sync cycle and does neither.
   */
  origin?: 'local' | 'sync';
}

/**
 * Upsert a note by id in a single transaction.
 * Recomputes the content hash and bumps updated_at before writing.
 * Returns the persisted note, or null if the write failed. The passed
 * object is left untouched either way.
 */
export function saveNote(note: Note, options: SaveNoteOptions = {}): Note | null {
  const origin = options.origin ?? 'local';
  const db = getDb();
  const now = new Date().toISOString();
  const labels = normalizeLabels(note.labels);
  const hash = contentHash(note);

  const persist = db.transaction(() => {
    const existing = getNote(note.id);
    let localModified = existing ? existing.local_modified : note.local_modified;

    if (origin === 'sync') {
      localModified = note.local_modified;
    } else if (!existing || syncedFieldsDiffer(existing, { ...note, labels })) {
      localModified = now;
      if (existing) markLinksPending(note.id, now);
    }

    db.prepare(`
      INSERT INTO notes (id, title, content, note_type, checklist_items, labels, pinned, archived, trashed, color, local_modified, content_hash, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        title = excluded.title,
        content = excluded.content,
        note_type = excluded.note_type,
        checklist_items = excluded.checklist_items,
        labels = excluded.labels,
        pinned = excluded.pinned,
        archived = excluded.archived,
        trashed = excluded.trashed,
        color = excluded.color,
        local_modified = excluded.local_modified,
        content_hash = excluded.content_hash,
        updated_at = excluded.updated_at
    `).run(
      note.id,
      note.title,
      note.content,
      note.note_type,
      JSON.stringify(note.checklist_items),
      JSON.stringify(labels),
      note.pinned ? 1 : 0,
      note.archived ? 1 : 0,
      note.trashed ? 1 : 0,
      note.color,
      localModified,
      hash,
      existing ? existing.created_at : note.created_at,
      now,
    );
  });

  try {
    persist();
  } catch (error) {
    console.error(`Error saving note ${note.id}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  return getNote(note.id);
}

/** Build and persist a new local note. Throws if the write fails. */
export function createNote(params: NoteParams): Note {
  const saved = saveNote(buildNote(params));
  if (!saved) {
    throw new Error('Failed to create note');
  }
  return saved;
}

export function getNote(id: string): Note | null {
  const db = getDb();
  const row = db
    .prepare(`${NOTE_SELECT} WHERE n.id = ?`)
    .get(PRIMARY_PROVIDER, id) as NoteRow | undefined;

  return row ? rowToNote(row) : null;
}

/** Find the local note linked to a remote id on the given provider. */
export function getNoteByRemoteId(provider: string, remoteId: string): Note | null {
  const db = getDb();
  const row = db
    .prepare(`
      ${NOTE_SELECT}
      WHERE n.id = (SELECT note_id FROM note_links WHERE provider = ? AND remote_id = ?)
    `)
    .get(PRIMARY_PROVIDER, provider, remoteId) as NoteRow | undefined;

  return row ? rowToNote(row) : null;
}

export interface ListNotesParams {
  includeTrashed?: boolean;
  includeArchived?: boolean;
}

/** List notes, pinned first, then most recently updated first. */
export function listNotes(params: ListNotesParams = {}): Note[] {
  const db = getDb();
  const conditions: string[] = [];

  if (!params.includeTrashed) conditions.push('n.trashed = 0');
  if (!params.includeArchived) conditions.push('n.archived = 0');

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const rows = db
    .prepare(`${NOTE_SELECT} ${where} ${NOTE_ORDER}`)
    .all(PRIMARY_PROVIDER) as NoteRow[];

  return rows.map(rowToNote);
}

/** Every note, trashed and archived included. */
export function getAllNotes(): Note[] {
  return listNotes({ includeTrashed: true, includeArchived: true });
}

export function listNotesByLabel(name: string): Note[] {
  const db = getDb();
  const rows = db
    .prepare(`
      ${NOTE_SELECT}
      WHERE n.trashed = 0
        AND EXISTS (SELECT 1 FROM json_each(n.labels) WHERE json_each.value = ?)
      ${NOTE_ORDER}
    `)
    .all(PRIMARY_PROVIDER, name) as NoteRow[];

  return rows.map(rowToNote);
}

/** Case-insensitive substring match on title or body, trashed notes excluded. */
export function searchNotes(query: string): Note[] {
  const db = getDb();
  const escaped = query.replace(/[\\%_]/g, (c) => `\\${c}`);
  const term = `%${escaped}%`;
  const rows = db
    .prepare(`
      ${NOTE_SELECT}
      WHERE (n.title LIKE ? ESCAPE '\\' OR n.content LIKE ? ESCAPE '\\')
        AND n.trashed = 0
      ${NOTE_ORDER}
    `)
    .all(PRIMARY_PROVIDER, term, term) as NoteRow[];

  return rows.map(rowToNote);
}

/**
 * Trash a note, or remove it for good when `permanent` is set.
 * Permanent deletion also drops its links (ON DELETE CASCADE).
 */
export function deleteNote(id: string, permanent = false): boolean {
  const db = getDb();
  try {
    if (permanent) {
      return db.prepare('DELETE FROM notes WHERE id = ?').run(id).changes > 0;
    }
    return setTrashed(id, true);
  } catch (error) {
    console.error(`Error deleting note ${id}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

export function restoreNote(id: string): boolean {
  try {
    return setTrashed(id, false);
  } catch (error) {
    console.error(`Error restoring note ${id}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

function setTrashed(id: string, trashed: boolean): boolean {
  const db = getDb();
  const now = new Date().toISOString();

  const apply = db.transaction(() => {
    const result = db
      .prepare('UPDATE notes SET trashed = ?, local_modified = ?, updated_at = ? WHERE id = ? AND trashed = ?')
      .run(trashed ? 1 : 0, now, now, id, trashed ? 0 : 1);
    if (result.changes > 0) {
      markLinksPending(id, now);
      return true;
    }
    // Already in the requested state counts as success
    return db.prepare('SELECT 1 FROM notes WHERE id = ?').get(id) !== undefined;
  });

  return apply();
}

function markLinksPending(noteId: string, now: string): void {
  const db = getDb();
  const placeholders = EDIT_REPENDING_STATUSES.map(() => '?').join(', ');
  db.prepare(`
    UPDATE note_links SET sync_status = 'pending_push', updated_at = ?
    WHERE note_id = ? AND sync_status IN (${placeholders})
  `).run(now, noteId, ...EDIT_REPENDING_STATUSES);
}

/**
 * Queue a note for every provider except `provider`, after a sync cycle with
 * `provider` changed it or learned something the others should carry.
 */
export function requeueOtherLinks(noteId: string, provider: string): void {
  const db = getDb();
  const placeholders = EDIT_REPENDING_STATUSES.map(() => '?').join(', ');
  db.prepare(`
    UPDATE note_links SET sync_status = 'pending_push', updated_at = ?
    WHERE note_id = ? AND provider != ? AND sync_status IN (${placeholders})
  `).run(new Date().toISOString(), noteId, provider, ...EDIT_REPENDING_STATUSES);
}

// === Sync links ===

export function getNoteLink(noteId: string, provider: string): NoteLink | null {
  const db = getDb();
  const row = db
    .prepare('SELECT * FROM note_links WHERE note_id = ? AND provider = ?')
    .get(noteId, provider) as NoteLinkRow | undefined;

  return row ? rowToLink(row) : null;
}

export function listNoteLinks(provider: string): NoteLink[] {
  const db = getDb();
  const rows = db
    .prepare('SELECT * FROM note_links WHERE provider = ?')
    .all(provider) as NoteLinkRow[];

  return rows.map(rowToLink);
}

/** Every provider link of one note. */
export function listLinksForNote(noteId: string): NoteLink[] {
  const db = getDb();
  const rows = db
    .prepare('SELECT * FROM note_links WHERE note_id = ? ORDER BY provider')
    .all(noteId) as NoteLinkRow[];

  return rows.map(rowToLink);
}

export interface UpsertLinkParams {
  note_id: string;
  provider: string;
  remote_id: string | null;
  sync_status: SyncStatus;
  remote_modified: string | null;
  conflict_remote?: string | null;
}

export function upsertNoteLink(params: UpsertLinkParams): NoteLink {
  const db = getDb();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO note_links (note_id, provider, remote_id, sync_status, remote_modified, conflict_remote, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(note_id, provider) DO UPDATE SET
      remote_id = excluded.remote_id,
      sync_status = excluded.sync_status,
      remote_modified = excluded.remote_modified,
      conflict_remote = excluded.conflict_remote,
      updated_at = excluded.updated_at
  `).run(
    params.note_id,
    params.provider,
    params.remote_id,
    params.sync_status,
    params.remote_modified,
    params.conflict_remote ?? null,
    now,
  );

  return {
    note_id: params.note_id,
    provider: params.provider,
    remote_id: params.remote_id,
    sync_status: params.sync_status,
    remote_modified: params.remote_modified,
    conflict_remote: params.conflict_remote ?? null,
    updated_at: now,
  };
}

/** Set only the status of an existing link. Returns false if there is none. */
export function setLinkStatus(noteId: string, provider: string, status: SyncStatus): boolean {
  const db = getDb();
  const result = db
    .prepare('UPDATE note_links SET sync_status = ?, updated_at = ? WHERE note_id = ? AND provider = ?')
    .run(status, new Date().toISOString(), noteId, provider);
  return result.changes > 0;
}

export function deleteNoteLink(noteId: string, provider: string): boolean {
  const db = getDb();
  const result = db
    .prepare('DELETE FROM note_links WHERE note_id = ? AND provider = ?')
    .run(noteId, provider);
  return result.changes > 0;
}

/**
 * Notes that need sending to a provider: not trashed, and either never
 * linked there or linked with a local_only / pending_push status.
 */
export function listPushCandidates(provider: string): Note[] {
  const db = getDb();
  const rows = db
    .prepare(`
      ${NOTE_SELECT}
      WHERE n.trashed = 0
        AND NOT EXISTS (
          SELECT 1 FROM note_links pl
          WHERE pl.note_id = n.id AND pl.provider = ?
            AND pl.sync_status NOT IN ('local_only', 'pending_push')
        )
      ORDER BY n.created_at ASC
    `)
    .all(PRIMARY_PROVIDER, provider) as NoteRow[];

  return rows.map(rowToNote);
}

// === Labels ===

interface LabelRow {
  id: string;
  name: string;
  color: string;
  remote_id: string | null;
}

export function saveLabel(label: Label): boolean {
  const db = getDb();
  try {
    db.prepare(`
      INSERT INTO labels (id, name, color, remote_id) VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET name = excluded.name, color = excluded.color, remote_id = excluded.remote_id
    `).run(label.id, label.name, label.color, label.remote_id);
    return true;
  } catch (error) {
    console.error(`Error saving label ${label.name}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

export function getLabelByName(name: string): Label | null {
  const db = getDb();
  const row = db.prepare('SELECT * FROM labels WHERE name = ?').get(name) as LabelRow | undefined;
  return row ?? null;
}

export function listLabels(): Label[] {
  const db = getDb();
  return db.prepare('SELECT * FROM labels ORDER BY name').all() as LabelRow[];
}

export function deleteLabel(id: string): boolean {
  const db = getDb();
  try {
    return db.prepare('DELETE FROM labels WHERE id = ?').run(id).changes > 0;
  } catch (error) {
    console.error(`Error deleting label ${id}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

/** Create label records for any names not yet known. Returns how many were added. */
export function ensureLabels(names: string[]): number {
  const db = getDb();
  const insert = db.prepare(
    `INSERT INTO labels (id, name, color, remote_id) VALUES (?, ?, '', NULL) ON CONFLICT(name) DO NOTHING`,
  );
  let added = 0;
  const run = db.transaction(() => {
    for (const name of normalizeLabels(names)) {
      added += insert.run(randomUUID(), name).changes;
    }
  });
  run();
  return added;
}

// === Settings ===

/** Read a setting. Values are stored JSON-encoded; a non-JSON value is returned raw. */
export function getSetting(key: string): unknown {
  const db = getDb();
  const row = db.prepare('SELECT value FROM settings WHERE key = ?').get(key) as
    | { value: string | null }
    | undefined;

  if (!row || row.value === null) return undefined;
  try {
    return JSON.parse(row.value);
  } catch {
    return row.value;
  }
}

export function getStringSetting(key: string): string | null {
  const value = getSetting(key);
  return typeof value === 'string' ? value : null;
}

export function getNumberSetting(key: string, fallback: number): number {
  const value = getSetting(key);
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function getBooleanSetting(key: string, fallback: boolean): boolean {
  const value = getSetting(key);
  return typeof value === 'boolean' ? value : fallback;
}

export function setSetting(key: string, value: unknown): boolean {
  const db = getDb();
  try {
    db.prepare(`
      INSERT INTO settings (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `).run(key, JSON.stringify(value ?? null));
    return true;
  } catch (error) {
    console.error(`Error saving setting ${key}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

export function deleteSetting(key: string): boolean {
  const db = getDb();
  return db.prepare('DELETE FROM settings WHERE key = ?').run(key).changes > 0;
}

export function listSettings(): Record<string, unknown> {
  const db = getDb();
  const rows = db.prepare('SELECT key FROM settings ORDER BY key').all() as Array<{ key: string }>;
  const result: Record<string, unknown> = {};
  for (const { key } of rows) {
    result[key] = getSetting(key);
  }
  return result;
}

// === Sync log ===

export interface SyncLogParams {
  provider: string;
  action: string;
  note_id?: string;
  status: string;
  message?: string;
}

/** Append a sync log entry. Logging failures never propagate to the caller. */
export function appendSyncLog(params: SyncLogParams): void {
  const db = getDb();
  try {
    db.prepare(`
      INSERT INTO sync_log (timestamp, provider, action, note_id, status, message)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      new Date().toISOString(),
      params.provider,
      params.action,
      params.note_id ?? '',
      params.status,
      params.message ?? '',
    );
  } catch (error) {
    console.error(`Error writing sync log: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** Most recent entries first. */
export function getSyncLog(params: { provider?: string; limit?: number } = {}): SyncLogEntry[] {
  const db = getDb();
  const limit = params.limit ?? 50;

  if (params.provider) {
    return db
      .prepare('SELECT * FROM sync_log WHERE provider = ? ORDER BY id DESC LIMIT ?')
      .all(params.provider, limit) as SyncLogEntry[];
  }
  return db
    .prepare('SELECT * FROM sync_log ORDER BY id DESC LIMIT ?')
    .all(limit) as SyncLogEntry[];
}
