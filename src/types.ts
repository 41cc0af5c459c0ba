// === Note Types ===

export const NOTE_TYPES = ['note', 'checklist'] as const;

export type NoteType = (typeof NOTE_TYPES)[number];

// === Sync Status ===

export const SYNC_STATUSES = [
  'local_only',
  'synced',
  'pending_push',
  'pending_pull',
  'conflict',
  'deleted_remote',
  'error',
] as const;

export type SyncStatus = (typeof SYNC_STATUSES)[number];

// === Sync Events ===

export const SYNC_EVENT_STATUSES = [
  'connected',
  'disconnected',
  'syncing',
  'synced',
  'error',
] as const;

export type SyncEventStatus = (typeof SYNC_EVENT_STATUSES)[number];

// === Interfaces ===

export interface ChecklistItem {
  id: string;
  text: string;
  checked: boolean;
}

export interface Note {
  id: string;
  title: string;
  content: string;
  note_type: NoteType;
  checklist_items: ChecklistItem[];
  labels: string[];
  pinned: boolean;
  archived: boolean;
  trashed: boolean;
  color: string;
  /** Link to the primary provider (null when the note is not linked there). */
  remote_id: string | null;
  sync_status: SyncStatus;
  local_modified: string | null;
  remote_modified: string | null;
  content_hash: string;
  created_at: string;
  updated_at: string;
}

/** Row shape as stored in SQLite, joined with the primary provider's link. */
export interface NoteRow {
  id: string;
  title: string;
  content: string;
  note_type: string;
  checklist_items: string; // JSON array
  labels: string; // JSON array
  pinned: number;
  archived: number;
  trashed: number;
  color: string;
  local_modified: string | null;
  content_hash: string;
  created_at: string;
  updated_at: string;
  remote_id: string | null;
  sync_status: string | null;
  remote_modified: string | null;
}

/** Per-provider sync state of a note. */
export interface NoteLink {
  note_id: string;
  provider: string;
  remote_id: string | null;
  sync_status: SyncStatus;
  remote_modified: string | null;
  /** JSON of the remote version seen when a conflict was flagged. */
  conflict_remote: string | null;
  updated_at: string;
}

export interface NoteLinkRow {
  note_id: string;
  provider: string;
  remote_id: string | null;
  sync_status: string;
  remote_modified: string | null;
  conflict_remote: string | null;
  updated_at: string;
}

export interface Label {
  id: string;
  name: string;
  color: string;
  remote_id: string | null;
}

export interface SyncLogEntry {
  id: number;
  timestamp: string;
  provider: string;
  action: string;
  note_id: string;
  status: string;
  message: string;
}

// === Constants ===

/** Provider whose link state is projected onto Note.remote_id / sync_status. */
export const PRIMARY_PROVIDER = 'keep';

/** Version of the export/import document. */
export const EXPORT_VERSION = 1;

/** Link states that a local edit moves to pending_push. */
export const EDIT_REPENDING_STATUSES: SyncStatus[] = [
  'synced',
  'deleted_remote',
  'error',
  'pending_pull',
];

// === Helpers ===

export function rowToNote(row: NoteRow): Note {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    note_type: row.note_type === 'checklist' ? 'checklist' : 'note',
    checklist_items: JSON.parse(row.checklist_items),
    labels: JSON.parse(row.labels),
    pinned: row.pinned === 1,
    archived: row.archived === 1,
    trashed: row.trashed === 1,
    color: row.color,
    remote_id: row.remote_id,
    sync_status: toSyncStatus(row.sync_status),
    local_modified: row.local_modified,
    remote_modified: row.remote_modified,
    content_hash: row.content_hash,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToLink(row: NoteLinkRow): NoteLink {
  return {
    ...row,
    sync_status: toSyncStatus(row.sync_status),
  };
}

export function toSyncStatus(value: string | null): SyncStatus {
  return SYNC_STATUSES.find((s) => s === value) ?? 'local_only';
}
