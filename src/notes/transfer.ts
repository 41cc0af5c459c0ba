/**
 * Export / import of the note store as a JSON document.
 *
 * The document is `{ version, exported_at, notes, labels }` with every note
 * serialized in full (ISO-8601 timestamps, lowercase enum values). It is the
 * interchange format for manual backups and the payload the file-backup
 * provider stores remotely.
 *
 * Import validates with zod, regenerates note ids and drops all sync links,
 * so imported notes start out local_only. Google Takeout Keep exports (one
 * note object per file, or an array of them) are accepted as well.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { getDb } from '../db/connection.js';
import { ensureLabels, getAllNotes, listLabels, saveNote } from '../db/queries.js';
import { buildNote } from './note.js';
import { contentHash } from './hash.js';
import { EXPORT_VERSION, NOTE_TYPES, SYNC_STATUSES, type Label, type Note } from '../types.js';

const ChecklistItemSchema = z.object({
  id: z.string().optional(),
  text: z.string().default(''),
  checked: z.boolean().default(false),
});

export const NoteRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  content: z.string().default(''),
  note_type: z.enum(NOTE_TYPES).default('note'),
  checklist_items: z.array(ChecklistItemSchema).default([]),
  labels: z.array(z.string()).default([]),
  pinned: z.boolean().default(false),
  archived: z.boolean().default(false),
  trashed: z.boolean().default(false),
  color: z.string().nullable().default(''),
  remote_id: z.string().nullable().optional(),
  keep_id: z.string().nullable().optional(),
  sync_status: z.enum(SYNC_STATUSES).default('local_only'),
  local_modified: z.string().nullable().optional(),
  remote_modified: z.string().nullable().optional(),
  content_hash: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type NoteRecord = z.infer<typeof NoteRecordSchema>;

export const LabelRecordSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
  color: z.string().nullable().default(''),
  remote_id: z.string().nullable().optional(),
  keep_id: z.string().nullable().optional(),
});

export type LabelRecord = z.infer<typeof LabelRecordSchema>;

export const ExportDocumentSchema = z.object({
  version: z.number().int().default(EXPORT_VERSION),
  exported_at: z.string().optional(),
  synced_at: z.string().optional(),
  notes: z.array(NoteRecordSchema).default([]),
  labels: z.array(LabelRecordSchema).default([]),
});

export type ExportDocument = z.infer<typeof ExportDocumentSchema>;

const TakeoutNoteSchema = z.object({
  title: z.string().default(''),
  textContent: z.string().default(''),
  listContent: z
    .array(z.object({ text: z.string().default(''), isChecked: z.boolean().default(false) }))
    .optional(),
  labels: z.array(z.object({ name: z.string().default('') })).optional(),
  color: z.string().optional(),
  isPinned: z.boolean().default(false),
  isArchived: z.boolean().default(false),
  isTrashed: z.boolean().default(false),
  createdTimestampUsec: z.number().optional(),
});

type TakeoutNote = z.infer<typeof TakeoutNoteSchema>;

// === Serialization ===

export function noteToRecord(note: Note): NoteRecord {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    note_type: note.note_type,
    checklist_items: note.checklist_items.map((i) => ({ id: i.id, text: i.text, checked: i.checked })),
    labels: note.labels,
    pinned: note.pinned,
    archived: note.archived,
    trashed: note.trashed,
    color: note.color,
    remote_id: note.remote_id,
    sync_status: note.sync_status,
    local_modified: note.local_modified,
    remote_modified: note.remote_modified,
    content_hash: note.content_hash,
    created_at: note.created_at,
    updated_at: note.updated_at,
  };
}

export function labelToRecord(label: Label): LabelRecord {
  return { id: label.id, name: label.name, color: label.color, remote_id: label.remote_id };
}

/** Rebuild a Note from a record, keeping its id and timestamps. */
export function recordToNote(record: NoteRecord): Note {
  const now = new Date().toISOString();
  const note: Note = {
    id: record.id,
    title: record.title,
    content: record.note_type === 'checklist' ? '' : record.content,
    note_type: record.note_type,
    checklist_items: record.checklist_items.map((i) => ({
      id: i.id ?? randomUUID(),
      text: i.text,
      checked: i.checked,
    })),
    labels: record.labels,
    pinned: record.pinned,
    archived: record.archived,
    trashed: record.trashed,
    color: record.color ?? '',
    remote_id: record.remote_id ?? record.keep_id ?? null,
    sync_status: record.sync_status,
    local_modified: record.local_modified ?? null,
    remote_modified: record.remote_modified ?? null,
    content_hash: '',
    created_at: record.created_at ?? now,
    updated_at: record.updated_at ?? now,
  };
  note.content_hash = contentHash(note);
  return note;
}

/** Build the export document from the current store contents. */
export function exportDocument(notes: Note[] = getAllNotes(), labels: Label[] = listLabels()): ExportDocument {
  return {
    version: EXPORT_VERSION,
    exported_at: new Date().toISOString(),
    notes: notes.map(noteToRecord),
    labels: labels.map(labelToRecord),
  };
}

export function parseExportDocument(data: unknown): ExportDocument {
  return ExportDocumentSchema.parse(data);
}

// === Import ===

export interface ImportResult {
  imported: number;
  skipped: number;
  labels_added: number;
}

function isTakeoutShape(value: unknown): boolean {
  return typeof value === 'object' && value !== null && ('textContent' in value || 'listContent' in value);
}

function takeoutToNote(data: TakeoutNote): Note {
  const items = data.listContent ?? [];
  return buildNote({
    title: data.title,
    content: data.textContent,
    note_type: items.length > 0 ? 'checklist' : 'note',
    checklist_items: items.map((i) => ({ text: i.text, checked: i.isChecked })),
    labels: (data.labels ?? []).map((l) => l.name).filter((name) => name.length > 0),
    pinned: data.isPinned,
    archived: data.isArchived,
    trashed: data.isTrashed,
    color: data.color && data.color !== 'DEFAULT' ? data.color.toLowerCase() : '',
    created_at: data.createdTimestampUsec
      ? new Date(Math.floor(data.createdTimestampUsec / 1000)).toISOString()
      : undefined,
  });
}

/** A record imported as a brand new local note: fresh id, no links. */
function recordToImportedNote(record: NoteRecord): Note {
  const note = recordToNote(record);
  return {
    ...note,
    id: randomUUID(),
    remote_id: null,
    sync_status: 'local_only',
    remote_modified: null,
  };
}

/** Turn any accepted input shape into unsaved notes plus label names. */
export function collectImportNotes(data: unknown): { notes: Note[]; labels: string[]; skipped: number } {
  const notes: Note[] = [];
  const labels: string[] = [];
  let skipped = 0;

  const takeItem = (item: unknown): void => {
    if (isTakeoutShape(item)) {
      const parsed = TakeoutNoteSchema.safeParse(item);
      if (parsed.success) {
        notes.push(takeoutToNote(parsed.data));
      } else {
        skipped++;
      }
      return;
    }
    const parsed = NoteRecordSchema.safeParse(item);
    if (parsed.success) {
      notes.push(recordToImportedNote(parsed.data));
    } else {
      skipped++;
    }
  };

  if (Array.isArray(data)) {
    data.forEach(takeItem);
  } else if (isTakeoutShape(data)) {
    takeItem(data);
  } else {
    const doc = ExportDocumentSchema.parse(data);
    for (const record of doc.notes) {
      notes.push(recordToImportedNote(record));
    }
    labels.push(...doc.labels.map((l) => l.name));
  }

  for (const note of notes) {
    labels.push(...note.labels);
  }
  return { notes, labels, skipped };
}

/**
 * Import notes into the store. Returns counts; notes that fail validation are
 * skipped rather than aborting the import.
 */
export function importDocument(data: unknown): ImportResult {
  const { notes, labels, skipped } = collectImportNotes(data);
  const result: ImportResult = { imported: 0, skipped, labels_added: 0 };

  const db = getDb();
  const run = db.transaction(() => {
    result.labels_added = ensureLabels(labels);
    for (const note of notes) {
      if (saveNote(note)) {
        result.imported++;
      } else {
        result.skipped++;
      }
    }
  });
  run();

  return result;
}
