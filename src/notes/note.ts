import { randomUUID } from 'node:crypto';
import { contentHash, normalizeLabels } from './hash.js';
import type { ChecklistItem, Note, NoteType } from '../types.js';

export interface NoteParams {
  title?: string;
  content?: string;
  note_type?: NoteType;
  checklist_items?: Array<{ text: string; checked?: boolean; id?: string }>;
  labels?: string[];
  pinned?: boolean;
  archived?: boolean;
  trashed?: boolean;
  color?: string;
  created_at?: string;
}

export function buildChecklistItems(
  items: Array<{ text: string; checked?: boolean; id?: string }>,
): ChecklistItem[] {
  return items.map((item) => ({
    id: item.id ?? randomUUID(),
    text: item.text,
    checked: item.checked ?? false,
  }));
}

/**
 * Build an unsaved local note with a fresh id.
 * A checklist note keeps its text in the items, so `content` is cleared.
 */
export function buildNote(params: NoteParams, now: string = new Date().toISOString()): Note {
  const items = buildChecklistItems(params.checklist_items ?? []);
  const noteType: NoteType = params.note_type ?? (items.length > 0 ? 'checklist' : 'note');

  const note: Note = {
    id: randomUUID(),
    title: params.title ?? '',
    content: noteType === 'checklist' ? '' : (params.content ?? ''),
    note_type: noteType,
    checklist_items: noteType === 'checklist' ? items : [],
    labels: normalizeLabels(params.labels ?? []),
    pinned: params.pinned ?? false,
    archived: params.archived ?? false,
    trashed: params.trashed ?? false,
    color: params.color ?? '',
    remote_id: null,
    sync_status: 'local_only',
    local_modified: null,
    remote_modified: null,
    content_hash: '',
    created_at: params.created_at ?? now,
    updated_at: now,
  };
  note.content_hash = contentHash(note);
  return note;
}

/**
 * A copy of `existing` with the given fields replaced. Passing checklist
 * items without a note type makes the note a checklist (or a plain note when
 * the list is empty). The original object is not touched.
 */
export function applyEdit(existing: Note, params: NoteParams): Note {
  const items = params.checklist_items ? buildChecklistItems(params.checklist_items) : existing.checklist_items;
  const noteType: NoteType =
    params.note_type ?? (params.checklist_items ? (items.length > 0 ? 'checklist' : 'note') : existing.note_type);

  const next: Note = {
    ...existing,
    title: params.title ?? existing.title,
    content: noteType === 'checklist' ? '' : (params.content ?? existing.content),
    note_type: noteType,
    checklist_items: noteType === 'checklist' ? items : [],
    labels: params.labels ? normalizeLabels(params.labels) : existing.labels,
    pinned: params.pinned ?? existing.pinned,
    archived: params.archived ?? existing.archived,
    trashed: params.trashed ?? existing.trashed,
    color: params.color ?? existing.color,
  };
  next.content_hash = contentHash(next);
  return next;
}
