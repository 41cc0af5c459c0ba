import { listLinksForNote } from '../db/queries.js';
import type { Note } from '../types.js';

const PREVIEW_LENGTH = 160;

/** Compact listing form: body text truncated, checklist shown as a count. */
export function noteSummary(note: Note): Record<string, unknown> {
  const summary: Record<string, unknown> = {
    id: note.id,
    title: note.title,
    note_type: note.note_type,
    labels: note.labels,
    pinned: note.pinned,
    archived: note.archived,
    sync_status: note.sync_status,
    updated_at: note.updated_at,
  };
  if (note.note_type === 'checklist') {
    const done = note.checklist_items.filter((i) => i.checked).length;
    summary.checklist = `${done}/${note.checklist_items.length} checked`;
  } else {
    summary.preview =
      note.content.length > PREVIEW_LENGTH ? `${note.content.slice(0, PREVIEW_LENGTH)}...` : note.content;
  }
  if (note.trashed) summary.trashed = true;
  return summary;
}

/** Full note plus its sync state on every provider it is linked to. */
export function noteDetail(note: Note): Record<string, unknown> {
  return {
    ...note,
    links: listLinksForNote(note.id).map((l) => ({
      provider: l.provider,
      remote_id: l.remote_id,
      sync_status: l.sync_status,
      remote_modified: l.remote_modified,
      has_conflict: l.sync_status === 'conflict',
    })),
  };
}
