/**
 * Markdown-with-frontmatter representation of a note in the git-hosted store.
 *
 * One file per note at `notes/<remote id>.md`. Metadata lives in YAML
 * frontmatter, the body is the note text verbatim. Checklist items are kept
 * in frontmatter so their text and order survive a round trip exactly.
 *
 * SECURITY: files come from a shared repository. The id must be a plain
 * token (it becomes a path segment) and every field is validated with zod.
 */

import { randomUUID } from 'node:crypto';
import matter from 'gray-matter';
import { z } from 'zod';
import type { RemoteNote } from './provider.js';
import { NOTE_TYPES, type Note } from '../types.js';

export const SAFE_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

// YAML may hand timestamps back as Date objects
const Timestamp = z.union([z.string(), z.date().transform((d) => d.toISOString())]);

const NoteFrontmatterSchema = z.object({
  id: z.string().regex(SAFE_ID_RE, 'id must be a plain token'),
  title: z.coerce.string().default(''),
  type: z.enum(NOTE_TYPES).default('note'),
  labels: z.array(z.coerce.string()).default([]),
  pinned: z.boolean().default(false),
  archived: z.boolean().default(false),
  trashed: z.boolean().default(false),
  color: z.string().default(''),
  items: z
    .array(z.object({ text: z.coerce.string().default(''), checked: z.boolean().default(false) }))
    .default([]),
  keep_id: z.coerce.string().optional(),
  created_at: Timestamp,
  updated_at: Timestamp,
});

export function isSafeId(id: string): boolean {
  return SAFE_ID_RE.test(id);
}

export function noteFilePath(remoteId: string): string {
  return `notes/${remoteId}.md`;
}

export function noteToMarkdown(remoteId: string, note: Note): string {
  const isList = note.note_type === 'checklist';
  const fm: Record<string, unknown> = {
    id: remoteId,
    title: note.title,
    type: note.note_type,
    labels: note.labels,
    pinned: note.pinned,
    archived: note.archived,
    trashed: note.trashed,
    color: note.color,
  };
  if (isList) {
    fm.items = note.checklist_items.map((i) => ({ text: i.text, checked: i.checked }));
  }
  if (note.remote_id) {
    fm.keep_id = note.remote_id;
  }
  fm.created_at = note.created_at;
  fm.updated_at = note.updated_at;

  // One trailing newline is always added and always stripped on parse
  return matter.stringify(`${isList ? '' : note.content}\n`, fm);
}

export function parseNoteMarkdown(raw: string): RemoteNote {
  const { data, content } = matter(raw);
  const fm = NoteFrontmatterSchema.parse(data);
  const isList = fm.type === 'checklist';

  return {
    remote_id: fm.id,
    title: fm.title,
    content: isList ? '' : content.replace(/\r?\n$/, ''),
    note_type: fm.type,
    checklist_items: isList
      ? fm.items.map((i) => ({ id: randomUUID(), text: i.text, checked: i.checked }))
      : [],
    labels: fm.labels,
    pinned: fm.pinned,
    archived: fm.archived,
    trashed: fm.trashed,
    color: fm.color,
    created_at: fm.created_at,
    updated_at: fm.updated_at,
    primary_remote_id: fm.keep_id,
  };
}
