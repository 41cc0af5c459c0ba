import { createHash } from 'node:crypto';
import type { ChecklistItem } from '../types.js';

/** Fields that feed the content hash. */
export interface HashableNote {
  title: string;
  content: string;
  checklist_items: ChecklistItem[];
  pinned: boolean;
  archived: boolean;
}

/**
 * Fingerprint of a note's mutable content, used to detect local changes
 * without comparing every field. Checklist item ids are left out so that a
 * remote copy with its own item ids hashes the same as the local note.
 */
export function contentHash(note: HashableNote): string {
  const items = JSON.stringify(
    note.checklist_items.map((item) => ({ text: item.text, checked: item.checked })),
  );
  const material = `${note.title}|${note.content}|${items}|${note.pinned}|${note.archived}`;
  return createHash('md5').update(material).digest('hex');
}

/** Labels with duplicates and blanks removed, first occurrence wins. */
export function normalizeLabels(labels: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of labels) {
    const name = raw.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    result.push(name);
  }
  return result;
}

/**
 * Whether two notes differ in any field that a remote copy carries.
 * Labels compare as case-insensitive sets, the way Keep matches label names.
 */
export function syncedFieldsDiffer(
  a: HashableNote & { labels: string[]; color: string; trashed: boolean },
  b: HashableNote & { labels: string[]; color: string; trashed: boolean },
): boolean {
  if (contentHash(a) !== contentHash(b)) return true;
  if (a.color !== b.color || a.trashed !== b.trashed) return true;
  const left = normalizeLabels(a.labels.map((l) => l.toLowerCase())).sort();
  const right = normalizeLabels(b.labels.map((l) => l.toLowerCase())).sort();
  return JSON.stringify(left) !== JSON.stringify(right);
}
