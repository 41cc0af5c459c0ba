import { describe, it, expect } from 'vitest';
import { contentHash, normalizeLabels, syncedFieldsDiffer } from '../notes/hash.js';
import { applyEdit, buildNote } from '../notes/note.js';

describe('contentHash', () => {
  it('should be deterministic for unchanged content', () => {
    const note = buildNote({ title: 'Groceries', content: 'milk, eggs' });
    expect(contentHash(note)).toBe(contentHash({ ...note }));
    expect(note.content_hash).toBe(contentHash(note));
  });

  it('should change when a hashed field changes', () => {
    const note = buildNote({ title: 'Groceries', content: 'milk, eggs' });
    expect(contentHash({ ...note, title: 'Shopping' })).not.toBe(note.content_hash);
    expect(contentHash({ ...note, pinned: true })).not.toBe(note.content_hash);
  });

  it('should ignore checklist item ids', () => {
    const note = buildNote({ checklist_items: [{ text: 'milk', id: 'a' }] });
    const renumbered = { ...note, checklist_items: [{ id: 'b', text: 'milk', checked: false }] };
    expect(contentHash(renumbered)).toBe(note.content_hash);
  });
});

describe('normalizeLabels', () => {
  it('should trim, drop blanks and keep the first of each name', () => {
    expect(normalizeLabels([' work ', '', 'home', 'work', '  '])).toEqual(['work', 'home']);
  });
});

describe('syncedFieldsDiffer', () => {
  it('should compare labels as sets', () => {
    const a = buildNote({ title: 'T', labels: ['a', 'b'] });
    const b = { ...a, labels: ['b', 'a'] };
    expect(syncedFieldsDiffer(a, b)).toBe(false);
  });

  it('should ignore label case', () => {
    const a = buildNote({ title: 'T', labels: ['work', 'Home'] });
    expect(syncedFieldsDiffer(a, { ...a, labels: ['Work', 'home'] })).toBe(false);
    expect(syncedFieldsDiffer(a, { ...a, labels: ['Work'] })).toBe(true);
  });

  it('should notice color and trash changes', () => {
    const a = buildNote({ title: 'T' });
    expect(syncedFieldsDiffer(a, { ...a, color: 'red' })).toBe(true);
    expect(syncedFieldsDiffer(a, { ...a, trashed: true })).toBe(true);
  });
});

describe('buildNote', () => {
  it('should build a local-only plain note with defaults', () => {
    const note = buildNote({ title: 'Hello', content: 'World' }, '2024-05-01T00:00:00.000Z');

    expect(note.note_type).toBe('note');
    expect(note.sync_status).toBe('local_only');
    expect(note.remote_id).toBeNull();
    expect(note.labels).toEqual([]);
    expect(note.color).toBe('');
    expect(note.created_at).toBe('2024-05-01T00:00:00.000Z');
    expect(note.updated_at).toBe('2024-05-01T00:00:00.000Z');
  });

  it('should infer a checklist from items and clear the body', () => {
    const note = buildNote({ content: 'ignored', checklist_items: [{ text: 'milk' }, { text: 'eggs', checked: true }] });

    expect(note.note_type).toBe('checklist');
    expect(note.content).toBe('');
    expect(note.checklist_items.map((i) => [i.text, i.checked])).toEqual([
      ['milk', false],
      ['eggs', true],
    ]);
  });
});

describe('applyEdit', () => {
  it('should replace only the given fields and leave the original alone', () => {
    const original = buildNote({ title: 'Hello', content: 'World', labels: ['a'] });
    const edited = applyEdit(original, { content: 'There', labels: ['b', 'b'] });

    expect(edited.title).toBe('Hello');
    expect(edited.content).toBe('There');
    expect(edited.labels).toEqual(['b']);
    expect(edited.content_hash).toBe(contentHash(edited));
    expect(original.content).toBe('World');
  });

  it('should turn a note into a checklist when items are given', () => {
    const original = buildNote({ title: 'Todo', content: 'some text' });
    const edited = applyEdit(original, { checklist_items: [{ text: 'one' }] });

    expect(edited.note_type).toBe('checklist');
    expect(edited.content).toBe('');
    expect(edited.checklist_items).toHaveLength(1);
  });

  it('should turn an emptied checklist back into a plain note', () => {
    const original = buildNote({ checklist_items: [{ text: 'one' }] });
    const edited = applyEdit(original, { checklist_items: [], content: 'plain again' });

    expect(edited.note_type).toBe('note');
    expect(edited.checklist_items).toEqual([]);
    expect(edited.content).toBe('plain again');
  });
});
