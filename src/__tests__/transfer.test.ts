import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { setupTestDb, teardownTestDb } from './helpers.js';
import { createNote, getAllNotes, getNote, listLabels, upsertNoteLink } from '../db/queries.js';
import { exportDocument, importDocument, parseExportDocument, recordToNote, noteToRecord } from '../notes/transfer.js';

beforeEach(() => {
  setupTestDb();
});

afterAll(() => {
  teardownTestDb();
});

function contents(): string[] {
  return getAllNotes()
    .map((n) => `${n.title}|${n.content}|${[...n.labels].sort().join(',')}`)
    .sort();
}

describe('exportDocument', () => {
  it('should serialize every note and label', () => {
    const note = createNote({ title: 'Groceries', content: 'milk, eggs', labels: ['home'] });
    upsertNoteLink({
      note_id: note.id,
      provider: 'keep',
      remote_id: 'rk1',
      sync_status: 'synced',
      remote_modified: '2024-01-01T00:00:00.000Z',
    });
    importDocument({ notes: [], labels: [{ name: 'home' }] });

    const doc = exportDocument();

    expect(doc.version).toBe(1);
    expect(doc.notes).toHaveLength(1);
    expect(doc.notes[0].title).toBe('Groceries');
    expect(doc.notes[0].remote_id).toBe('rk1');
    expect(doc.notes[0].sync_status).toBe('synced');
    expect(doc.labels.map((l) => l.name)).toEqual(['home']);
  });

  it('should survive a JSON round trip through the document schema', () => {
    const note = createNote({ title: 'List', checklist_items: [{ text: 'a' }, { text: 'b', checked: true }] });
    const parsed = parseExportDocument(JSON.parse(JSON.stringify(exportDocument())));

    const restored = recordToNote(parsed.notes[0]);
    expect(restored).toEqual(getNote(note.id));
    expect(noteToRecord(restored)).toEqual(parsed.notes[0]);
  });
});

describe('importDocument', () => {
  it('should reproduce the exported note contents in a fresh store', () => {
    createNote({ title: 'Groceries', content: 'milk, eggs', labels: ['home'] });
    createNote({ title: 'Trip', content: 'pack bags', labels: ['travel', 'summer'] });
    createNote({ title: 'Chores', checklist_items: [{ text: 'dishes' }] });
    const before = contents();
    const json = JSON.stringify(exportDocument());

    setupTestDb();
    const result = importDocument(JSON.parse(json));

    expect(result).toEqual({ imported: 3, skipped: 0, labels_added: 3 });
    expect(contents()).toEqual(before);
  });

  it('should give imported notes new ids and no links', () => {
    const original = createNote({ title: 'Groceries', content: 'milk, eggs' });
    upsertNoteLink({
      note_id: original.id,
      provider: 'keep',
      remote_id: 'rk1',
      sync_status: 'synced',
      remote_modified: '2024-01-01T00:00:00.000Z',
    });
    const doc = JSON.parse(JSON.stringify(exportDocument()));

    importDocument(doc);

    const copies = getAllNotes().filter((n) => n.id !== original.id);
    expect(copies).toHaveLength(1);
    expect(copies[0].title).toBe('Groceries');
    expect(copies[0].remote_id).toBeNull();
    expect(copies[0].sync_status).toBe('local_only');
  });

  it('should skip records that fail validation', () => {
    const result = importDocument([
      { id: 'n1', title: 'Valid', content: 'ok' },
      { id: '', title: 'No id' },
      { id: 'n3', pinned: 'yes' },
    ]);

    expect(result).toEqual({ imported: 1, skipped: 2, labels_added: 0 });
    expect(getAllNotes().map((n) => n.title)).toEqual(['Valid']);
  });

  it('should accept a Takeout note', () => {
    const result = importDocument({
      title: 'Takeout list',
      textContent: '',
      listContent: [
        { text: 'milk', isChecked: true },
        { text: 'eggs', isChecked: false },
      ],
      labels: [{ name: 'home' }],
      color: 'RED',
      isPinned: true,
      isArchived: false,
      isTrashed: false,
      createdTimestampUsec: 1700000000000000,
    });

    expect(result).toEqual({ imported: 1, skipped: 0, labels_added: 1 });
    const [note] = getAllNotes();
    expect(note.note_type).toBe('checklist');
    expect(note.checklist_items.map((i) => [i.text, i.checked])).toEqual([
      ['milk', true],
      ['eggs', false],
    ]);
    expect(note.labels).toEqual(['home']);
    expect(note.color).toBe('red');
    expect(note.pinned).toBe(true);
    expect(note.created_at).toBe('2023-11-14T22:13:20.000Z');
    expect(listLabels().map((l) => l.name)).toEqual(['home']);
  });

  it('should reject a document that is neither notes nor an export', () => {
    expect(() => importDocument({ notes: 'not a list' })).toThrow();
  });
});
