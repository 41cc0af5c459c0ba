/**
 * Sync cycle tests against an in-memory provider.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { setupTestDb, silenceLogs, teardownTestDb } from './helpers.js';
import { FakeProvider } from './fake-provider.js';
import {
  createNote,
  deleteNote,
  getNote,
  getNoteByRemoteId,
  getNoteLink,
  getSyncLog,
  saveNote,
  upsertNoteLink,
} from '../db/queries.js';
import { applyEdit } from '../notes/note.js';
import { SyncEvents } from '../sync/events.js';
import { SyncOrchestrator } from '../sync/orchestrator.js';
import { parseConflictRemote } from '../sync/pull.js';
import type { SyncEventStatus } from '../types.js';

const T1 = '2024-01-01T00:00:00.000Z';
const T3 = '2024-02-01T00:00:00.000Z';

describe('SyncOrchestrator', () => {
  let fake: FakeProvider;
  let events: SyncEvents;
  let orchestrator: SyncOrchestrator;
  let received: Array<[SyncEventStatus, string]>;

  beforeEach(() => {
    setupTestDb();
    fake = new FakeProvider();
    events = new SyncEvents();
    orchestrator = new SyncOrchestrator(fake, events);
    received = [];
    events.subscribe((status, message) => {
      received.push([status, message]);
    });
    silenceLogs();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    teardownTestDb();
  });

  describe('push', () => {
    it('should push a local-only note to an empty remote and mark it synced', async () => {
      const note = createNote({ title: 'Groceries', content: 'milk, eggs' });
      expect(note.sync_status).toBe('local_only');
      expect(note.remote_id).toBeNull();

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 1, conflicts: 0, errors: 0 },
      });
      const synced = getNote(note.id);
      expect(synced?.remote_id).toBe('fk1');
      expect(synced?.sync_status).toBe('synced');
      expect(fake.remote.get('fk1')?.title).toBe('Groceries');
      expect(fake.remote.get('fk1')?.content).toBe('milk, eggs');
      expect(fake.phases).toEqual(['refresh', 'commit']);
    });

    it('should adopt the timestamp the backend assigned to a pushed note', async () => {
      const note = createNote({ title: 'Groceries', content: 'milk, eggs' });
      await orchestrator.sync();

      const remote = fake.remote.get('fk1');
      expect(getNoteLink(note.id, 'keep')?.remote_modified).toBe(remote?.updated_at);
    });

    it('should count a failed note as an error and keep pushing the rest', async () => {
      const good = createNote({ title: 'Fine', content: 'ok' });
      const bad = createNote({ title: 'Broken', content: 'nope' });
      fake.failingTitles.add('Broken');

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 1, conflicts: 0, errors: 1 },
      });
      expect(getNoteLink(good.id, 'keep')?.sync_status).toBe('synced');
      expect(getNoteLink(bad.id, 'keep')).toBeNull();
      expect(getNote(bad.id)?.sync_status).toBe('local_only');

      const failed = getSyncLog({ provider: 'keep' }).find((e) => e.action === 'push_create' && e.status === 'error');
      expect(failed?.note_id).toBe(bad.id);
      expect(failed?.message).toBe('create rejected');
    });

    it('should retry a failed note on the next cycle', async () => {
      createNote({ title: 'Broken', content: 'nope' });
      fake.failingTitles.add('Broken');
      await orchestrator.sync();

      fake.failingTitles.clear();
      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 1, conflicts: 0, errors: 0 },
      });
    });

    it('should not push trashed notes', async () => {
      const note = createNote({ title: 'Old', content: 'gone' });
      deleteNote(note.id);

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 0, conflicts: 0, errors: 0 },
      });
      expect(fake.remote.size).toBe(0);
    });

    it('should leave a note pending when it changed while its push was in flight', async () => {
      const note = createNote({ title: 'Draft', content: 'v1' });
      fake.onWrite = (sent) => {
        deleteNote(sent.id);
      };

      await orchestrator.sync();

      const link = getNoteLink(note.id, 'keep');
      expect(link?.remote_id).toBe('fk1');
      expect(link?.sync_status).toBe('pending_push');
    });
  });

  describe('pull', () => {
    it('should create a local note for an unknown remote note', async () => {
      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'pack bags', updated_at: '2024-03-01T10:00:00.000Z' });

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 1, pushed: 0, conflicts: 0, errors: 0 },
      });
      const note = getNoteByRemoteId('keep', 'rk1');
      expect(note?.title).toBe('Trip');
      expect(note?.content).toBe('pack bags');
      expect(note?.remote_id).toBe('rk1');
      expect(note?.sync_status).toBe('synced');
      expect(note?.remote_modified).toBe('2024-03-01T10:00:00.000Z');
      expect(note?.created_at).toBe('2024-03-01T10:00:00.000Z');
      expect(note?.local_modified).toBeNull();
    });

    it('should overwrite an unedited local note when the remote is newer', async () => {
      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'pack bags', updated_at: T1 });
      await orchestrator.sync();
      const original = getNoteByRemoteId('keep', 'rk1');

      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'pack bags, passport', created_at: T1, updated_at: T3 });
      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 1, pushed: 0, conflicts: 0, errors: 0 },
      });
      const updated = getNoteByRemoteId('keep', 'rk1');
      expect(updated?.id).toBe(original?.id);
      expect(updated?.created_at).toBe(original?.created_at);
      expect(updated?.content).toBe('pack bags, passport');
      expect(updated?.remote_modified).toBe(T3);
      expect(updated?.sync_status).toBe('synced');
    });

    it('should queue the note for other providers when a pull changes it', async () => {
      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'pack bags', updated_at: T1 });
      await orchestrator.sync();
      const note = getNoteByRemoteId('keep', 'rk1');
      if (!note) throw new Error('rk1 was not pulled');
      upsertNoteLink({ note_id: note.id, provider: 'gdrive', remote_id: 'backup-1', sync_status: 'synced', remote_modified: T1 });

      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'pack bags, tent', updated_at: T3 });
      await orchestrator.sync();

      expect(getNote(note.id)?.content).toBe('pack bags, tent');
      expect(getNoteLink(note.id, 'gdrive')?.sync_status).toBe('pending_push');
      expect(getNoteLink(note.id, 'keep')?.sync_status).toBe('synced');
    });

    it('should keep local data when the remote timestamp is equal', async () => {
      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'pack bags', updated_at: T1 });
      await orchestrator.sync();

      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'rewritten', updated_at: T1 });
      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 0, conflicts: 0, errors: 0 },
      });
      expect(getNoteByRemoteId('keep', 'rk1')?.content).toBe('pack bags');
    });

    it('should mark a synced note deleted_remote when it disappears remotely', async () => {
      const note = createNote({ title: 'Groceries', content: 'milk, eggs' });
      await orchestrator.sync();

      fake.remote.delete('fk1');
      const outcome = await orchestrator.sync();

      expect(outcome.status).toBe('completed');
      const after = getNote(note.id);
      expect(after?.sync_status).toBe('deleted_remote');
      expect(after?.remote_id).toBe('fk1');
      expect(after?.title).toBe('Groceries');
      expect(after?.content).toBe('milk, eggs');
      expect(getSyncLog({ provider: 'keep' }).some((e) => e.action === 'pull_deleted' && e.note_id === note.id)).toBe(true);
    });

    it('should mark a note as error when its remote copy cannot be read, and recover once it can', async () => {
      const note = createNote({ title: 'Groceries', content: 'milk, eggs' });
      await orchestrator.sync();
      const stored = fake.remote.get('fk1');

      fake.remote.delete('fk1');
      fake.failures.push({ remote_id: 'fk1', message: 'unreadable' });
      const failed = await orchestrator.sync();

      expect(failed).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 0, conflicts: 0, errors: 1 },
      });
      expect(getNoteLink(note.id, 'keep')?.sync_status).toBe('error');

      fake.failures.length = 0;
      if (stored) fake.remote.set('fk1', stored);
      await orchestrator.sync();

      expect(getNoteLink(note.id, 'keep')?.sync_status).toBe('synced');
    });
  });

  describe('conflicts', () => {
    async function conflictedNote(): Promise<string> {
      fake.seed({ remote_id: 'rk2', title: 'Packing list', content: 'tent', updated_at: T1 });
      await orchestrator.sync();
      const local = getNoteByRemoteId('keep', 'rk2');
      if (!local) throw new Error('rk2 was not pulled');

      const edited = saveNote(applyEdit(local, { content: 'tent, stove' }));
      expect(edited?.sync_status).toBe('pending_push');

      fake.seed({ remote_id: 'rk2', title: 'Packing list', content: 'tent, rope', created_at: T1, updated_at: T3 });
      return local.id;
    }

    it('should flag a note edited on both sides as a conflict without touching local content', async () => {
      const id = await conflictedNote();

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 0, conflicts: 1, errors: 0 },
      });
      const note = getNote(id);
      expect(note?.sync_status).toBe('conflict');
      expect(note?.content).toBe('tent, stove');
      expect(note?.remote_modified).toBe(T1);
      expect(fake.remote.get('rk2')?.content).toBe('tent, rope');

      const link = getNoteLink(id, 'keep');
      expect(parseConflictRemote(link?.conflict_remote ?? null)?.content).toBe('tent, rope');
    });

    it('should count a conflict only in the cycle that found it', async () => {
      await conflictedNote();
      await orchestrator.sync();

      const again = await orchestrator.sync();

      expect(again).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 0, conflicts: 0, errors: 0 },
      });
    });

    it('should push the local version after keep_local', async () => {
      const id = await conflictedNote();
      await orchestrator.sync();

      const result = orchestrator.resolveConflict(id, 'keep_local');
      expect(result).toEqual({ ok: true, message: 'Kept local version' });
      expect(getNoteLink(id, 'keep')?.sync_status).toBe('pending_push');
      expect(getNoteLink(id, 'keep')?.remote_modified).toBe(T3);

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 1, conflicts: 0, errors: 0 },
      });
      expect(fake.remote.get('rk2')?.content).toBe('tent, stove');
      expect(getNote(id)?.sync_status).toBe('synced');
    });

    it('should take the recorded remote version after keep_remote', async () => {
      const id = await conflictedNote();
      await orchestrator.sync();

      const result = orchestrator.resolveConflict(id, 'keep_remote');
      expect(result).toEqual({ ok: true, message: 'Kept remote version' });

      const note = getNote(id);
      expect(note?.content).toBe('tent, rope');
      expect(note?.sync_status).toBe('synced');
      expect(note?.remote_modified).toBe(T3);
      expect(getNoteLink(id, 'keep')?.conflict_remote).toBeNull();

      const outcome = await orchestrator.sync();
      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 0, conflicts: 0, errors: 0 },
      });
    });

    it('should refuse to resolve a note that has no conflict', () => {
      const note = createNote({ title: 'Calm', content: 'nothing to see' });

      expect(orchestrator.resolveConflict(note.id, 'keep_local')).toEqual({
        ok: false,
        message: `Note ${note.id} has no conflict with Fake Keep`,
      });
    });
  });

  describe('idempotence', () => {
    it('should report nothing to do on a second cycle with no changes', async () => {
      createNote({ title: 'Groceries', content: 'milk, eggs' });
      createNote({ title: 'Chores', checklist_items: [{ text: 'dishes' }, { text: 'laundry', checked: true }] });
      fake.seed({ remote_id: 'rk1', title: 'Trip', content: 'pack bags', labels: ['travel'], updated_at: T1 });

      const first = await orchestrator.sync();
      expect(first).toEqual({
        status: 'completed',
        stats: { pulled: 1, pushed: 2, conflicts: 0, errors: 0 },
      });

      const second = await orchestrator.sync();
      expect(second).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 0, conflicts: 0, errors: 0 },
      });
    });
  });

  describe('cycle boundary', () => {
    it('should skip when the provider is not connected', async () => {
      fake.connected = false;

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({ status: 'skipped', reason: 'Fake Keep is not connected' });
      expect(received).toEqual([]);
    });

    it('should run at most one cycle at a time', async () => {
      let release: () => void = () => {};
      fake.gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = orchestrator.sync();
      expect(orchestrator.isSyncing()).toBe(true);

      const second = await orchestrator.sync();
      expect(second).toEqual({ status: 'skipped', reason: 'A sync with Fake Keep is already running' });

      release();
      const completed = await first;
      expect(completed.status).toBe('completed');
      expect(orchestrator.isSyncing()).toBe(false);
    });

    it('should turn a failed snapshot into an error event and release the guard', async () => {
      fake.snapshotError = 'backend unavailable';

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'failed',
        message: 'backend unavailable',
        stats: { pulled: 0, pushed: 0, conflicts: 0, errors: 0 },
      });
      expect(orchestrator.isSyncing()).toBe(false);
      expect(received).toEqual([
        ['syncing', 'Syncing with Fake Keep...'],
        ['error', 'Sync with Fake Keep failed: backend unavailable'],
      ]);
      const [entry] = getSyncLog({ provider: 'keep', limit: 1 });
      expect(entry.action).toBe('sync');
      expect(entry.status).toBe('error');
      expect(entry.message).toBe('backend unavailable');
      expect(orchestrator.lastSync()).toBeNull();
    });

    it('should fail the cycle and release the guard when the upload fails', async () => {
      createNote({ title: 'Groceries', content: 'milk, eggs' });
      fake.commitError = 'upload rejected';

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'failed',
        message: 'upload rejected',
        stats: { pulled: 0, pushed: 1, conflicts: 0, errors: 0 },
      });
      expect(fake.phases).toEqual(['refresh', 'commit']);
      expect(orchestrator.isSyncing()).toBe(false);
      expect(received).toEqual([
        ['syncing', 'Syncing with Fake Keep...'],
        ['error', 'Sync with Fake Keep failed: upload rejected'],
      ]);
      expect(orchestrator.lastSync()).toBeNull();

      fake.commitError = null;
      expect((await orchestrator.sync()).status).toBe('completed');
    });

    it('should record the last sync time and emit a summary on success', async () => {
      createNote({ title: 'Groceries', content: 'milk, eggs' });

      await orchestrator.sync();

      expect(orchestrator.lastSync()).not.toBeNull();
      expect(received).toEqual([
        ['syncing', 'Syncing with Fake Keep...'],
        ['synced', 'Synced with Fake Keep: 0 pulled, 1 pushed, 0 conflicts, 0 errors'],
      ]);
    });

    it('should keep syncing when a listener throws', async () => {
      events.subscribe(() => {
        throw new Error('listener broke');
      });

      const outcome = await orchestrator.sync();

      expect(outcome.status).toBe('completed');
      expect(received.map(([status]) => status)).toEqual(['syncing', 'synced']);
    });
  });

  describe('unlink', () => {
    it('should drop the link and delete the remote copy when asked', async () => {
      const note = createNote({ title: 'Groceries', content: 'milk, eggs' });
      await orchestrator.sync();

      const result = await orchestrator.unlink(note.id, { deleteRemote: true });

      expect(result).toEqual({ ok: true, message: 'Unlinked note and deleted it from Fake Keep' });
      expect(fake.remote.has('fk1')).toBe(false);
      expect(getNoteLink(note.id, 'keep')).toBeNull();
      expect(getNote(note.id)?.sync_status).toBe('local_only');
      expect(fake.phases.at(-1)).toBe('commit');
    });

    it('should push an unlinked note again as a new remote note', async () => {
      const note = createNote({ title: 'Groceries', content: 'milk, eggs' });
      await orchestrator.sync();
      await orchestrator.unlink(note.id, { deleteRemote: true });

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 0, pushed: 1, conflicts: 0, errors: 0 },
      });
      expect(getNote(note.id)?.remote_id).toBe('fk2');
    });

    it('should pull the kept remote copy back as a separate note after a plain unlink', async () => {
      const note = createNote({ title: 'Groceries', content: 'milk, eggs' });
      await orchestrator.sync();
      await orchestrator.unlink(note.id);

      const outcome = await orchestrator.sync();

      expect(outcome).toEqual({
        status: 'completed',
        stats: { pulled: 1, pushed: 1, conflicts: 0, errors: 0 },
      });
      expect(getNote(note.id)?.remote_id).toBe('fk2');
      expect(getNoteByRemoteId('keep', 'fk1')?.id).not.toBe(note.id);
    });

    it('should fail for a note that is not linked', async () => {
      const note = createNote({ title: 'Loose', content: '' });

      const result = await orchestrator.unlink(note.id);

      expect(result).toEqual({ ok: false, message: `Note ${note.id} is not linked to Fake Keep` });
    });
  });
});
