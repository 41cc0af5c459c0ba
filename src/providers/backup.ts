import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { listLabels } from '../db/queries.js';
import { labelToRecord, noteToRecord, NoteRecordSchema, type NoteRecord } from '../notes/transfer.js';
import { EXPORT_VERSION, type Note } from '../types.js';
import type { BlobStore } from './blob-store.js';
import { DriveBlobStore } from './drive-store.js';
import { FolderBlobStore } from './folder-store.js';
import {
  attempt,
  errorMessage,
  fail,
  ok,
  type ConnectResult,
  type ProviderCredentials,
  type ProviderResult,
  type RemoteNote,
  type RemoteSnapshot,
  type SyncPhase,
  type SyncProvider,
} from './provider.js';

export const BACKUP_FILE_NAME = 'notes_backup.json';

export type BackupCredentials = Extract<ProviderCredentials, { kind: 'gdrive' | 'folder' }>;
export type BlobStoreFactory = (credentials: BackupCredentials) => BlobStore;

export function defaultStoreFactory(credentials: BackupCredentials): BlobStore {
  return credentials.kind === 'gdrive'
    ? new DriveBlobStore(credentials.accessToken, credentials.folderName)
    : new FolderBlobStore(credentials.path);
}

// Loose outer shape: individual records are validated one by one so a single
// bad record is reported instead of rejecting the whole document.
const BackupEnvelopeSchema = z.object({
  version: z.number().optional(),
  notes: z.array(z.unknown()).default([]),
});

interface WorkingCopy {
  /** Raw records keyed by remote id, in document order. */
  records: Map<string, unknown>;
  /** Fallback timestamp for records without one. */
  modifiedTime: string;
}

export function recordToRemote(record: NoteRecord, fallbackTime: string): RemoteNote {
  const isList = record.note_type === 'checklist';
  return {
    remote_id: record.id,
    title: record.title,
    content: isList ? '' : record.content,
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
    updated_at: record.updated_at ?? fallbackTime,
    created_at: record.created_at ?? record.updated_at ?? fallbackTime,
    primary_remote_id: record.keep_id ?? undefined,
  };
}

function recordKey(raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string' && raw.id) {
    return raw.id;
  }
  return `#${index}`;
}

/**
 * File-backup provider: the whole remote is one export document stored in a
 * BlobStore (a Google Drive folder, or a plain directory). refresh downloads
 * it into a working copy, writes edit the working copy, and commit uploads it
 * when anything changed.
 */
export class FileBackupProvider implements SyncProvider {
  readonly name: string;
  readonly displayName: string;

  private readonly storeFactory: BlobStoreFactory;
  private store: BlobStore | null = null;
  private working: WorkingCopy | null = null;
  /** Writes not yet uploaded, by remote id; null marks a deletion. */
  private readonly pending = new Map<string, unknown | null>();

  constructor(options: { name?: string; displayName?: string; storeFactory?: BlobStoreFactory } = {}) {
    this.name = options.name ?? 'gdrive';
    this.displayName = options.displayName ?? 'Google Drive';
    this.storeFactory = options.storeFactory ?? defaultStoreFactory;
  }

  get location(): string | null {
    return this.store ? this.store.location : null;
  }

  async connect(credentials: ProviderCredentials): Promise<ConnectResult> {
    if (credentials.kind !== 'gdrive' && credentials.kind !== 'folder') {
      return { ok: false, message: `${this.displayName} expects gdrive or folder credentials, got ${credentials.kind}` };
    }
    if (credentials.kind === 'gdrive' && !credentials.accessToken) {
      return { ok: false, message: `${this.displayName} needs an access token` };
    }

    const store = this.storeFactory(credentials);
    try {
      await store.open();
      // Reading once checks both access and that an existing backup parses
      this.working = await this.download(store);
    } catch (error) {
      this.store = null;
      this.working = null;
      this.pending.clear();
      return { ok: false, message: `Could not open ${store.location}: ${errorMessage(error)}` };
    }

    this.store = store;
    this.pending.clear();
    return { ok: true, message: `Connected to ${this.displayName} (${store.location})` };
  }

  async disconnect(): Promise<void> {
    this.store = null;
    this.working = null;
    this.pending.clear();
  }

  isConnected(): boolean {
    return this.store !== null;
  }

  async syncOnce(phase: SyncPhase): Promise<ProviderResult<void>> {
    const store = this.store;
    if (!store) return fail(`${this.displayName} is not connected`);

    if (phase === 'refresh') {
      return attempt(`${this.displayName} download`, async () => {
        const working = await this.download(store);
        // Edits whose upload failed are replayed over the fresh copy
        for (const [remoteId, record] of this.pending) {
          if (record === null) working.records.delete(remoteId);
          else working.records.set(remoteId, record);
        }
        this.working = working;
      });
    }

    if (this.pending.size === 0 || !this.working) return ok(undefined);
    const working = this.working;
    return attempt(`${this.displayName} upload`, async () => {
      const now = new Date().toISOString();
      const document = {
        version: EXPORT_VERSION,
        exported_at: now,
        synced_at: now,
        notes: [...working.records.values()],
        labels: listLabels().map(labelToRecord),
      };
      await store.write(BACKUP_FILE_NAME, JSON.stringify(document, null, 2));
      this.pending.clear();
    });
  }

  async fetchRemoteSnapshot(): Promise<ProviderResult<RemoteSnapshot>> {
    const working = this.working;
    if (!working) return fail(`${this.displayName} has no downloaded backup`);

    const snapshot: RemoteSnapshot = { notes: [], failures: [] };
    for (const [remoteId, raw] of working.records) {
      const parsed = NoteRecordSchema.safeParse(raw);
      if (parsed.success) {
        snapshot.notes.push(recordToRemote(parsed.data, working.modifiedTime));
      } else {
        snapshot.failures.push({ remote_id: remoteId, message: parsed.error.issues[0]?.message ?? 'invalid record' });
      }
    }
    return ok(snapshot);
  }

  async createRemote(note: Note): Promise<ProviderResult<string>> {
    const working = this.working;
    if (!working) return fail(`${this.displayName} has no downloaded backup`);
    this.put(working, note.id, this.toRecord(note.id, note));
    return ok(note.id);
  }

  async updateRemote(remoteId: string, note: Note): Promise<ProviderResult<void>> {
    const working = this.working;
    if (!working) return fail(`${this.displayName} has no downloaded backup`);
    if (!working.records.has(remoteId)) {
      return fail(`${this.displayName} note ${remoteId} no longer exists`);
    }
    this.put(working, remoteId, this.toRecord(remoteId, note));
    return ok(undefined);
  }

  async deleteRemote(remoteId: string): Promise<ProviderResult<void>> {
    const working = this.working;
    if (!working) return fail(`${this.displayName} has no downloaded backup`);
    if (working.records.delete(remoteId)) {
      this.pending.set(remoteId, null);
    }
    return ok(undefined);
  }

  private put(working: WorkingCopy, remoteId: string, record: NoteRecord): void {
    working.records.set(remoteId, record);
    this.pending.set(remoteId, record);
  }

  private toRecord(remoteId: string, note: Note): NoteRecord {
    // Link state is per device and stays out of the shared document; only
    // the primary remote id is shared, as the note's identity there
    return {
      ...noteToRecord(note),
      id: remoteId,
      remote_id: null,
      keep_id: note.remote_id,
      sync_status: 'synced',
      remote_modified: null,
    };
  }

  private async download(store: BlobStore): Promise<WorkingCopy> {
    const blob = await store.read(BACKUP_FILE_NAME);
    if (!blob) {
      return { records: new Map(), modifiedTime: new Date(0).toISOString() };
    }
    const envelope = BackupEnvelopeSchema.parse(JSON.parse(blob.content));
    const records = new Map<string, unknown>();
    envelope.notes.forEach((raw, index) => records.set(recordKey(raw, index), raw));
    return { records, modifiedTime: blob.modifiedTime };
  }
}
