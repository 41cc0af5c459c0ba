/**
 * SyncProvider interface. Abstracts over the remote backends notes are
 * mirrored to. Each implementation translates its backend's native records
 * into RemoteNote and back; nothing outside an implementation knows the
 * backend's format.
 *
 * Every method that talks to the backend returns a ProviderResult instead of
 * throwing. Exceptions are converted at this boundary.
 */
import type { ChecklistItem, Note, NoteType } from '../types.js';

/** A note as a remote backend holds it, in backend-neutral form. */
export interface RemoteNote {
  remote_id: string;
  title: string;
  content: string;
  note_type: NoteType;
  checklist_items: ChecklistItem[];
  labels: string[];
  pinned: boolean;
  archived: boolean;
  trashed: boolean;
  color: string;
  updated_at: string;
  created_at: string;
  /** Id of the same note on the primary provider, where a shared backup store records it. */
  primary_remote_id?: string;
}

export type ProviderResult<T> = { ok: true; value: T } | { ok: false; message: string };

/** A single remote item that could not be read or translated. */
export interface SnapshotFailure {
  remote_id: string;
  message: string;
}

export interface RemoteSnapshot {
  notes: RemoteNote[];
  failures: SnapshotFailure[];
}

export interface ConnectResult {
  ok: boolean;
  message: string;
}

export type SyncPhase = 'refresh' | 'commit';

export type ProviderCredentials =
  | { kind: 'keep'; email: string; token: string }
  | { kind: 'gdrive'; accessToken: string; folderName?: string }
  | { kind: 'folder'; path: string }
  | { kind: 'github'; token: string; repo: string; remoteUrl?: string; clonePath?: string };

export interface SyncProvider {
  /** Registry key, also used as the provider column of note links and logs. */
  readonly name: string;
  /** Human-readable name for messages */
  readonly displayName: string;

  connect(credentials: ProviderCredentials): Promise<ConnectResult>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  /**
   * Explicit exchange with the backend. Called with 'refresh' before the
   * snapshot is read and with 'commit' after pushes. Providers whose reads
   * and writes are immediately current leave this out.
   */
  syncOnce?(phase: SyncPhase): Promise<ProviderResult<void>>;

  fetchRemoteSnapshot(): Promise<ProviderResult<RemoteSnapshot>>;
  createRemote(note: Note): Promise<ProviderResult<string>>;
  updateRemote(remoteId: string, note: Note): Promise<ProviderResult<void>>;
  deleteRemote(remoteId: string): Promise<ProviderResult<void>>;
}

export function ok<T>(value: T): ProviderResult<T> {
  return { ok: true, value };
}

export function fail<T>(message: string): ProviderResult<T> {
  return { ok: false, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Run a backend call, turning any thrown error into a failed result. */
export async function attempt<T>(action: string, fn: () => Promise<T> | T): Promise<ProviderResult<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return fail(`${action} failed: ${errorMessage(error)}`);
  }
}
