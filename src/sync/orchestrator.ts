/**
 * One sync cycle against one provider.
 *
 * Phases run strictly in order: guard, remote refresh, pull, push, commit
 * refresh, finalize. Pull is fully written to the store before push reads
 * its candidates, so a note flagged as a conflict is never pushed in the
 * same cycle. After the commit refresh the pushed notes pick up the
 * timestamps the backend assigned them. Anything thrown inside the cycle
 * becomes an `error` event and a sync log entry; the in-progress flag is
 * always released.
 */

import {
  appendSyncLog,
  getNote,
  getNoteByRemoteId,
  getNoteLink,
  deleteNoteLink,
  setSetting,
  getStringSetting,
  upsertNoteLink,
} from '../db/queries.js';
import { errorMessage, type SyncPhase, type SyncProvider } from '../providers/provider.js';
import type { SyncEvents } from './events.js';
import { isNewer, matchesRemote } from './merge.js';
import { adoptRemote, applyPull, parseConflictRemote } from './pull.js';
import { runPush } from './push.js';

export interface SyncStats {
  pulled: number;
  pushed: number;
  conflicts: number;
  errors: number;
}

export type SyncOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'completed'; stats: SyncStats }
  | { status: 'failed'; message: string; stats: SyncStats };

export type ConflictChoice = 'keep_local' | 'keep_remote';

export interface ActionResult {
  ok: boolean;
  message: string;
}

export function lastSyncKey(provider: string): string {
  return `last_sync:${provider}`;
}

export function formatStats(stats: SyncStats): string {
  return `${stats.pulled} pulled, ${stats.pushed} pushed, ${stats.conflicts} conflicts, ${stats.errors} errors`;
}

export class SyncOrchestrator {
  private inProgress = false;

  constructor(
    readonly provider: SyncProvider,
    private readonly events: SyncEvents,
  ) {}

  isSyncing(): boolean {
    return this.inProgress;
  }

  lastSync(): string | null {
    return getStringSetting(lastSyncKey(this.provider.name));
  }

  async sync(): Promise<SyncOutcome> {
    const name = this.provider.name;
    if (!this.provider.isConnected()) {
      return { status: 'skipped', reason: `${this.provider.displayName} is not connected` };
    }
    // Checked and set before the first await, so no second cycle can slip in
    if (this.inProgress) {
      return { status: 'skipped', reason: `A sync with ${this.provider.displayName} is already running` };
    }
    this.inProgress = true;

    const stats: SyncStats = { pulled: 0, pushed: 0, conflicts: 0, errors: 0 };
    try {
      this.events.emit('syncing', `Syncing with ${this.provider.displayName}...`, name);

      await this.exchange('refresh');

      const snapshot = await this.provider.fetchRemoteSnapshot();
      if (!snapshot.ok) {
        throw new Error(snapshot.message);
      }

      const pulled = applyPull(name, snapshot.value);
      stats.pulled = pulled.pulled;
      stats.conflicts = pulled.conflicts;
      stats.errors = pulled.errors;

      const pushed = await runPush(this.provider);
      stats.pushed = pushed.pushed;
      stats.errors += pushed.errors;

      await this.exchange('commit');
      if (pushed.remote_ids.length > 0) {
        await this.alignPushed(pushed.remote_ids);
      }

      const summary = formatStats(stats);
      setSetting(lastSyncKey(name), new Date().toISOString());
      appendSyncLog({ provider: name, action: 'sync', status: 'success', message: summary });
      this.events.emit('synced', `Synced with ${this.provider.displayName}: ${summary}`, name);
      return { status: 'completed', stats };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`Sync [${name}]: ${message}`);
      appendSyncLog({ provider: name, action: 'sync', status: 'error', message });
      this.events.emit('error', `Sync with ${this.provider.displayName} failed: ${message}`, name);
      return { status: 'failed', message, stats };
    } finally {
      this.inProgress = false;
    }
  }

  /**
   * Drop a note's link to this provider so it reads as local_only again.
   * With `deleteRemote` the remote copy is removed first; if that fails the
   * link is kept.
   */
  async unlink(noteId: string, options: { deleteRemote?: boolean } = {}): Promise<ActionResult> {
    const name = this.provider.name;
    const link = getNoteLink(noteId, name);
    if (!link) {
      return { ok: false, message: `Note ${noteId} is not linked to ${this.provider.displayName}` };
    }
    if (this.inProgress) {
      return { ok: false, message: `A sync with ${this.provider.displayName} is running; try again when it finishes` };
    }

    if (options.deleteRemote && link.remote_id) {
      if (!this.provider.isConnected()) {
        return { ok: false, message: `${this.provider.displayName} is not connected` };
      }
      this.inProgress = true;
      try {
        const deleted = await this.provider.deleteRemote(link.remote_id);
        if (!deleted.ok) {
          appendSyncLog({ provider: name, action: 'unlink', note_id: noteId, status: 'error', message: deleted.message });
          return { ok: false, message: deleted.message };
        }
        await this.exchange('commit');
      } catch (error) {
        const message = errorMessage(error);
        appendSyncLog({ provider: name, action: 'unlink', note_id: noteId, status: 'error', message });
        return { ok: false, message };
      } finally {
        this.inProgress = false;
      }
    }

    deleteNoteLink(noteId, name);
    const message = options.deleteRemote
      ? `Unlinked note and deleted it from ${this.provider.displayName}`
      : `Unlinked note from ${this.provider.displayName}`;
    appendSyncLog({ provider: name, action: 'unlink', note_id: noteId, status: 'success', message });
    return { ok: true, message };
  }

  /**
   * Clear a conflict. keep_local queues the local version to overwrite the
   * remote on the next push; keep_remote replaces the local content with the
   * remote version recorded when the conflict was flagged.
   */
  resolveConflict(noteId: string, choice: ConflictChoice): ActionResult {
    const name = this.provider.name;
    const link = getNoteLink(noteId, name);
    const note = getNote(noteId);
    if (!link || !note || link.sync_status !== 'conflict') {
      return { ok: false, message: `Note ${noteId} has no conflict with ${this.provider.displayName}` };
    }
    if (this.inProgress) {
      return { ok: false, message: `A sync with ${this.provider.displayName} is running; try again when it finishes` };
    }

    const remote = parseConflictRemote(link.conflict_remote);

    if (choice === 'keep_local') {
      upsertNoteLink({
        ...link,
        sync_status: 'pending_push',
        remote_modified: remote ? remote.updated_at : link.remote_modified,
        conflict_remote: null,
      });
    } else {
      if (!remote) {
        return { ok: false, message: 'The remote version of this conflict was not recorded; keep the local version instead' };
      }
      try {
        adoptRemote(name, remote, note);
      } catch (error) {
        return { ok: false, message: errorMessage(error) };
      }
    }

    const message = choice === 'keep_local' ? 'Kept local version' : 'Kept remote version';
    appendSyncLog({ provider: name, action: 'resolve_conflict', note_id: noteId, status: 'success', message });
    return { ok: true, message };
  }

  /**
   * Record the timestamps the backend gave the notes just pushed, so the
   * next pull does not read the backend's own write as a remote change.
   */
  private async alignPushed(remoteIds: string[]): Promise<void> {
    const name = this.provider.name;
    const snapshot = await this.provider.fetchRemoteSnapshot();
    if (!snapshot.ok) return;

    const byId = new Map(snapshot.value.notes.map((n) => [n.remote_id, n]));
    for (const remoteId of remoteIds) {
      const remote = byId.get(remoteId);
      const local = getNoteByRemoteId(name, remoteId);
      const link = local ? getNoteLink(local.id, name) : null;
      if (!remote || !local || !link || link.sync_status !== 'synced') continue;
      if (isNewer(remote.updated_at, link.remote_modified) && matchesRemote(local, remote)) {
        upsertNoteLink({ ...link, remote_modified: remote.updated_at });
      }
    }
  }

  private async exchange(phase: SyncPhase): Promise<void> {
    if (!this.provider.syncOnce) return;
    const result = await this.provider.syncOnce(phase);
    if (!result.ok) {
      throw new Error(result.message);
    }
  }
}
