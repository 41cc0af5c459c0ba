/**
 * Push phase: send local-only and pending notes to a provider.
 *
 * A note without a link (or without a remote id) is created remotely;
 * a linked one is updated. A failed note keeps its status and the phase
 * moves on to the next one. A note newly created on the primary provider is
 * queued for the backup providers, which record its primary remote id.
 */

import {
  appendSyncLog,
  getNote,
  getNoteLink,
  listPushCandidates,
  requeueOtherLinks,
  upsertNoteLink,
} from '../db/queries.js';
import { errorMessage, type SyncProvider } from '../providers/provider.js';
import { PRIMARY_PROVIDER } from '../types.js';

export interface PushStats {
  pushed: number;
  errors: number;
  /** Remote ids written this phase. */
  remote_ids: string[];
}

export async function runPush(provider: SyncProvider): Promise<PushStats> {
  const stats: PushStats = { pushed: 0, errors: 0, remote_ids: [] };

  for (const note of listPushCandidates(provider.name)) {
    const link = getNoteLink(note.id, provider.name);
    const remoteId = link?.remote_id ?? null;
    const action = remoteId ? 'push_update' : 'push_create';

    const recordFailure = (message: string): void => {
      stats.errors++;
      appendSyncLog({ provider: provider.name, action, note_id: note.id, status: 'error', message });
    };

    try {
      let sentId: string;
      if (remoteId) {
        const updated = await provider.updateRemote(remoteId, note);
        if (!updated.ok) {
          recordFailure(updated.message);
          continue;
        }
        sentId = remoteId;
      } else {
        const created = await provider.createRemote(note);
        if (!created.ok) {
          recordFailure(created.message);
          continue;
        }
        sentId = created.value;
      }

      stats.pushed++;
      stats.remote_ids.push(sentId);
      appendSyncLog({ provider: provider.name, action, note_id: note.id, status: 'success', message: note.title });

      // Permanently deleted while the request was in flight
      const current = getNote(note.id);
      if (!current) continue;

      // An edit that landed while the request was in flight still needs sending
      const editedMeanwhile = current.local_modified !== note.local_modified || current.trashed !== note.trashed;
      upsertNoteLink({
        note_id: note.id,
        provider: provider.name,
        remote_id: sentId,
        sync_status: editedMeanwhile ? 'pending_push' : 'synced',
        remote_modified: new Date().toISOString(),
        conflict_remote: null,
      });
      if (!remoteId && provider.name === PRIMARY_PROVIDER) {
        requeueOtherLinks(note.id, provider.name);
      }
    } catch (error) {
      recordFailure(errorMessage(error));
    }
  }

  return stats;
}
