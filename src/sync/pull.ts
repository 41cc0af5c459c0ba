/**
 * Pull phase: apply a provider's remote snapshot to the local store.
 *
 * For each remote note the merge decision picks one of create, skip, align,
 * overwrite or conflict. Links left in `synced` state whose remote id is
 * missing from the snapshot move to `deleted_remote`; the local copy is
 * kept. Items the provider could not translate become per-note errors and
 * never abort the phase.
 *
 * Backup stores are shared between devices. A record this device has no link
 * for is first matched to a local note by its id or by the primary remote id
 * it carries, so the same note is never created twice.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  appendSyncLog,
  ensureLabels,
  getNote,
  getNoteByRemoteId,
  getNoteLink,
  listNoteLinks,
  requeueOtherLinks,
  saveNote,
  setLinkStatus,
  upsertNoteLink,
} from '../db/queries.js';
import { contentHash, normalizeLabels } from '../notes/hash.js';
import { errorMessage, type RemoteNote, type RemoteSnapshot } from '../providers/provider.js';
import { NOTE_TYPES, PRIMARY_PROVIDER, type Note } from '../types.js';
import { decidePull } from './merge.js';

export interface PullStats {
  pulled: number;
  conflicts: number;
  errors: number;
  deleted: number;
}

const RemoteNoteSchema = z.object({
  remote_id: z.string(),
  title: z.string(),
  content: z.string(),
  note_type: z.enum(NOTE_TYPES),
  checklist_items: z.array(z.object({ id: z.string(), text: z.string(), checked: z.boolean() })),
  labels: z.array(z.string()),
  pinned: z.boolean(),
  archived: z.boolean(),
  trashed: z.boolean(),
  color: z.string(),
  updated_at: z.string(),
  created_at: z.string(),
  primary_remote_id: z.string().optional(),
});

/** Decode the remote version stored on a conflicted link. */
export function parseConflictRemote(json: string | null): RemoteNote | null {
  if (!json) return null;
  try {
    const parsed = RemoteNoteSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Local note carrying the remote's content. With `base` the local id,
 * creation time and local_modified are kept; otherwise the note gets `id`,
 * or a fresh one.
 */
export function remoteToNote(remote: RemoteNote, base: Note | null, id?: string): Note {
  const isList = remote.note_type === 'checklist';
  const note: Note = {
    id: base ? base.id : (id ?? randomUUID()),
    title: remote.title,
    content: isList ? '' : remote.content,
    note_type: remote.note_type,
    checklist_items: isList ? remote.checklist_items.map((i) => ({ ...i })) : [],
    labels: normalizeLabels(remote.labels),
    pinned: remote.pinned,
    archived: remote.archived,
    trashed: remote.trashed,
    color: remote.color,
    remote_id: remote.remote_id,
    sync_status: 'synced',
    local_modified: base ? base.local_modified : null,
    remote_modified: remote.updated_at,
    content_hash: '',
    created_at: base ? base.created_at : remote.created_at,
    updated_at: new Date().toISOString(),
  };
  note.content_hash = contentHash(note);
  return note;
}

/**
 * Write the remote's content over `base` (or a new note) and mark the link
 * synced. Links to other providers are queued so the change reaches them too.
 */
export function adoptRemote(provider: string, remote: RemoteNote, base: Note | null, id?: string): Note {
  const saved = saveNote(remoteToNote(remote, base, id), { origin: 'sync' });
  if (!saved) {
    throw new Error(`Could not store remote note ${remote.remote_id}`);
  }
  if (base) {
    requeueOtherLinks(saved.id, provider);
  }
  ensureLabels(remote.labels);
  upsertNoteLink({
    note_id: saved.id,
    provider,
    remote_id: remote.remote_id,
    sync_status: 'synced',
    remote_modified: remote.updated_at,
    conflict_remote: null,
  });
  return saved;
}

/**
 * The local note an unlinked backup record stands for: the note whose id the
 * record carries, or the note linked to the same primary remote id. A note
 * already linked to another record of this provider is not a match.
 */
export function findCounterpart(provider: string, remote: RemoteNote): Note | null {
  if (provider === PRIMARY_PROVIDER) return null;
  const candidates = [
    getNote(remote.remote_id),
    remote.primary_remote_id ? getNoteByRemoteId(PRIMARY_PROVIDER, remote.primary_remote_id) : null,
  ];
  for (const candidate of candidates) {
    if (candidate && !getNoteLink(candidate.id, provider)) return candidate;
  }
  return null;
}

/** Record the primary remote id a backup record carries, unless a note already holds it. */
function attachPrimaryLink(provider: string, noteId: string, remote: RemoteNote): void {
  const primaryId = remote.primary_remote_id;
  if (provider === PRIMARY_PROVIDER || !primaryId) return;
  if (getNoteLink(noteId, PRIMARY_PROVIDER)?.remote_id || getNoteByRemoteId(PRIMARY_PROVIDER, primaryId)) return;

  // Nothing has been seen from the primary yet, so its next pull compares content
  upsertNoteLink({
    note_id: noteId,
    provider: PRIMARY_PROVIDER,
    remote_id: primaryId,
    sync_status: 'synced',
    remote_modified: null,
    conflict_remote: null,
  });
}

export function applyPull(provider: string, snapshot: RemoteSnapshot): PullStats {
  const stats: PullStats = { pulled: 0, conflicts: 0, errors: 0, deleted: 0 };
  const seen = new Set<string>();

  for (const remote of snapshot.notes) {
    seen.add(remote.remote_id);
    let local = getNoteByRemoteId(provider, remote.remote_id);
    let link = local ? getNoteLink(local.id, provider) : null;

    try {
      const counterpart = local ? null : findCounterpart(provider, remote);
      if (counterpart) {
        local = counterpart;
        link = upsertNoteLink({
          note_id: counterpart.id,
          provider,
          remote_id: remote.remote_id,
          sync_status: 'synced',
          remote_modified: null,
          conflict_remote: null,
        });
        appendSyncLog({ provider, action: 'pull_link', note_id: counterpart.id, status: 'success', message: remote.title });
      }

      const action = decidePull(local, link, remote);

      switch (action) {
        case 'create': {
          // Backup records are keyed by the id of the note that wrote them
          const reuseId = provider !== PRIMARY_PROVIDER && !getNote(remote.remote_id) ? remote.remote_id : undefined;
          const created = adoptRemote(provider, remote, null, reuseId);
          attachPrimaryLink(provider, created.id, remote);
          stats.pulled++;
          appendSyncLog({ provider, action: 'pull_create', note_id: created.id, status: 'success', message: remote.title });
          break;
        }

        case 'overwrite': {
          const updated = adoptRemote(provider, remote, local);
          attachPrimaryLink(provider, updated.id, remote);
          stats.pulled++;
          appendSyncLog({ provider, action: 'pull_update', note_id: updated.id, status: 'success', message: remote.title });
          break;
        }

        case 'align':
          if (local && link) {
            upsertNoteLink({ ...link, sync_status: 'synced', remote_modified: remote.updated_at, conflict_remote: null });
            attachPrimaryLink(provider, local.id, remote);
          }
          break;

        case 'conflict':
          if (local && link) {
            const entering = link.sync_status !== 'conflict';
            // remote_modified stays at the last common state so the remote keeps reading as newer
            upsertNoteLink({ ...link, sync_status: 'conflict', conflict_remote: JSON.stringify(remote) });
            if (entering) {
              stats.conflicts++;
              appendSyncLog({
                provider,
                action: 'pull_conflict',
                note_id: local.id,
                status: 'conflict',
                message: `Local and remote both changed: ${local.title}`,
              });
            }
          }
          break;

        case 'skip':
          // Remote is back (or readable again) and nothing changed on either side
          if (local && link && (link.sync_status === 'deleted_remote' || link.sync_status === 'error')) {
            setLinkStatus(local.id, provider, 'synced');
          }
          if (local) attachPrimaryLink(provider, local.id, remote);
          break;
      }
    } catch (error) {
      stats.errors++;
      const message = errorMessage(error);
      if (local) setLinkStatus(local.id, provider, 'error');
      appendSyncLog({ provider, action: 'pull_error', note_id: local?.id, status: 'error', message });
    }
  }

  for (const failure of snapshot.failures) {
    seen.add(failure.remote_id);
    stats.errors++;
    const local = getNoteByRemoteId(provider, failure.remote_id);
    if (local) setLinkStatus(local.id, provider, 'error');
    appendSyncLog({
      provider,
      action: 'pull_error',
      note_id: local?.id,
      status: 'error',
      message: `${failure.remote_id}: ${failure.message}`,
    });
  }

  for (const link of listNoteLinks(provider)) {
    if (link.sync_status !== 'synced' || !link.remote_id || seen.has(link.remote_id)) continue;
    setLinkStatus(link.note_id, provider, 'deleted_remote');
    stats.deleted++;
    appendSyncLog({
      provider,
      action: 'pull_deleted',
      note_id: link.note_id,
      status: 'deleted_remote',
      message: `Remote note ${link.remote_id} is gone; local copy kept`,
    });
  }

  return stats;
}
