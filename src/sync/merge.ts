/**
 * Pull-side merge decision for one remote note.
 *
 * The last remote timestamp this device has seen for a note is kept on its
 * link as `remote_modified`. A remote copy only counts as changed when its
 * `updated_at` is strictly later than that; equal timestamps keep the local
 * copy. A local edit counts as unsynced when `local_modified` is later than
 * `remote_modified`, or while the link waits to be pushed. When both sides
 * moved, the note is flagged as a conflict and neither side is dropped.
 */

import { syncedFieldsDiffer } from '../notes/hash.js';
import type { RemoteNote } from '../providers/provider.js';
import type { Note, NoteLink } from '../types.js';

export type PullAction =
  /** No local note is linked to this remote id. */
  | 'create'
  /** Remote is not newer than what was last seen. */
  | 'skip'
  /** Remote is newer but carries the same content: only record the timestamp. */
  | 'align'
  /** Remote is newer and the local copy has no unsynced edit. */
  | 'overwrite'
  /** Both sides changed since the last known common state. */
  | 'conflict';

/**
 * Whether timestamp `a` is strictly later than `b`. A missing `b` means
 * nothing has been seen yet. Unparseable values fall back to string order,
 * which matches time order for ISO-8601 UTC.
 */
export function isNewer(a: string | null, b: string | null): boolean {
  if (a === null) return false;
  if (b === null) return true;
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  if (Number.isNaN(ta) || Number.isNaN(tb)) return a > b;
  return ta > tb;
}

/** Whether the local note already holds exactly what the remote carries. */
export function matchesRemote(local: Note, remote: RemoteNote): boolean {
  return !syncedFieldsDiffer(local, remote);
}

export function decidePull(local: Note | null, link: NoteLink | null, remote: RemoteNote): PullAction {
  if (!local || !link) return 'create';

  if (!isNewer(remote.updated_at, link.remote_modified)) return 'skip';

  if (matchesRemote(local, remote)) return 'align';

  // A queued push or an open conflict is an unsynced local edit whatever the timestamps say
  if (
    link.sync_status === 'pending_push' ||
    link.sync_status === 'conflict' ||
    isNewer(local.local_modified, link.remote_modified)
  ) {
    return 'conflict';
  }

  return 'overwrite';
}
