import type { RestoreSecrets, SyncManager } from '../sync/manager.js';

/** What the sync-facing tools need from the running server. */
export interface ToolContext {
  manager: SyncManager;
  /** Environment/config credentials used when a tool call leaves them out. */
  secrets: RestoreSecrets;
  /** Start the provider's schedule after a successful connect. */
  autoSync: boolean;
}
