/**
 * Sync layer: pull / merge / push cycles per provider, their schedules,
 * and the manager that ties providers, schedules and events together.
 */

export { decidePull, isNewer, matchesRemote } from './merge.js';
export type { PullAction } from './merge.js';
export { applyPull, adoptRemote, remoteToNote, parseConflictRemote } from './pull.js';
export type { PullStats } from './pull.js';
export { runPush } from './push.js';
export type { PushStats } from './push.js';
export { SyncEvents } from './events.js';
export type { SyncListener } from './events.js';
export { SyncOrchestrator, formatStats, lastSyncKey } from './orchestrator.js';
export type { ActionResult, ConflictChoice, SyncOutcome, SyncStats } from './orchestrator.js';
export { SyncScheduler } from './scheduler.js';
export { SyncManager, SETTING_KEYS, DEFAULT_PRIMARY_INTERVAL, DEFAULT_BACKUP_INTERVAL } from './manager.js';
export type { ProviderStatus, RestoreSecrets, SyncManagerOptions } from './manager.js';
