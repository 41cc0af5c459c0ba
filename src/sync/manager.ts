/**
 * Sync manager: the object the outer surface talks to.
 *
 * Owns the provider registry, one orchestrator and one scheduler per
 * provider, and the event hub. The primary provider (`keep`) runs on its own
 * schedule; among the backup providers one is *active* (persisted as the
 * `cloud_provider` setting) and is the target of "sync now".
 */

import {
  appendSyncLog,
  deleteSetting,
  getBooleanSetting,
  getNumberSetting,
  getStringSetting,
  setSetting,
} from '../db/queries.js';
import type { ConnectResult, ProviderCredentials } from '../providers/provider.js';
import type { ProviderRegistry } from '../providers/registry.js';
import { PRIMARY_PROVIDER } from '../types.js';
import { SyncEvents } from './events.js';
import { SyncOrchestrator, type ActionResult, type ConflictChoice, type SyncOutcome } from './orchestrator.js';
import { SyncScheduler } from './scheduler.js';

export const DEFAULT_PRIMARY_INTERVAL = 5;
export const DEFAULT_BACKUP_INTERVAL = 15;

export const SETTING_KEYS = {
  activeProvider: 'cloud_provider',
  primaryAutoSync: 'auto_sync',
  primaryInterval: 'sync_interval',
  backupAutoSync: 'cloud_auto_sync',
  backupInterval: 'cloud_sync_interval',
  keepEmail: 'keep_email',
  keepToken: 'keep_token',
  gdriveFolder: 'gdrive_folder',
  backupFolder: 'backup_folder',
  githubRepo: 'github_repo',
  githubRemoteUrl: 'github_remote_url',
  githubClonePath: 'github_clone_path',
} as const;

/** Tokens that are not persisted and must come from the environment or config on restore. */
export interface RestoreSecrets {
  keepEmail?: string;
  keepToken?: string;
  githubToken?: string;
  gdriveAccessToken?: string;
}

export interface ProviderStatus {
  name: string;
  display_name: string;
  connected: boolean;
  active: boolean;
  syncing: boolean;
  auto_sync: boolean;
  interval_minutes: number | null;
  last_sync: string | null;
}

export interface SyncManagerOptions {
  registry: ProviderRegistry;
  events?: SyncEvents;
  primaryIntervalMinutes?: number;
  backupIntervalMinutes?: number;
}

export class SyncManager {
  readonly registry: ProviderRegistry;
  readonly events: SyncEvents;

  private readonly orchestrators = new Map<string, SyncOrchestrator>();
  private readonly schedulers = new Map<string, SyncScheduler>();
  private readonly primaryInterval: number | undefined;
  private readonly backupInterval: number | undefined;

  constructor(options: SyncManagerOptions) {
    this.registry = options.registry;
    this.events = options.events ?? new SyncEvents();
    this.primaryInterval = options.primaryIntervalMinutes;
    this.backupInterval = options.backupIntervalMinutes;
  }

  orchestrator(name: string): SyncOrchestrator {
    const existing = this.orchestrators.get(name);
    if (existing) return existing;

    const provider = this.registry.get(name);
    if (!provider) {
      throw new Error(`Unknown provider "${name}". Known providers: ${this.registry.names().join(', ')}`);
    }
    const created = new SyncOrchestrator(provider, this.events);
    this.orchestrators.set(name, created);
    return created;
  }

  // === Connection ===

  async connect(name: string, credentials: ProviderCredentials, options: { persist?: boolean } = {}): Promise<ConnectResult> {
    const provider = this.orchestrator(name).provider;
    const result = await provider.connect(credentials);

    appendSyncLog({ provider: name, action: 'connect', status: result.ok ? 'success' : 'error', message: result.message });
    if (!result.ok) {
      this.events.emit('error', result.message, name);
      return result;
    }

    if (options.persist ?? true) {
      this.persistCredentials(credentials);
    }
    if (name !== PRIMARY_PROVIDER) {
      // The backup provider this one replaces stops syncing on its own
      const previous = this.getActiveProvider();
      if (previous && previous !== name) {
        this.stopAutoSync(previous);
      }
      setSetting(SETTING_KEYS.activeProvider, name);
    }
    this.events.emit('connected', result.message, name);
    return result;
  }

  async disconnect(name: string): Promise<ActionResult> {
    const provider = this.orchestrator(name).provider;
    this.stopAutoSync(name);
    await provider.disconnect();
    this.forgetCredentials(name);
    if (this.getActiveProvider() === name) {
      deleteSetting(SETTING_KEYS.activeProvider);
    }

    const message = `Disconnected from ${provider.displayName}`;
    appendSyncLog({ provider: name, action: 'disconnect', status: 'success', message });
    this.events.emit('disconnected', message, name);
    return { ok: true, message };
  }

  getActiveProvider(): string | null {
    const name = getStringSetting(SETTING_KEYS.activeProvider);
    return name && this.registry.has(name) ? name : null;
  }

  // === Sync ===

  /** Run one cycle. Without a name the active backup provider is used. */
  async sync(name?: string): Promise<SyncOutcome> {
    const target = name ?? this.getActiveProvider();
    if (!target) {
      return { status: 'skipped', reason: 'No backup provider is connected' };
    }
    return this.orchestrator(target).sync();
  }

  unlink(noteId: string, name: string, deleteRemote = false): Promise<ActionResult> {
    return this.orchestrator(name).unlink(noteId, { deleteRemote });
  }

  resolveConflict(noteId: string, name: string, choice: ConflictChoice): ActionResult {
    return this.orchestrator(name).resolveConflict(noteId, choice);
  }

  // === Scheduling ===

  intervalFor(name: string): number {
    if (name === PRIMARY_PROVIDER) {
      return this.primaryInterval ?? getNumberSetting(SETTING_KEYS.primaryInterval, DEFAULT_PRIMARY_INTERVAL);
    }
    return this.backupInterval ?? getNumberSetting(SETTING_KEYS.backupInterval, DEFAULT_BACKUP_INTERVAL);
  }

  autoSyncEnabled(name: string): boolean {
    const key = name === PRIMARY_PROVIDER ? SETTING_KEYS.primaryAutoSync : SETTING_KEYS.backupAutoSync;
    return getBooleanSetting(key, true);
  }

  startAutoSync(name: string, intervalMinutes?: number): SyncScheduler {
    const orchestrator = this.orchestrator(name);
    const interval = intervalMinutes ?? this.intervalFor(name);
    let scheduler = this.schedulers.get(name);
    if (!scheduler) {
      scheduler = new SyncScheduler(() => orchestrator.sync(), interval, name);
      this.schedulers.set(name, scheduler);
    }
    scheduler.start(interval);
    return scheduler;
  }

  stopAutoSync(name: string): void {
    this.schedulers.get(name)?.stop();
  }

  /** Start schedules for the connected primary provider and the active backup provider. */
  startConfiguredSchedules(): string[] {
    const started: string[] = [];
    const candidates = [PRIMARY_PROVIDER, this.getActiveProvider()];
    for (const name of candidates) {
      if (!name || !this.registry.has(name)) continue;
      const provider = this.orchestrator(name).provider;
      if (!provider.isConnected() || !this.autoSyncEnabled(name)) continue;
      this.startAutoSync(name);
      started.push(name);
    }
    return started;
  }

  // === Restore / status / shutdown ===

  /**
   * Reconnect providers from persisted settings. Tokens that are not stored
   * come from `secrets`. Returns one entry per attempted connection.
   */
  async restore(secrets: RestoreSecrets = {}): Promise<Array<{ provider: string } & ConnectResult>> {
    const attempts: Array<{ name: string; credentials: ProviderCredentials }> = [];

    const keepEmail = getStringSetting(SETTING_KEYS.keepEmail) ?? secrets.keepEmail;
    const keepToken = getStringSetting(SETTING_KEYS.keepToken) ?? secrets.keepToken;
    if (this.registry.has(PRIMARY_PROVIDER) && keepEmail && keepToken) {
      attempts.push({ name: PRIMARY_PROVIDER, credentials: { kind: 'keep', email: keepEmail, token: keepToken } });
    }

    const active = this.getActiveProvider();
    const backup = active ? this.backupCredentials(active, secrets) : null;
    if (active && backup) {
      attempts.push({ name: active, credentials: backup });
    }

    const results: Array<{ provider: string } & ConnectResult> = [];
    for (const { name, credentials } of attempts) {
      const result = await this.connect(name, credentials, { persist: false });
      results.push({ provider: name, ...result });
    }
    return results;
  }

  status(): ProviderStatus[] {
    const active = this.getActiveProvider();
    return this.registry.list().map((provider) => {
      const orchestrator = this.orchestrator(provider.name);
      const scheduler = this.schedulers.get(provider.name);
      const scheduled = scheduler ? scheduler.isRunning() : false;
      return {
        name: provider.name,
        display_name: provider.displayName,
        connected: provider.isConnected(),
        active: provider.name === active,
        syncing: orchestrator.isSyncing(),
        auto_sync: scheduled,
        interval_minutes: scheduler && scheduled ? scheduler.intervalMinutes : null,
        last_sync: orchestrator.lastSync(),
      };
    });
  }

  /** Stop every schedule. In-flight cycles finish on their own. */
  shutdown(): void {
    for (const scheduler of this.schedulers.values()) {
      scheduler.stop();
    }
  }

  private backupCredentials(name: string, secrets: RestoreSecrets): ProviderCredentials | null {
    if (name === 'github') {
      const repo = getStringSetting(SETTING_KEYS.githubRepo);
      const remoteUrl = getStringSetting(SETTING_KEYS.githubRemoteUrl) ?? undefined;
      const clonePath = getStringSetting(SETTING_KEYS.githubClonePath) ?? undefined;
      if (!repo || (!secrets.githubToken && !remoteUrl)) return null;
      return { kind: 'github', repo, token: secrets.githubToken ?? '', remoteUrl, clonePath };
    }

    const folder = getStringSetting(SETTING_KEYS.backupFolder);
    if (folder) return { kind: 'folder', path: folder };
    if (secrets.gdriveAccessToken) {
      const folderName = getStringSetting(SETTING_KEYS.gdriveFolder) ?? undefined;
      return { kind: 'gdrive', accessToken: secrets.gdriveAccessToken, folderName };
    }
    return null;
  }

  private persistCredentials(credentials: ProviderCredentials): void {
    switch (credentials.kind) {
      case 'keep':
        setSetting(SETTING_KEYS.keepEmail, credentials.email);
        setSetting(SETTING_KEYS.keepToken, credentials.token);
        break;
      case 'gdrive':
        deleteSetting(SETTING_KEYS.backupFolder);
        if (credentials.folderName) setSetting(SETTING_KEYS.gdriveFolder, credentials.folderName);
        break;
      case 'folder':
        setSetting(SETTING_KEYS.backupFolder, credentials.path);
        break;
      case 'github':
        // The token is not stored; restore takes it from the environment
        setSetting(SETTING_KEYS.githubRepo, credentials.repo);
        if (credentials.remoteUrl) setSetting(SETTING_KEYS.githubRemoteUrl, credentials.remoteUrl);
        else deleteSetting(SETTING_KEYS.githubRemoteUrl);
        if (credentials.clonePath) setSetting(SETTING_KEYS.githubClonePath, credentials.clonePath);
        break;
    }
  }

  private forgetCredentials(name: string): void {
    const keys: string[] =
      name === PRIMARY_PROVIDER
        ? [SETTING_KEYS.keepEmail, SETTING_KEYS.keepToken]
        : name === 'github'
          ? [SETTING_KEYS.githubRepo, SETTING_KEYS.githubRemoteUrl, SETTING_KEYS.githubClonePath]
          : [SETTING_KEYS.gdriveFolder, SETTING_KEYS.backupFolder];
    for (const key of keys) {
      deleteSetting(key);
    }
  }
}
