import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { setupTestDb, silenceLogs, teardownTestDb } from './helpers.js';
import { FakeProvider } from './fake-provider.js';
import { createNote, getStringSetting, setSetting } from '../db/queries.js';
import { ProviderRegistry } from '../providers/registry.js';
import { SyncManager } from '../sync/manager.js';

describe('SyncManager', () => {
  let keep: FakeProvider;
  let backup: FakeProvider;
  let manager: SyncManager;

  function build(options: { primaryIntervalMinutes?: number } = {}): SyncManager {
    keep = new FakeProvider('keep', 'Fake Keep');
    backup = new FakeProvider('gdrive', 'Fake Drive');
    keep.connected = false;
    backup.connected = false;
    return new SyncManager({ registry: new ProviderRegistry([keep, backup]), ...options });
  }

  beforeEach(() => {
    setupTestDb();
    manager = build();
    silenceLogs();
  });

  afterEach(() => {
    manager.shutdown();
    vi.restoreAllMocks();
    teardownTestDb();
  });

  it('should skip "sync now" while no backup provider is active', async () => {
    expect(await manager.sync()).toEqual({ status: 'skipped', reason: 'No backup provider is connected' });
  });

  it('should make a connected backup provider the active one and persist its settings', async () => {
    const events: string[] = [];
    manager.events.subscribe((status, _message, provider) => {
      events.push(`${provider}:${status}`);
    });

    const result = await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });

    expect(result).toEqual({ ok: true, message: 'Connected to Fake Drive' });
    expect(manager.getActiveProvider()).toBe('gdrive');
    expect(getStringSetting('backup_folder')).toBe('/tmp/keepsync-backup');
    expect(events).toEqual(['gdrive:connected']);
  });

  it('should sync the active backup provider when no name is given', async () => {
    await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });
    createNote({ title: 'Groceries', content: 'milk, eggs' });

    const outcome = await manager.sync();

    expect(outcome).toEqual({
      status: 'completed',
      stats: { pulled: 0, pushed: 1, conflicts: 0, errors: 0 },
    });
    expect(backup.remote.size).toBe(1);
    expect(keep.remote.size).toBe(0);
  });

  it('should not change the active provider when the primary connects', async () => {
    await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });

    await manager.connect('keep', { kind: 'keep', email: 'user@example.com', token: 'test-secret' });

    expect(manager.getActiveProvider()).toBe('gdrive');
    expect(getStringSetting('keep_email')).toBe('user@example.com');
    expect(getStringSetting('keep_token')).toBe('test-secret');
  });

  it('should report a failed connection without persisting anything', async () => {
    backup.connectError = 'folder is read-only';
    const errors: string[] = [];
    manager.events.subscribe((status, message) => {
      if (status === 'error') errors.push(message);
    });

    const result = await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });

    expect(result).toEqual({ ok: false, message: 'folder is read-only' });
    expect(manager.getActiveProvider()).toBeNull();
    expect(getStringSetting('backup_folder')).toBeNull();
    expect(errors).toEqual(['folder is read-only']);
  });

  it('should forget settings and the active provider on disconnect', async () => {
    await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });

    const result = await manager.disconnect('gdrive');

    expect(result).toEqual({ ok: true, message: 'Disconnected from Fake Drive' });
    expect(backup.isConnected()).toBe(false);
    expect(manager.getActiveProvider()).toBeNull();
    expect(getStringSetting('backup_folder')).toBeNull();
  });

  it('should reject an unknown provider', async () => {
    await expect(manager.sync('nope')).rejects.toThrow('Unknown provider "nope". Known providers: keep, gdrive');
  });

  it('should reconnect saved providers on restore', async () => {
    await manager.connect('keep', { kind: 'keep', email: 'user@example.com', token: 'test-secret' });
    await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });

    // A new process over the same store
    manager = build();
    const results = await manager.restore();

    expect(results).toEqual([
      { provider: 'keep', ok: true, message: 'Connected to Fake Keep' },
      { provider: 'gdrive', ok: true, message: 'Connected to Fake Drive' },
    ]);
    expect(keep.credentials).toEqual([{ kind: 'keep', email: 'user@example.com', token: 'test-secret' }]);
    expect(backup.credentials).toEqual([{ kind: 'folder', path: '/tmp/keepsync-backup' }]);
  });

  it('should take unsaved tokens from the given secrets on restore', async () => {
    setSetting('cloud_provider', 'gdrive');

    const results = await manager.restore({ gdriveAccessToken: 'test-token' });

    expect(results).toEqual([{ provider: 'gdrive', ok: true, message: 'Connected to Fake Drive' }]);
    expect(backup.credentials).toEqual([{ kind: 'gdrive', accessToken: 'test-token', folderName: undefined }]);
  });

  it('should start schedules for connected providers with their intervals', async () => {
    await manager.connect('keep', { kind: 'keep', email: 'user@example.com', token: 'test-secret' });
    await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });

    expect(manager.startConfiguredSchedules()).toEqual(['keep', 'gdrive']);

    const status = manager.status();
    expect(status.map((s) => [s.name, s.connected, s.active, s.auto_sync, s.interval_minutes])).toEqual([
      ['keep', true, false, true, 5],
      ['gdrive', true, true, true, 15],
    ]);

    manager.shutdown();
    expect(manager.status().every((s) => !s.auto_sync)).toBe(true);
  });

  it('should stop the schedule of the backup provider that another one replaces', async () => {
    const github = new FakeProvider('github', 'Fake GitHub');
    github.connected = false;
    manager = new SyncManager({ registry: new ProviderRegistry([keep, backup, github]) });
    await manager.connect('gdrive', { kind: 'folder', path: '/tmp/keepsync-backup' });
    manager.startAutoSync('gdrive');

    await manager.connect('github', { kind: 'github', repo: 'owner/notes', token: 'test-token' });

    expect(manager.getActiveProvider()).toBe('github');
    expect(manager.status().map((s) => [s.name, s.active, s.auto_sync])).toEqual([
      ['keep', false, false],
      ['gdrive', false, false],
      ['github', true, false],
    ]);
  });

  it('should leave out providers whose auto sync is turned off', async () => {
    await manager.connect('keep', { kind: 'keep', email: 'user@example.com', token: 'test-secret' });
    setSetting('auto_sync', false);

    expect(manager.startConfiguredSchedules()).toEqual([]);
  });

  it('should prefer a configured interval over the stored setting', () => {
    setSetting('sync_interval', 10);
    expect(manager.intervalFor('keep')).toBe(10);

    manager = build({ primaryIntervalMinutes: 2 });
    expect(manager.intervalFor('keep')).toBe(2);
    expect(manager.intervalFor('gdrive')).toBe(15);
  });
});
