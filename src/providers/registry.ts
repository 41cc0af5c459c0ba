import { FileBackupProvider } from './backup.js';
import { GitHostedProvider } from './github.js';
import { KeepProvider } from './keep.js';
import type { SyncProvider } from './provider.js';

/**
 * Provider registry. Constructed once at startup and handed to the sync
 * manager; there is no module-level provider map.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, SyncProvider>();

  constructor(providers: SyncProvider[] = []) {
    for (const p of providers) {
      this.register(p);
    }
  }

  register(provider: SyncProvider): void {
    if (this.providers.has(provider.name)) {
      throw new Error(`Provider "${provider.name}" is already registered`);
    }
    this.providers.set(provider.name, provider);
  }

  get(name: string): SyncProvider | null {
    return this.providers.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  list(): SyncProvider[] {
    return [...this.providers.values()];
  }
}

/** Registry with the three built-in backends: keep, gdrive and github. */
export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry([new KeepProvider(), new FileBackupProvider(), new GitHostedProvider()]);
}
