import { existsSync, mkdirSync, readFileSync, renameSync, statSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { BlobStore, StoredBlob } from './blob-store.js';

/**
 * BlobStore over a plain directory, e.g. a folder a desktop client keeps in
 * sync with a cloud drive. Writes go through a temp file and a rename so a
 * reader never sees half a document.
 */
export class FolderBlobStore implements BlobStore {
  readonly location: string;

  constructor(private readonly dir: string) {
    this.location = resolve(dir);
  }

  async open(): Promise<void> {
    if (!existsSync(this.location)) {
      mkdirSync(this.location, { recursive: true });
    }
  }

  async read(name: string): Promise<StoredBlob | null> {
    const path = join(this.location, name);
    if (!existsSync(path)) return null;
    return {
      content: readFileSync(path, 'utf-8'),
      modifiedTime: statSync(path).mtime.toISOString(),
    };
  }

  async write(name: string, content: string): Promise<void> {
    const path = join(this.location, name);
    const tmp = `${path}.tmp`;
    writeFileSync(tmp, content, 'utf-8');
    renameSync(tmp, path);
  }
}
