/**
 * BlobStore over the Google Drive v3 REST API, using `fetch` with a
 * caller-supplied OAuth access token (scope drive.file). Files live in one
 * folder that is found by name or created on open().
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import type { BlobStore, StoredBlob } from './blob-store.js';

const API = 'https://www.googleapis.com/drive/v3/files';
const UPLOAD_API = 'https://www.googleapis.com/upload/drive/v3/files';
const FOLDER_MIME = 'application/vnd.google-apps.folder';

export const DEFAULT_DRIVE_FOLDER = 'KeepSync Notes Backup';

const FileListSchema = z.object({
  files: z
    .array(z.object({ id: z.string(), name: z.string(), modifiedTime: z.string().optional() }))
    .default([]),
});

const CreatedSchema = z.object({ id: z.string() });

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export class DriveBlobStore implements BlobStore {
  readonly location: string;

  private folderId: string | null = null;
  private readonly fileIds = new Map<string, string>();

  constructor(
    private readonly accessToken: string,
    private readonly folderName: string = DEFAULT_DRIVE_FOLDER,
  ) {
    this.location = `Google Drive/${folderName}`;
  }

  async open(): Promise<void> {
    const q = `name=${quote(this.folderName)} and mimeType='${FOLDER_MIME}' and trashed=false`;
    const found = await this.listFiles(q);
    if (found.length > 0) {
      this.folderId = found[0].id;
      return;
    }

    const response = await this.request(`${API}?fields=id`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: this.folderName, mimeType: FOLDER_MIME }),
    });
    this.folderId = CreatedSchema.parse(await response.json()).id;
  }

  async read(name: string): Promise<StoredBlob | null> {
    const folderId = this.requireFolder();
    const q = `name=${quote(name)} and ${quote(folderId)} in parents and trashed=false`;
    const files = await this.listFiles(q);
    if (files.length === 0) {
      this.fileIds.delete(name);
      return null;
    }

    const file = files[0];
    this.fileIds.set(name, file.id);
    const response = await this.request(`${API}/${encodeURIComponent(file.id)}?alt=media`, { method: 'GET' });
    return {
      content: await response.text(),
      modifiedTime: file.modifiedTime ?? new Date().toISOString(),
    };
  }

  async write(name: string, content: string): Promise<void> {
    const folderId = this.requireFolder();
    const existingId = this.fileIds.get(name);

    if (existingId) {
      await this.request(`${UPLOAD_API}/${encodeURIComponent(existingId)}?uploadType=media`, {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: content,
      });
      return;
    }

    const boundary = `keepsync-${randomBytes(8).toString('hex')}`;
    const metadata = JSON.stringify({ name, parents: [folderId] });
    const body =
      `--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${metadata}\r\n` +
      `--${boundary}\r\nContent-Type: application/json\r\n\r\n${content}\r\n` +
      `--${boundary}--`;

    const response = await this.request(`${UPLOAD_API}?uploadType=multipart&fields=id`, {
      method: 'POST',
      headers: { 'Content-Type': `multipart/related; boundary=${boundary}` },
      body,
    });
    this.fileIds.set(name, CreatedSchema.parse(await response.json()).id);
  }

  private requireFolder(): string {
    if (!this.folderId) {
      throw new Error('Drive folder not opened');
    }
    return this.folderId;
  }

  private async listFiles(q: string): Promise<Array<{ id: string; name: string; modifiedTime?: string }>> {
    const params = new URLSearchParams({
      q,
      spaces: 'drive',
      fields: 'files(id, name, modifiedTime)',
    });
    const response = await this.request(`${API}?${params.toString()}`, { method: 'GET' });
    return FileListSchema.parse(await response.json()).files;
  }

  private async request(
    url: string,
    init: { method: string; headers?: Record<string, string>; body?: string },
  ): Promise<Response> {
    const response = await fetch(url, {
      method: init.method,
      body: init.body,
      headers: { ...init.headers, Authorization: `Bearer ${this.accessToken}` },
    });
    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`Drive API error (${response.status}): ${errorBody}`);
    }
    return response;
  }
}
