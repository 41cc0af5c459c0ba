/** A named-file store the file-backup provider keeps its document in. */
export interface StoredBlob {
  content: string;
  modifiedTime: string;
}

export interface BlobStore {
  /** Human-readable location, for messages. */
  readonly location: string;
  /** Prepare the store (find or create the backup folder). */
  open(): Promise<void>;
  read(name: string): Promise<StoredBlob | null>;
  write(name: string, content: string): Promise<void>;
}
