import { KEEP_COLORS, KeepApiClient, type KeepClient, type KeepLabel, type KeepNode, type KeepNodeDraft } from './keep-client.js';
import {
  attempt,
  errorMessage,
  fail,
  ok,
  type ConnectResult,
  type ProviderCredentials,
  type ProviderResult,
  type RemoteNote,
  type RemoteSnapshot,
  type SyncPhase,
  type SyncProvider,
} from './provider.js';
import type { Note } from '../types.js';

/**
 * Translate a Keep node into a RemoteNote. Label ids resolve through the
 * account's label list; ids with no known label are dropped.
 */
export function keepNodeToRemote(node: KeepNode, labels: KeepLabel[]): RemoteNote {
  const labelNames = new Map(labels.map((l) => [l.mainId, l.name]));
  const isList = node.type === 'LIST';

  return {
    remote_id: node.id,
    title: node.title,
    content: isList ? '' : node.text,
    note_type: isList ? 'checklist' : 'note',
    checklist_items: isList
      ? node.items.map((item) => ({ id: item.id, text: item.text, checked: item.checked }))
      : [],
    labels: node.labelIds.flatMap((id) => {
      const name = labelNames.get(id);
      return name ? [name] : [];
    }),
    pinned: node.isPinned,
    archived: node.isArchived,
    trashed: node.isTrashed,
    color: node.color === 'DEFAULT' ? '' : node.color.toLowerCase(),
    updated_at: node.updated,
    created_at: node.created,
  };
}

/** Keep only knows its own palette; anything else is sent as DEFAULT. */
function toKeepColor(color: string): string {
  const upper = color.toUpperCase();
  return KEEP_COLORS.find((c) => c === upper) ?? 'DEFAULT';
}

/** Translate a local note into a Keep node draft, creating labels as needed. */
export function noteToKeepDraft(note: Note, client: KeepClient): KeepNodeDraft {
  const isList = note.note_type === 'checklist';
  return {
    type: isList ? 'LIST' : 'NOTE',
    title: note.title,
    text: isList ? '' : note.content,
    items: isList ? note.checklist_items.map((i) => ({ text: i.text, checked: i.checked })) : [],
    labelIds: note.labels.map((name) => client.findOrCreateLabel(name).mainId),
    isPinned: note.pinned,
    isArchived: note.archived,
    isTrashed: note.trashed,
    color: toKeepColor(note.color),
  };
}

/**
 * Primary provider: a Keep-like notes service. Reads come from the client's
 * cache, so the orchestrator must call syncOnce('refresh') before reading and
 * syncOnce('commit') after writing.
 */
export class KeepProvider implements SyncProvider {
  readonly name = 'keep';
  readonly displayName = 'Google Keep';

  private connected = false;
  private email: string | null = null;

  constructor(private readonly client: KeepClient = new KeepApiClient()) {}

  get account(): string | null {
    return this.email;
  }

  async connect(credentials: ProviderCredentials): Promise<ConnectResult> {
    if (credentials.kind !== 'keep') {
      return { ok: false, message: `Keep expects keep credentials, got ${credentials.kind}` };
    }
    if (!credentials.email || !credentials.token) {
      return { ok: false, message: 'Keep needs an account email and a token' };
    }

    try {
      await this.client.authenticate(credentials.email, credentials.token);
    } catch (error) {
      this.connected = false;
      const message = errorMessage(error);
      if (message.includes('401') || message.includes('BadAuthentication')) {
        return { ok: false, message: 'Authentication failed: the Keep token was rejected' };
      }
      return { ok: false, message: `Authentication failed: ${message}` };
    }

    this.connected = true;
    this.email = credentials.email;
    return { ok: true, message: `Connected to Google Keep as ${credentials.email}` };
  }

  async disconnect(): Promise<void> {
    this.client.reset();
    this.connected = false;
    this.email = null;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async syncOnce(phase: SyncPhase): Promise<ProviderResult<void>> {
    return attempt(`Keep ${phase}`, () => this.client.sync());
  }

  async fetchRemoteSnapshot(): Promise<ProviderResult<RemoteSnapshot>> {
    let nodes: KeepNode[];
    let labels: KeepLabel[];
    try {
      nodes = this.client.all();
      labels = this.client.labels();
    } catch (error) {
      return fail(`Keep snapshot failed: ${errorMessage(error)}`);
    }

    const snapshot: RemoteSnapshot = { notes: [], failures: [] };
    for (const node of nodes) {
      try {
        snapshot.notes.push(keepNodeToRemote(node, labels));
      } catch (error) {
        snapshot.failures.push({ remote_id: node.id, message: errorMessage(error) });
      }
    }
    return ok(snapshot);
  }

  async createRemote(note: Note): Promise<ProviderResult<string>> {
    return attempt('Keep create', () => this.client.createNode(noteToKeepDraft(note, this.client)).id);
  }

  async updateRemote(remoteId: string, note: Note): Promise<ProviderResult<void>> {
    if (!this.client.get(remoteId)) {
      return fail(`Keep note ${remoteId} no longer exists`);
    }
    return attempt('Keep update', () => {
      this.client.updateNode(remoteId, noteToKeepDraft(note, this.client));
    });
  }

  async deleteRemote(remoteId: string): Promise<ProviderResult<void>> {
    return attempt('Keep delete', () => this.client.deleteNode(remoteId));
  }
}
