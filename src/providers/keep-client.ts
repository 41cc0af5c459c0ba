/**
 * Client for the Keep notes API (`notes/v1/changes`).
 *
 * The API is a change-feed: every request uploads locally modified nodes and
 * downloads everything that changed since the last version token. The client
 * keeps a node cache that reads are served from, so reads are only current
 * after `sync()`, and writes only reach the server on the next `sync()`.
 *
 * Authentication takes an already-issued OAuth access token. Turning an
 * account login into that token happens outside this module.
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';

const API_URL = 'https://www.googleapis.com/notes/v1/changes';

/** Keep marks "not trashed / not deleted" with the epoch instead of omitting the field. */
export const KEEP_EPOCH = '1970-01-01T00:00:00.000Z';

export const KEEP_COLORS = [
  'DEFAULT', 'RED', 'ORANGE', 'YELLOW', 'GREEN', 'TEAL',
  'BLUE', 'CERULEAN', 'PURPLE', 'PINK', 'BROWN', 'GRAY',
] as const;

// === Native shapes ===

export interface KeepListItem {
  id: string;
  text: string;
  checked: boolean;
}

export interface KeepNode {
  id: string;
  type: 'NOTE' | 'LIST';
  title: string;
  text: string;
  items: KeepListItem[];
  labelIds: string[];
  isPinned: boolean;
  isArchived: boolean;
  isTrashed: boolean;
  color: string;
  created: string;
  updated: string;
}

export interface KeepLabel {
  mainId: string;
  name: string;
}

export interface KeepNodeDraft {
  type: 'NOTE' | 'LIST';
  title: string;
  text: string;
  items: Array<{ text: string; checked: boolean }>;
  labelIds: string[];
  isPinned: boolean;
  isArchived: boolean;
  isTrashed: boolean;
  color: string;
}

/** The operations KeepProvider needs from a Keep backend. */
export interface KeepClient {
  authenticate(email: string, token: string): Promise<void>;
  /** Upload pending changes and download remote ones. */
  sync(): Promise<void>;
  all(): KeepNode[];
  get(id: string): KeepNode | undefined;
  labels(): KeepLabel[];
  findOrCreateLabel(name: string): KeepLabel;
  createNode(draft: KeepNodeDraft): KeepNode;
  updateNode(id: string, draft: KeepNodeDraft): KeepNode;
  deleteNode(id: string): void;
  /** Drop credentials and the cache. */
  reset(): void;
}

// === Wire format ===

const TimestampsSchema = z.object({
  created: z.string().optional(),
  updated: z.string().optional(),
  trashed: z.string().optional(),
  deleted: z.string().optional(),
});

const RawNodeSchema = z.object({
  id: z.string(),
  parentId: z.string().optional(),
  type: z.string(),
  title: z.string().optional(),
  text: z.string().optional(),
  checked: z.boolean().optional(),
  sortValue: z.union([z.string(), z.number()]).optional(),
  serverId: z.string().optional(),
  timestamps: TimestampsSchema.optional(),
  isArchived: z.boolean().optional(),
  isPinned: z.boolean().optional(),
  color: z.string().optional(),
  labelIds: z
    .array(z.object({ labelId: z.string(), deleted: z.string().optional() }))
    .optional(),
});

type RawNode = z.infer<typeof RawNodeSchema>;

const RawLabelSchema = z.object({
  mainId: z.string(),
  name: z.string(),
  timestamps: TimestampsSchema.optional(),
});

type RawLabel = z.infer<typeof RawLabelSchema>;

const ChangesResponseSchema = z.object({
  toVersion: z.string().optional(),
  truncated: z.boolean().optional(),
  forceFullResync: z.boolean().optional(),
  nodes: z.array(RawNodeSchema).optional(),
  userInfo: z.object({ labels: z.array(RawLabelSchema).optional() }).optional(),
});

// === Helpers ===

function generateId(): string {
  return `${Date.now().toString(16)}.${randomBytes(8).readBigUInt64BE().toString()}`;
}

function isSet(timestamp: string | undefined): boolean {
  return timestamp !== undefined && timestamp !== KEEP_EPOCH && !timestamp.startsWith('1970-01-01');
}

function sortValueOf(node: RawNode): number {
  return Number(node.sortValue ?? 0);
}

/**
 * Keep notes API client over `fetch`.
 */
export class KeepApiClient implements KeepClient {
  private token: string | null = null;
  private version: string | undefined;
  private readonly sessionId = `s--${Date.now()}--${randomBytes(4).readUInt32BE()}`;
  private readonly nodes = new Map<string, RawNode>();
  private readonly labelMap = new Map<string, RawLabel>();
  private readonly dirtyNodes = new Set<string>();
  private readonly dirtyLabels = new Set<string>();

  constructor(private readonly apiUrl: string = API_URL) {}

  async authenticate(_email: string, token: string): Promise<void> {
    this.reset();
    this.token = token;
    try {
      await this.sync();
    } catch (error) {
      this.token = null;
      throw error;
    }
  }

  async sync(): Promise<void> {
    if (!this.token) {
      throw new Error('Not authenticated');
    }

    let first = true;
    for (;;) {
      const outgoing = first ? this.collectDirtyNodes() : [];
      const outgoingLabels = first ? this.collectDirtyLabels() : [];

      const body: Record<string, unknown> = {
        nodes: outgoing,
        clientTimestamp: new Date().toISOString(),
        requestHeader: {
          clientSessionId: this.sessionId,
          clientPlatform: 'ANDROID',
          clientVersion: { major: '9', minor: '9', build: '9', revision: '9' },
          capabilities: [{ type: 'NC' }, { type: 'PI' }, { type: 'LB' }, { type: 'AN' }],
        },
      };
      if (this.version) body.targetVersion = this.version;
      if (outgoingLabels.length > 0) body.userInfo = { labels: outgoingLabels };

      const response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `OAuth ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`Keep API error (${response.status}): ${errorBody}`);
      }

      const data = ChangesResponseSchema.parse(await response.json());
      if (first) {
        this.dirtyNodes.clear();
        this.dirtyLabels.clear();
        first = false;
      }

      if (data.forceFullResync) {
        this.nodes.clear();
        this.labelMap.clear();
        this.version = undefined;
        continue;
      }

      for (const node of data.nodes ?? []) {
        if (isSet(node.timestamps?.deleted)) {
          this.nodes.delete(node.id);
        } else {
          this.nodes.set(node.id, node);
        }
      }
      for (const label of data.userInfo?.labels ?? []) {
        if (isSet(label.timestamps?.deleted)) {
          this.labelMap.delete(label.mainId);
        } else {
          this.labelMap.set(label.mainId, label);
        }
      }

      this.version = data.toVersion ?? this.version;
      if (!data.truncated) break;
    }
  }

  all(): KeepNode[] {
    const result: KeepNode[] = [];
    for (const raw of this.nodes.values()) {
      if (raw.type !== 'NOTE' && raw.type !== 'LIST') continue;
      if (isSet(raw.timestamps?.deleted)) continue;
      result.push(this.toKeepNode(raw));
    }
    return result;
  }

  get(id: string): KeepNode | undefined {
    const raw = this.nodes.get(id);
    if (!raw || (raw.type !== 'NOTE' && raw.type !== 'LIST') || isSet(raw.timestamps?.deleted)) {
      return undefined;
    }
    return this.toKeepNode(raw);
  }

  labels(): KeepLabel[] {
    return [...this.labelMap.values()].map((l) => ({ mainId: l.mainId, name: l.name }));
  }

  findOrCreateLabel(name: string): KeepLabel {
    for (const label of this.labelMap.values()) {
      if (label.name.toLowerCase() === name.toLowerCase()) {
        return { mainId: label.mainId, name: label.name };
      }
    }
    const now = new Date().toISOString();
    const label: RawLabel = {
      mainId: `tag.${randomBytes(6).toString('hex')}`,
      name,
      timestamps: { created: now, updated: now, deleted: KEEP_EPOCH },
    };
    this.labelMap.set(label.mainId, label);
    this.dirtyLabels.add(label.mainId);
    return { mainId: label.mainId, name };
  }

  createNode(draft: KeepNodeDraft): KeepNode {
    const now = new Date().toISOString();
    const raw: RawNode = {
      id: generateId(),
      parentId: 'root',
      type: draft.type,
      timestamps: { created: now, updated: now, trashed: KEEP_EPOCH, deleted: KEEP_EPOCH },
    };
    this.applyDraft(raw, draft, now);
    return this.toKeepNode(raw);
  }

  updateNode(id: string, draft: KeepNodeDraft): KeepNode {
    const raw = this.nodes.get(id);
    if (!raw) {
      throw new Error(`Keep node not found: ${id}`);
    }
    this.applyDraft(raw, draft, new Date().toISOString());
    return this.toKeepNode(raw);
  }

  deleteNode(id: string): void {
    const raw = this.nodes.get(id);
    if (!raw) {
      throw new Error(`Keep node not found: ${id}`);
    }
    const now = new Date().toISOString();
    raw.timestamps = { ...raw.timestamps, deleted: now, updated: now };
    this.dirtyNodes.add(id);
  }

  reset(): void {
    this.token = null;
    this.version = undefined;
    this.nodes.clear();
    this.labelMap.clear();
    this.dirtyNodes.clear();
    this.dirtyLabels.clear();
  }

  private applyDraft(raw: RawNode, draft: KeepNodeDraft, now: string): void {
    raw.type = draft.type;
    raw.title = draft.title;
    raw.text = draft.type === 'NOTE' ? draft.text : '';
    raw.isPinned = draft.isPinned;
    raw.isArchived = draft.isArchived;
    raw.color = draft.color;
    raw.labelIds = draft.labelIds.map((labelId) => ({ labelId, deleted: KEEP_EPOCH }));
    raw.timestamps = {
      ...raw.timestamps,
      updated: now,
      trashed: draft.isTrashed ? (isSet(raw.timestamps?.trashed) ? raw.timestamps?.trashed : now) : KEEP_EPOCH,
    };
    this.nodes.set(raw.id, raw);
    this.dirtyNodes.add(raw.id);

    // Items are replaced wholesale: old children are deleted, new ones created
    for (const child of this.childrenOf(raw.id)) {
      child.timestamps = { ...child.timestamps, deleted: now, updated: now };
      this.dirtyNodes.add(child.id);
    }
    if (draft.type === 'LIST') {
      draft.items.forEach((item, index) => {
        const child: RawNode = {
          id: generateId(),
          parentId: raw.id,
          type: 'LIST_ITEM',
          text: item.text,
          checked: item.checked,
          sortValue: String((draft.items.length - index) * 1000),
          timestamps: { created: now, updated: now, trashed: KEEP_EPOCH, deleted: KEEP_EPOCH },
        };
        this.nodes.set(child.id, child);
        this.dirtyNodes.add(child.id);
      });
    }
  }

  private childrenOf(parentId: string): RawNode[] {
    return [...this.nodes.values()].filter(
      (n) => n.parentId === parentId && n.type === 'LIST_ITEM' && !isSet(n.timestamps?.deleted),
    );
  }

  private toKeepNode(raw: RawNode): KeepNode {
    const items = this.childrenOf(raw.id)
      .sort((a, b) => sortValueOf(b) - sortValueOf(a))
      .map((child) => ({ id: child.id, text: child.text ?? '', checked: child.checked ?? false }));

    return {
      id: raw.id,
      type: raw.type === 'LIST' ? 'LIST' : 'NOTE',
      title: raw.title ?? '',
      text: raw.text ?? '',
      items,
      labelIds: (raw.labelIds ?? []).filter((l) => !isSet(l.deleted)).map((l) => l.labelId),
      isPinned: raw.isPinned ?? false,
      isArchived: raw.isArchived ?? false,
      isTrashed: isSet(raw.timestamps?.trashed),
      color: raw.color ?? 'DEFAULT',
      created: raw.timestamps?.created ?? KEEP_EPOCH,
      updated: raw.timestamps?.updated ?? KEEP_EPOCH,
    };
  }

  private collectDirtyNodes(): RawNode[] {
    const out: RawNode[] = [];
    for (const id of this.dirtyNodes) {
      const node = this.nodes.get(id);
      if (node) out.push(node);
    }
    return out;
  }

  private collectDirtyLabels(): RawLabel[] {
    const out: RawLabel[] = [];
    for (const id of this.dirtyLabels) {
      const label = this.labelMap.get(id);
      if (label) out.push(label);
    }
    return out;
  }
}
