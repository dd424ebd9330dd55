import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { nanoid } from 'nanoid';
import type { Chunk, ChunkId, Document, DocumentId, OwnerId } from '../entities/Document.js';
import type { HistoryRecord } from '../entities/History.js';
import { GroundworkError, getErrorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('store');

export type NewHistoryRecord = Omit<HistoryRecord, 'id' | 'createdAt'>;

export type OwnerWipeResult = {
  documents: number;
  chunks: number;
  history: number;
};

/**
 * Relational side of the pipeline: documents, chunk text and answer history,
 * all keyed by owner.
 */
export interface DocumentStore {
  /** Next document id; ids sort lexically in allocation order */
  allocateDocumentId(): Promise<DocumentId>;
  /** Persist a document together with all its chunks in one step */
  saveDocument(document: Document, chunks: Chunk[]): Promise<void>;
  getDocument(ownerId: OwnerId, documentId: DocumentId): Promise<Document | null>;
  findDocumentByFingerprint(ownerId: OwnerId, fingerprint: string): Promise<Document | null>;
  listDocuments(ownerId: OwnerId): Promise<Document[]>;
  countDocuments(ownerId: OwnerId): Promise<number>;
  /** Chunks that no longer exist are absent from the result */
  getChunks(ownerId: OwnerId, chunkIds: ChunkId[]): Promise<Map<ChunkId, Chunk>>;
  listChunks(ownerId: OwnerId, documentId?: DocumentId): Promise<Chunk[]>;
  /** Removes the document and its chunks; false when there was nothing to remove */
  deleteDocument(ownerId: OwnerId, documentId: DocumentId): Promise<boolean>;
  deleteOwner(ownerId: OwnerId): Promise<OwnerWipeResult>;
  appendHistory(record: NewHistoryRecord): Promise<HistoryRecord>;
  /** Most recent first */
  listHistory(ownerId: OwnerId, limit?: number): Promise<HistoryRecord[]>;
  countQueriesSince(ownerId: OwnerId, since: Date): Promise<number>;
}

// ============================================================================
// Persisted shape
// ============================================================================

const documentSchema = z.object({
  id: z.string(),
  ownerId: z.string(),
  title: z.string(),
  fingerprint: z.string(),
  chunkCount: z.number().int().min(0),
  chunking: z.object({ targetSize: z.number().int(), overlap: z.number().int() }),
  createdAt: z.string(),
});

const chunkSchema = z.object({
  id: z.string(),
  documentId: z.string(),
  ownerId: z.string(),
  index: z.number().int().min(0),
  text: z.string(),
  start: z.number().int(),
  end: z.number().int(),
  fingerprint: z.string(),
  targetSize: z.number().int(),
  overlap: z.number().int(),
});

const historySchema = z.object({
  id: z.string(),
  ownerId: z.string(),
  question: z.string(),
  answer: z.string(),
  elapsedMs: z.number(),
  chunkCount: z.number().int(),
  chunkIds: z.array(z.string()),
  backend: z.string(),
  mode: z.enum(['whole', 'stream']),
  createdAt: z.string(),
});

const storeFileSchema = z.object({
  version: z.literal(1),
  sequence: z.number().int().min(0),
  documents: z.array(documentSchema),
  chunks: z.array(chunkSchema),
  history: z.array(historySchema),
});

export type StoreSnapshot = z.infer<typeof storeFileSchema>;

export function formatDocumentId(sequence: number): DocumentId {
  return `doc_${String(sequence).padStart(6, '0')}`;
}

// ============================================================================
// In-memory store
// ============================================================================

export class InMemoryDocumentStore implements DocumentStore {
  protected sequence = 0;
  protected documents = new Map<DocumentId, Document>();
  // documentId -> chunks in index order
  protected chunks = new Map<DocumentId, Chunk[]>();
  protected history: HistoryRecord[] = [];

  async allocateDocumentId(): Promise<DocumentId> {
    await this.ready();
    this.sequence += 1;
    const id = formatDocumentId(this.sequence);
    await this.commit();
    return id;
  }

  async saveDocument(document: Document, chunks: Chunk[]): Promise<void> {
    await this.ready();
    this.documents.set(document.id, { ...document });
    this.chunks.set(
      document.id,
      [...chunks].sort((a, b) => a.index - b.index)
    );
    await this.commit();
  }

  async getDocument(ownerId: OwnerId, documentId: DocumentId): Promise<Document | null> {
    await this.ready();
    const doc = this.documents.get(documentId);
    return doc && doc.ownerId === ownerId ? doc : null;
  }

  async findDocumentByFingerprint(ownerId: OwnerId, fingerprint: string): Promise<Document | null> {
    await this.ready();
    for (const doc of this.documents.values()) {
      if (doc.ownerId === ownerId && doc.fingerprint === fingerprint) return doc;
    }
    return null;
  }

  async listDocuments(ownerId: OwnerId): Promise<Document[]> {
    await this.ready();
    return [...this.documents.values()]
      .filter(doc => doc.ownerId === ownerId)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  async countDocuments(ownerId: OwnerId): Promise<number> {
    return (await this.listDocuments(ownerId)).length;
  }

  async getChunks(ownerId: OwnerId, chunkIds: ChunkId[]): Promise<Map<ChunkId, Chunk>> {
    await this.ready();
    const wanted = new Set(chunkIds);
    const found = new Map<ChunkId, Chunk>();
    for (const [documentId, chunks] of this.chunks) {
      if (this.documents.get(documentId)?.ownerId !== ownerId) continue;
      for (const chunk of chunks) {
        if (wanted.has(chunk.id)) found.set(chunk.id, chunk);
      }
    }
    return found;
  }

  async listChunks(ownerId: OwnerId, documentId?: DocumentId): Promise<Chunk[]> {
    const docs = await this.listDocuments(ownerId);
    return docs
      .filter(doc => documentId === undefined || doc.id === documentId)
      .flatMap(doc => this.chunks.get(doc.id) ?? []);
  }

  async deleteDocument(ownerId: OwnerId, documentId: DocumentId): Promise<boolean> {
    await this.ready();
    const doc = this.documents.get(documentId);
    if (!doc || doc.ownerId !== ownerId) return false;
    this.documents.delete(documentId);
    this.chunks.delete(documentId);
    await this.commit();
    return true;
  }

  async deleteOwner(ownerId: OwnerId): Promise<OwnerWipeResult> {
    await this.ready();
    const result: OwnerWipeResult = { documents: 0, chunks: 0, history: 0 };
    for (const [id, doc] of this.documents) {
      if (doc.ownerId !== ownerId) continue;
      result.documents++;
      result.chunks += this.chunks.get(id)?.length ?? 0;
      this.documents.delete(id);
      this.chunks.delete(id);
    }
    const kept = this.history.filter(record => record.ownerId !== ownerId);
    result.history = this.history.length - kept.length;
    this.history = kept;
    await this.commit();
    return result;
  }

  async appendHistory(record: NewHistoryRecord): Promise<HistoryRecord> {
    await this.ready();
    const saved: HistoryRecord = {
      ...record,
      id: nanoid(),
      createdAt: new Date().toISOString(),
    };
    this.history.push(saved);
    await this.commit();
    return saved;
  }

  async listHistory(ownerId: OwnerId, limit?: number): Promise<HistoryRecord[]> {
    await this.ready();
    const records = this.history.filter(record => record.ownerId === ownerId).reverse();
    return limit === undefined ? records : records.slice(0, limit);
  }

  async countQueriesSince(ownerId: OwnerId, since: Date): Promise<number> {
    await this.ready();
    const cutoff = since.getTime();
    return this.history.filter(
      record => record.ownerId === ownerId && Date.parse(record.createdAt) >= cutoff
    ).length;
  }

  /** Hook for persistent subclasses: called before every operation */
  protected async ready(): Promise<void> {}

  /** Hook for persistent subclasses: called after every mutation */
  protected async commit(): Promise<void> {}

  protected snapshot(): StoreSnapshot {
    return {
      version: 1,
      sequence: this.sequence,
      documents: [...this.documents.values()],
      chunks: [...this.chunks.values()].flat(),
      history: this.history,
    };
  }

  protected restore(snapshot: StoreSnapshot): void {
    this.sequence = snapshot.sequence;
    this.documents = new Map(snapshot.documents.map(doc => [doc.id, doc]));
    this.chunks = new Map();
    for (const chunk of snapshot.chunks) {
      const list = this.chunks.get(chunk.documentId) ?? [];
      list.push(chunk);
      this.chunks.set(chunk.documentId, list);
    }
    for (const list of this.chunks.values()) list.sort((a, b) => a.index - b.index);
    this.history = snapshot.history;
  }
}

// ============================================================================
// JSON file store
// ============================================================================

/**
 * In-memory store mirrored to a single JSON file. Every mutation rewrites the
 * file through a temp file and rename, so a crash leaves either the old or
 * the new state on disk.
 */
export class JsonFileDocumentStore extends InMemoryDocumentStore {
  private loading?: Promise<void>;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {
    super();
  }

  protected override ready(): Promise<void> {
    if (!this.loading) this.loading = this.load();
    return this.loading;
  }

  protected override commit(): Promise<void> {
    const data = JSON.stringify(this.snapshot(), null, 2);
    const write = this.writes.then(() => this.write(data));
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch {
      logger.debug({ path: this.filePath }, 'No existing store file, starting fresh');
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new GroundworkError(`Store file ${this.filePath} is not valid JSON`, 'internal', { cause: error });
    }
    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new GroundworkError(`Store file ${this.filePath} has an unexpected shape`, 'internal', {
        context: { issues: parsed.error.issues.slice(0, 5).map(i => `${i.path.join('.')}: ${i.message}`) },
      });
    }
    this.restore(parsed.data);
    logger.debug({ documents: parsed.data.documents.length }, 'Loaded document store');
  }

  private async write(data: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      await fs.writeFile(tmp, data, 'utf-8');
      await fs.rename(tmp, this.filePath); // atomic on same volume
    } catch (error) {
      throw new GroundworkError(`Failed to write store file: ${getErrorMessage(error)}`, 'internal', {
        cause: error,
        context: { path: this.filePath },
      });
    }
  }
}
