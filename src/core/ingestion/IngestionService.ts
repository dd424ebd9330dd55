/**
 * Document lifecycle: chunk, embed and index new text; remove documents and
 * whole tenants; re-embed an owner's chunks after a model change.
 */

import type { Chunk, Document, DocumentId, OwnerId } from '../entities/Document.js';
import { buildChunks, fingerprint, validateChunkOptions } from '../chunking/Chunker.js';
import type { EmbeddingProvider } from '../embedding/EmbeddingProvider.js';
import type { VectorEntry, VectorIndex } from '../vector/VectorIndex.js';
import type { DocumentStore, OwnerWipeResult } from '../store/DocumentStore.js';
import type { AppConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import {
  InvalidParametersError,
  NotFoundError,
  QuotaExceededError,
  getErrorMessage,
  throwIfCancelled,
} from '../utils/errors.js';
import { KeyedMutex } from './KeyedMutex.js';

const logger = getLogger('ingestion');

const REINDEX_BATCH_SIZE = 64;
const MAX_TITLE_LENGTH = 80;

export interface IngestRequest {
  text: string;
  title?: string;
  chunkSize?: number;
  overlap?: number;
}

export type IngestResult = {
  document: Document;
  /** True when identical content was already stored for this owner */
  deduplicated: boolean;
};

export type OwnerDeletion = OwnerWipeResult & { vectors: number };

export interface IngestionServiceDeps {
  store: DocumentStore;
  index: VectorIndex;
  embedder: EmbeddingProvider;
  chunking: AppConfig['chunking'];
  limits: Pick<AppConfig['limits'], 'maxDocumentsPerUser' | 'maxChunksPerDocument'>;
}

export class IngestionService {
  // owner:fingerprint, held for a whole ingest
  private readonly mutex = new KeyedMutex<string>();
  // owner:documentId, held while a document's rows and vectors change
  private readonly documentLocks = new KeyedMutex<string>();

  constructor(private readonly deps: IngestionServiceDeps) {}

  async ingest(ownerId: OwnerId, request: IngestRequest, signal?: AbortSignal): Promise<IngestResult> {
    assertOwnerId(ownerId);
    const { text } = request;
    if (text.trim().length === 0) {
      throw new InvalidParametersError('Document text is empty');
    }
    const options = {
      targetSize: request.chunkSize ?? this.deps.chunking.size,
      overlap: request.overlap ?? this.deps.chunking.overlap,
      lookBack: this.deps.chunking.lookBack,
    };
    validateChunkOptions(options);

    const hash = fingerprint(text);
    return this.mutex.runExclusive(`${ownerId}:${hash}`, async () => {
      const existing = await this.deps.store.findDocumentByFingerprint(ownerId, hash);
      if (existing) {
        logger.info({ ownerId, documentId: existing.id }, 'Identical content already ingested');
        return { document: existing, deduplicated: true };
      }

      const { maxDocumentsPerUser, maxChunksPerDocument } = this.deps.limits;
      const documentCount = await this.deps.store.countDocuments(ownerId);
      if (documentCount >= maxDocumentsPerUser) {
        throw new QuotaExceededError(`Maximum document limit (${maxDocumentsPerUser}) reached`, {
          context: { ownerId },
        });
      }

      const documentId = await this.deps.store.allocateDocumentId();
      const chunks = buildChunks(documentId, ownerId, text, options);
      if (chunks.length > maxChunksPerDocument) {
        throw new QuotaExceededError(
          `Document produces ${chunks.length} chunks, above the limit of ${maxChunksPerDocument}`,
          { context: { ownerId } }
        );
      }

      throwIfCancelled(signal);
      const vectors = await this.deps.embedder.embedMany(
        chunks.map(chunk => chunk.text),
        signal
      );

      const document: Document = {
        id: documentId,
        ownerId,
        title: request.title?.trim() || deriveTitle(text),
        fingerprint: hash,
        chunkCount: chunks.length,
        chunking: { targetSize: options.targetSize, overlap: options.overlap },
        createdAt: new Date().toISOString(),
      };

      await this.documentLocks.runExclusive(`${ownerId}:${documentId}`, async () => {
        await this.deps.store.saveDocument(document, chunks);
        try {
          await this.deps.index.addMany(ownerId, toEntries(chunks, vectors));
        } catch (error) {
          await this.rollback(ownerId, documentId);
          throw error;
        }
      });

      logger.info({ ownerId, documentId, chunks: chunks.length }, 'Document ingested');
      return { document, deduplicated: false };
    });
  }

  async listDocuments(ownerId: OwnerId): Promise<Document[]> {
    return this.deps.store.listDocuments(ownerId);
  }

  async getDocument(ownerId: OwnerId, documentId: DocumentId): Promise<Document> {
    const document = await this.deps.store.getDocument(ownerId, documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`, { context: { ownerId } });
    }
    return document;
  }

  /**
   * Remove a document with its chunks and vectors. Returns whether anything
   * existed. Waits for an ingest still writing the same document.
   */
  async deleteDocument(ownerId: OwnerId, documentId: DocumentId): Promise<boolean> {
    assertOwnerId(ownerId);
    return this.documentLocks.runExclusive(`${ownerId}:${documentId}`, async () => {
      const vectors = await this.deps.index.delete(ownerId, { documentId });
      const existed = await this.deps.store.deleteDocument(ownerId, documentId);
      logger.info({ ownerId, documentId, vectors, existed }, 'Document deleted');
      return existed || vectors > 0;
    });
  }

  async deleteOwner(ownerId: OwnerId): Promise<OwnerDeletion> {
    assertOwnerId(ownerId);
    const vectors = await this.deps.index.deleteAll(ownerId);
    const wiped = await this.deps.store.deleteOwner(ownerId);
    logger.info({ ownerId, vectors, ...wiped }, 'Owner data wiped');
    return { ...wiped, vectors };
  }

  /**
   * Re-embed every stored chunk of the owner and overwrite its vectors.
   */
  async reindexOwner(ownerId: OwnerId, signal?: AbortSignal): Promise<{ chunks: number }> {
    assertOwnerId(ownerId);
    const chunks = await this.deps.store.listChunks(ownerId);

    for (let i = 0; i < chunks.length; i += REINDEX_BATCH_SIZE) {
      throwIfCancelled(signal);
      const batch = chunks.slice(i, i + REINDEX_BATCH_SIZE);
      const vectors = await this.deps.embedder.embedMany(
        batch.map(chunk => chunk.text),
        signal
      );
      await this.deps.index.addMany(ownerId, toEntries(batch, vectors));
      logger.debug({ ownerId, done: i + batch.length, total: chunks.length }, 'Reindex progress');
    }

    logger.info({ ownerId, chunks: chunks.length, embedder: this.deps.embedder.name }, 'Owner reindexed');
    return { chunks: chunks.length };
  }

  private async rollback(ownerId: OwnerId, documentId: DocumentId): Promise<void> {
    logger.warn({ ownerId, documentId }, 'Indexing failed, rolling back document');
    try {
      await this.deps.index.delete(ownerId, { documentId });
    } catch (error) {
      logger.error({ ownerId, documentId, err: getErrorMessage(error) }, 'Vector rollback failed');
    }
    await this.deps.store.deleteDocument(ownerId, documentId);
  }
}

function assertOwnerId(ownerId: OwnerId): void {
  if (ownerId.trim().length === 0) {
    throw new InvalidParametersError('ownerId must be a non-empty string');
  }
}

function toEntries(chunks: Chunk[], vectors: number[][]): VectorEntry[] {
  return chunks.map((chunk, i) => ({
    chunkId: chunk.id,
    documentId: chunk.documentId,
    chunkIndex: chunk.index,
    vector: vectors[i],
  }));
}

/** First non-empty line, shortened */
export function deriveTitle(text: string): string {
  const line = text.split('\n').find(candidate => candidate.trim().length > 0) ?? '';
  const title = line.trim().replace(/\s+/g, ' ');
  return title.length > MAX_TITLE_LENGTH ? `${title.slice(0, MAX_TITLE_LENGTH - 3)}...` : title;
}
