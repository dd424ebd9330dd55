/**
 * Server-mode vector index on PostgreSQL + pgvector through @mastra/pg.
 *
 * Rows live in one table named after the index. Each row carries the owner id
 * in its JSONB metadata and every read or delete filters on it in SQL.
 */

import { PgVector } from '@mastra/pg';
import type { ChunkId, DocumentId, OwnerId } from '../entities/Document.js';
import { getLogger } from '../utils/logger.js';
import {
  assertOwner,
  assertTopK,
  assertVector,
  compareHits,
  guardBackend,
  storageId,
  type DeleteSelector,
  type SearchFilters,
  type SearchHit,
  type VectorEntry,
  type VectorIndex,
  type VectorMetadata,
} from './VectorIndex.js';

const logger = getLogger('vector:pgvector');

export interface PgRow {
  id: string;
  vector: number[];
  metadata: { ownerId: OwnerId; chunkId: ChunkId; documentId: DocumentId; chunkIndex: number };
}

export interface PgMatch {
  id: string;
  score: number;
  metadata?: Record<string, unknown>;
}

/**
 * The slice of pgvector the index needs. Implemented over @mastra/pg in
 * production and by an in-process fake in tests.
 */
export interface PgVectorGateway {
  ensureIndex(indexName: string, dimension: number): Promise<void>;
  upsert(indexName: string, rows: PgRow[]): Promise<void>;
  query(
    indexName: string,
    params: { ownerId: OwnerId; queryVector: number[]; topK: number; documentIds?: DocumentId[] }
  ): Promise<PgMatch[]>;
  /** Delete rows whose metadata matches every given key; returns rows removed */
  deleteWhere(indexName: string, match: Record<string, string>): Promise<number>;
  count(indexName: string, ownerId: OwnerId): Promise<number>;
  disconnect(): Promise<void>;
}

/**
 * @mastra/pg backed gateway. Metadata deletes go through the underlying pool
 * since PgVector only deletes by id.
 */
export class MastraPgVectorGateway implements PgVectorGateway {
  private readonly store: PgVector;

  constructor(connectionString: string) {
    this.store = new PgVector({ connectionString });
  }

  async ensureIndex(indexName: string, dimension: number): Promise<void> {
    await this.store.createIndex({
      indexName,
      dimension,
      metric: 'cosine',
      indexConfig: { type: 'hnsw', hnsw: { m: 16, efConstruction: 64 } },
    });
  }

  async upsert(indexName: string, rows: PgRow[]): Promise<void> {
    await this.store.upsert({
      indexName,
      vectors: rows.map(r => r.vector),
      metadata: rows.map(r => r.metadata),
      ids: rows.map(r => r.id),
    });
  }

  async query(
    indexName: string,
    params: { ownerId: OwnerId; queryVector: number[]; topK: number; documentIds?: DocumentId[] }
  ): Promise<PgMatch[]> {
    const ownerFilter = { ownerId: { $eq: params.ownerId } };
    const filter = params.documentIds
      ? { $and: [ownerFilter, { documentId: { $in: params.documentIds } }] }
      : ownerFilter;

    const results = await this.store.query({
      indexName,
      queryVector: params.queryVector,
      topK: params.topK,
      filter,
    });
    return results.map(r => ({ id: r.id, score: r.score, metadata: r.metadata }));
  }

  async deleteWhere(indexName: string, match: Record<string, string>): Promise<number> {
    const keys = Object.keys(match);
    const where = keys.map((key, i) => `metadata->>'${key}' = $${i + 1}`).join(' AND ');
    const result = await this.store.pool.query(
      `DELETE FROM ${indexName} WHERE ${where}`,
      keys.map(key => match[key])
    );
    return result.rowCount ?? 0;
  }

  async count(indexName: string, ownerId: OwnerId): Promise<number> {
    const result = await this.store.pool.query(
      `SELECT COUNT(*)::int AS n FROM ${indexName} WHERE metadata->>'ownerId' = $1`,
      [ownerId]
    );
    const n: unknown = result.rows[0]?.n;
    return typeof n === 'number' ? n : Number(n ?? 0);
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }
}

export interface PgVectorIndexOptions {
  dimension: number;
  indexName: string;
  gateway: PgVectorGateway;
}

export class PgVectorIndex implements VectorIndex {
  readonly kind = 'pgvector';
  readonly dimension: number;
  private readonly indexName: string;
  private readonly gateway: PgVectorGateway;
  private ready?: Promise<void>;

  constructor(options: PgVectorIndexOptions) {
    this.dimension = options.dimension;
    this.indexName = options.indexName;
    this.gateway = options.gateway;
  }

  init(): Promise<void> {
    if (!this.ready) {
      this.ready = guardBackend(this.kind, 'init', () =>
        this.gateway.ensureIndex(this.indexName, this.dimension)
      ).catch(error => {
        // let the next call try again
        this.ready = undefined;
        throw error;
      });
    }
    return this.ready;
  }

  async add(ownerId: OwnerId, chunkId: ChunkId, vector: number[], metadata: VectorMetadata): Promise<void> {
    await this.addMany(ownerId, [{ chunkId, vector, ...metadata }]);
  }

  async addMany(ownerId: OwnerId, entries: VectorEntry[]): Promise<void> {
    assertOwner(ownerId);
    entries.forEach(entry => assertVector(entry.vector, this.dimension, `vector for ${entry.chunkId}`));
    if (entries.length === 0) return;
    await this.init();

    const rows: PgRow[] = entries.map(entry => ({
      id: storageId(ownerId, entry.chunkId),
      vector: entry.vector,
      metadata: {
        ownerId,
        chunkId: entry.chunkId,
        documentId: entry.documentId,
        chunkIndex: entry.chunkIndex,
      },
    }));
    await guardBackend(this.kind, 'upsert', () => this.gateway.upsert(this.indexName, rows));
    logger.debug({ ownerId, count: rows.length }, 'Upserted vectors');
  }

  async search(ownerId: OwnerId, queryVector: number[], k: number, filters?: SearchFilters): Promise<SearchHit[]> {
    assertOwner(ownerId);
    assertTopK(k);
    assertVector(queryVector, this.dimension, 'query vector');
    if (filters?.documentIds && filters.documentIds.length === 0) return [];
    await this.init();

    const matches = await guardBackend(this.kind, 'query', () =>
      this.gateway.query(this.indexName, {
        ownerId,
        queryVector,
        topK: k,
        documentIds: filters?.documentIds,
      })
    );

    const hits: SearchHit[] = [];
    for (const match of matches) {
      const hit = toHit(ownerId, match);
      if (hit) hits.push(hit);
    }
    return hits.sort(compareHits).slice(0, k);
  }

  async delete(ownerId: OwnerId, selector: DeleteSelector): Promise<number> {
    assertOwner(ownerId);
    await this.init();
    const match: Record<string, string> =
      'chunkId' in selector
        ? { ownerId, chunkId: selector.chunkId }
        : { ownerId, documentId: selector.documentId };
    return guardBackend(this.kind, 'delete', () => this.gateway.deleteWhere(this.indexName, match));
  }

  async deleteAll(ownerId: OwnerId): Promise<number> {
    assertOwner(ownerId);
    await this.init();
    return guardBackend(this.kind, 'deleteAll', () => this.gateway.deleteWhere(this.indexName, { ownerId }));
  }

  async count(ownerId: OwnerId): Promise<number> {
    await this.init();
    return guardBackend(this.kind, 'count', () => this.gateway.count(this.indexName, ownerId));
  }

  async close(): Promise<void> {
    await guardBackend(this.kind, 'close', () => this.gateway.disconnect());
  }
}

/**
 * Rows that do not belong to the owner or lack metadata are dropped.
 */
function toHit(ownerId: OwnerId, match: PgMatch): SearchHit | undefined {
  const meta = match.metadata;
  if (!meta || meta.ownerId !== ownerId) return undefined;
  const { chunkId, documentId, chunkIndex } = meta;
  if (typeof chunkId !== 'string' || typeof documentId !== 'string' || typeof chunkIndex !== 'number') {
    logger.warn({ id: match.id }, 'Skipping vector row with malformed metadata');
    return undefined;
  }
  return { chunkId, documentId, chunkIndex, score: match.score };
}
