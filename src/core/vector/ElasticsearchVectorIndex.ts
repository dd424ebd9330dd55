/**
 * Server-mode vector index on Elasticsearch: keyword fields for owner and
 * document scoping plus a `dense_vector` field searched with approximate kNN.
 * The owner restriction is a kNN pre-filter, so the top k are drawn from the
 * owner's vectors only.
 */

import { Client } from '@elastic/elasticsearch';
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

const logger = getLogger('vector:elasticsearch');

export interface ChunkVectorDocument {
  owner_id: OwnerId;
  chunk_id: ChunkId;
  document_id: DocumentId;
  chunk_index: number;
  embedding: number[];
}

export interface KnnMatch {
  id: string;
  /** Raw engine score; for cosine this is (1 + cos) / 2 */
  score: number;
  source?: Partial<ChunkVectorDocument>;
}

export type TermMatch = Partial<Pick<ChunkVectorDocument, 'owner_id' | 'chunk_id' | 'document_id'>>;

/**
 * The slice of the Elasticsearch API the index needs.
 */
export interface SearchEngineGateway {
  ensureIndex(index: string, dimension: number): Promise<void>;
  bulkUpsert(index: string, docs: Array<{ id: string; doc: ChunkVectorDocument }>): Promise<void>;
  knn(
    index: string,
    params: { ownerId: OwnerId; queryVector: number[]; k: number; documentIds?: DocumentId[] }
  ): Promise<KnnMatch[]>;
  deleteByTerms(index: string, terms: TermMatch): Promise<number>;
  count(index: string, ownerId: OwnerId): Promise<number>;
  close(): Promise<void>;
}

export class ElasticClientGateway implements SearchEngineGateway {
  private readonly client: Client;

  constructor(node: string) {
    this.client = new Client({ node });
  }

  async ensureIndex(index: string, dimension: number): Promise<void> {
    const exists = await this.client.indices.exists({ index });
    if (exists) return;

    await this.client.indices.create({
      index,
      mappings: {
        properties: {
          owner_id: { type: 'keyword' },
          chunk_id: { type: 'keyword' },
          document_id: { type: 'keyword' },
          chunk_index: { type: 'integer' },
          embedding: { type: 'dense_vector', dims: dimension, index: true, similarity: 'cosine' },
        },
      },
    });
    logger.info({ index, dimension }, 'Created Elasticsearch index');
  }

  async bulkUpsert(index: string, docs: Array<{ id: string; doc: ChunkVectorDocument }>): Promise<void> {
    const response = await this.client.bulk({
      refresh: 'wait_for',
      operations: docs.flatMap(({ id, doc }) => [{ index: { _index: index, _id: id } }, doc]),
    });
    if (response.errors) {
      const failed = response.items.find(item => item.index?.error);
      throw new Error(`bulk indexing failed: ${failed?.index?.error?.reason ?? 'unknown error'}`);
    }
  }

  async knn(
    index: string,
    params: { ownerId: OwnerId; queryVector: number[]; k: number; documentIds?: DocumentId[] }
  ): Promise<KnnMatch[]> {
    const filter = [
      { term: { owner_id: params.ownerId } },
      ...(params.documentIds ? [{ terms: { document_id: params.documentIds } }] : []),
    ];

    const response = await this.client.search<ChunkVectorDocument>({
      index,
      knn: {
        field: 'embedding',
        query_vector: params.queryVector,
        k: params.k,
        num_candidates: Math.max(params.k * 10, 100),
        filter,
      },
      _source: ['owner_id', 'chunk_id', 'document_id', 'chunk_index'],
      size: params.k,
    });

    return response.hits.hits.map(hit => ({
      id: hit._id ?? '',
      score: hit._score ?? 0,
      source: hit._source,
    }));
  }

  async deleteByTerms(index: string, terms: TermMatch): Promise<number> {
    const filter: Array<{ term: Record<string, string> }> = [];
    for (const [field, value] of Object.entries(terms)) {
      if (typeof value === 'string') filter.push({ term: { [field]: value } });
    }

    const response = await this.client.deleteByQuery({
      index,
      refresh: true,
      conflicts: 'proceed',
      query: { bool: { filter } },
    });
    return response.deleted ?? 0;
  }

  async count(index: string, ownerId: OwnerId): Promise<number> {
    const response = await this.client.count({ index, query: { term: { owner_id: ownerId } } });
    return response.count;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

export interface ElasticsearchVectorIndexOptions {
  dimension: number;
  index: string;
  gateway: SearchEngineGateway;
}

export class ElasticsearchVectorIndex implements VectorIndex {
  readonly kind = 'elasticsearch';
  readonly dimension: number;
  private readonly index: string;
  private readonly gateway: SearchEngineGateway;
  private ready?: Promise<void>;

  constructor(options: ElasticsearchVectorIndexOptions) {
    this.dimension = options.dimension;
    this.index = options.index;
    this.gateway = options.gateway;
  }

  init(): Promise<void> {
    if (!this.ready) {
      this.ready = guardBackend(this.kind, 'init', () => this.gateway.ensureIndex(this.index, this.dimension)).catch(
        error => {
          this.ready = undefined;
          throw error;
        }
      );
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

    const docs = entries.map(entry => ({
      id: storageId(ownerId, entry.chunkId),
      doc: {
        owner_id: ownerId,
        chunk_id: entry.chunkId,
        document_id: entry.documentId,
        chunk_index: entry.chunkIndex,
        embedding: entry.vector,
      },
    }));
    await guardBackend(this.kind, 'bulk', () => this.gateway.bulkUpsert(this.index, docs));
    logger.debug({ ownerId, count: docs.length }, 'Indexed vectors');
  }

  async search(ownerId: OwnerId, queryVector: number[], k: number, filters?: SearchFilters): Promise<SearchHit[]> {
    assertOwner(ownerId);
    assertTopK(k);
    assertVector(queryVector, this.dimension, 'query vector');
    if (filters?.documentIds && filters.documentIds.length === 0) return [];
    await this.init();

    const matches = await guardBackend(this.kind, 'knn', () =>
      this.gateway.knn(this.index, { ownerId, queryVector, k, documentIds: filters?.documentIds })
    );

    const hits: SearchHit[] = [];
    for (const match of matches) {
      const source = match.source;
      if (
        !source ||
        source.owner_id !== ownerId ||
        typeof source.chunk_id !== 'string' ||
        typeof source.document_id !== 'string' ||
        typeof source.chunk_index !== 'number'
      ) {
        continue;
      }
      hits.push({
        chunkId: source.chunk_id,
        documentId: source.document_id,
        chunkIndex: source.chunk_index,
        // map (1 + cos) / 2 back onto cosine
        score: 2 * match.score - 1,
      });
    }
    return hits.sort(compareHits).slice(0, k);
  }

  async delete(ownerId: OwnerId, selector: DeleteSelector): Promise<number> {
    assertOwner(ownerId);
    await this.init();
    const terms: TermMatch =
      'chunkId' in selector
        ? { owner_id: ownerId, chunk_id: selector.chunkId }
        : { owner_id: ownerId, document_id: selector.documentId };
    return guardBackend(this.kind, 'deleteByQuery', () => this.gateway.deleteByTerms(this.index, terms));
  }

  async deleteAll(ownerId: OwnerId): Promise<number> {
    assertOwner(ownerId);
    await this.init();
    return guardBackend(this.kind, 'deleteByQuery', () => this.gateway.deleteByTerms(this.index, { owner_id: ownerId }));
  }

  async count(ownerId: OwnerId): Promise<number> {
    await this.init();
    return guardBackend(this.kind, 'count', () => this.gateway.count(this.index, ownerId));
  }

  async close(): Promise<void> {
    await guardBackend(this.kind, 'close', () => this.gateway.close());
  }
}
