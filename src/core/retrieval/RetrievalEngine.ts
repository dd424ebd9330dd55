/**
 * Turns a question into a ranked, length-bounded context bundle:
 * embed the question, search the owner's vectors, resolve chunk text and
 * assemble greedily by score.
 */

import { compareDocumentOrder, type ChunkId, type DocumentId, type OwnerId } from '../entities/Document.js';
import type { EmbeddingProvider } from '../embedding/EmbeddingProvider.js';
import type { SearchHit, VectorIndex } from '../vector/VectorIndex.js';
import type { DocumentStore } from '../store/DocumentStore.js';
import { getLogger } from '../utils/logger.js';
import {
  IndexUnavailableError,
  InvalidParametersError,
  TimeoutError,
  retry,
  throwIfCancelled,
  timeout,
} from '../utils/errors.js';

const logger = getLogger('retrieval');

export type ContextItem = {
  chunkId: ChunkId;
  documentId: DocumentId;
  chunkIndex: number;
  text: string;
  score: number;
};

export type ContextBundle = {
  question: string;
  items: ContextItem[];
  /** Sum of item text lengths */
  totalLength: number;
};

export interface RetrieveOptions {
  k: number;
  maxContextLength: number;
  documentIds?: DocumentId[];
  signal?: AbortSignal;
}

export interface RetrievalEngineDeps {
  embedder: EmbeddingProvider;
  index: VectorIndex;
  store: DocumentStore;
  searchTimeoutMs: number;
  /** Pause before the single search retry */
  searchRetryDelayMs?: number;
}

export class RetrievalEngine {
  constructor(private readonly deps: RetrievalEngineDeps) {}

  async retrieve(ownerId: OwnerId, question: string, options: RetrieveOptions): Promise<ContextBundle> {
    const { k, maxContextLength, documentIds, signal } = options;
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidParametersError(`k must be a positive integer, got ${k}`);
    }
    if (!Number.isInteger(maxContextLength) || maxContextLength < 1) {
      throw new InvalidParametersError(`maxContextLength must be a positive integer, got ${maxContextLength}`);
    }

    throwIfCancelled(signal);
    const queryVector = await this.deps.embedder.embed(question, signal);

    throwIfCancelled(signal);
    const hits = await this.search(ownerId, queryVector, k, documentIds, signal);
    if (hits.length === 0) {
      logger.debug({ ownerId }, 'No vectors matched; returning empty context');
      return { question, items: [], totalLength: 0 };
    }

    throwIfCancelled(signal);
    const chunks = await this.deps.store.getChunks(
      ownerId,
      hits.map(hit => hit.chunkId)
    );

    const candidates: ContextItem[] = [];
    for (const hit of hits) {
      const chunk = chunks.get(hit.chunkId);
      // vector written before its chunk row, or chunk deleted since: skip
      if (!chunk) continue;
      candidates.push({
        chunkId: hit.chunkId,
        documentId: hit.documentId,
        chunkIndex: hit.chunkIndex,
        text: chunk.text,
        score: hit.score,
      });
    }

    const bundle = assembleContext(question, candidates, maxContextLength);
    logger.debug(
      { ownerId, hits: hits.length, resolved: candidates.length, used: bundle.items.length, length: bundle.totalLength },
      'Context assembled'
    );
    return bundle;
  }

  /**
   * One retry on IndexUnavailable; a cancelled call is never retried and
   * reports the cancellation rather than the search failure.
   */
  private async search(
    ownerId: OwnerId,
    queryVector: number[],
    k: number,
    documentIds?: DocumentId[],
    signal?: AbortSignal
  ): Promise<SearchHit[]> {
    const { index, searchTimeoutMs } = this.deps;
    try {
      return await retry(
        async () => {
          throwIfCancelled(signal);
          try {
            return await timeout(
              index.search(ownerId, queryVector, k, documentIds ? { documentIds } : undefined),
              searchTimeoutMs,
              `Vector search timed out after ${searchTimeoutMs}ms`
            );
          } catch (error) {
            if (error instanceof TimeoutError) {
              throw new IndexUnavailableError(error.message, { cause: error, context: { backend: index.kind } });
            }
            throw error;
          }
        },
        {
          maxAttempts: 2,
          delay: this.deps.searchRetryDelayMs ?? 200,
          shouldRetry: error => error instanceof IndexUnavailableError && !signal?.aborted,
          onError: (error, attempt) => {
            if (error instanceof IndexUnavailableError) {
              logger.warn({ ownerId, attempt, err: error.message }, 'Vector search failed');
            }
          },
        }
      );
    } catch (error) {
      throwIfCancelled(signal);
      throw error;
    }
  }
}

/**
 * Order by score descending (ties in document order) and take items while
 * they fit. Assembly stops at the first item that would overflow.
 */
export function assembleContext(question: string, candidates: ContextItem[], maxContextLength: number): ContextBundle {
  const ordered = [...candidates].sort((a, b) =>
    b.score !== a.score ? b.score - a.score : compareDocumentOrder(a, b)
  );

  const items: ContextItem[] = [];
  let totalLength = 0;
  for (const item of ordered) {
    if (totalLength + item.text.length > maxContextLength) break;
    items.push(item);
    totalLength += item.text.length;
  }
  return { question, items, totalLength };
}
