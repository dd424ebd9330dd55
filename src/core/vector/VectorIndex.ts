/**
 * Owner-scoped similarity index over chunk vectors.
 *
 * Every operation takes the owner id and every variant applies it inside the
 * storage query itself (partitioned map, SQL predicate, kNN pre-filter), never
 * as a post-filter over a shared result set.
 */

import { compareDocumentOrder, type ChunkId, type DocumentId, type OwnerId } from '../entities/Document.js';
import { IndexUnavailableError, InvalidParametersError, getErrorMessage, isGroundworkError } from '../utils/errors.js';

export type VectorBackendKind = 'memory' | 'pgvector' | 'elasticsearch';

export interface VectorMetadata {
  documentId: DocumentId;
  chunkIndex: number;
}

export interface VectorEntry extends VectorMetadata {
  chunkId: ChunkId;
  vector: number[];
}

export interface SearchHit {
  chunkId: ChunkId;
  /** Cosine similarity in [-1, 1], higher is closer */
  score: number;
  documentId: DocumentId;
  chunkIndex: number;
}

export interface SearchFilters {
  documentIds?: DocumentId[];
}

export type DeleteSelector = { chunkId: ChunkId } | { documentId: DocumentId };

export interface VectorIndex {
  readonly kind: VectorBackendKind;
  readonly dimension: number;

  /** Prepare backing storage; safe to call repeatedly */
  init(): Promise<void>;
  /** Upsert: re-adding a chunk id replaces its vector */
  add(ownerId: OwnerId, chunkId: ChunkId, vector: number[], metadata: VectorMetadata): Promise<void>;
  addMany(ownerId: OwnerId, entries: VectorEntry[]): Promise<void>;
  search(ownerId: OwnerId, queryVector: number[], k: number, filters?: SearchFilters): Promise<SearchHit[]>;
  /** Idempotent; resolves to the number of vectors removed */
  delete(ownerId: OwnerId, selector: DeleteSelector): Promise<number>;
  deleteAll(ownerId: OwnerId): Promise<number>;
  count(ownerId: OwnerId): Promise<number>;
  close(): Promise<void>;
}

/**
 * Storage id of a chunk vector. Prefixing with the owner keeps two owners
 * from ever addressing the same row.
 */
export function storageId(ownerId: OwnerId, chunkId: ChunkId): string {
  return `${ownerId}::${chunkId}`;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function assertVector(vector: number[], dimension: number, label = 'vector'): void {
  if (vector.length !== dimension) {
    throw new InvalidParametersError(`${label} has length ${vector.length}, index dimension is ${dimension}`);
  }
  if (vector.some(x => !Number.isFinite(x))) {
    throw new InvalidParametersError(`${label} contains non-finite values`);
  }
}

export function assertOwner(ownerId: OwnerId): void {
  if (typeof ownerId !== 'string' || ownerId.trim().length === 0) {
    throw new InvalidParametersError('ownerId must be a non-empty string');
  }
}

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidParametersError(`k must be a positive integer, got ${k}`);
  }
}

/**
 * Highest score first; ties in document order.
 */
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return compareDocumentOrder(a, b);
}

/**
 * Run a backend call, converting any failure that is not already one of ours
 * into IndexUnavailableError.
 */
export async function guardBackend<T>(backend: VectorBackendKind, operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isGroundworkError(error)) throw error;
    throw new IndexUnavailableError(`${backend} index unavailable during ${operation}: ${getErrorMessage(error)}`, {
      cause: error,
      context: { backend, operation },
    });
  }
}
