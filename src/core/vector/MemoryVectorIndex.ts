import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { ChunkId, OwnerId } from '../entities/Document.js';
import { getLogger } from '../utils/logger.js';
import { IndexUnavailableError, getErrorMessage } from '../utils/errors.js';
import {
  assertOwner,
  assertTopK,
  assertVector,
  compareHits,
  cosineSimilarity,
  storageId,
  type DeleteSelector,
  type SearchFilters,
  type SearchHit,
  type VectorEntry,
  type VectorIndex,
  type VectorMetadata,
} from './VectorIndex.js';

const logger = getLogger('vector:memory');

const snapshotSchema = z.object({
  version: z.literal(1),
  dimension: z.number().int().positive(),
  owners: z.record(
    z.array(
      z.object({
        chunkId: z.string(),
        documentId: z.string(),
        chunkIndex: z.number().int().min(0),
        vector: z.array(z.number()),
      })
    )
  ),
});

type Snapshot = z.infer<typeof snapshotSchema>;

export interface MemoryVectorIndexOptions {
  dimension: number;
  /** JSON snapshot written after every mutation when set */
  persistPath?: string;
}

/**
 * Exact brute-force cosine search over per-owner partitions.
 */
export class MemoryVectorIndex implements VectorIndex {
  readonly kind = 'memory';
  readonly dimension: number;
  private readonly persistPath?: string;
  // ownerId -> storageId -> entry
  private partitions = new Map<OwnerId, Map<string, VectorEntry>>();
  private ready?: Promise<void>;
  private writes: Promise<void> = Promise.resolve();

  constructor(options: MemoryVectorIndexOptions) {
    this.dimension = options.dimension;
    this.persistPath = options.persistPath;
  }

  /**
   * Loads the snapshot once. Every operation awaits the same load; a failed
   * load is forgotten so the next call reads the file again and fails again
   * while it stays corrupt, and nothing is written over it.
   */
  init(): Promise<void> {
    if (!this.ready) {
      this.ready = this.load().catch(error => {
        this.ready = undefined;
        throw error;
      });
    }
    return this.ready;
  }

  private async load(): Promise<void> {
    if (!this.persistPath) return;

    let raw: string;
    try {
      raw = await fs.readFile(this.persistPath, 'utf-8');
    } catch {
      logger.debug({ path: this.persistPath }, 'No vector snapshot, starting empty');
      return;
    }

    const parsed = snapshotSchema.safeParse(safeJson(raw));
    if (!parsed.success) {
      throw new IndexUnavailableError(`Vector snapshot at ${this.persistPath} is corrupt`, {
        context: { issues: parsed.error.issues.length },
      });
    }
    if (parsed.data.dimension !== this.dimension) {
      logger.warn(
        { path: this.persistPath, snapshot: parsed.data.dimension, configured: this.dimension },
        'Vector snapshot dimension differs from the configured embedding dimension; discarding vectors (run reindex)'
      );
      return;
    }

    const partitions = new Map<OwnerId, Map<string, VectorEntry>>();
    for (const [ownerId, entries] of Object.entries(parsed.data.owners)) {
      const partition = new Map<string, VectorEntry>();
      for (const entry of entries) {
        if (entry.vector.length !== this.dimension) continue;
        partition.set(storageId(ownerId, entry.chunkId), entry);
      }
      if (partition.size > 0) partitions.set(ownerId, partition);
    }
    this.partitions = partitions;
    logger.debug({ owners: partitions.size }, 'Loaded vector snapshot');
  }

  async add(ownerId: OwnerId, chunkId: ChunkId, vector: number[], metadata: VectorMetadata): Promise<void> {
    await this.addMany(ownerId, [{ chunkId, vector, ...metadata }]);
  }

  async addMany(ownerId: OwnerId, entries: VectorEntry[]): Promise<void> {
    assertOwner(ownerId);
    entries.forEach(entry => assertVector(entry.vector, this.dimension, `vector for ${entry.chunkId}`));
    if (entries.length === 0) return;
    await this.init();

    const partition = this.partition(ownerId);
    for (const entry of entries) {
      // replace the whole entry so readers never observe a half-written vector
      partition.set(storageId(ownerId, entry.chunkId), {
        chunkId: entry.chunkId,
        documentId: entry.documentId,
        chunkIndex: entry.chunkIndex,
        vector: [...entry.vector],
      });
    }
    await this.persist();
  }

  async search(ownerId: OwnerId, queryVector: number[], k: number, filters?: SearchFilters): Promise<SearchHit[]> {
    assertOwner(ownerId);
    assertTopK(k);
    assertVector(queryVector, this.dimension, 'query vector');
    await this.init();

    const partition = this.partitions.get(ownerId);
    if (!partition) return [];

    const allowed = filters?.documentIds ? new Set(filters.documentIds) : undefined;
    const hits: SearchHit[] = [];
    for (const entry of partition.values()) {
      if (allowed && !allowed.has(entry.documentId)) continue;
      hits.push({
        chunkId: entry.chunkId,
        documentId: entry.documentId,
        chunkIndex: entry.chunkIndex,
        score: cosineSimilarity(queryVector, entry.vector),
      });
    }
    return hits.sort(compareHits).slice(0, k);
  }

  async delete(ownerId: OwnerId, selector: DeleteSelector): Promise<number> {
    assertOwner(ownerId);
    await this.init();
    const partition = this.partitions.get(ownerId);
    if (!partition) return 0;

    let removed = 0;
    if ('chunkId' in selector) {
      removed = partition.delete(storageId(ownerId, selector.chunkId)) ? 1 : 0;
    } else {
      for (const [id, entry] of partition) {
        if (entry.documentId === selector.documentId) {
          partition.delete(id);
          removed++;
        }
      }
    }
    if (partition.size === 0) this.partitions.delete(ownerId);
    if (removed > 0) await this.persist();
    return removed;
  }

  async deleteAll(ownerId: OwnerId): Promise<number> {
    assertOwner(ownerId);
    await this.init();
    const removed = this.partitions.get(ownerId)?.size ?? 0;
    this.partitions.delete(ownerId);
    if (removed > 0) await this.persist();
    return removed;
  }

  async count(ownerId: OwnerId): Promise<number> {
    await this.init();
    return this.partitions.get(ownerId)?.size ?? 0;
  }

  async close(): Promise<void> {
    await this.writes;
  }

  private partition(ownerId: OwnerId): Map<string, VectorEntry> {
    let partition = this.partitions.get(ownerId);
    if (!partition) {
      partition = new Map();
      this.partitions.set(ownerId, partition);
    }
    return partition;
  }

  /**
   * Serialize snapshot writes; each write captures the state at the time it runs.
   */
  private persist(): Promise<void> {
    const target = this.persistPath;
    if (!target) return Promise.resolve();

    const write = this.writes.then(() => this.writeSnapshot(target));
    // keep the queue alive after a failed write; the caller still sees the failure
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async writeSnapshot(target: string): Promise<void> {
    const snapshot: Snapshot = { version: 1, dimension: this.dimension, owners: {} };
    for (const [ownerId, partition] of this.partitions) {
      snapshot.owners[ownerId] = [...partition.values()];
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      const tmp = `${target}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(snapshot), 'utf-8');
      await fs.rename(tmp, target); // atomic on same volume
    } catch (error) {
      throw new IndexUnavailableError(`Failed to write vector snapshot: ${getErrorMessage(error)}`, {
        cause: error,
        context: { path: target },
      });
    }
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
