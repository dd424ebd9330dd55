import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetrievalEngine, assembleContext, type ContextItem } from './RetrievalEngine.js';
import { MemoryVectorIndex } from '../vector/MemoryVectorIndex.js';
import { InMemoryDocumentStore } from '../store/DocumentStore.js';
import { buildChunks, fingerprint } from '../chunking/Chunker.js';
import {
  EmbeddingUnavailableError,
  IndexUnavailableError,
  InvalidParametersError,
  SessionCancelledError,
} from '../utils/errors.js';
import { FakeEmbeddingProvider } from '../../tests/fakes/FakeEmbeddingProvider.js';

const DIM = 4;
const QUESTION = 'Which chunk matters?';

/** Unit vector whose cosine with [1, 0, 0, 0] is `score` */
const atScore = (score: number) => [score, Math.sqrt(1 - score * score), 0, 0];

describe('RetrievalEngine', () => {
  let embedder: FakeEmbeddingProvider;
  let index: MemoryVectorIndex;
  let store: InMemoryDocumentStore;
  let engine: RetrievalEngine;

  async function ingest(ownerId: string, text: string, chunkSize: number, vectors: number[][]): Promise<string> {
    const id = await store.allocateDocumentId();
    const chunks = buildChunks(id, ownerId, text, { targetSize: chunkSize, overlap: 0 });
    await store.saveDocument(
      {
        id,
        ownerId,
        title: id,
        fingerprint: fingerprint(text),
        chunkCount: chunks.length,
        chunking: { targetSize: chunkSize, overlap: 0 },
        createdAt: new Date().toISOString(),
      },
      chunks
    );
    await index.addMany(
      ownerId,
      chunks.map((chunk, i) => ({ chunkId: chunk.id, documentId: id, chunkIndex: chunk.index, vector: vectors[i] }))
    );
    return id;
  }

  beforeEach(() => {
    embedder = new FakeEmbeddingProvider(DIM).set(QUESTION, [1, 0, 0, 0]);
    index = new MemoryVectorIndex({ dimension: DIM });
    store = new InMemoryDocumentStore();
    engine = new RetrievalEngine({ embedder, index, store, searchTimeoutMs: 1000, searchRetryDelayMs: 1 });
  });

  it('returns the two best chunks in score order', async () => {
    // chunks 1, 2, 3 of one document (indices 0, 1, 2) scoring 0.4, 0.9, 0.3
    const id = await ingest('alice', 'aaaaa' + 'bbbbb' + 'ccccc', 5, [atScore(0.4), atScore(0.9), atScore(0.3)]);

    const bundle = await engine.retrieve('alice', QUESTION, { k: 2, maxContextLength: 1000 });

    expect(bundle.items.map(item => item.chunkId)).toEqual([`${id}:1`, `${id}:0`]);
    expect(bundle.items.map(item => item.text)).toEqual(['bbbbb', 'aaaaa']);
    expect(bundle.items[0].score).toBeCloseTo(0.9, 9);
    expect(bundle.totalLength).toBe(10);
    expect(bundle.question).toBe(QUESTION);
  });

  it('returns an empty bundle for an owner with no vectors', async () => {
    await ingest('bob', 'bob only text', 100, [atScore(1)]);

    await expect(engine.retrieve('alice', QUESTION, { k: 5, maxContextLength: 1000 })).resolves.toEqual({
      question: QUESTION,
      items: [],
      totalLength: 0,
    });
  });

  it('stops assembling at the first chunk that does not fit', async () => {
    await ingest('alice', 'x'.repeat(30) + 'y'.repeat(30) + 'z'.repeat(30), 30, [
      atScore(0.9),
      atScore(0.8),
      atScore(0.7),
    ]);

    const bundle = await engine.retrieve('alice', QUESTION, { k: 3, maxContextLength: 59 });

    expect(bundle.items).toHaveLength(1);
    expect(bundle.totalLength).toBe(30);
  });

  it('skips hits whose chunk text is not in the store', async () => {
    const id = await ingest('alice', 'present text', 100, [atScore(0.5)]);
    await index.add('alice', 'doc_999999:0', atScore(0.99), { documentId: 'doc_999999', chunkIndex: 0 });

    const bundle = await engine.retrieve('alice', QUESTION, { k: 5, maxContextLength: 1000 });

    expect(bundle.items.map(item => item.chunkId)).toEqual([`${id}:0`]);
  });

  it('honours a document filter', async () => {
    await ingest('alice', 'first document', 100, [atScore(0.9)]);
    const second = await ingest('alice', 'second document', 100, [atScore(0.2)]);

    const bundle = await engine.retrieve('alice', QUESTION, { k: 5, maxContextLength: 1000, documentIds: [second] });

    expect(bundle.items.map(item => item.documentId)).toEqual([second]);
  });

  it.each([
    [{ k: 0, maxContextLength: 100 }],
    [{ k: 3, maxContextLength: 0 }],
  ])('rejects %o', async options => {
    await expect(engine.retrieve('alice', QUESTION, options)).rejects.toBeInstanceOf(InvalidParametersError);
  });

  it('propagates embedding failures unchanged', async () => {
    const failure = new EmbeddingUnavailableError('down');
    embedder.failWith(failure);

    await expect(engine.retrieve('alice', QUESTION, { k: 2, maxContextLength: 100 })).rejects.toBe(failure);
  });

  it('retries a failed search once before giving up', async () => {
    const search = vi.spyOn(index, 'search').mockRejectedValue(new IndexUnavailableError('offline'));

    await expect(engine.retrieve('alice', QUESTION, { k: 2, maxContextLength: 100 })).rejects.toBeInstanceOf(
      IndexUnavailableError
    );
    expect(search).toHaveBeenCalledTimes(2);
  });

  it('does not retry a search once the call is cancelled', async () => {
    const controller = new AbortController();
    const search = vi.spyOn(index, 'search').mockImplementation(async () => {
      controller.abort();
      throw new IndexUnavailableError('offline');
    });

    await expect(
      engine.retrieve('alice', QUESTION, { k: 2, maxContextLength: 100, signal: controller.signal })
    ).rejects.toBeInstanceOf(SessionCancelledError);
    expect(search).toHaveBeenCalledTimes(1);
  });

  it('recovers when the retry succeeds', async () => {
    const id = await ingest('alice', 'recovered', 100, [atScore(0.7)]);
    vi.spyOn(index, 'search').mockRejectedValueOnce(new IndexUnavailableError('blip'));

    const bundle = await engine.retrieve('alice', QUESTION, { k: 2, maxContextLength: 100 });

    expect(bundle.items.map(item => item.chunkId)).toEqual([`${id}:0`]);
  });

  it('turns a slow search into IndexUnavailableError', async () => {
    vi.spyOn(index, 'search').mockImplementation(() => new Promise<never>(() => undefined));
    const slow = new RetrievalEngine({ embedder, index, store, searchTimeoutMs: 5, searchRetryDelayMs: 1 });

    await expect(slow.retrieve('alice', QUESTION, { k: 2, maxContextLength: 100 })).rejects.toBeInstanceOf(
      IndexUnavailableError
    );
  });
});

describe('assembleContext', () => {
  const item = (documentId: string, chunkIndex: number, score: number, text = 'text'): ContextItem => ({
    chunkId: `${documentId}:${chunkIndex}`,
    documentId,
    chunkIndex,
    text,
    score,
  });

  it('breaks score ties by document id then chunk index', () => {
    const bundle = assembleContext(
      'q',
      [item('doc_000002', 0, 0.5), item('doc_000001', 3, 0.5), item('doc_000001', 1, 0.5)],
      100
    );

    expect(bundle.items.map(i => i.chunkId)).toEqual(['doc_000001:1', 'doc_000001:3', 'doc_000002:0']);
  });

  it('does not skip ahead to smaller chunks once one overflows', () => {
    const bundle = assembleContext('q', [item('d', 0, 0.9, 'x'.repeat(8)), item('d', 1, 0.8, 'x'.repeat(5)), item('d', 2, 0.7, 'x')], 10);

    expect(bundle.items.map(i => i.chunkIndex)).toEqual([0]);
    expect(bundle.totalLength).toBe(8);
  });
});
