import { describe, it, expect, beforeEach } from 'vitest';
import { StreamingSession, type SessionRequest, type StreamEvent } from './StreamingSession.js';
import { RetrievalEngine } from '../retrieval/RetrievalEngine.js';
import { FallbackChain } from '../generation/FallbackChain.js';
import { MemoryVectorIndex } from '../vector/MemoryVectorIndex.js';
import { InMemoryDocumentStore } from '../store/DocumentStore.js';
import { buildChunks, fingerprint } from '../chunking/Chunker.js';
import { EmbeddingUnavailableError, GroundworkError } from '../utils/errors.js';
import { FakeEmbeddingProvider } from '../../tests/fakes/FakeEmbeddingProvider.js';
import { ScriptedGenerationBackend } from '../../tests/fakes/ScriptedGenerationBackend.js';

const QUESTION = 'Why are there tides?';
const TEXT = 'Tides follow the moon.';

describe('StreamingSession', () => {
  let embedder: FakeEmbeddingProvider;
  let store: InMemoryDocumentStore;
  let retrieval: RetrievalEngine;
  let request: SessionRequest;

  beforeEach(async () => {
    embedder = new FakeEmbeddingProvider(4).set(QUESTION, [1, 0, 0, 0]);
    const index = new MemoryVectorIndex({ dimension: 4 });
    store = new InMemoryDocumentStore();
    retrieval = new RetrievalEngine({ embedder, index, store, searchTimeoutMs: 1000, searchRetryDelayMs: 1 });

    const id = await store.allocateDocumentId();
    const chunks = buildChunks(id, 'alice', TEXT, { targetSize: 100, overlap: 0 });
    await store.saveDocument(
      {
        id,
        ownerId: 'alice',
        title: 'Tides',
        fingerprint: fingerprint(TEXT),
        chunkCount: chunks.length,
        chunking: { targetSize: 100, overlap: 0 },
        createdAt: new Date().toISOString(),
      },
      chunks
    );
    await index.add('alice', chunks[0].id, [1, 0, 0, 0], { documentId: id, chunkIndex: 0 });

    request = { ownerId: 'alice', question: QUESTION, k: 3, maxContextLength: 1000 };
  });

  function session(backends: ScriptedGenerationBackend[], bufferSize = 8): StreamingSession {
    const clock = [1000, 1042];
    return new StreamingSession(
      { retrieval, chain: new FallbackChain(backends), store, bufferSize, now: () => clock.shift() ?? 0 },
      request
    );
  }

  async function collect(target: StreamingSession): Promise<StreamEvent[]> {
    const events: StreamEvent[] = [];
    for await (const event of target.events()) events.push(event);
    return events;
  }

  it('streams status, chunks and completion in order', async () => {
    const primary = new ScriptedGenerationBackend('primary', { fragments: ['Tides ', 'follow ', 'the moon.'] });
    const target = session([primary]);

    const events = await collect(target);

    expect(events).toEqual([
      { type: 'status', status: 'searching', message: 'Searching documents' },
      { type: 'status', status: 'generating', message: 'Generating answer from 1 context chunk(s)' },
      { type: 'chunk', content: 'Tides ' },
      { type: 'chunk', content: 'follow ' },
      { type: 'chunk', content: 'the moon.' },
      { type: 'complete', elapsedMs: 42, chunkCount: 1, backend: 'primary' },
    ]);
    expect(target.state).toBe('completed');
    expect(primary.released).toBe(true);
  });

  it('falls back once after a primary timeout and records the fallback answer', async () => {
    const primary = new ScriptedGenerationBackend('primary', { timeout: true });
    const secondary = new ScriptedGenerationBackend('secondary', { fragments: ['Gravity.'] });

    const events = await collect(session([primary, secondary]));

    const notices = events.filter(event => event.type === 'status' && event.status === 'fallback');
    expect(notices).toEqual([
      {
        type: 'status',
        status: 'fallback',
        message: 'primary failed (primary produced no output for 20ms); trying secondary',
        backend: 'secondary',
      },
    ]);
    expect(events.at(-1)).toEqual({ type: 'complete', elapsedMs: 42, chunkCount: 1, backend: 'secondary' });

    const [record] = await store.listHistory('alice');
    expect(record).toMatchObject({
      question: QUESTION,
      answer: 'Gravity.',
      backend: 'secondary',
      mode: 'stream',
      chunkCount: 1,
      elapsedMs: 42,
      chunkIds: ['doc_000001:0'],
    });
  });

  it('writes the history record before emitting completion', async () => {
    const primary = new ScriptedGenerationBackend('primary', { fragments: ['Moon.'] });
    let recordsAtCompletion = -1;

    for await (const event of session([primary]).events()) {
      if (event.type === 'complete') {
        recordsAtCompletion = (await store.listHistory('alice')).length;
      }
    }

    expect(recordsAtCompletion).toBe(1);
  });

  it('stops cleanly when the consumer disconnects mid-stream', async () => {
    const fragments = ['a ', 'b ', 'c ', 'd ', 'e ', 'f ', 'g ', 'h ', 'i ', 'j'];
    const primary = new ScriptedGenerationBackend('primary', { fragments });
    const secondary = new ScriptedGenerationBackend('secondary', { fragments: ['unused'] });
    const target = session([primary, secondary], 1);
    const seen: StreamEvent[] = [];

    let chunks = 0;
    for await (const event of target.events()) {
      seen.push(event);
      if (event.type === 'chunk' && ++chunks === 2) break;
    }

    expect(seen.map(event => event.type)).toEqual(['status', 'status', 'chunk', 'chunk']);
    expect(target.state).toBe('cancelled');
    expect(target.signal.aborted).toBe(true);
    expect(primary.released).toBe(true);
    expect(primary.emitted.length).toBeLessThan(fragments.length);
    expect(secondary.streamCalls).toBe(0);
    await expect(store.listHistory('alice')).resolves.toEqual([]);
  });

  it('emits nothing further after an explicit cancel', async () => {
    const primary = new ScriptedGenerationBackend('primary', { fragments: ['a ', 'b ', 'c'], delayMs: 5 });
    const target = session([primary]);
    const seen: StreamEvent[] = [];

    for await (const event of target.events()) {
      seen.push(event);
      if (event.type === 'chunk') target.cancel();
    }

    expect(seen.at(-1)).toEqual({ type: 'chunk', content: 'a ' });
    expect(seen.some(event => event.type === 'complete' || event.type === 'error')).toBe(false);
    expect(target.state).toBe('cancelled');
    await expect(store.listHistory('alice')).resolves.toEqual([]);
  });

  it('reports an unrecoverable failure as exactly one error event', async () => {
    embedder.failWith(new EmbeddingUnavailableError('Embedding provider fake unavailable: down'));
    const primary = new ScriptedGenerationBackend('primary', { fragments: ['unused'] });
    const target = session([primary]);

    const events = await collect(target);

    expect(events).toEqual([
      { type: 'status', status: 'searching', message: 'Searching documents' },
      { type: 'error', kind: 'embedding_unavailable', message: 'Embedding provider fake unavailable: down' },
    ]);
    expect(target.state).toBe('errored');
    expect(primary.streamCalls).toBe(0);
  });

  it('reports a generation failure after streaming began as an error', async () => {
    const primary = new ScriptedGenerationBackend('primary', { fragments: ['Tides ', 'follow'], failAfter: 1 });

    const events = await collect(session([primary]));

    expect(events.slice(2)).toEqual([
      { type: 'chunk', content: 'Tides ' },
      {
        type: 'error',
        kind: 'generation_backend_failure',
        message: 'primary failed after 1 fragment(s): primary connection reset',
      },
    ]);
  });

  it('produces nothing when cancelled before it starts', async () => {
    const primary = new ScriptedGenerationBackend('primary', { fragments: ['unused'] });
    const target = session([primary]);
    target.cancel();

    await expect(collect(target)).resolves.toEqual([]);
    expect(embedder.calls).toEqual([]);
  });

  it('can only be consumed once', async () => {
    const target = session([new ScriptedGenerationBackend('primary', { fragments: ['x'] })]);
    await collect(target);

    await expect(collect(target)).rejects.toBeInstanceOf(GroundworkError);
  });
});
