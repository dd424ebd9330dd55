import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createOpenAI } from '@ai-sdk/openai';
import { QAService, validateQuestion, type QAServiceDeps } from './QAService.js';
import { IngestionService } from '../ingestion/IngestionService.js';
import { RetrievalEngine } from '../retrieval/RetrievalEngine.js';
import { FallbackChain } from '../generation/FallbackChain.js';
import { AiSdkGenerationBackend } from '../generation/AiSdkGenerationBackend.js';
import { NO_CONTEXT_ANSWER } from '../generation/prompts.js';
import { MemoryVectorIndex } from '../vector/MemoryVectorIndex.js';
import { InMemoryDocumentStore } from '../store/DocumentStore.js';
import type { StreamEvent } from '../streaming/StreamingSession.js';
import { InvalidParametersError, NotFoundError, QuotaExceededError, SessionCancelledError } from '../utils/errors.js';
import { FakeEmbeddingProvider } from '../../tests/fakes/FakeEmbeddingProvider.js';
import { ScriptedGenerationBackend } from '../../tests/fakes/ScriptedGenerationBackend.js';

const mocks = vi.hoisted(() => ({ generateText: vi.fn() }));

vi.mock('ai', () => ({ generateText: mocks.generateText, streamText: vi.fn() }));

describe('validateQuestion', () => {
  it('trims the question', () => {
    expect(validateQuestion('  Why tides?  ')).toBe('Why tides?');
  });

  it('rejects empty and overlong questions', () => {
    expect(() => validateQuestion(' \n ')).toThrow(InvalidParametersError);
    expect(() => validateQuestion('x'.repeat(2001))).toThrow(InvalidParametersError);
    expect(validateQuestion('x'.repeat(2000))).toHaveLength(2000);
  });
});

describe('QAService', () => {
  let embedder: FakeEmbeddingProvider;
  let index: MemoryVectorIndex;
  let store: InMemoryDocumentStore;
  let ingestion: IngestionService;
  let retrieval: RetrievalEngine;

  function create(chain: FallbackChain, overrides: Partial<QAServiceDeps> = {}): QAService {
    return new QAService({
      retrieval,
      chain,
      store,
      index,
      embedder,
      retrievalDefaults: { topK: 3, maxContextLength: 1000 },
      streaming: { bufferSize: 4 },
      limits: { rateLimitEnabled: false, maxQueriesPerHour: 100, maxDocumentsPerUser: 10, maxChunksPerDocument: 100 },
      ...overrides,
    });
  }

  beforeEach(() => {
    embedder = new FakeEmbeddingProvider(4);
    index = new MemoryVectorIndex({ dimension: 4 });
    store = new InMemoryDocumentStore();
    ingestion = new IngestionService({
      store,
      index,
      embedder,
      chunking: { size: 100, overlap: 0, lookBack: 100 },
      limits: { maxDocumentsPerUser: 10, maxChunksPerDocument: 100 },
    });
    retrieval = new RetrievalEngine({ embedder, index, store, searchTimeoutMs: 1000, searchRetryDelayMs: 1 });
  });

  describe('ask', () => {
    it('answers from the owner’s documents and records whole-answer history', async () => {
      await ingestion.ingest('alice', { text: 'Tides follow the moon.', title: 'Tides' });
      const clock = [1000, 1042];
      const service = create(new FallbackChain([new ScriptedGenerationBackend('primary', { fragments: ['The moon.'] })]), {
        now: () => clock.shift() ?? 0,
      });

      const result = await service.ask('alice', '  Why are there tides?  ');

      expect(result).toEqual({
        answer: 'The moon.',
        elapsedMs: 42,
        chunkIds: ['doc_000001:0'],
        backend: 'primary',
        fallbacks: [],
      });
      const [record] = await store.listHistory('alice');
      expect(record).toMatchObject({
        ownerId: 'alice',
        question: 'Why are there tides?',
        answer: 'The moon.',
        elapsedMs: 42,
        chunkCount: 1,
        chunkIds: ['doc_000001:0'],
        backend: 'primary',
        mode: 'whole',
      });
    });

    it('answers the fixed text when the owner has no documents', async () => {
      await ingestion.ingest('bob', { text: 'Bob only.' });
      const service = create(new FallbackChain([]));

      const result = await service.ask('alice', 'Anything?');

      expect(result.answer).toBe(NO_CONTEXT_ANSWER);
      expect(result.chunkIds).toEqual([]);
      expect(result.backend).toBe('extractive');
    });

    it('reports fallbacks taken on the way to an answer', async () => {
      await ingestion.ingest('alice', { text: 'Tides follow the moon.' });
      const service = create(
        new FallbackChain([
          new ScriptedGenerationBackend('primary', { fail: 'down' }),
          new ScriptedGenerationBackend('secondary', { fragments: ['Gravity.'] }),
        ])
      );

      const result = await service.ask('alice', 'Why tides?');

      expect(result.backend).toBe('secondary');
      expect(result.fallbacks).toEqual([{ from: 'primary', to: 'secondary', reason: 'down' }]);
    });

    it('hands per-call generation settings to the model', async () => {
      await ingestion.ingest('alice', { text: 'Tides follow the moon.' });
      mocks.generateText.mockResolvedValue({ text: 'The moon pulls the water.' });
      const hosted = new AiSdkGenerationBackend({
        name: 'hosted:test-model',
        kind: 'hosted',
        model: createOpenAI({ apiKey: 'test-secret' })('gpt-4o-mini'),
        defaults: { temperature: 0.3, topP: 0.9, maxOutputTokens: 500, timeoutMs: 1000 },
      });
      const service = create(new FallbackChain([hosted]));

      const result = await service.ask('alice', 'Why tides?', { generation: { temperature: 0.9, maxOutputTokens: 42 } });

      expect(result.answer).toBe('The moon pulls the water.');
      expect(mocks.generateText).toHaveBeenCalledWith(
        expect.objectContaining({ temperature: 0.9, topP: 0.9, maxTokens: 42 })
      );
    });

    it('rejects out-of-range generation settings', async () => {
      const service = create(new FallbackChain([]));

      await expect(service.ask('alice', 'Why?', { generation: { temperature: 3 } })).rejects.toBeInstanceOf(
        InvalidParametersError
      );
      await expect(service.stream('alice', 'Why?', { generation: { maxOutputTokens: 0 } })).rejects.toBeInstanceOf(
        InvalidParametersError
      );
    });

    it('rejects invalid questions before doing any work', async () => {
      const service = create(new FallbackChain([]));

      await expect(service.ask('alice', '   ')).rejects.toBeInstanceOf(InvalidParametersError);
      expect(embedder.calls).toEqual([]);
    });
  });

  describe('rate limit', () => {
    const limits = { rateLimitEnabled: true, maxQueriesPerHour: 2, maxDocumentsPerUser: 10, maxChunksPerDocument: 100 };

    it('refuses questions beyond the hourly allowance', async () => {
      const service = create(new FallbackChain([]), { limits });

      await service.ask('alice', 'One?');
      await service.ask('alice', 'Two?');

      await expect(service.ask('alice', 'Three?')).rejects.toBeInstanceOf(QuotaExceededError);
      await expect(service.stream('alice', 'Three?')).rejects.toBeInstanceOf(QuotaExceededError);
      await expect(service.ask('bob', 'One?')).resolves.toMatchObject({ backend: 'extractive' });
    });

    it('is not applied when disabled', async () => {
      const service = create(new FallbackChain([]), { limits: { ...limits, rateLimitEnabled: false } });

      for (const question of ['One?', 'Two?', 'Three?']) {
        await service.ask('alice', question);
      }
      await expect(store.countQueriesSince('alice', new Date(0))).resolves.toBe(3);
    });
  });

  it('streams through a session that records stream-mode history', async () => {
    await ingestion.ingest('alice', { text: 'Tides follow the moon.' });
    const primary = new ScriptedGenerationBackend('primary', { fragments: ['The ', 'moon.'] });
    const service = create(new FallbackChain([primary]));

    const session = await service.stream('alice', 'Why tides?', { generation: { temperature: 0.1 } });
    const events: StreamEvent[] = [];
    for await (const event of session.events()) events.push(event);

    expect(events.filter(event => event.type === 'chunk')).toEqual([
      { type: 'chunk', content: 'The ' },
      { type: 'chunk', content: 'moon.' },
    ]);
    expect(events.at(-1)).toMatchObject({ type: 'complete', chunkCount: 1, backend: 'primary' });
    const [record] = await store.listHistory('alice');
    expect(record).toMatchObject({ answer: 'The moon.', mode: 'stream', question: 'Why tides?' });
    expect(primary.settings).toEqual([{ temperature: 0.1 }]);
  });

  describe('askMany', () => {
    it('answers each question in order and reports failures in place', async () => {
      await ingestion.ingest('alice', { text: 'Tides follow the moon.' });
      const service = create(new FallbackChain([new ScriptedGenerationBackend('primary', { fragments: ['The moon.'] })]));

      const items = await service.askMany('alice', ['Why tides?', '   ', 'What moves the sea?']);

      expect(items.map(item => item.status)).toEqual(['answered', 'failed', 'answered']);
      expect(items[1]).toEqual({
        question: '   ',
        status: 'failed',
        kind: 'invalid_parameters',
        message: 'Question must not be empty',
      });
      const history = await store.listHistory('alice');
      expect(history.map(record => record.question)).toEqual(['What moves the sea?', 'Why tides?']);
    });

    it('rejects empty and oversized batches', async () => {
      const service = create(new FallbackChain([]));

      await expect(service.askMany('alice', [])).rejects.toBeInstanceOf(InvalidParametersError);
      await expect(service.askMany('alice', new Array<string>(21).fill('Why?'))).rejects.toBeInstanceOf(
        InvalidParametersError
      );
    });

    it('stops the batch on cancellation', async () => {
      const service = create(new FallbackChain([]));
      const controller = new AbortController();
      controller.abort();

      await expect(service.askMany('alice', ['One?', 'Two?'], { signal: controller.signal })).rejects.toBeInstanceOf(
        SessionCancelledError
      );
      await expect(store.listHistory('alice')).resolves.toEqual([]);
    });
  });

  it('analyzes question words, peak hour and daily rate', async () => {
    const service = create(new FallbackChain([]));
    await service.ask('alice', 'What causes tides?');
    await service.ask('alice', 'How and why do tides rise?');
    await service.ask('alice', 'Somehow, tides?');
    await service.ask('bob', 'Where is Bob?');
    const hours = (await store.listHistory('alice')).map(record => new Date(record.createdAt).getUTCHours());

    const patterns = await service.queryPatterns('alice', 7);

    expect(patterns.ownerId).toBe('alice');
    expect(patterns.totalQueries).toBe(3);
    expect(patterns.questionTypes).toEqual({ what: 1, how: 1, when: 0, where: 0, why: 1 });
    expect(hours).toContain(patterns.peakHour);
    expect(patterns.queriesPerDay).toBe(0.43);
    await expect(service.queryPatterns('carol')).resolves.toMatchObject({ totalQueries: 0, peakHour: null });
    await expect(service.queryPatterns('alice', 0)).rejects.toBeInstanceOf(InvalidParametersError);
  });

  it('lists history most recent first', async () => {
    const service = create(new FallbackChain([]));
    await service.ask('alice', 'First?');
    await service.ask('alice', 'Second?');

    const history = await service.history('alice', 1);

    expect(history.map(record => record.question)).toEqual(['Second?']);
    await expect(service.history('alice', 0)).rejects.toBeInstanceOf(InvalidParametersError);
  });

  describe('suggestQuestions', () => {
    it('returns nothing without documents', async () => {
      await expect(create(new FallbackChain([])).suggestQuestions('alice')).resolves.toEqual([]);
    });

    it('builds three questions from the newest titles', async () => {
      await ingestion.ingest('alice', { text: 'First text.', title: 'Older' });
      await ingestion.ingest('alice', { text: 'Second text.', title: 'Newer' });

      await expect(create(new FallbackChain([])).suggestQuestions('alice')).resolves.toEqual([
        'What is the main topic of "Newer"?',
        'Can you summarize the key points of "Older"?',
        'What are the important facts mentioned in "Newer"?',
      ]);
    });

    it('focuses on one document when asked', async () => {
      const { document } = await ingestion.ingest('alice', { text: 'First text.', title: 'Older' });
      await ingestion.ingest('alice', { text: 'Second text.', title: 'Newer' });
      const service = create(new FallbackChain([]));

      await expect(service.suggestQuestions('alice', document.id)).resolves.toEqual([
        'What is the main topic of "Older"?',
        'Can you summarize the key points of "Older"?',
        'What are the important facts mentioned in "Older"?',
      ]);
      await expect(service.suggestQuestions('bob', document.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('summarizes usage for the period', async () => {
    await ingestion.ingest('alice', { text: 'Tides follow the moon.' });
    const service = create(new FallbackChain([]));
    await service.ask('alice', 'One?');
    await service.ask('alice', 'Two?');
    const history = await store.listHistory('alice');
    const day = history[0].createdAt.slice(0, 10);

    const report = await service.usageReport('alice', 7);

    expect(report.ownerId).toBe('alice');
    expect(report.periodDays).toBe(7);
    expect(report.documents).toEqual({ total: 1, recent: 1, chunks: 1 });
    expect(report.queries.total).toBe(2);
    expect(report.queries.recent).toBe(2);
    expect(report.queries.daily).toEqual({ [day]: 2 });
    expect(report.limits).toEqual({
      maxDocuments: 10,
      maxQueriesPerHour: 100,
      documentsRemaining: 9,
      rateLimitEnabled: false,
    });
    await expect(service.usageReport('alice', 0)).rejects.toBeInstanceOf(InvalidParametersError);
  });

  it('exports only the owner’s data', async () => {
    await ingestion.ingest('alice', { text: 'Tides follow the moon.' });
    await ingestion.ingest('bob', { text: 'Bob keeps this.' });
    const service = create(new FallbackChain([]));
    await service.ask('alice', 'Why tides?');

    const exported = await service.exportOwnerData('alice');

    expect(exported.ownerId).toBe('alice');
    expect(exported.documents.map(doc => doc.ownerId)).toEqual(['alice']);
    expect(exported.chunks.map(chunk => chunk.text)).toEqual(['Tides follow the moon.']);
    expect(exported.history.map(record => record.question)).toEqual(['Why tides?']);
  });

  it('describes the configured backends', () => {
    const service = create(new FallbackChain([new ScriptedGenerationBackend('local:qwen3', {})]));

    expect(service.backendStatus()).toEqual({
      generation: [
        { name: 'local:qwen3', kind: 'local' },
        { name: 'extractive', kind: 'extractive' },
      ],
      vector: { kind: 'memory', dimension: 4 },
      embedding: { name: 'fake', dimension: 4 },
    });
  });
});
