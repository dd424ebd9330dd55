import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { EmbeddingModel } from 'ai';
import { ResilientEmbeddingProvider } from './EmbeddingProvider.js';
import { HashingEmbeddingProvider } from './HashingEmbeddingProvider.js';
import { AiSdkEmbeddingProvider } from './AiSdkEmbeddingProvider.js';
import { cosineSimilarity } from '../vector/VectorIndex.js';
import {
  EmbeddingUnavailableError,
  InvalidParametersError,
  SessionCancelledError,
} from '../utils/errors.js';
import { FakeEmbeddingProvider } from '../../tests/fakes/FakeEmbeddingProvider.js';

vi.mock('ai', () => ({
  embedMany: vi.fn(async ({ values }: { values: string[] }) => ({
    embeddings: values.map(v => [v.length, 1]),
  })),
}));

describe('HashingEmbeddingProvider', () => {
  const provider = new HashingEmbeddingProvider(64);

  it('produces unit vectors of the configured dimension', async () => {
    const vector = await provider.embed('The quick brown fox');
    const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));

    expect(vector).toHaveLength(64);
    expect(norm).toBeCloseTo(1, 9);
  });

  it('is deterministic', async () => {
    expect(await provider.embed('Same text here')).toEqual(await provider.embed('Same text here'));
  });

  it('scores shared vocabulary above unrelated text', async () => {
    const [query, related, unrelated] = await provider.embedMany([
      'how do solar panels generate electricity',
      'solar panels generate electricity from sunlight',
      'a recipe for lemon cake with icing',
    ]);

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('maps text without tokens to the zero vector', async () => {
    expect(await provider.embed('  ...  ')).toEqual(new Array(64).fill(0));
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow(RangeError);
  });
});

describe('ResilientEmbeddingProvider', () => {
  let inner: FakeEmbeddingProvider;
  let provider: ResilientEmbeddingProvider;

  beforeEach(() => {
    inner = new FakeEmbeddingProvider(4);
    provider = new ResilientEmbeddingProvider(inner, { timeoutMs: 50, retryDelayMs: 1 });
  });

  it('passes results through and keeps input order', async () => {
    inner.set('a', [1, 0, 0, 0]).set('b', [0, 1, 0, 0]);

    await expect(provider.embedMany(['b', 'a'])).resolves.toEqual([
      [0, 1, 0, 0],
      [1, 0, 0, 0],
    ]);
  });

  it('retries once after a transient failure', async () => {
    inner.set('a', [1, 0, 0, 0]).failWith(new Error('socket hang up'));

    await expect(provider.embed('a')).resolves.toEqual([1, 0, 0, 0]);
    expect(inner.calls).toHaveLength(2);
  });

  it('gives up after the second failure with EmbeddingUnavailableError', async () => {
    inner.failWith(new Error('503'), new Error('503'));

    await expect(provider.embed('a')).rejects.toBeInstanceOf(EmbeddingUnavailableError);
    expect(inner.calls).toHaveLength(2);
  });

  it('treats a timeout as unavailability', async () => {
    inner.delayMs = 200;

    await expect(provider.embed('slow')).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });

  it('treats a vector of the wrong length as a malformed response', async () => {
    inner.set('short', [1, 0]);

    await expect(provider.embed('short')).rejects.toThrow(/malformed vector of length 2/);
  });

  it('does not retry caller errors', async () => {
    inner.failWith(new InvalidParametersError('bad input'));

    await expect(provider.embed('a')).rejects.toBeInstanceOf(InvalidParametersError);
    expect(inner.calls).toHaveLength(1);
  });

  it('reports cancellation instead of unavailability', async () => {
    const controller = new AbortController();
    inner.delayMs = 20;
    const pending = provider.embed('a', controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(SessionCancelledError);
    expect(inner.calls).toHaveLength(1);
  });

  it('skips the call for an empty batch', async () => {
    await expect(provider.embedMany([])).resolves.toEqual([]);
    expect(inner.calls).toHaveLength(0);
  });
});

describe('AiSdkEmbeddingProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('only sends texts it has not embedded before', async () => {
    const { embedMany } = await import('ai');
    const model: EmbeddingModel<string> = {
      specificationVersion: 'v1',
      provider: 'test',
      modelId: 'test-embedding',
      maxEmbeddingsPerCall: undefined,
      supportsParallelCalls: true,
      doEmbed: async () => ({ embeddings: [] }),
    };
    const provider = new AiSdkEmbeddingProvider({ name: 'test', model, dimension: 2 });

    await expect(provider.embedMany(['one', 'three'])).resolves.toEqual([
      [3, 1],
      [5, 1],
    ]);
    await expect(provider.embedMany(['three', 'fourth'])).resolves.toEqual([
      [5, 1],
      [6, 1],
    ]);

    expect(embedMany).toHaveBeenCalledTimes(2);
    expect(vi.mocked(embedMany).mock.calls[1][0]).toMatchObject({ values: ['fourth'], maxRetries: 0 });
  });
});
