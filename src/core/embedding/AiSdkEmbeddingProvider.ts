import { createHash } from 'node:crypto';
import { embedMany, type EmbeddingModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createOllama } from 'ollama-ai-provider';
import type { EmbeddingProvider } from './EmbeddingProvider.js';

// ---------------------------------------------------------------------------
// Embedding provider over the AI SDK with a SHA-1 keyed in-memory cache.
// Re-ingesting unchanged chunks within one process never hits the network.
// ---------------------------------------------------------------------------

export interface AiSdkEmbeddingOptions {
  name: string;
  model: EmbeddingModel<string>;
  dimension: number;
  /** Maximum cached vectors before the oldest entries are evicted */
  cacheSize?: number;
}

export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  private readonly model: EmbeddingModel<string>;
  private readonly cacheSize: number;
  // cacheKey -> vector
  private readonly cache = new Map<string, number[]>();

  constructor(options: AiSdkEmbeddingOptions) {
    this.name = options.name;
    this.model = options.model;
    this.dimension = options.dimension;
    this.cacheSize = options.cacheSize ?? 10_000;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedMany([text], signal);
    return vector;
  }

  async embedMany(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = new Array(texts.length);
    const uncachedTexts: string[] = [];
    const uncachedIndexes: number[] = [];

    texts.forEach((text, idx) => {
      const cached = this.cache.get(sha1(text));
      if (cached) {
        vectors[idx] = cached;
      } else {
        uncachedTexts.push(text);
        uncachedIndexes.push(idx);
      }
    });

    if (uncachedTexts.length) {
      const { embeddings } = await embedMany({
        model: this.model,
        values: uncachedTexts,
        maxRetries: 0,
        abortSignal: signal,
      });

      embeddings.forEach((vector, i) => {
        vectors[uncachedIndexes[i]] = vector;
        this.remember(sha1(uncachedTexts[i]), vector);
      });
    }

    return vectors;
  }

  private remember(key: string, vector: number[]): void {
    if (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(key, vector);
  }
}

export function createOpenAIEmbeddingProvider(options: {
  apiKey: string;
  model: string;
  dimension: number;
}): AiSdkEmbeddingProvider {
  const openai = createOpenAI({ apiKey: options.apiKey });
  return new AiSdkEmbeddingProvider({
    name: `openai:${options.model}`,
    model: openai.embedding(options.model, { dimensions: options.dimension }),
    dimension: options.dimension,
  });
}

export function createOllamaEmbeddingProvider(options: {
  baseUrl: string;
  model: string;
  dimension: number;
}): AiSdkEmbeddingProvider {
  const ollama = createOllama({ baseURL: `${options.baseUrl.replace(/\/$/, '')}/api` });
  return new AiSdkEmbeddingProvider({
    name: `ollama:${options.model}`,
    model: ollama.embedding(options.model),
    dimension: options.dimension,
  });
}

function sha1(data: string): string {
  return createHash('sha1').update(data).digest('hex');
}
