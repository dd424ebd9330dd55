/**
 * Embedding providers map text to fixed-length vectors. Implementations must
 * be deterministic for identical text and model configuration.
 */

import { getLogger } from '../utils/logger.js';
import { withDeadline } from '../utils/abort.js';
import {
  EmbeddingUnavailableError,
  InvalidParametersError,
  SessionCancelledError,
  getErrorMessage,
  isCancellation,
  retry,
} from '../utils/errors.js';

const logger = getLogger('embedding');

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  /** Output order matches input order */
  embedMany(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface ResilienceOptions {
  timeoutMs: number;
  /** Delay before the single retry */
  retryDelayMs?: number;
}

/**
 * Decorates a provider with a per-call timeout and exactly one retry with
 * backoff. Every failure surfaces as EmbeddingUnavailableError, except
 * cancellation, which surfaces as SessionCancelledError.
 */
export class ResilientEmbeddingProvider implements EmbeddingProvider {
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly inner: EmbeddingProvider,
    options: ResilienceOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  get name(): string {
    return this.inner.name;
  }

  get dimension(): number {
    return this.inner.dimension;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.call('embed', [text], s => this.inner.embed(text, s).then(v => [v]), signal);
    return vector;
  }

  async embedMany(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.call('embedMany', texts, s => this.inner.embedMany(texts, s), signal);
  }

  private async call(
    operation: string,
    texts: string[],
    fn: (signal: AbortSignal) => Promise<number[][]>,
    signal?: AbortSignal
  ): Promise<number[][]> {
    try {
      return await retry(
        async () => {
          const vectors = await withDeadline(fn, this.timeoutMs, {
            signal,
            message: `${this.name} ${operation} timed out after ${this.timeoutMs}ms`,
          });
          this.assertShape(vectors, texts.length);
          return vectors;
        },
        {
          maxAttempts: 2,
          delay: this.retryDelayMs,
          shouldRetry: error => !isCancellation(error, signal) && !(error instanceof InvalidParametersError),
          onError: (error, attempt) =>
            logger.warn(
              { provider: this.name, operation, attempt, err: getErrorMessage(error) },
              'Embedding call failed'
            ),
        }
      );
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw new SessionCancelledError();
      }
      if (error instanceof InvalidParametersError) {
        throw error;
      }
      throw new EmbeddingUnavailableError(`Embedding provider ${this.name} unavailable: ${getErrorMessage(error)}`, {
        cause: error,
        context: { provider: this.name, operation, count: texts.length },
      });
    }
  }

  private assertShape(vectors: number[][], expected: number): void {
    if (vectors.length !== expected) {
      throw new Error(`expected ${expected} vectors, received ${vectors.length}`);
    }
    for (const vector of vectors) {
      if (vector.length !== this.dimension || vector.some(x => !Number.isFinite(x))) {
        throw new Error(`malformed vector of length ${vector.length}, expected ${this.dimension}`);
      }
    }
  }
}
