/**
 * Ordered list of generation backends tried one after another.
 *
 * A backend failure moves on to the next backend and produces one fallback
 * notice. Any answer, including an empty one, is final. Cancellation stops
 * the chain immediately. While streaming, a backend may only be abandoned
 * before it has delivered its first fragment.
 */

import type { ContextItem } from '../retrieval/RetrievalEngine.js';
import { getLogger } from '../utils/logger.js';
import {
  GenerationBackendError,
  SessionCancelledError,
  getErrorMessage,
  isCancellation,
  throwIfCancelled,
} from '../utils/errors.js';
import type { GenerationBackend, GenerationSettings } from './GenerationBackend.js';
import { ExtractiveGenerationBackend } from './ExtractiveGenerationBackend.js';

const logger = getLogger('generation:chain');

export type FallbackNotice = {
  /** Backend that failed */
  from: string;
  /** Backend tried next */
  to: string;
  reason: string;
};

export type ChainEvent =
  | { type: 'fragment'; content: string; backend: string }
  | { type: 'fallback'; notice: FallbackNotice }
  | { type: 'done'; backend: string };

export type ChainAnswer = {
  answer: string;
  backend: string;
  fallbacks: FallbackNotice[];
};

export interface ChainCallOptions {
  signal?: AbortSignal;
  /** Passed to every backend tried; unset fields keep each backend's defaults */
  generation?: GenerationSettings;
  onFallback?: (notice: FallbackNotice) => void;
}

type Failure = { backend: string; message: string };

export class FallbackChain {
  readonly backends: ReadonlyArray<GenerationBackend>;

  constructor(backends: GenerationBackend[]) {
    this.backends = backends.some(b => b.kind === 'extractive')
      ? [...backends]
      : [...backends, new ExtractiveGenerationBackend()];
  }

  async generate(question: string, context: ContextItem[], options: ChainCallOptions = {}): Promise<ChainAnswer> {
    const { signal } = options;
    const failures: Failure[] = [];
    const fallbacks: FallbackNotice[] = [];

    for (let i = 0; i < this.backends.length; i++) {
      const backend = this.backends[i];
      throwIfCancelled(signal);
      try {
        const answer = await backend.generate(question, context, { ...options.generation, signal });
        return { answer, backend: backend.name, fallbacks };
      } catch (error) {
        if (isCancellation(error, signal)) throw new SessionCancelledError();
        const notice = this.recordFailure(backend, i, error, failures);
        if (notice) {
          fallbacks.push(notice);
          options.onFallback?.(notice);
        }
      }
    }

    throw this.exhausted(failures);
  }

  async *stream(question: string, context: ContextItem[], options: ChainCallOptions = {}): AsyncGenerator<ChainEvent> {
    const { signal } = options;
    const failures: Failure[] = [];

    for (let i = 0; i < this.backends.length; i++) {
      const backend = this.backends[i];
      throwIfCancelled(signal);

      const iterator = backend.stream(question, context, { ...options.generation, signal })[Symbol.asyncIterator]();
      let delivered = 0;
      let notice: FallbackNotice | undefined;
      try {
        while (true) {
          const next = await iterator.next();
          if (next.done) break;
          delivered++;
          yield { type: 'fragment', content: next.value, backend: backend.name };
        }
        yield { type: 'done', backend: backend.name };
        return;
      } catch (error) {
        if (isCancellation(error, signal)) throw new SessionCancelledError();
        if (delivered > 0) {
          logger.error(
            { backend: backend.name, delivered, err: getErrorMessage(error) },
            'Generation failed after streaming began'
          );
          throw new GenerationBackendError(
            `${backend.name} failed after ${delivered} fragment(s): ${getErrorMessage(error)}`,
            {
              backend: backend.name,
              cause: error,
              failures: [...failures, { backend: backend.name, message: getErrorMessage(error) }],
            }
          );
        }
        notice = this.recordFailure(backend, i, error, failures);
      } finally {
        await iterator.return?.();
      }

      if (notice) {
        options.onFallback?.(notice);
        yield { type: 'fallback', notice };
      }
    }

    throw this.exhausted(failures);
  }

  /**
   * Log the failure and describe the switch to the next backend, if any.
   */
  private recordFailure(
    backend: GenerationBackend,
    position: number,
    error: unknown,
    failures: Failure[]
  ): FallbackNotice | undefined {
    const message = getErrorMessage(error);
    failures.push({ backend: backend.name, message });

    const next = this.backends[position + 1];
    if (!next) {
      logger.error({ backend: backend.name, err: message }, 'Last generation backend failed');
      return undefined;
    }
    logger.warn({ from: backend.name, to: next.name, err: message }, 'Generation backend failed, falling back');
    return { from: backend.name, to: next.name, reason: message };
  }

  private exhausted(failures: Failure[]): GenerationBackendError {
    return new GenerationBackendError(
      `All generation backends failed: ${failures.map(f => `${f.backend} (${f.message})`).join('; ')}`,
      { failures }
    );
  }
}
