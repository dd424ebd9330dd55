/**
 * Model-backed generation over the AI SDK. The local (Ollama) and hosted
 * (OpenAI) variants differ only in the language model they are given.
 */

import { generateText, streamText, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createOllama } from 'ollama-ai-provider';
import type { ContextItem } from '../retrieval/RetrievalEngine.js';
import type { SamplingDefaults } from '../utils/config.js';
import { withDeadline } from '../utils/abort.js';
import { getLogger } from '../utils/logger.js';
import {
  GenerationBackendError,
  SessionCancelledError,
  TimeoutError,
  getErrorMessage,
  isCancellation,
  throwIfCancelled,
  timeout,
} from '../utils/errors.js';
import {
  resolveOptions,
  type GenerationBackend,
  type GenerationBackendKind,
  type GenerationOptions,
  type GenerationOverrides,
} from './GenerationBackend.js';
import { NO_CONTEXT_ANSWER, answerInstructions, buildAnswerPrompt } from './prompts.js';

const logger = getLogger('generation');

export interface AiSdkGenerationBackendOptions {
  name: string;
  kind: Exclude<GenerationBackendKind, 'extractive'>;
  model: LanguageModel;
  defaults: Omit<GenerationOptions, 'signal'>;
}

export class AiSdkGenerationBackend implements GenerationBackend {
  readonly name: string;
  readonly kind: Exclude<GenerationBackendKind, 'extractive'>;
  readonly defaults: Omit<GenerationOptions, 'signal'>;
  private readonly model: LanguageModel;

  constructor(options: AiSdkGenerationBackendOptions) {
    this.name = options.name;
    this.kind = options.kind;
    this.model = options.model;
    this.defaults = options.defaults;
  }

  async generate(question: string, context: ContextItem[], overrides?: GenerationOverrides): Promise<string> {
    const options = resolveOptions(this.defaults, overrides);
    if (context.length === 0) return NO_CONTEXT_ANSWER;

    try {
      const { text } = await withDeadline(
        abortSignal =>
          generateText({
            model: this.model,
            system: answerInstructions,
            prompt: buildAnswerPrompt(question, context),
            temperature: options.temperature,
            topP: options.topP,
            maxTokens: options.maxOutputTokens,
            maxRetries: 0,
            abortSignal,
          }),
        options.timeoutMs,
        { signal: options.signal, message: `${this.name} did not answer within ${options.timeoutMs}ms` }
      );
      return text;
    } catch (error) {
      throw this.wrapError(error, options.signal);
    }
  }

  async *stream(question: string, context: ContextItem[], overrides?: GenerationOverrides): AsyncGenerator<string> {
    const options = resolveOptions(this.defaults, overrides);
    if (context.length === 0) {
      yield NO_CONTEXT_ANSWER;
      return;
    }
    throwIfCancelled(options.signal);

    const controller = new AbortController();
    const parent = options.signal;
    const onAbort = () => controller.abort(new SessionCancelledError());
    parent?.addEventListener('abort', onAbort, { once: true });

    const result = streamText({
      model: this.model,
      system: answerInstructions,
      prompt: buildAnswerPrompt(question, context),
      temperature: options.temperature,
      topP: options.topP,
      maxTokens: options.maxOutputTokens,
      maxRetries: 0,
      abortSignal: controller.signal,
      onError: ({ error }) => logger.debug({ backend: this.name, err: getErrorMessage(error) }, 'Stream reported an error'),
    });
    const iterator = result.fullStream[Symbol.asyncIterator]();

    try {
      while (true) {
        const next = await this.nextWithin(
          iterator,
          options.timeoutMs,
          `${this.name} produced no output for ${options.timeoutMs}ms`,
          parent
        );
        if (next.done) return;

        const part = next.value;
        if (part.type === 'text-delta') {
          if (part.textDelta.length > 0) yield part.textDelta;
        } else if (part.type === 'error') {
          throw this.wrapError(part.error, parent);
        }
      }
    } finally {
      parent?.removeEventListener('abort', onAbort);
      controller.abort();
      iterator
        .return?.()
        .catch(error => logger.debug({ backend: this.name, err: getErrorMessage(error) }, 'Stream cleanup failed'));
    }
  }

  /**
   * Idle timeout: each part must arrive within `ms` of asking for it.
   */
  private async nextWithin<T>(
    iterator: AsyncIterator<T>,
    ms: number,
    message: string,
    signal?: AbortSignal
  ): Promise<IteratorResult<T>> {
    try {
      return await timeout(iterator.next(), ms, message);
    } catch (error) {
      throw this.wrapError(error, signal);
    }
  }

  private wrapError(error: unknown, signal?: AbortSignal): Error {
    if (error instanceof TimeoutError) {
      return new GenerationBackendError(error.message, { backend: this.name, cause: error });
    }
    if (isCancellation(error, signal)) {
      return new SessionCancelledError();
    }
    if (error instanceof GenerationBackendError) {
      return error;
    }
    return new GenerationBackendError(`${this.name} failed: ${getErrorMessage(error)}`, {
      backend: this.name,
      cause: error,
    });
  }
}

function toDefaults(defaults: SamplingDefaults, timeoutMs: number): Omit<GenerationOptions, 'signal'> {
  return { ...defaults, timeoutMs };
}

export function createLocalBackend(options: {
  baseUrl: string;
  model: string;
  defaults: SamplingDefaults;
  timeoutMs: number;
}): AiSdkGenerationBackend {
  const ollama = createOllama({ baseURL: `${options.baseUrl.replace(/\/$/, '')}/api` });
  return new AiSdkGenerationBackend({
    name: `local:${options.model}`,
    kind: 'local',
    model: ollama(options.model),
    defaults: toDefaults(options.defaults, options.timeoutMs),
  });
}

export function createHostedBackend(options: {
  apiKey: string;
  model: string;
  defaults: SamplingDefaults;
  timeoutMs: number;
}): AiSdkGenerationBackend {
  const openai = createOpenAI({ apiKey: options.apiKey });
  return new AiSdkGenerationBackend({
    name: `hosted:${options.model}`,
    kind: 'hosted',
    model: openai(options.model),
    defaults: toDefaults(options.defaults, options.timeoutMs),
  });
}
