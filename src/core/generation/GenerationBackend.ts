import type { ContextItem } from '../retrieval/RetrievalEngine.js';
import type { GenerationBackendKind } from '../utils/config.js';
import { InvalidParametersError } from '../utils/errors.js';

export type { GenerationBackendKind };

export interface GenerationOptions {
  temperature: number;
  topP: number;
  maxOutputTokens: number;
  /** Whole-call deadline for `generate`, idle deadline per fragment for `stream` */
  timeoutMs: number;
  signal?: AbortSignal;
}

export type GenerationOverrides = Partial<GenerationOptions>;

/** Per-call sampling settings, applied to every backend a chain tries */
export type GenerationSettings = Omit<GenerationOverrides, 'signal'>;

/**
 * One way of turning a question plus retrieved context into an answer.
 *
 * Failures of the backend itself (unreachable, malformed response, timeout)
 * are raised as GenerationBackendError. An empty answer is a valid answer.
 * Concatenating every fragment from `stream` yields what `generate` returns
 * for the same input.
 */
export interface GenerationBackend {
  readonly name: string;
  readonly kind: GenerationBackendKind;
  readonly defaults: Omit<GenerationOptions, 'signal'>;
  generate(question: string, context: ContextItem[], options?: GenerationOverrides): Promise<string>;
  stream(question: string, context: ContextItem[], options?: GenerationOverrides): AsyncIterable<string>;
}

export function resolveOptions(
  defaults: Omit<GenerationOptions, 'signal'>,
  overrides: GenerationOverrides = {}
): GenerationOptions {
  return {
    temperature: overrides.temperature ?? defaults.temperature,
    topP: overrides.topP ?? defaults.topP,
    maxOutputTokens: overrides.maxOutputTokens ?? defaults.maxOutputTokens,
    timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs,
    signal: overrides.signal,
  };
}

export function validateGenerationSettings(settings: GenerationSettings = {}): GenerationSettings {
  const { temperature, topP, maxOutputTokens, timeoutMs } = settings;
  if (temperature !== undefined && !(temperature >= 0 && temperature <= 2)) {
    throw new InvalidParametersError(`temperature must be between 0 and 2, got ${temperature}`);
  }
  if (topP !== undefined && !(topP > 0 && topP <= 1)) {
    throw new InvalidParametersError(`topP must be in (0, 1], got ${topP}`);
  }
  if (maxOutputTokens !== undefined && (!Number.isInteger(maxOutputTokens) || maxOutputTokens < 1)) {
    throw new InvalidParametersError(`maxOutputTokens must be a positive integer, got ${maxOutputTokens}`);
  }
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs < 1)) {
    throw new InvalidParametersError(`timeoutMs must be a positive integer, got ${timeoutMs}`);
  }
  return settings;
}
