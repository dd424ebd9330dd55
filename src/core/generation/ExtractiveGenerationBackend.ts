import type { ContextItem } from '../retrieval/RetrievalEngine.js';
import { throwIfCancelled } from '../utils/errors.js';
import {
  resolveOptions,
  type GenerationBackend,
  type GenerationOptions,
  type GenerationOverrides,
} from './GenerationBackend.js';
import { NO_CONTEXT_ANSWER } from './prompts.js';

const WORDS_PER_FRAGMENT = 3;
const TERM = /[\p{L}\p{N}]+/gu;

const LEAD_INS: Array<[string[], string]> = [
  [['what', 'define', 'definition'], 'Based on the provided context:'],
  [['how', 'explain', 'process'], "Here's how it works according to the documents:"],
  [['when', 'time', 'date'], 'According to the information available:'],
];
const DEFAULT_LEAD_IN = 'Based on the relevant information I found:';

/**
 * Answers without a model by quoting the best matching sentence of the top
 * context item. Deterministic and local, so it closes every fallback chain.
 */
export class ExtractiveGenerationBackend implements GenerationBackend {
  readonly name = 'extractive';
  readonly kind = 'extractive';
  readonly defaults: Omit<GenerationOptions, 'signal'>;

  constructor(defaults?: Partial<Omit<GenerationOptions, 'signal'>>) {
    this.defaults = {
      temperature: defaults?.temperature ?? 0,
      topP: defaults?.topP ?? 1,
      maxOutputTokens: defaults?.maxOutputTokens ?? 500,
      timeoutMs: defaults?.timeoutMs ?? 60_000,
    };
  }

  async generate(question: string, context: ContextItem[], overrides?: GenerationOverrides): Promise<string> {
    throwIfCancelled(resolveOptions(this.defaults, overrides).signal);
    return composeAnswer(question, context);
  }

  async *stream(question: string, context: ContextItem[], overrides?: GenerationOverrides): AsyncGenerator<string> {
    const { signal } = resolveOptions(this.defaults, overrides);
    const words = composeAnswer(question, context).split(' ');

    for (let i = 0; i < words.length; i += WORDS_PER_FRAGMENT) {
      throwIfCancelled(signal);
      const fragment = words.slice(i, i + WORDS_PER_FRAGMENT).join(' ');
      yield i + WORDS_PER_FRAGMENT < words.length ? `${fragment} ` : fragment;
    }
  }
}

export function composeAnswer(question: string, context: ContextItem[]): string {
  const top = context[0];
  if (!top) return NO_CONTEXT_ANSWER;

  const questionTerms = terms(question);
  const sentence = bestSentence(top.text, questionTerms);
  if (!sentence) return NO_CONTEXT_ANSWER;

  return `${leadIn(questionTerms)} ${sentence}`;
}

/**
 * Sentence sharing the most distinct terms with the question; the earliest
 * one wins ties, so no overlap at all yields the first sentence.
 */
export function bestSentence(text: string, questionTerms: Set<string>): string | undefined {
  const sentences = splitSentences(text);
  let best: string | undefined;
  let bestOverlap = -1;
  for (const sentence of sentences) {
    let overlap = 0;
    for (const term of terms(sentence)) {
      if (questionTerms.has(term)) overlap++;
    }
    if (overlap > bestOverlap) {
      best = sentence;
      bestOverlap = overlap;
    }
  }
  return best;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map(s => s.replace(/\s+/g, ' ').trim())
    .filter(s => s.length > 0);
}

function terms(text: string): Set<string> {
  return new Set(text.toLowerCase().match(TERM) ?? []);
}

function leadIn(questionTerms: Set<string>): string {
  for (const [triggers, phrase] of LEAD_INS) {
    if (triggers.some(t => questionTerms.has(t))) return phrase;
  }
  return DEFAULT_LEAD_IN;
}
