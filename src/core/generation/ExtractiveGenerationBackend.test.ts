import { describe, it, expect } from 'vitest';
import { ExtractiveGenerationBackend, composeAnswer, splitSentences } from './ExtractiveGenerationBackend.js';
import { NO_CONTEXT_ANSWER } from './prompts.js';
import type { ContextItem } from '../retrieval/RetrievalEngine.js';
import { SessionCancelledError } from '../utils/errors.js';

const item = (text: string, score = 0.5): ContextItem => ({
  chunkId: 'doc_000001:0',
  documentId: 'doc_000001',
  chunkIndex: 0,
  text,
  score,
});

describe('composeAnswer', () => {
  it('quotes the sentence sharing the most terms with the question', () => {
    const answer = composeAnswer('How do tides work?', [
      item('The sun is bright. Tides rise and fall twice a day. Birds sing.'),
    ]);

    expect(answer).toBe("Here's how it works according to the documents: Tides rise and fall twice a day.");
  });

  it('falls back to the first sentence when nothing overlaps', () => {
    expect(composeAnswer('Who wrote this?', [item('Alpha beta. Gamma delta.')])).toBe(
      'Based on the relevant information I found: Alpha beta.'
    );
  });

  it('only reads the top context item', () => {
    const answer = composeAnswer('When does the shop open?', [item('Doors unlock at nine.'), item('The shop opens daily.')]);

    expect(answer).toBe('According to the information available: Doors unlock at nine.');
  });

  it('answers with the fixed text when there is no context', () => {
    expect(composeAnswer('What is this?', [])).toBe(NO_CONTEXT_ANSWER);
  });
});

describe('splitSentences', () => {
  it('splits on sentence punctuation and newlines and collapses whitespace', () => {
    expect(splitSentences('One.  Two!\nThree   four?\n\nFive')).toEqual(['One.', 'Two!', 'Three four?', 'Five']);
  });
});

describe('ExtractiveGenerationBackend', () => {
  const backend = new ExtractiveGenerationBackend();

  it('streams three-word fragments that join to the whole answer', async () => {
    const context = [item('Water boils at 100 degrees.')];
    const fragments: string[] = [];
    for await (const fragment of backend.stream('What is the boiling point?', context)) {
      fragments.push(fragment);
    }

    expect(fragments).toEqual(['Based on the ', 'provided context: Water ', 'boils at 100 ', 'degrees.']);
    expect(fragments.join('')).toBe(await backend.generate('What is the boiling point?', context));
  });

  it('stops streaming once cancelled', async () => {
    const controller = new AbortController();
    const fragments: string[] = [];

    await expect(
      (async () => {
        for await (const fragment of backend.stream('What?', [item('Water boils at 100 degrees.')], {
          signal: controller.signal,
        })) {
          fragments.push(fragment);
          controller.abort();
        }
      })()
    ).rejects.toBeInstanceOf(SessionCancelledError);
    expect(fragments).toHaveLength(1);
  });
});
