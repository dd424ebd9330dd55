import type { EmbeddingProvider } from './EmbeddingProvider.js';

const TOKEN = /[\p{L}\p{N}]+/gu;

/**
 * Offline embedding by feature hashing: lower-cased word tokens and adjacent
 * word pairs are hashed (FNV-1a) into a fixed number of signed buckets and the
 * result is L2-normalized. Texts that share vocabulary get a positive cosine
 * similarity; text without tokens maps to the zero vector.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`dimension must be a positive integer, got ${dimension}`);
    }
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vectorize(text));
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(TOKEN) ?? [];

    tokens.forEach((token, i) => {
      this.accumulate(vector, token, 1);
      if (i > 0) this.accumulate(vector, `${tokens[i - 1]} ${token}`, 0.5);
    });

    const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
    return norm === 0 ? vector : vector.map(x => x / norm);
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimension;
    // top bit picks the sign so collisions tend to cancel
    vector[bucket] += hash & 0x80000000 ? -weight : weight;
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
