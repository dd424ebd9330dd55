import type { EmbeddingConfig } from '../utils/config.js';
import { ResilientEmbeddingProvider, type EmbeddingProvider } from './EmbeddingProvider.js';
import { HashingEmbeddingProvider } from './HashingEmbeddingProvider.js';
import {
  createOllamaEmbeddingProvider,
  createOpenAIEmbeddingProvider,
} from './AiSdkEmbeddingProvider.js';

export { ResilientEmbeddingProvider, HashingEmbeddingProvider };
export type { EmbeddingProvider };

/**
 * Build the configured provider wrapped with timeout and retry handling.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  let inner: EmbeddingProvider;
  switch (config.provider) {
    case 'openai':
      inner = createOpenAIEmbeddingProvider(config);
      break;
    case 'ollama':
      inner = createOllamaEmbeddingProvider(config);
      break;
    default:
      inner = new HashingEmbeddingProvider(config.dimension);
      break;
  }
  return new ResilientEmbeddingProvider(inner, { timeoutMs: config.timeoutMs });
}
