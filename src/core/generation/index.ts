import type { AppConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import type { GenerationBackend } from './GenerationBackend.js';
import { createHostedBackend, createLocalBackend } from './AiSdkGenerationBackend.js';
import { ExtractiveGenerationBackend } from './ExtractiveGenerationBackend.js';
import { FallbackChain } from './FallbackChain.js';

export type {
  GenerationBackend,
  GenerationOptions,
  GenerationOverrides,
  GenerationSettings,
} from './GenerationBackend.js';
export { validateGenerationSettings } from './GenerationBackend.js';
export { FallbackChain, type ChainAnswer, type ChainEvent, type FallbackNotice } from './FallbackChain.js';
export { ExtractiveGenerationBackend } from './ExtractiveGenerationBackend.js';
export { AiSdkGenerationBackend } from './AiSdkGenerationBackend.js';

/**
 * Instantiate the configured chain in preference order.
 */
export function createGenerationChain(generation: AppConfig['generation']): FallbackChain {
  const { defaults, timeoutMs } = generation;
  const backends: GenerationBackend[] = generation.chain.map(kind => {
    switch (kind) {
      case 'local':
        return createLocalBackend({ ...generation.local, defaults, timeoutMs });
      case 'hosted':
        if (!generation.hosted.apiKey) {
          throw new ConfigurationError('The hosted generation backend requires OPENAI_API_KEY');
        }
        return createHostedBackend({ apiKey: generation.hosted.apiKey, model: generation.hosted.model, defaults, timeoutMs });
      default:
        return new ExtractiveGenerationBackend({ ...defaults, timeoutMs });
    }
  });
  return new FallbackChain(backends);
}
