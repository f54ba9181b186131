/**
 * Provider factory.
 *
 * Creates the right chat adapter and embedder based on config.
 * Add new providers here.
 */

import type { EmbeddingProviderConfig, LLMProvider } from '../types/index.js';
import type { EmbeddingProvider, LLMAdapter } from './provider.js';
import { createOllamaAdapter, createOllamaEmbedder } from './ollama.js';
import { createOpenAIAdapter, createOpenAIEmbedder } from './openai.js';

export type {
  EmbeddingProvider,
  LLMAdapter,
  LLMCallOptions,
  LLMMessage,
  LLMResponse,
} from './provider.js';

export function createLLMAdapter(config: LLMProvider): LLMAdapter {
  switch (config.type) {
    case 'ollama':
      return createOllamaAdapter(config);
    case 'openai':
      return createOpenAIAdapter(config);
  }
}

export function createEmbeddingProvider(config: EmbeddingProviderConfig): EmbeddingProvider {
  switch (config.type) {
    case 'ollama':
      return createOllamaEmbedder(config);
    case 'openai':
      return createOpenAIEmbedder(config);
  }
}
