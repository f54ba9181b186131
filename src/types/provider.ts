/**
 * Provider settings for text generation and embeddings.
 *
 * mimic is provider-agnostic. By default it talks to Ollama
 * running locally for both chat and embeddings, but either side
 * can be pointed at OpenAI.
 *
 * Provider config lives in data/config.yaml.
 */

export interface OllamaProvider {
  type: 'ollama';
  /** Default: http://localhost:11434 */
  baseUrl?: string;
  /** Chat model. Default: qwen2.5:3b */
  model?: string;
  /** num_predict. Default: 512 */
  maxTokens?: number;
  /** Sampling temperature, 0 to 2 */
  temperature?: number;
  /** Request timeout in seconds; 0 means none. Default: 300 */
  timeout?: number;
}

export interface OpenAIProvider {
  type: 'openai';
  /** Falls back to OPENAI_API_KEY */
  apiKey?: string;
  /** Any OpenAI-compatible endpoint. Default: https://api.openai.com/v1 */
  baseUrl?: string;
  /** Default: gpt-4o-mini */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Seconds. Default: 120 */
  timeout?: number;
}

export type LLMProvider = OllamaProvider | OpenAIProvider;

export interface OllamaEmbeddingProvider {
  type: 'ollama';
  baseUrl?: string;
  /** Default: nomic-embed-text */
  model?: string;
}

export interface OpenAIEmbeddingProvider {
  type: 'openai';
  apiKey?: string;
  baseUrl?: string;
  /** Default: text-embedding-3-small */
  model?: string;
}

export type EmbeddingProviderConfig = OllamaEmbeddingProvider | OpenAIEmbeddingProvider;

/** Default provider configuration */
export const DEFAULT_PROVIDER: OllamaProvider = {
  type: 'ollama',
  baseUrl: 'http://localhost:11434',
  model: 'qwen2.5:3b',
  maxTokens: 512,
  temperature: 0.7,
};

export const DEFAULT_EMBEDDING_PROVIDER: OllamaEmbeddingProvider = {
  type: 'ollama',
  baseUrl: 'http://localhost:11434',
  model: 'nomic-embed-text',
};
