/**
 * Ollama adapter — talks to a local Ollama instance.
 *
 * This is the default provider for mimic, for both chat and
 * embeddings. No API keys, nothing leaves your network.
 */

import { z } from 'zod';
import type { OllamaEmbeddingProvider, OllamaProvider } from '../types/index.js';
import { EmbeddingProviderError, errorMessage } from '../core/errors.js';
import {
  readLines,
  requestSignal,
  type EmbeddingProvider,
  type LLMAdapter,
  type LLMCallOptions,
  type LLMMessage,
  type LLMResponse,
} from './provider.js';

const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'qwen2.5:3b',
  embeddingModel: 'nomic-embed-text',
  maxTokens: 512,
  temperature: 0.7,
  timeout: 300,
};

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).min(1),
});

export function createOllamaAdapter(config: OllamaProvider): LLMAdapter {
  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const model = config.model ?? DEFAULTS.model;
  const maxTokens = config.maxTokens ?? DEFAULTS.maxTokens;
  const temperature = config.temperature ?? DEFAULTS.temperature;
  const timeoutSec = config.timeout ?? DEFAULTS.timeout;

  async function post(messages: LLMMessage[], stream: boolean, signal?: AbortSignal): Promise<Response> {
    // When the timeout or the caller's signal fires, the fetch aborts
    // and Ollama stops generating.
    const response = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
        stream,
        options: {
          num_predict: maxTokens,
          temperature,
        },
      }),
      signal: requestSignal(timeoutSec, signal),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Ollama error (${response.status}): ${text}`);
    }
    return response;
  }

  return {
    name: `ollama/${model}`,

    async chat(messages: LLMMessage[], options: LLMCallOptions = {}): Promise<LLMResponse> {
      const response = await post(messages, false, options.signal);
      const data = chatResponseSchema.parse(await response.json());

      return {
        content: data.message?.content ?? '',
        usage: {
          promptTokens: data.prompt_eval_count,
          completionTokens: data.eval_count,
        },
      };
    },

    async *stream(messages: LLMMessage[], options: LLMCallOptions = {}): AsyncGenerator<string> {
      const response = await post(messages, true, options.signal);
      if (!response.body) throw new Error('Ollama error: empty response body');

      // NDJSON: one object per line, the last one has done: true
      for await (const line of readLines(response.body)) {
        if (!line.trim()) continue;
        const data = chatResponseSchema.parse(JSON.parse(line));
        const fragment = data.message?.content ?? '';
        if (fragment) yield fragment;
        if (data.done) return;
      }
    },

    async health(): Promise<boolean> {
      try {
        const response = await fetch(`${baseUrl}/api/tags`, { signal: AbortSignal.timeout(5000) });
        return response.ok;
      } catch {
        return false;
      }
    },
  };
}

export function createOllamaEmbedder(config: OllamaEmbeddingProvider): EmbeddingProvider {
  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const model = config.model ?? DEFAULTS.embeddingModel;

  return {
    model: `ollama/${model}`,

    async embed(text: string) {
      let response: Response;
      try {
        response = await fetch(`${baseUrl}/api/embed`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ model, input: text }),
          signal: AbortSignal.timeout(DEFAULTS.timeout * 1000),
        });
      } catch (err) {
        throw new EmbeddingProviderError(`Ollama embedding request failed: ${errorMessage(err)}`, { cause: err });
      }

      if (!response.ok) {
        const body = await response.text();
        throw new EmbeddingProviderError(`Ollama embedding error (${response.status}): ${body}`);
      }

      const parsed = embedResponseSchema.safeParse(await response.json().catch(() => null));
      if (!parsed.success) {
        throw new EmbeddingProviderError('Ollama embedding response has no embeddings', { cause: parsed.error });
      }
      return parsed.data.embeddings[0];
    },
  };
}
