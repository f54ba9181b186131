/**
 * Chat completions and embeddings over the OpenAI REST API.
 *
 * Also works with any OpenAI-compatible server via baseUrl.
 */

import { z } from 'zod';
import type { OpenAIEmbeddingProvider, OpenAIProvider } from '../types/index.js';
import { ConfigurationError, EmbeddingProviderError, errorMessage } from '../core/errors.js';
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
  baseUrl: 'https://api.openai.com/v1',
  model: 'gpt-4o-mini',
  embeddingModel: 'text-embedding-3-small',
  maxTokens: 2000,
  temperature: 0.7,
  timeout: 120,
};

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).optional(),
});

const chunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullable().optional() }),
  })),
});

const embeddingSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export function createOpenAIAdapter(config: OpenAIProvider): LLMAdapter {
  const apiKey = config.apiKey;
  if (!apiKey) throw new ConfigurationError('OpenAI provider requires an apiKey (or OPENAI_API_KEY)');

  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const model = config.model ?? DEFAULTS.model;
  const maxTokens = config.maxTokens ?? DEFAULTS.maxTokens;
  const temperature = config.temperature ?? DEFAULTS.temperature;
  const timeoutSec = config.timeout ?? DEFAULTS.timeout;

  async function post(messages: LLMMessage[], stream: boolean, signal?: AbortSignal): Promise<Response> {
    const response = await fetch(`${baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages,
        max_tokens: maxTokens,
        temperature,
        stream,
      }),
      signal: requestSignal(timeoutSec, signal),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenAI error (${response.status}): ${text}`);
    }
    return response;
  }

  return {
    name: `openai/${model}`,

    async chat(messages: LLMMessage[], options: LLMCallOptions = {}): Promise<LLMResponse> {
      const response = await post(messages, false, options.signal);
      const data = completionSchema.parse(await response.json());

      return {
        content: data.choices[0]?.message.content ?? '',
        usage: data.usage && {
          promptTokens: data.usage.prompt_tokens,
          completionTokens: data.usage.completion_tokens,
        },
      };
    },

    async *stream(messages: LLMMessage[], options: LLMCallOptions = {}): AsyncGenerator<string> {
      const response = await post(messages, true, options.signal);
      if (!response.body) throw new Error('OpenAI error: empty response body');

      for await (const line of readLines(response.body)) {
        if (!line.startsWith('data:')) continue;
        const payload = line.slice(5).trim();
        if (payload === '[DONE]') return;

        const data = chunkSchema.parse(JSON.parse(payload));
        const fragment = data.choices[0]?.delta.content;
        if (fragment) yield fragment;
      }
    },

    async health(): Promise<boolean> {
      try {
        const response = await fetch(`${baseUrl}/models`, {
          headers: { Authorization: `Bearer ${apiKey}` },
          signal: AbortSignal.timeout(5000),
        });
        return response.ok;
      } catch {
        return false;
      }
    },
  };
}

export function createOpenAIEmbedder(config: OpenAIEmbeddingProvider): EmbeddingProvider {
  const apiKey = config.apiKey;
  if (!apiKey) throw new ConfigurationError('OpenAI embeddings require an apiKey (or OPENAI_API_KEY)');

  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const model = config.model ?? DEFAULTS.embeddingModel;

  return {
    model: `openai/${model}`,

    async embed(text: string) {
      let response: Response;
      try {
        response = await fetch(`${baseUrl}/embeddings`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({ model, input: text }),
          signal: AbortSignal.timeout(DEFAULTS.timeout * 1000),
        });
      } catch (err) {
        throw new EmbeddingProviderError(`OpenAI embedding request failed: ${errorMessage(err)}`, { cause: err });
      }

      if (!response.ok) {
        const body = await response.text();
        throw new EmbeddingProviderError(`OpenAI embedding error (${response.status}): ${body}`);
      }

      const parsed = embeddingSchema.safeParse(await response.json().catch(() => null));
      if (!parsed.success) {
        throw new EmbeddingProviderError('OpenAI embedding response has no data', { cause: parsed.error });
      }
      return parsed.data.data[0].embedding;
    },
  };
}
