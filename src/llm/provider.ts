/**
 * Provider abstractions.
 *
 * An LLM adapter takes a system prompt + conversation history and
 * returns a response, either in one piece or as a stream of text
 * fragments. An embedding provider turns text into a vector.
 *
 * Both are plain fetch() calls underneath; cancellation flows in
 * through an AbortSignal.
 */

import type { EmbeddingVector } from '../types/index.js';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  /** How many tokens were used (if provider reports it) */
  usage?: {
    promptTokens?: number;
    completionTokens?: number;
  };
}

export interface LLMCallOptions {
  signal?: AbortSignal;
}

export interface LLMAdapter {
  /** Human-readable name for logs */
  name: string;

  /**
   * Generate a response from a conversation.
   * The first message should be the system prompt.
   */
  chat(messages: LLMMessage[], options?: LLMCallOptions): Promise<LLMResponse>;

  /**
   * Same as chat(), but yields text fragments as they arrive.
   * Breaking out of the loop releases the response body.
   */
  stream(messages: LLMMessage[], options?: LLMCallOptions): AsyncIterable<string>;

  /** Check if the provider is reachable */
  health(): Promise<boolean>;
}

export interface EmbeddingProvider {
  /** Model name, for logs */
  model: string;
  embed(text: string): Promise<EmbeddingVector>;
}

/** Merge the adapter timeout with an external cancel signal */
export function requestSignal(timeoutSec: number, signal?: AbortSignal): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (timeoutSec > 0) signals.push(AbortSignal.timeout(timeoutSec * 1000));
  if (signal) signals.push(signal);

  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

/**
 * Split a streamed body into lines. The reader is cancelled when the
 * consumer stops early.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);
        yield line;
        newline = buffer.indexOf('\n');
      }
    }
    buffer += decoder.decode();
    if (buffer.length > 0) yield buffer;
  } finally {
    await reader.cancel().catch((err: unknown) => {
      console.warn('[mimic] Failed to release response body:', err);
    });
  }
}
