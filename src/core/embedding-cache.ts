/**
 * Query embedding cache.
 *
 * Keyed on the first `keyLength` characters of the text, so two long
 * queries that share a prefix share one vector. Insertion-ordered Map,
 * oldest entry evicted once `maxEntries` is reached.
 */

import type { EmbeddingVector } from '../types/index.js';
import type { EmbeddingProvider } from '../llm/index.js';

export interface EmbeddingCacheOptions {
  keyLength: number;
  maxEntries: number;
}

export interface EmbeddingCache {
  embed(text: string): Promise<EmbeddingVector>;
  readonly size: number;
  clear(): void;
}

export function createEmbeddingCache(
  embedder: EmbeddingProvider,
  options: EmbeddingCacheOptions,
): EmbeddingCache {
  const entries = new Map<string, EmbeddingVector>();

  return {
    async embed(text: string) {
      const key = text.slice(0, options.keyLength);
      const hit = entries.get(key);
      if (hit) return hit;

      const vector = await embedder.embed(text);
      if (options.maxEntries > 0) {
        if (entries.size >= options.maxEntries) {
          const oldest = entries.keys().next();
          if (!oldest.done) entries.delete(oldest.value);
        }
        entries.set(key, vector);
      }
      return vector;
    },

    get size() {
      return entries.size;
    },

    clear() {
      entries.clear();
    },
  };
}
