import { describe, expect, it } from 'vitest';
import { createEmbeddingCache } from '../src/core/embedding-cache.js';
import { bagOfWords, createHashingEmbedder } from './helpers.js';

describe('createEmbeddingCache', () => {
  it('embeds each distinct query once', async () => {
    const embedder = createHashingEmbedder();
    const cache = createEmbeddingCache(embedder, { keyLength: 100, maxEntries: 10 });

    const first = await cache.embed('platform impact');
    const second = await cache.embed('platform impact');

    expect(second).toBe(first);
    expect(embedder.calls).toEqual(['platform impact']);
    expect(cache.size).toBe(1);
  });

  it('shares a vector between queries with the same key prefix', async () => {
    const embedder = createHashingEmbedder();
    const cache = createEmbeddingCache(embedder, { keyLength: 8, maxEntries: 10 });

    await cache.embed('platform impact');
    const aliased = await cache.embed('platform teams');

    expect(embedder.calls).toEqual(['platform impact']);
    expect(aliased).toEqual(bagOfWords('platform impact'));
  });

  it('evicts the oldest entry when full', async () => {
    const embedder = createHashingEmbedder();
    const cache = createEmbeddingCache(embedder, { keyLength: 100, maxEntries: 2 });

    await cache.embed('a');
    await cache.embed('b');
    await cache.embed('c');
    expect(cache.size).toBe(2);

    await cache.embed('c');
    await cache.embed('a');
    expect(embedder.calls).toEqual(['a', 'b', 'c', 'a']);
  });

  it('caches nothing with maxEntries 0', async () => {
    const embedder = createHashingEmbedder();
    const cache = createEmbeddingCache(embedder, { keyLength: 100, maxEntries: 0 });

    await cache.embed('a');
    await cache.embed('a');
    expect(embedder.calls).toEqual(['a', 'a']);
    expect(cache.size).toBe(0);
  });

  it('does not cache failures', async () => {
    let refuse = true;
    const embedder = createHashingEmbedder({
      failOn: () => {
        const now = refuse;
        refuse = false;
        return now;
      },
    });
    const cache = createEmbeddingCache(embedder, { keyLength: 100, maxEntries: 10 });

    await expect(cache.embed('a')).rejects.toThrow('embedding refused');
    await expect(cache.embed('a')).resolves.toEqual(bagOfWords('a'));
    expect(cache.size).toBe(1);
  });

  it('empties on clear', async () => {
    const cache = createEmbeddingCache(createHashingEmbedder(), { keyLength: 100, maxEntries: 10 });
    await cache.embed('a');
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
