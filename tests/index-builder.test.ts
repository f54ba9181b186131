import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { EmbeddingProviderError } from '../src/core/errors.js';
import { buildIndex, collectChunks, type BuildOptions } from '../src/core/index-builder.js';
import { SCENARIO_TRANSCRIPT, createHashingEmbedder, tempDir, writeTree } from './helpers.js';

function options(corpusDir: string, overrides: Partial<BuildOptions> = {}): BuildOptions {
  return { corpusDir, extensions: ['.md'], chunkSize: 1000, chunkOverlap: 200, embedDelayMs: 0, ...overrides };
}

describe('collectChunks', () => {
  it('parses every transcript in name order', () => {
    const root = writeTree({
      'b.md': '**Alex:** Second file.',
      'a.md': SCENARIO_TRANSCRIPT,
      'skip.txt': '**Alex:** Not a transcript.',
    });
    const { files, chunks } = collectChunks(options(root));

    expect(files).toBe(2);
    expect(chunks.map(c => [c.fileSource, c.speaker])).toEqual([
      ['a.md', 'Alex'],
      ['a.md', 'John'],
      ['b.md', 'Alex'],
    ]);
  });

  it('splits long turns into overlapping parts', () => {
    const root = writeTree({ 'long.md': '**Alex:** one two three four five six seven' });
    const { chunks } = collectChunks(options(root, { chunkSize: 4, chunkOverlap: 1 }));

    expect(chunks.map(c => c.content)).toEqual(['one two three four', 'four five six seven']);
    expect(chunks.map(c => c.metadata.part)).toEqual([0, 1]);
  });

  it('treats a missing corpus as empty', () => {
    expect(collectChunks(options(join(tempDir(), 'missing')))).toEqual({ files: 0, chunks: [] });
  });
});

describe('buildIndex', () => {
  it('embeds every chunk', async () => {
    const embedder = createHashingEmbedder();
    const root = writeTree({ 'a.md': SCENARIO_TRANSCRIPT });
    const { index, report } = await buildIndex(embedder, options(root));

    expect(index.size).toBe(2);
    expect(index.dimension).toBe(64);
    expect(report).toEqual({ files: 1, chunks: 2, embedded: 2, skipped: [] });
    expect(embedder.calls).toEqual(index.allChunks().map(c => c.content));
  });

  it('skips chunks whose embedding fails', async () => {
    const embedder = createHashingEmbedder({ failOn: text => text.startsWith('How') });
    const root = writeTree({ 'a.md': SCENARIO_TRANSCRIPT });
    const { index, report } = await buildIndex(embedder, options(root));

    expect(index.allChunks().map(c => c.speaker)).toEqual(['Alex']);
    expect(report.embedded).toBe(1);
    expect(report.skipped).toHaveLength(1);
  });

  it('fails when no chunk of a non-empty corpus could be embedded', async () => {
    const embedder = createHashingEmbedder({ failOn: () => true });
    const root = writeTree({ 'a.md': SCENARIO_TRANSCRIPT });

    await expect(buildIndex(embedder, options(root))).rejects.toThrow(EmbeddingProviderError);
    expect(embedder.calls).toHaveLength(2);
  });

  it('records the embedding model on the index', async () => {
    const root = writeTree({ 'a.md': SCENARIO_TRANSCRIPT });
    const { index } = await buildIndex(createHashingEmbedder(), options(root));
    expect(index.model).toBe('test/bag-of-words');
  });

  it('builds an empty index from an empty corpus', async () => {
    const { index, report } = await buildIndex(createHashingEmbedder(), options(tempDir()));

    expect(index.size).toBe(0);
    expect(report).toEqual({ files: 0, chunks: 0, embedded: 0, skipped: [] });
  });
});
