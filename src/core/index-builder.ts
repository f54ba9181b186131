/**
 * Corpus directory in, vector index out.
 *
 * parse every transcript → split long turns → embed one chunk at a
 * time → build. Embedding is sequential with a pause between calls so
 * a local provider is not flooded. A chunk whose embedding fails is
 * logged and left out. A dimension mismatch aborts the whole build, and
 * so does a non-empty corpus where not a single chunk could be embedded.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ConversationChunk } from '../types/index.js';
import type { EmbeddingProvider } from '../llm/index.js';
import { expandChunk } from './chunker.js';
import { EmbeddingProviderError, errorMessage } from './errors.js';
import { loadConversationFiles, parseTranscriptFile } from './transcript-parser.js';
import { VectorIndex } from './vector-index.js';

export interface BuildOptions {
  corpusDir: string;
  extensions: string[];
  chunkSize: number;
  chunkOverlap: number;
  /** Pause between embedding calls, in ms */
  embedDelayMs: number;
}

export interface BuildReport {
  files: number;
  chunks: number;
  embedded: number;
  skipped: string[];
}

/** Parse and split the corpus, without embedding */
export function collectChunks(options: BuildOptions): { files: number; chunks: ConversationChunk[] } {
  const files = loadConversationFiles(options.corpusDir, options.extensions);
  const chunks = files
    .flatMap(file => parseTranscriptFile(file))
    .flatMap(chunk => expandChunk(chunk, options.chunkSize, options.chunkOverlap));
  return { files: files.length, chunks };
}

export async function buildIndex(
  embedder: EmbeddingProvider,
  options: BuildOptions,
): Promise<{ index: VectorIndex; report: BuildReport }> {
  const { files, chunks } = collectChunks(options);
  console.log(`[mimic] Indexing ${chunks.length} chunks from ${files} files (${embedder.model})`);

  const embedded: ConversationChunk[] = [];
  const skipped: string[] = [];

  for (const [i, chunk] of chunks.entries()) {
    if (i > 0 && options.embedDelayMs > 0) await sleep(options.embedDelayMs);
    try {
      embedded.push({ ...chunk, embedding: await embedder.embed(chunk.content) });
    } catch (err) {
      console.warn(`[mimic] Skipping chunk ${chunk.id}: ${errorMessage(err)}`);
      skipped.push(chunk.id);
    }
  }

  if (chunks.length > 0 && embedded.length === 0) {
    throw new EmbeddingProviderError(
      `No embeddings generated for ${chunks.length} chunks; is ${embedder.model} reachable?`,
    );
  }

  const index = VectorIndex.build(embedded, embedder.model);
  console.log(`[mimic] Indexed ${index.size} chunks (dimension ${index.dimension}, ${skipped.length} skipped)`);

  return {
    index,
    report: { files, chunks: chunks.length, embedded: embedded.length, skipped },
  };
}
