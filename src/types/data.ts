/**
 * Where mimic finds its settings and corpus.
 *
 * The data directory has a flat structure:
 *   data/
 *     config.yaml     ← providers, paths, tuning knobs
 *     persona.yaml    ← persona definition and copy
 *     signals.yaml    ← persona signal rule table
 *     convos/          ← markdown transcripts (the corpus)
 *     vectors/         ← persisted vector index (generated)
 *
 * Relative paths in config.yaml resolve against the data directory.
 */

import type { EmbeddingProviderConfig, LLMProvider } from './provider.js';

export interface CorpusConfig {
  /** Transcript directory, relative to data/ */
  path: string;
  /** File extensions recognised as transcripts, e.g. [".md"] */
  extensions: string[];
}

export interface IndexConfig {
  /** Directory holding index.bin + chunks.json, relative to data/ */
  path: string;
  /** Words per chunk (stands in for tokens) */
  chunkSize: number;
  /** Words shared by consecutive chunks; must be < chunkSize */
  chunkOverlap: number;
  /** Pause between embedding calls during a build, in ms */
  embedDelayMs: number;
}

export interface RetrievalConfig {
  /** Chunks handed to persona analysis per query */
  k: number;
  /** Results scoring below this cosine similarity are dropped */
  minScore: number;
  /** Query embeddings are cached by this many leading characters */
  cacheKeyLength: number;
  /** Max cached query embeddings */
  cacheSize: number;
}

export interface HistoryConfig {
  /** Turns kept per session; older ones are trimmed */
  maxMessages: number;
  /** Turns loaded as context for a new response */
  contextMessages: number;
  /** Of those, turns quoted in the generation prompt */
  promptMessages: number;
}

/**
 * Top-level mimic configuration (data/config.yaml).
 */
export interface MimicConfig {
  /** Server settings */
  server: {
    port: number;
    host: string;
  };

  /** Text generation provider */
  provider: LLMProvider;

  /** Embedding provider */
  embedding: EmbeddingProviderConfig;

  corpus: CorpusConfig;
  index: IndexConfig;
  retrieval: RetrievalConfig;
  history: HistoryConfig;

  /** Admin API settings */
  admin: {
    /** Bearer token for /api/admin/* */
    token: string;
  };
}
