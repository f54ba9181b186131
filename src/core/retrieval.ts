/**
 * Retrieval engine — query text in, relevant transcript chunks out.
 *
 * Lifecycle:
 *   uninitialized → loading → ready
 *                         ↘ failed   (ready() tries again)
 *
 * Loading reads the persisted index, or builds and persists a new one
 * when it is missing, unreadable or built with another embedding
 * model. Concurrent callers share one
 * in-flight load. A rebuild swaps the index only once the new one is
 * complete; searches already running keep the old instance.
 */

import type { ConversationChunk, RetrievalConfig } from '../types/index.js';
import type { EmbeddingProvider } from '../llm/index.js';
import { createEmbeddingCache, type EmbeddingCache } from './embedding-cache.js';
import { EmbeddingProviderError, errorMessage, isRecoverableStoreError } from './errors.js';
import { buildIndex, type BuildOptions } from './index-builder.js';
import type { SpeakerPredicate } from './speaker.js';
import { VectorIndex } from './vector-index.js';

export type RetrievalState = 'uninitialized' | 'loading' | 'ready' | 'failed';

export interface RetrievalEngineOptions {
  embedder: EmbeddingProvider;
  /** Directory holding the persisted index */
  indexDir: string;
  build: BuildOptions;
  retrieval: RetrievalConfig;
  /** Which speakers are the persona */
  personaFilter: SpeakerPredicate;
}

export interface RetrieveOptions {
  k?: number;
  speakerFilter?: SpeakerPredicate;
}

export interface RetrievalInfo {
  state: RetrievalState;
  chunks: number;
  dimension: number;
  /** A rebuild is running while the previous index still serves */
  rebuilding: boolean;
  loadedAt: string | null;
  error: string | null;
}

export class RetrievalEngine {
  private index: VectorIndex | null = null;
  private current: RetrievalState = 'uninitialized';
  private inFlight: Promise<void> | null = null;
  private loadedAt: string | null = null;
  private lastError: string | null = null;
  private readonly cache: EmbeddingCache;

  constructor(private readonly options: RetrievalEngineOptions) {
    this.cache = createEmbeddingCache(options.embedder, {
      keyLength: options.retrieval.cacheKeyLength,
      maxEntries: options.retrieval.cacheSize,
    });
  }

  get state(): RetrievalState {
    return this.current;
  }

  info(): RetrievalInfo {
    return {
      state: this.current,
      chunks: this.index?.size ?? 0,
      dimension: this.index?.dimension ?? 0,
      rebuilding: this.inFlight !== null && this.index !== null,
      loadedAt: this.loadedAt,
      error: this.lastError,
    };
  }

  initialize(options: { forceRebuild?: boolean } = {}): Promise<void> {
    if (this.inFlight) return this.inFlight;

    // A rebuild over a ready index keeps serving the old one
    if (!this.index) this.current = 'loading';
    this.inFlight = this.load(options.forceRebuild ?? false)
      .then(index => {
        this.index = index;
        this.current = 'ready';
        this.loadedAt = new Date().toISOString();
        this.lastError = null;
      })
      .catch((err: unknown) => {
        this.current = this.index ? 'ready' : 'failed';
        this.lastError = errorMessage(err);
        throw err;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  /** Resolves once an index is available, loading one if needed */
  async ready(): Promise<void> {
    if (this.current === 'ready' && this.index) return;
    await (this.inFlight ?? this.initialize());
  }

  /** Rebuild from the corpus and swap the new index in */
  rebuild(): Promise<void> {
    if (this.inFlight) {
      // A failed load still ends in the requested rebuild
      return this.inFlight
        .catch(() => undefined)
        .then(() => this.initialize({ forceRebuild: true }));
    }
    return this.initialize({ forceRebuild: true });
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<ConversationChunk[]> {
    await this.ready();
    const index = this.index;
    if (!index) return [];

    const k = options.k ?? this.options.retrieval.k;
    if (k <= 0) return [];

    let vector: number[];
    try {
      vector = await this.cache.embed(query);
    } catch (err) {
      if (err instanceof EmbeddingProviderError) throw err;
      throw new EmbeddingProviderError(`Query embedding failed: ${errorMessage(err)}`, { cause: err });
    }

    const filter = options.speakerFilter;
    const hits = index.search(vector, filter ? k * 2 : k);

    return hits
      .filter(hit => hit.score >= this.options.retrieval.minScore)
      .filter(hit => !filter || filter(hit.chunk.speaker))
      .slice(0, k)
      .map(hit => hit.chunk);
  }

  /** Retrieval restricted to the persona's own turns */
  retrievePersona(query: string, k?: number): Promise<ConversationChunk[]> {
    return this.retrieve(query, { k, speakerFilter: this.options.personaFilter });
  }

  private async load(forceRebuild: boolean): Promise<VectorIndex> {
    const dir = this.options.indexDir;

    if (!forceRebuild) {
      try {
        const index = VectorIndex.load(dir, { model: this.options.embedder.model });
        console.log(`[mimic] Loaded vector index: ${index.size} chunks from ${dir}`);
        return index;
      } catch (err) {
        if (!isRecoverableStoreError(err)) throw err;
        console.warn(`[mimic] ${errorMessage(err)}; rebuilding`);
      }
    }

    const started = Date.now();
    const { index } = await buildIndex(this.options.embedder, this.options.build);
    index.persist(dir);
    console.log(`[mimic] Vector index saved to ${dir} (${((Date.now() - started) / 1000).toFixed(1)}s)`);
    return index;
  }
}
