/**
 * Flat inner-product search over normalised embeddings.
 *
 * Vectors are L2-normalised on insert, so the inner product is the
 * cosine similarity. Position i of the vector block always belongs to
 * chunk i; the two are built, saved and loaded together and never
 * patched in place.
 *
 * On disk the index is two files in one directory:
 *   index.bin    "MVIX" | u32 version | u32 dimension | u32 count | f32[count * dimension]
 *   chunks.json  { version, model, dimension, count, chunks }
 *
 * `model` names the embedding model that produced the vectors. Loading
 * with a different expected model reports the store as corrupt.
 *
 * chunks.json is written last, so a directory holding only index.bin
 * is an unfinished write and reads as "no index".
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { ConversationChunk, EmbeddingVector, ScoredChunk } from '../types/index.js';
import {
  EmbeddingDimensionMismatchError,
  VectorStoreCorruptError,
  VectorStoreNotFoundError,
} from './errors.js';

export const INDEX_FILE = 'index.bin';
export const CHUNKS_FILE = 'chunks.json';

const MAGIC = 'MVIX';
const FORMAT_VERSION = 2;
const HEADER_BYTES = 16;

const storedChunkSchema = z.object({
  id: z.string(),
  speaker: z.string(),
  content: z.string(),
  metadata: z.record(z.unknown()),
  timestamp: z.string().optional(),
  fileSource: z.string(),
});

const chunksFileSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  model: z.string(),
  dimension: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  chunks: z.array(storedChunkSchema),
});

export class VectorIndex {
  private constructor(
    /** Embedding model the vectors came from; empty when unrecorded */
    readonly model: string,
    readonly dimension: number,
    private readonly vectors: Float32Array,
    private readonly chunks: readonly ConversationChunk[],
  ) {}

  get size(): number {
    return this.chunks.length;
  }

  /**
   * Build an index from embedded chunks.
   * Every chunk needs an embedding of one shared, non-zero length.
   */
  static build(chunks: readonly ConversationChunk[], model: string = ''): VectorIndex {
    if (chunks.length === 0) return new VectorIndex(model, 0, new Float32Array(0), []);

    const dimension = chunks[0].embedding?.length ?? 0;
    if (dimension === 0) {
      throw new EmbeddingDimensionMismatchError(1, 0, `chunk ${chunks[0].id} has no embedding`);
    }

    const vectors = new Float32Array(chunks.length * dimension);
    const stored: ConversationChunk[] = [];

    chunks.forEach((chunk, i) => {
      const embedding = chunk.embedding ?? [];
      if (embedding.length !== dimension) {
        throw new EmbeddingDimensionMismatchError(dimension, embedding.length, `chunk ${chunk.id}`);
      }
      vectors.set(normalise(embedding), i * dimension);
      stored.push(freeze(chunk));
    });

    return new VectorIndex(model, dimension, vectors, stored);
  }

  /** Top-k chunks by cosine similarity, best first */
  search(query: EmbeddingVector, k: number): ScoredChunk[] {
    if (k <= 0 || this.size === 0) return [];
    if (query.length !== this.dimension) {
      throw new EmbeddingDimensionMismatchError(this.dimension, query.length, 'query');
    }

    const q = normalise(query);
    const scored: ScoredChunk[] = this.chunks.map((chunk, position) => {
      const offset = position * this.dimension;
      let dot = 0;
      for (let d = 0; d < this.dimension; d++) {
        dot += q[d] * this.vectors[offset + d];
      }
      return { chunk, score: dot, position };
    });

    scored.sort((a, b) => b.score - a.score || a.position - b.position);
    return scored.slice(0, k);
  }

  /** Chunk at an insertion position */
  chunkAt(position: number): ConversationChunk | undefined {
    return this.chunks[position];
  }

  allChunks(): readonly ConversationChunk[] {
    return this.chunks;
  }

  persist(dir: string): void {
    mkdirSync(dir, { recursive: true });
    rmSync(join(dir, CHUNKS_FILE), { force: true });

    const header = Buffer.alloc(HEADER_BYTES);
    header.write(MAGIC, 0, 'ascii');
    header.writeUInt32LE(FORMAT_VERSION, 4);
    header.writeUInt32LE(this.dimension, 8);
    header.writeUInt32LE(this.size, 12);

    const body = Buffer.alloc(this.vectors.length * 4);
    this.vectors.forEach((value, i) => body.writeFloatLE(value, i * 4));

    writeFileSync(join(dir, INDEX_FILE), Buffer.concat([header, body]));
    writeFileSync(
      join(dir, CHUNKS_FILE),
      JSON.stringify({
        version: FORMAT_VERSION,
        model: this.model,
        dimension: this.dimension,
        count: this.size,
        chunks: this.chunks,
      }),
    );
  }

  static exists(dir: string): boolean {
    return existsSync(join(dir, INDEX_FILE)) && existsSync(join(dir, CHUNKS_FILE));
  }

  static load(dir: string, expected: { model?: string } = {}): VectorIndex {
    if (!VectorIndex.exists(dir)) throw new VectorStoreNotFoundError(dir);

    const blob = readFileSync(join(dir, INDEX_FILE));
    if (blob.length < HEADER_BYTES || blob.toString('ascii', 0, 4) !== MAGIC) {
      throw new VectorStoreCorruptError(dir, 'bad index header');
    }
    const version = blob.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new VectorStoreCorruptError(dir, `unsupported index version ${version}`);
    }
    const dimension = blob.readUInt32LE(8);
    const count = blob.readUInt32LE(12);
    if (blob.length !== HEADER_BYTES + dimension * count * 4) {
      throw new VectorStoreCorruptError(dir, 'index length does not match its header');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(join(dir, CHUNKS_FILE), 'utf-8'));
    } catch (err) {
      throw new VectorStoreCorruptError(dir, 'chunk metadata is not valid JSON', { cause: err });
    }
    const parsed = chunksFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new VectorStoreCorruptError(dir, 'chunk metadata has the wrong shape', { cause: parsed.error });
    }

    const meta = parsed.data;
    if (meta.count !== count || meta.chunks.length !== count || meta.dimension !== dimension) {
      throw new VectorStoreCorruptError(
        dir,
        `artifacts disagree (index ${count}x${dimension}, metadata ${meta.chunks.length}x${meta.dimension})`,
      );
    }

    if (expected.model !== undefined && meta.model !== expected.model) {
      throw new VectorStoreCorruptError(
        dir,
        `built with embedding model "${meta.model}", configured "${expected.model}"`,
      );
    }

    const vectors = new Float32Array(count * dimension);
    for (let i = 0; i < vectors.length; i++) {
      vectors[i] = blob.readFloatLE(HEADER_BYTES + i * 4);
    }

    return new VectorIndex(meta.model, dimension, vectors, meta.chunks.map(freeze));
  }
}

function normalise(vector: readonly number[]): Float32Array {
  let norm = 0;
  for (const v of vector) norm += v * v;
  norm = Math.sqrt(norm);

  const out = new Float32Array(vector.length);
  if (norm === 0) return out;
  vector.forEach((v, i) => { out[i] = v / norm; });
  return out;
}

function freeze(chunk: ConversationChunk): ConversationChunk {
  const { embedding: _embedding, ...rest } = chunk;
  return Object.freeze({ ...rest, metadata: Object.freeze({ ...rest.metadata }) });
}
