/**
 * The retrievable units of the transcript corpus.
 *
 * A chunk starts life in the transcript parser (one speaker turn),
 * may be split into overlapping sub-chunks, gets an embedding during
 * the index build, and is frozen once it lands in the vector index.
 */

/** A dense embedding vector. All vectors in one index share a length. */
export type EmbeddingVector = number[];

export interface ConversationChunk {
  /** Deterministic id: hash of source, speaker and content prefix */
  id: string;
  /** Speaker attribution, exactly as written in the transcript */
  speaker: string;
  /** The text span itself */
  content: string;
  /** Provenance only (file path, parse time, part numbers) */
  metadata: Record<string, unknown>;
  /** Raw timestamp label from the transcript, e.g. "00:30" */
  timestamp?: string;
  /** Originating document (file name) */
  fileSource: string;
  /** Present once the chunk went through the embedding provider */
  embedding?: EmbeddingVector;
}

/** A search hit. Scores are cosine similarities in [-1, 1]. */
export interface ScoredChunk {
  chunk: ConversationChunk;
  score: number;
  /** Insertion position of the chunk in the index */
  position: number;
}
