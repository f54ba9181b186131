/**
 * Error taxonomy for mimic.
 *
 * Index and embedding errors are recovered close to where they happen
 * (rebuild, skip, degraded reply). Configuration errors stop start-up.
 */

/** Required settings missing or invalid. Fatal at start-up. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** Chunker parameters violate overlap < size. */
export class InvalidConfigurationError extends Error {
  constructor(
    message: string,
    public readonly maxSize: number,
    public readonly overlap: number,
  ) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

/** One or both index artifacts are missing. Triggers a rebuild. */
export class VectorStoreNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Vector store not found at ${path}`);
    this.name = 'VectorStoreNotFoundError';
  }
}

/** Index artifacts exist but cannot be read back. Triggers a rebuild. */
export class VectorStoreCorruptError extends Error {
  constructor(
    public readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Vector store at ${path} is corrupt: ${reason}`, options);
    this.name = 'VectorStoreCorruptError';
  }
}

/** The embedding provider failed or answered with something unusable. */
export class EmbeddingProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingProviderError';
  }
}

/**
 * Vectors of different lengths met in one index.
 * Means the corpus and provider disagree; vectors are never padded or cut.
 */
export class EmbeddingDimensionMismatchError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context?: string,
  ) {
    super(
      `Embedding dimension mismatch: expected ${expected}, got ${actual}` +
      (context ? ` (${context})` : ''),
    );
    this.name = 'EmbeddingDimensionMismatchError';
  }
}

/** Errors the retrieval engine answers with a full rebuild */
export function isRecoverableStoreError(error: unknown): boolean {
  return error instanceof VectorStoreNotFoundError || error instanceof VectorStoreCorruptError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
