/**
 * Splits long speaker turns into overlapping word windows.
 *
 * Sizes are counted in whitespace-separated words, a cheap stand-in
 * for tokens. Consecutive windows share `overlap` words.
 */

import type { ConversationChunk } from '../types/index.js';
import { InvalidConfigurationError } from './errors.js';

export function splitText(text: string, maxSize: number, overlap: number): string[] {
  validateWindow(maxSize, overlap);

  const words = text.split(/\s+/).filter(w => w.length > 0);
  if (words.length <= maxSize) return [text];

  const step = maxSize - overlap;
  const windows: string[] = [];

  for (let start = 0; start < words.length; start += step) {
    const end = Math.min(start + maxSize, words.length);
    windows.push(words.slice(start, end).join(' '));
    if (end === words.length) break;
  }

  return windows;
}

/**
 * Split a parsed chunk into sub-chunks.
 * A turn that fits keeps its id; split parts get `<id>-<n>`.
 */
export function expandChunk(
  chunk: ConversationChunk,
  maxSize: number,
  overlap: number,
): ConversationChunk[] {
  const parts = splitText(chunk.content, maxSize, overlap);
  if (parts.length === 1) return [chunk];

  return parts.map((content, n) => ({
    ...chunk,
    id: `${chunk.id}-${n}`,
    content,
    metadata: { ...chunk.metadata, part: n, parts: parts.length },
  }));
}

function validateWindow(maxSize: number, overlap: number): void {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new InvalidConfigurationError(
      `Chunk size must be a positive integer, got ${maxSize}`,
      maxSize,
      overlap,
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
    throw new InvalidConfigurationError(
      `Chunk overlap must be an integer in [0, ${maxSize}), got ${overlap}`,
      maxSize,
      overlap,
    );
  }
}
