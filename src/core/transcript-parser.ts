/**
 * Turns markdown interview transcripts into
 * speaker-attributed chunks.
 *
 * A turn starts with a bold speaker label at the beginning of a line:
 *
 *   **Alex (00:30):** Thanks for having me...
 *   **John:** How did you do that?
 *
 * and runs until the next label or the end of the document.
 * The parser is lenient: anything it cannot read yields no chunks.
 */

import { createHash } from 'node:crypto';
import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { ConversationChunk } from '../types/index.js';

/**
 * Bodies containing any of these (lower-cased) are document furniture,
 * not speech: titles, field labels, rules, headings.
 */
const NOISE_MARKERS: readonly string[] = [
  'interview simulation',
  'date:',
  'role:',
  'interviewer:',
  'candidate:',
  'duration:',
  '---',
  '#',
  'bottom line:',
];

const SPEAKER_LABEL = /^\*\*([^*():\n]+?)\s*(?:\(([^)\n]*)\))?\s*:\*\*/gm;

const ID_PREFIX_LENGTH = 100;

export function parseTranscript(
  documentText: string | null | undefined,
  sourceId: string,
  metadata: Record<string, unknown> = {},
): ConversationChunk[] {
  if (typeof documentText !== 'string' || !documentText.trim()) return [];

  const labels = [...documentText.matchAll(SPEAKER_LABEL)];
  const chunks: ConversationChunk[] = [];
  const parsedAt = new Date().toISOString();

  labels.forEach((label, i) => {
    const bodyStart = (label.index ?? 0) + label[0].length;
    const bodyEnd = i + 1 < labels.length ? labels[i + 1].index ?? documentText.length : documentText.length;

    const speaker = label[1].trim();
    const content = documentText.slice(bodyStart, bodyEnd).trim();
    const timestamp = label[2]?.trim();
    if (!speaker || !content || isNoise(content)) return;
    // `**Date:** 2024-03-12` is a field, not a turn
    if (label[2] === undefined && isNoise(`${speaker}:`)) return;

    chunks.push({
      id: chunkId(sourceId, speaker, content),
      speaker,
      content,
      metadata: { ...metadata, parsedAt },
      ...(timestamp ? { timestamp } : {}),
      fileSource: sourceId,
    });
  });

  return chunks;
}

/**
 * Parse a transcript file. The file name becomes the source id.
 * Missing or unreadable files give no chunks.
 */
export function parseTranscriptFile(filePath: string): ConversationChunk[] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch {
    return [];
  }
  return parseTranscript(text, basename(filePath), { filePath });
}

/**
 * List transcript files in a directory, sorted by name.
 * A missing directory is an empty corpus.
 */
export function loadConversationFiles(
  dir: string,
  extensions: readonly string[] = ['.md'],
): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) return [];

  const wanted = new Set(extensions.map(e => e.toLowerCase()));
  return readdirSync(dir)
    .filter(f => !f.startsWith('.'))
    .filter(f => wanted.has(extname(f).toLowerCase()))
    .sort()
    .map(f => join(dir, f))
    .filter(p => statSync(p).isFile());
}

export function isNoise(content: string): boolean {
  const normalised = content.toLowerCase().trim();
  return NOISE_MARKERS.some(marker => normalised.includes(marker));
}

export function chunkId(sourceId: string, speaker: string, content: string): string {
  const combined = `${sourceId}:${speaker}:${content.slice(0, ID_PREFIX_LENGTH)}`;
  return createHash('md5').update(combined).digest('hex').slice(0, 12);
}
