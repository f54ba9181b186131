import { mkdtempSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ConversationChunk, Persona } from '../src/types/index.js';
import type { EmbeddingProvider, LLMAdapter, LLMCallOptions, LLMMessage } from '../src/llm/index.js';

export const DIMENSION = 64;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/** 32-bit FNV-1a */
export function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/** Word counts hashed into DIMENSION buckets */
export function bagOfWords(text: string): number[] {
  const vector = Array.from({ length: DIMENSION }, () => 0);
  for (const token of tokenize(text)) {
    vector[fnv1a(token) % DIMENSION] += 1;
  }
  return vector;
}

export interface FakeEmbedder extends EmbeddingProvider {
  calls: string[];
}

/** Deterministic in-process embedder; `failOn` texts throw */
export function createHashingEmbedder(opts: { failOn?: (text: string) => boolean } = {}): FakeEmbedder {
  const calls: string[] = [];
  return {
    model: 'test/bag-of-words',
    calls,
    async embed(text: string) {
      calls.push(text);
      if (opts.failOn?.(text)) throw new Error(`embedding refused: ${text.slice(0, 20)}`);
      return bagOfWords(text);
    },
  };
}

export interface FakeLLMOptions {
  /** Whole reply for chat(), fragments joined */
  fragments?: string[];
  /** chat() and stream() reject with this */
  fail?: Error;
  /** stream() throws this after yielding `failAfter` fragments */
  failAfter?: number;
  /** chat() waits on this before answering; stream() before every fragment after the first */
  gate?: Promise<void>;
  healthy?: boolean;
}

export interface FakeLLM extends LLMAdapter {
  calls: LLMMessage[][];
}

function abortError(): Error {
  const err = new Error('This operation was aborted');
  err.name = 'AbortError';
  return err;
}

export function createFakeLLM(opts: FakeLLMOptions = {}): FakeLLM {
  const fragments = opts.fragments ?? ['Hello', ' there'];
  const calls: LLMMessage[][] = [];

  return {
    name: 'fake/scripted',
    calls,

    async chat(messages: LLMMessage[], options: LLMCallOptions = {}) {
      calls.push(messages);
      if (opts.gate) await opts.gate;
      if (options.signal?.aborted) throw abortError();
      if (opts.fail) throw opts.fail;
      return { content: fragments.join('') };
    },

    async *stream(messages: LLMMessage[], options: LLMCallOptions = {}) {
      calls.push(messages);
      if (opts.fail) throw opts.fail;
      for (const [i, fragment] of fragments.entries()) {
        if (i > 0 && opts.gate) await opts.gate;
        if (options.signal?.aborted) throw abortError();
        if (opts.failAfter !== undefined && i === opts.failAfter) {
          throw new Error('stream broke');
        }
        yield fragment;
      }
    },

    async health() {
      return opts.healthy ?? true;
    },
  };
}

export function tempDir(prefix = 'mimic-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Write files (relative path → content) under a fresh temp dir */
export function writeTree(files: Record<string, string>): string {
  const root = tempDir();
  for (const [path, content] of Object.entries(files)) {
    const full = join(root, path);
    mkdirSync(join(full, '..'), { recursive: true });
    writeFileSync(full, content);
  }
  return root;
}

export function makeChunk(overrides: Partial<ConversationChunk> = {}): ConversationChunk {
  return {
    id: 'chunk-1',
    speaker: 'Alex',
    content: 'We built a platform.',
    metadata: {},
    fileSource: 'test.md',
    ...overrides,
  };
}

export const TEST_PERSONA: Persona = {
  name: 'Alex',
  description: 'Test persona',
  speakers: ['Alex'],
  systemPrompt: 'You are Alex.',
  greeting: 'Hi, I am Alex.',
  fallback: 'No idea, sorry.',
  languages: ['en'],
  blockedTopics: [],
  starters: ['What did you build?'],
  errorResponses: {
    context: 'I cannot remember right now.',
    generation: 'I lost my train of thought.',
  },
};

export const ALEX_LINE = 'We served 60K+ users and saved 1,500 hours weekly using our RAG platform';

export const SCENARIO_TRANSCRIPT = [
  `**Alex (00:10):** ${ALEX_LINE}`,
  '',
  '**John (00:20):** How did you do that?',
  '',
].join('\n');
