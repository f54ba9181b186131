/**
 * Turns a user message into a persona reply.
 *
 * Flow:
 *   1. Retrieve the persona's own turns relevant to the message
 *   2. Analyse them into persona signals
 *   3. Build the prompt and call the LLM (whole, or streamed)
 *
 * Failures other than cancellation never escape respond(): they come
 * back as the persona's in-character error copy with source 'error'.
 */

import {
  SIGNAL_CATEGORIES,
  type ConversationChunk,
  type Persona,
  type PersonaContext,
  type ResponseSource,
  type SignalCategory,
} from '../types/index.js';
import type { LLMAdapter, LLMMessage } from '../llm/index.js';
import { errorMessage } from './errors.js';
import { emptyPersonaContext, type SignalExtractor } from './signal-extractor.js';

/** Retrieval as the responder needs it */
export interface PersonaRetriever {
  retrievePersona(query: string, k?: number): Promise<ConversationChunk[]>;
}

export interface ResponderConfig {
  persona: Persona;
  retrieval: PersonaRetriever;
  extractor: SignalExtractor;
  llm: LLMAdapter;
  options: {
    /** Chunks retrieved per message */
    k: number;
    /** Past turns quoted in the prompt */
    historyInPrompt: number;
  };
}

export interface HistoryTurn {
  role: 'user' | 'assistant';
  content: string;
}

/** Everything needed to call the LLM for one message */
export interface PreparedResponse {
  query: string;
  context: PersonaContext;
  messages: LLMMessage[];
}

export interface RespondResult {
  /** The response text */
  content: string;
  /** How was this response generated? */
  source: ResponseSource;
  context: PersonaContext;
  /** Set on degraded results */
  error?: string;
}

/** Which step failed, for picking the apology */
export type FailureStage = 'context' | 'generation';

const RELEVANT_CHUNKS_IN_PROMPT = 3;

const LABEL_HEADINGS: Record<SignalCategory, string> = {
  communicationStyle: 'Communication Style',
  technicalExpertise: 'Technical Expertise',
  decisionPatterns: 'Decision Patterns',
  personalityTraits: 'Personality Traits',
};

export type Responder = ReturnType<typeof createResponder>;

export function createResponder(config: ResponderConfig) {
  const { persona, retrieval, extractor, llm, options } = config;

  function degraded(stage: FailureStage, err: unknown, context = emptyPersonaContext()): RespondResult {
    return {
      content: persona.errorResponses[stage],
      source: 'error',
      context,
      error: errorMessage(err),
    };
  }

  async function prepare(query: string, history: HistoryTurn[] = []): Promise<PreparedResponse> {
    const chunks = await retrieval.retrievePersona(query, options.k);
    const context = extractor.analyze(chunks);
    const recent = options.historyInPrompt > 0 ? history.slice(-options.historyInPrompt) : [];

    return {
      query,
      context,
      messages: [
        { role: 'system', content: buildSystemPrompt(persona) },
        { role: 'user', content: buildUserPrompt(persona, query, context, recent) },
      ],
    };
  }

  return {
    /** Get the greeting message for a new conversation */
    greeting(): string {
      return persona.greeting;
    },

    starters(): string[] {
      return persona.starters;
    },

    /** Access persona config (for fallback text, etc.) */
    get persona() {
      return persona;
    },

    prepare,
    degraded,

    /** Process a message and generate a whole response.
     *  Pass signal to allow cancellation; a cancelled call rejects. */
    async respond(
      query: string,
      history: HistoryTurn[] = [],
      signal?: AbortSignal,
    ): Promise<RespondResult> {
      let prepared: PreparedResponse;
      try {
        prepared = await prepare(query, history);
      } catch (err) {
        if (signal?.aborted) throw err;
        console.warn(`[mimic] Retrieval failed: ${errorMessage(err)}`);
        return degraded('context', err);
      }

      try {
        const response = await llm.chat(prepared.messages, { signal });
        const content = response.content.trim();
        return content
          ? { content, source: 'llm', context: prepared.context }
          : { content: persona.fallback, source: 'fallback', context: prepared.context };
      } catch (err) {
        if (signal?.aborted) throw err;
        console.warn(`[mimic] Generation failed (${llm.name}): ${errorMessage(err)}`);
        return degraded('generation', err, prepared.context);
      }
    },

    /**
     * Stream a prepared response as text fragments.
     * Stops at the first fragment boundary after `signal` aborts.
     */
    async *stream(prepared: PreparedResponse, signal?: AbortSignal): AsyncGenerator<string> {
      if (signal?.aborted) return;
      for await (const fragment of llm.stream(prepared.messages, { signal })) {
        if (signal?.aborted) return;
        yield fragment;
      }
    },
  };
}

/**
 * Build the system prompt with persona boundaries.
 */
export function buildSystemPrompt(persona: Persona): string {
  let prompt = persona.systemPrompt;

  if (persona.blockedTopics.length > 0) {
    prompt += `\n\nDo NOT discuss the following topics: ${persona.blockedTopics.join(', ')}.`;
    prompt += ' Politely decline if asked.';
  }

  if (persona.languages.length > 0) {
    prompt += `\n\nYou can communicate in: ${persona.languages.join(', ')}.`;
    prompt += ' Try to match the user\'s language.';
  }

  return prompt;
}

/**
 * The per-message prompt: query, persona signals, grounding excerpts
 * and the tail of the conversation.
 */
export function buildUserPrompt(
  persona: Persona,
  query: string,
  context: PersonaContext,
  history: HistoryTurn[],
): string {
  const sections = [`## User Query:\n${query}`];

  const insights = SIGNAL_CATEGORIES
    .filter(category => context[category].length > 0)
    .map(category => `**${LABEL_HEADINGS[category]}:** ${context[category].join(', ')}`);
  if (insights.length > 0) {
    sections.push(`## Persona Context:\n${insights.join('\n')}`);
  }

  const excerpts = context.relevantChunks.slice(0, RELEVANT_CHUNKS_IN_PROMPT);
  if (excerpts.length > 0) {
    sections.push(
      `## Relevant Context from ${persona.name}'s Conversations:\n` +
      excerpts.map(c => `**From ${c.fileSource}:**\n${c.content}`).join('\n\n'),
    );
  }

  if (history.length > 0) {
    sections.push(
      '## Recent Conversation:\n' +
      history.map(t => `${t.role === 'assistant' ? 'You' : 'User'}: ${t.content}`).join('\n'),
    );
  }

  sections.push(
    `Respond as ${persona.name} would, drawing on the context above. ` +
    'Use specific examples and numbers from it where they fit. ' +
    'If the context does not cover the question, say so honestly.',
  );

  return sections.join('\n\n');
}
