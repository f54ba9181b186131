/**
 * Persona configuration — who mimic speaks as.
 *
 * This lives in the data directory (data/persona.yaml) and shapes
 * the responder's tone, boundaries, and which transcript speakers
 * count as the persona's own voice.
 */

import type { ConversationChunk } from './chunk.js';

export interface Persona {
  /** Display name of the persona (shown in chat) */
  name: string;

  /** Short description: who is this? */
  description: string;

  /**
   * Speaker labels in the corpus that belong to the persona.
   * Matched exactly, ignoring case and surrounding whitespace.
   */
  speakers: string[];

  /**
   * Master prompt, the system instruction for the LLM.
   * Example: "You are Alex, an engineering manager who..."
   */
  systemPrompt: string;

  /** What the persona says when a session starts */
  greeting: string;

  /** What to say when generation returns nothing */
  fallback: string;

  /**
   * Languages the persona operates in.
   * The LLM will try to answer in the user's language if listed.
   */
  languages: string[];

  /** Topics the persona refuses to discuss */
  blockedTopics: string[];

  /** Suggested opening questions */
  starters: string[];

  /** In-persona apologies for degraded turns */
  errorResponses: {
    /** Retrieval failed (index or embedding trouble) */
    context: string;
    /** Text generation failed */
    generation: string;
  };
}

/** The four label families derived from retrieved text */
export type SignalCategory =
  | 'communicationStyle'
  | 'technicalExpertise'
  | 'decisionPatterns'
  | 'personalityTraits';

export const SIGNAL_CATEGORIES: readonly SignalCategory[] = [
  'communicationStyle',
  'technicalExpertise',
  'decisionPatterns',
  'personalityTraits',
] as const;

/**
 * Derived per query from the retrieved chunks.
 * Every label is backed by at least one chunk in relevantChunks.
 */
export interface PersonaContext {
  communicationStyle: string[];
  technicalExpertise: string[];
  decisionPatterns: string[];
  personalityTraits: string[];
  /** The persona-speaker subset the labels were derived from */
  relevantChunks: ConversationChunk[];
}
