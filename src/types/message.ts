/**
 * Session and turn types for mimic conversations.
 *
 * A session is one chat between a user and the persona.
 * Turns flow in two directions:
 *   - user:      the question or comment
 *   - assistant: the persona's grounded answer
 *
 * An assistant turn is written once, when its response is complete.
 * While it streams, a 'pending' placeholder holds its place.
 */

import type { PersonaContext } from './persona.js';

/** Every turn gets a status lifecycle */
export type MessageStatus = 'complete' | 'pending' | 'error';

/** Who sent this turn */
export type MessageRole = 'user' | 'assistant';

/** Where an assistant turn's content came from */
export type ResponseSource = 'llm' | 'fallback' | 'error';

/**
 * A persona context as stored with a turn: labels plus chunk
 * provenance, without vectors.
 */
export interface PersonaSnapshot {
  communicationStyle: string[];
  technicalExpertise: string[];
  decisionPatterns: string[];
  personalityTraits: string[];
  chunks: {
    id: string;
    speaker: string;
    fileSource: string;
    content: string;
  }[];
}

export interface MessageMetadata {
  source?: ResponseSource;
  /** Error annotation on degraded turns */
  error?: string;
  personaContext?: PersonaSnapshot;
}

export interface Message {
  id: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  status: MessageStatus;
  createdAt: string;   // ISO 8601
  metadata: MessageMetadata;
}

export interface Session {
  id: string;
  createdAt: string;
  updatedAt: string;
}

/** Row in the admin session list */
export interface SessionPreview extends Session {
  messageCount: number;
  /** First 100 characters of the newest turn */
  lastMessage: string | null;
}

export interface SessionSummary {
  sessionId: string;
  createdAt: string;
  updatedAt: string;
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  durationMinutes: number;
}

export function toPersonaSnapshot(context: PersonaContext): PersonaSnapshot {
  return {
    communicationStyle: [...context.communicationStyle],
    technicalExpertise: [...context.technicalExpertise],
    decisionPatterns: [...context.decisionPatterns],
    personalityTraits: [...context.personalityTraits],
    chunks: context.relevantChunks.map(c => ({
      id: c.id,
      speaker: c.speaker,
      fileSource: c.fileSource,
      content: c.content,
    })),
  };
}
