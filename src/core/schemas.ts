/**
 * zod schemas for the data directory files.
 *
 * Every section has defaults, so a minimal config.yaml can be
 * almost empty.
 */

import { z } from 'zod';
import {
  DEFAULT_EMBEDDING_PROVIDER,
  DEFAULT_PROVIDER,
  type MimicConfig,
  type Persona,
  type SignalRule,
} from '../types/index.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const llmProviderSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ollama'),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1).optional(),
    maxTokens: positiveInt.optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout: z.number().nonnegative().optional(),
  }),
  z.object({
    type: z.literal('openai'),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1).optional(),
    maxTokens: positiveInt.optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout: z.number().nonnegative().optional(),
  }),
]);

const embeddingProviderSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ollama'),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1).optional(),
  }),
  z.object({
    type: z.literal('openai'),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1).optional(),
  }),
]);

export const configSchema: z.ZodType<MimicConfig, z.ZodTypeDef, unknown> = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
  }).default({}),
  provider: llmProviderSchema.default(DEFAULT_PROVIDER),
  embedding: embeddingProviderSchema.default(DEFAULT_EMBEDDING_PROVIDER),
  corpus: z.object({
    path: z.string().min(1).default('convos'),
    extensions: z.array(z.string().regex(/^\./, 'extensions start with a dot')).min(1).default(['.md']),
  }).default({}),
  index: z.object({
    path: z.string().min(1).default('vectors'),
    chunkSize: positiveInt.default(1000),
    chunkOverlap: nonNegativeInt.default(200),
    embedDelayMs: nonNegativeInt.default(100),
  }).default({}).refine(
    index => index.chunkOverlap < index.chunkSize,
    { message: 'index.chunkOverlap must be smaller than index.chunkSize' },
  ),
  retrieval: z.object({
    k: positiveInt.default(5),
    minScore: z.number().min(-1).max(1).default(0.1),
    cacheKeyLength: positiveInt.default(100),
    cacheSize: nonNegativeInt.default(1000),
  }).default({}),
  history: z.object({
    maxMessages: positiveInt.default(50),
    contextMessages: nonNegativeInt.default(10),
    promptMessages: nonNegativeInt.default(5),
  }).default({}),
  admin: z.object({
    token: z.string().default(''),
  }).default({}),
});

export const personaSchema: z.ZodType<Persona, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  speakers: z.array(z.string().min(1)).default([]),
  systemPrompt: z.string().min(1),
  greeting: z.string().default('Hi! Ask me anything.'),
  fallback: z.string().default('I don\'t have a good answer for that one.'),
  languages: z.array(z.string()).default(['en']),
  blockedTopics: z.array(z.string()).default([]),
  starters: z.array(z.string()).default([]),
  errorResponses: z.object({
    context: z.string().default('I\'m having trouble recalling my past conversations right now. Could you try again in a moment?'),
    generation: z.string().default('I\'m having trouble putting my thoughts together right now. Could you try again?'),
  }).default({}),
});

const signalRuleSchema: z.ZodType<SignalRule, z.ZodTypeDef, unknown> = z.object({
  category: z.enum(['communicationStyle', 'technicalExpertise', 'decisionPatterns', 'personalityTraits']),
  label: z.string().min(1),
  match: z.discriminatedUnion('type', [
    z.object({
      type: z.literal('keywords'),
      keywords: z.array(z.string().min(1)).min(1),
      all: z.boolean().optional(),
    }),
    z.object({
      type: z.literal('pattern'),
      pattern: z.string().min(1),
      flags: z.string().regex(/^[imsu]*$/, 'supported flags: i, m, s, u').optional(),
    }),
  ]),
  minLength: nonNegativeInt.optional(),
});

export const signalsSchema: z.ZodType<{ signals: SignalRule[] }, z.ZodTypeDef, unknown> = z.object({
  signals: z.array(signalRuleSchema).default([]),
});

/** "index.chunkSize: Expected number, received string; ..." */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
