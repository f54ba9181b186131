/**
 * Reads the data directory once at start-up.
 *
 * config.yaml is required; persona.yaml and signals.yaml fall back to
 * defaults. Secrets may come from the environment instead of the YAML.
 */

import { existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import type { z } from 'zod';
import type { MimicConfig, Persona, SignalRule } from '../types/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { configSchema, formatIssues, personaSchema, signalsSchema } from './schemas.js';
import { readYamlFile } from './yaml.js';

export interface LoadedData {
  dataDir: string;
  config: MimicConfig;
  persona: Persona;
  signals: SignalRule[];
  /** Absolute corpus directory */
  corpusDir: string;
  /** Absolute vector index directory */
  indexDir: string;
}

export type Env = Record<string, string | undefined>;

/**
 * Load all data from the data directory.
 */
export function loadData(dataDir: string, env: Env = process.env): LoadedData {
  const configPath = join(dataDir, 'config.yaml');
  const personaPath = join(dataDir, 'persona.yaml');
  const signalsPath = join(dataDir, 'signals.yaml');

  if (!existsSync(configPath)) {
    throw new ConfigurationError(
      `Config not found at ${configPath}. ` +
      `Copy data.example/ to data/ and customize it.`
    );
  }

  const config = applyEnv(readYaml(configPath, configSchema), env);
  const persona = existsSync(personaPath)
    ? readYaml(personaPath, personaSchema)
    : defaultPersona();
  const signals = existsSync(signalsPath)
    ? readYaml(signalsPath, signalsSchema).signals
    : [];

  if (persona.speakers.length === 0) {
    console.warn('[mimic] persona.speakers is empty; no transcript turns will count as the persona');
  }

  return {
    dataDir,
    config,
    persona,
    signals,
    corpusDir: resolveIn(dataDir, config.corpus.path),
    indexDir: resolveIn(dataDir, config.index.path),
  };
}

function readYaml<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = readYamlFile(path);
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${path}: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

function applyEnv(config: MimicConfig, env: Env): MimicConfig {
  const apiKey = env.OPENAI_API_KEY;
  const provider = config.provider.type === 'openai' && !config.provider.apiKey && apiKey
    ? { ...config.provider, apiKey }
    : config.provider;
  const embedding = config.embedding.type === 'openai' && !config.embedding.apiKey && apiKey
    ? { ...config.embedding, apiKey }
    : config.embedding;

  if (provider.type === 'openai' && !provider.apiKey) {
    throw new ConfigurationError('provider.apiKey is required for OpenAI (or set OPENAI_API_KEY)');
  }
  if (embedding.type === 'openai' && !embedding.apiKey) {
    throw new ConfigurationError('embedding.apiKey is required for OpenAI (or set OPENAI_API_KEY)');
  }

  return {
    ...config,
    provider,
    embedding,
    admin: { token: env.MIMIC_ADMIN_TOKEN || config.admin.token },
  };
}

function resolveIn(dataDir: string, path: string): string {
  return isAbsolute(path) ? path : join(dataDir, path);
}

function defaultPersona(): Persona {
  return {
    name: 'mimic',
    description: 'A persona grounded in past conversations',
    speakers: [],
    systemPrompt: 'You answer questions in the voice of the person in the transcripts, grounded in what they actually said.',
    greeting: 'Hi! Ask me anything about my work.',
    fallback: 'I don\'t have a good answer for that one.',
    languages: ['en'],
    blockedTopics: [],
    starters: [],
    errorResponses: {
      context: 'I\'m having trouble recalling my past conversations right now. Could you try again in a moment?',
      generation: 'I\'m having trouble putting my thoughts together right now. Could you try again?',
    },
  };
}
