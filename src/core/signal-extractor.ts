/**
 * Derives persona labels from retrieved
 * chunks using the keyword/pattern rule table in signals.yaml.
 *
 * Only the persona's own turns count. A rule fires when at least one
 * of them matches, so every emitted label can point back at the text
 * that produced it (see supportingChunks).
 */

import type {
  ConversationChunk,
  PersonaContext,
  SignalRule,
} from '../types/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { SpeakerPredicate } from './speaker.js';

type Matcher = (normalised: string) => boolean;

interface CompiledRule {
  rule: SignalRule;
  test: Matcher;
}

export interface SignalExtractor {
  analyze(chunks: readonly ConversationChunk[]): PersonaContext;
  /** The chunks of a context that back a label */
  supportingChunks(label: string, context: PersonaContext): ConversationChunk[];
  readonly rules: readonly SignalRule[];
}

export function emptyPersonaContext(): PersonaContext {
  return {
    communicationStyle: [],
    technicalExpertise: [],
    decisionPatterns: [],
    personalityTraits: [],
    relevantChunks: [],
  };
}

export function createSignalExtractor(
  rules: readonly SignalRule[],
  isPersona: SpeakerPredicate,
): SignalExtractor {
  const compiled = rules.map(rule => ({ rule, test: compileMatch(rule) }));

  function fires(entry: CompiledRule, chunk: ConversationChunk): boolean {
    if (entry.rule.minLength !== undefined && chunk.content.length <= entry.rule.minLength) return false;
    return entry.test(chunk.content.toLowerCase());
  }

  return {
    rules,

    analyze(chunks) {
      const context = emptyPersonaContext();
      context.relevantChunks = chunks.filter(c => isPersona(c.speaker));
      if (context.relevantChunks.length === 0) return context;

      for (const entry of compiled) {
        const labels = context[entry.rule.category];
        if (labels.includes(entry.rule.label)) continue;
        if (context.relevantChunks.some(chunk => fires(entry, chunk))) {
          labels.push(entry.rule.label);
        }
      }

      return context;
    },

    supportingChunks(label, context) {
      const backing = compiled.filter(entry => entry.rule.label === label);
      return context.relevantChunks.filter(chunk => backing.some(entry => fires(entry, chunk)));
    },
  };
}

function compileMatch(rule: SignalRule): Matcher {
  const match = rule.match;
  switch (match.type) {
    case 'keywords': {
      const keywords = match.keywords.map(kw => kw.toLowerCase());
      return match.all
        ? normalised => keywords.every(kw => normalised.includes(kw))
        : normalised => keywords.some(kw => normalised.includes(kw));
    }

    case 'pattern': {
      // test() on a global regex is stateful; drop g and y
      const flags = (match.flags ?? 'i').replace(/[gy]/g, '');
      let regex: RegExp;
      try {
        regex = new RegExp(match.pattern, flags);
      } catch (err) {
        throw new ConfigurationError(
          `Invalid pattern for signal "${rule.label}": ${errorMessage(err)}`,
          { cause: err },
        );
      }
      return normalised => regex.test(normalised);
    }
  }
}
