import { describe, expect, it } from 'vitest';
import {
  buildSystemPrompt,
  buildUserPrompt,
  createResponder,
  type PersonaRetriever,
} from '../src/core/responder.js';
import { createSignalExtractor, emptyPersonaContext } from '../src/core/signal-extractor.js';
import { createSpeakerPredicate } from '../src/core/speaker.js';
import type { ConversationChunk, SignalRule } from '../src/types/index.js';
import { TEST_PERSONA, createFakeLLM, makeChunk, type FakeLLMOptions } from './helpers.js';

const RULES: SignalRule[] = [
  { category: 'communicationStyle', label: 'platform thinking', match: { type: 'keywords', keywords: ['platform'] } },
];

const PLATFORM_CHUNK = makeChunk({ id: 'p', fileSource: 'a.md', content: 'We built a platform.' });

function retrieverOf(chunks: ConversationChunk[]): PersonaRetriever {
  return { retrievePersona: async () => chunks };
}

function setup(llmOptions: FakeLLMOptions = {}, retrieval: PersonaRetriever = retrieverOf([PLATFORM_CHUNK])) {
  const llm = createFakeLLM(llmOptions);
  const responder = createResponder({
    persona: TEST_PERSONA,
    retrieval,
    extractor: createSignalExtractor(RULES, createSpeakerPredicate(TEST_PERSONA.speakers)),
    llm,
    options: { k: 5, historyInPrompt: 1 },
  });
  return { llm, responder };
}

describe('buildSystemPrompt', () => {
  it('adds language and topic boundaries', () => {
    expect(buildSystemPrompt(TEST_PERSONA)).toBe(
      'You are Alex.\n\nYou can communicate in: en. Try to match the user\'s language.',
    );
    expect(buildSystemPrompt({ ...TEST_PERSONA, languages: [], blockedTopics: ['salaries', 'politics'] })).toBe(
      'You are Alex.\n\nDo NOT discuss the following topics: salaries, politics. Politely decline if asked.',
    );
  });
});

describe('buildUserPrompt', () => {
  const closing =
    'Respond as Alex would, drawing on the context above. ' +
    'Use specific examples and numbers from it where they fit. ' +
    'If the context does not cover the question, say so honestly.';

  it('lays out query, signals, excerpts and history', () => {
    const context = {
      ...emptyPersonaContext(),
      communicationStyle: ['platform thinking'],
      personalityTraits: ['mission-driven', 'innovation-minded'],
      relevantChunks: [PLATFORM_CHUNK],
    };
    const prompt = buildUserPrompt(TEST_PERSONA, 'What did you build?', context, [
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello' },
    ]);

    expect(prompt).toBe([
      '## User Query:\nWhat did you build?',
      '## Persona Context:\n**Communication Style:** platform thinking\n**Personality Traits:** mission-driven, innovation-minded',
      '## Relevant Context from Alex\'s Conversations:\n**From a.md:**\nWe built a platform.',
      '## Recent Conversation:\nUser: Hi\nYou: Hello',
      closing,
    ].join('\n\n'));
  });

  it('leaves out empty sections', () => {
    expect(buildUserPrompt(TEST_PERSONA, 'Hi?', emptyPersonaContext(), [])).toBe(
      `## User Query:\nHi?\n\n${closing}`,
    );
  });

  it('quotes at most three excerpts', () => {
    const chunks = ['one', 'two', 'three', 'four'].map(content => makeChunk({ id: content, content }));
    const prompt = buildUserPrompt(TEST_PERSONA, 'q', { ...emptyPersonaContext(), relevantChunks: chunks }, []);

    expect(prompt).toContain('**From test.md:**\nthree');
    expect(prompt).not.toContain('four');
  });
});

describe('responder.respond', () => {
  it('answers from the LLM with the analysed context', async () => {
    const { llm, responder } = setup();
    const result = await responder.respond('What did you build?', [
      { role: 'user', content: 'Earlier question' },
      { role: 'assistant', content: 'Earlier answer' },
    ]);

    expect(result.content).toBe('Hello there');
    expect(result.source).toBe('llm');
    expect(result.context.communicationStyle).toEqual(['platform thinking']);
    expect(result.error).toBeUndefined();

    const [system, user] = llm.calls[0];
    expect(system).toEqual({ role: 'system', content: buildSystemPrompt(TEST_PERSONA) });
    expect(user.content).toContain('## Recent Conversation:\nYou: Earlier answer\n\n');
    expect(user.content).not.toContain('Earlier question');
  });

  it('uses the fallback for an empty reply', async () => {
    const { responder } = setup({ fragments: ['  ', '\n'] });
    const result = await responder.respond('What did you build?');

    expect(result).toMatchObject({ content: 'No idea, sorry.', source: 'fallback' });
  });

  it('apologises in character when retrieval fails', async () => {
    const { llm, responder } = setup({}, {
      retrievePersona: async () => {
        throw new Error('index offline');
      },
    });
    const result = await responder.respond('What did you build?');

    expect(result).toEqual({
      content: 'I cannot remember right now.',
      source: 'error',
      context: emptyPersonaContext(),
      error: 'index offline',
    });
    expect(llm.calls).toEqual([]);
  });

  it('apologises in character when generation fails', async () => {
    const { responder } = setup({ fail: new Error('model crashed') });
    const result = await responder.respond('What did you build?');

    expect(result.content).toBe('I lost my train of thought.');
    expect(result.source).toBe('error');
    expect(result.error).toBe('model crashed');
    expect(result.context.relevantChunks).toEqual([PLATFORM_CHUNK]);
  });

  it('rejects when cancelled', async () => {
    const { responder } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(responder.respond('What did you build?', [], controller.signal)).rejects.toThrow('aborted');
  });
});

describe('responder.stream', () => {
  it('yields the LLM fragments', async () => {
    const { responder } = setup();
    const prepared = await responder.prepare('What did you build?');
    const out: string[] = [];
    for await (const fragment of responder.stream(prepared)) out.push(fragment);

    expect(out).toEqual(['Hello', ' there']);
  });

  it('yields nothing once cancelled', async () => {
    const { llm, responder } = setup();
    const prepared = await responder.prepare('What did you build?');
    const controller = new AbortController();
    controller.abort();

    const out: string[] = [];
    for await (const fragment of responder.stream(prepared, controller.signal)) out.push(fragment);

    expect(out).toEqual([]);
    expect(llm.calls).toEqual([]);
  });
});

describe('responder copy', () => {
  it('exposes greeting and starters', () => {
    const { responder } = setup();
    expect(responder.greeting()).toBe('Hi, I am Alex.');
    expect(responder.starters()).toEqual(['What did you build?']);
    expect(responder.persona).toBe(TEST_PERSONA);
  });
});
