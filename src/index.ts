/**
 * mimic — retrieval-grounded persona chat.
 *
 * Entry point. Loads data, opens the index and the database,
 * starts the server. One process, one port.
 *
 *   --rebuild-index   re-embed the corpus even if an index exists
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { resolve } from 'node:path';

import { initDatabase } from './db/index.js';
import { loadData } from './core/data-loader.js';
import { createResponder } from './core/responder.js';
import { RetrievalEngine } from './core/retrieval.js';
import { createSignalExtractor } from './core/signal-extractor.js';
import { createSpeakerPredicate } from './core/speaker.js';
import { createEmbeddingProvider, createLLMAdapter } from './llm/index.js';
import { createAPI } from './server/api.js';

const DATA_DIR = process.env.MIMIC_DATA_DIR ?? resolve(process.cwd(), 'data');
const DB_PATH = process.env.MIMIC_DB_PATH ?? resolve(process.cwd(), 'mimic.db');

async function main() {
  const forceRebuild = process.argv.includes('--rebuild-index');

  console.log('');
  console.log('  ┌─────────────────────────┐');
  console.log('  │       m i m i c          │');
  console.log('  │  persona context engine  │');
  console.log('  └─────────────────────────┘');
  console.log('');

  // 1. Load data
  console.log(`  data:  ${DATA_DIR}`);
  const data = loadData(DATA_DIR);

  // 2. Initialize database
  console.log(`  db:    ${DB_PATH}`);
  await initDatabase(DB_PATH);

  // 3. Create providers
  const llm = createLLMAdapter(data.config.provider);
  const embedder = createEmbeddingProvider(data.config.embedding);
  console.log(`  llm:   ${llm.name}`);
  console.log(`  embed: ${embedder.model}`);

  const healthy = await llm.health();
  if (!healthy) {
    console.warn('  ⚠  LLM provider is not reachable. Responses will use the error copy.');
  } else {
    console.log('  llm:   ✓ connected');
  }

  // 4. Load or build the vector index
  const isPersona = createSpeakerPredicate(data.persona.speakers);
  const retrieval = new RetrievalEngine({
    embedder,
    indexDir: data.indexDir,
    build: {
      corpusDir: data.corpusDir,
      extensions: data.config.corpus.extensions,
      chunkSize: data.config.index.chunkSize,
      chunkOverlap: data.config.index.chunkOverlap,
      embedDelayMs: data.config.index.embedDelayMs,
    },
    retrieval: data.config.retrieval,
    personaFilter: isPersona,
  });
  console.log(`  index: ${data.indexDir}${forceRebuild ? ' (rebuild)' : ''}`);
  await retrieval.initialize({ forceRebuild });

  // 5. Create responder
  const responder = createResponder({
    persona: data.persona,
    retrieval,
    extractor: createSignalExtractor(data.signals, isPersona),
    llm,
    options: {
      k: data.config.retrieval.k,
      historyInPrompt: data.config.history.promptMessages,
    },
  });

  // 6. Create server
  const app = createAPI({
    responder,
    llm,
    retrieval,
    history: data.config.history,
    adminToken: data.config.admin.token,
    embeddingModel: embedder.model,
  });

  // 7. Start
  const { port, host } = data.config.server;

  serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, () => {
    const index = retrieval.info();
    console.log('');
    console.log(`  ✓ listening on http://${host}:${port}`);
    console.log(`  ✓ persona: ${data.persona.name} (${data.persona.speakers.join(', ') || 'no speakers'})`);
    console.log(`  ✓ signals: ${data.signals.length} rules`);
    console.log(`  ✓ index: ${index.chunks} chunks, dimension ${index.dimension}`);
    if (!data.config.admin.token) console.log('  ⚠  admin token not set; admin routes are disabled');
    console.log('');
  });
}

main().catch((error) => {
  console.error('Failed to start mimic:', error);
  process.exit(1);
});
