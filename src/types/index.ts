export type {
  Message,
  MessageStatus,
  MessageRole,
  MessageMetadata,
  ResponseSource,
  PersonaSnapshot,
  Session,
  SessionPreview,
  SessionSummary,
} from './message.js';

export { toPersonaSnapshot } from './message.js';

export type {
  Persona,
  PersonaContext,
  SignalCategory,
} from './persona.js';

export { SIGNAL_CATEGORIES } from './persona.js';

export type {
  ConversationChunk,
  EmbeddingVector,
  ScoredChunk,
} from './chunk.js';

export type {
  SignalRule,
  KeywordMatch,
  PatternMatch,
} from './signals.js';

export type {
  LLMProvider,
  OllamaProvider,
  OpenAIProvider,
  EmbeddingProviderConfig,
  OllamaEmbeddingProvider,
  OpenAIEmbeddingProvider,
} from './provider.js';

export { DEFAULT_PROVIDER, DEFAULT_EMBEDDING_PROVIDER } from './provider.js';

export type {
  MimicConfig,
  CorpusConfig,
  IndexConfig,
  RetrievalConfig,
  HistoryConfig,
} from './data.js';
