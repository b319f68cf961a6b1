export type {
  ChatMessage,
  MessageDraft,
  MessageRole,
  SourceCitation,
} from './message.js';

export type { Persona, PersonaId } from './persona.js';
export { PERSONA_IDS, isPersonaId } from './persona.js';

export type { KeywordMatch, QueryRule, QueryPolicy } from './rules.js';

export type {
  LLMProvider,
  OllamaProvider,
  OpenAIProvider,
} from './provider.js';

export type {
  SourceConfig,
  WikipediaSource,
  DuckDuckGoSource,
  ReaderSource,
  SourceResult,
  SourceSnippet,
  NoSourceData,
} from './source.js';

export { NO_SOURCE_DATA } from './source.js';

export type { User, Session } from './user.js';

export type { AppConfig } from './data.js';
