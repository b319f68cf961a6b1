/**
 * Top-level configuration (data/config.yaml).
 */

import type { LLMProvider } from './provider.js';
import type { SourceConfig } from './source.js';

export interface AppConfig {
  server: {
    port: number;
    host: string;
  };

  llm: {
    /** Tried in order until one answers */
    providers: LLMProvider[];
    /** Canned answer when every provider fails */
    fallbackMessage: string;
    /** Prior session messages sent along with each prompt */
    historyTurns: number;
  };

  /** Reference sources, in lookup order */
  sources: SourceConfig[];

  session: {
    cookieName: string;
    ttlMinutes: number;
  };

  /** Chat history file, relative to the data directory */
  historyFile: string;
}
