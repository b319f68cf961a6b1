/**
 * LLM provider factory.
 *
 * Creates the right adapter based on config.
 * Add new providers here.
 */

import type { LLMProvider } from '../types/index.js';
import type { FetchLike } from '../sources/provider.js';
import type { LLMAdapter } from './provider.js';
import { createOllamaAdapter } from './ollama.js';
import { createOpenAIAdapter } from './openai.js';

export type { LLMAdapter, LLMMessage, LLMResponse, ChatOptions } from './provider.js';
export { createLLMClient } from './client.js';
export type { LLMClient, LLMResult } from './client.js';

export function createLLMAdapter(config: LLMProvider, fetchFn: FetchLike = fetch): LLMAdapter {
  switch (config.type) {
    case 'ollama':
      return createOllamaAdapter(config, fetchFn);
    case 'openai':
      return createOpenAIAdapter(config, fetchFn);
  }
}
