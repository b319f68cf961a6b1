/**
 * LLM provider configuration.
 *
 * Providers are listed in data/config.yaml and tried in order.
 * The default setup talks to Ollama on localhost and falls back
 * to an OpenAI-compatible endpoint when a key is configured.
 */

export interface OllamaProvider {
  type: 'ollama';
  /** Ollama API base URL. Default: http://localhost:11434 */
  baseUrl?: string;
  /** Model name. Default: llama3.2 */
  model?: string;
  /** Temperature (0-1). Lower = more predictable */
  temperature?: number;
  /** Request timeout in seconds */
  timeout?: number;
}

export interface OpenAIProvider {
  type: 'openai';
  /** API key. Falls back to OPENAI_API_KEY */
  apiKey?: string;
  /** Default: https://api.openai.com/v1 */
  baseUrl?: string;
  model?: string;
  temperature?: number;
  timeout?: number;
}

export type LLMProvider = OllamaProvider | OpenAIProvider;
