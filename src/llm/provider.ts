/**
 * LLM provider abstraction.
 *
 * A provider takes a list of chat messages and returns a response
 * string. That's it. No streaming: one question, one answer.
 */

export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  /** How many tokens were used (if provider reports it) */
  usage?: {
    promptTokens?: number;
    completionTokens?: number;
  };
}

export interface ChatOptions {
  /** Response-length hint */
  maxTokens?: number;
}

export interface LLMAdapter {
  /** Human-readable name for logs */
  name: string;

  /** Generate a response. Throws ProviderError on any failure. */
  chat(messages: LLMMessage[], options?: ChatOptions): Promise<LLMResponse>;

  /** Check if the provider is reachable */
  health(): Promise<boolean>;
}
