/**
 * Ollama adapter — talks to a local Ollama instance.
 *
 * No API keys, no cloud, no data leaving the network.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import type { OllamaProvider } from '../types/index.js';
import type { FetchLike } from '../sources/provider.js';
import type { ChatOptions, LLMAdapter, LLMMessage, LLMResponse } from './provider.js';

const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'llama3.2',
  maxTokens: 800,
  temperature: 0.7,
  timeout: 60,
};

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export function createOllamaAdapter(config: OllamaProvider, fetchFn: FetchLike = fetch): LLMAdapter {
  const baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  const model = config.model ?? DEFAULTS.model;
  const temperature = config.temperature ?? DEFAULTS.temperature;
  const timeoutSec = config.timeout ?? DEFAULTS.timeout;
  const name = `ollama/${model}`;

  return {
    name,

    async chat(messages: LLMMessage[], options: ChatOptions = {}): Promise<LLMResponse> {
      const response = await fetchFn(`${baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          messages: messages.map(m => ({
            role: m.role,
            content: m.content,
          })),
          stream: false,
          options: {
            num_predict: options.maxTokens ?? DEFAULTS.maxTokens,
            temperature,
          },
        }),
        signal: AbortSignal.timeout(timeoutSec * 1000),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ProviderError(name, `HTTP ${response.status}: ${text}`);
      }

      const parsed = chatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError(name, 'unexpected response payload');
      }

      const content = parsed.data.message?.content.trim() ?? '';
      if (!content) {
        throw new ProviderError(name, 'empty completion');
      }

      return {
        content,
        usage: {
          promptTokens: parsed.data.prompt_eval_count,
          completionTokens: parsed.data.eval_count,
        },
      };
    },

    async health(): Promise<boolean> {
      try {
        const response = await fetchFn(`${baseUrl}/api/tags`, {
          signal: AbortSignal.timeout(3000),
        });
        return response.ok;
      } catch {
        return false;
      }
    },
  };
}
