/**
 * OpenAI-compatible chat completions adapter.
 *
 * Works against api.openai.com or any server exposing the same
 * /chat/completions shape.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import type { OpenAIProvider } from '../types/index.js';
import type { FetchLike } from '../sources/provider.js';
import type { ChatOptions, LLMAdapter, LLMMessage, LLMResponse } from './provider.js';

const DEFAULTS = {
  baseUrl: 'https://api.openai.com/v1',
  model: 'gpt-4o-mini',
  maxTokens: 800,
  temperature: 0.7,
  timeout: 60,
};

const completionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

export function createOpenAIAdapter(config: OpenAIProvider, fetchFn: FetchLike = fetch): LLMAdapter {
  const baseUrl = (config.baseUrl ?? DEFAULTS.baseUrl).replace(/\/+$/, '');
  const model = config.model ?? DEFAULTS.model;
  const temperature = config.temperature ?? DEFAULTS.temperature;
  const timeoutSec = config.timeout ?? DEFAULTS.timeout;
  const apiKey = config.apiKey;
  const name = `openai/${model}`;

  return {
    name,

    async chat(messages: LLMMessage[], options: ChatOptions = {}): Promise<LLMResponse> {
      if (!apiKey) {
        throw new ProviderError(name, 'API key not configured');
      }

      const response = await fetchFn(`${baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages,
          max_tokens: options.maxTokens ?? DEFAULTS.maxTokens,
          temperature,
        }),
        signal: AbortSignal.timeout(timeoutSec * 1000),
      });

      if (!response.ok) {
        const reason =
          response.status === 401 ? 'invalid API key'
          : response.status === 429 ? 'rate limited or quota exceeded'
          : `HTTP ${response.status}`;
        throw new ProviderError(name, reason);
      }

      const parsed = completionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ProviderError(name, 'unexpected response payload');
      }

      const content = parsed.data.choices[0]?.message.content?.trim() ?? '';
      if (!content) {
        throw new ProviderError(name, 'empty completion');
      }

      return {
        content,
        usage: {
          promptTokens: parsed.data.usage?.prompt_tokens,
          completionTokens: parsed.data.usage?.completion_tokens,
        },
      };
    },

    async health(): Promise<boolean> {
      if (!apiKey) return false;
      try {
        const response = await fetchFn(`${baseUrl}/models`, {
          headers: { Authorization: `Bearer ${apiKey}` },
          signal: AbortSignal.timeout(3000),
        });
        return response.ok;
      } catch {
        return false;
      }
    },
  };
}
