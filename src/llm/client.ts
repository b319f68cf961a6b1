/**
 * LLM client — the only thing the responder talks to.
 *
 * Tries each configured provider in order. When all of them fail
 * the canned fallback message is returned with `fallback: true`.
 * Nothing here throws to the caller.
 */

import type { Persona } from '../types/index.js';
import type { LLMAdapter, LLMMessage, LLMResponse } from './provider.js';

export interface LLMResult {
  text: string;
  /** True when the canned message was substituted */
  fallback: boolean;
  /** Adapter that answered, null for the fallback */
  provider: string | null;
}

export interface LLMClient {
  readonly providers: string[];
  generate(prompt: string, persona: Persona, history?: LLMMessage[]): Promise<LLMResult>;
  health(): Promise<Record<string, boolean>>;
}

export function createLLMClient(adapters: LLMAdapter[], fallbackMessage: string): LLMClient {
  return {
    providers: adapters.map(a => a.name),

    async generate(prompt: string, persona: Persona, history: LLMMessage[] = []): Promise<LLMResult> {
      const messages: LLMMessage[] = [...history, { role: 'user', content: prompt }];

      for (const adapter of adapters) {
        const startTime = Date.now();
        try {
          const response = await adapter.chat(messages, { maxTokens: persona.maxTokens });
          const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
          console.log(
            `[personachat] ${adapter.name} answered for ${persona.id} in ${elapsed}s${formatUsage(response.usage)}`
          );
          return { text: response.content, fallback: false, provider: adapter.name };
        } catch (error) {
          const isTimeout = error instanceof Error && error.name === 'TimeoutError';
          const reason = error instanceof Error ? error.message : String(error);
          console.error(`[personachat] ${adapter.name} failed (${isTimeout ? 'timeout' : reason})`);
        }
      }

      console.warn('[personachat] All providers failed, using fallback answer');
      return { text: fallbackMessage, fallback: true, provider: null };
    },

    async health(): Promise<Record<string, boolean>> {
      const entries = await Promise.all(
        adapters.map(async (a) => [a.name, await a.health()] as const)
      );
      return Object.fromEntries(entries);
    },
  };
}

function formatUsage(usage: LLMResponse['usage']): string {
  if (!usage) return '';
  const { promptTokens, completionTokens } = usage;
  if (promptTokens === undefined && completionTokens === undefined) return '';
  return ` (${promptTokens ?? '?'} prompt / ${completionTokens ?? '?'} completion tokens)`;
}
