/**
 * The responder — one chat turn, start to finish.
 *
 * Flow:
 *   1. Resolve the persona → ConfigurationError if unknown
 *   2. Question → search terms (rules engine)
 *   3. Terms → grounding snippet (source client, best effort)
 *   4. Persona prefix + snippet + question → prompt
 *   5. Prompt + recent history → LLM client (fallback on failure)
 *
 * Persisting the turn is the caller's job.
 */

import type { ChatMessage, Persona, QueryPolicy, SourceCitation } from '../types/index.js';
import type { LLMClient, LLMMessage } from '../llm/index.js';
import type { SourceClient } from '../sources/index.js';
import { normalizeQuery } from './rules-engine.js';
import { buildPrompt, type PersonaCatalog } from './prompt-builder.js';

export interface ResponderConfig {
  catalog: PersonaCatalog;
  policy: QueryPolicy;
  sources: SourceClient;
  llm: LLMClient;
  /** How many prior messages go along with the prompt */
  historyTurns: number;
}

export interface RespondResult {
  persona: Persona;
  answer: string;
  /** Canned answer was used because no provider responded */
  fallback: boolean;
  source?: SourceCitation;
  /** Search terms tried, logged per chat turn */
  terms: string[];
}

export type Responder = ReturnType<typeof createResponder>;

export function createResponder(config: ResponderConfig) {
  const { catalog, policy, sources, llm, historyTurns } = config;

  return {
    /** Look up before spending any network time on a bad label */
    persona(label: string): Persona {
      return catalog.require(label);
    },

    async respond(
      personaLabel: string,
      question: string,
      history: ChatMessage[] = []
    ): Promise<RespondResult> {
      const persona = catalog.require(personaLabel);

      const terms = normalizeQuery(question, policy);
      const context = terms.length > 0
        ? await sources.lookup(terms)
        : undefined;

      const prompt = buildPrompt(catalog, persona.id, question, context);
      const result = await llm.generate(prompt, persona, toLLMHistory(history, historyTurns));

      return {
        persona,
        answer: result.text,
        fallback: result.fallback,
        terms,
        ...(context?.status === 'found'
          ? {
              source: {
                name: context.sourceName,
                url: context.sourceUrl,
                retrievedAt: context.retrievedAt,
                term: context.term,
              },
            }
          : {}),
      };
    },
  };
}

/**
 * Last N stored messages as provider turns. Canned fallback answers
 * are left out so the model never sees them as its own words.
 */
function toLLMHistory(history: ChatMessage[], turns: number): LLMMessage[] {
  if (turns <= 0) return [];
  return history
    .filter(m => !m.fallback)
    .slice(-turns)
    .map(m => ({ role: m.role, content: m.text }));
}
