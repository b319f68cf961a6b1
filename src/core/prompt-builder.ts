/**
 * Prompt builder — persona prefix + optional grounding snippet + question.
 *
 * Pure function of its inputs. The persona catalog is the only
 * lookup; an unknown label is a configuration error, not a fallback
 * to General.
 */

import { ConfigurationError } from './errors.js';
import type { Persona, PersonaId, SourceResult } from '../types/index.js';
import { isPersonaId } from '../types/index.js';

export interface PersonaCatalog {
  list(): Persona[];
  /** Throws ConfigurationError for labels outside the persona set */
  require(label: string): Persona;
  find(label: string): Persona | null;
}

export function createPersonaCatalog(personas: Persona[]): PersonaCatalog {
  const byId = new Map<PersonaId, Persona>(personas.map((p) => [p.id, p]));

  const find = (label: string): Persona | null =>
    isPersonaId(label) ? byId.get(label) ?? null : null;

  return {
    list: () => [...byId.values()],
    find,
    require(label: string): Persona {
      const persona = find(label);
      if (!persona) {
        throw new ConfigurationError(`Unknown persona: ${label}`);
      }
      return persona;
    },
  };
}

export function buildPrompt(
  catalog: PersonaCatalog,
  personaLabel: string,
  question: string,
  context?: SourceResult
): string {
  const persona = catalog.require(personaLabel);
  const parts = [persona.instruction.trim()];

  if (context && context.status === 'found') {
    parts.push(
      `--- Reference material (${context.sourceName}) ---\n` +
      context.snippet.trim() +
      '\n--- End of reference material ---'
    );
    parts.push(
      'Answer using ONLY the reference material above when it covers the question. ' +
      'If it does not, say so briefly, then answer from general knowledge.'
    );
  } else {
    parts.push(
      'No reference material was found for this question. ' +
      `Answer from general knowledge, keeping the tone of the ${persona.id} persona.`
    );
  }

  parts.push(`Question: ${question.trim()}`);

  return parts.join('\n\n');
}
