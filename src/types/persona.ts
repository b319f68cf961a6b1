/**
 * Persona definitions — the closed set of roles a user can chat as.
 *
 * The labels are fixed in code; everything a persona says about itself
 * (instruction prefix, descriptions, suggested questions) lives in
 * data/personas.yaml and is validated against this list at startup.
 */

export const PERSONA_IDS = [
  'Executive',
  'Developer',
  'HR Specialist',
  'Student',
  'General',
] as const;

export type PersonaId = (typeof PERSONA_IDS)[number];

export function isPersonaId(value: string): value is PersonaId {
  return (PERSONA_IDS as readonly string[]).includes(value);
}

export interface Persona {
  id: PersonaId;

  /** One-line summary shown on the persona selection page */
  description: string;

  /**
   * Instruction prefix — the first block of every prompt built
   * for this persona. Sets tone, depth and answer format.
   */
  instruction: string;

  /** Starter questions offered on the chat page */
  suggestedQuestions: string[];

  /** Follow-up prompts returned alongside each answer */
  followUps: string[];

  /** Response-length hint passed to the LLM provider */
  maxTokens: number;
}
