/**
 * Chat message types.
 *
 * A session is the ordered list of messages for one (user, persona)
 * pair. Messages are append-only; the only way to remove them is to
 * clear the whole session.
 */

import type { PersonaId } from './persona.js';

export type MessageRole = 'user' | 'assistant';

/** Where the grounding snippet for an answer came from */
export interface SourceCitation {
  name: string;
  url: string;
  retrievedAt: string; // ISO 8601
  /** Search term that produced the hit */
  term: string;
}

export interface ChatMessage {
  id: string;
  userId: string;
  persona: PersonaId;
  role: MessageRole;
  text: string;
  timestamp: string; // ISO 8601
  source?: SourceCitation;
  /** Set on assistant messages produced by the canned fallback */
  fallback?: boolean;
}

/** What callers hand to the store; id and timestamp are assigned there */
export type MessageDraft = Pick<ChatMessage, 'role' | 'text'> &
  Partial<Pick<ChatMessage, 'source' | 'fallback' | 'timestamp'>>;
