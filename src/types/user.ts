/**
 * Users and login sessions.
 *
 * Users come from data/users.json and never change while the
 * server runs. Sessions live in memory only.
 */

import type { PersonaId } from './persona.js';

export interface User {
  id: string;
  email: string;
  /** scrypt:<saltHex>:<hashHex> */
  passwordHash: string;
  /** Persona assigned to the user's role */
  persona: PersonaId;
}

export interface Session {
  token: string;
  userId: string;
  expiresAt: number; // epoch ms
}
