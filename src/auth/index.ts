/**
 * Login for the chat pages.
 *
 * Users are read-only after startup. Sessions are random tokens in
 * a cookie, kept in memory; a restart logs everyone out.
 */

import { randomBytes } from 'node:crypto';
import { AuthenticationError } from '../core/errors.js';
import type { Session, User } from '../types/index.js';
import { verifyPassword } from './password.js';

export { hashPassword, verifyPassword } from './password.js';

export interface UserDirectory {
  findById(id: string): User | null;
  findByEmail(email: string): User | null;
  /** Throws AuthenticationError on unknown email or wrong password */
  authenticate(email: string, password: string): User;
}

export function createUserDirectory(users: User[]): UserDirectory {
  const byId = new Map(users.map(u => [u.id, u]));
  const byEmail = new Map(users.map(u => [u.email.toLowerCase(), u]));

  const findByEmail = (email: string) => byEmail.get(email.trim().toLowerCase()) ?? null;

  return {
    findById: (id) => byId.get(id) ?? null,
    findByEmail,
    authenticate(email, password) {
      const user = findByEmail(email);
      if (!user || !verifyPassword(password, user.passwordHash)) {
        console.warn(`[personachat] Failed login for ${email || '(empty)'}`);
        throw new AuthenticationError();
      }
      return user;
    },
  };
}

export interface SessionStore {
  create(userId: string): Session;
  /** Expired sessions are dropped and reported as missing */
  get(token: string): Session | null;
  destroy(token: string): void;
  /** Live sessions, after dropping expired ones */
  active(): number;
}

export function createSessionStore(ttlMinutes: number, now: () => number = Date.now): SessionStore {
  const sessions = new Map<string, Session>();
  const ttlMs = ttlMinutes * 60_000;

  const sweep = () => {
    const cutoff = now();
    for (const [token, session] of sessions) {
      if (session.expiresAt <= cutoff) sessions.delete(token);
    }
  };

  return {
    create(userId) {
      sweep();
      const session: Session = {
        token: randomBytes(24).toString('hex'),
        userId,
        expiresAt: now() + ttlMs,
      };
      sessions.set(session.token, session);
      return session;
    },

    get(token) {
      const session = sessions.get(token);
      if (!session) return null;
      if (session.expiresAt <= now()) {
        sessions.delete(token);
        return null;
      }
      return session;
    },

    destroy(token) {
      sessions.delete(token);
    },

    active() {
      sweep();
      return sessions.size;
    },
  };
}
