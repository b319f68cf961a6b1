/**
 * What every route module gets handed, and the per-request variables
 * the session middleware fills in.
 */

import type { MiddlewareHandler } from 'hono';
import { getCookie } from 'hono/cookie';
import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../core/errors.js';
import type { PersonaCatalog } from '../core/prompt-builder.js';
import type { Responder } from '../core/responder.js';
import type { ChatStore } from '../db/index.js';
import type { LLMClient } from '../llm/index.js';
import type { SourceClient } from '../sources/index.js';
import type { SessionStore, UserDirectory } from '../auth/index.js';
import type { Session, User } from '../types/index.js';

export const VERSION = '0.1.0';

export interface AppDeps {
  responder: Responder;
  catalog: PersonaCatalog;
  store: ChatStore;
  llm: LLMClient;
  sources: SourceClient;
  users: UserDirectory;
  sessions: SessionStore;
  cookie: {
    name: string;
    maxAgeSeconds: number;
  };
}

export type AppEnv = {
  Variables: {
    user: User | null;
    session: Session | null;
  };
};

/** Resolve the session cookie into `user` / `session` variables */
export function sessionMiddleware(deps: AppDeps): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const token = getCookie(c, deps.cookie.name);
    const session = token ? deps.sessions.get(token) : null;
    const user = session ? deps.users.findById(session.userId) : null;

    c.set('session', session);
    c.set('user', user);
    await next();
  };
}

export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValidationError(first?.message ?? 'Invalid request', parsed.error.flatten());
  }
  return parsed.data;
}
