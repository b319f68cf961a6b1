/**
 * Chat history store — one JSON file, keyed by (user, persona).
 *
 * The file is read once when the store opens; memory is the source
 * of truth after that. Each mutation holds the lock for its session
 * key until the new snapshot is on disk. Snapshots are written one
 * at a time (temp file + rename), so a crash never leaves half a file.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { PERSONA_IDS } from '../types/index.js';
import type { ChatMessage, MessageDraft, PersonaId } from '../types/index.js';

export interface ChatStore {
  append(userId: string, persona: PersonaId, draft: MessageDraft): Promise<ChatMessage>;
  list(userId: string, persona: PersonaId): ChatMessage[];
  clear(userId: string, persona: PersonaId): Promise<void>;
  /** Resolves once every queued write has reached the disk */
  flush(): Promise<void>;
}

const messageSchema = z.object({
  id: z.string(),
  userId: z.string(),
  persona: z.enum(PERSONA_IDS),
  role: z.enum(['user', 'assistant']),
  text: z.string(),
  timestamp: z.string(),
  source: z
    .object({
      name: z.string(),
      url: z.string(),
      retrievedAt: z.string(),
      term: z.string(),
    })
    .optional(),
  fallback: z.boolean().optional(),
});

const fileSchema = z.record(z.string(), z.array(messageSchema));

export function sessionKey(userId: string, persona: PersonaId): string {
  return `${userId}::${persona}`;
}

/**
 * Open (or create) the history file at `path`.
 * Pass `null` for a memory-only store.
 */
export async function openChatStore(path: string | null): Promise<ChatStore> {
  const sessions = new Map<string, ChatMessage[]>(
    Object.entries(path ? await readSnapshot(path) : {})
  );
  const locks = new Map<string, Promise<unknown>>();
  let writeChain: Promise<void> = Promise.resolve();

  /** Serialise work per session key */
  function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = locks.get(key) ?? Promise.resolve();
    const next = previous.then(fn, fn);
    const settled = next.catch(() => undefined);
    locks.set(key, settled);
    void settled.then(() => {
      if (locks.get(key) === settled) locks.delete(key);
    });
    return next;
  }

  function persist(): Promise<void> {
    if (!path) return Promise.resolve();
    const target = path;
    const write = writeChain.then(async () => {
      await mkdir(dirname(target), { recursive: true });
      const temp = `${target}.${process.pid}.tmp`;
      await writeFile(temp, JSON.stringify(Object.fromEntries(sessions), null, 2), 'utf-8');
      await rename(temp, target);
    });
    // Keep the chain alive after a failed write; the caller still sees the error.
    writeChain = write.catch((error: unknown) => {
      console.error('[personachat] Failed to write chat history:', error);
    });
    return write;
  }

  return {
    append(userId, persona, draft) {
      const key = sessionKey(userId, persona);
      return withLock(key, async () => {
        const message: ChatMessage = {
          id: randomUUID(),
          userId,
          persona,
          role: draft.role,
          text: draft.text,
          timestamp: draft.timestamp ?? new Date().toISOString(),
          ...(draft.source ? { source: draft.source } : {}),
          ...(draft.fallback !== undefined ? { fallback: draft.fallback } : {}),
        };
        sessions.set(key, [...(sessions.get(key) ?? []), message]);
        await persist();
        return message;
      });
    },

    list(userId, persona) {
      return [...(sessions.get(sessionKey(userId, persona)) ?? [])];
    },

    clear(userId, persona) {
      const key = sessionKey(userId, persona);
      return withLock(key, async () => {
        if (!sessions.delete(key)) return;
        await persist();
      });
    },

    flush() {
      return writeChain;
    },
  };
}

async function readSnapshot(path: string): Promise<Record<string, ChatMessage[]>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }

  if (!raw.trim()) return {};

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Chat history at ${path} is not valid JSON: ${reason}`);
  }

  const parsed = fileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Chat history at ${path} is malformed: ${parsed.error.message}`);
  }

  for (const [key, messages] of Object.entries(parsed.data)) {
    const stray = messages.find((m) => sessionKey(m.userId, m.persona) !== key);
    if (stray) {
      throw new Error(
        `Chat history at ${path} is malformed: message ${stray.id} ` +
        `(${sessionKey(stray.userId, stray.persona)}) is stored under ${key}`
      );
    }
  }
  return parsed.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
