/**
 * zod schemas for everything read from the data directory.
 *
 * Parsed output is typed against the interfaces in ../types so the
 * two cannot drift apart.
 */

import { z } from 'zod';
import {
  PERSONA_IDS,
  type AppConfig,
  type Persona,
  type QueryPolicy,
  type User,
} from '../types/index.js';

const personaId = z.enum(PERSONA_IDS);

const ollamaProvider = z.object({
  type: z.literal('ollama'),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  timeout: z.number().positive().optional(),
});

const openaiProvider = z.object({
  type: z.literal('openai'),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  timeout: z.number().positive().optional(),
});

const sourceBase = {
  name: z.string().min(1),
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive().optional(),
  minLength: z.number().int().nonnegative().optional(),
};

const sourceConfig = z.discriminatedUnion('type', [
  z.object({ type: z.literal('wikipedia'), ...sourceBase }),
  z.object({ type: z.literal('duckduckgo'), ...sourceBase }),
  z.object({
    type: z.literal('reader'),
    ...sourceBase,
    maxChars: z.number().int().positive().optional(),
    notFoundMarkers: z.array(z.string().min(1)).optional(),
  }),
]);

export const configSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(5000),
      host: z.string().default('0.0.0.0'),
    })
    .default({}),
  llm: z
    .object({
      providers: z
        .array(z.discriminatedUnion('type', [ollamaProvider, openaiProvider]))
        .default([{ type: 'ollama' }]),
      fallbackMessage: z
        .string()
        .min(1)
        .default(
          "I'm sorry, I can't reach the assistant service right now. Please try again in a moment."
        ),
      historyTurns: z.number().int().nonnegative().default(6),
    })
    .default({}),
  sources: z.array(sourceConfig).default([]),
  session: z
    .object({
      cookieName: z.string().min(1).default('personachat_session'),
      ttlMinutes: z.number().positive().default(480),
    })
    .default({}),
  historyFile: z.string().min(1).default('chat-history.json'),
});

const personaEntry = z.object({
  description: z.string().min(1),
  instruction: z.string().min(1),
  suggestedQuestions: z.array(z.string().min(1)).min(1),
  followUps: z.array(z.string().min(1)).default([]),
  maxTokens: z.number().int().positive().default(800),
});

/**
 * personas.yaml is a map keyed by persona label. Every label must be
 * present; unknown labels are rejected by the enum.
 */
export const personasSchema: z.ZodType<Persona[], z.ZodTypeDef, unknown> = z
  .record(personaId, personaEntry)
  .superRefine((map, ctx) => {
    for (const id of PERSONA_IDS) {
      if (!map[id]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Missing persona: ${id}`,
          path: [id],
        });
      }
    }
  })
  .transform((map) =>
    PERSONA_IDS.flatMap((id) => {
      const entry = map[id];
      return entry ? [{ id, ...entry }] : [];
    })
  );

export const queryPolicySchema: z.ZodType<QueryPolicy, z.ZodTypeDef, unknown> = z.object({
  rules: z
    .array(
      z.object({
        id: z.string().min(1),
        match: z.object({
          type: z.literal('keywords'),
          keywords: z.array(z.string().min(1)).min(1),
          all: z.boolean().optional(),
        }),
        includeMatched: z.boolean().optional(),
        terms: z.array(z.string().min(1)),
      })
    )
    .default([]),
  stopWords: z.array(z.string()).default([]),
});

export const usersSchema: z.ZodType<User[], z.ZodTypeDef, unknown> = z.array(
  z.object({
    id: z.string().min(1),
    email: z.string().email(),
    passwordHash: z.string().regex(/^scrypt:[0-9a-f]+:[0-9a-f]+$/),
    persona: personaId,
  })
);
