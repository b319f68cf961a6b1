/**
 * JSON API routes.
 *
 *   /api/health, /api/status        — liveness, provider reachability
 *   /api/personas, /api/suggested-* — static persona data
 *   /api/chat, /api/chat-history/*  — the conversation itself
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { NotFoundError } from '../core/errors.js';
import { parseWith, VERSION, type AppDeps, type AppEnv } from './context.js';

const chatBodySchema = z.object({
  message: z.string({ required_error: 'Message is required' }).trim().min(1, 'Message is required'),
  persona: z.string().min(1).default('General'),
  user_id: z.string().trim().min(1).optional(),
});

const saveMessageSchema = z.object({
  message: z.string().min(1, 'Message is required'),
  persona: z.string().min(1, 'Persona is required'),
  user_id: z.string().trim().min(1, 'user_id is required'),
  message_type: z.enum(['user', 'assistant']).default('user'),
  timestamp: z.string().datetime().optional(),
});

export function createAPI(deps: AppDeps) {
  const { responder, catalog, store, llm, sources, sessions } = deps;
  const api = new Hono<AppEnv>();

  const readJson = (req: Request): Promise<unknown> => req.json().catch(() => null);

  /** Health check */
  api.get('/api/health', (c) => {
    return c.json({
      status: 'healthy',
      service: 'personachat',
      version: VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  /** Which providers answer right now */
  api.get('/api/status', async (c) => {
    const providers = await llm.health();
    return c.json({
      status: 'running',
      providers,
      sources: sources.sources,
      personas: catalog.list().map(p => p.id),
      sessions: sessions.active(),
    });
  });

  api.get('/api/personas', (c) => {
    const personas = catalog.list().map(p => ({
      id: p.id,
      name: p.id,
      description: p.description,
    }));
    return c.json({ personas });
  });

  api.get('/api/suggested-questions/:persona', (c) => {
    const label = c.req.param('persona');
    const persona = catalog.find(label);
    if (!persona) throw new NotFoundError(`Unknown persona: ${label}`);

    return c.json({ persona: persona.id, questions: persona.suggestedQuestions });
  });

  /** One chat turn: answer, persist both sides, return the reply */
  api.post('/api/chat', async (c) => {
    const body = parseWith(chatBodySchema, await readJson(c.req.raw));
    const userId = c.get('user')?.id ?? body.user_id;
    if (!userId) {
      return c.json({ error: 'user_id is required' }, 400);
    }

    const persona = responder.persona(body.persona);
    const history = store.list(userId, persona.id);

    await store.append(userId, persona.id, { role: 'user', text: body.message });
    const result = await responder.respond(persona.id, body.message, history);
    console.log(
      `[personachat] chat ${userId}/${persona.id} terms=[${result.terms.join(', ')}] ` +
      `source=${result.source?.name ?? 'none'} fallback=${result.fallback}`
    );
    const reply = await store.append(userId, persona.id, {
      role: 'assistant',
      text: result.answer,
      source: result.source,
      fallback: result.fallback,
    });

    return c.json({
      answer: reply.text,
      message_id: reply.id,
      timestamp: reply.timestamp,
      persona: persona.id,
      fallback: result.fallback,
      suggestions: persona.followUps,
      ...(result.source ? { source: result.source } : {}),
    });
  });

  api.get('/api/chat-history/:userId/:persona', (c) => {
    const { userId, persona: label } = c.req.param();
    const persona = catalog.find(label);
    if (!persona) throw new NotFoundError(`Unknown persona: ${label}`);

    const history = store.list(userId, persona.id);
    return c.json({
      user_id: userId,
      persona: persona.id,
      history,
      total_messages: history.length,
    });
  });

  api.on(['DELETE', 'POST'], '/api/clear-history/:userId/:persona', async (c) => {
    const { userId, persona: label } = c.req.param();
    const persona = catalog.find(label);
    if (!persona) throw new NotFoundError(`Unknown persona: ${label}`);

    await store.clear(userId, persona.id);
    return c.json({ success: true, message: 'Chat history cleared successfully' });
  });

  /** Append a single message without generating an answer */
  api.post('/api/save-message', async (c) => {
    const body = parseWith(saveMessageSchema, await readJson(c.req.raw));
    const persona = responder.persona(body.persona);

    const saved = await store.append(body.user_id, persona.id, {
      role: body.message_type,
      text: body.message,
      timestamp: body.timestamp,
    });
    return c.json({ success: true, message_id: saved.id });
  });

  return api;
}
