import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  createHarness,
  failingAdapter,
  FALLBACK_MESSAGE,
  scriptedAdapter,
  scriptedSource,
} from '../testing/harness.js';

const TRENDS_QUESTION = 'What are the key business trends for next quarter?';
const SNIPPET = 'Business trends are shifts in how companies operate, compete and invest over time.';

function postJson(body: unknown) {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

const chatReply = z.object({
  answer: z.string(),
  message_id: z.string(),
  timestamp: z.string(),
  persona: z.string(),
  fallback: z.boolean(),
  suggestions: z.array(z.string()),
  source: z.object({ name: z.string(), url: z.string(), term: z.string() }).optional(),
});

const historyReply = z.object({
  user_id: z.string(),
  persona: z.string(),
  history: z.array(z.object({ id: z.string(), role: z.string(), text: z.string() })),
  total_messages: z.number(),
});

const personasReply = z.object({
  personas: z.array(z.object({ id: z.string(), name: z.string(), description: z.string() })),
});

const questionsReply = z.object({ persona: z.string(), questions: z.array(z.string()) });
const errorReply = z.object({ error: z.string() });
const savedReply = z.object({ success: z.boolean(), message_id: z.string() });

describe('API', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports health', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', service: 'personachat', version: '0.1.0' });
  });

  it('reports provider and source status', async () => {
    const { app } = await createHarness({
      llm: [failingAdapter('local'), scriptedAdapter('remote', () => 'x')],
      sources: [scriptedSource('Wiki', {})],
    });
    const res = await app.request('/api/status');

    expect(await res.json()).toEqual({
      status: 'running',
      providers: { local: false, remote: true },
      sources: ['Wiki'],
      personas: ['Executive', 'Developer', 'HR Specialist', 'Student', 'General'],
      sessions: 0,
    });
  });

  it('lists exactly the five personas', async () => {
    const { app } = await createHarness();
    const body = personasReply.parse(await (await app.request('/api/personas')).json());

    expect(body.personas.map(p => p.id)).toEqual([
      'Executive', 'Developer', 'HR Specialist', 'Student', 'General',
    ]);
    expect(body.personas[0]).toEqual({
      id: 'Executive',
      name: 'Executive',
      description: 'Strategic business leader',
    });
  });

  it('returns persona-specific suggested questions', async () => {
    const { app } = await createHarness();
    const exec = questionsReply.parse(await (await app.request('/api/suggested-questions/Executive')).json());
    const student = questionsReply.parse(await (await app.request('/api/suggested-questions/Student')).json());

    expect(exec.questions[0]).toBe('What are the key business trends for next quarter?');
    expect(student.questions[0]).toBe('What is digital transformation, in simple terms?');
    expect(exec.questions).not.toEqual(student.questions);
  });

  it('resolves persona labels with spaces', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/suggested-questions/HR%20Specialist');

    expect(res.status).toBe(200);
    expect(questionsReply.parse(await res.json()).persona).toBe('HR Specialist');
  });

  it('returns 404 for suggested questions of an unknown persona', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/suggested-questions/Wizard');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown persona: Wizard' });
  });

  it('answers a chat turn and records it in the history', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/chat', postJson({
      message: TRENDS_QUESTION,
      persona: 'Executive',
      user_id: 'test',
    }));

    expect(res.status).toBe(200);
    const reply = chatReply.parse(await res.json());
    expect(reply.answer).toBe('Scripted answer.');
    expect(reply.message_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(reply.persona).toBe('Executive');
    expect(reply.fallback).toBe(false);
    expect(reply.suggestions).toEqual([
      'Can you provide more strategic insights?',
      'What are the business implications?',
      'How does this affect our bottom line?',
    ]);
    expect(reply.source).toBeUndefined();
    expect(console.log).toHaveBeenCalledWith(
      '[personachat] chat test/Executive terms=[business trends, market trends, economic trends, ' +
      'industry trends, business, economics] source=none fallback=false'
    );

    const history = historyReply.parse(await (await app.request('/api/chat-history/test/Executive')).json());
    expect(history.user_id).toBe('test');
    expect(history.total_messages).toBe(2);
    expect(history.history.map(m => [m.role, m.text])).toEqual([
      ['user', TRENDS_QUESTION],
      ['assistant', 'Scripted answer.'],
    ]);
    expect(history.history[1]?.id).toBe(reply.message_id);
  });

  it('grounds the prompt in the first accepted snippet', async () => {
    const llm = scriptedAdapter('scripted', () => 'Grounded answer.');
    const wiki = scriptedSource('Wiki', {
      'business trends': { text: SNIPPET, url: 'https://wiki.example/Business_trends' },
    });
    const { app } = await createHarness({ llm: [llm], sources: [wiki] });

    const res = await app.request('/api/chat', postJson({
      message: TRENDS_QUESTION,
      persona: 'Executive',
      user_id: 'test',
    }));
    const reply = chatReply.parse(await res.json());

    expect(wiki.terms).toEqual(['business trends']);
    expect(reply.source).toMatchObject({
      name: 'Wiki',
      url: 'https://wiki.example/Business_trends',
      term: 'business trends',
    });
    const prompt = llm.calls[0]?.at(-1)?.content ?? '';
    expect(prompt).toContain('--- Reference material (Wiki) ---\n' + SNIPPET);
    expect(prompt.endsWith(`Question: ${TRENDS_QUESTION}`)).toBe(true);
  });

  it('sends earlier turns along with the new prompt', async () => {
    const llm = scriptedAdapter('scripted', () => 'Noted.');
    const { app } = await createHarness({ llm: [llm] });

    await app.request('/api/chat', postJson({ message: 'First question', persona: 'Developer', user_id: 'u1' }));
    await app.request('/api/chat', postJson({ message: 'Second question', persona: 'Developer', user_id: 'u1' }));

    const second = llm.calls[1] ?? [];
    expect(second.slice(0, 2)).toEqual([
      { role: 'user', content: 'First question' },
      { role: 'assistant', content: 'Noted.' },
    ]);
    expect(second).toHaveLength(3);
  });

  it('falls back to the canned answer when no provider responds', async () => {
    const { app } = await createHarness({ llm: [failingAdapter('down')] });
    const res = await app.request('/api/chat', postJson({ message: 'Hello?', user_id: 'u2' }));

    expect(res.status).toBe(200);
    const reply = chatReply.parse(await res.json());
    expect(reply).toMatchObject({ answer: FALLBACK_MESSAGE, fallback: true, persona: 'General' });
  });

  it('rejects a chat without a message', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/chat', postJson({ persona: 'Executive', user_id: 'test' }));

    expect(res.status).toBe(400);
    expect(errorReply.parse(await res.json()).error).toBe('Message is required');
  });

  it('rejects a blank message', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/chat', postJson({ message: '   ', user_id: 'test' }));

    expect(res.status).toBe(400);
    expect(errorReply.parse(await res.json()).error).toBe('Message is required');
  });

  it('rejects a chat without a user', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/chat', postJson({ message: 'Hi there' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'user_id is required' });
  });

  it('rejects an unknown persona before calling any provider', async () => {
    const llm = scriptedAdapter('scripted', () => 'never');
    const { app, store } = await createHarness({ llm: [llm] });
    const res = await app.request('/api/chat', postJson({ message: 'Hi', persona: 'Wizard', user_id: 'test' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Unknown persona: Wizard' });
    expect(llm.calls).toEqual([]);
    expect(store.list('test', 'General')).toEqual([]);
  });

  it('rejects a body that is not JSON', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/chat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });

    expect(res.status).toBe(400);
  });

  it('returns an empty history for a new session', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/chat-history/nobody/Student');

    expect(await res.json()).toEqual({
      user_id: 'nobody',
      persona: 'Student',
      history: [],
      total_messages: 0,
    });
  });

  it('returns 404 for the history of an unknown persona', async () => {
    const { app } = await createHarness();
    expect((await app.request('/api/chat-history/test/Wizard')).status).toBe(404);
  });

  it('clears one history with DELETE or POST', async () => {
    const { app, store } = await createHarness();
    await store.append('test', 'Executive', { role: 'user', text: 'a' });
    await store.append('test', 'Student', { role: 'user', text: 'b' });

    const res = await app.request('/api/clear-history/test/Executive', { method: 'DELETE' });
    expect(await res.json()).toEqual({ success: true, message: 'Chat history cleared successfully' });
    expect(store.list('test', 'Executive')).toEqual([]);
    expect(store.list('test', 'Student')).toHaveLength(1);

    const again = await app.request('/api/clear-history/test/Student', { method: 'POST' });
    expect(again.status).toBe(200);
    expect(store.list('test', 'Student')).toEqual([]);
  });

  it('saves a single message', async () => {
    const { app, store } = await createHarness();
    const res = await app.request('/api/save-message', postJson({
      message: 'Pinned note',
      persona: 'HR Specialist',
      user_id: 'test',
      message_type: 'assistant',
      timestamp: '2026-02-01T09:30:00.000Z',
    }));

    const body = savedReply.parse(await res.json());
    expect(body.success).toBe(true);
    expect(store.list('test', 'HR Specialist')).toEqual([
      {
        id: body.message_id,
        userId: 'test',
        persona: 'HR Specialist',
        role: 'assistant',
        text: 'Pinned note',
        timestamp: '2026-02-01T09:30:00.000Z',
      },
    ]);
  });

  it('validates saved messages', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/save-message', postJson({ message: 'x', persona: 'General' }));

    expect(res.status).toBe(400);
    expect(errorReply.parse(await res.json()).error).toBe('Required');
  });

  it('answers unknown routes with 404', async () => {
    const { app } = await createHarness();
    const res = await app.request('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Route not found' });
  });
});
