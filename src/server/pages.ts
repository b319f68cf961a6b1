/**
 * Server-rendered pages: login, persona selection, chat.
 *
 * Plain HTML from hono/html with a small inline script on the chat
 * page that talks to /api/chat. Everything except /login needs a
 * session.
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { deleteCookie, setCookie } from 'hono/cookie';
import { html, raw } from 'hono/html';
import { AuthenticationError } from '../core/errors.js';
import type { ChatMessage, Persona } from '../types/index.js';
import type { AppDeps, AppEnv } from './context.js';

const STYLE = `
  body { font-family: system-ui, sans-serif; max-width: 760px; margin: 2rem auto; padding: 0 1rem; color: #1f2933; }
  header { display: flex; justify-content: space-between; align-items: baseline; }
  .error { color: #b42318; }
  .personas { list-style: none; padding: 0; }
  .personas li { border: 1px solid #d0d5dd; border-radius: 8px; padding: .75rem 1rem; margin-bottom: .5rem; }
  .msg { padding: .5rem .75rem; border-radius: 8px; margin: .5rem 0; white-space: pre-wrap; }
  .msg.user { background: #eef4ff; }
  .msg.assistant { background: #f2f4f7; }
  .msg small { display: block; color: #667085; margin-top: .25rem; }
  .suggested button { margin: .25rem .25rem 0 0; }
  form.chat { display: flex; gap: .5rem; margin-top: 1rem; }
  form.chat input { flex: 1; padding: .5rem; }
`;

const CHAT_SCRIPT = `
  const root = document.getElementById('chat');
  const log = document.getElementById('log');
  const form = document.getElementById('chat-form');
  const input = form.querySelector('input');

  function append(role, text, source) {
    const div = document.createElement('div');
    div.className = 'msg ' + role;
    div.textContent = text;
    if (source) {
      const small = document.createElement('small');
      small.textContent = 'Source: ' + source.name + ' | ' + source.url;
      div.appendChild(small);
    }
    log.appendChild(div);
  }

  async function send(message) {
    append('user', message);
    const res = await fetch('/api/chat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ message, persona: root.dataset.persona, user_id: root.dataset.user }),
    });
    const data = await res.json();
    append('assistant', res.ok ? data.answer : (data.error || 'Something went wrong'), data.source);
  }

  form.addEventListener('submit', (e) => {
    e.preventDefault();
    const message = input.value.trim();
    if (!message) return;
    input.value = '';
    send(message);
  });

  document.querySelectorAll('.suggested button').forEach((b) => {
    b.addEventListener('click', () => send(b.textContent));
  });

  document.getElementById('clear').addEventListener('click', async () => {
    const path = '/api/clear-history/' + encodeURIComponent(root.dataset.user) + '/' + encodeURIComponent(root.dataset.persona);
    await fetch(path, { method: 'DELETE' });
    log.replaceChildren();
  });
`;

function layout(title: string, body: unknown) {
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${title} · personachat</title>
    <style>${raw(STYLE)}</style>
  </head>
  <body>
    ${body}
  </body>
</html>`;
}

function loginPage(error?: string, email = '') {
  return layout('Log in', html`
    <h1>personachat</h1>
    ${error ? html`<p class="error">${error}</p>` : ''}
    <form method="post" action="/login">
      <p><label>Email <input type="email" name="email" value="${email}" required /></label></p>
      <p><label>Password <input type="password" name="password" required /></label></p>
      <button type="submit">Log in</button>
    </form>
  `);
}

function personasPage(email: string, personas: Persona[], assigned: string) {
  return layout('Choose a persona', html`
    <header><h1>Choose a persona</h1><span>${email} · <a href="/logout">Log out</a></span></header>
    <ul class="personas">
      ${personas.map(p => html`
        <li>
          <a href="/chat/${encodeURIComponent(p.id)}"><strong>${p.id}</strong></a>
          ${p.id === assigned ? html` <em>(your role)</em>` : ''}
          <div>${p.description}</div>
        </li>`)}
    </ul>
  `);
}

function chatPage(userId: string, persona: Persona, messages: ChatMessage[]) {
  return layout(persona.id, html`
    <header>
      <h1>${persona.id}</h1>
      <span><a href="/personas">Switch persona</a> · <a href="/logout">Log out</a></span>
    </header>
    <main id="chat" data-user="${userId}" data-persona="${persona.id}">
      <div class="suggested">
        ${persona.suggestedQuestions.map(q => html`<button type="button">${q}</button>`)}
      </div>
      <div id="log">
        ${messages.map(m => html`
          <div class="msg ${m.role}">${m.text}${m.source
            ? html`<small>Source: ${m.source.name} | ${m.source.url}</small>`
            : ''}</div>`)}
      </div>
      <form id="chat-form" class="chat">
        <input name="message" autocomplete="off" placeholder="Ask something…" />
        <button type="submit">Send</button>
        <button type="button" id="clear">Clear</button>
      </form>
    </main>
    <script>${raw(CHAT_SCRIPT)}</script>
  `);
}

export function createPages(deps: AppDeps) {
  const { catalog, store, users, sessions, cookie } = deps;
  const pages = new Hono<AppEnv>();

  const requireLogin: MiddlewareHandler<AppEnv> = async (c, next) => {
    if (!c.get('user')) return c.redirect('/login');
    await next();
  };

  pages.get('/', (c) => c.redirect(c.get('user') ? '/personas' : '/login'));

  pages.get('/login', (c) => {
    if (c.get('user')) return c.redirect('/personas');
    return c.html(loginPage());
  });

  pages.post('/login', async (c) => {
    const form = await c.req.parseBody();
    const email = typeof form.email === 'string' ? form.email : '';
    const password = typeof form.password === 'string' ? form.password : '';

    try {
      const user = users.authenticate(email, password);
      const session = sessions.create(user.id);
      setCookie(c, cookie.name, session.token, {
        path: '/',
        httpOnly: true,
        sameSite: 'Lax',
        maxAge: cookie.maxAgeSeconds,
      });
      console.log(`[personachat] ${user.email} logged in`);
      return c.redirect('/personas');
    } catch (error) {
      if (error instanceof AuthenticationError) {
        return c.html(loginPage(error.message, email), 401);
      }
      throw error;
    }
  });

  pages.get('/logout', (c) => {
    const session = c.get('session');
    if (session) sessions.destroy(session.token);
    deleteCookie(c, cookie.name, { path: '/' });
    return c.redirect('/login');
  });

  pages.get('/personas', requireLogin, (c) => {
    const user = c.get('user');
    if (!user) return c.redirect('/login');
    return c.html(personasPage(user.email, catalog.list(), user.persona));
  });

  pages.get('/chat/:persona', requireLogin, (c) => {
    const user = c.get('user');
    if (!user) return c.redirect('/login');

    const persona = catalog.find(c.req.param('persona'));
    if (!persona) return c.redirect('/personas');

    return c.html(chatPage(user.id, persona, store.list(user.id, persona.id)));
  });

  return pages;
}
