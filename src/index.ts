/**
 * personachat — persona-adaptive chat server.
 *
 * Entry point. Loads data, wires the pieces, starts the server.
 * One process, one port.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { resolve } from 'node:path';

import { loadData } from './core/data-loader.js';
import { createPersonaCatalog } from './core/prompt-builder.js';
import { createResponder } from './core/responder.js';
import { openChatStore } from './db/index.js';
import { createLLMAdapter, createLLMClient } from './llm/index.js';
import { createSourceAdapter, createSourceClient } from './sources/index.js';
import { createSessionStore, createUserDirectory } from './auth/index.js';
import { createApp } from './server/app.js';

const DATA_DIR = process.env.PERSONACHAT_DATA_DIR ?? resolve(process.cwd(), 'data');

async function main() {
  // 1. Load data
  console.log(`  data:     ${DATA_DIR}`);
  const data = loadData(DATA_DIR);
  const { config } = data;

  // 2. Open chat history
  const historyPath = process.env.PERSONACHAT_HISTORY_PATH ?? resolve(DATA_DIR, config.historyFile);
  console.log(`  history:  ${historyPath}`);
  const store = await openChatStore(historyPath);

  // 3. LLM providers, in fallback order
  const llm = createLLMClient(
    config.llm.providers.map(p => createLLMAdapter(p)),
    config.llm.fallbackMessage
  );
  console.log(`  llm:      ${llm.providers.join(' → ') || '(none, fallback only)'}`);

  const health = await llm.health();
  if (!Object.values(health).some(Boolean)) {
    console.warn('  ⚠  No LLM provider is reachable. Responses will use fallback.');
  }

  // 4. Reference sources
  const sources = createSourceClient(config.sources.map(s => createSourceAdapter(s)));
  console.log(`  sources:  ${sources.sources.join(' → ') || '(none)'}`);

  // 5. Responder + server
  const catalog = createPersonaCatalog(data.personas);
  const responder = createResponder({
    catalog,
    policy: data.policy,
    sources,
    llm,
    historyTurns: config.llm.historyTurns,
  });

  const app = createApp({
    responder,
    catalog,
    store,
    llm,
    sources,
    users: createUserDirectory(data.users),
    sessions: createSessionStore(config.session.ttlMinutes),
    cookie: {
      name: config.session.cookieName,
      maxAgeSeconds: Math.round(config.session.ttlMinutes * 60),
    },
  });

  const { port, host } = config.server;

  const server = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, () => {
    console.log('');
    console.log(`  ✓ listening on http://${host}:${port}`);
    console.log(`  ✓ personas: ${catalog.list().map(p => p.id).join(', ')}`);
    console.log(`  ✓ users: ${data.users.length}, query rules: ${data.policy.rules.length}`);
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`[personachat] Received ${signal}, shutting down...`);
    server.close();
    store.flush().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[personachat] Failed to flush chat history:', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Failed to start personachat:', error);
  process.exit(1);
});
