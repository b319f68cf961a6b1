/**
 * Hono app: session middleware, API, pages, error mapping.
 */

import { Hono } from 'hono';
import { AppError, ValidationError } from '../core/errors.js';
import { createAPI } from './api.js';
import { createPages } from './pages.js';
import { sessionMiddleware, type AppDeps, type AppEnv } from './context.js';

export function createApp(deps: AppDeps) {
  const app = new Hono<AppEnv>();

  app.use('*', sessionMiddleware(deps));

  app.route('/', createAPI(deps));
  app.route('/', createPages(deps));

  app.notFound((c) => c.json({ error: 'Route not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, details: err.details }, err.status);
    }
    if (err instanceof AppError) {
      console.warn(`[personachat] ${err.name}: ${err.message}`);
      return c.json({ error: err.message }, err.status);
    }

    console.error('[personachat] Unhandled error:', err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
