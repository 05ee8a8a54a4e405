import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { registerApiRoutes } from './api.js';
import type { RelayCommands } from '../commands.js';

export function createApp(commands: RelayCommands): Hono {
  const app = new Hono();

  app.use('*', cors({
    origin: (origin) => /^http:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin) ? origin : null,
  }));

  app.get('/api/health', (c) => c.json({ ok: true }));

  registerApiRoutes(app, commands);

  return app;
}
