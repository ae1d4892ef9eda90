import Fastify from 'fastify';
import fastifyStatic from '@fastify/static';
import { fileURLToPath } from 'node:url';
import { envelopePlugin } from './plugins/envelope.js';
import { registerMcpRoutes } from './routes/mcp.js';
import { registerRestRoutes } from './routes/rest.js';
import type { AppContext } from '../app-context.js';

const PUBLIC_DIR = fileURLToPath(new URL('../../public', import.meta.url));

export async function buildServer(ctx: AppContext) {
  const app = Fastify({
    loggerInstance: ctx.logger
  });

  await app.register(envelopePlugin);

  await app.register(fastifyStatic, {
    root: PUBLIC_DIR,
    prefix: '/'
  });

  app.get('/health', async () => ({ status: 'ok', uptime: process.uptime() }));

  await registerRestRoutes(app, ctx);
  await registerMcpRoutes(app, ctx);

  return app;
}
