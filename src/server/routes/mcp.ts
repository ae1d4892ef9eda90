import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../../app-context.js';
import { McpRouter } from '../../mcp/router.js';
import { McpSession } from '../../mcp/session.js';
import { callContextOf } from '../plugins/envelope.js';

export async function registerMcpRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const router = new McpRouter(ctx);

  // Stateless: each POST gets a throwaway session.
  app.post('/sse', { config: { envelope: 'json-rpc' } }, async (request, reply) => {
    const response = await router.handle(request.body, new McpSession(), callContextOf(request, 'mcp-http'));
    if (!response) {
      return reply.code(202).send();
    }
    return reply.code(200).send(response);
  });
}
