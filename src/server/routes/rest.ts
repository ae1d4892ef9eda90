import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../app-context.js';
import { toRestError } from '../../mcp/error-mapper.js';
import { describeArguments } from '../../tools/registry.js';
import { callContextOf } from '../plugins/envelope.js';

const callToolSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({})
});

export async function registerRestRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const { registry, invoker } = ctx.services;

  // The listing takes no input: any body, empty or not JSON, is read and discarded.
  await app.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'buffer' }, async () => ({}));

    scope.post('/list_tools', { config: { envelope: 'rest' } }, async () => ({
      ok: true,
      tools: registry.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        arguments: describeArguments(tool)
      }))
    }));
  });

  app.post('/call_tool', { config: { envelope: 'rest' } }, async (request) => {
    const parsed = callToolSchema.safeParse(request.body);
    if (!parsed.success) {
      return { ok: false, error: 'request body must be {"name": string, "arguments": object}' };
    }

    try {
      const result = await invoker.invoke(
        { name: parsed.data.name, arguments: parsed.data.arguments },
        callContextOf(request, 'rest')
      );
      return {
        ok: true,
        result: { content_type: result.contentType, data_base64: result.payload.toString('base64') }
      };
    } catch (error) {
      return toRestError(error);
    }
  });
}
