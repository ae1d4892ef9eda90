import type { FastifyBaseLogger } from 'fastify';
import type { AppContext } from './app-context.js';
import type { AppConfig } from './config/schema.js';
import { createRenderers } from './renderers/index.js';
import type { RendererSet } from './renderers/renderer.js';
import { ToolInvoker } from './tools/invoker.js';
import { ToolRegistry } from './tools/registry.js';

export function createAppContext(
  config: AppConfig,
  logger: FastifyBaseLogger,
  renderers: RendererSet = createRenderers(config)
): AppContext {
  const registry = new ToolRegistry();
  return {
    config,
    logger,
    services: {
      registry,
      invoker: new ToolInvoker(registry, renderers)
    }
  };
}
