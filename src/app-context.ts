import type { FastifyBaseLogger } from 'fastify';
import type { AppConfig } from './config/schema.js';
import type { ToolInvoker } from './tools/invoker.js';
import type { ToolRegistry } from './tools/registry.js';

export interface Services {
  registry: ToolRegistry;
  invoker: ToolInvoker;
}

export interface AppContext {
  config: AppConfig;
  logger: FastifyBaseLogger;
  services: Services;
}

export type Transport = 'stdio' | 'mcp-http' | 'rest';

/** Satisfied by both a pino `Logger` and Fastify's `request.log`. */
export type ContextLogger = FastifyBaseLogger;

/**
 * Per-request state threaded explicitly from the transport into the router
 * and invoker.
 */
export interface CallContext {
  transport: Transport;
  traceId: string;
  log: ContextLogger;
}
