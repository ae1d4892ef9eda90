#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { createAppContext } from './bootstrap.js';
import { loadConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { McpRouter } from './mcp/router.js';
import { SERVER_INFO } from './mcp/protocol-constants.js';
import { runStdioServer } from './mcp/stdio-server.js';
import { buildServer } from './server/fastify.js';

interface CliOptions {
  mcp?: boolean;
  http?: boolean;
  port?: number;
  host?: string;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError('port must be an integer between 1 and 65535');
  }
  return port;
}

async function main() {
  const program = new Command()
    .name(SERVER_INFO.name)
    .description('Render PlantUML, Graphviz and Mermaid diagrams over MCP (stdio or HTTP) and REST')
    .version(SERVER_INFO.version)
    .option('--mcp', 'serve MCP JSON-RPC over stdin/stdout')
    .option('--http', 'serve the REST API and MCP over HTTP (default)')
    .option('-p, --port <port>', 'HTTP port (overrides PORT)', parsePort)
    .option('--host <host>', 'HTTP bind address (overrides HOST)')
    .parse();

  const options = program.opts<CliOptions>();
  if (options.mcp && options.http) {
    program.error('--mcp and --http are mutually exclusive');
  }

  const config = loadConfig();
  const logger = createLogger(config);
  const ctx = createAppContext(config, logger);

  if (options.mcp) {
    await runStdioServer({
      router: new McpRouter(ctx),
      input: process.stdin,
      output: process.stdout,
      log: logger
    });
    return;
  }

  const app = await buildServer(ctx);
  const address = await app.listen({ host: options.host ?? config.HOST, port: options.port ?? config.PORT });
  logger.info({ address }, 'diagram server listening (REST: /list_tools, /call_tool; MCP: POST /sse)');

  const shutdown = async () => {
    logger.info('shutting down');
    await app.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ err: error }, 'shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
