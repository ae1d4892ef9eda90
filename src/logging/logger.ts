import pino, { type Logger } from 'pino';
import type { AppConfig } from '../config/schema.js';

/**
 * Process-wide logger. Always writes to stderr: in `--mcp` mode stdout carries
 * the JSON-RPC stream and must contain nothing else.
 */
export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL' | 'NODE_ENV'>): Logger {
  return pino(
    {
      level: config.LOG_LEVEL,
      base: { service: 'mcp-diagram-server', env: config.NODE_ENV },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination(2)
  );
}
