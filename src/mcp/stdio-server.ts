import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { CallContext, ContextLogger } from '../app-context.js';
import { ProtocolError } from './error-mapper.js';
import type { JsonRpcResponse } from './protocol.js';
import type { McpRouter } from './router.js';
import { McpSession } from './session.js';

export interface StdioServerOptions {
  router: McpRouter;
  input: Readable;
  output: Writable;
  log: ContextLogger;
}

function parseError(detail: string): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id: null,
    error: new ProtocolError('ParseError', 'Parse error', { detail }).toJsonRpcError()
  };
}

/**
 * Serve MCP over newline-delimited JSON-RPC. Lines are handled one at a
 * time: the reply to a line is written before the next line is read.
 * Resolves with the (closed) session once `input` ends.
 */
export async function runStdioServer({ router, input, output, log }: StdioServerOptions): Promise<McpSession> {
  const session = new McpSession();
  const lines = createInterface({ input, crlfDelay: Infinity });
  const sessionLog = log.child({ transport: 'stdio', sessionId: session.id });
  let lineNumber = 0;

  sessionLog.info('stdio server ready');

  try {
    for await (const line of lines) {
      lineNumber += 1;
      const trimmed = line.trim();
      if (!trimmed) continue;

      const call: CallContext = {
        transport: 'stdio',
        traceId: `${session.id}:${lineNumber}`,
        log: sessionLog.child({ line: lineNumber })
      };

      let message: unknown;
      try {
        message = JSON.parse(trimmed);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        call.log.warn({ detail }, 'unparseable input line');
        await write(output, parseError(detail));
        continue;
      }

      const response = await router.handle(message, session, call);
      if (response) {
        await write(output, response);
      }
    }
  } finally {
    session.close();
    lines.close();
    sessionLog.info('stdio input closed');
  }

  return session;
}

function write(output: Writable, response: JsonRpcResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${JSON.stringify(response)}\n`, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}
