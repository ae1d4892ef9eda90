import fp from 'fastify-plugin';
import type { FastifyRequest } from 'fastify';
import type { CallContext, Transport } from '../../app-context.js';
import { ProtocolError, toProtocolError, toRestError } from '../../mcp/error-mapper.js';

/** Response shape a route reports its failures in. */
export type Envelope = 'json-rpc' | 'rest';

declare module 'fastify' {
  interface FastifyContextConfig {
    envelope?: Envelope;
  }
}

const BODY_ERROR_CODES = new Set([
  'FST_ERR_CTP_EMPTY_JSON_BODY',
  'FST_ERR_CTP_INVALID_JSON_BODY',
  'FST_ERR_CTP_INVALID_MEDIA_TYPE',
  'FST_ERR_CTP_INVALID_CONTENT_LENGTH'
]);

function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

function statusCodeOf(error: unknown): number {
  if (error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

export function isBodyParseError(error: unknown): boolean {
  if (error instanceof SyntaxError) return true;
  const code = errorCode(error);
  return code !== undefined && BODY_ERROR_CODES.has(code);
}

export function callContextOf(request: FastifyRequest, transport: Transport): CallContext {
  return { transport, traceId: request.id, log: request.log };
}

/**
 * Installs the root error handler. Routes tagged with an `envelope` keep their
 * response contract on failure: JSON-RPC routes answer with an error object
 * and REST routes with `{ ok: false }`, both on HTTP 200.
 */
export const envelopePlugin = fp(async (fastify) => {
  fastify.setErrorHandler(async (error, request, reply) => {
    const envelope = request.routeOptions.config.envelope;
    const malformedBody = isBodyParseError(error);
    const detail = error instanceof Error ? error.message : String(error);

    if (!malformedBody) {
      request.log.error({ err: error }, 'unhandled route error');
    }

    if (envelope === 'json-rpc') {
      const mapped = malformedBody ? new ProtocolError('ParseError', 'Parse error', { detail }) : toProtocolError(error);
      return reply.code(200).send({ jsonrpc: '2.0', id: null, error: mapped.toJsonRpcError() });
    }

    if (envelope === 'rest') {
      return reply.code(200).send(malformedBody ? { ok: false, error: `Parse error: ${detail}` } : toRestError(error));
    }

    const statusCode = statusCodeOf(error);
    return reply.code(statusCode).send({ error: statusCode >= 500 ? 'Internal Server Error' : detail });
  });
});
