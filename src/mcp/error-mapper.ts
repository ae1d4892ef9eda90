import { DiagramSyntaxError, RendererUnavailableError } from '../renderers/renderer.js';
import type { JsonRpcError } from './protocol.js';

// Standard JSON-RPC 2.0 error codes
export enum ErrorCode {
  ParseError = -32700,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603
}

export type ProtocolErrorKind = 'ParseError' | 'MethodNotFound' | 'InvalidParams' | 'InternalError' | 'RenderFailure';

const CODE_BY_KIND: Record<ProtocolErrorKind, ErrorCode> = {
  ParseError: ErrorCode.ParseError,
  MethodNotFound: ErrorCode.MethodNotFound,
  InvalidParams: ErrorCode.InvalidParams,
  InternalError: ErrorCode.InternalError,
  // JSON-RPC has no dedicated code for a rejected diagram; data.kind tells it apart.
  RenderFailure: ErrorCode.InternalError
};

/**
 * Transport-independent failure raised by the invoker and the MCP router.
 * Normalizers turn it into a JSON-RPC error object or a REST `ok:false` body.
 */
export class ProtocolError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly data?: Record<string, unknown>;

  constructor(kind: ProtocolErrorKind, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.data = data;
  }

  get code(): ErrorCode {
    return CODE_BY_KIND[this.kind];
  }

  toJsonRpcError(): JsonRpcError {
    return {
      code: this.code,
      message: this.message,
      data: { kind: this.kind, ...this.data }
    };
  }
}

export function toProtocolError(error: unknown): ProtocolError {
  if (error instanceof ProtocolError) {
    return error;
  }

  if (error instanceof DiagramSyntaxError) {
    return new ProtocolError('RenderFailure', error.message, {
      renderer: error.renderer,
      ...(error.line !== undefined ? { line: error.line } : {})
    });
  }

  if (error instanceof RendererUnavailableError) {
    return new ProtocolError('InternalError', `renderer unavailable: ${error.message}`, { renderer: error.renderer });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProtocolError('InternalError', 'Internal error', { detail: message });
}

export function toRestError(error: unknown): { ok: false; error: string } {
  const mapped = toProtocolError(error);
  const detail = typeof mapped.data?.detail === 'string' ? `: ${mapped.data.detail}` : '';
  return { ok: false, error: `${mapped.message}${detail}` };
}
