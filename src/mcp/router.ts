import { z } from 'zod';
import type { AppContext, CallContext } from '../app-context.js';
import { toInputSchema } from '../tools/registry.js';
import { ProtocolError, toProtocolError } from './error-mapper.js';
import { negotiateProtocolVersion, SERVER_INFO } from './protocol-constants.js';
import type {
  InitializeResult,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
  ToolDefinition,
  ToolResult
} from './protocol.js';
import type { McpSession } from './session.js';

const jsonRpcSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional()
});

const initializeParamsSchema = z.object({
  protocolVersion: z.string().optional(),
  clientInfo: z.object({ name: z.string(), version: z.string().optional() }).optional()
});

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional()
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readId(message: unknown): JsonRpcId {
  if (!isRecord(message)) return null;
  const id = message.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * JSON-RPC dispatcher shared by the stdio and HTTP framings of MCP.
 *
 * Returns `null` when nothing must be written back, which is the case for
 * every message without an `id` member (JSON-RPC notifications), whether it
 * succeeded or not.
 */
export class McpRouter {
  constructor(private readonly ctx: AppContext) {}

  async handle(message: unknown, session: McpSession, call: CallContext): Promise<JsonRpcResponse | null> {
    const isNotification = isRecord(message) && !('id' in message);
    session.touch();

    const parsed = jsonRpcSchema.safeParse(message);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
      if (isNotification) {
        call.log.warn({ detail }, 'dropping malformed notification');
        return null;
      }
      return this.error(readId(message), new ProtocolError('ParseError', 'Invalid Request', { detail }));
    }

    const request: JsonRpcRequest = parsed.data;
    const id = request.id ?? null;

    try {
      const result = await this.dispatch(request, id, session, call);
      return isNotification ? null : this.success(id, result);
    } catch (error) {
      const mapped = toProtocolError(error);
      if (!(error instanceof ProtocolError)) {
        call.log.error({ err: error, method: request.method }, 'request failed');
      }
      if (isNotification) {
        call.log.warn({ method: request.method, kind: mapped.kind }, 'notification failed');
        return null;
      }
      return this.error(id, mapped);
    }
  }

  private async dispatch(request: JsonRpcRequest, id: JsonRpcId, session: McpSession, call: CallContext): Promise<unknown> {
    if (session.state === 'closed') {
      throw new ProtocolError('InternalError', 'Session closed');
    }

    if (request.method.startsWith('notifications/')) {
      if (request.method === 'notifications/initialized' && session.state === 'uninitialized') {
        call.log.debug('client sent notifications/initialized before initialize');
      }
      return {};
    }

    switch (request.method) {
      case 'initialize':
        return this.initialize(request.params, session);

      case 'tools/list':
        return { tools: this.listTools() };

      case 'tools/call': {
        const params = this.parseToolCallParams(request.params);
        return this.callTool(params, id, call);
      }

      case 'ping':
        return {};

      default:
        throw new ProtocolError('MethodNotFound', `Method not found: ${request.method}`);
    }
  }

  private initialize(params: unknown, session: McpSession): InitializeResult {
    const parsed = initializeParamsSchema.safeParse(params ?? {});
    const requested: z.infer<typeof initializeParamsSchema> = parsed.success ? parsed.data : {};
    const protocolVersion = negotiateProtocolVersion(requested.protocolVersion);
    session.initialize(protocolVersion, requested.clientInfo ?? null);

    return {
      protocolVersion,
      capabilities: { tools: {}, prompts: {}, resources: {} },
      serverInfo: { ...SERVER_INFO }
    };
  }

  private listTools(): ToolDefinition[] {
    return this.ctx.services.registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool)
    }));
  }

  private parseToolCallParams(params: unknown): { name: string; arguments: unknown } {
    const parsed = toolCallParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ProtocolError('InvalidParams', 'params.name is required for tools/call', { field: 'name' });
    }
    return { name: parsed.data.name, arguments: parsed.data.arguments ?? {} };
  }

  private async callTool(params: { name: string; arguments: unknown }, id: JsonRpcId, call: CallContext): Promise<ToolResult> {
    const result = await this.ctx.services.invoker.invoke({ name: params.name, arguments: params.arguments, requestId: id }, call);
    return {
      content: [{ type: 'image', mimeType: result.contentType, data: result.payload.toString('base64') }]
    };
  }

  private success(id: JsonRpcId, result: unknown): JsonRpcResponse {
    return { jsonrpc: '2.0', id, result };
  }

  private error(id: JsonRpcId, error: ProtocolError): JsonRpcResponse {
    return { jsonrpc: '2.0', id, error: error.toJsonRpcError() };
  }
}
