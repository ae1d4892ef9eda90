import type { CallContext } from '../app-context.js';
import { ProtocolError, toProtocolError } from '../mcp/error-mapper.js';
import type { JsonRpcId } from '../mcp/protocol.js';
import { OUTPUT_FORMATS, type OutputFormat, type RendererSet } from '../renderers/renderer.js';
import type { ToolDescriptor, ToolRegistry } from './registry.js';

export interface ToolCall {
  name: string;
  arguments: unknown;
  requestId?: JsonRpcId;
}

export type ContentType = 'image/svg+xml' | 'image/png';

export interface RenderResult {
  contentType: ContentType;
  payload: Buffer;
}

const CONTENT_TYPES: Record<OutputFormat, ContentType> = {
  svg: 'image/svg+xml',
  png: 'image/png'
};

export function contentTypeFor(format: OutputFormat): ContentType {
  return CONTENT_TYPES[format];
}

interface ValidatedCall {
  source: string;
  format: OutputFormat;
}

export class ToolInvoker {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly renderers: RendererSet
  ) {}

  async invoke(call: ToolCall, ctx: CallContext): Promise<RenderResult> {
    const tool = this.registry.get(call.name);
    if (!tool) {
      throw new ProtocolError('MethodNotFound', `Unknown tool: ${call.name}`);
    }

    const { source, format } = this.validateArgs(tool, call.arguments);
    const renderer = this.renderers[tool.diagramType];
    const log = ctx.log.child({ tool: tool.name, format, requestId: call.requestId });
    const started = Date.now();

    let payload: Buffer;
    try {
      payload = await renderer.render(source, format);
    } catch (error) {
      const mapped = toProtocolError(error);
      log.warn({ kind: mapped.kind, err: error, durationMs: Date.now() - started }, 'render failed');
      throw mapped;
    }

    if (payload.length === 0) {
      log.warn({ durationMs: Date.now() - started }, 'renderer returned no bytes');
      throw new ProtocolError('RenderFailure', `${tool.diagramType} renderer produced no output`, {
        renderer: tool.diagramType
      });
    }

    log.info({ bytes: payload.length, durationMs: Date.now() - started }, 'diagram rendered');
    return { contentType: contentTypeFor(format), payload };
  }

  private validateArgs(tool: ToolDescriptor, args: unknown): ValidatedCall {
    if (args === null || Array.isArray(args) || typeof args !== 'object') {
      throw new ProtocolError('InvalidParams', 'arguments must be an object');
    }
    const values = new Map(Object.entries(args));
    const resolved: Record<string, string> = {};

    for (const [key, spec] of Object.entries(tool.arguments)) {
      const value = values.get(key);
      if (value === undefined || value === null || value === '') {
        if (spec.required) {
          throw new ProtocolError('InvalidParams', `${key} is required for ${tool.name}`, { field: key });
        }
        if (spec.default !== undefined) resolved[key] = spec.default;
        continue;
      }
      if (typeof value !== 'string') {
        throw new ProtocolError('InvalidParams', `${key} must be a string`, { field: key });
      }
      resolved[key] = value;
    }

    const requestedFormat = (resolved.format ?? '').toLowerCase();
    const format = OUTPUT_FORMATS.find((candidate) => candidate === requestedFormat);
    if (!format) {
      throw new ProtocolError('InvalidParams', `unsupported format: ${resolved.format} (expected svg or png)`, {
        field: 'format'
      });
    }

    return { source: resolved[tool.sourceArgument] ?? '', format };
  }
}
