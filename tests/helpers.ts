import { PassThrough } from 'node:stream';
import pino from 'pino';
import type { AppContext, CallContext, Transport } from '../src/app-context.js';
import { createAppContext } from '../src/bootstrap.js';
import { configSchema } from '../src/config/schema.js';
import type { DiagramRenderer, DiagramType, OutputFormat, RendererSet } from '../src/renderers/renderer.js';

export const silentLogger = pino({ level: 'silent' });

export const testConfig = configSchema.parse({ NODE_ENV: 'test', LOG_LEVEL: 'silent' });

type RenderBehavior = (source: string, format: OutputFormat) => Promise<Buffer> | Buffer;

/** Echoes `<type>:<format>:<source>` unless given another behavior. */
export class FakeRenderer implements DiagramRenderer {
  readonly calls: Array<{ source: string; format: OutputFormat }> = [];

  constructor(
    readonly type: DiagramType,
    private readonly behavior: RenderBehavior = (source, format) => Buffer.from(`${type}:${format}:${source}`)
  ) {}

  async render(source: string, format: OutputFormat): Promise<Buffer> {
    this.calls.push({ source, format });
    return this.behavior(source, format);
  }
}

export interface FakeRendererSet extends RendererSet {
  plantuml: FakeRenderer;
  graphviz: FakeRenderer;
  mermaid: FakeRenderer;
}

export function fakeRenderers(behaviors: Partial<Record<DiagramType, RenderBehavior>> = {}): FakeRendererSet {
  return {
    plantuml: new FakeRenderer('plantuml', behaviors.plantuml),
    graphviz: new FakeRenderer('graphviz', behaviors.graphviz),
    mermaid: new FakeRenderer('mermaid', behaviors.mermaid)
  };
}

export function createTestContext(renderers: RendererSet = fakeRenderers()): AppContext {
  return createAppContext(testConfig, silentLogger, renderers);
}

export function testCall(transport: Transport = 'rest'): CallContext {
  return { transport, traceId: 'test-trace', log: silentLogger };
}

export function collect(stream: PassThrough): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer | string) => chunks.push(Buffer.from(chunk)));
    stream.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    stream.on('error', reject);
  });
}
