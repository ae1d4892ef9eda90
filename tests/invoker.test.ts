import { describe, expect, it } from 'vitest';
import { ProtocolError } from '../src/mcp/error-mapper.js';
import { DiagramSyntaxError, RendererUnavailableError } from '../src/renderers/renderer.js';
import { ToolInvoker, contentTypeFor } from '../src/tools/invoker.js';
import { ToolRegistry } from '../src/tools/registry.js';
import { fakeRenderers, testCall } from './helpers.js';

function setup(behaviors: Parameters<typeof fakeRenderers>[0] = {}) {
  const renderers = fakeRenderers(behaviors);
  const invoker = new ToolInvoker(new ToolRegistry(), renderers);
  return { renderers, invoker };
}

describe('ToolInvoker', () => {
  it('defaults to svg', async () => {
    const { invoker, renderers } = setup();
    const result = await invoker.invoke({ name: 'graphviz.render', arguments: { dot: 'digraph{A->B}' } }, testCall());

    expect(result.contentType).toBe('image/svg+xml');
    expect(result.payload.toString('utf-8')).toBe('graphviz:svg:digraph{A->B}');
    expect(renderers.graphviz.calls).toEqual([{ source: 'digraph{A->B}', format: 'svg' }]);
  });

  it('derives the content type from the requested format', async () => {
    const { invoker } = setup();
    const result = await invoker.invoke(
      { name: 'graphviz.render', arguments: { dot: 'digraph{A->B}', format: 'png' } },
      testCall()
    );
    expect(result.contentType).toBe('image/png');
  });

  it('accepts the format in any case', async () => {
    const { invoker, renderers } = setup();
    await invoker.invoke({ name: 'mermaid.render', arguments: { text: 'graph TD; A-->B', format: 'PNG' } }, testCall());
    expect(renderers.mermaid.calls).toEqual([{ source: 'graph TD; A-->B', format: 'png' }]);
  });

  it('dispatches only to the renderer bound to the tool', async () => {
    const { invoker, renderers } = setup();
    await invoker.invoke({ name: 'plantuml.render', arguments: { text: '@startuml\nA->B\n@enduml' } }, testCall());

    expect(renderers.plantuml.calls).toHaveLength(1);
    expect(renderers.graphviz.calls).toHaveLength(0);
    expect(renderers.mermaid.calls).toHaveLength(0);
  });

  it('rejects a missing required argument', async () => {
    const { invoker, renderers } = setup();
    const pending = invoker.invoke({ name: 'graphviz.render', arguments: { format: 'svg' } }, testCall());

    await expect(pending).rejects.toBeInstanceOf(ProtocolError);
    await expect(pending).rejects.toMatchObject({ kind: 'InvalidParams', message: 'dot is required for graphviz.render' });
    expect(renderers.graphviz.calls).toHaveLength(0);
  });

  it('treats an empty source as missing', async () => {
    const { invoker } = setup();
    await expect(invoker.invoke({ name: 'mermaid.render', arguments: { text: '' } }, testCall())).rejects.toMatchObject({
      kind: 'InvalidParams',
      message: 'text is required for mermaid.render'
    });
  });

  it('rejects non-string arguments', async () => {
    const { invoker } = setup();
    await expect(invoker.invoke({ name: 'graphviz.render', arguments: { dot: 42 } }, testCall())).rejects.toMatchObject({
      kind: 'InvalidParams',
      message: 'dot must be a string'
    });
  });

  it('rejects arguments that are not an object', async () => {
    const { invoker } = setup();
    await expect(invoker.invoke({ name: 'graphviz.render', arguments: ['digraph{}'] }, testCall())).rejects.toMatchObject({
      kind: 'InvalidParams',
      message: 'arguments must be an object'
    });
  });

  it('rejects unsupported formats', async () => {
    const { invoker } = setup();
    await expect(
      invoker.invoke({ name: 'plantuml.render', arguments: { text: '@startuml\n@enduml', format: 'gif' } }, testCall())
    ).rejects.toMatchObject({ kind: 'InvalidParams', message: 'unsupported format: gif (expected svg or png)' });
  });

  it('rejects unknown tools', async () => {
    const { invoker } = setup();
    await expect(invoker.invoke({ name: 'ditaa.render', arguments: {} }, testCall())).rejects.toMatchObject({
      kind: 'MethodNotFound',
      message: 'Unknown tool: ditaa.render'
    });
  });

  it('reports syntax errors with the renderer text, after a single attempt', async () => {
    const { invoker, renderers } = setup({
      mermaid: () => {
        throw new DiagramSyntaxError('mermaid', 'Parse error on line 2:\ngraph TD; A-->\n-------------^');
      }
    });

    await expect(invoker.invoke({ name: 'mermaid.render', arguments: { text: 'graph TD; A-->' } }, testCall())).rejects.toMatchObject({
      kind: 'RenderFailure',
      message: 'Parse error on line 2:\ngraph TD; A-->\n-------------^'
    });
    expect(renderers.mermaid.calls).toHaveLength(1);
  });

  it('reports missing tooling as an internal error', async () => {
    const { invoker } = setup({
      graphviz: () => {
        throw new RendererUnavailableError('graphviz', 'graphviz not available: dot not found (install Graphviz)');
      }
    });

    await expect(invoker.invoke({ name: 'graphviz.render', arguments: { dot: 'digraph{}' } }, testCall())).rejects.toMatchObject({
      kind: 'InternalError',
      message: 'renderer unavailable: graphviz not available: dot not found (install Graphviz)'
    });
  });

  it('never returns an empty image', async () => {
    const { invoker } = setup({ plantuml: () => Buffer.alloc(0) });

    await expect(invoker.invoke({ name: 'plantuml.render', arguments: { text: '@startuml\n@enduml' } }, testCall())).rejects.toMatchObject({
      kind: 'RenderFailure',
      message: 'plantuml renderer produced no output'
    });
  });

  it('maps unexpected renderer exceptions', async () => {
    const { invoker } = setup({
      graphviz: () => {
        throw new Error('boom');
      }
    });

    await expect(invoker.invoke({ name: 'graphviz.render', arguments: { dot: 'digraph{}' } }, testCall())).rejects.toMatchObject({
      kind: 'InternalError',
      message: 'Internal error',
      data: { detail: 'boom' }
    });
  });
});

describe('contentTypeFor', () => {
  it('maps formats to MIME types', () => {
    expect(contentTypeFor('svg')).toBe('image/svg+xml');
    expect(contentTypeFor('png')).toBe('image/png');
  });
});
