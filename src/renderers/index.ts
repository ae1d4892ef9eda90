import type { AppConfig } from '../config/schema.js';
import { GraphvizRenderer } from './graphviz.js';
import { MermaidRenderer } from './mermaid.js';
import { PlantUmlRenderer } from './plantuml.js';
import type { RendererSet } from './renderer.js';

export function createRenderers(config: AppConfig): RendererSet {
  return {
    plantuml: new PlantUmlRenderer({
      serverUrl: config.PLANTUML_SERVER,
      timeoutMs: config.RENDER_TIMEOUT_MS
    }),
    graphviz: new GraphvizRenderer({
      dotPath: config.GRAPHVIZ_DOT,
      timeoutMs: config.RENDER_TIMEOUT_MS
    }),
    mermaid: new MermaidRenderer({
      cliPath: config.MERMAID_CLI,
      theme: config.MERMAID_THEME,
      npxFallback: config.MERMAID_NPX_FALLBACK,
      timeoutMs: config.RENDER_TIMEOUT_MS
    })
  };
}
