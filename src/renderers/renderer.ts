/**
 * Diagram renderer capability.
 *
 * Implementations may proxy to a remote service, spawn a binary or render
 * in-process; the tool invoker only depends on this interface.
 */
export type DiagramType = 'plantuml' | 'graphviz' | 'mermaid';

export type OutputFormat = 'svg' | 'png';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['svg', 'png'];

export interface DiagramRenderer {
  readonly type: DiagramType;
  /**
   * Render diagram source to image bytes.
   *
   * Rejects with {@link RendererUnavailableError} when the backing tool cannot
   * be reached, or {@link DiagramSyntaxError} when it rejects the source.
   */
  render(source: string, format: OutputFormat): Promise<Buffer>;
}

export type RendererSet = Record<DiagramType, DiagramRenderer>;

export class RendererUnavailableError extends Error {
  readonly renderer: DiagramType;

  constructor(renderer: DiagramType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RendererUnavailableError';
    this.renderer = renderer;
  }
}

/** The renderer's own diagnostic is kept as the message, unmodified. */
export class DiagramSyntaxError extends Error {
  readonly renderer: DiagramType;
  readonly line?: number;

  constructor(renderer: DiagramType, diagnostic: string, line?: number) {
    super(diagnostic);
    this.name = 'DiagramSyntaxError';
    this.renderer = renderer;
    this.line = line;
  }
}
