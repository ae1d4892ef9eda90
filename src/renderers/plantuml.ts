import plantumlEncoder from 'plantuml-encoder';
import {
  DiagramSyntaxError,
  RendererUnavailableError,
  type DiagramRenderer,
  type OutputFormat
} from './renderer.js';

const DIAGRAM_ERROR_HEADER = 'x-plantuml-diagram-error';
const DIAGRAM_ERROR_LINE_HEADER = 'x-plantuml-diagram-error-line';

export interface PlantUmlRendererOptions {
  /** Base URL of a PlantUML server, without trailing slash. */
  serverUrl: string;
  timeoutMs: number;
}

export function buildPlantUmlUrl(serverUrl: string, source: string, format: OutputFormat): string {
  return `${serverUrl}/${format}/${plantumlEncoder.encode(source)}`;
}

/**
 * PlantUML renderer backed by a PlantUML server (`/svg/<key>`, `/png/<key>`).
 */
export class PlantUmlRenderer implements DiagramRenderer {
  readonly type = 'plantuml' as const;

  private readonly serverUrl: string;
  private readonly timeoutMs: number;

  constructor(options: PlantUmlRendererOptions) {
    this.serverUrl = options.serverUrl;
    this.timeoutMs = options.timeoutMs;
  }

  async render(source: string, format: OutputFormat): Promise<Buffer> {
    const url = buildPlantUmlUrl(this.serverUrl, source, format);

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      const reason = error instanceof Error && error.name === 'TimeoutError'
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error);
      throw new RendererUnavailableError(this.type, `PlantUML server ${this.serverUrl} unreachable: ${reason}`, {
        cause: error
      });
    }

    // The server still answers syntax errors with an image of the error, flagged by this header.
    const diagnostic = response.headers.get(DIAGRAM_ERROR_HEADER);
    if (diagnostic) {
      const line = Number.parseInt(response.headers.get(DIAGRAM_ERROR_LINE_HEADER) ?? '', 10);
      throw new DiagramSyntaxError(this.type, diagnostic, Number.isNaN(line) ? undefined : line);
    }

    if (!response.ok) {
      throw new RendererUnavailableError(this.type, `PlantUML server responded with HTTP ${response.status}`);
    }

    return Buffer.from(await response.arrayBuffer());
  }
}
