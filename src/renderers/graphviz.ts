import {
  DiagramSyntaxError,
  RendererUnavailableError,
  type DiagramRenderer,
  type OutputFormat
} from './renderer.js';
import { CommandNotFoundError, runProcess, type ProcessResult, type ProcessRunner } from './process.js';

export interface GraphvizRendererOptions {
  /** Path to the `dot` executable. */
  dotPath: string;
  timeoutMs: number;
  run?: ProcessRunner;
}

/**
 * Graphviz renderer piping DOT source through `dot -T<format>`.
 */
export class GraphvizRenderer implements DiagramRenderer {
  readonly type = 'graphviz' as const;

  private readonly dotPath: string;
  private readonly timeoutMs: number;
  private readonly run: ProcessRunner;

  constructor(options: GraphvizRendererOptions) {
    this.dotPath = options.dotPath;
    this.timeoutMs = options.timeoutMs;
    this.run = options.run ?? runProcess;
  }

  async render(source: string, format: OutputFormat): Promise<Buffer> {
    const result = await this.execute(source, format);
    if (result.timedOut) {
      throw new RendererUnavailableError(this.type, `dot timed out after ${this.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      const diagnostic = result.stderr.trim() ? result.stderr : `dot exited with code ${result.exitCode}`;
      throw new DiagramSyntaxError(this.type, diagnostic);
    }
    return result.stdout;
  }

  private async execute(source: string, format: OutputFormat): Promise<ProcessResult> {
    try {
      return await this.run(this.dotPath, [`-T${format}`], { input: source, timeoutMs: this.timeoutMs });
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new RendererUnavailableError(
          this.type,
          `graphviz not available: ${this.dotPath} not found (install Graphviz)`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
