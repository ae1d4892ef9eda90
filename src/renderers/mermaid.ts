import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DiagramSyntaxError,
  RendererUnavailableError,
  type DiagramRenderer,
  type OutputFormat
} from './renderer.js';
import { CommandNotFoundError, runProcess, type ProcessResult, type ProcessRunner } from './process.js';

const MERMAID_CLI_PACKAGE = '@mermaid-js/mermaid-cli';

export interface MermaidRendererOptions {
  /** Path to the mmdc executable. */
  cliPath: string;
  theme: string;
  /** Retry through `npx` when `cliPath` cannot be found. */
  npxFallback: boolean;
  timeoutMs: number;
  run?: ProcessRunner;
}

/**
 * Mermaid renderer using mermaid-cli (mmdc).
 *
 * mmdc only reads and writes files, so every render gets its own temporary
 * directory which is removed afterwards.
 */
export class MermaidRenderer implements DiagramRenderer {
  readonly type = 'mermaid' as const;

  private readonly options: MermaidRendererOptions;
  private readonly run: ProcessRunner;

  constructor(options: MermaidRendererOptions) {
    this.options = options;
    this.run = options.run ?? runProcess;
  }

  async render(source: string, format: OutputFormat): Promise<Buffer> {
    const workDir = await mkdtemp(join(tmpdir(), 'mermaid-'));
    const inputFile = join(workDir, 'diagram.mmd');
    const outputFile = join(workDir, `out.${format}`);

    try {
      await writeFile(inputFile, source, 'utf-8');
      const cliArgs = ['-i', inputFile, '-o', outputFile, '-t', this.options.theme, '--quiet'];
      const result = await this.execute(cliArgs, workDir);

      if (result.timedOut) {
        throw new RendererUnavailableError(this.type, `mmdc timed out after ${this.options.timeoutMs}ms`);
      }
      if (result.exitCode !== 0) {
        const diagnostic = result.stderr.trim() ? result.stderr : `mmdc exited with code ${result.exitCode}`;
        throw new DiagramSyntaxError(this.type, diagnostic);
      }

      return await this.readOutput(outputFile, result);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async readOutput(outputFile: string, result: ProcessResult): Promise<Buffer> {
    try {
      return await readFile(outputFile);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new DiagramSyntaxError(this.type, result.stderr.trim() ? result.stderr : 'mmdc did not write an output file');
      }
      throw error;
    }
  }

  private async execute(cliArgs: string[], cwd: string): Promise<ProcessResult> {
    const { cliPath, npxFallback, timeoutMs } = this.options;
    try {
      return await this.run(cliPath, cliArgs, { timeoutMs, cwd });
    } catch (error) {
      if (!(error instanceof CommandNotFoundError)) throw error;
      if (!npxFallback) {
        throw new RendererUnavailableError(
          this.type,
          `mermaid-cli (${cliPath}) not found; install with \`npm i -g ${MERMAID_CLI_PACKAGE}\``,
          { cause: error }
        );
      }
    }

    try {
      return await this.run('npx', ['--yes', MERMAID_CLI_PACKAGE, ...cliArgs], { timeoutMs, cwd });
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new RendererUnavailableError(
          this.type,
          `mermaid-cli (${cliPath}) not found and npx is not available`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
