import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Logger } from '../logger.js';
import { RenderError } from '../errors.js';
import type { OutputFormat } from '../types/job.js';
import type { RenderEngine, RenderRequest, RenderedImage } from './base.js';
import { MIME_TYPES } from './base.js';
import { readOutputFile, runCommand } from './process.js';

export interface DrawioOptions {
  command: string;
  prefixArgs?: string[];
  /** X display the desktop app renders on. */
  display?: string;
}

export function drawioArgs(input: string, output: string, format: OutputFormat): string[] {
  const args = ['--no-sandbox', '--export', input, '--format', format, '--output', output, '--border', '20'];
  if (format === 'png') {
    args.push('--scale', '3');
  } else {
    args.push('--embed-svg-images');
  }
  return args;
}

export class DrawioEngine implements RenderEngine {
  readonly kind = 'drawio' as const;

  constructor(
    private readonly options: DrawioOptions,
    private readonly logger: Logger,
  ) {}

  async render(request: RenderRequest): Promise<RenderedImage> {
    const dir = await mkdtemp(path.join(tmpdir(), 'drawio-'));
    try {
      const input = path.join(dir, 'input.drawio');
      const output = path.join(dir, `output.${request.outputFormat}`);
      await writeFile(input, request.source, 'utf8');

      const args = [...(this.options.prefixArgs ?? []), ...drawioArgs(input, output, request.outputFormat)];
      this.logger.debug({ command: this.options.command, args }, 'running drawio export');
      const result = await runCommand(this.options.command, args, {
        env: { ...process.env, DISPLAY: this.options.display ?? process.env['DISPLAY'] ?? ':99' },
        signal: request.signal,
      });

      if (result.code !== 0) {
        throw new RenderError(`drawio exited with code ${String(result.code)}`, result.stderr);
      }
      const data = await readOutputFile(output, 'drawio', result.stderr);
      return { data, mimeType: MIME_TYPES[request.outputFormat] };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
