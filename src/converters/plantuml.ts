import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Logger } from '../logger.js';
import { RenderError } from '../errors.js';
import type { OutputFormat } from '../types/job.js';
import type { RenderEngine, RenderRequest, RenderedImage } from './base.js';
import { MIME_TYPES } from './base.js';
import { readOutputFile, runCommand } from './process.js';

export interface PlantUmlOptions {
  command: string;
  prefixArgs?: string[];
  jar: string;
}

export function plantUmlArgs(jar: string, input: string, outputDir: string, format: OutputFormat): string[] {
  return ['-jar', jar, `-t${format}`, '-Sdpi=600', '-o', outputDir, input];
}

/** PlantUML names its output after the input file, with the format as extension. */
export class PlantUmlEngine implements RenderEngine {
  readonly kind = 'plantuml' as const;

  constructor(
    private readonly options: PlantUmlOptions,
    private readonly logger: Logger,
  ) {}

  async render(request: RenderRequest): Promise<RenderedImage> {
    const dir = await mkdtemp(path.join(tmpdir(), 'plantuml-'));
    try {
      const input = path.join(dir, 'diagram.pu');
      const output = path.join(dir, `diagram.${request.outputFormat}`);
      await writeFile(input, request.source, 'utf8');

      const args = [...(this.options.prefixArgs ?? []), ...plantUmlArgs(this.options.jar, input, dir, request.outputFormat)];
      this.logger.debug({ command: this.options.command, args }, 'running plantuml');
      const result = await runCommand(this.options.command, args, { signal: request.signal });

      if (result.code !== 0) {
        throw new RenderError(`plantuml exited with code ${String(result.code)}`, result.stderr);
      }
      const data = await readOutputFile(output, 'plantuml', result.stderr);
      return { data, mimeType: MIME_TYPES[request.outputFormat] };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
