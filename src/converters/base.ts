import type { DiagramKind, OutputFormat } from '../types/job.js';

export interface RenderRequest {
  source: string;
  outputFormat: OutputFormat;
  signal: AbortSignal;
}

export interface RenderedImage {
  data: Buffer;
  mimeType: string;
}

/** Turns diagram source into image bytes. Failures reject with a RenderError. */
export interface RenderEngine {
  readonly kind: DiagramKind;
  render(request: RenderRequest): Promise<RenderedImage>;
}

export type RenderEngineRegistry = Map<DiagramKind, RenderEngine>;

export const MIME_TYPES: Record<OutputFormat, string> = {
  png: 'image/png',
  svg: 'image/svg+xml',
};
