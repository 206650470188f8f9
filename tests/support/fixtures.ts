import { fileURLToPath } from 'node:url';
import type { RenderEngine, RenderRequest, RenderedImage } from '../../src/converters/base.js';
import { RenderError } from '../../src/errors.js';
import { loadTopology } from '../../src/topology/index.js';
import type { Topology } from '../../src/topology/index.js';
import type { DiagramKind } from '../../src/types/job.js';
import type { Cell, Notebook } from '../../src/types/notebook.js';

export const TOPOLOGY_FILE = fileURLToPath(new URL('../../config/topology.yaml', import.meta.url));

export function loadTestTopology(): Promise<Topology> {
  return loadTopology(TOPOLOGY_FILE);
}

export function notebook(cells: Cell[]): Notebook {
  return { cells, metadata: { kernelspec: { name: 'python3', language: 'python' } }, nbformat: 4, nbformat_minor: 5 };
}

export function diagramCell(kind: DiagramKind, body: string): Cell {
  return { cell_type: 'code', source: `%%${kind}\n${body}`, metadata: {}, outputs: [], execution_count: null };
}

export function codeCell(source: string): Cell {
  return { cell_type: 'code', source, metadata: {}, outputs: [], execution_count: null };
}

export function markdownCell(source: string): Cell {
  return { cell_type: 'markdown', source, metadata: {} };
}

/**
 * Engine stand-in. Renders `<kind>:<source>` as PNG bytes unless the source
 * contains `FAIL xN`, in which case its first N renders throw.
 */
export class FakeEngine implements RenderEngine {
  readonly calls: RenderRequest[] = [];
  private failures = new Map<string, number>();

  constructor(readonly kind: DiagramKind) {}

  async render(request: RenderRequest): Promise<RenderedImage> {
    this.calls.push(request);
    const match = /FAIL x(\d+)/.exec(request.source);
    if (match) {
      const seen = (this.failures.get(request.source) ?? 0) + 1;
      this.failures.set(request.source, seen);
      if (seen <= Number(match[1])) {
        throw new RenderError(`${this.kind} render failed`, `attempt ${seen} rejected`);
      }
    }
    return { data: Buffer.from(`${this.kind}:${request.source}`), mimeType: 'image/png' };
  }
}

export function b64(text: string): string {
  return Buffer.from(text).toString('base64');
}
