import { ulid } from 'ulid';
import type { Cell, Notebook } from '../types/notebook.js';
import { sourceText } from '../types/notebook.js';
import type { DiagramBlock, DiagramKind } from '../types/job.js';
import { isDiagramKind } from '../types/job.js';

const CELL_MAGIC = /^%%([A-Za-z][\w-]*)[ \t]*(?:\r?\n|$)/;

export interface DeclaredDiagram {
  kind: DiagramKind;
  payload: string;
}

/**
 * Reads the diagram declaration of one cell, if any. A string
 * `metadata.diagram` wins over a `%%<kind>` first line; kinds outside the
 * known set are not diagrams.
 */
export function declaredDiagram(cell: Cell): DeclaredDiagram | undefined {
  const text = sourceText(cell.source);

  const declared = cell.metadata['diagram'];
  if (typeof declared === 'string') {
    const kind = declared.trim().toLowerCase();
    return isDiagramKind(kind) ? { kind, payload: text } : undefined;
  }

  if (cell.cell_type === 'markdown') return undefined;

  const magic = CELL_MAGIC.exec(text);
  const kind = magic?.[1]?.toLowerCase();
  if (!magic || !kind || !isDiagramKind(kind)) return undefined;
  return { kind, payload: text.slice(magic[0].length) };
}

/**
 * Scans cells in order and returns one block per diagram cell, indexed by
 * cell position. The notebook is not modified.
 */
export function extractBlocks(notebook: Notebook, newCorrelationId: () => string = ulid): DiagramBlock[] {
  const blocks: DiagramBlock[] = [];
  notebook.cells.forEach((cell, blockIndex) => {
    const diagram = declaredDiagram(cell);
    if (!diagram) return;
    blocks.push(Object.freeze({ blockIndex, kind: diagram.kind, payload: diagram.payload, correlationId: newCorrelationId() }));
  });
  return blocks;
}
