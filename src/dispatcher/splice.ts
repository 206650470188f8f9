import type { Cell, Notebook } from '../types/notebook.js';
import type { Artifact, DiagramBlock, DiagramKind } from '../types/job.js';
import { CellIdGenerator } from './cell-ids.js';

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/svg+xml': 'svg',
  'image/jpeg': 'jpg',
};

export interface BlockOutcomes {
  completed: ReadonlyMap<string, Artifact>;
  failed: ReadonlyMap<string, string>;
}

/** Cell ids are part of nbformat from 4.5 on and forbidden before it. */
export function supportsCellIds(notebook: Notebook): boolean {
  return notebook.nbformat > 4 || notebook.nbformat_minor >= 5;
}

export function attachmentName(blockIndex: number, mimeType: string): string {
  return `diagram-${blockIndex}.${EXTENSIONS[mimeType] ?? 'bin'}`;
}

export function imageCellSource(kind: DiagramKind, name: string): string {
  return `![${kind} diagram](attachment:${name})`;
}

export function failureCellSource(kind: DiagramKind, reason: string): string {
  const oneLine = reason.replace(/\s+/g, ' ').trim();
  return `> **Diagram conversion failed** (${kind}): ${oneLine}`;
}

/**
 * Returns a copy of the notebook with each resolved block replaced, at its
 * own cell position, by an image cell or a failure placeholder. Cells that
 * are not blocks, and blocks with no outcome, are copied unchanged. A new
 * cell id is generated only where the notebook's format allows ids.
 */
export function spliceNotebook(notebook: Notebook, blocks: readonly DiagramBlock[], outcomes: BlockOutcomes): Notebook {
  const output = structuredClone(notebook);
  const withIds = supportsCellIds(output);
  const ids = new CellIdGenerator(
    output.cells.flatMap((cell) => (typeof cell.id === 'string' ? [cell.id] : [])),
  );

  for (const block of blocks) {
    const original = output.cells[block.blockIndex];
    if (!original) continue;

    const artifact = outcomes.completed.get(block.correlationId);
    const reason = outcomes.failed.get(block.correlationId);

    let replacement: Cell;
    let source: string;
    if (artifact) {
      const name = attachmentName(block.blockIndex, artifact.mimeType);
      source = imageCellSource(block.kind, name);
      replacement = {
        cell_type: 'markdown',
        source,
        metadata: { ...original.metadata, diagram: block.kind },
        attachments: { [name]: { [artifact.mimeType]: artifact.data } },
      };
    } else if (reason !== undefined) {
      source = failureCellSource(block.kind, reason);
      replacement = {
        cell_type: 'markdown',
        source,
        metadata: { ...original.metadata, diagram: block.kind, diagram_error: reason },
      };
    } else {
      continue;
    }

    if (typeof original.id === 'string') {
      output.cells[block.blockIndex] = { id: original.id, ...replacement };
    } else if (withIds) {
      output.cells[block.blockIndex] = { id: ids.next(source, block.blockIndex), ...replacement };
    } else {
      output.cells[block.blockIndex] = replacement;
    }
  }

  return output;
}
