import type { Logger } from '../logger.js';
import type { CellOutput, Notebook } from '../types/notebook.js';
import { sourceText } from '../types/notebook.js';
import type { KernelExecutor } from './base.js';

export interface ExecuteOptions {
  logger: Logger;
  signal?: AbortSignal;
}

export interface ExecutionSummary {
  notebook: Notebook;
  executed: number;
  errors: number;
}

/** Kernel language from `kernelspec.language`, then `language_info.name`, else python. */
export function notebookLanguage(notebook: Notebook): string {
  const { kernelspec, language_info: languageInfo } = notebook.metadata;
  if (isRecord(kernelspec) && typeof kernelspec['language'] === 'string') return kernelspec['language'];
  if (isRecord(languageInfo) && typeof languageInfo['name'] === 'string') return languageInfo['name'];
  return 'python';
}

/**
 * Runs every non-empty code cell in order and records its outputs on a copy
 * of the notebook. A cell that raises gets an `error` output and execution
 * carries on; a kernel that cannot be reached rejects the whole run.
 */
export async function executeNotebook(notebook: Notebook, kernel: KernelExecutor, options: ExecuteOptions): Promise<ExecutionSummary> {
  const output = structuredClone(notebook);
  const language = notebookLanguage(output);
  let count = 0;
  let errors = 0;

  for (const cell of output.cells) {
    if (cell.cell_type !== 'code') continue;
    const source = sourceText(cell.source);
    if (source.trim() === '') continue;

    const reply = await kernel.execute({ source, language, signal: options.signal });
    count++;

    let outputs: CellOutput[];
    if (reply.status === 'ok') {
      outputs = reply.outputs;
    } else {
      errors++;
      options.logger.debug({ cellId: cell.id, ename: reply.ename }, 'cell raised during execution');
      outputs = [{ output_type: 'error', ename: reply.ename, evalue: reply.evalue, traceback: reply.traceback }];
    }
    cell.outputs = outputs;
    cell.execution_count = count;
  }

  return { notebook: output, executed: count, errors };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
