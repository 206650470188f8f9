import { describe, it, expect } from 'vitest';
import { executeNotebook, notebookLanguage } from './execute.js';
import type { ExecutionReply, ExecutionRequest, KernelExecutor } from './base.js';
import { KernelError } from './base.js';
import type { Notebook } from '../types/notebook.js';
import { silentLogger } from '../logger.js';

class ScriptedKernel implements KernelExecutor {
  readonly seen: ExecutionRequest[] = [];
  constructor(private readonly replies: ExecutionReply[]) {}

  async execute(request: ExecutionRequest): Promise<ExecutionReply> {
    this.seen.push(request);
    const next = this.replies.shift();
    if (!next) throw new KernelError('no more replies');
    return next;
  }
}

function notebook(): Notebook {
  return {
    cells: [
      { cell_type: 'markdown', source: '# Intro', metadata: {} },
      { cell_type: 'code', source: ['x = 1\n', 'print(x)'], metadata: {}, outputs: [], execution_count: null },
      { cell_type: 'code', source: '   ', metadata: {}, outputs: [], execution_count: null },
      { cell_type: 'code', source: 'raise ValueError("bad")', metadata: {}, outputs: [], execution_count: null },
    ],
    metadata: { kernelspec: { name: 'ir', language: 'R' } },
    nbformat: 4,
    nbformat_minor: 5,
  };
}

describe('notebookLanguage', () => {
  it('should prefer the kernelspec language', () => {
    expect(notebookLanguage(notebook())).toBe('R');
  });

  it('should fall back to language_info and then python', () => {
    expect(notebookLanguage({ ...notebook(), metadata: { language_info: { name: 'julia' } } })).toBe('julia');
    expect(notebookLanguage({ ...notebook(), metadata: {} })).toBe('python');
  });
});

describe('executeNotebook', () => {
  it('should run non-empty code cells and record outputs on a copy', async () => {
    const input = notebook();
    const kernel = new ScriptedKernel([
      { status: 'ok', outputs: [{ output_type: 'stream', name: 'stdout', text: '1\n' }] },
      { status: 'error', ename: 'ValueError', evalue: 'bad', traceback: ['Traceback'] },
    ]);

    const summary = await executeNotebook(input, kernel, { logger: silentLogger() });

    expect(kernel.seen.map((r) => r.source)).toEqual(['x = 1\nprint(x)', 'raise ValueError("bad")']);
    expect(kernel.seen[0]?.language).toBe('R');
    expect(summary.executed).toBe(2);
    expect(summary.errors).toBe(1);
    expect(summary.notebook.cells[1]?.outputs).toEqual([{ output_type: 'stream', name: 'stdout', text: '1\n' }]);
    expect(summary.notebook.cells[1]?.execution_count).toBe(1);
    expect(summary.notebook.cells[2]?.execution_count).toBeNull();
    expect(summary.notebook.cells[3]?.outputs).toEqual([
      { output_type: 'error', ename: 'ValueError', evalue: 'bad', traceback: ['Traceback'] },
    ]);
    expect(input).toEqual(notebook());
  });

  it('should reject when the kernel is unreachable', async () => {
    await expect(executeNotebook(notebook(), new ScriptedKernel([]), { logger: silentLogger() })).rejects.toBeInstanceOf(KernelError);
  });
});
