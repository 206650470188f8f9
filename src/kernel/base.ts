import { DispatchError } from '../errors.js';
import type { CellOutput } from '../types/notebook.js';

export interface ExecutionRequest {
  source: string;
  language: string;
  signal?: AbortSignal;
}

export type ExecutionReply =
  | { status: 'ok'; outputs: CellOutput[] }
  | { status: 'error'; ename: string; evalue: string; traceback: string[] };

/** Runs one code cell on a kernel runtime. A cell that raises is an `error` reply, not a rejection. */
export interface KernelExecutor {
  execute(request: ExecutionRequest): Promise<ExecutionReply>;
}

/** The kernel runtime could not be reached or answered with something unusable. */
export class KernelError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}
