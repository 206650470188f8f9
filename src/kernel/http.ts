import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { ExecutionReply, ExecutionRequest, KernelExecutor } from './base.js';
import { KernelError } from './base.js';

const ReplySchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    outputs: z.array(z.object({ output_type: z.string() }).passthrough()).default([]),
  }),
  z.object({
    status: z.literal('error'),
    ename: z.string(),
    evalue: z.string(),
    traceback: z.array(z.string()).default([]),
  }),
]);

export interface HttpKernelOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/** Talks to a kernel gateway exposing `POST /execute`. */
export class HttpKernelExecutor implements KernelExecutor {
  private readonly endpoint: URL;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpKernelOptions) {
    this.endpoint = new URL('execute', options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionReply> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify({ source: request.source, language: request.language }),
        signal,
      });
    } catch (error) {
      throw new KernelError(`kernel request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      throw new KernelError(`kernel answered HTTP ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new KernelError(`kernel reply is not JSON: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = ReplySchema.safeParse(body);
    if (!parsed.success) {
      throw new KernelError(`unexpected kernel reply: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return parsed.data;
  }
}
