export type ErrorType =
  | 'BAD_INPUT'
  | 'TRANSPORT'
  | 'RENDER'
  | 'PROTOCOL'
  | 'DEADLINE'
  | 'TOPOLOGY'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'INTERNAL';

export interface ApiError {
  error: {
    type: ErrorType;
    message: string;
    hint?: string;
    fields?: Record<string, unknown>;
  };
}

export function errorResponse(type: ErrorType, message: string, hint?: string, fields?: Record<string, unknown>): ApiError {
  return { error: { type, message, hint, fields } };
}

export function errorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case 'BAD_INPUT': return 400;
    case 'UNAUTHORIZED': return 401;
    case 'NOT_FOUND': return 404;
    case 'DEADLINE': return 504;
    case 'TRANSPORT': return 503;
    case 'RENDER':
    case 'PROTOCOL':
    case 'TOPOLOGY':
    case 'INTERNAL':
    default: return 500;
  }
}

export class DispatchError extends Error {
  constructor(readonly type: ErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bus unreachable or publish failed after the client's own retries. */
export class TransportError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}

/** The external rendering engine failed; reported back as a Failure response. */
export class RenderError extends DispatchError {
  constructor(message: string, readonly stderr?: string, options?: { cause?: unknown }) {
    super('RENDER', message, options);
  }
}

export class TopologyError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TOPOLOGY', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
