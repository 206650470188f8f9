import type { FastifyReply } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { errorResponse } from '../errors.js';

type Part = 'body' | 'query' | 'params';

const MESSAGES: Record<Part, string> = {
  body: 'Invalid request body',
  query: 'Invalid query parameters',
  params: 'Invalid path parameters',
};

/**
 * Parses one part of a request. On failure a 400 has already been sent and
 * undefined is returned, so handlers can simply `return` after it.
 */
export function parseRequest<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  part: Part,
  reply: FastifyReply,
): T | undefined {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  const details = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
  void reply.code(400).send(errorResponse('BAD_INPUT', MESSAGES[part], undefined, { details }));
  return undefined;
}
