import type { FastifyReply, FastifyRequest } from 'fastify';
import { errorResponse } from '../errors.js';

export const API_KEY_HEADER = 'x-api-key';

/** preHandler requiring `x-api-key` to match; a no-op when no key is configured. */
export function createApiKeyGuard(expectedKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    if (!expectedKey) {
      return;
    }

    const apiKey = request.headers[API_KEY_HEADER];
    if (apiKey !== expectedKey) {
      await reply.code(401).send(errorResponse('UNAUTHORIZED', `Valid ${API_KEY_HEADER} header required`));
    }
  };
}
