import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import { ulid } from 'ulid';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import type { BusClient } from './bus/base.js';
import type { NotebookDispatcher } from './dispatcher/index.js';
import type { JobTracker } from './tracker/index.js';
import { DispatchError, errorResponse, errorTypeToStatus } from './errors.js';
import { JobDetailsQuerySchema, JobParamsSchema, ProcessNotebookRequestSchema } from './schemas/conversion.js';
import { parseRequest } from './middleware/validation.js';
import { createApiKeyGuard } from './middleware/auth.js';

export interface ServerDeps {
  dispatcher: NotebookDispatcher;
  tracker: JobTracker;
  bus: BusClient;
  config: Pick<AppConfig, 'DISPATCHER_API_KEY'>;
  logger: Logger;
}

const BODY_LIMIT = 32 * 1024 * 1024;

export async function createServer(deps: ServerDeps) {
  const { dispatcher, tracker, bus, config, logger } = deps;

  const app = Fastify({
    logger,
    genReqId: () => ulid(),
    bodyLimit: BODY_LIMIT,
  });

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    if (error instanceof DispatchError) {
      return reply.code(errorTypeToStatus(error.type)).send(errorResponse(error.type, error.message));
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send(errorResponse('BAD_INPUT', error.message));
    }
    request.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send(errorResponse('INTERNAL', 'Internal server error'));
  });

  const requireApiKey = createApiKeyGuard(config.DISPATCHER_API_KEY);

  // Health endpoint with bus, tracker and dispatcher stats
  app.get('/health', async () => {
    const connected = bus.isConnected();
    return {
      ok: connected,
      bus: { kind: bus.kind, connected },
      tracker: tracker.stats(),
      dispatcher: dispatcher.getStats(),
    };
  });

  // POST /notebooks - Submit a notebook for diagram conversion
  app.post('/notebooks', { preHandler: [requireApiKey] }, async (request, reply) => {
    const body = parseRequest(ProcessNotebookRequestSchema, request.body, 'body', reply);
    if (!body) return reply;

    const submitted = await dispatcher.submit(body);
    return reply.code(submitted.duplicate ? 200 : 202).send(submitted);
  });

  // GET /notebooks/:jobId - Job progress, or its result once finished
  app.get('/notebooks/:jobId', { preHandler: [requireApiKey] }, async (request, reply) => {
    const params = parseRequest(JobParamsSchema, request.params, 'params', reply);
    if (!params) return reply;
    const query = parseRequest(JobDetailsQuerySchema, request.query, 'query', reply);
    if (!query) return reply;

    const view = dispatcher.getJob(params.jobId);
    if (!view) {
      return reply.code(404).send(errorResponse('NOT_FOUND', 'Job not found'));
    }

    if (query.includeNotebook === '0' && view.result) {
      return { ...view, result: { ...view.result, notebook: null } };
    }
    return view;
  });

  return app;
}
