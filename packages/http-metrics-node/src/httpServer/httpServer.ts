import Fastify, { type FastifyInstance } from 'fastify';
import { registerHttpMetrics } from '../httpMetrics/fastifyHooks.js';
import type { HttpServerConfig, ServiceContext } from './types.js';

export function createHttpServer<T>(
  context: ServiceContext<T>,
  config: HttpServerConfig = {},
): FastifyInstance {
  const { correlationIdGenerator } = context.diagnosticContext;

  const fastify = Fastify({
    logger: false,
    requestIdLogLabel: 'correlationId',
    requestIdHeader: 'x-correlation-id',
    genReqId: () => correlationIdGenerator.generateRootId(),
  });

  // registered first so its hooks run before the logging hooks below
  const httpMetrics = registerHttpMetrics(fastify, {
    metricsContext: context.metricsContext,
    logger: context.diagnosticContext.logger,
    config: config.httpMetrics,
    now: config.now,
  });
  fastify.decorate('httpMetrics', httpMetrics);

  fastify.decorateRequest('ctx', null);
  fastify.decorateRequest('logger', null);
  fastify.decorateRequest('correlationId', '');
  fastify.decorateRequest('startTime', 0);

  fastify.addHook('onRequest', async (request) => {
    const correlationId = request.id;
    const logger = context.diagnosticContext.createChildLogger(correlationId);

    request.ctx = context;
    request.correlationId = correlationId;
    request.logger = logger;
    request.startTime = Date.now();

    logger.info('Request received', {
      method: request.method,
      url: request.url,
    });
  });

  fastify.addHook('onResponse', async (request, reply) => {
    request.logger.info('Request completed', {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      duration_ms: Date.now() - request.startTime,
    });
  });

  return fastify;
}
