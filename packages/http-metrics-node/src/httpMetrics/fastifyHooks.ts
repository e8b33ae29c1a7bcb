import { Readable, Transform, pipeline } from 'node:stream';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from '../diagnostics/types.js';
import type { MetricsContext } from '../metrics/types.js';
import { createHttpMetricsConfig } from './config.js';
import { createHttpMetricsEmitter } from './emitter.js';
import {
  createHttpMetricsInterceptor,
  type HttpMetricsInterceptor,
  type MatchedRoute,
  type RequestScope,
} from './interceptor.js';
import type { HttpMetricsConfig, HttpMetricsExtension, RequestStart } from './types.js';

declare module 'fastify' {
  interface FastifyRequest {
    httpMetricsScope: RequestScope | null;
    /** Set by application code, usually through {@link keepRouteParams}. */
    httpMetricsExtension: HttpMetricsExtension | null;
  }
}

export interface HttpMetricsRegistration {
  metricsContext: MetricsContext;
  logger: Logger;
  config?: HttpMetricsConfig;
  now?: () => number;
}

function chunkLength(chunk: unknown): number {
  if (typeof chunk === 'string') {
    return Buffer.byteLength(chunk);
  }
  return chunk instanceof Uint8Array ? chunk.byteLength : 0;
}

function createByteCounter(onBytes: (bytes: number) => void): Transform {
  return new Transform({
    transform(chunk: unknown, _encoding, callback) {
      onBytes(chunkLength(chunk));
      callback(null, chunk);
    },
  });
}

function protocolVersionOf(httpVersion: string): string {
  const majorOnly = /^([2-9])\.0$/.exec(httpVersion);
  return majorOnly ? majorOnly[1] : httpVersion;
}

function requestStartOf(request: FastifyRequest): RequestStart {
  const queryStart = request.url.indexOf('?');

  return {
    method: request.method,
    path: queryStart === -1 ? request.url : request.url.slice(0, queryStart),
    scheme: request.protocol,
    protocolName: 'http',
    protocolVersion: protocolVersionOf(request.raw.httpVersion),
  };
}

function matchedRouteOf(request: FastifyRequest): MatchedRoute {
  if (request.is404) {
    return {};
  }

  const params: Record<string, string> = {};
  if (typeof request.params === 'object' && request.params !== null) {
    for (const [name, value] of Object.entries(request.params)) {
      if (typeof value === 'string') {
        params[name] = value;
      }
    }
  }

  return { template: request.routeOptions.url, params };
}

function applyRoute(scope: RequestScope, request: FastifyRequest): void {
  scope.setRoute(matchedRouteOf(request));
  scope.setExtension(request.httpMetricsExtension);
}

function abortScope(scope: RequestScope, request: FastifyRequest, reply?: FastifyReply): void {
  applyRoute(scope, request);
  if (reply?.raw.headersSent) {
    scope.setStatus(reply.statusCode, { sent: true });
  }
  scope.abort();
  scope.finish();
}

/**
 * Instruments every request handled by `fastify`. Register before routes and
 * before hooks that transform the response body, since bodies are measured as
 * they leave this plugin's `onSend` hook.
 */
export function registerHttpMetrics(
  fastify: FastifyInstance,
  registration: HttpMetricsRegistration,
): HttpMetricsInterceptor {
  const { logger } = registration;
  const config = registration.config ?? createHttpMetricsConfig();
  const emitter = createHttpMetricsEmitter(registration.metricsContext, config, logger);
  const interceptor = createHttpMetricsInterceptor({
    config,
    emitter,
    logger,
    now: registration.now,
  });

  fastify.decorateRequest('httpMetricsScope', null);
  fastify.decorateRequest('httpMetricsExtension', null);

  fastify.addHook('onRequest', async (request, reply) => {
    const scope = interceptor.begin(requestStartOf(request));
    request.httpMetricsScope = scope;

    let responseFinished = false;
    reply.raw.once('finish', () => {
      responseFinished = true;
    });

    // onResponse only runs after 'finish', so a close without it is a dropped connection
    reply.raw.once('close', () => {
      if (!responseFinished) {
        abortScope(scope, request, reply);
      }
    });
  });

  fastify.addHook('preParsing', async (request, _reply, payload) => {
    const scope = request.httpMetricsScope;
    const contentLength = request.headers['content-length'];
    const announced =
      (contentLength !== undefined && contentLength !== '0') ||
      request.headers['transfer-encoding'] !== undefined;

    if (!scope || !announced) {
      return payload;
    }

    return pipeline(
      payload,
      createByteCounter((bytes) => scope.recordRequestBody(bytes)),
      (error) => {
        if (error) {
          logger.debug('Request body stream failed', { error: error.message, url: request.url });
        }
      },
    );
  });

  fastify.addHook('preHandler', async (request) => {
    request.httpMetricsScope?.enterHandler();
  });

  fastify.addHook('onError', async (request, _reply, error) => {
    request.httpMetricsScope?.fail(error);
  });

  fastify.addHook('onSend', async (request, _reply, payload) => {
    const scope = request.httpMetricsScope;
    if (!scope) {
      return payload;
    }

    if (payload instanceof Readable) {
      return pipeline(
        payload,
        createByteCounter((bytes) => scope.recordResponseBody(bytes)),
        (error) => {
          if (error) {
            logger.debug('Response body stream failed', { error: error.message, url: request.url });
          }
        },
      );
    }

    scope.recordResponseBody(chunkLength(payload));
    return payload;
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const scope = request.httpMetricsScope;
    if (!scope) {
      return;
    }

    applyRoute(scope, request);
    scope.setStatus(reply.statusCode, { sent: true });
    scope.finish();
  });

  fastify.addHook('onRequestAbort', async (request) => {
    if (request.httpMetricsScope) {
      abortScope(request.httpMetricsScope, request);
    }
  });

  fastify.addHook('onTimeout', async (request, reply) => {
    if (request.httpMetricsScope) {
      abortScope(request.httpMetricsScope, request, reply);
    }
  });

  return interceptor;
}

/**
 * Route-level `onRequest` hook that keeps the values of the named path
 * parameters in the route label, e.g. `/posts/en/:slug` instead of
 * `/posts/:language/:slug`.
 *
 * ```ts
 * fastify.get('/posts/:language/:slug', { onRequest: keepRouteParams('language') }, handler);
 * ```
 */
export function keepRouteParams(...names: string[]) {
  const extension: HttpMetricsExtension = Object.freeze({
    cardinalityKeepParams: Object.freeze([...names]),
  });

  return async (request: FastifyRequest): Promise<void> => {
    request.httpMetricsExtension = extension;
  };
}
