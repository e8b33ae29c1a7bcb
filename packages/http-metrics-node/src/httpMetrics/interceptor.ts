import { performance } from 'node:perf_hooks';
import type { Logger } from '../diagnostics/types.js';
import type { HttpMetricsEmitter } from './emitter.js';
import { resolveRouteLabel, resolveUnmaskedRoute } from './routeLabel.js';
import type {
  HttpMetricsConfig,
  HttpMetricsExtension,
  RequestLabels,
  RequestObservation,
  RequestScopeState,
  RequestStart,
  ResponseOutcome,
  RouteParams,
} from './types.js';

export interface MatchedRoute {
  /** Registered template; leave undefined when the router matched nothing. */
  template?: string;
  params?: RouteParams;
}

/**
 * Metrics state of one in-flight request. `begin` has already counted the
 * request as active; exactly one call to `finish` records it and releases it.
 */
export interface RequestScope {
  readonly state: RequestScopeState;
  readonly observation: Readonly<RequestObservation>;
  readonly outcome: Readonly<ResponseOutcome>;
  recordRequestBody(bytes: number): void;
  recordResponseBody(bytes: number): void;
  enterHandler(): void;
  setRoute(route: MatchedRoute): void;
  setExtension(extension: HttpMetricsExtension | null | undefined): void;
  setStatus(statusCode: number, options?: { sent?: boolean }): void;
  /** The handler chain failed; the status becomes an error status unless one is already known. */
  fail(error?: unknown): void;
  /** The client went away before a response was completed. */
  abort(): void;
  /** Returns false when the request was already finished. */
  finish(): boolean;
}

export interface HttpMetricsInterceptor {
  begin(start: RequestStart): RequestScope;
  /**
   * Runs `handler` inside a request scope. Errors are recorded and re-thrown
   * unchanged; the scope is finished on every path.
   */
  intercept<T>(start: RequestStart, handler: (scope: RequestScope) => Promise<T>): Promise<T>;
}

export interface HttpMetricsInterceptorOptions {
  config: HttpMetricsConfig;
  emitter: HttpMetricsEmitter;
  logger: Logger;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

function errorStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  const status =
    'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;

  return typeof status === 'number' && Number.isInteger(status) && status >= 400 && status <= 599
    ? status
    : undefined;
}

export function createHttpMetricsInterceptor(
  options: HttpMetricsInterceptorOptions,
): HttpMetricsInterceptor {
  const { config, emitter, logger } = options;
  const now = options.now ?? (() => performance.now());

  function isExcluded(route: string, statusCode: number): boolean {
    const { exclude } = config;
    return (
      exclude.routes.has(route) ||
      exclude.statusCodes.has(statusCode) ||
      exclude.routePatterns.some((pattern) => pattern.test(route))
    );
  }

  function begin(start: RequestStart): RequestScope {
    let state: RequestScopeState = 'started';
    let route: MatchedRoute = {};
    let extension: HttpMetricsExtension | null | undefined;
    let statusSent = false;

    const observation: RequestObservation = {
      ...start,
      startTime: now(),
      requestBodyBytes: 0,
    };

    const outcome: ResponseOutcome = {
      statusCode: 200,
      responseBodyBytes: 0,
      completedNormally: true,
    };

    const activeLabels = { method: start.method, scheme: start.scheme };

    emitter.incrementActiveRequests(activeLabels);
    state = 'awaitingBody';

    const isOpen = () => state !== 'finalizing' && state !== 'done';

    function record(): void {
      const seconds = Math.max(0, now() - observation.startTime) / 1000;
      const routeInput = {
        routeTemplate: route.template,
        path: observation.path,
        params: route.params,
        extension,
        statusCode: outcome.statusCode,
      };

      if (isExcluded(resolveUnmaskedRoute(routeInput), outcome.statusCode)) {
        return;
      }

      const labels: RequestLabels = {
        route: resolveRouteLabel(routeInput, config.unmatchedRoutePolicy),
        method: observation.method,
        status: String(outcome.statusCode),
        protocolName: observation.protocolName,
        protocolVersion: observation.protocolVersion,
      };

      emitter.observeDuration(labels, seconds);
      emitter.observeRequestBodySize(labels, observation.requestBodyBytes);
      emitter.observeResponseBodySize(labels, outcome.responseBodyBytes);
    }

    return {
      get state() {
        return state;
      },

      observation,
      outcome,

      recordRequestBody(bytes) {
        if (isOpen()) {
          observation.requestBodyBytes += bytes;
        }
      },

      recordResponseBody(bytes) {
        if (isOpen()) {
          outcome.responseBodyBytes += bytes;
        }
      },

      enterHandler() {
        if (state === 'awaitingBody') {
          state = 'handlerRunning';
        }
      },

      setRoute(matched) {
        if (isOpen()) {
          route = matched;
        }
      },

      setExtension(value) {
        if (isOpen()) {
          extension = value;
        }
      },

      setStatus(statusCode, statusOptions) {
        if (isOpen()) {
          outcome.statusCode = statusCode;
          statusSent = statusSent || statusOptions?.sent === true;
        }
      },

      fail(error) {
        if (!isOpen()) {
          return;
        }
        outcome.completedNormally = false;
        outcome.statusCode =
          errorStatusOf(error) ??
          (outcome.statusCode >= 400 ? outcome.statusCode : config.abnormalStatusCode);
      },

      abort() {
        if (!isOpen()) {
          return;
        }
        outcome.completedNormally = false;
        if (!statusSent) {
          outcome.statusCode = config.abortedStatusCode;
        }
      },

      finish() {
        if (!isOpen()) {
          return false;
        }
        state = 'finalizing';

        try {
          record();
        } finally {
          emitter.decrementActiveRequests(activeLabels);
          Object.freeze(observation);
          Object.freeze(outcome);
          state = 'done';
        }

        if (!outcome.completedNormally) {
          logger.debug('HTTP request terminated abnormally', {
            method: observation.method,
            path: observation.path,
            statusCode: outcome.statusCode,
          });
        }

        return true;
      },
    };
  }

  return {
    begin,

    async intercept(start, handler) {
      const scope = begin(start);
      scope.enterHandler();

      try {
        return await handler(scope);
      } catch (error) {
        scope.fail(error);
        throw error;
      } finally {
        scope.finish();
      }
    },
  };
}
