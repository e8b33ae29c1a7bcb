import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';
import type { HttpMetricsInterceptor } from '../httpMetrics/interceptor.js';
import type { HttpMetricsConfig } from '../httpMetrics/types.js';
import type { MetricsContext } from '../metrics/types.js';

export interface ServiceContext<T = Record<string, unknown>> {
  readonly envContext: EnvContext<T>;
  readonly diagnosticContext: DiagnosticContext;
  readonly metricsContext: MetricsContext;
}

export interface HttpServerConfig {
  httpMetrics?: HttpMetricsConfig;
  /** Monotonic clock in milliseconds used for request durations. */
  now?: () => number;
}

declare module 'fastify' {
  interface FastifyRequest {
    logger: Logger;
    correlationId: string;
    ctx: ServiceContext<unknown>;
    startTime: number;
  }

  interface FastifyInstance {
    httpMetrics: HttpMetricsInterceptor;
  }
}
