import type { DiagnosticConfig } from '../diagnostics/types.js';
import { TB } from '../typebox.js';
import { defaultUnmatchedRouteLabel } from './config.js';
import type { HttpMetricsConfigInput } from './types.js';

export const httpMetricsEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ minLength: 1 }),
  NODE_ENV: TB.String({ default: 'development' }),
  LOG_LEVEL: TB.Union(
    [
      TB.Literal('debug'),
      TB.Literal('info'),
      TB.Literal('warn'),
      TB.Literal('error'),
      TB.Literal('fatal'),
    ],
    { default: 'info' },
  ),
  LOG_FORMAT: TB.Union([TB.Literal('json'), TB.Literal('human')], { default: 'json' }),

  HTTP_METRICS_NAMESPACE: TB.Optional(TB.String({ pattern: '^[a-zA-Z_:][a-zA-Z0-9_:]*$' })),
  HTTP_METRICS_UNMATCHED_ROUTE_MASK: TB.String({
    minLength: 1,
    default: defaultUnmatchedRouteLabel,
  }),
  HTTP_METRICS_MASK_UNMATCHED_ROUTES: TB.Boolean({ default: true }),
  HTTP_METRICS_INSTRUMENT: TB.Union([TB.Literal('histogram'), TB.Literal('summary')], {
    default: 'histogram',
  }),
  // JSON arrays, e.g. ["/health","/ready"] and [404]
  HTTP_METRICS_EXCLUDE_ROUTES: TB.Array(TB.String(), { default: [] }),
  HTTP_METRICS_EXCLUDE_STATUS: TB.Array(TB.Integer({ minimum: 100, maximum: 599 }), {
    default: [],
  }),
});

export type HttpMetricsEnv = TB.Static<typeof httpMetricsEnvSchema>;

export function httpMetricsConfigInputFromEnv(env: HttpMetricsEnv): HttpMetricsConfigInput {
  return {
    namespace: env.HTTP_METRICS_NAMESPACE,
    unmatchedRoutePolicy: env.HTTP_METRICS_MASK_UNMATCHED_ROUTES
      ? { kind: 'mask', label: env.HTTP_METRICS_UNMATCHED_ROUTE_MASK }
      : { kind: 'disabled' },
    instrument: env.HTTP_METRICS_INSTRUMENT,
    exclude: {
      routes: env.HTTP_METRICS_EXCLUDE_ROUTES,
      statusCodes: env.HTTP_METRICS_EXCLUDE_STATUS,
    },
  };
}

export function diagnosticConfigFromEnv(env: HttpMetricsEnv): DiagnosticConfig {
  return {
    minimumSeverity: env.LOG_LEVEL,
    outputFormat: env.LOG_FORMAT,
  };
}
