export * from './diagnostics/diagnostics.js';
export type * from './diagnostics/types.js';
export { createEnvContext, createEnvParser, formatEnvIssues } from './environment/environment.js';
export type {
  DefaultEnv,
  DefaultEnvContext,
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationIssue,
} from './environment/types.js';
export {
  createHttpMetricsConfig,
  createHttpMetricsConfigBuilder,
  defaultBodySizeBuckets,
  defaultDurationBuckets,
  defaultLabelNames,
  defaultMetricNames,
  defaultUnmatchedRouteLabel,
} from './httpMetrics/config.js';
export type { HttpMetricsConfigBuilder } from './httpMetrics/config.js';
export { createHttpMetricsEmitter } from './httpMetrics/emitter.js';
export type { HttpMetricsEmitter } from './httpMetrics/emitter.js';
export {
  diagnosticConfigFromEnv,
  httpMetricsConfigInputFromEnv,
  httpMetricsEnvSchema,
} from './httpMetrics/env.js';
export type { HttpMetricsEnv } from './httpMetrics/env.js';
export { HttpMetricsConfigError } from './httpMetrics/errors.js';
export { keepRouteParams, registerHttpMetrics } from './httpMetrics/fastifyHooks.js';
export type { HttpMetricsRegistration } from './httpMetrics/fastifyHooks.js';
export { createHttpMetricsInstrumentConfigs } from './httpMetrics/instruments.js';
export type {
  HttpMetricsInstrumentConfigs,
  ObservationMetricConfig,
} from './httpMetrics/instruments.js';
export { createHttpMetricsInterceptor } from './httpMetrics/interceptor.js';
export type {
  HttpMetricsInterceptor,
  HttpMetricsInterceptorOptions,
  MatchedRoute,
  RequestScope,
} from './httpMetrics/interceptor.js';
export {
  parseRouteTemplate,
  resolveRouteLabel,
  resolveUnmaskedRoute,
  substituteRouteParams,
} from './httpMetrics/routeLabel.js';
export type * from './httpMetrics/types.js';
export { createHttpServer } from './httpServer/httpServer.js';
export type { HttpServerConfig, ServiceContext } from './httpServer/types.js';
export {
  createMetricsContext,
  validateLabelNames,
  validateMetricName,
} from './metrics/metrics.js';
export type * from './metrics/types.js';
