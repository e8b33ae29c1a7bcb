import type {
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricConfigSummary,
} from '../metrics/types.js';
import type { HttpMetricsConfig } from './types.js';

export type ObservationMetricConfig = MetricConfigHistogram | MetricConfigSummary;

export interface HttpMetricsInstrumentConfigs {
  activeRequests: MetricConfigGauge;
  requestDuration: ObservationMetricConfig;
  requestBodySize: ObservationMetricConfig;
  responseBodySize: ObservationMetricConfig;
}

export function createHttpMetricsInstrumentConfigs(
  config: HttpMetricsConfig,
): HttpMetricsInstrumentConfigs {
  const { labels, names } = config;
  const constLabelNames = Object.keys(config.constLabels);

  const requestLabelNames = [
    labels.route,
    labels.method,
    labels.status,
    labels.protocolName,
    labels.protocolVersion,
    ...constLabelNames,
  ];

  const observation = (
    name: string,
    help: string,
    buckets: readonly number[],
  ): ObservationMetricConfig =>
    config.instrument === 'summary'
      ? { type: 'summary', name, help, labelNames: requestLabelNames }
      : { type: 'histogram', name, help, labelNames: requestLabelNames, buckets };

  return {
    activeRequests: {
      type: 'gauge',
      name: names.activeRequests,
      help: 'Number of active HTTP server requests',
      labelNames: [labels.method, labels.scheme, ...constLabelNames],
    },
    requestDuration: observation(
      names.requestDuration,
      'Duration of HTTP server requests in seconds',
      config.durationBuckets,
    ),
    requestBodySize: observation(
      names.requestBodySize,
      'Size of HTTP server request bodies in bytes',
      config.bodySizeBuckets,
    ),
    responseBodySize: observation(
      names.responseBodySize,
      'Size of HTTP server response bodies in bytes',
      config.bodySizeBuckets,
    ),
  };
}
