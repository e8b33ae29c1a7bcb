import type { LabelValues } from 'prom-client';
import type { Logger } from '../diagnostics/types.js';
import type { MetricsContext } from '../metrics/types.js';
import { createHttpMetricsInstrumentConfigs, type ObservationMetricConfig } from './instruments.js';
import type { ActiveRequestLabels, HttpMetricsConfig, RequestLabels } from './types.js';

export interface HttpMetricsEmitter {
  incrementActiveRequests(labels: ActiveRequestLabels): void;
  decrementActiveRequests(labels: ActiveRequestLabels): void;
  observeDuration(labels: RequestLabels, seconds: number): void;
  observeRequestBodySize(labels: RequestLabels, bytes: number): void;
  observeResponseBodySize(labels: RequestLabels, bytes: number): void;
}

interface Observer {
  observe(labels: LabelValues<string>, value: number): void;
}

function createObserver(metricsContext: MetricsContext, config: ObservationMetricConfig): Observer {
  return config.type === 'summary'
    ? metricsContext.createSummary(config)
    : metricsContext.createHistogram(config);
}

/**
 * Registers the four HTTP server instruments and records into them. Failures
 * raised by prom-client while recording are logged and dropped; failures while
 * registering (a name already taken in the registry) propagate.
 */
export function createHttpMetricsEmitter(
  metricsContext: MetricsContext,
  config: HttpMetricsConfig,
  logger: Logger,
): HttpMetricsEmitter {
  const instruments = createHttpMetricsInstrumentConfigs(config);
  const activeRequests = metricsContext.createGauge(instruments.activeRequests);
  const requestDuration = createObserver(metricsContext, instruments.requestDuration);
  const requestBodySize = createObserver(metricsContext, instruments.requestBodySize);
  const responseBodySize = createObserver(metricsContext, instruments.responseBodySize);

  const { labels: labelNames, names } = config;

  const activeLabelValues = (labels: ActiveRequestLabels): LabelValues<string> => ({
    [labelNames.method]: labels.method,
    [labelNames.scheme]: labels.scheme,
    ...config.constLabels,
  });

  const requestLabelValues = (labels: RequestLabels): LabelValues<string> => ({
    [labelNames.route]: labels.route,
    [labelNames.method]: labels.method,
    [labelNames.status]: labels.status,
    [labelNames.protocolName]: labels.protocolName,
    [labelNames.protocolVersion]: labels.protocolVersion,
    ...config.constLabels,
  });

  function record(metric: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      logger.error(error, 'Failed to record HTTP metric', { metric });
    }
  }

  return {
    incrementActiveRequests(labels) {
      record(names.activeRequests, () => activeRequests.inc(activeLabelValues(labels)));
    },

    decrementActiveRequests(labels) {
      record(names.activeRequests, () => activeRequests.dec(activeLabelValues(labels)));
    },

    observeDuration(labels, seconds) {
      record(names.requestDuration, () =>
        requestDuration.observe(requestLabelValues(labels), seconds),
      );
    },

    observeRequestBodySize(labels, bytes) {
      record(names.requestBodySize, () =>
        requestBodySize.observe(requestLabelValues(labels), bytes),
      );
    },

    observeResponseBodySize(labels, bytes) {
      record(names.responseBodySize, () =>
        responseBodySize.observe(requestLabelValues(labels), bytes),
      );
    },
  };
}
