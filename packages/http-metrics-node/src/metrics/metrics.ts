import { Counter, Gauge, Histogram, Registry, Summary, collectDefaultMetrics } from 'prom-client';
import type {
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricConfigSummary,
  MetricsConfig,
  MetricsContext,
} from './types.js';

const defaultHistogramBuckets = [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10];
const defaultSummaryPercentiles = [0.5, 0.9, 0.95, 0.99];
const defaultSummaryMaxAgeSeconds = 600;
const defaultSummaryAgeBuckets = 5;

export const metricNamePattern = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
export const labelNamePattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function validateMetricName(name: string): void {
  if (!name) {
    throw new Error('Metric name cannot be empty');
  }

  if (!metricNamePattern.test(name)) {
    throw new Error(
      `Invalid metric name '${name}'. Metric names must match pattern: [a-zA-Z_:][a-zA-Z0-9_:]*`,
    );
  }
}

export function validateLabelNames(labelNames: readonly string[] | undefined): void {
  for (const label of labelNames ?? []) {
    if (!labelNamePattern.test(label)) {
      throw new Error(
        `Invalid label name '${label}'. Label names must match pattern: [a-zA-Z_][a-zA-Z0-9_]*`,
      );
    }

    if (label.startsWith('__')) {
      throw new Error(`Label name '${label}' is reserved. Label names cannot start with '__'`);
    }
  }
}

export function createMetricsContext(config: MetricsConfig = {}): MetricsContext {
  const registry = config.registry ?? new Registry();

  if (config.enableDefaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  function createCounter<T extends string>(metric: MetricConfigCounter<T>): Counter<T> {
    validateMetricName(metric.name);
    validateLabelNames(metric.labelNames);

    return new Counter<T>({
      name: metric.name,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      registers: [registry],
    });
  }

  function createGauge<T extends string>(metric: MetricConfigGauge<T>): Gauge<T> {
    validateMetricName(metric.name);
    validateLabelNames(metric.labelNames);

    return new Gauge<T>({
      name: metric.name,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      registers: [registry],
    });
  }

  function createHistogram<T extends string>(metric: MetricConfigHistogram<T>): Histogram<T> {
    validateMetricName(metric.name);
    validateLabelNames(metric.labelNames);

    return new Histogram<T>({
      name: metric.name,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      buckets: [...(metric.buckets ?? defaultHistogramBuckets)],
      registers: [registry],
    });
  }

  function createSummary<T extends string>(metric: MetricConfigSummary<T>): Summary<T> {
    validateMetricName(metric.name);
    validateLabelNames(metric.labelNames);

    return new Summary<T>({
      name: metric.name,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      percentiles: [...(metric.percentiles ?? defaultSummaryPercentiles)],
      maxAgeSeconds: metric.maxAgeSeconds ?? defaultSummaryMaxAgeSeconds,
      ageBuckets: metric.ageBuckets ?? defaultSummaryAgeBuckets,
      registers: [registry],
    });
  }

  return {
    getRegistry: () => registry,

    createCounter,
    createGauge,
    createHistogram,
    createSummary,

    getMetricsAsString: () => registry.metrics(),

    getMetrics: () => registry.getMetricsAsArray(),

    clearMetrics(): void {
      registry.clear();
    },
  };
}
