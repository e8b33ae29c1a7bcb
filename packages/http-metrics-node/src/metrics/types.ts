import type { Counter, Gauge, Histogram, Registry, Summary } from 'prom-client';

interface MetricConfigBase<T extends string> {
  name: string;
  help: string;
  labelNames?: readonly T[];
}

export interface MetricConfigCounter<T extends string = string> extends MetricConfigBase<T> {
  type: 'counter';
}

export interface MetricConfigGauge<T extends string = string> extends MetricConfigBase<T> {
  type: 'gauge';
}

export interface MetricConfigHistogram<T extends string = string> extends MetricConfigBase<T> {
  type: 'histogram';
  buckets?: readonly number[];
}

export interface MetricConfigSummary<T extends string = string> extends MetricConfigBase<T> {
  type: 'summary';
  percentiles?: readonly number[];
  maxAgeSeconds?: number;
  ageBuckets?: number;
}

export type MetricConfig<T extends string = string> =
  | MetricConfigCounter<T>
  | MetricConfigGauge<T>
  | MetricConfigHistogram<T>
  | MetricConfigSummary<T>;

export interface MetricsConfig {
  enableDefaultMetrics?: boolean;
  /** Registry to register into. A fresh one is created when omitted. */
  registry?: Registry;
}

export interface MetricsContext {
  getRegistry: () => Registry;
  createCounter: <T extends string>(config: MetricConfigCounter<T>) => Counter<T>;
  createGauge: <T extends string>(config: MetricConfigGauge<T>) => Gauge<T>;
  createHistogram: <T extends string>(config: MetricConfigHistogram<T>) => Histogram<T>;
  createSummary: <T extends string>(config: MetricConfigSummary<T>) => Summary<T>;
  getMetricsAsString: () => Promise<string>;
  getMetrics: () => ReturnType<Registry['getMetricsAsArray']>;
  clearMetrics: () => void;
}
