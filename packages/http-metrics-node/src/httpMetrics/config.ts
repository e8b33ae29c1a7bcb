import { labelNamePattern, metricNamePattern } from '../metrics/metrics.js';
import { HttpMetricsConfigError } from './errors.js';
import type {
  HttpMetricLabelNames,
  HttpMetricNames,
  HttpMetricsConfig,
  HttpMetricsConfigInput,
  ObservationInstrument,
  UnmatchedRoutePolicy,
} from './types.js';

export const defaultMetricNames: HttpMetricNames = {
  requestDuration: 'http_server_request_duration',
  requestBodySize: 'http_server_request_body_size',
  responseBodySize: 'http_server_response_body_size',
  activeRequests: 'http_server_active_requests',
};

export const defaultLabelNames: HttpMetricLabelNames = {
  route: 'http_route',
  method: 'http_request_method',
  status: 'http_response_status_code',
  protocolName: 'network_protocol_name',
  protocolVersion: 'network_protocol_version',
  scheme: 'url_scheme',
};

export const defaultUnmatchedRouteLabel = 'UNKNOWN';

export const defaultDurationBuckets = [
  0.005, 0.01, 0.025, 0.05, 0.075, 0.1, 0.25, 0.5, 0.75, 1, 2.5, 5, 7.5, 10,
];

export const defaultBodySizeBuckets = [
  0, 128, 1024, 8192, 65536, 524288, 4194304, 33554432,
];

// nginx's "client closed request"
const defaultAbortedStatusCode = 499;
const defaultAbnormalStatusCode = 500;

function isStatusCode(value: number): boolean {
  return Number.isInteger(value) && value >= 100 && value <= 599;
}

function checkBuckets(name: string, buckets: readonly number[], issues: string[]): void {
  if (buckets.length === 0) {
    issues.push(`${name} must not be empty`);
    return;
  }

  for (let i = 0; i < buckets.length; i++) {
    if (!Number.isFinite(buckets[i]) || (i > 0 && buckets[i] <= buckets[i - 1])) {
      issues.push(`${name} must be finite and strictly increasing`);
      return;
    }
  }
}

function checkLabelName(label: string, issues: string[]): void {
  if (!labelNamePattern.test(label)) {
    issues.push(`label name '${label}' must match [a-zA-Z_][a-zA-Z0-9_]*`);
  } else if (label.startsWith('__')) {
    issues.push(`label name '${label}' is reserved`);
  }
}

function compilePatterns(patterns: Iterable<string | RegExp>, issues: string[]): RegExp[] {
  const compiled: RegExp[] = [];

  for (const pattern of patterns) {
    if (pattern instanceof RegExp) {
      compiled.push(pattern);
      continue;
    }

    try {
      compiled.push(new RegExp(pattern));
    } catch {
      issues.push(`exclude pattern '${pattern}' is not a valid regular expression`);
    }
  }

  return compiled;
}

/**
 * Builds the immutable configuration shared by every request. All problems are
 * collected and reported together in one {@link HttpMetricsConfigError}.
 */
export function createHttpMetricsConfig(input: HttpMetricsConfigInput = {}): HttpMetricsConfig {
  const issues: string[] = [];
  const prefix = input.namespace ? `${input.namespace}_` : '';

  const names: HttpMetricNames = {
    requestDuration: prefix + (input.names?.requestDuration ?? defaultMetricNames.requestDuration),
    requestBodySize: prefix + (input.names?.requestBodySize ?? defaultMetricNames.requestBodySize),
    responseBodySize:
      prefix + (input.names?.responseBodySize ?? defaultMetricNames.responseBodySize),
    activeRequests: prefix + (input.names?.activeRequests ?? defaultMetricNames.activeRequests),
  };

  const nameList: string[] = Object.values(names);
  for (const name of nameList) {
    if (!metricNamePattern.test(name)) {
      issues.push(`metric name '${name}' must match [a-zA-Z_:][a-zA-Z0-9_:]*`);
    }
  }
  if (new Set(nameList).size !== nameList.length) {
    issues.push(`metric names must be distinct, got ${nameList.join(', ')}`);
  }

  const labels: HttpMetricLabelNames = {
    route: input.labels?.route ?? defaultLabelNames.route,
    method: input.labels?.method ?? defaultLabelNames.method,
    status: input.labels?.status ?? defaultLabelNames.status,
    protocolName: input.labels?.protocolName ?? defaultLabelNames.protocolName,
    protocolVersion: input.labels?.protocolVersion ?? defaultLabelNames.protocolVersion,
    scheme: input.labels?.scheme ?? defaultLabelNames.scheme,
  };

  const labelList: string[] = Object.values(labels);
  labelList.forEach((label) => checkLabelName(label, issues));
  if (new Set(labelList).size !== labelList.length) {
    issues.push(`label names must be distinct, got ${labelList.join(', ')}`);
  }

  const constLabels = { ...input.constLabels };
  for (const label of Object.keys(constLabels)) {
    checkLabelName(label, issues);
    if (labelList.includes(label)) {
      issues.push(`const label '${label}' collides with a request label`);
    }
  }

  const unmatchedRoutePolicy: UnmatchedRoutePolicy = input.unmatchedRoutePolicy ?? {
    kind: 'mask',
    label: defaultUnmatchedRouteLabel,
  };
  if (unmatchedRoutePolicy.kind === 'mask' && unmatchedRoutePolicy.label === '') {
    issues.push('unmatched route mask must not be empty');
  }

  const excludedStatusCodes = new Set(input.exclude?.statusCodes ?? []);
  for (const code of excludedStatusCodes) {
    if (!isStatusCode(code)) {
      issues.push(`excluded status ${code} is not an HTTP status code`);
    }
  }

  const routePatterns = compilePatterns(input.exclude?.routePatterns ?? [], issues);

  const durationBuckets = input.durationBuckets ?? defaultDurationBuckets;
  const bodySizeBuckets = input.bodySizeBuckets ?? defaultBodySizeBuckets;
  checkBuckets('durationBuckets', durationBuckets, issues);
  checkBuckets('bodySizeBuckets', bodySizeBuckets, issues);

  const abnormalStatusCode = input.abnormalStatusCode ?? defaultAbnormalStatusCode;
  const abortedStatusCode = input.abortedStatusCode ?? defaultAbortedStatusCode;
  if (!isStatusCode(abnormalStatusCode) || abnormalStatusCode < 400) {
    issues.push(`abnormalStatusCode ${abnormalStatusCode} must be an error status`);
  }
  if (!isStatusCode(abortedStatusCode) || abortedStatusCode < 400) {
    issues.push(`abortedStatusCode ${abortedStatusCode} must be an error status`);
  }

  if (issues.length > 0) {
    throw new HttpMetricsConfigError(issues);
  }

  const config: HttpMetricsConfig = {
    names: Object.freeze(names),
    labels: Object.freeze(labels),
    constLabels: Object.freeze(constLabels),
    unmatchedRoutePolicy: Object.freeze(unmatchedRoutePolicy),
    exclude: Object.freeze({
      routes: new Set(input.exclude?.routes ?? []),
      routePatterns: Object.freeze(routePatterns),
      statusCodes: excludedStatusCodes,
    }),
    instrument: input.instrument ?? 'histogram',
    durationBuckets: Object.freeze([...durationBuckets]),
    bodySizeBuckets: Object.freeze([...bodySizeBuckets]),
    abnormalStatusCode,
    abortedStatusCode,
  };

  return Object.freeze(config);
}

export interface HttpMetricsConfigBuilder {
  namespace(value: string): HttpMetricsConfigBuilder;
  constLabels(labels: Record<string, string>): HttpMetricsConfigBuilder;
  requestDurationName(name: string): HttpMetricsConfigBuilder;
  requestBodySizeName(name: string): HttpMetricsConfigBuilder;
  responseBodySizeName(name: string): HttpMetricsConfigBuilder;
  activeRequestsName(name: string): HttpMetricsConfigBuilder;
  labels(labels: Partial<HttpMetricLabelNames>): HttpMetricsConfigBuilder;
  /** Replaces the route label of requests no route matched. Defaults to `UNKNOWN`. */
  maskUnmatchedRoutes(label: string): HttpMetricsConfigBuilder;
  /**
   * Passes the raw path of unmatched requests through as the route label.
   * Any client can then create new label values.
   */
  disableUnmatchedRouteMasking(): HttpMetricsConfigBuilder;
  exclude(route: string): HttpMetricsConfigBuilder;
  excludeRegex(pattern: string | RegExp): HttpMetricsConfigBuilder;
  excludeStatus(statusCode: number): HttpMetricsConfigBuilder;
  instrument(kind: ObservationInstrument): HttpMetricsConfigBuilder;
  durationBuckets(buckets: readonly number[]): HttpMetricsConfigBuilder;
  bodySizeBuckets(buckets: readonly number[]): HttpMetricsConfigBuilder;
  abnormalStatusCode(statusCode: number): HttpMetricsConfigBuilder;
  abortedStatusCode(statusCode: number): HttpMetricsConfigBuilder;
  build(): HttpMetricsConfig;
}

export function createHttpMetricsConfigBuilder(
  input: HttpMetricsConfigInput = {},
): HttpMetricsConfigBuilder {
  const next = (patch: HttpMetricsConfigInput) =>
    createHttpMetricsConfigBuilder({ ...input, ...patch });
  const rename = (patch: Partial<HttpMetricNames>) => next({ names: { ...input.names, ...patch } });
  const exclusions = input.exclude ?? {};

  return {
    namespace: (value) => next({ namespace: value }),
    constLabels: (labels) => next({ constLabels: { ...input.constLabels, ...labels } }),
    requestDurationName: (name) => rename({ requestDuration: name }),
    requestBodySizeName: (name) => rename({ requestBodySize: name }),
    responseBodySizeName: (name) => rename({ responseBodySize: name }),
    activeRequestsName: (name) => rename({ activeRequests: name }),
    labels: (labels) => next({ labels: { ...input.labels, ...labels } }),
    maskUnmatchedRoutes: (label) => next({ unmatchedRoutePolicy: { kind: 'mask', label } }),
    disableUnmatchedRouteMasking: () => next({ unmatchedRoutePolicy: { kind: 'disabled' } }),
    exclude: (route) =>
      next({ exclude: { ...exclusions, routes: [...(exclusions.routes ?? []), route] } }),
    excludeRegex: (pattern) =>
      next({
        exclude: { ...exclusions, routePatterns: [...(exclusions.routePatterns ?? []), pattern] },
      }),
    excludeStatus: (statusCode) =>
      next({
        exclude: { ...exclusions, statusCodes: [...(exclusions.statusCodes ?? []), statusCode] },
      }),
    instrument: (kind) => next({ instrument: kind }),
    durationBuckets: (buckets) => next({ durationBuckets: buckets }),
    bodySizeBuckets: (buckets) => next({ bodySizeBuckets: buckets }),
    abnormalStatusCode: (statusCode) => next({ abnormalStatusCode: statusCode }),
    abortedStatusCode: (statusCode) => next({ abortedStatusCode: statusCode }),
    build: () => createHttpMetricsConfig(input),
  };
}
