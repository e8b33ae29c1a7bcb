export type UnmatchedRoutePolicy = { kind: 'mask'; label: string } | { kind: 'disabled' };

export type ObservationInstrument = 'histogram' | 'summary';

export interface HttpMetricNames {
  readonly requestDuration: string;
  readonly requestBodySize: string;
  readonly responseBodySize: string;
  readonly activeRequests: string;
}

export interface HttpMetricLabelNames {
  readonly route: string;
  readonly method: string;
  readonly status: string;
  readonly protocolName: string;
  readonly protocolVersion: string;
  readonly scheme: string;
}

export interface HttpMetricsExclusions {
  /** Final route labels that are never recorded. */
  readonly routes: ReadonlySet<string>;
  readonly routePatterns: readonly RegExp[];
  readonly statusCodes: ReadonlySet<number>;
}

export interface HttpMetricsConfig {
  readonly names: HttpMetricNames;
  readonly labels: HttpMetricLabelNames;
  readonly constLabels: Readonly<Record<string, string>>;
  readonly unmatchedRoutePolicy: UnmatchedRoutePolicy;
  readonly exclude: HttpMetricsExclusions;
  readonly instrument: ObservationInstrument;
  readonly durationBuckets: readonly number[];
  readonly bodySizeBuckets: readonly number[];
  readonly abnormalStatusCode: number;
  readonly abortedStatusCode: number;
}

export interface HttpMetricsConfigInput {
  /** Prefixes each metric name with `<namespace>_`. */
  namespace?: string;
  names?: Partial<HttpMetricNames>;
  labels?: Partial<HttpMetricLabelNames>;
  constLabels?: Record<string, string>;
  unmatchedRoutePolicy?: UnmatchedRoutePolicy;
  exclude?: {
    routes?: Iterable<string>;
    routePatterns?: Iterable<string | RegExp>;
    statusCodes?: Iterable<number>;
  };
  instrument?: ObservationInstrument;
  durationBuckets?: readonly number[];
  bodySizeBuckets?: readonly number[];
  abnormalStatusCode?: number;
  abortedStatusCode?: number;
}

/**
 * Per-request cardinality override. Path parameters named here keep their
 * matched value in the route label instead of the placeholder.
 */
export interface HttpMetricsExtension {
  readonly cardinalityKeepParams: readonly string[];
}

export type RouteParams = Readonly<Record<string, string>>;

export interface RouteLabelInput {
  /** Registered route template, absent when the router matched nothing. */
  routeTemplate?: string;
  path: string;
  params?: RouteParams;
  extension?: HttpMetricsExtension | null;
  statusCode?: number;
}

export interface ActiveRequestLabels {
  method: string;
  scheme: string;
}

export interface RequestLabels {
  route: string;
  method: string;
  status: string;
  protocolName: string;
  protocolVersion: string;
}

export interface RequestStart {
  method: string;
  path: string;
  scheme: string;
  protocolName: string;
  protocolVersion: string;
}

export interface RequestObservation extends RequestStart {
  readonly startTime: number;
  requestBodyBytes: number;
}

export interface ResponseOutcome {
  statusCode: number;
  responseBodyBytes: number;
  completedNormally: boolean;
}

export type RequestScopeState =
  | 'started'
  | 'awaitingBody'
  | 'handlerRunning'
  | 'finalizing'
  | 'done';
