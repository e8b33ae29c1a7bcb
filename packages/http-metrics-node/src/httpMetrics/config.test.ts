import { describe, expect, it } from 'vitest';
import {
  createHttpMetricsConfig,
  createHttpMetricsConfigBuilder,
  defaultBodySizeBuckets,
  defaultDurationBuckets,
} from './config.js';
import { HttpMetricsConfigError } from './errors.js';

describe('createHttpMetricsConfig', () => {
  it('uses the default names, labels and unmatched route mask', () => {
    const config = createHttpMetricsConfig();

    expect(config.names).toEqual({
      requestDuration: 'http_server_request_duration',
      requestBodySize: 'http_server_request_body_size',
      responseBodySize: 'http_server_response_body_size',
      activeRequests: 'http_server_active_requests',
    });
    expect(config.labels).toEqual({
      route: 'http_route',
      method: 'http_request_method',
      status: 'http_response_status_code',
      protocolName: 'network_protocol_name',
      protocolVersion: 'network_protocol_version',
      scheme: 'url_scheme',
    });
    expect(config.unmatchedRoutePolicy).toEqual({ kind: 'mask', label: 'UNKNOWN' });
    expect(config.instrument).toBe('histogram');
    expect(config.durationBuckets).toEqual(defaultDurationBuckets);
    expect(config.bodySizeBuckets).toEqual(defaultBodySizeBuckets);
    expect(config.abnormalStatusCode).toBe(500);
    expect(config.abortedStatusCode).toBe(499);
  });

  it('prefixes every metric name with the namespace', () => {
    const config = createHttpMetricsConfig({
      namespace: 'checkout',
      names: { activeRequests: 'inflight' },
    });

    expect(config.names.requestDuration).toBe('checkout_http_server_request_duration');
    expect(config.names.activeRequests).toBe('checkout_inflight');
  });

  it('freezes the configuration', () => {
    const config = createHttpMetricsConfig({ constLabels: { region: 'eu' } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.names)).toBe(true);
    expect(Object.isFrozen(config.constLabels)).toBe(true);
    expect(Object.isFrozen(config.durationBuckets)).toBe(true);
  });

  it('compiles string route patterns', () => {
    const config = createHttpMetricsConfig({ exclude: { routePatterns: ['^/internal/'] } });

    expect(config.exclude.routePatterns).toHaveLength(1);
    expect(config.exclude.routePatterns[0].test('/internal/jobs')).toBe(true);
  });

  it('reports every problem in one error', () => {
    let caught: unknown;
    try {
      createHttpMetricsConfig({
        names: { requestDuration: 'bad-name' },
        labels: { route: '__route' },
        constLabels: { http_request_method: 'GET' },
        exclude: { statusCodes: [42], routePatterns: ['('] },
        durationBuckets: [1, 0.5],
        bodySizeBuckets: [],
        abortedStatusCode: 200,
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(HttpMetricsConfigError);
    if (!(caught instanceof HttpMetricsConfigError)) {
      return;
    }
    expect(caught.issues).toEqual([
      "metric name 'bad-name' must match [a-zA-Z_:][a-zA-Z0-9_:]*",
      "label name '__route' is reserved",
      "const label 'http_request_method' collides with a request label",
      'excluded status 42 is not an HTTP status code',
      "exclude pattern '(' is not a valid regular expression",
      'durationBuckets must be finite and strictly increasing',
      'bodySizeBuckets must not be empty',
      'abortedStatusCode 200 must be an error status',
    ]);
    expect(caught.message).toBe(`Invalid HTTP metrics configuration: ${caught.issues.join('; ')}`);
  });

  it('rejects duplicate metric and label names', () => {
    expect(() =>
      createHttpMetricsConfig({
        names: { requestBodySize: 'bytes', responseBodySize: 'bytes' },
      }),
    ).toThrow('metric names must be distinct');
    expect(() => createHttpMetricsConfig({ labels: { scheme: 'http_route' } })).toThrow(
      'label names must be distinct',
    );
  });

  it('rejects an empty unmatched route mask', () => {
    expect(() =>
      createHttpMetricsConfig({ unmatchedRoutePolicy: { kind: 'mask', label: '' } }),
    ).toThrow('unmatched route mask must not be empty');
  });
});

describe('createHttpMetricsConfigBuilder', () => {
  it('accumulates settings across calls', () => {
    const config = createHttpMetricsConfigBuilder()
      .namespace('api')
      .requestDurationName('latency')
      .constLabels({ region: 'eu' })
      .constLabels({ zone: 'a' })
      .exclude('/health')
      .exclude('/ready')
      .excludeRegex(/^\/debug/)
      .excludeStatus(404)
      .disableUnmatchedRouteMasking()
      .instrument('summary')
      .build();

    expect(config.names.requestDuration).toBe('api_latency');
    expect(config.constLabels).toEqual({ region: 'eu', zone: 'a' });
    expect([...config.exclude.routes]).toEqual(['/health', '/ready']);
    expect(config.exclude.routePatterns.map(String)).toEqual(['/^\\/debug/']);
    expect([...config.exclude.statusCodes]).toEqual([404]);
    expect(config.unmatchedRoutePolicy).toEqual({ kind: 'disabled' });
    expect(config.instrument).toBe('summary');
  });

  it('does not change earlier builders', () => {
    const base = createHttpMetricsConfigBuilder().exclude('/health');
    base.exclude('/ready');

    expect([...base.build().exclude.routes]).toEqual(['/health']);
  });

  it('masks unmatched routes with a custom label', () => {
    const config = createHttpMetricsConfigBuilder().maskUnmatchedRoutes('unmatched').build();

    expect(config.unmatchedRoutePolicy).toEqual({ kind: 'mask', label: 'unmatched' });
  });

  it('validates on build', () => {
    expect(() => createHttpMetricsConfigBuilder().abnormalStatusCode(302).build()).toThrow(
      HttpMetricsConfigError,
    );
  });
});
