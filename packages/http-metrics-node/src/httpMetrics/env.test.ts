import { describe, expect, it } from 'vitest';
import { createEnvParser } from '../environment/environment.js';
import { createHttpMetricsConfig } from './config.js';
import {
  diagnosticConfigFromEnv,
  httpMetricsConfigInputFromEnv,
  httpMetricsEnvSchema,
} from './env.js';

const parser = createEnvParser();

describe('httpMetricsEnvSchema', () => {
  it('applies defaults', () => {
    const env = parser.parse(httpMetricsEnvSchema, { source: { PROCESS_NAME: 'orders' } });

    expect(env).toEqual({
      PROCESS_NAME: 'orders',
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      LOG_FORMAT: 'json',
      HTTP_METRICS_UNMATCHED_ROUTE_MASK: 'UNKNOWN',
      HTTP_METRICS_MASK_UNMATCHED_ROUTES: true,
      HTTP_METRICS_INSTRUMENT: 'histogram',
      HTTP_METRICS_EXCLUDE_ROUTES: [],
      HTTP_METRICS_EXCLUDE_STATUS: [],
    });
  });

  it.each([
    ['HTTP_METRICS_EXCLUDE_STATUS', '[42]'],
    ['HTTP_METRICS_EXCLUDE_ROUTES', '/health'],
    ['HTTP_METRICS_MASK_UNMATCHED_ROUTES', 'maybe'],
    ['HTTP_METRICS_INSTRUMENT', 'gauge'],
    ['HTTP_METRICS_NAMESPACE', 'my-app'],
    ['LOG_LEVEL', 'verbose'],
  ])('rejects %s=%s', (key, value) => {
    expect(() =>
      parser.parse(httpMetricsEnvSchema, { source: { PROCESS_NAME: 'orders', [key]: value } }),
    ).toThrow(`  - ${key}`);
  });
});

describe('httpMetricsConfigInputFromEnv', () => {
  it('maps the defaults to the default configuration', () => {
    const env = parser.parse(httpMetricsEnvSchema, { source: { PROCESS_NAME: 'orders' } });

    expect(createHttpMetricsConfig(httpMetricsConfigInputFromEnv(env))).toEqual(
      createHttpMetricsConfig(),
    );
  });

  it('maps every variable', () => {
    const env = parser.parse(httpMetricsEnvSchema, {
      source: {
        PROCESS_NAME: 'orders',
        HTTP_METRICS_NAMESPACE: 'shop',
        HTTP_METRICS_MASK_UNMATCHED_ROUTES: 'false',
        HTTP_METRICS_INSTRUMENT: 'summary',
        HTTP_METRICS_EXCLUDE_ROUTES: '["/health","/ready"]',
        HTTP_METRICS_EXCLUDE_STATUS: '[404]',
      },
    });

    const config = createHttpMetricsConfig(httpMetricsConfigInputFromEnv(env));

    expect(config.names.requestDuration).toBe('shop_http_server_request_duration');
    expect(config.unmatchedRoutePolicy).toEqual({ kind: 'disabled' });
    expect(config.instrument).toBe('summary');
    expect([...config.exclude.routes]).toEqual(['/health', '/ready']);
    expect([...config.exclude.statusCodes]).toEqual([404]);
  });

  it('uses the configured mask label', () => {
    const env = parser.parse(httpMetricsEnvSchema, {
      source: { PROCESS_NAME: 'orders', HTTP_METRICS_UNMATCHED_ROUTE_MASK: 'unmatched' },
    });

    expect(httpMetricsConfigInputFromEnv(env).unmatchedRoutePolicy).toEqual({
      kind: 'mask',
      label: 'unmatched',
    });
  });
});

describe('diagnosticConfigFromEnv', () => {
  it('maps the logging defaults', () => {
    const env = parser.parse(httpMetricsEnvSchema, { source: { PROCESS_NAME: 'orders' } });

    expect(diagnosticConfigFromEnv(env)).toEqual({ minimumSeverity: 'info', outputFormat: 'json' });
  });

  it('maps the configured level and format', () => {
    const env = parser.parse(httpMetricsEnvSchema, {
      source: { PROCESS_NAME: 'orders', LOG_LEVEL: 'debug', LOG_FORMAT: 'human' },
    });

    expect(diagnosticConfigFromEnv(env)).toEqual({ minimumSeverity: 'debug', outputFormat: 'human' });
  });
});
