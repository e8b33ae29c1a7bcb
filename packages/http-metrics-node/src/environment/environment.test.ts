import { type TSchema, Type } from '@sinclair/typebox';
import { describe, expect, it } from 'vitest';
import { createEnvContext, createEnvParser, formatEnvIssues } from './environment.js';
import type { EnvSource } from './types.js';

describe('createEnvParser', () => {
  const parser = createEnvParser();

  describe('parse', () => {
    it('coerces numbers, integers and booleans from strings', () => {
      const schema = Type.Object({
        PORT: Type.Number(),
        WORKERS: Type.Integer(),
        ENABLED: Type.Boolean(),
        DEBUG: Type.Boolean(),
        HOST: Type.String(),
      });

      const config = parser.parse(schema, {
        source: { PORT: '8080', WORKERS: '4', ENABLED: 'yes', DEBUG: '0', HOST: 'localhost' },
      });

      expect(config).toEqual({
        PORT: 8080,
        WORKERS: 4,
        ENABLED: true,
        DEBUG: false,
        HOST: 'localhost',
      });
    });

    it('fills in defaults for absent and empty variables', () => {
      const schema = Type.Object({
        PORT: Type.Number({ default: 3000 }),
        HOST: Type.String({ default: 'localhost' }),
      });

      const config = parser.parse(schema, { source: { HOST: '' } });

      expect(config).toEqual({ PORT: 3000, HOST: 'localhost' });
    });

    it('leaves optional variables undefined', () => {
      const schema = Type.Object({
        REQUIRED: Type.String(),
        OPTIONAL: Type.Optional(Type.String()),
      });

      const config = parser.parse(schema, { source: { REQUIRED: 'value' } });

      expect(config.REQUIRED).toBe('value');
      expect(config.OPTIONAL).toBeUndefined();
    });

    it('parses JSON arrays and objects', () => {
      const schema = Type.Object({
        ROUTES: Type.Array(Type.String()),
        LIMITS: Type.Object({ max: Type.Number() }),
      });

      const config = parser.parse(schema, {
        source: { ROUTES: '["/health","/ready"]', LIMITS: '{"max":5}' },
      });

      expect(config.ROUTES).toEqual(['/health', '/ready']);
      expect(config.LIMITS).toEqual({ max: 5 });
    });

    it('accepts a member of a literal union', () => {
      const schema = Type.Object({
        LOG_FORMAT: Type.Union([Type.Literal('json'), Type.Literal('human')]),
      });

      expect(parser.parse(schema, { source: { LOG_FORMAT: 'human' } }).LOG_FORMAT).toBe('human');
    });

    const invalidCases: Array<[string, TSchema, EnvSource]> = [
      ['a missing required variable', Type.Object({ HOST: Type.String() }), {}],
      ['a value that is not a number', Type.Object({ PORT: Type.Number() }), { PORT: 'eighty' }],
      [
        'a number outside its bounds',
        Type.Object({ PORT: Type.Number({ minimum: 1024 }) }),
        { PORT: '80' },
      ],
      [
        'a value outside a literal union',
        Type.Object({ LOG_FORMAT: Type.Union([Type.Literal('json'), Type.Literal('human')]) }),
        { LOG_FORMAT: 'xml' },
      ],
      ['malformed JSON', Type.Object({ ROUTES: Type.Array(Type.String()) }), { ROUTES: '[oops' }],
    ];

    it.each(invalidCases)('rejects %s', (_case, schema, source) => {
      expect(() => parser.parse(schema, { source })).toThrow('Configuration validation failed:');
    });

    it('redacts sensitive values in the error message', () => {
      const schema = Type.Object({ API_TOKEN: Type.Number() });

      expect(() => parser.parse(schema, { source: { API_TOKEN: 'test-secret' } })).toThrow(
        /API_TOKEN: .*, received "\[REDACTED\]"/,
      );
    });

    it('shows sensitive values when redaction is off', () => {
      const schema = Type.Object({ API_TOKEN: Type.Number() });

      expect(() =>
        parser.parse(schema, { source: { API_TOKEN: 'test-secret' }, redactSensitive: false }),
      ).toThrow('received "test-secret"');
    });
  });
});

describe('formatEnvIssues', () => {
  it('lists one issue per line', () => {
    expect(
      formatEnvIssues([
        { path: 'PORT', message: 'Expected number', value: 'eighty' },
        { path: 'HOST', message: 'Expected string' },
      ]),
    ).toBe(
      [
        'Configuration validation failed:',
        '  - PORT: Expected number, received "eighty"',
        '  - HOST: Expected string',
      ].join('\n'),
    );
  });
});

describe('createEnvContext', () => {
  const schema = Type.Object({
    PROCESS_NAME: Type.String({ minLength: 1 }),
    PORT: Type.Number(),
  });

  it('parses the configuration and reads NODE_ENV', () => {
    const context = createEnvContext(schema, {
      source: { PROCESS_NAME: 'orders', NODE_ENV: 'production', PORT: '3000' },
    });

    expect(context.config).toEqual({ PROCESS_NAME: 'orders', PORT: 3000 });
    expect(context.nodeEnv).toBe('production');
  });

  it('defaults nodeEnv to development', () => {
    const context = createEnvContext(schema, {
      source: { PROCESS_NAME: 'orders', PORT: '3000' },
    });

    expect(context.nodeEnv).toBe('development');
  });
});
