import { Value } from '@sinclair/typebox/value';
import { TB } from '../typebox.js';
import type {
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationIssue,
} from './types.js';

const sensitiveKeyPatterns = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

function redact(key: string, value: unknown): unknown {
  return sensitiveKeyPatterns.some((pattern) => pattern.test(key)) ? '[REDACTED]' : value;
}

function schemaTypeOf(schema: TB.TSchema): string {
  if ('type' in schema && typeof schema.type === 'string') {
    return schema.type;
  }
  return 'unknown';
}

function coerce(raw: string, targetType: string): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(raw);
      return Number.isNaN(parsed) ? raw : parsed;
    }
    case 'boolean': {
      const lower = raw.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
      return raw;
    }
    case 'array':
    case 'object': {
      try {
        return JSON.parse(raw);
      } catch {
        return raw;
      }
    }
    default:
      return raw;
  }
}

// Values that cannot be coerced are passed through unchanged so the schema
// check reports them with their original text.
function coerceSource(source: EnvSource, schema: TB.TSchema): Record<string, unknown> {
  if (!TB.TypeGuard.IsObject(schema)) {
    return { ...source };
  }

  const coerced: Record<string, unknown> = {};

  for (const [key, propertySchema] of Object.entries(schema.properties)) {
    const raw = source[key];
    if (raw !== undefined && raw !== '') {
      coerced[key] = coerce(raw, schemaTypeOf(propertySchema));
    }
  }

  return coerced;
}

function collectIssues(
  schema: TB.TSchema,
  value: unknown,
  redactSensitive: boolean,
): EnvValidationIssue[] {
  return [...Value.Errors(schema, value)].map((error) => {
    const path = error.path.replace(/^\//, '').replace(/\//g, '.') || 'root';
    return {
      path,
      message: error.message,
      value: redactSensitive ? redact(path, error.value) : error.value,
    };
  });
}

export function formatEnvIssues(issues: EnvValidationIssue[]): string {
  const lines = issues.map((issue) => {
    const received = issue.value !== undefined ? `, received ${JSON.stringify(issue.value)}` : '';
    return `  - ${issue.path}: ${issue.message}${received}`;
  });

  return ['Configuration validation failed:', ...lines].join('\n');
}

export function createEnvParser(): EnvParser {
  return {
    parse<T extends TB.TSchema>(schema: T, config: EnvParserConfig = {}): TB.Static<T> {
      const redactSensitive = config.redactSensitive ?? true;
      const coerced = coerceSource(config.source ?? process.env, schema);
      const withDefaults = Value.Default(schema, coerced);

      if (Value.Check(schema, withDefaults)) {
        return withDefaults;
      }

      throw new Error(formatEnvIssues(collectIssues(schema, withDefaults, redactSensitive)));
    },
  };
}

export function createEnvContext<T extends TB.TSchema>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<TB.Static<T>> {
  const source = config?.source ?? process.env;

  return {
    config: createEnvParser().parse(schema, { ...config, source }),
    nodeEnv: source.NODE_ENV ?? 'development',
  };
}
