import { randomUUID } from 'node:crypto';
import type { DefaultEnvContext } from '../environment/types.js';
import type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  Logger,
  LogOutputFormat,
  LogSeverity,
  LogSink,
} from './types.js';

const severityRank: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const resetColor = '\x1b[0m';
const dimColor = '\x1b[90m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

export function createCorrelationIdGenerator(): CorrelationIdGenerator {
  return {
    generateRootId(): string {
      return `req-${randomUUID()}`;
    },

    createScopedId(parentId: string, scope: string): string {
      return `${parentId}.${scope}`;
    },
  };
}

function formatHuman(entry: LogEntry): string {
  const color = severityColors[entry.severity];
  const parts = [
    `${color}${entry.severity.toUpperCase()}${resetColor}`,
    `${dimColor}${entry.timestamp}${resetColor}`,
    `[${entry.component}]`,
    entry.message,
  ];

  if (entry.correlationId) {
    parts.push(`${dimColor}corr=${entry.correlationId}${resetColor}`);
  }

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    parts.push(`${key}=${rendered}`);
  }

  return parts.join(' ');
}

export function formatLogEntry(entry: LogEntry, outputFormat: LogOutputFormat): string {
  return outputFormat === 'human' ? formatHuman(entry) : JSON.stringify(entry);
}

const consoleSink: LogSink = (line, severity) => {
  if (severity === 'error' || severity === 'fatal') {
    console.error(line);
  } else {
    console.log(line);
  }
};

function describeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }

  const plain: Record<string, unknown> =
    'toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
      ? error.toErrorPlainObject()
      : {};

  return {
    ...(error.name !== 'Error' ? { errorName: error.name } : {}),
    stack: error.stack,
    ...plain,
  };
}

export function createLogger(
  component: string,
  correlationId: string | undefined,
  config: DiagnosticConfig = {},
): Logger {
  const threshold = severityRank[config.minimumSeverity ?? 'info'];
  const outputFormat = config.outputFormat ?? 'json';
  const sink = config.sink ?? consoleSink;

  function write(severity: LogSeverity, message: string, fields?: Record<string, unknown>): void {
    if (severityRank[severity] < threshold) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      component,
      ...(correlationId ? { correlationId } : {}),
      fields: { ...config.defaultFields, ...fields },
    };

    sink(formatLogEntry(entry, outputFormat), severity);
  }

  function writeError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void {
    const extraFields = typeof message === 'string' ? fields : message;
    const context = typeof message === 'string' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;

    write(severity, context ?? errorMessage ?? String(error), {
      ...describeError(error),
      ...(context && errorMessage ? { errorMessage } : {}),
      ...extraFields,
    });
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (error, message, fields) => writeError('error', error, message, fields),
    fatal: (error, message, fields) => writeError('fatal', error, message, fields),

    createChild(scopeId: string): Logger {
      return createLogger(component, correlationId ? `${correlationId}.${scopeId}` : scopeId, config);
    },
  };
}

export function createDiagnosticContext(
  envContext: DefaultEnvContext,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  const correlationIdGenerator = createCorrelationIdGenerator();
  const component = envContext.config.PROCESS_NAME;

  return {
    correlationIdGenerator,
    logger: createLogger(component, config.correlationId, config),
    createChildLogger: (correlationId: string) => createLogger(component, correlationId, config),
  };
}
