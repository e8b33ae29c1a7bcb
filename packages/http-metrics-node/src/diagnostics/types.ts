export type LogSeverity = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogOutputFormat = 'json' | 'human';

export type LogSink = (line: string, severity: LogSeverity) => void;

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
  fatal(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
  createChild(scopeId: string): Logger;
}

export interface CorrelationIdGenerator {
  generateRootId(): string;
  createScopedId(parentId: string, scope: string): string;
}

export interface LogEntry {
  timestamp: string;
  severity: LogSeverity;
  message: string;
  component: string;
  correlationId?: string;
  fields?: Record<string, unknown>;
}

export interface DiagnosticConfig {
  minimumSeverity?: LogSeverity;
  outputFormat?: LogOutputFormat;
  correlationId?: string;
  defaultFields?: Record<string, unknown>;
  /**
   * Receives every formatted line. Defaults to stdout, or stderr for
   * `error` and `fatal`.
   */
  sink?: LogSink;
}

export interface DiagnosticContext {
  correlationIdGenerator: CorrelationIdGenerator;
  logger: Logger;
  createChildLogger: (correlationId: string) => Logger;
}
