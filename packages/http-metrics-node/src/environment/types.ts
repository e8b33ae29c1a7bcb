import type { Static, TSchema } from '@sinclair/typebox';

export interface EnvValidationIssue {
  readonly path: string;
  readonly message: string;
  readonly value?: unknown;
}

export interface EnvParserConfig {
  readonly redactSensitive?: boolean;
  readonly source?: EnvSource;
}

export interface EnvParser {
  parse<T extends TSchema>(schema: T, config?: EnvParserConfig): Static<T>;
}

export interface EnvContext<T = DefaultEnv> {
  readonly config: T;
  readonly nodeEnv: string;
}

export type EnvSource = Record<string, string | undefined>;

export interface DefaultEnv {
  PROCESS_NAME: string;
}

export type DefaultEnvContext = EnvContext<DefaultEnv>;
