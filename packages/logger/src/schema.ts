import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

import { getTraceContext } from './otel-correlation.js';
import { redactDeep, type RedactionMode } from './redaction.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

type LogMethod = (context: Record<string, unknown>, message: string) => void;

/**
 * Structured logger used across the loader. Context keys may be camelCase;
 * they are written snake_cased and passed through `redactDeep` first.
 */
export type Logger = Readonly<
  Record<LogLevel, LogMethod> & {
    /** Binds `bindings` to every line of the returned logger. */
    child: (bindings: Record<string, unknown>) => Logger;
  }
>;

export type CreateLoggerOptions = Readonly<{
  service: string;
  env: RedactionMode;
  level: LogLevel;
  version?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}>;

// pino-level backstop for values that reach it without going through redactDeep
const REDACT_PATHS = ['*.password', '*.secret', '*.token', '*.database_url', '*.connection_string'];

export function createLogger(options: CreateLoggerOptions): Logger {
  const config: pino.LoggerOptions = {
    level: options.level,
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: {
      service: options.service,
      env: options.env,
      version: options.version ?? process.env['npm_package_version'] ?? '0.0.0',
    },
    mixin: traceFields,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  const root = options.destination ? pino(config, options.destination) : pino(config);
  return wrap(root, options.env);
}

function traceFields(): Record<string, string> {
  const { traceId, spanId } = getTraceContext();
  if (!traceId || !spanId) return {};
  return { trace_id: traceId, span_id: spanId };
}

function wrap(target: PinoLogger, mode: RedactionMode): Logger {
  const prepare = (context: Record<string, unknown>): Record<string, unknown> =>
    toRecord(redactDeep(toSnakeCaseDeep(context), mode));

  const method =
    (level: LogLevel): LogMethod =>
    (context, message) => {
      target[level](prepare(context), message);
    };

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    fatal: method('fatal'),
    child: (bindings) => wrap(target.child(prepare(bindings)), mode),
  };
}

function toRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) ? { ...value } : {};
}

function toSnakeCaseDeep(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toSnakeCaseDeep);
  if (value instanceof Date) return value.toISOString();
  if (value === null || typeof value !== 'object' || value instanceof Error) return value;

  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [snakeKey(key), toSnakeCaseDeep(item)])
  );
}

/** `sourceFile` → `source_file`, `HTTPStatus` → `http_status`; snake_case passes through. */
function snakeKey(key: string): string {
  if (key.includes('_')) return key.toLowerCase();
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9]+)/g, '$1_$2')
    .toLowerCase();
}
