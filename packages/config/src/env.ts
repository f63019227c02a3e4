import { ConfigError } from './errors.js';

export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const DEFAULT_DB_PORT = 5432;
const DEFAULT_BATCH_SIZE = 1000;
const DEFAULT_DATA_PATH = './data';

type DatabaseTarget =
  | Readonly<{ kind: 'url'; connectionString: string }>
  | Readonly<{
      kind: 'params';
      host: string;
      port: number;
      database: string;
      user: string;
      password: string;
    }>;

export type DatabaseConfig = DatabaseTarget &
  Readonly<{
    connectionTimeoutMillis: number;
    poolSize: number;
  }>;

export type IngestConfig = Readonly<{
  /** Directory holding products_<n>.json files, or a single JSON file. */
  dataPath: string;
  batchSize: number;
  normalizeImages: boolean;
}>;

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  database: DatabaseConfig;
  ingest: IngestConfig;
}>;

type EnvSource = Record<string, string | undefined>;

function requiredString(env: EnvSource, key: string): string {
  const value = optionalString(env, key);
  if (value === undefined) {
    throw new ConfigError(key, `Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'staging', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function parseChoice<T extends string>(
  env: EnvSource,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new ConfigError(key, `Invalid ${key}: ${raw} (expected one of ${choices.join(', ')})`);
  }
  return match;
}

function parsePositiveInt(env: EnvSource, key: string, fallback: number): number {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(key, `Invalid ${key}: ${raw} (expected a positive integer)`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(key, `Invalid ${key}: ${raw} (expected a positive integer)`);
  }
  return value;
}

function parsePort(env: EnvSource, key: string): number {
  const port = parsePositiveInt(env, key, DEFAULT_DB_PORT);
  if (port > 65535) {
    throw new ConfigError(key, `Invalid ${key}: ${port}`);
  }
  return port;
}

function parseBooleanFlag(env: EnvSource, key: string, fallback = false): boolean {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(key, `Invalid ${key}: ${raw} (expected true/false)`);
}

function parseDatabaseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError('DATABASE_URL', 'Invalid URL in DATABASE_URL');
  }
  if (url.protocol !== 'postgres:' && url.protocol !== 'postgresql:') {
    throw new ConfigError('DATABASE_URL', `Invalid DATABASE_URL protocol: ${url.protocol}`);
  }
  return value;
}

function parseDatabaseTarget(env: EnvSource): DatabaseTarget {
  const url = optionalString(env, 'DATABASE_URL');
  if (url !== undefined) {
    return { kind: 'url', connectionString: parseDatabaseUrl(url) };
  }

  return {
    kind: 'params',
    host: requiredString(env, 'DB_HOST'),
    port: parsePort(env, 'DB_PORT'),
    database: requiredString(env, 'DB_NAME'),
    user: requiredString(env, 'DB_USER'),
    // An empty password is legal for trust/peer auth setups.
    password: env['DB_PASSWORD'] ?? '',
  };
}

function loadDatabaseConfig(env: EnvSource = process.env): DatabaseConfig {
  return {
    ...parseDatabaseTarget(env),
    connectionTimeoutMillis: parsePositiveInt(env, 'DB_CONNECT_TIMEOUT_MS', 10_000),
    poolSize: parsePositiveInt(env, 'DB_POOL_SIZE', 1),
  };
}

function loadIngestConfig(env: EnvSource = process.env): IngestConfig {
  return {
    dataPath: optionalString(env, 'INGEST_DATA_PATH') ?? DEFAULT_DATA_PATH,
    batchSize: parsePositiveInt(env, 'INGEST_BATCH_SIZE', DEFAULT_BATCH_SIZE),
    normalizeImages: parseBooleanFlag(env, 'INGEST_NORMALIZE_IMAGES'),
  };
}

export function loadEnv(env: EnvSource = process.env): AppEnv {
  return Object.freeze({
    nodeEnv: parseChoice(env, 'NODE_ENV', NODE_ENVS, 'development'),
    logLevel: parseChoice(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    database: Object.freeze(loadDatabaseConfig(env)),
    ingest: Object.freeze(loadIngestConfig(env)),
  });
}

/** Host/database label for logs; never includes credentials. */
export function describeDatabaseTarget(config: DatabaseConfig): string {
  if (config.kind === 'params') {
    return `${config.host}:${config.port}/${config.database}`;
  }
  const url = new URL(config.connectionString);
  return `${url.hostname}:${url.port || DEFAULT_DB_PORT}${url.pathname}`;
}
