export { loadEnv, describeDatabaseTarget } from './env.js';
export type { AppEnv, DatabaseConfig, IngestConfig } from './env.js';
export { ConfigError } from './errors.js';
