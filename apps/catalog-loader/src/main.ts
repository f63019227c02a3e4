import 'dotenv/config';

import { describeDatabaseTarget, loadEnv, type AppEnv, type DatabaseConfig } from '@app/config';
import { PgCatalogStore, closePool, createDbPool } from '@app/database';
import { createLogger } from '@app/logger';

import { EXIT_CODES, exitCodeFor } from './exit-codes.js';
import { runCatalogIngest } from './ingest/coordinator.js';
import { SchemaPermissionError } from './ingest/errors.js';
import { formatRunSummary } from './ingest/summary.js';

let env: AppEnv;
try {
  env = loadEnv();
} catch (error) {
  process.stderr.write(`[ERROR] ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(exitCodeFor(error));
}

const logger = createLogger({
  service: 'catalog-loader',
  env: env.nodeEnv,
  level: env.logLevel,
});

const target = describeDatabaseTarget(env.database);
const pool = createDbPool(env.database);
pool.on('error', (error) => {
  logger.error({ error }, 'idle database client error');
});

process.once('SIGINT', () => {
  logger.warn({ signal: 'SIGINT' }, 'interrupted');
  process.exit(EXIT_CODES.INTERRUPTED);
});

try {
  const summary = await runCatalogIngest({
    ingest: env.ingest,
    store: new PgCatalogStore(pool),
    logger,
    storeLabel: target,
  });

  process.stdout.write(`${formatRunSummary(summary).join('\n')}\n`);
  process.exitCode = summary.aborted ? exitCodeFor(summary.aborted) : EXIT_CODES.OK;
} catch (error) {
  logger.fatal({ error, target }, 'catalog ingest failed');
  process.stderr.write(`[ERROR] ${error instanceof Error ? error.message : String(error)}\n`);

  if (error instanceof SchemaPermissionError) {
    const { user, database } = databaseIdentity(env.database);
    process.stderr.write('Run as a superuser:\n');
    for (const statement of error.grantStatements(user, database)) {
      process.stderr.write(`  ${statement}\n`);
    }
  }

  process.exitCode = exitCodeFor(error);
} finally {
  await closePool(pool);
}

function databaseIdentity(config: DatabaseConfig): { user: string; database: string } {
  if (config.kind === 'params') {
    return { user: config.user, database: config.database };
  }
  const url = new URL(config.connectionString);
  return {
    user: decodeURIComponent(url.username) || '<user>',
    database: url.pathname.replace(/^\//, '') || '<database>',
  };
}
