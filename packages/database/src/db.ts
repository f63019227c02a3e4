/**
 * Database connection: pg Pool + transaction helper.
 *
 * The loader holds one connection per batch transaction, so the default pool
 * size is 1 (DB_POOL_SIZE). Connection timeouts are a pool property; nothing
 * above this layer cancels an in-flight query.
 */

import pg from 'pg';

import type { DatabaseConfig } from '@app/config';

const { Pool } = pg;

// ============================================
// NARROW CLIENT SHAPES
// ============================================

export type QueryOutcome = Readonly<{
  rows: unknown[];
  rowCount: number | null;
}>;

/** The part of pg.PoolClient the loader uses. */
export type SqlClient = Readonly<{
  query: (text: string, values?: unknown[]) => Promise<QueryOutcome>;
}>;

export type PooledSqlClient = SqlClient &
  Readonly<{
    release: (err?: Error | boolean) => void;
  }>;

export type ConnectablePool = Readonly<{
  connect: () => Promise<PooledSqlClient>;
}>;

// ============================================
// POOL
// ============================================

export function createDbPool(config: DatabaseConfig): pg.Pool {
  const common: pg.PoolConfig = {
    max: config.poolSize,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
    application_name: 'catalog-loader',
  };

  if (config.kind === 'url') {
    return new Pool({ ...common, connectionString: config.connectionString });
  }

  return new Pool({
    ...common,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
  });
}

/**
 * Round-trips `SELECT 1`. Throws the driver error when the server is not
 * reachable or rejects the credentials.
 */
export async function assertDatabaseReachable(pool: ConnectablePool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1 AS health');
  } finally {
    client.release();
  }
}

export async function closePool(pool: pg.Pool): Promise<void> {
  await pool.end();
}

// ============================================
// TRANSACTIONS
// ============================================

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated pooled connection.
 * Any error rolls the transaction back and is rethrown unchanged.
 *
 * @example
 * ```ts
 * const upserted = await withTransaction(pool, async (client) => {
 *   await client.query('DELETE FROM tiki_product_images WHERE product_id = ANY($1::bigint[])', [ids]);
 *   return ids.length;
 * });
 * ```
 */
export async function withTransaction<T>(
  pool: ConnectablePool,
  fn: (client: SqlClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let releaseError: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    releaseError = await safeRollback(client);
    throw error;
  } finally {
    // A connection whose ROLLBACK failed is destroyed instead of returned.
    client.release(releaseError);
  }
}

async function safeRollback(client: SqlClient): Promise<Error | undefined> {
  try {
    await client.query('ROLLBACK');
    return undefined;
  } catch (rollbackError) {
    return rollbackError instanceof Error ? rollbackError : new Error('rollback_failed');
  }
}

// ============================================
// ERROR INSPECTION
// ============================================

/** SQLSTATE of a pg DatabaseError, if the value carries one. */
export function readSqlState(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code) ? code : undefined;
}

export function isInsufficientPrivilege(error: unknown): boolean {
  return readSqlState(error) === '42501';
}
