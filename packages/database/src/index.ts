/**
 * @app/database
 *
 * - pg Pool factory
 * - CatalogStore: the loader's only route to PostgreSQL
 */

export { createDbPool, closePool, isInsufficientPrivilege } from './db.js';

export { PgCatalogStore } from './catalog-store.js';
export type { CatalogStore, CatalogTransaction, EnsureSchemaOptions } from './catalog-store.js';
