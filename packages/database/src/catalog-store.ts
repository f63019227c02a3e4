import type { CatalogProduct, CatalogProductImage } from '@app/types';

import {
  assertDatabaseReachable,
  withTransaction,
  type ConnectablePool,
  type SqlClient,
} from './db.js';
import {
  DDL_PRODUCTS,
  DDL_PRODUCT_IMAGES,
  DELETE_PRODUCT_IMAGES_SQL,
  INSERT_PRODUCT_IMAGES_SQL,
  UPSERT_PRODUCTS_SQL,
} from './schema/catalog.js';

export type EnsureSchemaOptions = Readonly<{
  normalizeImages: boolean;
}>;

/** Writes available inside one store transaction. */
export interface CatalogTransaction {
  /** Insert-or-update every row by id. Ids must be unique within one call. */
  upsertProducts(rows: readonly CatalogProduct[], ingestedAt: Date): Promise<number>;
  /**
   * Deletes every image of `productIds`, then inserts `images`.
   * Returns the number of image rows inserted.
   */
  replaceImages(
    productIds: readonly number[],
    images: readonly CatalogProductImage[]
  ): Promise<number>;
}

export interface CatalogStore {
  /** Fails when the store cannot be reached. */
  ping(): Promise<void>;
  ensureSchema(options: EnsureSchemaOptions): Promise<void>;
  /** Commits when `fn` resolves, rolls back when it rejects. */
  transaction<T>(fn: (tx: CatalogTransaction) => Promise<T>): Promise<T>;
}

export class PgCatalogStore implements CatalogStore {
  private readonly pool: ConnectablePool;

  constructor(pool: ConnectablePool) {
    this.pool = pool;
  }

  public async ping(): Promise<void> {
    await assertDatabaseReachable(this.pool);
  }

  public async ensureSchema(options: EnsureSchemaOptions): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await client.query(DDL_PRODUCTS);
      if (options.normalizeImages) {
        await client.query(DDL_PRODUCT_IMAGES);
      }
    });
  }

  public async transaction<T>(fn: (tx: CatalogTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, (client) => fn(new PgCatalogTransaction(client)));
  }
}

export class PgCatalogTransaction implements CatalogTransaction {
  private readonly client: SqlClient;

  constructor(client: SqlClient) {
    this.client = client;
  }

  public async upsertProducts(rows: readonly CatalogProduct[], ingestedAt: Date): Promise<number> {
    if (rows.length === 0) return 0;

    await this.client.query(UPSERT_PRODUCTS_SQL, [
      rows.map((r) => r.id),
      rows.map((r) => r.name),
      rows.map((r) => r.urlKey),
      rows.map((r) => r.price),
      rows.map((r) => r.description),
      rows.map((r) => JSON.stringify(r.imagesDocument)),
      rows.map((r) => r.sourceFile),
      ingestedAt,
    ]);
    return rows.length;
  }

  public async replaceImages(
    productIds: readonly number[],
    images: readonly CatalogProductImage[]
  ): Promise<number> {
    if (productIds.length === 0) return 0;

    await this.client.query(DELETE_PRODUCT_IMAGES_SQL, [[...productIds]]);
    if (images.length === 0) return 0;

    await this.client.query(INSERT_PRODUCT_IMAGES_SQL, [
      images.map((i) => i.productId),
      images.map((i) => i.position),
      images.map((i) => i.imageUrl),
    ]);
    return images.length;
  }
}
