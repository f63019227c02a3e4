import type { CatalogStore } from '@app/database';
import { OTEL_ATTR, withSpan, type Logger } from '@app/logger';
import type { CatalogProduct, CatalogProductImage } from '@app/types';

import { BatchFailure } from '../errors.js';

export type BatchOutcome = Readonly<{
  batchIndex: number;
  productsUpserted: number;
  imagesUpserted: number;
  waves: number;
}>;

export type CatalogUpsertExecutorOptions = Readonly<{
  store: CatalogStore;
  normalizeImages: boolean;
  logger: Logger;
  /** Source of `ingested_at`; read once per batch. */
  clock?: () => Date;
}>;

/**
 * Applies batches of catalog rows, one store transaction per batch.
 *
 * Within the transaction every product is upserted by id and, when image
 * normalization is on, its image rows are deleted and re-inserted from the
 * current list. A failure rolls the whole batch back and surfaces as
 * BatchFailure.
 */
export class CatalogUpsertExecutor {
  private readonly store: CatalogStore;
  private readonly normalizeImages: boolean;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private nextBatchIndex = 0;

  constructor(options: CatalogUpsertExecutorOptions) {
    this.store = options.store;
    this.normalizeImages = options.normalizeImages;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  public async applyBatch(batch: readonly CatalogProduct[]): Promise<BatchOutcome> {
    const batchIndex = this.nextBatchIndex;
    this.nextBatchIndex += 1;

    if (batch.length === 0) {
      return { batchIndex, productsUpserted: 0, imagesUpserted: 0, waves: 0 };
    }

    const ingestedAt = this.clock();
    const waves = splitIntoUniqueIdWaves(batch);

    try {
      const outcome = await withSpan(
        'catalog.batch.apply',
        {
          [OTEL_ATTR.BATCH_INDEX]: batchIndex,
          [OTEL_ATTR.BATCH_SIZE]: batch.length,
          [OTEL_ATTR.BATCH_WAVES]: waves.length,
          [OTEL_ATTR.INGEST_NORMALIZE_IMAGES]: this.normalizeImages,
        },
        () =>
          this.store.transaction(async (tx) => {
            let productsUpserted = 0;
            let imagesUpserted = 0;
            for (const wave of waves) {
              productsUpserted += await tx.upsertProducts(wave, ingestedAt);
              if (this.normalizeImages) {
                imagesUpserted += await tx.replaceImages(
                  wave.map((p) => p.id),
                  toImageRows(wave)
                );
              }
            }
            return { batchIndex, productsUpserted, imagesUpserted, waves: waves.length };
          })
      );

      this.logger.debug(
        {
          batchIndex,
          productsUpserted: outcome.productsUpserted,
          imagesUpserted: outcome.imagesUpserted,
          waves: outcome.waves,
        },
        'batch committed'
      );
      return outcome;
    } catch (error) {
      throw new BatchFailure({
        batchIndex,
        productIds: batch.map((p) => p.id),
        cause: error,
      });
    }
  }
}

/**
 * Splits rows into consecutive groups with unique ids. A repeated id starts a
 * new group, so applying the groups in order applies every occurrence and the
 * last one wins.
 */
export function splitIntoUniqueIdWaves(rows: readonly CatalogProduct[]): CatalogProduct[][] {
  const waves: CatalogProduct[][] = [];
  let current: CatalogProduct[] = [];
  let seen = new Set<number>();

  for (const row of rows) {
    if (seen.has(row.id)) {
      waves.push(current);
      current = [];
      seen = new Set<number>();
    }
    current.push(row);
    seen.add(row.id);
  }
  if (current.length > 0) {
    waves.push(current);
  }
  return waves;
}

export function toImageRows(products: readonly CatalogProduct[]): CatalogProductImage[] {
  return products.flatMap((product) =>
    product.images.map((imageUrl, position) => ({ productId: product.id, position, imageUrl }))
  );
}
