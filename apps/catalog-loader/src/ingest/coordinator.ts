import { randomUUID } from 'node:crypto';

import type { IngestConfig } from '@app/config';
import { isInsufficientPrivilege, type CatalogStore } from '@app/database';
import { OTEL_ATTR, withSpan, type Logger } from '@app/logger';
import type { CatalogProduct } from '@app/types';

import {
  BatchFailure,
  ConnectionError,
  SchemaPermissionError,
  type MalformedFile,
  type MalformedRecord,
} from './errors.js';
import { accumulateBatches } from './pipeline/batch.js';
import { normalizeProductRecord } from './pipeline/normalize.js';
import { CatalogUpsertExecutor } from './pipeline/upsert-executor.js';
import { discoverProductFiles } from './sources/discover.js';
import { readProductFile } from './sources/read-product-file.js';
import type { IngestCounters, RunSummary } from './types.js';

export const DEFAULT_MAX_ISSUE_SAMPLES = 50;

export type RunCatalogIngestParams = Readonly<{
  ingest: IngestConfig;
  store: CatalogStore;
  logger: Logger;
  /** Source of `ingested_at`; read once per batch. */
  clock?: () => Date;
  /** Names the store in ConnectionError messages. */
  storeLabel?: string;
  /** Cap on malformed records kept in the summary. The count is never capped. */
  maxIssueSamples?: number;
}>;

/**
 * One loader run: discover → prepare schema → read → normalize → batch → upsert.
 *
 * Malformed files and records are collected and the run continues. A failed
 * batch stops the run; earlier batches stay committed and the partial summary
 * is returned with `aborted` set. Every other failure is thrown.
 */
export async function runCatalogIngest(params: RunCatalogIngestParams): Promise<RunSummary> {
  const runId = randomUUID();
  const logger = params.logger.child({ runId });
  const { dataPath, batchSize, normalizeImages } = params.ingest;
  const maxIssueSamples = params.maxIssueSamples ?? DEFAULT_MAX_ISSUE_SAMPLES;

  const files = await discoverProductFiles(dataPath);
  logger.info(
    { dataPath, filesFound: files.length, batchSize, normalizeImages },
    'Discovered product files'
  );

  const counters: IngestCounters = {
    filesProcessed: 0,
    recordsSeen: 0,
    productsAttempted: 0,
    productsUpserted: 0,
    imagesUpserted: 0,
    batchesCommitted: 0,
    malformedRecordCount: 0,
  };
  const malformedFiles: MalformedFile[] = [];
  const malformedRecords: MalformedRecord[] = [];

  const batches = accumulateBatches(
    streamProducts({
      files,
      counters,
      logger,
      onMalformedFile: (issue) => malformedFiles.push(issue),
      onMalformedRecord: (issue) => {
        counters.malformedRecordCount += 1;
        if (malformedRecords.length < maxIssueSamples) malformedRecords.push(issue);
      },
    }),
    batchSize
  );

  await prepareStore(params.store, normalizeImages, params.storeLabel ?? 'the configured database');

  const executor = new CatalogUpsertExecutor({
    store: params.store,
    normalizeImages,
    logger,
    ...(params.clock ? { clock: params.clock } : {}),
  });

  const aborted = await withSpan(
    'catalog.ingest.run',
    {
      [OTEL_ATTR.INGEST_RUN_ID]: runId,
      [OTEL_ATTR.INGEST_NORMALIZE_IMAGES]: normalizeImages,
    },
    async (): Promise<BatchFailure | null> => {
      try {
        for await (const batch of batches) {
          const outcome = await executor.applyBatch(batch);
          counters.batchesCommitted += 1;
          counters.productsUpserted += outcome.productsUpserted;
          counters.imagesUpserted += outcome.imagesUpserted;
        }
        return null;
      } catch (error) {
        if (!(error instanceof BatchFailure)) throw error;
        logger.error(
          {
            batchIndex: error.batchIndex,
            batchSize: error.productIds.length,
            error,
          },
          'Batch failed, aborting run'
        );
        return error;
      }
    }
  );

  const summary: RunSummary = {
    runId,
    dataPath,
    normalizeImages,
    filesFound: files.length,
    filesProcessed: counters.filesProcessed,
    malformedFiles,
    recordsSeen: counters.recordsSeen,
    productsAttempted: counters.productsAttempted,
    productsUpserted: counters.productsUpserted,
    imagesUpserted: normalizeImages ? counters.imagesUpserted : null,
    batchesCommitted: counters.batchesCommitted,
    malformedRecordCount: counters.malformedRecordCount,
    malformedRecords,
    totalErrors: malformedFiles.length + counters.malformedRecordCount + (aborted ? 1 : 0),
    aborted,
  };

  logger.info(
    {
      filesProcessed: summary.filesProcessed,
      productsUpserted: summary.productsUpserted,
      imagesUpserted: summary.imagesUpserted,
      batchesCommitted: summary.batchesCommitted,
      totalErrors: summary.totalErrors,
      aborted: aborted !== null,
    },
    'Catalog ingest finished'
  );

  return summary;
}

async function prepareStore(
  store: CatalogStore,
  normalizeImages: boolean,
  storeLabel: string
): Promise<void> {
  try {
    await store.ping();
  } catch (error) {
    throw new ConnectionError(storeLabel, error);
  }

  try {
    await store.ensureSchema({ normalizeImages });
  } catch (error) {
    if (isInsufficientPrivilege(error)) {
      throw new SchemaPermissionError(error);
    }
    throw new ConnectionError(storeLabel, error);
  }
}

type StreamProductsParams = Readonly<{
  files: readonly string[];
  counters: IngestCounters;
  logger: Logger;
  onMalformedFile: (issue: MalformedFile) => void;
  onMalformedRecord: (issue: MalformedRecord) => void;
}>;

/**
 * Valid products of every file, in file order then record order. Each file is
 * read whole before its first record is yielded.
 */
async function* streamProducts(params: StreamProductsParams): AsyncGenerator<CatalogProduct> {
  const { counters, logger } = params;

  for (const filePath of params.files) {
    const content = await readProductFile(filePath);
    counters.filesProcessed += 1;

    if (content.syntaxError) {
      params.onMalformedFile(content.syntaxError);
      logger.error(
        {
          sourceFile: content.file,
          line: content.syntaxError.line,
          column: content.syntaxError.column,
          recordsBeforeError: content.records.length,
        },
        content.syntaxError.message
      );
    }

    let loaded = 0;
    let skipped = 0;

    for (const record of content.records) {
      counters.recordsSeen += 1;
      const result = normalizeProductRecord(record.value, {
        sourceFile: content.file,
        index: record.index,
        line: record.line,
      });

      if (!result.ok) {
        skipped += 1;
        params.onMalformedRecord(result.error);
        logger.debug(
          { sourceFile: content.file, reason: result.error.reason },
          result.error.message
        );
        continue;
      }

      loaded += 1;
      counters.productsAttempted += 1;
      yield result.product;
    }

    if (skipped > 0) {
      logger.warn(
        { sourceFile: content.file, skipped },
        `Skipped ${skipped} malformed record(s) in ${content.file}`
      );
    }
    logger.info(
      { sourceFile: content.file, format: content.format, loaded },
      `Loaded ${loaded} products from ${content.file}`
    );
  }
}
