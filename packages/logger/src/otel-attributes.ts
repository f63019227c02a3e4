/** Span attribute keys for loader runs and batches. */
export const OTEL_ATTR = {
  INGEST_RUN_ID: 'ingest.run_id',
  INGEST_NORMALIZE_IMAGES: 'ingest.normalize_images',

  BATCH_INDEX: 'ingest.batch.index',
  BATCH_SIZE: 'ingest.batch.size',
  BATCH_WAVES: 'ingest.batch.waves',
} as const;
