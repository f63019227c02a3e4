import type { BatchFailure, MalformedFile, MalformedRecord } from './errors.js';

/** Mutated in place while a run progresses. */
export type IngestCounters = {
  filesProcessed: number;
  recordsSeen: number;
  productsAttempted: number;
  productsUpserted: number;
  imagesUpserted: number;
  batchesCommitted: number;
  malformedRecordCount: number;
};

export type RunSummary = Readonly<{
  runId: string;
  dataPath: string;
  normalizeImages: boolean;
  filesFound: number;
  filesProcessed: number;
  malformedFiles: readonly MalformedFile[];
  /** Records parsed from all files, valid or not. */
  recordsSeen: number;
  /** Records that passed normalization and entered a batch. */
  productsAttempted: number;
  /** Committed product upserts; a repeated id counts once per occurrence. */
  productsUpserted: number;
  /** Committed image rows, null when image normalization is off. */
  imagesUpserted: number | null;
  batchesCommitted: number;
  malformedRecordCount: number;
  /** The first rejected records, capped at `maxIssueSamples`. */
  malformedRecords: readonly MalformedRecord[];
  /** malformed files + malformed records + the abort, if any. */
  totalErrors: number;
  /** Set when a batch failed and the run stopped early. */
  aborted: BatchFailure | null;
}>;
