import { ConfigError } from '@app/config';

/**
 * Groups rows into arrays of at most `batchSize`, in arrival order.
 *
 * The returned generator is lazy and single-pass: it pulls from `source` only
 * as batches are requested, and the final partial batch is always yielded.
 * Batches ignore file boundaries.
 */
export function accumulateBatches<T>(
  source: Iterable<T> | AsyncIterable<T>,
  batchSize: number
): AsyncGenerator<T[], void, undefined> {
  if (!Number.isSafeInteger(batchSize) || batchSize <= 0) {
    throw new ConfigError('INGEST_BATCH_SIZE', `Invalid batch size: ${batchSize}`);
  }
  return batches(source, batchSize);
}

async function* batches<T>(
  source: Iterable<T> | AsyncIterable<T>,
  batchSize: number
): AsyncGenerator<T[], void, undefined> {
  let current: T[] = [];
  for await (const row of source) {
    current.push(row);
    if (current.length >= batchSize) {
      yield current;
      current = [];
    }
  }
  if (current.length > 0) {
    yield current;
  }
}
