import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigError, type IngestConfig } from '@app/config';

import { runCatalogIngest } from '../coordinator.js';
import {
  BatchFailure,
  ConnectionError,
  NoInputFiles,
  SchemaPermissionError,
} from '../errors.js';
import {
  createFixtureDir,
  createRecordingLogger,
  ndjson,
  type FixtureDir,
} from './helpers/fixtures.js';
import { InMemoryCatalogStore, type StoreCall } from './helpers/in-memory-catalog-store.js';

const FIXED_NOW = new Date('2026-02-01T12:00:00.000Z');

function record(id: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { id, name: `Product ${id}`, url_key: `product-${id}`, price: id * 10, ...extra };
}

function upsertedIdGroups(calls: readonly StoreCall[]): number[][] {
  return calls.flatMap((c) => (c.op === 'upsertProducts' ? [[...c.ids]] : []));
}

void describe('runCatalogIngest', () => {
  let fixture: FixtureDir | undefined;

  afterEach(async () => {
    await fixture?.cleanup();
    fixture = undefined;
  });

  async function run(
    files: Record<string, string>,
    ingest: Partial<IngestConfig> = {},
    store = new InMemoryCatalogStore()
  ) {
    fixture = await createFixtureDir(files);
    const logger = createRecordingLogger();
    const summary = await runCatalogIngest({
      ingest: { dataPath: fixture.dir, batchSize: 1000, normalizeImages: false, ...ingest },
      store,
      logger,
      clock: () => FIXED_NOW,
    });
    return { summary, store, logger };
  }

  void it('skips a record without id and loads the rest of the file', async () => {
    const records = Array.from({ length: 10 }, (_, i) => record(i + 1));
    const { summary, store } = await run({
      'products_1.json': ndjson([...records, { name: 'no id here' }]),
    });

    assert.equal(summary.productsUpserted, 10);
    assert.equal(summary.recordsSeen, 11);
    assert.equal(summary.productsAttempted, 10);
    assert.equal(summary.malformedRecordCount, 1);
    assert.equal(summary.malformedRecords[0]?.reason, 'missing_id');
    assert.equal(summary.malformedRecords[0]?.line, 11);
    assert.equal(summary.totalErrors, 1);
    assert.equal(store.productIds().length, 10);
  });

  void it('reports one malformed file and still loads the others', async () => {
    const { summary, store } = await run({
      'products_1.json': ndjson([record(1), record(2)]),
      'products_2.json': '{"id": 3,\n{"id": 4}\n',
      'products_3.json': ndjson([record(5)]),
    });

    assert.equal(summary.filesFound, 3);
    assert.equal(summary.filesProcessed, 3);
    assert.equal(summary.malformedFiles.length, 1);
    assert.equal(summary.malformedFiles[0]?.file, 'products_2.json');
    assert.equal(summary.malformedFiles[0]?.line, 2);
    assert.equal(summary.malformedFiles[0]?.column, 1);
    assert.deepEqual(store.productIds(), [1, 2, 5]);
    assert.equal(summary.aborted, null);
  });

  void it('sends batches of [2,2,1] and every record exactly once', async () => {
    const { summary, store } = await run(
      {
        'products_1.json': ndjson([record(1), record(2), record(3)]),
        'products_2.json': ndjson([record(4), record(5)]),
      },
      { batchSize: 2 }
    );

    assert.deepEqual(upsertedIdGroups(store.calls), [[1, 2], [3, 4], [5]]);
    assert.equal(summary.batchesCommitted, 3);
    assert.equal(store.committedTransactions(), 3);
  });

  void it('stores an omitted price as null and stamps the batch time', async () => {
    const { store } = await run({
      'products_1.json': ndjson([{ id: 7, name: 'No price' }, record(8)]),
    });

    assert.equal(store.product(7)?.price, null);
    assert.equal(store.product(8)?.price, '80');
    assert.equal(store.product(7)?.ingestedAt, FIXED_NOW);
    assert.equal(store.product(7)?.sourceFile, 'products_1.json');
  });

  void it('reconciles images of an id seen in two files of one batch', async () => {
    const { summary, store } = await run(
      {
        'products_1.json': ndjson([record(2, { images: ['a.jpg', 'b.jpg'] })]),
        'products_2.json': ndjson([record(2, { images: ['c.jpg'] })]),
      },
      { normalizeImages: true }
    );

    assert.deepEqual(store.imagesOf(2), ['c.jpg']);
    assert.equal(store.imageRowCount(), 1);
    assert.equal(summary.productsUpserted, 2);
    assert.equal(summary.imagesUpserted, 3);
  });

  void it('reports images as null when normalization is off', async () => {
    const { summary, store } = await run({
      'products_1.json': ndjson([record(1, { images: ['a.jpg'] })]),
    });

    assert.equal(summary.imagesUpserted, null);
    assert.equal(store.hasImagesTable(), false);
  });

  void it('aborts on a failed batch and keeps earlier batches committed', async () => {
    const { summary, store, logger } = await run(
      {
        'products_1.json': ndjson([record(1), record(2)]),
        'products_2.json': ndjson([record(3), record(4)]),
        'products_3.json': ndjson([record(5)]),
      },
      { batchSize: 2 },
      new InMemoryCatalogStore({ failOnProductIds: [3] })
    );

    assert.ok(summary.aborted instanceof BatchFailure);
    assert.equal(summary.aborted.batchIndex, 1);
    assert.deepEqual(summary.aborted.productIds, [3, 4]);
    assert.deepEqual(store.productIds(), [1, 2]);
    assert.equal(summary.batchesCommitted, 1);
    assert.equal(summary.productsUpserted, 2);
    assert.equal(summary.filesProcessed, 2);
    assert.equal(summary.totalErrors, 1);
    assert.ok(logger.entries.some((e) => e.level === 'error' && e.message === 'Batch failed, aborting run'));
  });

  void it('raises NoInputFiles before touching the store', async () => {
    const store = new InMemoryCatalogStore();

    await assert.rejects(run({ 'notes.txt': 'nothing here' }, {}, store), NoInputFiles);
    assert.deepEqual(store.calls, []);
  });

  void it('rejects an invalid batch size before touching the store', async () => {
    const store = new InMemoryCatalogStore();

    await assert.rejects(
      run({ 'products_1.json': ndjson([record(1)]) }, { batchSize: 0 }, store),
      ConfigError
    );
    assert.deepEqual(store.calls, []);
  });

  void it('raises SchemaPermissionError when DDL is not permitted', async () => {
    const denied = Object.assign(new Error('permission denied for schema public'), {
      code: '42501',
    });

    await assert.rejects(
      run(
        { 'products_1.json': ndjson([record(1)]) },
        {},
        new InMemoryCatalogStore({ ensureSchemaError: denied })
      ),
      (error: unknown) => error instanceof SchemaPermissionError && error.cause === denied
    );
  });

  void it('raises ConnectionError when the store is unreachable', async () => {
    const store = new InMemoryCatalogStore({ pingError: new Error('connect ECONNREFUSED') });

    await assert.rejects(run({ 'products_1.json': ndjson([record(1)]) }, {}, store), ConnectionError);
    assert.deepEqual(
      store.calls.map((c) => c.op),
      ['ping']
    );
  });

  void it('keeps a capped sample of malformed records and the full count', async () => {
    fixture = await createFixtureDir({
      'products_1.json': ndjson([{ name: 'a' }, { id: 'x' }, { id: 1, price: -5 }, record(2)]),
    });

    const summary = await runCatalogIngest({
      ingest: { dataPath: fixture.dir, batchSize: 10, normalizeImages: false },
      store: new InMemoryCatalogStore(),
      logger: createRecordingLogger(),
      maxIssueSamples: 2,
    });

    assert.equal(summary.malformedRecordCount, 3);
    assert.deepEqual(
      summary.malformedRecords.map((r) => r.reason),
      ['missing_id', 'invalid_id']
    );
    assert.equal(summary.productsUpserted, 1);
  });

  void it('logs per-file progress tagged with the run id', async () => {
    const { summary, logger } = await run({
      'products_1.json': ndjson([record(1), { name: 'no id' }, record(2)]),
    });

    const loaded = logger.entries.find((e) => e.message === 'Loaded 2 products from products_1.json');
    assert.equal(loaded?.level, 'info');
    assert.equal(loaded?.context['runId'], summary.runId);

    const skipped = logger.entries.find(
      (e) => e.message === 'Skipped 1 malformed record(s) in products_1.json'
    );
    assert.equal(skipped?.level, 'warn');
  });
});
