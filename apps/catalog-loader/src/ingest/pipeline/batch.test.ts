import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigError } from '@app/config';

import { accumulateBatches } from './batch.js';

async function collect<T>(gen: AsyncIterable<T[]>): Promise<T[][]> {
  const out: T[][] = [];
  for await (const batch of gen) out.push(batch);
  return out;
}

void describe('accumulateBatches', () => {
  void it('yields [2,2,1] for five rows and batch size 2', async () => {
    const batches = await collect(accumulateBatches([1, 2, 3, 4, 5], 2));

    assert.deepEqual(
      batches.map((b) => b.length),
      [2, 2, 1]
    );
    assert.deepEqual(batches.flat(), [1, 2, 3, 4, 5]);
  });

  void it('yields nothing for an empty source', async () => {
    assert.deepEqual(await collect(accumulateBatches([], 3)), []);
  });

  void it('does not emit an empty trailing batch on an exact multiple', async () => {
    const batches = await collect(accumulateBatches([1, 2, 3, 4], 2));
    assert.deepEqual(batches, [
      [1, 2],
      [3, 4],
    ]);
  });

  void it('pulls from the source lazily', async () => {
    const pulled: number[] = [];
    async function* source(): AsyncGenerator<number> {
      for (let i = 1; i <= 5; i += 1) {
        pulled.push(i);
        yield i;
      }
    }

    const gen = accumulateBatches(source(), 2);
    assert.deepEqual(pulled, []);

    const first = await gen.next();
    assert.deepEqual(first.value, [1, 2]);
    assert.deepEqual(pulled, [1, 2]);

    await gen.return(undefined);
    assert.deepEqual(pulled, [1, 2]);
  });

  void it('is single-pass', async () => {
    const gen = accumulateBatches([1, 2, 3], 2);
    assert.equal((await collect(gen)).length, 2);
    assert.deepEqual(await collect(gen), []);
  });

  void it('rejects a non-positive or fractional batch size', () => {
    assert.throws(() => accumulateBatches([1], 0), ConfigError);
    assert.throws(() => accumulateBatches([1], 1.5), ConfigError);
  });
});
