import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { getTraceContext, withSpan } from './otel-correlation.js';

void describe('withSpan', () => {
  void it('returns the callback result', async () => {
    const result = await withSpan('test.span', { 'batch.index': 0 }, () => Promise.resolve(42));
    assert.equal(result, 42);
  });

  void it('rethrows the callback error unchanged', async () => {
    const failure = new Error('boom');
    await assert.rejects(
      withSpan('test.span', {}, () => Promise.reject(failure)),
      (error: unknown) => error === failure
    );
  });

  void it('reports no trace ids without a registered SDK', async () => {
    const inside = await withSpan('test.span', {}, () => Promise.resolve(getTraceContext()));
    assert.deepEqual(inside, { traceId: undefined, spanId: undefined });
  });
});
