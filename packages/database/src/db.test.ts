import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createDbPool, isInsufficientPrivilege, readSqlState, withTransaction } from './db.js';
import { createRecordingPool } from './__tests__/helpers/recording-pool.js';

void describe('withTransaction', () => {
  void it('wraps the callback in BEGIN/COMMIT and releases the client', async () => {
    const pool = createRecordingPool();

    const result = await withTransaction(pool, async (client) => {
      await client.query('SELECT 1');
      return 'done';
    });

    assert.equal(result, 'done');
    assert.deepEqual(
      pool.queries.map((q) => q.text),
      ['BEGIN', 'SELECT 1', 'COMMIT']
    );
    assert.deepEqual(pool.releases, [undefined]);
  });

  void it('rolls back and rethrows the callback error', async () => {
    const boom = new Error('duplicate key value violates unique constraint');
    const pool = createRecordingPool({ failOn: /^INSERT/, failWith: boom });

    await assert.rejects(
      withTransaction(pool, async (client) => {
        await client.query('INSERT INTO t VALUES (1)');
      }),
      (err: unknown) => err === boom
    );

    assert.deepEqual(
      pool.queries.map((q) => q.text),
      ['BEGIN', 'INSERT INTO t VALUES (1)', 'ROLLBACK']
    );
    assert.deepEqual(pool.releases, [undefined]);
  });

  void it('destroys the connection when ROLLBACK itself fails', async () => {
    const pool = createRecordingPool({ failOn: /^INSERT/, failRollback: true });

    await assert.rejects(
      withTransaction(pool, async (client) => {
        await client.query('INSERT INTO t VALUES (1)');
      }),
      /query failed/
    );

    assert.equal(pool.releases.length, 1);
    const released = pool.releases[0];
    assert.ok(released instanceof Error);
    assert.equal(released.message, 'connection terminated');
  });
});

void describe('pg error inspection', () => {
  void it('reads SQLSTATE codes from driver errors', () => {
    const denied = Object.assign(new Error('permission denied for schema public'), {
      code: '42501',
    });

    assert.equal(readSqlState(denied), '42501');
    assert.equal(isInsufficientPrivilege(denied), true);
    assert.equal(readSqlState(Object.assign(new Error('x'), { code: 'ECONNREFUSED' })), undefined);
    assert.equal(readSqlState('42501'), undefined);
  });
});

void describe('createDbPool', () => {
  void it('builds a pool without connecting', async () => {
    const pool = createDbPool({
      kind: 'params',
      host: 'localhost',
      port: 5432,
      database: 'catalog',
      user: 'loader',
      password: 'test-secret',
      connectionTimeoutMillis: 1000,
      poolSize: 1,
    });

    assert.equal(pool.totalCount, 0);
    await pool.end();
  });
});
