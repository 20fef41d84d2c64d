import { describe, expect, it } from 'vitest';
import { PgDatabase } from './db';
import { FakeClient, FakePool } from './test-helpers/fake-pg';

describe('PgDatabase.transaction', () => {
  it('commits and releases when the work resolves', async () => {
    const client = new FakeClient(() => [{ id: 1 }]);
    const database = new PgDatabase(new FakePool(client));

    const id = await database.transaction((stores) => stores.users.create('alice', 'hash'));

    expect(id).toBe(1);
    expect(client.statements()[0]).toBe('BEGIN');
    expect(client.statements().at(-1)).toBe('COMMIT');
    expect(client.releaseCount).toBe(1);
  });

  it('rolls back, releases and rethrows when the work throws', async () => {
    const client = new FakeClient();
    const database = new PgDatabase(new FakePool(client));

    await expect(
      database.transaction(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(client.statements()).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.releaseCount).toBe(1);
  });

  it('keeps the original error when the rollback itself fails', async () => {
    const client = new FakeClient((text) =>
      text === 'ROLLBACK' ? new Error('rollback failed') : []
    );
    const database = new PgDatabase(new FakePool(client));

    await expect(
      database.transaction(async () => {
        throw new Error('original');
      })
    ).rejects.toThrow('original');
    expect(client.releaseCount).toBe(1);
  });

  it('ends the pool on close', async () => {
    const pool = new FakePool(new FakeClient());
    await new PgDatabase(pool).close();
    expect(pool.ended).toBe(true);
  });
});
