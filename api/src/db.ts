import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import type { QueryResult } from 'pg';
import type { Config } from './config';
import { PgSessionStore } from './sessions/store';
import type { SessionStore } from './sessions/store';
import { PgUserStore } from './users/store';
import type { UserStore } from './users/store';

/**
 * The slice of a pg client the stores need. A `PoolClient` satisfies it, so
 * does a recording fake in tests.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

export interface PooledConnection extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool {
  connect(): Promise<PooledConnection>;
  end(): Promise<void>;
}

export interface Stores {
  users: UserStore;
  sessions: SessionStore;
}

/**
 * Runs each logical operation on one connection inside one transaction:
 * commit when `work` resolves, roll back when it throws, release always.
 */
export interface Database {
  transaction<T>(work: (stores: Stores) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createPool(database: Config['database']): Pool {
  return new Pool({
    host: database.host,
    port: database.port,
    database: database.database,
    user: database.user,
    password: database.password,
  });
}

export async function initialiseSchema(pool: Pool): Promise<void> {
  const schema = fs.readFileSync(path.join(__dirname, 'schema.sql'), 'utf8');
  await pool.query(schema);
}

export class PgDatabase implements Database {
  constructor(private readonly pool: ConnectionPool) {}

  public async transaction<T>(work: (stores: Stores) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await work({
        users: new PgUserStore(client),
        sessions: new PgSessionStore(client),
      });
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        console.error('Rollback failed:', rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }

  public async close(): Promise<void> {
    await this.pool.end();
  }
}
