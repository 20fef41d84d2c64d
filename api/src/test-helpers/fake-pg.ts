import type { QueryResult, QueryResultRow } from 'pg';
import type { ConnectionPool, PooledConnection } from '../db';

export interface RecordedQuery {
  text: string;
  values: unknown[] | undefined;
}

export type Responder = (text: string, values: unknown[] | undefined) => QueryResultRow[] | Error;

/** Records every statement and answers from `respond`; no database involved. */
export class FakeClient implements PooledConnection {
  public readonly queries: RecordedQuery[] = [];
  public releaseCount = 0;

  constructor(private readonly respond: Responder = () => []) {}

  public async query(text: string, values?: unknown[]): Promise<QueryResult> {
    this.queries.push({ text, values });
    const outcome = this.respond(text, values);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return { command: '', rowCount: outcome.length, oid: 0, fields: [], rows: outcome };
  }

  public release(): void {
    this.releaseCount++;
  }

  public statements(): string[] {
    return this.queries.map((query) => query.text.replace(/\s+/g, ' ').trim());
  }
}

export class FakePool implements ConnectionPool {
  public ended = false;

  constructor(public readonly client: FakeClient) {}

  public async connect(): Promise<PooledConnection> {
    return this.client;
  }

  public async end(): Promise<void> {
    this.ended = true;
  }
}

export function uniqueViolation(): Error {
  return Object.assign(
    new Error('duplicate key value violates unique constraint "users_username_key"'),
    { code: '23505' }
  );
}
