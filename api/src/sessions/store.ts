import type { Queryable } from '../db';

export interface SessionStore {
  /** Inserts, or replaces the row already holding this token. */
  create(token: string, userId: number): Promise<void>;
  /** Deleting an unknown token is not an error. */
  delete(token: string): Promise<void>;
  deleteAllForUser(userId: number): Promise<number>;
}

export class PgSessionStore implements SessionStore {
  constructor(private readonly client: Queryable) {}

  public async create(token: string, userId: number): Promise<void> {
    await this.client.query(
      `INSERT INTO sessions (token, user_id)
       VALUES ($1, $2)
       ON CONFLICT (token) DO UPDATE
       SET user_id = EXCLUDED.user_id, created_at = CURRENT_TIMESTAMP`,
      [token, userId]
    );
  }

  public async delete(token: string): Promise<void> {
    await this.client.query('DELETE FROM sessions WHERE token = $1', [token]);
  }

  public async deleteAllForUser(userId: number): Promise<number> {
    const result = await this.client.query(
      'DELETE FROM sessions WHERE user_id = $1',
      [userId]
    );
    return result.rowCount ?? 0;
  }
}
