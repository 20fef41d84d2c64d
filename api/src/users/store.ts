import type { Queryable } from '../db';
import type { StoredUser, User, UserRow } from './users';

export type UsernameExistsError = 'USERNAME_EXISTS';
export const USERNAME_EXISTS: UsernameExistsError = 'USERNAME_EXISTS';

const UNIQUE_VIOLATION = '23505';

export interface UserStore {
  /** Fails on a duplicate username through the storage constraint. */
  create(username: string, passwordHash: string): Promise<number | UsernameExistsError>;
  findByUsername(username: string): Promise<StoredUser | null>;
  findBySessionToken(token: string): Promise<User | null>;
  /** Deleting a user deletes its sessions. */
  delete(userId: number): Promise<boolean>;
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION
  );
}

export class PgUserStore implements UserStore {
  constructor(private readonly client: Queryable) {}

  public async create(
    username: string,
    passwordHash: string
  ): Promise<number | UsernameExistsError> {
    try {
      const result = await this.client.query(
        `INSERT INTO users (username, password_hash)
         VALUES ($1, $2)
         RETURNING id`,
        [username, passwordHash]
      );
      const row: Pick<UserRow, 'id'> | undefined = result.rows[0];
      if (row === undefined) {
        throw new Error('Insert into users returned no row');
      }
      return row.id;
    } catch (error) {
      if (isUniqueViolation(error)) {
        return USERNAME_EXISTS;
      }
      throw error;
    }
  }

  public async findByUsername(username: string): Promise<StoredUser | null> {
    const result = await this.client.query(
      `SELECT id, username, password_hash, created_at
       FROM users
       WHERE username = $1`,
      [username]
    );
    const row: UserRow | undefined = result.rows[0];
    if (row === undefined) {
      return null;
    }

    return {
      id: row.id,
      username: row.username,
      passwordHash: row.password_hash,
      createdAt: row.created_at,
    };
  }

  public async findBySessionToken(token: string): Promise<User | null> {
    const result = await this.client.query(
      `SELECT u.id, u.username, u.created_at
       FROM sessions s
       JOIN users u ON s.user_id = u.id
       WHERE s.token = $1`,
      [token]
    );
    const row: Omit<UserRow, 'password_hash'> | undefined = result.rows[0];
    if (row === undefined) {
      return null;
    }

    return {
      id: row.id,
      username: row.username,
      createdAt: row.created_at,
    };
  }

  public async delete(userId: number): Promise<boolean> {
    const result = await this.client.query('DELETE FROM users WHERE id = $1', [userId]);
    return (result.rowCount ?? 0) > 0;
  }
}
