import type { Database, Stores } from '../db';
import type { Session } from '../sessions/sessions';
import type { SessionStore } from '../sessions/store';
import type { StoredUser, User } from '../users/users';
import { USERNAME_EXISTS } from '../users/store';
import type { UserStore, UsernameExistsError } from '../users/store';

interface MemoryState {
  users: Map<number, StoredUser>;
  userIdsByUsername: Map<string, number>;
  sessions: Map<string, Session>;
  nextUserId: number;
}

function emptyState(): MemoryState {
  return {
    users: new Map(),
    userIdsByUsername: new Map(),
    sessions: new Map(),
    nextUserId: 1,
  };
}

function cloneState(state: MemoryState): MemoryState {
  return {
    users: new Map(state.users),
    userIdsByUsername: new Map(state.userIdsByUsername),
    sessions: new Map(state.sessions),
    nextUserId: state.nextUserId,
  };
}

class InMemorySessionStore implements SessionStore {
  constructor(
    private readonly state: MemoryState,
    private readonly now: () => Date
  ) {}

  public async create(token: string, userId: number): Promise<void> {
    if (!this.state.users.has(userId)) {
      throw new Error(`Session references unknown user ${userId}`);
    }
    this.state.sessions.set(token, { token, userId, createdAt: this.now() });
  }

  public async delete(token: string): Promise<void> {
    this.state.sessions.delete(token);
  }

  public async deleteAllForUser(userId: number): Promise<number> {
    let deleted = 0;
    for (const [token, session] of this.state.sessions) {
      if (session.userId === userId) {
        this.state.sessions.delete(token);
        deleted++;
      }
    }
    return deleted;
  }
}

class InMemoryUserStore implements UserStore {
  constructor(
    private readonly state: MemoryState,
    private readonly sessions: SessionStore,
    private readonly now: () => Date
  ) {}

  public async create(
    username: string,
    passwordHash: string
  ): Promise<number | UsernameExistsError> {
    if (this.state.userIdsByUsername.has(username)) {
      return USERNAME_EXISTS;
    }

    const id = this.state.nextUserId++;
    this.state.users.set(id, { id, username, passwordHash, createdAt: this.now() });
    this.state.userIdsByUsername.set(username, id);
    return id;
  }

  public async findByUsername(username: string): Promise<StoredUser | null> {
    const id = this.state.userIdsByUsername.get(username);
    if (id === undefined) {
      return null;
    }
    return this.state.users.get(id) ?? null;
  }

  public async findBySessionToken(token: string): Promise<User | null> {
    const session = this.state.sessions.get(token);
    if (session === undefined) {
      return null;
    }
    const user = this.state.users.get(session.userId);
    if (user === undefined) {
      return null;
    }
    return { id: user.id, username: user.username, createdAt: user.createdAt };
  }

  public async delete(userId: number): Promise<boolean> {
    const user = this.state.users.get(userId);
    if (user === undefined) {
      return false;
    }
    await this.sessions.deleteAllForUser(userId);
    this.state.users.delete(userId);
    this.state.userIdsByUsername.delete(user.username);
    return true;
  }
}

/**
 * Process-local stand-in for PostgreSQL with the same constraints: unique
 * usernames, sessions cascading with their user, and transactions that run
 * one at a time and roll back on failure.
 */
export class InMemoryDatabase implements Database {
  private state: MemoryState = emptyState();
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly now: () => Date = () => new Date()) {}

  public transaction<T>(work: (stores: Stores) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runIsolated(work));
    // The caller observes failures through `run`; the queue only needs to advance.
    this.tail = run.catch(() => undefined);
    return run;
  }

  public async close(): Promise<void> {
    await this.tail;
  }

  public sessionCount(): number {
    return this.state.sessions.size;
  }

  private async runIsolated<T>(work: (stores: Stores) => Promise<T>): Promise<T> {
    const snapshot = cloneState(this.state);
    const sessions = new InMemorySessionStore(this.state, this.now);
    const users = new InMemoryUserStore(this.state, sessions, this.now);

    try {
      return await work({ users, sessions });
    } catch (error) {
      this.state = snapshot;
      throw error;
    }
  }
}
