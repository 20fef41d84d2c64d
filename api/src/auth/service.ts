import type { Database } from '../db';
import { USERNAME_EXISTS } from '../users/store';
import type { User } from '../users/users';
import { DEFAULT_ITERATIONS, generateSessionToken, hashPassword, verifyPassword } from './password';

export type InvalidPayloadError = 'INVALID_PAYLOAD';
export const INVALID_PAYLOAD: InvalidPayloadError = 'INVALID_PAYLOAD';
export type InvalidUsernameTypeError = 'INVALID_USERNAME_TYPE';
export const INVALID_USERNAME_TYPE: InvalidUsernameTypeError = 'INVALID_USERNAME_TYPE';
export type InvalidPasswordTypeError = 'INVALID_PASSWORD_TYPE';
export const INVALID_PASSWORD_TYPE: InvalidPasswordTypeError = 'INVALID_PASSWORD_TYPE';
export type EmptyUsernameError = 'EMPTY_USERNAME';
export const EMPTY_USERNAME: EmptyUsernameError = 'EMPTY_USERNAME';
export type WeakPasswordError = 'WEAK_PASSWORD';
export const WEAK_PASSWORD: WeakPasswordError = 'WEAK_PASSWORD';

export type ValidationError =
  | InvalidPayloadError
  | InvalidUsernameTypeError
  | InvalidPasswordTypeError
  | EmptyUsernameError
  | WeakPasswordError;

export type UsernameTakenError = 'USERNAME_TAKEN';
export const USERNAME_TAKEN: UsernameTakenError = 'USERNAME_TAKEN';
export type InvalidCredentialsError = 'INVALID_CREDENTIALS';
export const INVALID_CREDENTIALS: InvalidCredentialsError = 'INVALID_CREDENTIALS';
export type AuthRequiredError = 'AUTH_REQUIRED';
export const AUTH_REQUIRED: AuthRequiredError = 'AUTH_REQUIRED';

export const MIN_PASSWORD_LENGTH = 6;

export interface Credentials {
  username: string;
  password: string;
}

export interface RegisteredUser {
  id: number;
  username: string;
}

export interface LoginResult {
  username: string;
  token: string;
}

export interface AuthServiceOptions {
  hashIterations?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Missing or null fields count as empty strings; anything else that is not
 * a string is a type error. The username comes back trimmed and is stored
 * and looked up in that form.
 */
export function validateCredentials(payload: unknown): Credentials | ValidationError {
  if (payload === undefined || payload === null) {
    payload = {};
  }
  if (!isRecord(payload)) {
    return INVALID_PAYLOAD;
  }

  const rawUsername = payload['username'] ?? '';
  if (typeof rawUsername !== 'string') {
    return INVALID_USERNAME_TYPE;
  }
  const rawPassword = payload['password'] ?? '';
  if (typeof rawPassword !== 'string') {
    return INVALID_PASSWORD_TYPE;
  }

  const username = rawUsername.trim();
  if (username.length === 0) {
    return EMPTY_USERNAME;
  }
  // Code points, not UTF-16 units or bytes.
  if (Array.from(rawPassword).length < MIN_PASSWORD_LENGTH) {
    return WEAK_PASSWORD;
  }

  return { username, password: rawPassword };
}

export function isValidationError(value: unknown): value is ValidationError {
  return (
    value === INVALID_PAYLOAD ||
    value === INVALID_USERNAME_TYPE ||
    value === INVALID_PASSWORD_TYPE ||
    value === EMPTY_USERNAME ||
    value === WEAK_PASSWORD
  );
}

export class AuthService {
  private readonly hashIterations: number;
  // Verified against when the username is unknown, so both failures cost one key derivation.
  private readonly unknownUserHash: string;

  constructor(
    private readonly database: Database,
    options: AuthServiceOptions = {}
  ) {
    this.hashIterations = options.hashIterations ?? DEFAULT_ITERATIONS;
    this.unknownUserHash = `${this.hashIterations}$${'0'.repeat(32)}$${'0'.repeat(64)}`;
  }

  public async register(
    payload: unknown
  ): Promise<RegisteredUser | ValidationError | UsernameTakenError> {
    const credentials = validateCredentials(payload);
    if (isValidationError(credentials)) {
      return credentials;
    }

    const passwordHash = await hashPassword(credentials.password, this.hashIterations);
    const userId = await this.database.transaction((stores) =>
      stores.users.create(credentials.username, passwordHash)
    );

    if (userId === USERNAME_EXISTS) {
      return USERNAME_TAKEN;
    }

    return { id: userId, username: credentials.username };
  }

  public async login(
    payload: unknown
  ): Promise<LoginResult | ValidationError | InvalidCredentialsError> {
    const credentials = validateCredentials(payload);
    if (isValidationError(credentials)) {
      return credentials;
    }

    return this.database.transaction(async (stores) => {
      const user = await stores.users.findByUsername(credentials.username);
      if (user === null) {
        await verifyPassword(this.unknownUserHash, credentials.password);
        return INVALID_CREDENTIALS;
      }
      if (!(await verifyPassword(user.passwordHash, credentials.password))) {
        return INVALID_CREDENTIALS;
      }

      const token = generateSessionToken();
      await stores.sessions.create(token, user.id);
      return { username: user.username, token };
    });
  }

  public async logout(token: string | null): Promise<void> {
    if (!token) {
      return;
    }
    await this.database.transaction((stores) => stores.sessions.delete(token));
  }

  public async currentUser(token: string | null): Promise<User | AuthRequiredError> {
    if (!token) {
      return AUTH_REQUIRED;
    }

    const user = await this.database.transaction((stores) =>
      stores.users.findBySessionToken(token)
    );
    return user ?? AUTH_REQUIRED;
  }
}
