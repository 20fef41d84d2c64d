import type { PublicUser } from '../users/users';
import type { AuthService, ValidationError } from './service';
import {
  AUTH_REQUIRED,
  EMPTY_USERNAME,
  INVALID_CREDENTIALS,
  INVALID_PASSWORD_TYPE,
  INVALID_PAYLOAD,
  INVALID_USERNAME_TYPE,
  isValidationError,
  MIN_PASSWORD_LENGTH,
  USERNAME_TAKEN,
  WEAK_PASSWORD,
} from './service';

/** What the transport should do with the client-held session credential. */
export type SessionInstruction = { action: 'set'; token: string } | { action: 'clear' };

export interface ErrorBody {
  error: string;
  message: string;
}

export interface AuthResponse<B> {
  status: number;
  body: B | ErrorBody;
  session?: SessionInstruction;
}

export const VALIDATION_MESSAGES: Record<ValidationError, string> = {
  [INVALID_PAYLOAD]: 'Request body must be a JSON object',
  [INVALID_USERNAME_TYPE]: 'Username must be a string',
  [INVALID_PASSWORD_TYPE]: 'Password must be a string',
  [EMPTY_USERNAME]: 'Username must not be empty',
  [WEAK_PASSWORD]: `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
};

export function errorBody(status: number, message: string): ErrorBody {
  return { error: reasonPhrase(status), message };
}

export function reasonPhrase(status: number): string {
  switch (status) {
    case 400:
      return 'Bad Request';
    case 401:
      return 'Unauthorized';
    case 404:
      return 'Not Found';
    case 415:
      return 'Unsupported Media Type';
    default:
      return status >= 500 ? 'Internal Server Error' : 'Error';
  }
}

function badRequest(message: string): AuthResponse<never> {
  return { status: 400, body: errorBody(400, message) };
}

function unauthorized(message: string): AuthResponse<never> {
  return { status: 401, body: errorBody(401, message) };
}

/**
 * The service's operations as transport-neutral responses. Unexpected
 * failures are not caught here; the HTTP layer turns them into a 500.
 */
export class AuthHandlers {
  constructor(private readonly authService: AuthService) {}

  public healthcheck(): AuthResponse<{ status: 'ok' }> {
    return { status: 200, body: { status: 'ok' } };
  }

  public async register(
    payload: unknown
  ): Promise<AuthResponse<{ message: string; username: string }>> {
    const result = await this.authService.register(payload);

    if (isValidationError(result)) {
      return badRequest(VALIDATION_MESSAGES[result]);
    }
    if (result === USERNAME_TAKEN) {
      return badRequest('Username already exists');
    }

    return {
      status: 201,
      body: { message: 'Registration successful', username: result.username },
    };
  }

  public async login(
    payload: unknown
  ): Promise<AuthResponse<{ message: string; username: string }>> {
    const result = await this.authService.login(payload);

    if (isValidationError(result)) {
      return badRequest(VALIDATION_MESSAGES[result]);
    }
    if (result === INVALID_CREDENTIALS) {
      // Same body whether or not the username exists.
      return unauthorized('Invalid username or password');
    }

    return {
      status: 200,
      body: { message: 'Login successful', username: result.username },
      session: { action: 'set', token: result.token },
    };
  }

  public async logout(token: string | null): Promise<AuthResponse<{ message: string }>> {
    await this.authService.logout(token);
    return {
      status: 200,
      body: { message: 'Logout successful' },
      session: { action: 'clear' },
    };
  }

  public async currentUser(token: string | null): Promise<AuthResponse<PublicUser>> {
    const result = await this.authService.currentUser(token);
    if (result === AUTH_REQUIRED) {
      return unauthorized('Authentication required');
    }

    return {
      status: 200,
      body: {
        id: result.id,
        username: result.username,
        created_at: result.createdAt.toISOString(),
      },
    };
  }
}
