import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryDatabase } from '../memory/database';
import { AuthHandlers, errorBody, reasonPhrase } from './handlers';
import type { AuthResponse } from './handlers';
import { AuthService } from './service';

const NOW = new Date('2026-05-01T12:00:00.000Z');

function tokenSetBy<B>(response: AuthResponse<B>): string {
  if (response.session?.action !== 'set') {
    throw new Error('Expected the response to set a session');
  }
  return response.session.token;
}

describe('AuthHandlers', () => {
  let database: InMemoryDatabase;
  let handlers: AuthHandlers;

  beforeEach(() => {
    database = new InMemoryDatabase(() => NOW);
    handlers = new AuthHandlers(new AuthService(database, { hashIterations: 1000 }));
  });

  it('reports health', () => {
    expect(handlers.healthcheck()).toEqual({ status: 200, body: { status: 'ok' } });
  });

  it('walks through register, login, current user and logout', async () => {
    const credentials = { username: 'alice', password: 'secret1' };

    expect(await handlers.register(credentials)).toEqual({
      status: 201,
      body: { message: 'Registration successful', username: 'alice' },
    });

    expect(await handlers.register(credentials)).toEqual({
      status: 400,
      body: { error: 'Bad Request', message: 'Username already exists' },
    });

    expect(await handlers.login({ username: 'alice', password: 'wrongpass' })).toEqual({
      status: 401,
      body: { error: 'Unauthorized', message: 'Invalid username or password' },
    });

    const login = await handlers.login(credentials);
    expect(login.status).toBe(200);
    expect(login.body).toEqual({ message: 'Login successful', username: 'alice' });
    const token = tokenSetBy(login);

    expect(await handlers.currentUser(token)).toEqual({
      status: 200,
      body: { id: 1, username: 'alice', created_at: '2026-05-01T12:00:00.000Z' },
    });

    expect(await handlers.logout(token)).toEqual({
      status: 200,
      body: { message: 'Logout successful' },
      session: { action: 'clear' },
    });

    expect(await handlers.currentUser(token)).toEqual({
      status: 401,
      body: { error: 'Unauthorized', message: 'Authentication required' },
    });
  });

  it('answers an unknown user exactly like a wrong password', async () => {
    await handlers.register({ username: 'alice', password: 'secret1' });

    const wrongPassword = await handlers.login({ username: 'alice', password: 'wrongpass' });
    const unknownUser = await handlers.login({ username: 'nobody', password: 'wrongpass' });

    expect(unknownUser.status).toBe(wrongPassword.status);
    expect(JSON.stringify(unknownUser.body)).toBe(JSON.stringify(wrongPassword.body));
    expect(unknownUser.session).toBeUndefined();
    expect(wrongPassword.session).toBeUndefined();
  });

  it.each([
    [{ username: '', password: '123' }, 'Username must not be empty'],
    [{ username: '   ', password: 'secret1' }, 'Username must not be empty'],
    [{ username: 'alice', password: '12345' }, 'Password must be at least 6 characters long'],
    [{ username: 42, password: 'secret1' }, 'Username must be a string'],
    [{ username: 'alice', password: false }, 'Password must be a string'],
    [['alice', 'secret1'], 'Request body must be a JSON object'],
  ])('rejects registration payload %j', async (payload, message) => {
    expect(await handlers.register(payload)).toEqual({
      status: 400,
      body: { error: 'Bad Request', message },
    });
  });

  it('validates login payloads before checking credentials', async () => {
    expect(await handlers.login({})).toEqual({
      status: 400,
      body: { error: 'Bad Request', message: 'Username must not be empty' },
    });
  });

  it('accepts a six-character password', async () => {
    expect((await handlers.register({ username: 'carol', password: '123456' })).status).toBe(201);
  });

  it('logs out successfully without a session', async () => {
    expect(await handlers.logout(null)).toEqual({
      status: 200,
      body: { message: 'Logout successful' },
      session: { action: 'clear' },
    });
    expect(await handlers.logout('unknown-token')).toMatchObject({ status: 200 });
  });

  it('requires authentication for the current user', async () => {
    expect(await handlers.currentUser(null)).toEqual({
      status: 401,
      body: { error: 'Unauthorized', message: 'Authentication required' },
    });
  });

  it('lets unexpected store failures propagate', async () => {
    const failing = new AuthHandlers(
      new AuthService(
        {
          transaction: async () => {
            throw new Error('database unavailable');
          },
          close: async () => undefined,
        },
        { hashIterations: 1000 }
      )
    );

    await expect(failing.currentUser('token')).rejects.toThrow('database unavailable');
  });
});

describe('errorBody', () => {
  it('pairs the reason phrase with the message', () => {
    expect(errorBody(404, 'Not found')).toEqual({ error: 'Not Found', message: 'Not found' });
    expect(reasonPhrase(503)).toBe('Internal Server Error');
    expect(reasonPhrase(418)).toBe('Error');
  });
});
