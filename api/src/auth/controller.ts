import express from 'express';
import { readSessionToken } from './cookies';
import { errorBody } from './handlers';
import type { AuthHandlers, AuthResponse } from './handlers';

export interface AuthRouterOptions {
  sessionCookieName: string;
}

const SESSION_COOKIE_OPTIONS: express.CookieOptions = {
  path: '/',
  httpOnly: true,
};

function send<B>(
  res: express.Response,
  response: AuthResponse<B>,
  cookieName: string
): void {
  if (response.session?.action === 'set') {
    // No expiry: the session lives until an explicit logout.
    res.cookie(cookieName, response.session.token, SESSION_COOKIE_OPTIONS);
  } else if (response.session?.action === 'clear') {
    res.clearCookie(cookieName, SESSION_COOKIE_OPTIONS);
  }
  res.status(response.status).json(response.body);
}

function sendInternalError(res: express.Response): void {
  res.status(500).json(errorBody(500, 'Internal Server Error'));
}

export function createAuthRouter(
  handlers: AuthHandlers,
  options: AuthRouterOptions
): express.Router {
  const router = express.Router();
  const { sessionCookieName } = options;

  const sessionTokenOf = (req: express.Request): string | null =>
    readSessionToken(req.headers.cookie, sessionCookieName);

  router.post(
    '/auth/register',
    async (req: express.Request, res: express.Response): Promise<void> => {
      try {
        console.log('Creating new user account');
        const response = await handlers.register(req.body);
        send(res, response, sessionCookieName);
      } catch (error) {
        console.error('Error creating user account:', error);
        sendInternalError(res);
      }
    }
  );

  router.post(
    '/auth/login',
    async (req: express.Request, res: express.Response): Promise<void> => {
      try {
        console.log('User attempting login');
        const response = await handlers.login(req.body);
        if (response.status !== 200) {
          console.log(`Login rejected with status ${response.status}`);
        }
        send(res, response, sessionCookieName);
      } catch (error) {
        console.error('Error during login:', error);
        sendInternalError(res);
      }
    }
  );

  router.post(
    '/auth/logout',
    async (req: express.Request, res: express.Response): Promise<void> => {
      try {
        const response = await handlers.logout(sessionTokenOf(req));
        send(res, response, sessionCookieName);
      } catch (error) {
        console.error('Error during logout:', error);
        sendInternalError(res);
      }
    }
  );

  router.get(
    '/auth/me',
    async (req: express.Request, res: express.Response): Promise<void> => {
      try {
        const response = await handlers.currentUser(sessionTokenOf(req));
        send(res, response, sessionCookieName);
      } catch (error) {
        console.error('Error fetching current user:', error);
        sendInternalError(res);
      }
    }
  );

  return router;
}
