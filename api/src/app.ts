import * as OpenApiValidator from 'express-openapi-validator';
import express from 'express';
import cors from 'cors';
import path from 'path';
import { createAuthRouter } from './auth/controller';
import { errorBody } from './auth/handlers';
import type { AuthHandlers } from './auth/handlers';

export interface AppOptions {
  handlers: AuthHandlers;
  sessionCookieName: string;
  corsOrigin?: string;
}

function numericProperty(err: unknown, key: 'status' | 'statusCode'): number | undefined {
  if (typeof err === 'object' && err !== null && key in err) {
    const value: unknown = Reflect.get(err, key);
    return typeof value === 'number' ? value : undefined;
  }
  return undefined;
}

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

export function errorStatus(err: unknown): number {
  const status = numericProperty(err, 'status') ?? numericProperty(err, 'statusCode');
  if (status === undefined || status < 400 || status > 599) {
    return 500;
  }
  // An operation is a (method, path) pair; a known path with an unknown method is still unknown.
  return status === 405 ? 404 : status;
}

export function errorMessage(err: unknown, status: number): string {
  if (status >= 500) {
    return 'Internal Server Error';
  }
  if (status === 404) {
    return 'Not found';
  }
  if (isBodyParseError(err)) {
    return 'Malformed JSON body';
  }
  return err instanceof Error ? err.message : 'Bad request';
}

export function createApp(options: AppOptions): express.Express {
  const { handlers, sessionCookieName, corsOrigin } = options;
  const app = express();

  // Credentialed cross-origin requests only from the configured origin.
  app.use(cors(corsOrigin ? { origin: corsOrigin, credentials: true } : undefined));
  app.use(express.json());
  app.use(
    OpenApiValidator.middleware({
      apiSpec: path.join(__dirname, 'openapi.yml'),
      validateRequests: true,
      validateResponses: true,
    })
  );

  app.get('/', (_req: express.Request, res: express.Response) => {
    const response = handlers.healthcheck();
    res.status(response.status).json(response.body);
  });

  app.use('/', createAuthRouter(handlers, { sessionCookieName }));

  app.use((_req: express.Request, res: express.Response) => {
    res.status(404).json(errorBody(404, 'Not found'));
  });

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      const status = errorStatus(err);
      if (status >= 500) {
        console.error('Express error handler caught:', err);
      }
      res.status(status).json(errorBody(status, errorMessage(err, status)));
    }
  );

  return app;
}
