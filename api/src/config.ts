import dotenv from 'dotenv';
import { DEFAULT_ITERATIONS, MAX_ITERATIONS } from './auth/password';

dotenv.config();

export type DatabaseDriver = 'postgres' | 'memory';

export interface Config {
  port: number;
  nodeEnv: string;
  databaseDriver: DatabaseDriver;
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  auth: {
    sessionCookieName: string;
    passwordHashIterations: number;
  };
  corsOrigin: string | undefined;
}

function parseDatabaseDriver(value: string | undefined): DatabaseDriver {
  if (value === undefined || value === '' || value === 'postgres') {
    return 'postgres';
  }
  if (value === 'memory') {
    return 'memory';
  }
  throw new Error(`Unknown DATABASE_DRIVER "${value}" (expected postgres or memory)`);
}

function parseIterations(value: string | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_ITERATIONS;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`PASSWORD_HASH_ITERATIONS must be a positive integer, got "${value}"`);
  }
  if (parsed > MAX_ITERATIONS) {
    throw new Error(
      `PASSWORD_HASH_ITERATIONS must be at most ${MAX_ITERATIONS}, got "${value}"`
    );
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: Number(env['PORT']) || 3000,
    nodeEnv: env['NODE_ENV'] || 'development',
    databaseDriver: parseDatabaseDriver(env['DATABASE_DRIVER']),
    database: {
      host: env['DB_HOST'] || 'localhost',
      port: Number(env['DB_PORT']) || 5432,
      database: env['DB_NAME'] || 'session_auth',
      user: env['DB_USER'] || 'session_auth',
      password: env['DB_PASSWORD'] || '',
    },
    auth: {
      sessionCookieName: env['SESSION_COOKIE_NAME'] || 'session',
      passwordHashIterations: parseIterations(env['PASSWORD_HASH_ITERATIONS']),
    },
    corsOrigin: env['CORS_ORIGIN'] || undefined,
  };
}

export const config: Config = loadConfig();
